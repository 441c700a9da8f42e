import { Hono } from 'hono';
import { API_VERSION } from '../../config.js';

const healthRoute = new Hono();

healthRoute.get('/', (c) => {
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: API_VERSION,
  };

  return c.json(response);
});

export { healthRoute };
