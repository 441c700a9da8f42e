import 'dotenv/config';
import { serve } from '@hono/node-server';
import { logger } from '@ledger/observability';
import { createApp } from './app.js';
import { API_VERSION, loadConfig } from './config.js';

const config = loadConfig();
logger.level = config.logLevel;

logger.info(
  { port: config.port, databasePath: config.databasePath, env: config.nodeEnv },
  'Starting server'
);

const app = createApp({ databasePath: config.databasePath });

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port, version: API_VERSION }, 'Server running');
