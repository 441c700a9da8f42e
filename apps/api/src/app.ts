import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { StorageError } from '@ledger/core';
import { initializeLedger } from './lib/ledger-setup.js';
import { ledgerMiddleware } from './middleware/ledger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { dashboardRoute } from './routes/v1/dashboard.js';
import { healthRoute } from './routes/v1/health.js';
import { summariesRoute } from './routes/v1/summaries/index.js';
import { transactionsRoute } from './routes/v1/transactions/index.js';
import type { AppBindings } from './types/context.js';

export type CreateAppOptions = {
  databasePath: string;
  /**
   * Clock for creation timestamps and "today" defaults
   */
  now?: () => Date;
};

export function createApp(options: CreateAppOptions) {
  initializeLedger(options.databasePath);

  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.route('/health', healthRoute);

  // Mount v1 routes; each request gets its own ledger handle
  const v1 = new Hono<AppBindings>();
  v1.use('*', ledgerMiddleware(options));

  v1.route('/transactions', transactionsRoute);
  v1.route('/summaries', summariesRoute);
  v1.route('/dashboard', dashboardRoute);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    if (error instanceof StorageError) {
      c.var.logger.error({ err: error }, 'Ledger storage failure');
      return c.json({ error: 'Storage failure' }, 500);
    }

    c.var.logger.error({ err: error }, 'Unhandled request error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
