/**
 * GET /v1/dashboard - Reference month totals plus the trailing twelve months
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { toIsoDate } from '@ledger/core';
import { DashboardQuerySchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../lib/responses.js';
import type { AppBindings } from '../../types/context.js';

const dashboardRoute = new Hono<AppBindings>();

dashboardRoute.get('/', zValidator('query', DashboardQuerySchema, onInvalidRequest), (c) => {
  const { date } = c.req.valid('query');

  try {
    return c.json(c.var.services.summaryService.dashboard(date || toIsoDate(c.var.now())));
  } catch (error) {
    const response = ledgerErrorResponse(c, error);
    if (response) return response;
    throw error;
  }
});

export { dashboardRoute };
