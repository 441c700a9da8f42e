/**
 * GET /v1/summaries/monthly/:year/:month - Totals for one calendar month
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { MonthlySummaryParamsSchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const monthlySummaryRoute = new Hono<AppBindings>();

monthlySummaryRoute.get(
  '/monthly/:year/:month',
  zValidator('param', MonthlySummaryParamsSchema, onInvalidRequest),
  (c) => {
    const { year, month } = c.req.valid('param');

    try {
      return c.json(c.var.services.summaryService.monthlySummary(year, month));
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) return response;
      throw error;
    }
  }
);

export { monthlySummaryRoute };
