/**
 * GET /v1/summaries/trailing - Month-by-month totals, oldest first
 *
 * `date` picks the last month of the window (defaults to today),
 * `count` its length (defaults to 12).
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { toIsoDate } from '@ledger/core';
import { TrailingMonthsQuerySchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const trailingMonthsRoute = new Hono<AppBindings>();

trailingMonthsRoute.get(
  '/trailing',
  zValidator('query', TrailingMonthsQuerySchema, onInvalidRequest),
  (c) => {
    const { date, count } = c.req.valid('query');

    try {
      const months = c.var.services.summaryService.trailingMonths(
        date || toIsoDate(c.var.now()),
        count
      );

      return c.json({ months });
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) return response;
      throw error;
    }
  }
);

export { trailingMonthsRoute };
