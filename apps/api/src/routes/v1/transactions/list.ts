/**
 * GET /v1/transactions - List ledger entries
 *
 * Newest first (date, then id). `from`/`to` are inclusive, `category` is exact.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ListTransactionsQuerySchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const listTransactionsRoute = new Hono<AppBindings>();

listTransactionsRoute.get('/', zValidator('query', ListTransactionsQuerySchema, onInvalidRequest), (c) => {
  const { from, to, category, limit } = c.req.valid('query');

  try {
    const transactions = c.var.services.transactionService.listTransactions(
      { startDate: from, endDate: to, category },
      limit
    );

    return c.json({ transactions });
  } catch (error) {
    const response = ledgerErrorResponse(c, error);
    if (response) return response;
    throw error;
  }
});

export { listTransactionsRoute };
