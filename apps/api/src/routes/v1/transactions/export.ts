/**
 * GET /v1/transactions/export - Download the ledger as CSV
 *
 * Accepts the same filters as the list endpoint; capped at EXPORT_LIMIT rows.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EXPORT_LIMIT } from '@ledger/core';
import { ExportTransactionsQuerySchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import { formatTransactionsCsv } from '../../../lib/transactions-csv.js';
import type { AppBindings } from '../../../types/context.js';

const exportTransactionsRoute = new Hono<AppBindings>();

exportTransactionsRoute.get(
  '/export',
  zValidator('query', ExportTransactionsQuerySchema, onInvalidRequest),
  (c) => {
    const { from, to, category } = c.req.valid('query');

    try {
      const transactions = c.var.services.transactionService.listTransactions(
        { startDate: from, endDate: to, category },
        EXPORT_LIMIT
      );

      return c.body(formatTransactionsCsv(transactions), 200, {
        'Content-Type': 'text/csv; charset=utf-8',
        'Content-Disposition': 'attachment; filename="transactions.csv"',
      });
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) return response;
      throw error;
    }
  }
);

export { exportTransactionsRoute };
