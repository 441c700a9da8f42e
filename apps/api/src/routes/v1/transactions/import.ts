/**
 * POST /v1/transactions/import - Restore records from a CSV export
 *
 * The body is the CSV text. Records keep their ids and creation timestamps;
 * nothing is written unless every row is valid and no id is taken.
 */

import { Hono } from 'hono';
import { ledgerErrorResponse } from '../../../lib/responses.js';
import { parseTransactionsCsv } from '../../../lib/transactions-csv.js';
import type { AppBindings } from '../../../types/context.js';

const importTransactionsRoute = new Hono<AppBindings>();

importTransactionsRoute.post('/import', async (c) => {
  const text = await c.req.text();

  try {
    const records = parseTransactionsCsv(text);
    const imported = c.var.services.transactionService.importTransactions(records);

    c.var.logger.info(
      { imported, transactionIds: records.map((record) => record.id) },
      'Transactions imported'
    );

    return c.json({ imported }, 201);
  } catch (error) {
    const response = ledgerErrorResponse(c, error);
    if (response) return response;
    throw error;
  }
});

export { importTransactionsRoute };
