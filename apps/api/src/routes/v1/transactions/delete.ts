/**
 * DELETE /v1/transactions/:id - Remove a transaction permanently
 */

import { Hono } from 'hono';
import { ledgerErrorResponse } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const deleteTransactionRoute = new Hono<AppBindings>();

deleteTransactionRoute.delete('/:id{[0-9]+}', (c) => {
  const id = Number(c.req.param('id'));

  try {
    c.var.services.transactionService.deleteTransaction(id);
  } catch (error) {
    const response = ledgerErrorResponse(c, error);
    if (response) return response;
    throw error;
  }

  c.var.logger.info({ transactionId: id }, 'Transaction deleted');

  return c.body(null, 204);
});

export { deleteTransactionRoute };
