/**
 * GET /v1/transactions/:id - Fetch one transaction
 */

import { Hono } from 'hono';
import { ledgerErrorResponse } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const getTransactionRoute = new Hono<AppBindings>();

getTransactionRoute.get('/:id{[0-9]+}', (c) => {
  const id = Number(c.req.param('id'));

  try {
    return c.json(c.var.services.transactionService.getTransaction(id));
  } catch (error) {
    const response = ledgerErrorResponse(c, error);
    if (response) return response;
    throw error;
  }
});

export { getTransactionRoute };
