/**
 * PUT /v1/transactions/:id - Replace a transaction's fields
 *
 * `id` and `createdAt` never change.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { UpdateTransactionRequestSchema } from '@ledger/types';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const updateTransactionRoute = new Hono<AppBindings>();

updateTransactionRoute.put(
  '/:id{[0-9]+}',
  zValidator('json', UpdateTransactionRequestSchema, onInvalidRequest),
  (c) => {
    const id = Number(c.req.param('id'));
    const body = c.req.valid('json');

    try {
      const transaction = c.var.services.transactionService.updateTransaction(id, body);

      c.var.logger.info({ transactionId: id }, 'Transaction updated');

      return c.json(transaction);
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) return response;
      throw error;
    }
  }
);

export { updateTransactionRoute };
