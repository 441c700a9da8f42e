/**
 * POST /v1/transactions - Record a transaction
 *
 * `date` defaults to today (server clock, local calendar) and an omitted `type`
 * to expense.
 * The stored amount is sign-normalized to the type.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateTransactionRequestSchema } from '@ledger/types';
import { toIsoDate } from '@ledger/core';
import { ledgerErrorResponse, onInvalidRequest } from '../../../lib/responses.js';
import type { AppBindings } from '../../../types/context.js';

const createTransactionRoute = new Hono<AppBindings>();

createTransactionRoute.post(
  '/',
  zValidator('json', CreateTransactionRequestSchema, onInvalidRequest),
  (c) => {
    const body = c.req.valid('json');
    const { transactionService } = c.var.services;

    try {
      const id = transactionService.addTransaction({
        ...body,
        date: body.date || toIsoDate(c.var.now()),
        type: body.type ?? 'expense',
      });

      c.var.logger.info({ transactionId: id }, 'Transaction recorded');

      return c.json({ id, transaction: transactionService.getTransaction(id) }, 201);
    } catch (error) {
      const response = ledgerErrorResponse(c, error);
      if (response) return response;
      throw error;
    }
  }
);

export { createTransactionRoute };
