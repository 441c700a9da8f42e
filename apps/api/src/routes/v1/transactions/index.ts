/**
 * Transaction routes
 * Ledger entry CRUD plus CSV export and import
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createTransactionRoute } from './create.js';
import { deleteTransactionRoute } from './delete.js';
import { exportTransactionsRoute } from './export.js';
import { getTransactionRoute } from './get.js';
import { importTransactionsRoute } from './import.js';
import { listTransactionsRoute } from './list.js';
import { updateTransactionRoute } from './update.js';

const transactionsRoute = new Hono<AppBindings>();

// Mount transaction routes
transactionsRoute.route('/', exportTransactionsRoute);
transactionsRoute.route('/', importTransactionsRoute);
transactionsRoute.route('/', listTransactionsRoute);
transactionsRoute.route('/', createTransactionRoute);
transactionsRoute.route('/', getTransactionRoute);
transactionsRoute.route('/', updateTransactionRoute);
transactionsRoute.route('/', deleteTransactionRoute);

export { transactionsRoute };
