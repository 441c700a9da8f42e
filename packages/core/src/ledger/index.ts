/**
 * Ledger composition
 *
 * Wires the store and services around one database handle. The handle is
 * owned by the caller, which opens it per request and closes it afterwards.
 */

import type { LedgerDatabase } from '@ledger/database';
import { SummaryService } from '../summaries/index.js';
import {
  TransactionRepository,
  TransactionService,
  type TransactionServiceOptions,
} from '../transactions/index.js';

export interface LedgerServices {
  transactionRepository: TransactionRepository;
  transactionService: TransactionService;
  summaryService: SummaryService;
}

export function createLedgerServices(
  db: LedgerDatabase,
  options: TransactionServiceOptions = {}
): LedgerServices {
  const transactionRepository = new TransactionRepository(db);

  return {
    transactionRepository,
    transactionService: new TransactionService(transactionRepository, options),
    summaryService: new SummaryService(transactionRepository),
  };
}
