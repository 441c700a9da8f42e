import { TransactionRepository } from '@ledger/core';
import { withLedgerDatabase } from '@ledger/database';

/**
 * Make sure the ledger file exists and carries the current schema
 */
export function initializeLedger(databasePath: string): void {
  withLedgerDatabase(databasePath, (db) => new TransactionRepository(db).initialize());
}
