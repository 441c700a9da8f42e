/**
 * @ledger/database
 *
 * SQLite storage for the ledger: connection handling and schema.
 */

export {
  Database,
  MEMORY_DATABASE,
  openLedgerDatabase,
  withLedgerDatabase,
} from './connection.js';
export type { LedgerDatabase, OpenLedgerDatabaseOptions } from './connection.js';
export {
  LEDGER_SCHEMA,
  TRANSACTIONS_TABLE,
  dropLedgerSchema,
  ensureLedgerSchema,
  hasLedgerSchema,
} from './schema.js';
export type { TransactionRow } from './schema.js';
