import type { LedgerDatabase } from './connection.js';

export const TRANSACTIONS_TABLE = 'transactions';

/**
 * DDL for the ledger. Every statement is guarded with IF NOT EXISTS so the
 * script can run against an already initialized file.
 */
export const LEDGER_SCHEMA = `
CREATE TABLE IF NOT EXISTS ${TRANSACTIONS_TABLE} (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  amount REAL NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
  category TEXT,
  tags TEXT,
  notes TEXT,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS transactions_date_id_idx ON ${TRANSACTIONS_TABLE} (date DESC, id DESC);
CREATE INDEX IF NOT EXISTS transactions_category_idx ON ${TRANSACTIONS_TABLE} (category);
`;

/**
 * Row shape as stored in SQLite (snake_case columns)
 */
export type TransactionRow = {
  id: number;
  date: string;
  amount: number;
  type: string;
  category: string | null;
  tags: string | null;
  notes: string | null;
  created_at: string;
};

export function ensureLedgerSchema(db: LedgerDatabase): void {
  db.exec(LEDGER_SCHEMA);
}

/**
 * Remove the ledger table and its indexes. Every record is lost.
 */
export function dropLedgerSchema(db: LedgerDatabase): void {
  db.exec(`DROP TABLE IF EXISTS ${TRANSACTIONS_TABLE}`);
}

export function hasLedgerSchema(db: LedgerDatabase): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(TRANSACTIONS_TABLE);

  return row !== undefined;
}
