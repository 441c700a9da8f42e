/**
 * Transaction Domain Types
 *
 * Type definitions for the ledger store and transaction service.
 */

export const TRANSACTION_TYPES = ['income', 'expense'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const DEFAULT_LIST_LIMIT = 1000;
export const EXPORT_LIMIT = 10000;

/** Longest category, tags or notes value accepted on any write path */
export const MAX_TEXT_LENGTH = 1000;

/**
 * A persisted ledger entry. `amount` always carries the sign of `type`.
 */
export interface Transaction {
  id: number;
  date: string;
  amount: number;
  type: TransactionType;
  category: string | null;
  tags: string | null;
  notes: string | null;
  createdAt: string;
}

/**
 * Caller-supplied data for create/update, before validation
 */
export interface TransactionInput {
  date: string;
  amount: number | string;
  type: string;
  category?: string | null;
  tags?: string | null;
  notes?: string | null;
}

/**
 * A row from a previous export, fed back through import
 */
export interface ImportedTransactionInput extends TransactionInput {
  id: number | string;
  createdAt: string;
}

/**
 * Validated, sign-normalized mutable fields
 */
export interface TransactionFields {
  date: string;
  amount: number;
  type: TransactionType;
  category: string | null;
  tags: string | null;
  notes: string | null;
}

export interface NewTransactionRecord extends TransactionFields {
  /** Only set when restoring an exported record */
  id?: number;
  createdAt: string;
}

export interface TransactionFilter {
  startDate?: string | null;
  endDate?: string | null;
  category?: string | null;
}

/**
 * Filter after validation; absent criteria are undefined
 */
export interface ResolvedTransactionFilter {
  startDate?: string;
  endDate?: string;
  category?: string;
}

export interface TypeTotals {
  income: number;
  expense: number;
}

/**
 * Size and date span of the ledger
 */
export interface LedgerStats {
  count: number;
  firstDate: string | null;
  lastDate: string | null;
}
