/**
 * Transactions Domain
 *
 * Ledger store, transaction service, validation and errors
 */

export { TransactionRepository } from './transaction-repository.js';
export { TransactionService } from './transaction-service.js';
export type { TransactionServiceOptions } from './transaction-service.js';

export {
  ImportedTransactionSchema,
  TransactionFieldsSchema,
  TransactionFilterSchema,
  isTransactionType,
  normalizeAmount,
  parseAmount,
  parseImportedTransactions,
  parseListLimit,
  parseTransactionFields,
  parseTransactionFilter,
} from './transaction-validation.js';

export { DEFAULT_LIST_LIMIT, EXPORT_LIMIT, MAX_TEXT_LENGTH, TRANSACTION_TYPES } from './transaction-types.js';
export type {
  ImportedTransactionInput,
  LedgerStats,
  NewTransactionRecord,
  ResolvedTransactionFilter,
  Transaction,
  TransactionFields,
  TransactionFilter,
  TransactionInput,
  TransactionType,
  TypeTotals,
} from './transaction-types.js';

export {
  LedgerError,
  StorageError,
  TransactionNotFoundError,
  ValidationError,
} from './transaction-errors.js';
