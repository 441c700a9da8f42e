/**
 * Transaction Service
 *
 * Business logic layer for ledger entries.
 * Validates and normalizes input, then delegates to the repository.
 */

import type { TransactionRepository } from './transaction-repository.js';
import { TransactionNotFoundError, ValidationError } from './transaction-errors.js';
import {
  parseImportedTransactions,
  parseListLimit,
  parseTransactionFields,
  parseTransactionFilter,
} from './transaction-validation.js';
import {
  DEFAULT_LIST_LIMIT,
  type ImportedTransactionInput,
  type Transaction,
  type TransactionFilter,
  type TransactionInput,
} from './transaction-types.js';

export interface TransactionServiceOptions {
  /**
   * Clock used for `createdAt`; defaults to the system clock
   */
  now?: () => Date;
}

export class TransactionService {
  private now: () => Date;

  constructor(
    private transactionRepo: TransactionRepository,
    options: TransactionServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record a new transaction
   *
   * Business rules:
   * - Date must be a real calendar date (YYYY-MM-DD)
   * - Amount must parse as a decimal number
   * - Amount sign follows the type (expense negative, income positive)
   * - Empty optional fields are stored as null
   *
   * @returns Id of the new record
   * @throws {ValidationError} If any field is invalid; nothing is written
   */
  addTransaction(input: TransactionInput): number {
    const fields = parseTransactionFields(input);

    return this.transactionRepo.insert({
      ...fields,
      createdAt: this.now().toISOString(),
    });
  }

  /**
   * Replace the mutable fields of an existing transaction.
   * `id` and `createdAt` are left untouched.
   *
   * @throws {ValidationError} If any field is invalid
   * @throws {TransactionNotFoundError} If no transaction has this id
   */
  updateTransaction(id: number, input: TransactionInput): Transaction {
    this.assertId(id);
    const fields = parseTransactionFields(input);

    const updated = this.transactionRepo.update(id, fields);
    if (!updated) {
      throw new TransactionNotFoundError(id);
    }

    return updated;
  }

  /**
   * Permanently remove a transaction
   *
   * @throws {TransactionNotFoundError} If no transaction has this id
   */
  deleteTransaction(id: number): void {
    this.assertId(id);

    if (!this.transactionRepo.delete(id)) {
      throw new TransactionNotFoundError(id);
    }
  }

  getTransaction(id: number): Transaction {
    this.assertId(id);

    const transaction = this.transactionRepo.findById(id);
    if (!transaction) {
      throw new TransactionNotFoundError(id);
    }

    return transaction;
  }

  /**
   * List transactions, newest first (date, then id)
   *
   * @param filter - Inclusive date bounds and exact category; empty values are ignored
   * @param limit - Maximum number of records returned
   * @throws {ValidationError} If a filter date or the limit is malformed
   */
  listTransactions(filter: TransactionFilter = {}, limit = DEFAULT_LIST_LIMIT): Transaction[] {
    const resolved = parseTransactionFilter(filter);
    return this.transactionRepo.find(resolved, parseListLimit(limit));
  }

  /**
   * Restore records from a previous export, keeping their ids and creation
   * timestamps. The whole batch is validated before anything is written.
   *
   * @returns Number of records inserted
   * @throws {ValidationError} If a record is invalid or its id is already taken
   */
  importTransactions(records: readonly ImportedTransactionInput[]): number {
    const parsed = parseImportedTransactions(records);

    const taken = this.transactionRepo.findExistingIds(
      parsed.flatMap((record) => (record.id === undefined ? [] : [record.id]))
    );
    if (taken.length > 0) {
      throw new ValidationError(taken.map((id) => `Transaction ${id} already exists`));
    }

    for (const record of parsed) {
      this.transactionRepo.insert(record);
    }

    return parsed.length;
  }

  private assertId(id: number): void {
    // Ids are positive integers; anything else cannot exist in the store
    if (!Number.isInteger(id) || id < 1) {
      throw new TransactionNotFoundError(id);
    }
  }
}
