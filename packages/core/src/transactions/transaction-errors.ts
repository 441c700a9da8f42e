/**
 * Ledger Domain Errors
 *
 * Thrown by the store and services; route handlers map them to HTTP status codes.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

/**
 * Malformed caller input. Nothing has been written when this is thrown.
 */
export class ValidationError extends LedgerError {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.join('; '));
    this.name = 'ValidationError';
    this.issues = list;
  }
}

export class TransactionNotFoundError extends LedgerError {
  readonly transactionId: number;

  constructor(id: number) {
    super(`Transaction not found: ${id}`);
    this.name = 'TransactionNotFoundError';
    this.transactionId = id;
  }
}

export class StorageError extends LedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}
