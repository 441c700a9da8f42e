/**
 * @ledger/types
 *
 * Request/response schemas shared by the ledger API and its clients.
 */

export * from './transaction.schema.js';
export * from './summary.schema.js';
