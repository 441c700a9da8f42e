/**
 * @ledger/core - Domain logic for the personal ledger
 *
 * Transaction store and service, monthly summaries, and the calendar helpers
 * they share. Everything here is synchronous and takes its database handle
 * from the caller.
 */

export * from './calendar/index.js';
export * from './transactions/index.js';
export * from './summaries/index.js';
export * from './ledger/index.js';
