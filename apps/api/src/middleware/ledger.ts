import type { MiddlewareHandler } from 'hono';
import { StorageError, createLedgerServices } from '@ledger/core';
import { openLedgerDatabase, type LedgerDatabase } from '@ledger/database';
import type { AppBindings } from '../types/context.js';

export type LedgerMiddlewareOptions = {
  databasePath: string;
  now?: () => Date;
};

/**
 * Ledger middleware
 * Opens a database handle for the request, exposes the services built on it,
 * and closes the handle once the response is produced (or the handler failed).
 */
export function ledgerMiddleware(options: LedgerMiddlewareOptions): MiddlewareHandler<AppBindings> {
  const now = options.now ?? (() => new Date());

  return async (c, next) => {
    let db: LedgerDatabase;
    try {
      db = openLedgerDatabase(options.databasePath);
    } catch (error) {
      throw new StorageError('Failed to open ledger database', { cause: error });
    }

    c.set('services', createLedgerServices(db, { now }));
    c.set('now', now);

    try {
      await next();
    } finally {
      db.close();
    }
  };
}
