import Database from 'better-sqlite3';

export type LedgerDatabase = Database.Database;

export { Database };

export type OpenLedgerDatabaseOptions = {
  readonly?: boolean;
  /**
   * Fail instead of creating the file when it does not exist yet
   */
  fileMustExist?: boolean;
};

export const MEMORY_DATABASE = ':memory:';

/**
 * Open a connection to the ledger file.
 *
 * The handle is meant to be short-lived: open one per request (or per script
 * run) and close it when the work is done. WAL keeps readers from blocking the
 * single writer while a handle is open elsewhere.
 */
export function openLedgerDatabase(
  filename: string,
  options: OpenLedgerDatabaseOptions = {}
): LedgerDatabase {
  const db = new Database(filename, {
    readonly: options.readonly ?? false,
    fileMustExist: options.fileMustExist ?? false,
  });

  if (filename !== MEMORY_DATABASE && !options.readonly) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');

  return db;
}

/**
 * Run `work` against a freshly opened handle and always close it afterwards
 */
export function withLedgerDatabase<T>(
  filename: string,
  work: (db: LedgerDatabase) => T,
  options: OpenLedgerDatabaseOptions = {}
): T {
  const db = openLedgerDatabase(filename, options);
  try {
    return work(db);
  } finally {
    db.close();
  }
}
