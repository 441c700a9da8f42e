/**
 * Transaction Repository
 *
 * The ledger store: data access for transaction records over a SQLite handle.
 * No validation or normalization happens here; callers pass clean fields.
 * Every failure of the underlying driver is rethrown as a StorageError.
 */

import {
  ensureLedgerSchema,
  type LedgerDatabase,
  type TransactionRow,
} from '@ledger/database';
import type { DateInterval } from '../calendar/index.js';
import { LedgerError, StorageError } from './transaction-errors.js';
import { isTransactionType } from './transaction-validation.js';
import type {
  LedgerStats,
  NewTransactionRecord,
  ResolvedTransactionFilter,
  Transaction,
  TransactionFields,
  TypeTotals,
} from './transaction-types.js';

type TransactionParams = {
  date: string;
  amount: number;
  type: string;
  category: string | null;
  tags: string | null;
  notes: string | null;
};

// Keeps IN (...) lists well below SQLite's bound-parameter limit
const ID_LOOKUP_CHUNK_SIZE = 500;

export class TransactionRepository {
  constructor(private db: LedgerDatabase) {}

  /**
   * Create the schema if it is missing. Safe to call any number of times.
   */
  initialize(): void {
    this.run('initialize ledger schema', () => ensureLedgerSchema(this.db));
  }

  /**
   * Insert a record and return its id. A record restored from an export
   * keeps its original id; otherwise SQLite assigns the next one.
   */
  insert(record: NewTransactionRecord): number {
    return this.run('insert transaction', () => {
      const result = this.db
        .prepare<TransactionParams & { id: number | null; createdAt: string }>(
          `INSERT INTO transactions (id, date, amount, type, category, tags, notes, created_at)
           VALUES (@id, @date, @amount, @type, @category, @tags, @notes, @createdAt)`
        )
        .run({
          id: record.id ?? null,
          ...toParams(record),
          createdAt: record.createdAt,
        });

      return Number(result.lastInsertRowid);
    });
  }

  /**
   * Overwrite the mutable fields of a record.
   * Returns null when no record has this id.
   */
  update(id: number, fields: TransactionFields): Transaction | null {
    const changes = this.run('update transaction', () => {
      const result = this.db
        .prepare<TransactionParams & { id: number }>(
          `UPDATE transactions
           SET date = @date, amount = @amount, type = @type,
               category = @category, tags = @tags, notes = @notes
           WHERE id = @id`
        )
        .run({ ...toParams(fields), id });

      return result.changes;
    });

    if (changes === 0) {
      return null;
    }

    return this.findById(id);
  }

  /**
   * Remove a record. Returns false when there was nothing to remove.
   */
  delete(id: number): boolean {
    return this.run('delete transaction', () => {
      const result = this.db.prepare<[number]>('DELETE FROM transactions WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  findById(id: number): Transaction | null {
    return this.run('find transaction', () => {
      const row = this.db
        .prepare<[number], TransactionRow>('SELECT * FROM transactions WHERE id = ?')
        .get(id);

      return row ? toTransaction(row) : null;
    });
  }

  /**
   * Records matching the filter, newest date first, ties broken by id
   * (highest first). Date bounds are inclusive; category matches exactly.
   */
  find(filter: ResolvedTransactionFilter, limit: number): Transaction[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.startDate) {
      clauses.push('date >= ?');
      params.push(filter.startDate);
    }
    if (filter.endDate) {
      clauses.push('date <= ?');
      params.push(filter.endDate);
    }
    if (filter.category) {
      clauses.push('category = ?');
      params.push(filter.category);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(limit);

    return this.run('query transactions', () =>
      this.db
        .prepare<Array<string | number>, TransactionRow>(
          `SELECT * FROM transactions ${where} ORDER BY date DESC, id DESC LIMIT ?`
        )
        .all(...params)
        .map(toTransaction)
    );
  }

  /**
   * Ids from the given list that are already taken
   */
  findExistingIds(ids: readonly number[]): number[] {
    const existing: number[] = [];

    for (let i = 0; i < ids.length; i += ID_LOOKUP_CHUNK_SIZE) {
      const chunk = ids.slice(i, i + ID_LOOKUP_CHUNK_SIZE);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.run('look up transaction ids', () =>
        this.db
          .prepare<number[], { id: number }>(
            `SELECT id FROM transactions WHERE id IN (${placeholders})`
          )
          .all(...chunk)
      );
      existing.push(...rows.map((row) => row.id));
    }

    return existing;
  }

  /**
   * Income and expense totals over a half-open date interval.
   * Expense totals are reported as a positive magnitude.
   */
  sumByType(interval: DateInterval): TypeTotals {
    return this.run('summarize transactions', () => {
      const row = this.db
        .prepare<[string, string], TypeTotals>(
          `SELECT
             COALESCE(SUM(CASE WHEN type = 'income' THEN amount ELSE 0 END), 0) AS income,
             COALESCE(SUM(CASE WHEN type = 'expense' THEN ABS(amount) ELSE 0 END), 0) AS expense
           FROM transactions
           WHERE date >= ? AND date < ?`
        )
        .get(interval.start, interval.end);

      return { income: row?.income ?? 0, expense: row?.expense ?? 0 };
    });
  }

  stats(): LedgerStats {
    return this.run('read ledger stats', () => {
      const row = this.db
        .prepare<[], LedgerStats>(
          `SELECT COUNT(*) AS count, MIN(date) AS firstDate, MAX(date) AS lastDate
           FROM transactions`
        )
        .get();

      return {
        count: row?.count ?? 0,
        firstDate: row?.firstDate ?? null,
        lastDate: row?.lastDate ?? null,
      };
    });
  }

  private run<T>(operation: string, work: () => T): T {
    try {
      return work();
    } catch (error) {
      if (error instanceof LedgerError) {
        throw error;
      }
      throw new StorageError(`Failed to ${operation}`, { cause: error });
    }
  }
}

function toParams(fields: TransactionFields): TransactionParams {
  return {
    date: fields.date,
    amount: fields.amount,
    type: fields.type,
    category: fields.category,
    tags: fields.tags,
    notes: fields.notes,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  if (!isTransactionType(row.type)) {
    throw new StorageError(`Unexpected transaction type "${row.type}" in row ${row.id}`);
  }

  return {
    id: row.id,
    date: row.date,
    amount: row.amount,
    type: row.type,
    category: row.category,
    tags: row.tags,
    notes: row.notes,
    createdAt: row.created_at,
  };
}
