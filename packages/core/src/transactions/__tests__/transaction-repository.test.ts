/**
 * Transaction Repository Tests
 *
 * Runs against an in-memory SQLite database
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MEMORY_DATABASE, openLedgerDatabase, type LedgerDatabase } from '@ledger/database';
import { TransactionRepository } from '../transaction-repository.js';
import { StorageError } from '../transaction-errors.js';
import type { NewTransactionRecord } from '../transaction-types.js';

function record(overrides: Partial<NewTransactionRecord> = {}): NewTransactionRecord {
  return {
    date: '2024-03-01',
    amount: -10,
    type: 'expense',
    category: null,
    tags: null,
    notes: null,
    createdAt: '2024-03-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('TransactionRepository', () => {
  let db: LedgerDatabase;
  let repo: TransactionRepository;

  beforeEach(() => {
    db = openLedgerDatabase(MEMORY_DATABASE);
    repo = new TransactionRepository(db);
    repo.initialize();
  });

  afterEach(() => {
    if (db.open) {
      db.close();
    }
  });

  describe('initialize', () => {
    it('is idempotent', () => {
      const id = repo.insert(record());

      repo.initialize();
      repo.initialize();

      expect(repo.findById(id)).not.toBeNull();
    });
  });

  describe('insert', () => {
    it('assigns increasing ids', () => {
      const first = repo.insert(record());
      const second = repo.insert(record());

      expect(first).toBe(1);
      expect(second).toBe(2);
    });

    it('uses an explicit id when one is given', () => {
      const id = repo.insert(record({ id: 42 }));

      expect(id).toBe(42);
      expect(repo.findById(42)?.amount).toBe(-10);
    });

    it('stores every field', () => {
      const id = repo.insert(
        record({
          date: '2024-03-05',
          amount: 1500,
          type: 'income',
          category: 'Salary',
          tags: 'monthly,job',
          notes: 'March pay',
          createdAt: '2024-03-05T09:15:00.000Z',
        })
      );

      expect(repo.findById(id)).toEqual({
        id,
        date: '2024-03-05',
        amount: 1500,
        type: 'income',
        category: 'Salary',
        tags: 'monthly,job',
        notes: 'March pay',
        createdAt: '2024-03-05T09:15:00.000Z',
      });
    });
  });

  describe('findById', () => {
    it('returns null for an unknown id', () => {
      expect(repo.findById(999)).toBeNull();
    });
  });

  describe('update', () => {
    it('overwrites mutable fields and keeps createdAt', () => {
      const id = repo.insert(record({ category: 'Food' }));

      const updated = repo.update(id, {
        date: '2024-03-09',
        amount: 250,
        type: 'income',
        category: null,
        tags: 'refund',
        notes: 'Returned item',
      });

      expect(updated).toEqual({
        id,
        date: '2024-03-09',
        amount: 250,
        type: 'income',
        category: null,
        tags: 'refund',
        notes: 'Returned item',
        createdAt: '2024-03-01T12:00:00.000Z',
      });
    });

    it('returns null when the id does not exist', () => {
      expect(
        repo.update(5, {
          date: '2024-03-09',
          amount: -1,
          type: 'expense',
          category: null,
          tags: null,
          notes: null,
        })
      ).toBeNull();
    });
  });

  describe('delete', () => {
    it('removes the record', () => {
      const id = repo.insert(record());

      expect(repo.delete(id)).toBe(true);
      expect(repo.findById(id)).toBeNull();
    });

    it('reports when nothing was removed', () => {
      expect(repo.delete(12)).toBe(false);
    });
  });

  describe('find', () => {
    beforeEach(() => {
      repo.insert(record({ date: '2024-01-10', category: 'Food' })); // 1
      repo.insert(record({ date: '2024-02-01', category: 'Rent' })); // 2
      repo.insert(record({ date: '2024-01-10', category: 'Fun' })); // 3
      repo.insert(record({ date: '2024-03-20', category: 'Food' })); // 4
      repo.insert(record({ date: '2023-12-31' })); // 5
    });

    it('orders by date descending, then id descending', () => {
      expect(repo.find({}, 100).map((t) => t.id)).toEqual([4, 2, 3, 1, 5]);
    });

    it('caps the result at the limit', () => {
      expect(repo.find({}, 2).map((t) => t.id)).toEqual([4, 2]);
    });

    it('treats date bounds as inclusive', () => {
      expect(
        repo.find({ startDate: '2024-01-10', endDate: '2024-02-01' }, 100).map((t) => t.id)
      ).toEqual([2, 3, 1]);
    });

    it('matches category exactly', () => {
      expect(repo.find({ category: 'Food' }, 100).map((t) => t.id)).toEqual([4, 1]);
      expect(repo.find({ category: 'food' }, 100)).toEqual([]);
    });

    it('combines criteria', () => {
      expect(
        repo.find({ startDate: '2024-02-01', category: 'Food' }, 100).map((t) => t.id)
      ).toEqual([4]);
    });
  });

  describe('findExistingIds', () => {
    it('returns only the ids that are taken', () => {
      repo.insert(record({ id: 3 }));
      repo.insert(record({ id: 9 }));

      expect(repo.findExistingIds([1, 3, 9, 10]).sort((a, b) => a - b)).toEqual([3, 9]);
    });

    it('handles an empty list', () => {
      expect(repo.findExistingIds([])).toEqual([]);
    });
  });

  describe('sumByType', () => {
    it('sums income as stored and expenses as magnitudes within the interval', () => {
      repo.insert(record({ date: '2024-04-01', amount: 2000, type: 'income' }));
      repo.insert(record({ date: '2024-04-15', amount: -120, type: 'expense' }));
      repo.insert(record({ date: '2024-04-30', amount: -30, type: 'expense' }));
      repo.insert(record({ date: '2024-05-01', amount: -999, type: 'expense' }));
      repo.insert(record({ date: '2024-03-31', amount: 999, type: 'income' }));

      expect(repo.sumByType({ start: '2024-04-01', end: '2024-05-01' })).toEqual({
        income: 2000,
        expense: 150,
      });
    });

    it('returns zeros for an empty interval', () => {
      expect(repo.sumByType({ start: '2024-04-01', end: '2024-05-01' })).toEqual({
        income: 0,
        expense: 0,
      });
    });
  });

  describe('stats', () => {
    it('reports an empty ledger', () => {
      expect(repo.stats()).toEqual({ count: 0, firstDate: null, lastDate: null });
    });

    it('counts records and spans their dates', () => {
      repo.insert(record({ date: '2024-02-10' }));
      repo.insert(record({ date: '2023-11-30' }));
      repo.insert(record({ date: '2024-01-01' }));

      expect(repo.stats()).toEqual({ count: 3, firstDate: '2023-11-30', lastDate: '2024-02-10' });
    });
  });

  describe('storage failures', () => {
    it('wraps driver errors in StorageError', () => {
      db.close();

      expect(() => repo.findById(1)).toThrow(StorageError);
      expect(() => repo.findById(1)).toThrow('Failed to find transaction');
    });

    it('keeps the driver error as the cause', () => {
      repo.insert(record({ id: 1 }));

      let thrown: unknown;
      try {
        repo.insert(record({ id: 1 }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(StorageError);
      expect(thrown instanceof StorageError && thrown.cause instanceof Error).toBe(true);
    });
  });
});
