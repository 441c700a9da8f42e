import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MEMORY_DATABASE, openLedgerDatabase, type LedgerDatabase } from '@ledger/database';
import { createLedgerServices } from './index.js';

describe('createLedgerServices', () => {
  let db: LedgerDatabase;

  beforeEach(() => {
    db = openLedgerDatabase(MEMORY_DATABASE);
  });

  afterEach(() => {
    db.close();
  });

  it('shares one store between the transaction and summary services', () => {
    const { transactionRepository, transactionService, summaryService } = createLedgerServices(db);
    transactionRepository.initialize();

    transactionService.addTransaction({ date: '2024-05-02', amount: '1200', type: 'income' });
    transactionService.addTransaction({ date: '2024-05-10', amount: '45.5', type: 'expense' });

    expect(summaryService.monthlySummary(2024, 5)).toEqual({
      income: 1200,
      expense: 45.5,
      net: 1154.5,
    });
  });

  it('passes the clock through to the transaction service', () => {
    const { transactionRepository, transactionService } = createLedgerServices(db, {
      now: () => new Date('2024-06-01T08:30:00.000Z'),
    });
    transactionRepository.initialize();

    const id = transactionService.addTransaction({ date: '2024-06-01', amount: 3, type: 'expense' });

    expect(transactionService.getTransaction(id).createdAt).toBe('2024-06-01T08:30:00.000Z');
  });
});
