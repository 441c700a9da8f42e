/**
 * Summary Service
 *
 * Monthly income/expense/net aggregation over the ledger.
 */

import {
  MAX_SUMMARY_YEAR,
  MIN_YEAR,
  formatYearMonth,
  monthInterval,
  parseIsoDate,
  shiftMonth,
  type YearMonth,
} from '../calendar/index.js';
import type { TransactionRepository } from '../transactions/transaction-repository.js';
import { ValidationError } from '../transactions/transaction-errors.js';
import {
  DEFAULT_TRAILING_MONTHS,
  type Dashboard,
  type MonthlySummary,
  type MonthlyTotals,
} from './summary-types.js';

export class SummaryService {
  constructor(private transactionRepo: TransactionRepository) {}

  /**
   * Totals for one calendar month. A month without entries reports zeros.
   *
   * @throws {ValidationError} If year or month is out of range
   */
  monthlySummary(year: number, month: number): MonthlySummary {
    this.validateYearMonth(year, month);

    const { income, expense } = this.transactionRepo.sumByType(monthInterval({ year, month }));

    return { income, expense, net: income - expense };
  }

  /**
   * Totals for the `count` months ending with the month of `referenceDate`,
   * oldest first
   *
   * @throws {ValidationError} If the reference date or count is malformed
   */
  trailingMonths(referenceDate: string, count = DEFAULT_TRAILING_MONTHS): MonthlyTotals[] {
    const reference = this.parseReferenceDate(referenceDate);

    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError('Count must be a positive integer');
    }

    const months: MonthlyTotals[] = [];
    for (let offset = count - 1; offset >= 0; offset--) {
      months.push(this.totalsFor(shiftMonth(reference, -offset)));
    }

    return months;
  }

  /**
   * Reference month plus the trailing twelve months
   */
  dashboard(referenceDate: string): Dashboard {
    const reference = this.parseReferenceDate(referenceDate);

    return {
      month: this.totalsFor(reference),
      trailing: this.trailingMonths(referenceDate, DEFAULT_TRAILING_MONTHS),
    };
  }

  private totalsFor(yearMonth: YearMonth): MonthlyTotals {
    return {
      yearMonth: formatYearMonth(yearMonth),
      ...this.monthlySummary(yearMonth.year, yearMonth.month),
    };
  }

  private parseReferenceDate(referenceDate: string): YearMonth {
    const parsed = parseIsoDate(referenceDate);
    if (!parsed) {
      throw new ValidationError('Reference date must be a valid calendar date (YYYY-MM-DD)');
    }
    return { year: parsed.year, month: parsed.month };
  }

  private validateYearMonth(year: number, month: number): void {
    const issues: string[] = [];

    if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_SUMMARY_YEAR) {
      issues.push(`Year must be an integer between ${MIN_YEAR} and ${MAX_SUMMARY_YEAR}`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      issues.push('Month must be an integer between 1 and 12');
    }

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }
  }
}
