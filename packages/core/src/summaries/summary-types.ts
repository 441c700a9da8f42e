/**
 * Summary Domain Types
 */

export const DEFAULT_TRAILING_MONTHS = 12;

export interface MonthlySummary {
  income: number;
  expense: number;
  net: number;
}

export interface MonthlyTotals extends MonthlySummary {
  /** `YYYY-MM` */
  yearMonth: string;
}

export interface Dashboard {
  month: MonthlyTotals;
  trailing: MonthlyTotals[];
}
