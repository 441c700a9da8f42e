/**
 * Summaries Domain
 */

export { SummaryService } from './summary-service.js';
export { DEFAULT_TRAILING_MONTHS } from './summary-types.js';
export type { Dashboard, MonthlySummary, MonthlyTotals } from './summary-types.js';
