export {
  MAX_SUMMARY_YEAR,
  MAX_YEAR,
  MIN_YEAR,
  daysInMonth,
  formatIsoDate,
  formatYearMonth,
  isIsoDate,
  isLeapYear,
  isValidYearMonth,
  monthInterval,
  parseIsoDate,
  shiftMonth,
  toIsoDate,
} from './calendar.js';
export type { CalendarDate, DateInterval, YearMonth } from './calendar.js';
