import { z } from "zod";

export const MAX_TRAILING_MONTHS = 120;

export const MonthlySummaryParamsSchema = z.object({
  year: z.coerce.number().int("Year must be a whole number"),
  month: z.coerce.number().int("Month must be a whole number"),
});

export const TrailingMonthsQuerySchema = z.object({
  date: z.string().optional(), // reference date, defaults to today
  count: z.coerce
    .number()
    .int("Count must be a whole number")
    .min(1, "Count must be at least 1")
    .max(MAX_TRAILING_MONTHS, `Count cannot exceed ${MAX_TRAILING_MONTHS}`)
    .optional(),
});

export const DashboardQuerySchema = z.object({
  date: z.string().optional(),
});

export const MonthlySummaryResponseSchema = z.object({
  income: z.number(),
  expense: z.number(),
  net: z.number(),
});

export const MonthlyTotalsResponseSchema = MonthlySummaryResponseSchema.extend({
  yearMonth: z.string(), // YYYY-MM
});

export const TrailingMonthsResponseSchema = z.object({
  months: z.array(MonthlyTotalsResponseSchema),
});

export const DashboardResponseSchema = z.object({
  month: MonthlyTotalsResponseSchema,
  trailing: z.array(MonthlyTotalsResponseSchema),
});

export type MonthlySummaryParams = z.infer<typeof MonthlySummaryParamsSchema>;
export type TrailingMonthsQuery = z.infer<typeof TrailingMonthsQuerySchema>;
export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;
export type MonthlySummaryResponse = z.infer<typeof MonthlySummaryResponseSchema>;
export type MonthlyTotalsResponse = z.infer<typeof MonthlyTotalsResponseSchema>;
export type TrailingMonthsResponse = z.infer<typeof TrailingMonthsResponseSchema>;
export type DashboardResponse = z.infer<typeof DashboardResponseSchema>;
