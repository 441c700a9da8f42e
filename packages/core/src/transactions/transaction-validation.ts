/**
 * Transaction input validation
 *
 * Turns loosely typed caller input into validated, sign-normalized fields.
 * Every failure surfaces as a ValidationError listing all issues found.
 */

import { z } from 'zod';
import { isIsoDate } from '../calendar/index.js';
import { ValidationError } from './transaction-errors.js';
import {
  MAX_TEXT_LENGTH,
  TRANSACTION_TYPES,
  type ImportedTransactionInput,
  type NewTransactionRecord,
  type ResolvedTransactionFilter,
  type TransactionFields,
  type TransactionFilter,
  type TransactionType,
} from './transaction-types.js';

const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a decimal amount from a number or a decimal string. An exponent is
 * allowed, since that is how very large and very small amounts are printed.
 * Thousands separators and non-finite values are rejected.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Expense amounts are stored non-positive, income amounts non-negative.
 * Zero stays zero whatever sign it was given.
 */
export function normalizeAmount(amount: number, type: TransactionType): number {
  if (amount === 0) {
    return 0;
  }
  return type === 'expense' ? -Math.abs(amount) : Math.abs(amount);
}

function normalizeSign<T extends { amount: number; type: TransactionType }>(fields: T): T {
  return { ...fields, amount: normalizeAmount(fields.amount, fields.type) };
}

const DATE_MESSAGE = 'Date must be a valid calendar date (YYYY-MM-DD)';

// Empty strings and null both mean "not set"
const optionalText = z
  .string({ invalid_type_error: 'Optional text fields must be strings' })
  .max(MAX_TEXT_LENGTH, `Text fields must be ${MAX_TEXT_LENGTH} characters or less`)
  .nullish()
  .transform((value) => (value ? value : null));

const transactionFieldShape = {
  date: z
    .string({ required_error: 'Date is required', invalid_type_error: DATE_MESSAGE })
    .refine(isIsoDate, DATE_MESSAGE),
  amount: z.unknown().transform((value, ctx) => {
    const parsed = parseAmount(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be a number' });
      return z.NEVER;
    }
    return parsed;
  }),
  type: z.enum(TRANSACTION_TYPES, {
    errorMap: () => ({ message: 'Type must be "income" or "expense"' }),
  }),
  category: optionalText,
  tags: optionalText,
  notes: optionalText,
};

export const TransactionFieldsSchema = z.object(transactionFieldShape).transform(normalizeSign);

const ID_MESSAGE = 'Id must be a positive integer';

export const ImportedTransactionSchema = z
  .object({
    id: z.coerce
      .number({ invalid_type_error: ID_MESSAGE })
      .int(ID_MESSAGE)
      .positive(ID_MESSAGE),
    ...transactionFieldShape,
    createdAt: z
      .string({ required_error: 'Created timestamp is required' })
      .datetime({ offset: true, message: 'Created timestamp must be an ISO 8601 timestamp' }),
  })
  .transform(normalizeSign);

function filterDate(label: string) {
  return z
    .string({ invalid_type_error: `${label} must be a string` })
    .nullish()
    .transform((value) => (value ? value : undefined))
    .refine(
      (value) => value === undefined || isIsoDate(value),
      `${label} must be a valid calendar date (YYYY-MM-DD)`
    );
}

export const TransactionFilterSchema = z.object({
  startDate: filterDate('Start date'),
  endDate: filterDate('End date'),
  category: z
    .string({ invalid_type_error: 'Category must be a string' })
    .nullish()
    .transform((value) => (value ? value : undefined)),
});

function issueMessages(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map((issue) => `${prefix}${issue.message}`);
}

export function parseTransactionFields(input: unknown): TransactionFields {
  const result = TransactionFieldsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(issueMessages(result.error));
  }
  return result.data;
}

/**
 * Validate a batch of exported records. Issues from every row are collected
 * before throwing so the caller sees the whole picture at once.
 */
export function parseImportedTransactions(
  records: readonly ImportedTransactionInput[]
): NewTransactionRecord[] {
  const parsed: NewTransactionRecord[] = [];
  const issues: string[] = [];
  const seen = new Set<number>();

  records.forEach((record, index) => {
    const result = ImportedTransactionSchema.safeParse(record);
    if (!result.success) {
      issues.push(...issueMessages(result.error, `Row ${index + 1}: `));
      return;
    }

    if (seen.has(result.data.id)) {
      issues.push(`Row ${index + 1}: Duplicate id ${result.data.id}`);
      return;
    }

    seen.add(result.data.id);
    parsed.push(result.data);
  });

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return parsed;
}

export function parseTransactionFilter(filter: TransactionFilter): ResolvedTransactionFilter {
  const result = TransactionFilterSchema.safeParse(filter);
  if (!result.success) {
    throw new ValidationError(issueMessages(result.error));
  }
  return result.data;
}

export function parseListLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('Limit must be a positive integer');
  }
  return limit;
}

export function isTransactionType(value: string): value is TransactionType {
  return TRANSACTION_TYPES.some((type) => type === value);
}
