/**
 * Transaction schemas for ledger entry creation, update, listing and import
 * Used for request/response validation at the HTTP boundary
 *
 * Field semantics (date validity, amount parsing, sign normalization) are
 * enforced by the transaction service; these schemas only check shape.
 */

import { z } from "zod";

export const TRANSACTION_TYPE_VALUES = ["income", "expense"] as const;

export const MAX_LIST_LIMIT = 10000;

export const MAX_TEXT_LENGTH = 1000;

const optionalText = z
  .string()
  .max(MAX_TEXT_LENGTH, `Text fields must be ${MAX_TEXT_LENGTH} characters or less`)
  .nullish();

/**
 * Amount as typed by the user ("12.50") or as a JSON number
 */
const amountInput = z.union([z.number(), z.string()], {
  errorMap: () => ({ message: "Amount is required" }),
});

/**
 * Request schema for recording a transaction
 * - date: defaults to today when omitted
 * - type: defaults to "expense" when omitted
 */
export const CreateTransactionRequestSchema = z.object({
  date: z.string().optional(),
  amount: amountInput,
  type: z.string().optional(),
  category: optionalText,
  tags: optionalText,
  notes: optionalText,
});

/**
 * Request schema for replacing a transaction's mutable fields
 */
export const UpdateTransactionRequestSchema = z.object({
  date: z.string({ required_error: "Date is required" }),
  amount: amountInput,
  type: z.string({ required_error: "Type is required" }),
  category: optionalText,
  tags: optionalText,
  notes: optionalText,
});

/**
 * Query schema for listing transactions
 * - from/to: inclusive date bounds (YYYY-MM-DD)
 * - limit: defaults to 1000 in the service
 */
export const ListTransactionsQuerySchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  category: z.string().optional(),
  limit: z.coerce
    .number()
    .int("Limit must be a whole number")
    .min(1, "Limit must be at least 1")
    .max(MAX_LIST_LIMIT, `Limit cannot exceed ${MAX_LIST_LIMIT}`)
    .optional(),
});

export const ExportTransactionsQuerySchema = ListTransactionsQuerySchema.omit({ limit: true });

export const TransactionResponseSchema = z.object({
  id: z.number().int(),
  date: z.string(),
  amount: z.number(),
  type: z.enum(TRANSACTION_TYPE_VALUES),
  category: z.string().nullable(),
  tags: z.string().nullable(),
  notes: z.string().nullable(),
  createdAt: z.string(), // ISO 8601 timestamp
});

export const CreateTransactionResponseSchema = z.object({
  id: z.number().int(),
  transaction: TransactionResponseSchema,
});

export const ListTransactionsResponseSchema = z.object({
  transactions: z.array(TransactionResponseSchema),
});

export const ImportTransactionsResponseSchema = z.object({
  imported: z.number().int(),
});

// Export TypeScript types derived from schemas
export type CreateTransactionRequest = z.infer<typeof CreateTransactionRequestSchema>;
export type UpdateTransactionRequest = z.infer<typeof UpdateTransactionRequestSchema>;
export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;
export type ExportTransactionsQuery = z.infer<typeof ExportTransactionsQuerySchema>;
export type TransactionResponse = z.infer<typeof TransactionResponseSchema>;
export type CreateTransactionResponse = z.infer<typeof CreateTransactionResponseSchema>;
export type ListTransactionsResponse = z.infer<typeof ListTransactionsResponseSchema>;
export type ImportTransactionsResponse = z.infer<typeof ImportTransactionsResponseSchema>;
