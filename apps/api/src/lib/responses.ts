import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { TransactionNotFoundError, ValidationError } from '@ledger/core';

/**
 * 400 body shared by request-shape (zod) and domain validation failures
 */
export function validationFailed(c: Context, issues: string[]) {
  return c.json({ error: 'Validation failed', issues }, 400);
}

export function zodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Hook for zValidator: answers 400 with the zod issues instead of Hono's default body
 */
export function onInvalidRequest(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    return validationFailed(c, zodIssues(result.error));
  }
}

/**
 * Map a ledger domain error to its HTTP response.
 * Returns null for anything the caller should rethrow.
 */
export function ledgerErrorResponse(c: Context, error: unknown): Response | null {
  if (error instanceof ValidationError) {
    return validationFailed(c, error.issues);
  }

  if (error instanceof TransactionNotFoundError) {
    return c.json({ error: 'Transaction not found' }, 404);
  }

  return null;
}
