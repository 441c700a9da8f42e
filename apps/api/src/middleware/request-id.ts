import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";
import { logger } from "@ledger/observability";

/**
 * Request ID middleware
 * Reuses an upstream request ID when present, otherwise generates one.
 * Handlers log through a child logger bound to the ID.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const existingRequestId =
    c.req.header("x-request-id") || c.req.header("x-correlation-id");

  const requestId = existingRequestId || randomUUID();

  c.set("requestId", requestId);
  c.set("logger", logger.child({ requestId }));

  // Add to response headers for client correlation
  c.header("x-request-id", requestId);

  await next();
}
