import type { LedgerServices } from '@ledger/core';
import type { Logger } from '@ledger/observability';

/**
 * Shared Hono context variables for API requests.
 * `services` wraps a database handle that lives only for the current request.
 */
export type ContextVariables = {
  requestId: string;
  logger: Logger;
  services: LedgerServices;
  now: () => Date;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
