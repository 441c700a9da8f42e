/**
 * @ledger/observability
 *
 * Structured logging for the ledger API and tooling.
 */

export { REDACTION_PATHS, SERVICE_NAME, createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
