import pino from 'pino';

/**
 * Header and field paths never written to the log.
 * The ledger itself holds no credentials, but requests pass through
 * browsers and proxies that attach them.
 */
export const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  'password',
  'secret',
];

export const SERVICE_NAME = 'ledger';

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default "info")
 * - ISO 8601 timestamps
 * - Standard req/res/err serializers
 * - Every line tagged with the service name
 *
 * @param destination - Where to write lines; stdout when omitted
 */
export function createLogger(
  options: pino.LoggerOptions = {},
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: SERVICE_NAME },
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
