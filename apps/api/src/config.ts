/**
 * API configuration
 *
 * Read once from the environment at start-up. Anything invalid stops the
 * process with the list of problems instead of failing on the first request.
 */

import { z } from 'zod';

export const API_VERSION = '0.1.0';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH cannot be empty').default('ledger.db'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type ApiConfig = {
  port: number;
  databasePath: string;
  logLevel: (typeof LOG_LEVELS)[number];
  nodeEnv: 'development' | 'test' | 'production';
};

export class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    port: result.data.PORT,
    databasePath: result.data.DATABASE_PATH,
    logLevel: result.data.LOG_LEVEL,
    nodeEnv: result.data.NODE_ENV,
  };
}
