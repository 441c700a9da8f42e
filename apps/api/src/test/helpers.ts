/**
 * HTTP test helpers for integration tests
 * Builds the app against a throwaway SQLite file and drives it through app.fetch
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createApp, type App } from '../app.js';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 *
 * @param path - Request path (e.g., '/v1/transactions')
 */
export async function makeRequest(
  app: { fetch: (request: Request) => Response | Promise<Response> },
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    // Strings (CSV bodies) go through untouched, everything else as JSON
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const request = new Request(`http://localhost${path}`, init);
  return app.fetch(request);
}

/**
 * Fixed clock used by test apps: 2024-03-15 noon UTC
 */
export const TEST_NOW = new Date('2024-03-15T12:00:00.000Z');

export interface TestApp {
  app: App;
  databasePath: string;
  cleanup: () => void;
}

export function createTestApp(now: () => Date = () => TEST_NOW): TestApp {
  const directory = mkdtempSync(join(tmpdir(), 'ledger-api-'));
  const databasePath = join(directory, 'ledger.db');

  return {
    app: createApp({ databasePath, now }),
    databasePath,
    cleanup: () => rmSync(directory, { recursive: true, force: true }),
  };
}

export const ErrorResponseSchema = z.object({
  error: z.string(),
  issues: z.array(z.string()).optional(),
});

/**
 * Parse a JSON response body against the schema it is expected to match
 */
export async function readJson<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}
