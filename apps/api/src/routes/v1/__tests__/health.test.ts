import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createTestApp, makeRequest, readJson, type TestApp } from '../../../test/helpers.js';

const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
  version: z.string(),
});

describe('GET /health', () => {
  let testApp: TestApp | undefined;

  afterEach(() => {
    testApp?.cleanup();
  });

  it('reports ok with the API version', async () => {
    testApp = createTestApp();

    const response = await makeRequest(testApp.app, 'GET', '/health');

    expect(response.status).toBe(200);
    const body = await readJson(response, HealthResponseSchema);
    expect(body.status).toBe('ok');
    expect(body.version).toBe('0.1.0');
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });
});
