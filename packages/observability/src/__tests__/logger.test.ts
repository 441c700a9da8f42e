/**
 * Tests for the ledger logger
 * Verifies output format, level handling and redaction
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '../logger.js';

function captureLogs() {
  const lines: string[] = [];
  const stream = {
    write: (line: string) => {
      lines.push(line);
    },
  };
  return {
    stream,
    entries: () => lines.map((line) => JSON.parse(line)),
  };
}

describe('createLogger', () => {
  it('writes JSON lines tagged with the service name', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'info' }, stream);

    logger.info({ transactionId: 12 }, 'Transaction created');

    const [entry] = entries();
    expect(entry.msg).toBe('Transaction created');
    expect(entry.transactionId).toBe(12);
    expect(entry.service).toBe('ledger');
    expect(entry.level).toBe(30);
  });

  it('formats timestamps as ISO 8601', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'info' }, stream);

    logger.info('test');

    expect(entries()[0].time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('drops lines below the configured level', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'warn' }, stream);

    logger.info('ignored');
    logger.warn('kept');

    expect(entries().map((entry) => entry.msg)).toEqual(['kept']);
  });

  it('redacts cookie and authorization headers', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'info' }, stream);

    logger.info({
      headers: {
        authorization: 'Bearer test-secret',
        cookie: 'session=test-secret',
        'user-agent': 'curl/8.0',
      },
    });

    const [entry] = entries();
    expect(entry.headers).toEqual({
      authorization: '[REDACTED]',
      cookie: '[REDACTED]',
      'user-agent': 'curl/8.0',
    });
  });

  it('serializes errors with message and stack', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'info' }, stream);

    logger.error({ err: new Error('disk full') }, 'Storage failure');

    const [entry] = entries();
    expect(entry.err.type).toBe('Error');
    expect(entry.err.message).toBe('disk full');
    expect(typeof entry.err.stack).toBe('string');
  });

  it('carries bindings into child loggers', () => {
    const { stream, entries } = captureLogs();
    const logger = createLogger({ level: 'info' }, stream);

    logger.child({ requestId: 'req-1' }).info('handled');

    expect(entries()[0].requestId).toBe('req-1');
  });
});
