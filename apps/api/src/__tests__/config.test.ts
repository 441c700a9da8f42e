import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      databasePath: 'ledger.db',
      logLevel: 'info',
      nodeEnv: 'development',
    });
  });

  it('reads values from the environment', () => {
    expect(
      loadConfig({
        PORT: '8080',
        DATABASE_PATH: '/var/lib/ledger/ledger.db',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'production',
      })
    ).toEqual({
      port: 8080,
      databasePath: '/var/lib/ledger/ledger.db',
      logLevel: 'debug',
      nodeEnv: 'production',
    });
  });

  it('lists every invalid setting', () => {
    let thrown: unknown;
    try {
      loadConfig({ PORT: '70000', LOG_LEVEL: 'loud' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    const message = thrown instanceof ConfigError ? thrown.message : '';
    expect(message.split('\n')[0]).toBe('Invalid configuration:');
    expect(message).toMatch(/^ {2}- PORT: /m);
    expect(message).toMatch(/^ {2}- LOG_LEVEL: /m);
  });
});
