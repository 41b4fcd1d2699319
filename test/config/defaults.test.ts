import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/defaults';
import { ConfigError } from '../../src/shared/types';

describe('loadConfig', () => {
  it('parses a valid LOG_LEVEL', () => {
    const config = loadConfig({ LOG_LEVEL: 'debug' });
    expect(config.log_level).toBe('debug');
  });

  it('defaults LOG_LEVEL to info', () => {
    const config = loadConfig({});
    expect(config.log_level).toBe('info');
  });

  it('accepts silent', () => {
    expect(loadConfig({ LOG_LEVEL: 'silent' }).log_level).toBe('silent');
  });

  it('ignores unrelated variables', () => {
    const config = loadConfig({ LOG_LEVEL: 'warn', HOME: '/home/test' });
    expect(config).toEqual({ log_level: 'warn' });
  });

  it('throws ConfigError for an invalid LOG_LEVEL', () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'TAGCATALOG_E301',
      severity: 'critical',
      message: 'Missing or invalid environment variables: LOG_LEVEL',
    });
  });
});
