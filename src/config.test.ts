import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ValidationError } from './error/validationError.js';

const env = {
  DMART_URL: 'https://dmart.test',
  DMART_USERNAME: 'dmart',
  DMART_PASSWORD: 'test-secret',
};

describe('loadConfig', () => {
  it('reads the connection settings', async () => {
    const [err, config] = await loadConfig(env);

    expect(err).toBeNull();
    expect(config).toEqual({
      baseUrl: 'https://dmart.test',
      username: 'dmart',
      password: 'test-secret',
      timeout: false,
    });
  });

  it('parses the timeout', async () => {
    const [, config] = await loadConfig({ ...env, DMART_TIMEOUT_MS: '2500' });

    expect(config?.timeout).toBe(2500);
  });

  it('builds a logger for the given level', async () => {
    const [, config] = await loadConfig({ ...env, DMART_LOG_LEVEL: 'debug' });

    expect(config?.logLevel).toBe('debug');
    expect(config?.logger?.level).toBe('debug');
  });

  it('ignores unrelated variables', async () => {
    const [err, config] = await loadConfig({ ...env, HOME: '/root' });

    expect(err).toBeNull();
    expect(config).not.toHaveProperty('HOME');
  });

  it('reports missing and malformed values', async () => {
    const [err, config] = await loadConfig({ DMART_URL: 'not a url', DMART_TIMEOUT_MS: '-1' });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues.map((issue) => issue.path)).toEqual([
      ['DMART_URL'],
      ['DMART_USERNAME'],
      ['DMART_PASSWORD'],
      ['DMART_TIMEOUT_MS'],
    ]);
  });

  it('rejects unknown log levels', async () => {
    const [err] = await loadConfig({ ...env, DMART_LOG_LEVEL: 'loud' });

    expect(err?.issues[0]?.path).toEqual(['DMART_LOG_LEVEL']);
  });
});
