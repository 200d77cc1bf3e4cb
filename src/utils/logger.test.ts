import { describe, expect, it } from 'vitest';
import { createLogger, createSilentLogger } from './logger.js';

describe('createLogger', () => {
  it('defaults to info', () => {
    expect(createLogger().level).toBe('info');
  });

  it('uses the given level', () => {
    const logger = createLogger('debug');

    expect(logger.level).toBe('debug');
    expect(logger.isDebugEnabled()).toBe(true);
  });
});

describe('createSilentLogger', () => {
  it('writes nothing', () => {
    const logger = createSilentLogger();

    expect(logger.silent).toBe(true);
    expect(logger.transports.every((transport) => transport.silent)).toBe(true);
  });
});
