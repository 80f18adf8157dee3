import { describe, expect, it } from 'vitest';
import { createLogger, levelFromEnv } from './logger.js';

describe('levelFromEnv', () => {
  it('defaults to info', () => {
    expect(levelFromEnv({})).toBe('info');
  });

  it('turns on debug for any QIZX_DEBUG value', () => {
    expect(levelFromEnv({ QIZX_DEBUG: '' })).toBe('debug');
    expect(levelFromEnv({ QIZX_DEBUG: '1', LOG_LEVEL: 'error' })).toBe('debug');
  });

  it('reads LOG_LEVEL case-insensitively', () => {
    expect(levelFromEnv({ LOG_LEVEL: 'WARN' })).toBe('warn');
  });

  it('falls back to info on unknown levels', () => {
    expect(levelFromEnv({ LOG_LEVEL: 'verbose' })).toBe('info');
  });
});

describe('createLogger', () => {
  it('exposes the four logging methods', () => {
    const logger = createLogger('test', { level: 'silent' });

    expect(() => logger.debug('hidden')).not.toThrow();
    expect(() => logger.warn('hidden', { section: 'qizx' })).not.toThrow();
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.error).toBe('function');
  });
});
