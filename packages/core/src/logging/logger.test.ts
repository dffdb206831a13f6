import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('is silent by default', () => {
    vi.stubEnv('LAYERED_HTTP_LOG_LEVEL', undefined);
    expect(createLogger().level).toBe('silent');
  });

  it('reads the level from the environment', () => {
    vi.stubEnv('LAYERED_HTTP_LOG_LEVEL', 'warn');
    expect(createLogger().level).toBe('warn');
  });

  it('prefers an explicit level', () => {
    vi.stubEnv('LAYERED_HTTP_LOG_LEVEL', 'warn');
    expect(createLogger({ level: 'debug' }).level).toBe('debug');
  });
});
