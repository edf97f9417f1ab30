import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getLogLevel } from '../env';
import { createLogger } from '../logger';

describe('getLogLevel', () => {
  beforeEach(() => {
    vi.stubEnv('NEXT_PUBLIC_LOG_LEVEL', '');
    vi.stubEnv('NODE_ENV', 'test');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prioritizes override value', () => {
    expect(getLogLevel('debug')).toBe('debug');
    expect(getLogLevel('error')).toBe('error');
  });

  it('ignores invalid override values', () => {
    expect(getLogLevel('verbose')).toBe('warn');
  });

  it('prioritizes NEXT_PUBLIC_LOG_LEVEL env var', () => {
    vi.stubEnv('NEXT_PUBLIC_LOG_LEVEL', 'info');
    expect(getLogLevel()).toBe('info');
  });

  it('falls back to debug when NODE_ENV is development', () => {
    vi.stubEnv('NODE_ENV', 'development');
    expect(getLogLevel()).toBe('debug');
  });

  it('falls back to info when NODE_ENV is production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    expect(getLogLevel()).toBe('info');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    createLogger('Engine', 'debug').info('ready', { count: 2 });
    expect(infoSpy).toHaveBeenCalledWith('[Engine]', 'ready', { count: 2 });
  });

  it('drops messages below the threshold', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('Engine', 'warn');

    log.debug('noisy');
    log.warn('careful');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[Engine]', 'careful');
  });
});
