export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string | null | undefined): value is LogLevel =>
  !!value && LOG_LEVELS.includes(value);

/**
 * Shared Log Level Detection
 * ------------------------------------------------------------------
 * Unifies how the web app, its API routes and the tests decide how chatty to be.
 */
export function getLogLevel(overrideValue?: string | null): LogLevel {
  // 1. Explicit Override (e.g. passed by a test or a debug toggle)
  if (isLogLevel(overrideValue)) {
    return overrideValue;
  }

  // 2. Environment Variable Override
  // NEXT_PUBLIC_ prefix makes it available on both client & server.
  const envLevel = typeof process !== 'undefined' ? process.env?.NEXT_PUBLIC_LOG_LEVEL : undefined;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  // 3. NODE_ENV Fallback
  const nodeEnv = typeof process !== 'undefined' ? process.env?.NODE_ENV : 'production';
  if (nodeEnv === 'development') return 'debug';
  if (nodeEnv === 'test') return 'warn';
  return 'info';
}
