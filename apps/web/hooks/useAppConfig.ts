import { useMemo } from 'react';
import { getLogLevel } from '@strata/shared';
import { isDebugHudEnabled } from '../lib/env';

/**
 * Hook: Application Configuration
 * Centralizes logic for environment variables.
 */
export function useAppConfig(debugOverride: string | null = null) {
  const showDebugHud = useMemo(() => isDebugHudEnabled(debugOverride), [debugOverride]);
  const logLevel = useMemo(() => getLogLevel(), []);

  return {
    showDebugHud,
    logLevel,
    isDebugMode: process.env.NODE_ENV === 'development',
  };
}
