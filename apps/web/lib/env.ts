/**
 * lib/env.ts
 * Web App Feature Flags
 * ------------------------------------------------------------------
 * Log level detection lives in @strata/shared so the data layer and the
 * API routes agree on it. This file holds what only the web app cares about.
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

const parseFlag = (value: string | null | undefined): boolean | null => {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return null;
};

/**
 * Whether to render the debug HUD over the timeline.
 */
export function isDebugHudEnabled(overrideValue?: string | null): boolean {
  // 1. Explicit Override (e.g. ?debug=1 in the URL)
  const override = parseFlag(overrideValue);
  if (override !== null) return override;

  // 2. Environment Variable Override
  // NEXT_PUBLIC_ prefix makes it available on both client & server.
  const fromEnv = parseFlag(process.env.NEXT_PUBLIC_DEBUG_HUD);
  if (fromEnv !== null) return fromEnv;

  // 3. NODE_ENV Fallback
  return process.env.NODE_ENV === 'development';
}

/**
 * Extra tag colours, e.g. `NEXT_PUBLIC_TAG_COLOURS="war=#cc3333,book=#aa3034"`.
 * They take priority over the built-in ones.
 */
export function getTagColourConfig(overrideValue?: string | null): string | undefined {
  if (overrideValue) return overrideValue;
  return process.env.NEXT_PUBLIC_TAG_COLOURS || undefined;
}
