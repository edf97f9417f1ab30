import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getTagColourConfig, isDebugHudEnabled } from '../env';

describe('isDebugHudEnabled', () => {
  beforeEach(() => {
    vi.stubEnv('NEXT_PUBLIC_DEBUG_HUD', '');
    vi.stubEnv('NODE_ENV', 'test');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prioritizes override value', () => {
    vi.stubEnv('NEXT_PUBLIC_DEBUG_HUD', 'false');
    expect(isDebugHudEnabled('1')).toBe(true);
    expect(isDebugHudEnabled('off')).toBe(false);
  });

  it('ignores unrecognised override values', () => {
    vi.stubEnv('NEXT_PUBLIC_DEBUG_HUD', 'true');
    expect(isDebugHudEnabled('maybe')).toBe(true);
  });

  it('reads NEXT_PUBLIC_DEBUG_HUD', () => {
    vi.stubEnv('NEXT_PUBLIC_DEBUG_HUD', ' Yes ');
    expect(isDebugHudEnabled()).toBe(true);
  });

  it('falls back to on in development', () => {
    vi.stubEnv('NODE_ENV', 'development');
    expect(isDebugHudEnabled()).toBe(true);
  });

  it('falls back to off otherwise', () => {
    vi.stubEnv('NODE_ENV', 'production');
    expect(isDebugHudEnabled()).toBe(false);
  });
});

describe('getTagColourConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers the override', () => {
    vi.stubEnv('NEXT_PUBLIC_TAG_COLOURS', 'war=#cc3333');
    expect(getTagColourConfig('book=#aa3034')).toBe('book=#aa3034');
  });

  it('reads NEXT_PUBLIC_TAG_COLOURS', () => {
    vi.stubEnv('NEXT_PUBLIC_TAG_COLOURS', 'war=#cc3333');
    expect(getTagColourConfig()).toBe('war=#cc3333');
  });

  it('is undefined when unset', () => {
    vi.stubEnv('NEXT_PUBLIC_TAG_COLOURS', '');
    expect(getTagColourConfig()).toBeUndefined();
  });
});
