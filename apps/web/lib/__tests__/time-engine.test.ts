import { describe, it, expect } from 'vitest';
import type { EntityData } from '@strata/shared';
import {
  ceilingToDecade,
  clampYear,
  computeDateRange,
  floorToDecade,
  isOutsideDateLimits,
  monthAndDayAsFractionOfYear,
  toFractionalYear,
} from '../time-engine';

const entity = (id: string, start: EntityData['start'], end?: EntityData['end']): EntityData => ({
  id,
  name: id,
  start,
  end,
});

describe('monthAndDayAsFractionOfYear', () => {
  it('treats a year-only date as 1 January', () => {
    expect(monthAndDayAsFractionOfYear({ year: 1990 })).toBe(0);
  });

  it('counts whole months in twelfths', () => {
    expect(monthAndDayAsFractionOfYear({ year: 1990, month: 7 })).toBe(0.5);
  });

  it('adds days over 365', () => {
    expect(monthAndDayAsFractionOfYear({ year: 1990, month: 6, day: 15 })).toBeCloseTo(5 / 12 + 14 / 365, 10);
  });

  it('adds the fraction to the year', () => {
    expect(toFractionalYear({ year: 1950, month: 7 })).toBe(1950.5);
  });
});

describe('decade rounding', () => {
  it('floors towards the past', () => {
    expect(floorToDecade(1955)).toBe(1950);
    expect(floorToDecade(1950)).toBe(1950);
    expect(floorToDecade(-151)).toBe(-160);
  });

  it('ceils towards the future', () => {
    expect(ceilingToDecade(1961)).toBe(1970);
    expect(ceilingToDecade(1970)).toBe(1970);
    expect(ceilingToDecade(-159)).toBe(-150);
  });

  it('clamps years outside the supported range', () => {
    expect(clampYear(99999)).toBe(10000);
    expect(clampYear(-99999)).toBe(-50000);
    expect(floorToDecade(-99999)).toBe(-50000);
    expect(ceilingToDecade(99999)).toBe(10000);
  });
});

describe('isOutsideDateLimits', () => {
  const limitStart = { year: 1900 };
  const limitEnd = { year: 2000 };

  it('keeps everything when no limits are set', () => {
    expect(isOutsideDateLimits(entity('a', { year: -500 }), null, null)).toBe(false);
  });

  it('hides entities starting before the start limit', () => {
    expect(isOutsideDateLimits(entity('a', { year: 1899 }, { year: 1950 }), limitStart, limitEnd)).toBe(true);
  });

  it('hides entities ending after the end limit', () => {
    expect(isOutsideDateLimits(entity('a', { year: 1950 }, { year: 2001 }), limitStart, limitEnd)).toBe(true);
  });

  it('hides open-ended entities only when they start after the end limit', () => {
    expect(isOutsideDateLimits(entity('a', { year: 1950 }), limitStart, limitEnd)).toBe(false);
    expect(isOutsideDateLimits(entity('a', { year: 2001 }), limitStart, limitEnd)).toBe(true);
  });

  it('compares month and day, not just year', () => {
    const start = { year: 1900, month: 6 };
    expect(isOutsideDateLimits(entity('a', { year: 1900, month: 5 }), start, null)).toBe(true);
    expect(isOutsideDateLimits(entity('a', { year: 1900, month: 6 }), start, null)).toBe(false);
  });
});

describe('computeDateRange', () => {
  it('returns zero decades when nothing is visible', () => {
    const range = computeDateRange([], null, null, 2024);
    expect(range.decadeCount).toBe(0);
    expect(range.decadeRangeStart).toBe(2020);
  });

  it('uses explicit end years for the latest year', () => {
    const range = computeDateRange(
      [entity('a', { year: 1950 }), entity('b', { year: 1955 }, { year: 1960 }), entity('c', { year: 1958 }, { year: 1965 })],
      null,
      null,
      2024
    );
    expect(range).toEqual({
      startDateCutoff: null,
      endDateCutoff: null,
      earliestYear: 1950,
      latestYear: 1965,
      decadeRangeStart: 1950,
      decadeRangeEnd: 1970,
      decadeCount: 2,
    });
  });

  it('falls back to the current year when no entity has an end', () => {
    const range = computeDateRange([entity('a', { year: 1995 })], null, null, 2024);
    expect(range.latestYear).toBe(2024);
    expect(range.decadeRangeEnd).toBe(2030);
    expect(range.decadeCount).toBe(4);
  });

  it('lets user limits override the automatic bounds', () => {
    const range = computeDateRange([entity('a', { year: 1950 }, { year: 1960 })], { year: 1801 }, { year: 2011 }, 2024);
    expect(range.decadeRangeStart).toBe(1800);
    expect(range.decadeRangeEnd).toBe(2020);
    expect(range.decadeCount).toBe(22);
    expect(range.earliestYear).toBe(1950);
  });

  it('always spans at least one decade', () => {
    const range = computeDateRange([entity('a', { year: 1950 }, { year: 1950 })], null, null, 2024);
    expect(range.decadeRangeStart).toBe(1950);
    expect(range.decadeRangeEnd).toBe(1960);
    expect(range.decadeCount).toBe(1);
  });

  it('handles years before zero', () => {
    const range = computeDateRange([entity('a', { year: -44 }, { year: -31 })], null, null, 2024);
    expect(range.decadeRangeStart).toBe(-50);
    expect(range.decadeRangeEnd).toBe(-30);
    expect(range.decadeCount).toBe(2);
  });
});
