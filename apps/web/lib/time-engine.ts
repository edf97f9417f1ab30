import { compareDates, type EntityData, MAX_YEAR, MIN_YEAR, type TimelineDate } from '@strata/shared';
import type { TimelineDateRange } from '../types';

/**
 * lib/time-engine.ts
 * Date arithmetic for the layout engine
 * ------------------------------------------------------------------
 * Sub-year offsets, decade rounding and the timeline's visible date range.
 */

const DAYS_PER_YEAR = 365;

/**
 * Fraction of the year elapsed at the start of the given month/day.
 * An unset month or day counts as 1, so a year-only date sits on 1 January.
 * e.g. 15 June ≈ 0.455
 */
export const monthAndDayAsFractionOfYear = (date: TimelineDate): number => {
  const month = (date.month ?? 1) - 1;
  const day = (date.day ?? 1) - 1;
  return month / 12 + day / DAYS_PER_YEAR;
};

/** Year plus its month/day fraction, e.g. 1 July 1950 → 1950.5 */
export const toFractionalYear = (date: TimelineDate): number =>
  date.year + monthAndDayAsFractionOfYear(date);

// Keep decade maths inside the supported range however far a cutoff or entity strays
const MIN_DECADE = Math.floor(MIN_YEAR / 10) * 10;
const MAX_DECADE = Math.ceil(MAX_YEAR / 10) * 10;

export const clampYear = (year: number): number => Math.min(MAX_YEAR, Math.max(MIN_YEAR, Math.trunc(year)));

/** Floors towards the past: 151 → 150, -151 → -160. */
export const floorToDecade = (year: number): number =>
  Math.max(MIN_DECADE, Math.floor(clampYear(year) / 10) * 10);

/** Ceils towards the future: 151 → 160, -159 → -150. */
export const ceilingToDecade = (year: number): number =>
  Math.min(MAX_DECADE, Math.ceil(clampYear(year) / 10) * 10);

/**
 * Whether user-set date limits hide an entity.
 * - Starts before the start cutoff → hidden.
 * - Ends after the end cutoff → hidden.
 * - Open-ended and starts after the end cutoff → hidden.
 */
export function isOutsideDateLimits(
  entity: EntityData,
  startCutoff: TimelineDate | null,
  endCutoff: TimelineDate | null
): boolean {
  if (startCutoff && compareDates(entity.start, startCutoff) < 0) {
    return true;
  }
  if (endCutoff) {
    if (entity.end) {
      return compareDates(entity.end, endCutoff) > 0;
    }
    return compareDates(entity.start, endCutoff) > 0;
  }
  return false;
}

export const emptyDateRange = (currentYear: number): TimelineDateRange => ({
  startDateCutoff: null,
  endDateCutoff: null,
  earliestYear: currentYear,
  latestYear: currentYear,
  decadeRangeStart: floorToDecade(currentYear),
  decadeRangeEnd: floorToDecade(currentYear),
  decadeCount: 0,
});

/**
 * Recomputes the date range from the visible entities only.
 *
 * `latestYear` only considers explicit end years and falls back to the
 * current year when none of the visible entities has one. User cutoffs
 * override the automatic bounds. A non-empty timeline always spans at
 * least one decade.
 */
export function computeDateRange(
  visibleEntities: readonly EntityData[],
  startCutoff: TimelineDate | null,
  endCutoff: TimelineDate | null,
  currentYear: number
): TimelineDateRange {
  if (visibleEntities.length === 0) {
    return { ...emptyDateRange(currentYear), startDateCutoff: startCutoff, endDateCutoff: endCutoff };
  }

  let earliestYear = Infinity;
  let latestYear = -Infinity;
  for (const entity of visibleEntities) {
    earliestYear = Math.min(earliestYear, entity.start.year);
    if (entity.end) {
      latestYear = Math.max(latestYear, entity.end.year);
    }
  }
  if (latestYear === -Infinity) {
    latestYear = currentYear;
  }

  const startYear = startCutoff ? startCutoff.year : earliestYear;
  const endYear = endCutoff ? endCutoff.year : latestYear;

  const decadeRangeStart = floorToDecade(startYear);
  const decadeRangeEnd = Math.min(MAX_DECADE, Math.max(ceilingToDecade(endYear), decadeRangeStart + 10));

  return {
    startDateCutoff: startCutoff,
    endDateCutoff: endCutoff,
    earliestYear,
    latestYear,
    decadeRangeStart,
    decadeRangeEnd,
    decadeCount: Math.max(0, (decadeRangeEnd - decadeRangeStart) / 10),
  };
}
