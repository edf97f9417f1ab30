import { describe, it, expect } from 'vitest';
import {
  compareDates,
  formatDateRange,
  formatLongDate,
  formatShortDate,
  fromJsDate,
  getMonthName,
} from '../dates';

describe('Timeline Dates', () => {

  describe('compareDates', () => {
    it('orders by year first', () => {
      expect(compareDates({ year: 234 }, { year: 4321 })).toBeLessThan(0);
      expect(compareDates({ year: 4321 }, { year: 234 })).toBeGreaterThan(0);
    });

    it('treats unset month and day as the first of January', () => {
      expect(compareDates({ year: 1950 }, { year: 1950, month: 1, day: 1 })).toBe(0);
      expect(compareDates({ year: 1950 }, { year: 1950, month: 1, day: 2 })).toBeLessThan(0);
    });

    it('differs by a single day', () => {
      expect(compareDates({ year: 2000, month: 6, day: 2 }, { year: 2000, month: 6, day: 1 })).toBe(1);
    });

    it('handles BC years', () => {
      expect(compareDates({ year: -44, month: 3, day: 15 }, { year: 1 })).toBeLessThan(0);
    });
  });

  describe('formatting', () => {
    it('shows only the fields that were set (long)', () => {
      expect(formatLongDate({ year: 1066 })).toBe('1066');
      expect(formatLongDate({ year: 1990, month: 3 })).toBe('Mar 1990');
      expect(formatLongDate({ year: 2025, month: 1, day: 1 })).toBe('1 Jan 2025');
    });

    it('uses dashes for unset fields (short)', () => {
      expect(formatShortDate({ year: 1066 })).toBe('- / - / 1066');
      expect(formatShortDate({ year: 2025, month: 12, day: 24 })).toBe('24 / 12 / 2025');
    });

    it('formats open and closed ranges', () => {
      expect(formatDateRange({ year: 1955 }, { year: 1960, month: 7 })).toBe('1955 – Jul 1960');
      expect(formatDateRange({ year: 1955 })).toBe('1955 –');
    });

    it('returns an empty month name for out-of-range indices', () => {
      expect(getMonthName(12)).toBe('Dec');
      expect(getMonthName(13)).toBe('');
    });
  });

  it('converts JS dates using local calendar fields', () => {
    expect(fromJsDate(new Date(2024, 1, 29))).toEqual({ year: 2024, month: 2, day: 29 });
  });
});
