import type { TimelineDate } from './types';

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Returns the short English name for a month index.
 * @param month 1-based index (1 = Jan, 12 = Dec)
 */
export const getMonthName = (month: number): string => MONTH_NAMES[month - 1] ?? '';

/**
 * Total ordering over timeline dates.
 * An unset month or day compares as if it were 1, so "1950" sorts with "1 Jan 1950".
 */
export const compareDates = (a: TimelineDate, b: TimelineDate): number => {
  if (a.year !== b.year) return a.year - b.year;
  const monthDiff = (a.month ?? 1) - (b.month ?? 1);
  if (monthDiff !== 0) return monthDiff;
  return (a.day ?? 1) - (b.day ?? 1);
};

/**
 * e.g. "1 Jan 2025", "Mar 1990" or "1066".
 * Only the fields that were actually set are shown.
 */
export const formatLongDate = (date: TimelineDate): string => {
  const day = date.day !== undefined ? `${date.day}` : '';
  const month = date.month !== undefined ? getMonthName(date.month) : '';
  return [day, month, `${date.year}`].filter(Boolean).join(' ');
};

/**
 * dd / mm / yyyy, with "-" standing in for unset fields.
 */
export const formatShortDate = (date: TimelineDate): string => {
  const day = date.day !== undefined ? `${date.day}` : '-';
  const month = date.month !== undefined ? `${date.month}` : '-';
  return `${day} / ${month} / ${date.year}`;
};

/**
 * Generates the date range string for an entity label or tooltip.
 */
export const formatDateRange = (start: TimelineDate, end?: TimelineDate): string => {
  if (end) {
    return `${formatLongDate(start)} – ${formatLongDate(end)}`;
  }
  return `${formatLongDate(start)} –`;
};

/** Converts a JS Date (local time) to a fully specified timeline date. */
export const fromJsDate = (date: Date): TimelineDate => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1,
  day: date.getDate(),
});
