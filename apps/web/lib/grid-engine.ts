import type {
  Background,
  Heading,
  MeasuredLayoutParams,
  ScalableLayoutParams,
  TimelineColours,
  TimelineDateRange,
  VerticalLine,
} from '../types';
import { lightenedColour } from './colours';
import {
  DATETIME_SCALE_THRESHOLD_SHOW_FULL_YEARS,
  DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_FULL,
  DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_PARTIAL,
  DATETIME_SCALE_THRESHOLD_SHOW_YEARS,
} from './constants';

/**
 * lib/grid-engine.ts
 * Decade & Year Scaffolding
 * ------------------------------------------------------------------
 * Builds everything that is aligned to the time axis but not to an entity:
 * header bands, vertical dividing lines and the century background stripes.
 *
 * Output is in unpanned space. Only the x offset is ever applied to it,
 * headers stay pinned to the top of the canvas.
 */

export interface GridContext {
  dateRange: TimelineDateRange;
  measured: MeasuredLayoutParams;
  zoomed: ScalableLayoutParams;
  datetimeScale: number;
  colours: TimelineColours;
  measureWidth: (text: string) => number;
}

export const decadeWidth = (measured: MeasuredLayoutParams): number => measured.yearWidth * 10;

/** Height of one header band; the same as an entity box. */
export const headerHeight = (measured: MeasuredLayoutParams, zoomed: ScalableLayoutParams): number =>
  measured.rowHeightNoPadding + 2 * zoomed.paddingY;

export const showsYearHeadings = (datetimeScale: number): boolean =>
  datetimeScale > DATETIME_SCALE_THRESHOLD_SHOW_YEARS;

/**
 * '95 below the full-year threshold, 1995 from it. Years before 0 keep
 * their sign only in the four-digit form.
 */
export function yearLabel(year: number, datetimeScale: number): string {
  if (datetimeScale < DATETIME_SCALE_THRESHOLD_SHOW_FULL_YEARS) {
    return `'${String(Math.abs(year) % 100).padStart(2, '0')}`;
  }
  return `${year}`;
}

export function buildHeadings(ctx: GridContext): Heading[] {
  const { dateRange, measured, zoomed, datetimeScale, colours, measureWidth } = ctx;
  const width = decadeWidth(measured);
  const yearWidth = width / 10;
  const height = headerHeight(measured, zoomed);
  const headings: Heading[] = [];

  const heading = (text: string, x: number, y: number, boxWidth: number): Heading => ({
    text: {
      topLeft: { x: x + (boxWidth - measureWidth(text)) / 2, y: y + zoomed.paddingY },
      text,
      colour: colours.heading.textColour,
      fontSize: zoomed.fontSizePx,
    },
    textBox: {
      positionAndSize: { position: { x, y }, width: boxWidth, height },
      fillColour: colours.heading.rect.fillColour,
      borderStyle: colours.heading.rect.border,
    },
  });

  for (let n = 0; n < dateRange.decadeCount; n++) {
    const decade = dateRange.decadeRangeStart + n * 10;
    const x = n * width;
    headings.push(heading(`${decade}s`, x, 0, width));

    if (showsYearHeadings(datetimeScale)) {
      for (let year = 0; year < 10; year++) {
        headings.push(heading(yearLabel(decade + year, datetimeScale), x + year * yearWidth, height, yearWidth));
      }
    }
  }

  return headings;
}

/**
 * Extra lightening steps for year lines while they fade in: none at or above
 * the full threshold, one per half step of scale below it.
 */
export const yearLineFadeSteps = (datetimeScale: number): number =>
  datetimeScale < DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_FULL
    ? Math.round((DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_FULL - datetimeScale) / 0.5)
    : 0;

export function buildLines(ctx: GridContext): VerticalLine[] {
  const { dateRange, measured, zoomed, datetimeScale, colours } = ctx;
  const width = decadeWidth(measured);
  const thickness = zoomed.dividingLineThickness;
  const showYearLines = datetimeScale > DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_PARTIAL;

  let yearColour = lightenedColour(lightenedColour(colours.dividingLine.colour));
  for (let i = 0; i < yearLineFadeSteps(datetimeScale); i++) {
    yearColour = lightenedColour(yearColour);
  }

  const lines: VerticalLine[] = [];
  if (dateRange.decadeCount === 0) return lines;

  for (let n = 0; n <= dateRange.decadeCount; n++) {
    const x = n * width;
    lines.push({ x, style: { colour: colours.dividingLine.colour, thickness } });

    // The closing decade line has no years after it
    if (showYearLines && n !== dateRange.decadeCount) {
      for (let year = 1; year < 10; year++) {
        lines.push({ x: x + (year * width) / 10, style: { colour: yearColour, thickness } });
      }
    }
  }
  return lines;
}

/** Alternates per century: the 2000s-2090s use `a`, the 1900s-1990s use `b`. */
export function buildBackgrounds(ctx: GridContext): Background[] {
  const { dateRange, measured, colours } = ctx;
  const width = decadeWidth(measured);
  const backgrounds: Background[] = [];

  for (let n = 0; n < dateRange.decadeCount; n++) {
    const decade = dateRange.decadeRangeStart + n * 10;
    const colour = Math.trunc(decade / 100) % 2 === 0 ? colours.background.a : colours.background.b;
    backgrounds.push({ x: n * width, width, colour });
  }
  return backgrounds;
}
