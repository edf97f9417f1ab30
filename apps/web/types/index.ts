/**
 * types/index.ts
 *
 * RENDERER-FACING SCHEMA
 * ------------------------------------------------------------------
 * Plain value records handed from the timeline engine to a frontend.
 * None of them carry behaviour, and none of them know which frontend
 * (canvas, SVG, native painter) consumes them.
 */
import type { EntityData, EntityId, TimelineDate } from '@strata/shared';

// --- Geometry ---

export interface Point {
  x: number;
  y: number;
}

export interface PositionAndSize {
  // Smallest x/y values: boxes grow down and to the right from here
  position: Point;
  width: number;
  height: number;
}

// --- Styling ---

export interface Colour {
  r: number; // 0-255
  g: number;
  b: number;
}

export interface LineStyle {
  colour: Colour;
  thickness: number;
}

export interface BoxStyle {
  fillColour: Colour;
  border: LineStyle | null;
}

export interface TimelineColours {
  background: { a: Colour; b: Colour }; // Alternates per century
  dividingLine: LineStyle;
  entity: {
    textBox: BoxStyle;
    dateBox: BoxStyle;
    textColour: Colour;
    highlightColour: Colour; // Border of selected entities
  };
  heading: {
    rect: BoxStyle;
    textColour: Colour;
  };
}

// --- Layout Parameters ---

/** Pixel measurements multiplied by the zoom level. */
export interface ScalableLayoutParams {
  rowMargin: number;
  minInlineSpacing: number;
  paddingX: number;
  paddingY: number;
  fontSizePx: number;
  dividingLineThickness: number;
  entityHighlightThickness: number;
}

/** Derived from the sizes reported by the text measurement function. */
export interface MeasuredLayoutParams {
  yearWidth: number;
  rowHeightNoPadding: number;
}

// --- Output Primitives ---

export interface TextOut {
  topLeft: Point;
  text: string;
  colour: Colour;
  fontSize: number;
}

export interface FilledBox {
  positionAndSize: PositionAndSize;
  fillColour: Colour;
  borderStyle: LineStyle | null;
}

export interface EntityOut {
  entity: EntityData;
  text: TextOut;
  textBox: FilledBox;
  dateBox: FilledBox;
  isHoveredOver: boolean;
  isSelected: boolean;
}

export interface Heading {
  text: TextOut;
  textBox: FilledBox;
}

export interface VerticalLine {
  x: number;
  style: LineStyle;
}

export interface Background {
  x: number;
  width: number;
  colour: Colour;
}

// --- Date Range ---

export interface TimelineDateRange {
  startDateCutoff: TimelineDate | null;
  endDateCutoff: TimelineDate | null;
  earliestYear: number;
  latestYear: number; // Ignores open-ended entities unless none have an end
  decadeRangeStart: number;
  decadeRangeEnd: number;
  decadeCount: number;
}

// --- Engine Boundary ---

export interface TextSize {
  width: number;
  height: number;
}

/** Must return the same size for the same inputs; results are cached per font size. */
export type MeasureTextFn = (fontSizePx: number, text: string) => TextSize;

/** Opaque predicate, typically a compiled boolean tag expression. */
export interface EntityFilter {
  matches: (entity: EntityData) => boolean;
}

export type TimelineInteractionEvent =
  | { type: 'single-click'; entityId: EntityId }
  | { type: 'double-click'; entityId: EntityId }
  | { type: 'triple-click'; entityId: EntityId }
  | { type: 'hover'; entityId: EntityId };
