import type { EntityData, TimelineDate } from '@strata/shared';
import type {
  BoxStyle,
  FilledBox,
  MeasuredLayoutParams,
  Point,
  PositionAndSize,
  ScalableLayoutParams,
  TextOut,
  TimelineColours,
} from '../types';
import { monthAndDayAsFractionOfYear, toFractionalYear } from './time-engine';

/**
 * lib/layout-engine.ts
 * Row Packing & Position Solver
 * ------------------------------------------------------------------
 * Places every visible entity on a horizontal time axis and stacks them
 * into as few rows as a greedy left-to-right sweep allows.
 *
 * PIPELINE (run in this order on every recompute):
 * 1. Widths: text box from the measured label, date box from the lifespan.
 * 2. X: offset in years from the first decade, times the year width.
 * 3. Rows: greedy interval partitioning over the start-sorted list.
 * 4. Y: one row height per row, row 0 just under the header band.
 *
 * Everything here lives in unpanned logical space. The pan offset is only
 * applied when the engine hands primitives to a frontend.
 */

export interface TextWorking extends TextOut {
  width: number;
}

export interface WorkingEntity {
  entity: EntityData;

  // Layout dates: `end` is "today" for open-ended entities
  start: TimelineDate;
  end: TimelineDate;

  text: TextWorking;
  textBox: FilledBox;
  dateBox: FilledBox;

  // Only meaningful after packing, and only for visible entities
  row: number;

  filteredByDateRange: boolean;
  filteredByTagExpr: boolean;

  // Presentation only, never read by the layout passes
  isHoveredOver: boolean;
  isSelected: boolean;
}

export interface EntityLayoutContext {
  decadeRangeStart: number;
  measured: MeasuredLayoutParams;
  zoomed: ScalableLayoutParams;
}

const emptyBox = (style: BoxStyle): FilledBox => ({
  positionAndSize: { position: { x: 0, y: 0 }, width: 0, height: 0 },
  fillColour: style.fillColour,
  borderStyle: style.border,
});

export function createWorkingEntity(entity: EntityData, today: TimelineDate, colours: TimelineColours): WorkingEntity {
  return {
    entity,
    start: entity.start,
    end: entity.end ?? today,
    text: { topLeft: { x: 0, y: 0 }, text: entity.name, width: 0, colour: colours.entity.textColour, fontSize: 0 },
    textBox: emptyBox(colours.entity.textBox),
    dateBox: emptyBox(colours.entity.dateBox),
    row: 0,
    filteredByDateRange: false,
    filteredByTagExpr: false,
    isHoveredOver: false,
    isSelected: false,
  };
}

export const isFilteredOut = (entity: WorkingEntity): boolean =>
  entity.filteredByDateRange || entity.filteredByTagExpr;

export const boxMaxX = (box: PositionAndSize): number => box.position.x + box.width;
export const boxMaxY = (box: PositionAndSize): number => box.position.y + box.height;

export const entityMinX = (entity: WorkingEntity): number => entity.textBox.positionAndSize.position.x;

export const entityMaxX = (entity: WorkingEntity): number =>
  Math.max(boxMaxX(entity.textBox.positionAndSize), boxMaxX(entity.dateBox.positionAndSize));

export const entityMaxY = (entity: WorkingEntity): number =>
  Math.max(boxMaxY(entity.textBox.positionAndSize), boxMaxY(entity.dateBox.positionAndSize));

/**
 * Rounds half away from zero to one decimal place. Comparing rounded values
 * keeps adjacent entities from flip-flopping between rows across frames.
 */
export const roundToNearestTenth = (value: number): number =>
  (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;

/**
 * Refreshes the size-dependent fields after a font size, zoom or padding change.
 */
export function updateEntityMeasurements(
  entity: WorkingEntity,
  textWidth: number,
  measured: MeasuredLayoutParams,
  zoomed: ScalableLayoutParams
): void {
  const boxHeight = measured.rowHeightNoPadding + 2 * zoomed.paddingY;

  entity.text.width = textWidth;
  entity.text.fontSize = zoomed.fontSizePx;

  entity.textBox.positionAndSize.width = textWidth + 2 * zoomed.paddingX;
  entity.textBox.positionAndSize.height = boxHeight;
  entity.dateBox.positionAndSize.height = boxHeight;
}

/**
 * Steps 1 & 2: widths and x positions. Filtered entities are laid out too
 * (it is cheap) but are ignored by packing and output.
 */
export function calculateHorizontalPositions(entities: WorkingEntity[], ctx: EntityLayoutContext): void {
  const { decadeRangeStart, measured, zoomed } = ctx;

  for (const entity of entities) {
    const startYears = entity.start.year - decadeRangeStart + monthAndDayAsFractionOfYear(entity.start);
    // An open-ended entity that starts after "today" collapses to a point
    const lifespanYears = Math.max(0, toFractionalYear(entity.end) - toFractionalYear(entity.start));

    const x = startYears * measured.yearWidth;

    entity.dateBox.positionAndSize.width = lifespanYears * measured.yearWidth;
    entity.textBox.positionAndSize.width = entity.text.width + 2 * zoomed.paddingX;

    // Both boxes share a left edge; the label sits inside the padding
    entity.textBox.positionAndSize.position.x = x;
    entity.dateBox.positionAndSize.position.x = x;
    entity.text.topLeft.x = x + zoomed.paddingX;
  }
}

/**
 * Step 3: greedy interval partitioning.
 *
 * `entities` must already be sorted by start date. Each visible entity takes
 * the first row whose right edge (plus the inline spacing) is strictly left of
 * the entity's left edge, or opens a new row. Returns the number of rows used.
 */
export function packRows(entities: WorkingEntity[], minInlineSpacing: number): number {
  const rowRightEdges: number[] = [];

  for (const entity of entities) {
    if (isFilteredOut(entity)) continue;

    const entityMin = roundToNearestTenth(entityMinX(entity));
    let row = rowRightEdges.findIndex((edge) => roundToNearestTenth(edge + minInlineSpacing) < entityMin);

    if (row === -1) {
      row = rowRightEdges.length;
      rowRightEdges.push(entityMaxX(entity));
    } else {
      rowRightEdges[row] = entityMaxX(entity);
    }
    entity.row = row;
  }

  return rowRightEdges.length;
}

/** Height of one row including its margin, i.e. the vertical pitch between rows. */
export const rowPitch = (measured: MeasuredLayoutParams, zoomed: ScalableLayoutParams): number =>
  measured.rowHeightNoPadding + zoomed.rowMargin + 2 * zoomed.paddingY;

/**
 * Step 4: y positions from row numbers. Row 0 sits one pitch down, leaving
 * room for the decade header band.
 */
export function calculateVerticalPositions(entities: WorkingEntity[], ctx: EntityLayoutContext): void {
  const pitch = rowPitch(ctx.measured, ctx.zoomed);

  for (const entity of entities) {
    const y = pitch * (entity.row + 1);
    entity.textBox.positionAndSize.position.y = y;
    entity.dateBox.positionAndSize.position.y = y;
    entity.text.topLeft.y = y + ctx.zoomed.paddingY;
  }
}

/** Runs steps 1-4. Returns the row count. */
export function layoutEntities(entities: WorkingEntity[], ctx: EntityLayoutContext): number {
  calculateHorizontalPositions(entities, ctx);
  const rowCount = packRows(entities, ctx.zoomed.minInlineSpacing);
  calculateVerticalPositions(entities, ctx);
  return rowCount;
}

// --- Output Helpers ---

/**
 * AABB test against the canvas rectangle. The primitive's own height is
 * used as a vertical margin so rows just off the top or bottom still draw.
 */
export function isVisible(min: Point, max: Point, canvasSize: Point): boolean {
  const height = max.y - min.y;
  if (min.x > canvasSize.x) return false;
  if (max.x < 0) return false;
  if (min.y - height > canvasSize.y) return false;
  if (max.y + height < 0) return false;
  return true;
}

/**
 * Keeps a label on screen while its box is partly scrolled off the left edge,
 * for as long as the box has room for it. Operates on already-panned values.
 */
export function stickyTextX(
  textX: number,
  textWidth: number,
  boxWidth: number,
  paddingX: number
): number {
  const freeSpace = boxWidth - textWidth - 2 * paddingX;
  if (textX >= paddingX) return textX;
  if (textX < -(freeSpace - paddingX)) return textX + freeSpace;
  return paddingX;
}
