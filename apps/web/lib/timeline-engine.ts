import { compareDates, createLogger, type EntityData, type EntityId, fromJsDate, type Logger, type TimelineDate } from '@strata/shared';
import type {
  Background,
  EntityFilter,
  EntityOut,
  FilledBox,
  Heading,
  MeasuredLayoutParams,
  MeasureTextFn,
  Point,
  ScalableLayoutParams,
  TextSize,
  TimelineColours,
  TimelineDateRange,
  TimelineInteractionEvent,
  VerticalLine,
} from '../types';
import { DEFAULT_TIMELINE_COLOURS, lightenedColour, type TagColours, tagColourFor } from './colours';
import {
  DECADE_WIDTH_PROBE_TEXT,
  DEFAULT_LAYOUT_PARAMS,
  MAX_DATETIME_SCALE,
  MAX_ZOOM,
  MIN_DATETIME_SCALE,
  MIN_ZOOM,
  ROW_HEIGHT_PROBE_TEXT,
} from './constants';
import { buildBackgrounds, buildHeadings, buildLines, type GridContext, headerHeight, showsYearHeadings } from './grid-engine';
import {
  boxMaxX,
  boxMaxY,
  createWorkingEntity,
  type EntityLayoutContext,
  entityMaxX,
  entityMaxY,
  isFilteredOut,
  isVisible,
  layoutEntities,
  stickyTextX,
  updateEntityMeasurements,
  type WorkingEntity,
} from './layout-engine';
import { computeDateRange, emptyDateRange, isOutsideDateLimits } from './time-engine';

/**
 * lib/timeline-engine.ts
 * Timeline Layout Orchestrator
 * ------------------------------------------------------------------
 * Owns the working entities, filters, zoom, pan and canvas size, and turns
 * them into plain drawing records for whichever frontend is attached.
 *
 * CONTRACT:
 * - Every mutator ends in a consistent state: filters → date range →
 *   measurements → packing → positions → grid → offset clamp.
 * - `*ForDrawing()` queries only read. Call them as often as you like.
 * - Interaction events are queued, never dispatched. Poll with
 *   `drainInteractionEvents()` once per frame.
 * - No method throws. Degenerate input yields empty output.
 */

export interface TimelineEngineOptions {
  measureText: MeasureTextFn;
  /** Where open-ended entities end. Defaults to the system clock. */
  today?: () => TimelineDate;
  layoutParams?: Partial<ScalableLayoutParams>;
  colours?: TimelineColours;
  tagColours?: TagColours;
  logger?: Logger;
}

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

// Factors at or below 1 would move zoom the wrong way past the opposite bound
const isZoomFactor = (factor: number): boolean => Number.isFinite(factor) && factor > 1;

const byStartThenId = (a: WorkingEntity, b: WorkingEntity): number => {
  const byStart = compareDates(a.start, b.start);
  if (byStart !== 0) return byStart;
  if (a.entity.id === b.entity.id) return 0;
  return a.entity.id < b.entity.id ? -1 : 1;
};

const withOffset = (box: FilledBox, dx: number, dy: number): FilledBox => ({
  ...box,
  positionAndSize: {
    ...box.positionAndSize,
    position: { x: box.positionAndSize.position.x + dx, y: box.positionAndSize.position.y + dy },
  },
});

export const deriveZoomedLayoutParams = (fixed: ScalableLayoutParams, zoom: number): ScalableLayoutParams => ({
  rowMargin: fixed.rowMargin * zoom,
  minInlineSpacing: fixed.minInlineSpacing * zoom,
  paddingX: fixed.paddingX * zoom,
  paddingY: fixed.paddingY * zoom,
  fontSizePx: fixed.fontSizePx * zoom,
  dividingLineThickness: fixed.dividingLineThickness * zoom,
  entityHighlightThickness: fixed.entityHighlightThickness * zoom,
});

export class TimelineEngine {
  private readonly measureText: MeasureTextFn;
  private readonly today: () => TimelineDate;
  private readonly log: Logger;

  private workingEntities: WorkingEntity[] = [];
  private entityFilter: EntityFilter | null = null;
  private startDateCutoff: TimelineDate | null = null;
  private endDateCutoff: TimelineDate | null = null;
  private range: TimelineDateRange;
  private rows = 0;

  private timelineColours: TimelineColours;
  private tagColours: TagColours;
  private stickyText = true;

  private zoomLevel = 1;
  private scale = MIN_DATETIME_SCALE;
  private fixedLayoutParams: ScalableLayoutParams;
  private zoomedLayoutParams: ScalableLayoutParams;
  private measuredLayoutParams: MeasuredLayoutParams = { yearWidth: 0, rowHeightNoPadding: 0 };

  private globalOffset: Point = { x: 0, y: 0 };
  private canvasSize: Point = { x: 0, y: 0 };

  // Unpanned grid, rebuilt on every recompute
  private headings: Heading[] = [];
  private lines: VerticalLine[] = [];
  private backgrounds: Background[] = [];

  private interactionEvents: TimelineInteractionEvent[] = [];

  // Keyed by text; only valid for `measureCacheFontSize`
  private measureCache = new Map<string, TextSize>();
  private measureCacheFontSize = 0;

  constructor(options: TimelineEngineOptions) {
    this.measureText = options.measureText;
    this.today = options.today ?? (() => fromJsDate(new Date()));
    this.log = options.logger ?? createLogger('TimelineEngine');
    this.timelineColours = options.colours ?? DEFAULT_TIMELINE_COLOURS;
    this.tagColours = options.tagColours ?? [];
    this.fixedLayoutParams = { ...DEFAULT_LAYOUT_PARAMS, ...options.layoutParams };
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.range = emptyDateRange(this.today().year);
    this.recalculate();
  }

  // --- Entities ---

  /** Replaces the whole entity list. */
  public setEntities(entities: readonly EntityData[]): void {
    this.log.debug('set entities', { count: entities.length });
    this.workingEntities = [];
    this.insertEntities(entities);
    this.recalculate();
  }

  /** Adds entities, skipping any whose id is already on the timeline. */
  public addEntities(entities: readonly EntityData[]): void {
    this.log.debug('add entities', { count: entities.length });
    this.insertEntities(entities);
    this.recalculate();
  }

  public removeEntities(ids: Iterable<EntityId>): void {
    const toRemove = new Set(ids);
    this.log.debug('remove entities', { count: toRemove.size });
    this.workingEntities = this.workingEntities.filter((e) => !toRemove.has(e.entity.id));
    this.recalculate();
  }

  public clearEntities(): void {
    this.log.debug('clear entities');
    this.workingEntities = [];
    this.recalculate();
  }

  /** Total number of entities, filtered or not. */
  public entityCount(): number {
    return this.workingEntities.length;
  }

  public visibleEntityCount(): number {
    return this.workingEntities.filter((e) => !isFilteredOut(e)).length;
  }

  private insertEntities(entities: readonly EntityData[]): void {
    const known = new Set(this.workingEntities.map((e) => e.entity.id));
    const today = this.today();

    for (const entity of entities) {
      if (known.has(entity.id)) continue;
      known.add(entity.id);
      const working = createWorkingEntity(entity, today, this.timelineColours);
      this.applyEntityColours(working);
      this.workingEntities.push(working);
    }

    // Array.prototype.sort is stable, the id tie-break makes order independent of input order
    this.workingEntities.sort(byStartThenId);
  }

  // --- Filters ---

  public setTagExprEntityFilter(filter: EntityFilter): void {
    this.log.debug('set tag filter');
    this.entityFilter = filter;
    this.recalculate();
  }

  public removeTagExprEntityFilter(): void {
    this.log.debug('remove tag filter');
    this.entityFilter = null;
    this.recalculate();
  }

  /** Either limit may be null to fall back to the automatic bound. */
  public setDateLimits(start: TimelineDate | null, end: TimelineDate | null): void {
    this.log.debug('set date limits', { start, end });
    this.startDateCutoff = start;
    this.endDateCutoff = end;
    this.recalculate();
  }

  public dateLimits(): { start: TimelineDate | null; end: TimelineDate | null } {
    return { start: this.startDateCutoff, end: this.endDateCutoff };
  }

  // --- Layout Parameters ---

  public setFontSizePx(fontSizePx: number): void {
    this.fixedLayoutParams = { ...this.fixedLayoutParams, fontSizePx };
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.recalculate();
  }

  public setLayoutParams(layoutParams: ScalableLayoutParams): void {
    this.fixedLayoutParams = { ...layoutParams };
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.recalculate();
  }

  public layoutParams(): ScalableLayoutParams {
    return { ...this.fixedLayoutParams };
  }

  /** The font size actually drawn, i.e. after zoom. */
  public effectiveFontSizePx(): number {
    return this.zoomedLayoutParams.fontSizePx;
  }

  // --- Zoom & Scale ---

  public zoom(): number {
    return this.zoomLevel;
  }

  public datetimeScale(): number {
    return this.scale;
  }

  /**
   * Zooms in around a canvas-local point, keeping that point still.
   * A factor that would overshoot MAX_ZOOM is reduced to land on it exactly.
   */
  public zoomIn(factor: number, localX: number, localY: number): void {
    if (this.zoomLevel === MAX_ZOOM || !isZoomFactor(factor)) return;

    let effectiveFactor = factor;
    if (this.zoomLevel * factor > MAX_ZOOM) {
      effectiveFactor = MAX_ZOOM / this.zoomLevel;
      this.zoomLevel = MAX_ZOOM;
    } else {
      this.zoomLevel *= factor;
    }

    this.globalOffset = {
      x: localX - (localX - this.globalOffset.x) * effectiveFactor,
      y: localY - (localY - this.globalOffset.y) * effectiveFactor,
    };
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.recalculate();
  }

  /** Mirror of `zoomIn`, bounded by MIN_ZOOM. */
  public zoomOut(factor: number, localX: number, localY: number): void {
    if (this.zoomLevel === MIN_ZOOM || !isZoomFactor(factor)) return;

    let effectiveFactor = factor;
    if (this.zoomLevel / factor < MIN_ZOOM) {
      effectiveFactor = this.zoomLevel / MIN_ZOOM;
      this.zoomLevel = MIN_ZOOM;
    } else {
      this.zoomLevel /= factor;
    }

    this.globalOffset = {
      x: localX - (localX - this.globalOffset.x) / effectiveFactor,
      y: localY - (localY - this.globalOffset.y) / effectiveFactor,
    };
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.recalculate();
  }

  /** Jumps straight to a zoom level (clamped). The offset is left alone. NaN is ignored. */
  public setZoom(zoom: number): void {
    if (Number.isNaN(zoom)) return;
    this.zoomLevel = clamp(zoom, MIN_ZOOM, MAX_ZOOM);
    this.zoomedLayoutParams = deriveZoomedLayoutParams(this.fixedLayoutParams, this.zoomLevel);
    this.recalculate();
  }

  public setDatetimeScale(scale: number): void {
    if (Number.isNaN(scale)) return;
    this.scale = clamp(scale, MIN_DATETIME_SCALE, MAX_DATETIME_SCALE);
    this.recalculate();
  }

  // --- Pan & Canvas ---

  public offset(): Point {
    return { ...this.globalOffset };
  }

  /** Pans by a delta. Positions don't depend on the offset, so only the clamp runs. */
  public addToGlobalOffset(dx: number, dy: number): void {
    this.globalOffset = { x: this.globalOffset.x + dx, y: this.globalOffset.y + dy };
    this.clampGlobalOffset();
  }

  /** Must be called before drawing; with a zero-sized canvas nothing is visible. */
  public setCanvasMax(width: number, height: number): void {
    this.canvasSize = { x: width, y: height };
    this.clampGlobalOffset();
  }

  public canvasMax(): Point {
    return { ...this.canvasSize };
  }

  // --- Appearance ---

  public colours(): TimelineColours {
    return this.timelineColours;
  }

  public setColours(colours: TimelineColours): void {
    this.log.debug('set colours');
    this.timelineColours = colours;
    this.workingEntities.forEach((e) => this.applyEntityColours(e));
    this.recalculate();
  }

  public setTagColours(tagColours: TagColours): void {
    this.tagColours = tagColours;
    this.workingEntities.forEach((e) => this.applyEntityColours(e));
  }

  public setStickyText(stickyText: boolean): void {
    this.stickyText = stickyText;
  }

  private applyEntityColours(entity: WorkingEntity): void {
    const { entity: colours } = this.timelineColours;
    entity.text.colour = colours.textColour;
    entity.textBox.fillColour = colours.textBox.fillColour;
    entity.textBox.borderStyle = colours.textBox.border;
    entity.dateBox.fillColour = tagColourFor(entity.entity.tags, this.tagColours) ?? colours.dateBox.fillColour;
    entity.dateBox.borderStyle = colours.dateBox.border;
  }

  // --- Date Range ---

  public dateRange(): TimelineDateRange {
    return { ...this.range };
  }

  /** First decade and the decade after the last one, e.g. [1950, 1970]. */
  public startAndEndDecades(): [number, number] {
    return [this.range.decadeRangeStart, this.range.decadeRangeEnd];
  }

  public rowCount(): number {
    return this.rows;
  }

  // --- Drawing Queries ---

  /**
   * Unfiltered entities on screen, panned, coloured and (optionally) with
   * sticky labels. Hovered entities are lightened; selected ones get a border.
   */
  public entitiesForDrawing(): EntityOut[] {
    const dx = this.globalOffset.x;
    const dy = this.globalOffset.y + this.headerAutoOffset();
    const { paddingX, entityHighlightThickness } = this.zoomedLayoutParams;
    const highlight = { colour: this.timelineColours.entity.highlightColour, thickness: entityHighlightThickness };

    const out: EntityOut[] = [];
    for (const working of this.workingEntities) {
      if (isFilteredOut(working)) continue;

      let textBox = withOffset(working.textBox, dx, dy);
      let dateBox = withOffset(working.dateBox, dx, dy);
      const text = {
        topLeft: { x: working.text.topLeft.x + dx, y: working.text.topLeft.y + dy },
        text: working.text.text,
        colour: working.text.colour,
        fontSize: working.text.fontSize,
      };

      const min = {
        x: Math.min(textBox.positionAndSize.position.x, dateBox.positionAndSize.position.x),
        y: Math.min(textBox.positionAndSize.position.y, dateBox.positionAndSize.position.y),
      };
      const max = {
        x: Math.max(boxMaxX(textBox.positionAndSize), boxMaxX(dateBox.positionAndSize)),
        y: Math.max(boxMaxY(textBox.positionAndSize), boxMaxY(dateBox.positionAndSize)),
      };
      if (!isVisible(min, max, this.canvasSize)) continue;

      if (working.isHoveredOver) {
        textBox = { ...textBox, fillColour: lightenedColour(textBox.fillColour) };
        dateBox = { ...dateBox, fillColour: lightenedColour(dateBox.fillColour) };
        text.colour = lightenedColour(text.colour);
      }
      if (working.isSelected) {
        textBox = { ...textBox, borderStyle: highlight };
        dateBox = { ...dateBox, borderStyle: highlight };
      }
      if (this.stickyText) {
        const boxWidth = Math.max(textBox.positionAndSize.width, dateBox.positionAndSize.width);
        text.topLeft.x = stickyTextX(text.topLeft.x, working.text.width, boxWidth, paddingX);
      }

      out.push({
        entity: working.entity,
        text,
        textBox,
        dateBox,
        isHoveredOver: working.isHoveredOver,
        isSelected: working.isSelected,
      });
    }
    return out;
  }

  /** Header bands. Panned horizontally only. */
  public headingsForDrawing(): Heading[] {
    const dx = this.globalOffset.x;
    return this.headings
      .map((heading) => ({
        text: { ...heading.text, topLeft: { x: heading.text.topLeft.x + dx, y: heading.text.topLeft.y } },
        textBox: withOffset(heading.textBox, dx, 0),
      }))
      .filter(({ textBox: { positionAndSize } }) =>
        isVisible(
          positionAndSize.position,
          { x: boxMaxX(positionAndSize), y: boxMaxY(positionAndSize) },
          this.canvasSize
        )
      );
  }

  public linesForDrawing(): VerticalLine[] {
    const dx = this.globalOffset.x;
    return this.lines
      .map((line) => ({ x: line.x + dx, style: line.style }))
      .filter(({ x }) => isVisible({ x, y: 0 }, { x, y: 0 }, this.canvasSize));
  }

  public backgroundsForDrawing(): Background[] {
    const dx = this.globalOffset.x;
    return this.backgrounds
      .map((background) => ({ ...background, x: background.x + dx }))
      .filter(({ x, width }) => isVisible({ x, y: 0 }, { x: x + width, y: 0 }, this.canvasSize));
  }

  /** Topmost drawn entity under a canvas point, for hit testing. */
  public entityAt(x: number, y: number): EntityOut | null {
    const contains = ({ positionAndSize: box }: FilledBox) =>
      x >= box.position.x && x <= boxMaxX(box) && y >= box.position.y && y <= boxMaxY(box);

    const hits = this.entitiesForDrawing().filter((e) => contains(e.textBox) || contains(e.dateBox));
    return hits.length > 0 ? hits[hits.length - 1] : null;
  }

  // --- Interaction ---

  public clickOnEntity(entityId: EntityId): void {
    this.interactionEvents.push({ type: 'single-click', entityId });
  }

  public doubleClickOnEntity(entityId: EntityId): void {
    this.interactionEvents.push({ type: 'double-click', entityId });
  }

  public tripleClickOnEntity(entityId: EntityId): void {
    this.interactionEvents.push({ type: 'triple-click', entityId });
  }

  /** Pass null when the pointer leaves every entity. Only a real hover is queued. */
  public hoverOverEntity(entityId: EntityId | null): void {
    if (entityId !== null) {
      this.interactionEvents.push({ type: 'hover', entityId });
    }
    for (const entity of this.workingEntities) {
      entity.isHoveredOver = entity.entity.id === entityId;
    }
  }

  /** Replaces the selection. Unknown ids are ignored. */
  public selectEntities(entityIds: Iterable<EntityId>): void {
    const selected = new Set(entityIds);
    for (const entity of this.workingEntities) {
      entity.isSelected = selected.has(entity.entity.id);
    }
  }

  public selectedEntityIds(): EntityId[] {
    return this.workingEntities.filter((e) => e.isSelected).map((e) => e.entity.id);
  }

  /** Returns queued events in order and empties the queue. */
  public drainInteractionEvents(): TimelineInteractionEvent[] {
    const events = this.interactionEvents;
    this.interactionEvents = [];
    return events;
  }

  // --- Recompute Pipeline ---

  private recalculate(): void {
    this.updateEntitiesFiltered();

    const visible = this.workingEntities.filter((e) => !isFilteredOut(e)).map((e) => e.entity);
    this.range = computeDateRange(visible, this.startDateCutoff, this.endDateCutoff, this.today().year);

    this.updateMeasuredLayoutParams();
    for (const entity of this.workingEntities) {
      updateEntityMeasurements(entity, this.textSize(entity.entity.name).width, this.measuredLayoutParams, this.zoomedLayoutParams);
    }

    const layoutContext: EntityLayoutContext = {
      decadeRangeStart: this.range.decadeRangeStart,
      measured: this.measuredLayoutParams,
      zoomed: this.zoomedLayoutParams,
    };
    this.rows = layoutEntities(this.workingEntities, layoutContext);

    const gridContext: GridContext = {
      dateRange: this.range,
      measured: this.measuredLayoutParams,
      zoomed: this.zoomedLayoutParams,
      datetimeScale: this.scale,
      colours: this.timelineColours,
      measureWidth: (text) => this.textSize(text).width,
    };
    this.headings = buildHeadings(gridContext);
    this.lines = buildLines(gridContext);
    this.backgrounds = buildBackgrounds(gridContext);

    this.clampGlobalOffset();
  }

  private updateEntitiesFiltered(): void {
    for (const working of this.workingEntities) {
      working.filteredByTagExpr = this.entityFilter ? !this.entityFilter.matches(working.entity) : false;
      working.filteredByDateRange = isOutsideDateLimits(working.entity, this.startDateCutoff, this.endDateCutoff);
    }
  }

  private updateMeasuredLayoutParams(): void {
    const rowHeightNoPadding = this.textSize(ROW_HEIGHT_PROBE_TEXT).height;
    const decadeTextWidth = this.textSize(DECADE_WIDTH_PROBE_TEXT).width * this.scale;
    this.measuredLayoutParams = {
      rowHeightNoPadding,
      yearWidth: (decadeTextWidth + 2 * this.zoomedLayoutParams.paddingX) / 10,
    };
  }

  private textSize(text: string): TextSize {
    const fontSizePx = this.zoomedLayoutParams.fontSizePx;
    if (fontSizePx !== this.measureCacheFontSize) {
      this.measureCache.clear();
      this.measureCacheFontSize = fontSizePx;
    }

    const cached = this.measureCache.get(text);
    if (cached) return cached;

    const size = this.measureText(fontSizePx, text);
    this.measureCache.set(text, size);
    return size;
  }

  /** Year headings take a second header band, which pushes every row down. */
  private headerAutoOffset(): number {
    return showsYearHeadings(this.scale) ? headerHeight(this.measuredLayoutParams, this.zoomedLayoutParams) : 0;
  }

  /**
   * Content may not be dragged right of / below the origin, nor left of /
   * above the canvas edge once it is larger than the canvas.
   */
  private clampGlobalOffset(): void {
    let { x, y } = this.globalOffset;
    x = Math.min(x, 0);
    y = Math.min(y, 0);

    const visible = this.workingEntities.filter((e) => !isFilteredOut(e));
    if (visible.length > 0) {
      const maxX = visible.reduce((acc, e) => Math.max(acc, entityMaxX(e)), -Infinity);
      const maxY =
        visible.reduce((acc, e) => Math.max(acc, entityMaxY(e)), -Infinity) +
        this.headerAutoOffset() +
        this.zoomedLayoutParams.rowMargin;

      x = maxX > this.canvasSize.x ? Math.max(x, this.canvasSize.x - maxX) : Math.max(x, 0);
      y = maxY > this.canvasSize.y ? Math.max(y, this.canvasSize.y - maxY) : Math.max(y, 0);
    }

    this.globalOffset = { x, y };
  }
}
