import { describe, it, expect } from 'vitest';
import type { TimelineDate } from '@strata/shared';
import { DEFAULT_TIMELINE_COLOURS } from '../colours';
import { DEFAULT_LAYOUT_PARAMS } from '../constants';
import {
  calculateHorizontalPositions,
  createWorkingEntity,
  type EntityLayoutContext,
  entityMaxX,
  entityMaxY,
  isVisible,
  layoutEntities,
  packRows,
  roundToNearestTenth,
  rowPitch,
  stickyTextX,
  updateEntityMeasurements,
  type WorkingEntity,
} from '../layout-engine';

// yearWidth 5 → a decade is 50px; box height 12 + 2*7 = 26; row pitch 12 + 5 + 2*7 = 31
const ctx: EntityLayoutContext = {
  decadeRangeStart: 1950,
  measured: { yearWidth: 5, rowHeightNoPadding: 12 },
  zoomed: DEFAULT_LAYOUT_PARAMS,
};

const TODAY: TimelineDate = { year: 2000 };

const working = (id: string, start: TimelineDate, end?: TimelineDate, textWidth = 6): WorkingEntity => {
  const entity = createWorkingEntity({ id, name: id, start, end }, TODAY, DEFAULT_TIMELINE_COLOURS);
  updateEntityMeasurements(entity, textWidth, ctx.measured, ctx.zoomed);
  return entity;
};

describe('roundToNearestTenth', () => {
  it('rounds half away from zero', () => {
    expect(roundToNearestTenth(0.25)).toBe(0.3);
    expect(roundToNearestTenth(-0.25)).toBe(-0.3);
    expect(roundToNearestTenth(1.04)).toBe(1);
  });
});

describe('updateEntityMeasurements', () => {
  it('sizes both boxes from the text and padding', () => {
    const entity = working('a', { year: 1950 }, { year: 1960 }, 30);
    expect(entity.text.width).toBe(30);
    expect(entity.text.fontSize).toBe(12);
    expect(entity.textBox.positionAndSize.width).toBe(50);
    expect(entity.textBox.positionAndSize.height).toBe(26);
    expect(entity.dateBox.positionAndSize.height).toBe(26);
  });
});

describe('calculateHorizontalPositions', () => {
  it('places the start relative to the first decade', () => {
    const entity = working('a', { year: 1955, month: 7 }, { year: 1960, month: 7 });
    calculateHorizontalPositions([entity], ctx);

    expect(entity.dateBox.positionAndSize.position.x).toBe(27.5);
    expect(entity.textBox.positionAndSize.position.x).toBe(27.5);
    expect(entity.dateBox.positionAndSize.width).toBe(25);
    expect(entity.text.topLeft.x).toBe(37.5);
  });

  it('runs open-ended entities until today', () => {
    const entity = working('a', { year: 1990 });
    calculateHorizontalPositions([entity], ctx);
    expect(entity.dateBox.positionAndSize.width).toBe(50);
  });

  it('collapses an open-ended entity that starts after today', () => {
    const entity = working('a', { year: 2010 });
    calculateHorizontalPositions([entity], ctx);
    expect(entity.dateBox.positionAndSize.width).toBe(0);
  });
});

describe('packRows', () => {
  it('reuses the first row that has room', () => {
    const a = working('a', { year: 1950 }, { year: 1960 }); // 0 → 50
    const b = working('b', { year: 1960 }, { year: 1970 }); // 50 → 100, touches a
    const c = working('c', { year: 1962 }, { year: 1964 }); // starts 60, clear of a + spacing
    calculateHorizontalPositions([a, b, c], ctx);

    expect(packRows([a, b, c], ctx.zoomed.minInlineSpacing)).toBe(2);
    expect([a.row, b.row, c.row]).toEqual([0, 1, 0]);
  });

  it('requires the gap to exceed the inline spacing', () => {
    const a = working('a', { year: 1950 }, { year: 1960 }); // ends at 50
    const b = working('b', { year: 1961 }, { year: 1962 }); // starts at 55 = 50 + spacing
    calculateHorizontalPositions([a, b], ctx);

    expect(packRows([a, b], 5)).toBe(2);
    expect(b.row).toBe(1);
  });

  it('measures a row by the wider of the two boxes', () => {
    const a = working('a', { year: 1950 }, { year: 1951 }, 100); // text box 0 → 120
    const b = working('b', { year: 1960 }, { year: 1961 }); // starts at 50
    calculateHorizontalPositions([a, b], ctx);

    expect(entityMaxX(a)).toBe(120);
    packRows([a, b], 5);
    expect(b.row).toBe(1);
  });

  it('skips filtered entities', () => {
    const a = working('a', { year: 1950 }, { year: 1960 });
    const hidden = working('hidden', { year: 1950 }, { year: 1960 });
    hidden.filteredByTagExpr = true;
    const b = working('b', { year: 1970 }, { year: 1971 });
    calculateHorizontalPositions([a, hidden, b], ctx);

    expect(packRows([a, hidden, b], 5)).toBe(1);
    expect(b.row).toBe(0);
  });

  it('gives zero-length spans a slot of their own', () => {
    const a = working('a', { year: 1950 }, { year: 1950 }, 0);
    const b = working('b', { year: 1950 }, { year: 1950 }, 0);
    calculateHorizontalPositions([a, b], ctx);

    expect(packRows([a, b], 5)).toBe(2);
  });
});

describe('layoutEntities', () => {
  it('stacks rows one pitch apart below the header', () => {
    const a = working('a', { year: 1950 }, { year: 1960 });
    const b = working('b', { year: 1955 }, { year: 1960 });
    const rows = layoutEntities([a, b], ctx);

    expect(rows).toBe(2);
    expect(rowPitch(ctx.measured, ctx.zoomed)).toBe(31);
    expect(a.textBox.positionAndSize.position).toEqual({ x: 0, y: 31 });
    expect(a.text.topLeft).toEqual({ x: 10, y: 38 });
    expect(b.dateBox.positionAndSize.position).toEqual({ x: 25, y: 62 });
    expect(entityMaxY(b)).toBe(88);
  });

  it('never overlaps two entities in one row', () => {
    const entities = [1950, 1951, 1953, 1958, 1960, 1961, 1975, 1976].map((year, i) =>
      working(`e${i}`, { year }, { year: year + 3 })
    );
    layoutEntities(entities, ctx);

    for (const a of entities) {
      for (const b of entities) {
        if (a === b || a.row !== b.row) continue;
        const [left, right] = a.textBox.positionAndSize.position.x < b.textBox.positionAndSize.position.x ? [a, b] : [b, a];
        expect(entityMaxX(left) + 5).toBeLessThan(right.textBox.positionAndSize.position.x);
      }
    }
  });
});

describe('isVisible', () => {
  const canvas = { x: 100, y: 100 };

  it('accepts anything overlapping the canvas', () => {
    expect(isVisible({ x: -10, y: 10 }, { x: 10, y: 20 }, canvas)).toBe(true);
  });

  it('rejects boxes fully left or right', () => {
    expect(isVisible({ x: -20, y: 10 }, { x: -1, y: 20 }, canvas)).toBe(false);
    expect(isVisible({ x: 101, y: 10 }, { x: 120, y: 20 }, canvas)).toBe(false);
  });

  it('keeps one box height of vertical margin', () => {
    expect(isVisible({ x: 0, y: 105 }, { x: 10, y: 115 }, canvas)).toBe(true);
    expect(isVisible({ x: 0, y: 111 }, { x: 10, y: 121 }, canvas)).toBe(false);
    expect(isVisible({ x: 0, y: -19 }, { x: 10, y: -9 }, canvas)).toBe(true);
    expect(isVisible({ x: 0, y: -21 }, { x: 10, y: -11 }, canvas)).toBe(false);
  });
});

describe('stickyTextX', () => {
  it('leaves labels that are already on screen alone', () => {
    expect(stickyTextX(15, 30, 200, 10)).toBe(15);
  });

  it('pins the label to the left edge while the box has room', () => {
    expect(stickyTextX(-50, 30, 200, 10)).toBe(10);
  });

  it('lets the label scroll off with the end of its box', () => {
    // free space: 200 - 30 - 20 = 150
    expect(stickyTextX(-200, 30, 200, 10)).toBe(-50);
  });
});
