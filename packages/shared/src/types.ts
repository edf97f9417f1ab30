/**
 * packages/shared/src/types.ts
 *
 * TIMELINE DATA SCHEMA (CANONICAL)
 * ------------------------------------------------------------------
 * The entity shape every part of Strata agrees on.
 *
 * Relationship:
 * - Validated at the boundary by './schemas.ts'.
 * - Consumed read-only by the layout engine ('apps/web/lib/timeline-engine.ts').
 */

export type EntityId = string;

/** The smallest year a timeline date may hold. */
export const MIN_YEAR = -50000;

/** The largest year a timeline date may hold. */
export const MAX_YEAR = 10000;

// --- Time System ---

export interface TimelineDate {
  // Astronomical numbering: 0 is 1 BC, -1 is 2 BC.
  year: number;
  month?: number; // 1-12
  // 1-31. Only meaningful alongside a month.
  day?: number;
}

// --- Entity ---

export interface EntityData {
  id: EntityId;
  name: string;

  start: TimelineDate;
  end?: TimelineDate; // Open-ended entities run until today

  // Free-form tags, e.g. "person" or "period:modern"
  tags?: string[];
}
