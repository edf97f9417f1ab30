import type { EntityId } from '@strata/shared';
import type { TimelineInteractionEvent } from '../types';
import { MULTI_CLICK_WINDOW_MS, WHEEL_ZOOM_DIVISOR } from './constants';

/**
 * lib/pointer-input.ts
 * Pointer → Engine Translation
 * ------------------------------------------------------------------
 * Pure helpers that turn DOM-shaped input into engine calls. Kept free of
 * React and the DOM so they can be tested without a browser.
 */

export interface WheelInput {
  deltaX: number;
  deltaY: number;
  ctrlKey: boolean;
  metaKey: boolean;
  // Pointer position relative to the canvas
  offsetX: number;
  offsetY: number;
}

export type WheelAction =
  | { kind: 'zoom-in' | 'zoom-out'; factor: number; x: number; y: number }
  | { kind: 'pan'; dx: number; dy: number };

/** Always > 1, growing with the size of the scroll step. */
export const wheelToZoomFactor = (deltaY: number): number => Math.abs(deltaY) / WHEEL_ZOOM_DIVISOR + 1;

/**
 * Ctrl/⌘ + wheel (and trackpad pinch, which browsers report the same way)
 * zooms around the pointer. A plain wheel pans.
 */
export function translateWheel(input: WheelInput): WheelAction {
  if (input.ctrlKey || input.metaKey) {
    return {
      kind: input.deltaY > 0 ? 'zoom-out' : 'zoom-in',
      factor: wheelToZoomFactor(input.deltaY),
      x: input.offsetX,
      y: input.offsetY,
    };
  }
  return { kind: 'pan', dx: -input.deltaX, dy: -input.deltaY };
}

export interface WheelTarget {
  zoomIn: (factor: number, x: number, y: number) => void;
  zoomOut: (factor: number, x: number, y: number) => void;
  addToGlobalOffset: (dx: number, dy: number) => void;
}

export function applyWheelAction(target: WheelTarget, action: WheelAction): void {
  switch (action.kind) {
    case 'zoom-in':
      target.zoomIn(action.factor, action.x, action.y);
      break;
    case 'zoom-out':
      target.zoomOut(action.factor, action.x, action.y);
      break;
    case 'pan':
      target.addToGlobalOffset(action.dx, action.dy);
      break;
  }
}

// --- Clicks ---

export type ClickKind = Extract<TimelineInteractionEvent['type'], `${string}-click`>;

/**
 * Classifies clicks on the same entity that land within the multi-click
 * window of each other. A fourth quick click starts over as a single click.
 */
export class ClickCounter {
  private lastEntityId: EntityId | null = null;
  private lastClickMs = -Infinity;
  private count = 0;

  constructor(private readonly windowMs: number = MULTI_CLICK_WINDOW_MS) {}

  public register(entityId: EntityId, nowMs: number): ClickKind {
    const isRepeat = entityId === this.lastEntityId && nowMs - this.lastClickMs < this.windowMs;
    this.count = isRepeat && this.count < 3 ? this.count + 1 : 1;
    this.lastEntityId = entityId;
    this.lastClickMs = nowMs;

    if (this.count === 3) return 'triple-click';
    if (this.count === 2) return 'double-click';
    return 'single-click';
  }

  public reset(): void {
    this.lastEntityId = null;
    this.lastClickMs = -Infinity;
    this.count = 0;
  }
}

/** A click fired by releasing a drag is not a click on what's underneath. */
export const isClickAfterDrag = (lastDragEndMs: number | null, nowMs: number): boolean =>
  lastDragEndMs !== null && nowMs - lastDragEndMs < MULTI_CLICK_WINDOW_MS;
