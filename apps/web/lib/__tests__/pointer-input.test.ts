import { describe, it, expect, vi } from 'vitest';
import {
  applyWheelAction,
  ClickCounter,
  isClickAfterDrag,
  translateWheel,
  type WheelInput,
  wheelToZoomFactor,
} from '../pointer-input';

const wheel = (overrides: Partial<WheelInput>): WheelInput => ({
  deltaX: 0,
  deltaY: 0,
  ctrlKey: false,
  metaKey: false,
  offsetX: 40,
  offsetY: 30,
  ...overrides,
});

describe('wheelToZoomFactor', () => {
  it('grows with the scroll distance', () => {
    expect(wheelToZoomFactor(0)).toBe(1);
    expect(wheelToZoomFactor(125)).toBe(1.5);
    expect(wheelToZoomFactor(-250)).toBe(2);
  });
});

describe('translateWheel', () => {
  it('pans with a plain wheel', () => {
    expect(translateWheel(wheel({ deltaX: 10, deltaY: -20 }))).toEqual({ kind: 'pan', dx: -10, dy: 20 });
  });

  it('zooms out around the pointer when scrolling down with ctrl', () => {
    expect(translateWheel(wheel({ deltaY: 125, ctrlKey: true }))).toEqual({
      kind: 'zoom-out',
      factor: 1.5,
      x: 40,
      y: 30,
    });
  });

  it('zooms in when scrolling up with meta', () => {
    expect(translateWheel(wheel({ deltaY: -250, metaKey: true }))).toEqual({
      kind: 'zoom-in',
      factor: 2,
      x: 40,
      y: 30,
    });
  });
});

describe('applyWheelAction', () => {
  it('calls the matching engine method', () => {
    const target = { zoomIn: vi.fn(), zoomOut: vi.fn(), addToGlobalOffset: vi.fn() };

    applyWheelAction(target, { kind: 'zoom-in', factor: 2, x: 1, y: 2 });
    applyWheelAction(target, { kind: 'pan', dx: 3, dy: 4 });

    expect(target.zoomIn).toHaveBeenCalledWith(2, 1, 2);
    expect(target.addToGlobalOffset).toHaveBeenCalledWith(3, 4);
    expect(target.zoomOut).not.toHaveBeenCalled();
  });
});

describe('ClickCounter', () => {
  it('escalates quick clicks on the same entity', () => {
    const counter = new ClickCounter(250);
    expect(counter.register('a', 0)).toBe('single-click');
    expect(counter.register('a', 100)).toBe('double-click');
    expect(counter.register('a', 200)).toBe('triple-click');
    expect(counter.register('a', 300)).toBe('single-click');
  });

  it('starts over after the window', () => {
    const counter = new ClickCounter(250);
    counter.register('a', 0);
    expect(counter.register('a', 250)).toBe('single-click');
  });

  it('starts over on a different entity', () => {
    const counter = new ClickCounter(250);
    counter.register('a', 0);
    expect(counter.register('b', 50)).toBe('single-click');
  });

  it('forgets history on reset', () => {
    const counter = new ClickCounter(250);
    counter.register('a', 0);
    counter.reset();
    expect(counter.register('a', 10)).toBe('single-click');
  });
});

describe('isClickAfterDrag', () => {
  it('suppresses clicks right after a drag', () => {
    expect(isClickAfterDrag(null, 1000)).toBe(false);
    expect(isClickAfterDrag(900, 1000)).toBe(true);
    expect(isClickAfterDrag(700, 1000)).toBe(false);
  });
});
