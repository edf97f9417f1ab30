import type { MeasureTextFn } from '../types';
import { TIMELINE_FONT_FAMILY } from './constants';

/**
 * Rough metrics for environments without a canvas (server render, tests).
 * Average glyph ≈ 0.6em wide, line box = 1em.
 */
export const approximateTextSize: MeasureTextFn = (fontSizePx, text) => ({
  width: 0.6 * fontSizePx * text.length,
  height: fontSizePx,
});

/**
 * Measures with an off-screen 2D context so the engine's boxes match what the
 * canvas will actually draw. The context is created on first use.
 */
export function createCanvasTextMeasurer(fontFamily: string = TIMELINE_FONT_FAMILY): MeasureTextFn {
  let ctx: CanvasRenderingContext2D | null | undefined;

  return (fontSizePx, text) => {
    if (ctx === undefined) {
      ctx = typeof document === 'undefined' ? null : document.createElement('canvas').getContext('2d');
    }
    if (!ctx) return approximateTextSize(fontSizePx, text);

    ctx.font = `${fontSizePx}px ${fontFamily}`;
    const metrics = ctx.measureText(text);
    return {
      width: metrics.width,
      height: metrics.actualBoundingBoxAscent + metrics.actualBoundingBoxDescent,
    };
  };
}
