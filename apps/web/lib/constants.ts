import type { ScalableLayoutParams } from '../types';

// --- Zoom ---
// Uniform scale applied to every pixel measurement.
export const MIN_ZOOM = 0.2;
export const MAX_ZOOM = 5;

// --- Datetime Scale ---
// Horizontal-only stretch of the time axis.
export const MIN_DATETIME_SCALE = 1;
export const MAX_DATETIME_SCALE = 10;

// Year gridlines start to fade in above this scale...
export const DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_PARTIAL = 1.5;
// ...and are drawn at full strength from this one.
export const DATETIME_SCALE_THRESHOLD_SHOW_YEAR_LINES_FULL = 2.5;
// Year headings ('95) appear above this scale
export const DATETIME_SCALE_THRESHOLD_SHOW_YEARS = 2.5;
// Year headings switch to four digits (1995) from this scale
export const DATETIME_SCALE_THRESHOLD_SHOW_FULL_YEARS = 4;

// --- Text Probes ---
// Measured to derive the row height and the width of a decade.
export const ROW_HEIGHT_PROBE_TEXT = 'lpfHT';
export const DECADE_WIDTH_PROBE_TEXT = '1234s';

export const DEFAULT_LAYOUT_PARAMS: ScalableLayoutParams = {
  rowMargin: 5,
  minInlineSpacing: 5,
  paddingX: 10,
  paddingY: 7,
  fontSizePx: 12,
  dividingLineThickness: 0.5,
  entityHighlightThickness: 10,
};

// --- Pointer Input ---
export const WHEEL_ZOOM_DIVISOR = 250; // Larger = slower wheel zoom
export const MULTI_CLICK_WINDOW_MS = 250;
export const BUTTON_ZOOM_FACTOR = 1.5;
export const DATETIME_SCALE_STEP = 0.5;

// --- Canvas ---
export const TIMELINE_FONT_FAMILY = '"Helvetica Neue", Helvetica, Arial, sans-serif';
