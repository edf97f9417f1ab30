import type { Colour, TimelineColours } from '../types';

/**
 * lib/colours.ts
 * Colour helpers & the default timeline theme
 * ------------------------------------------------------------------
 * Colours are plain RGB triples so they survive JSON and structured cloning.
 */

export const rgb = (r: number, g: number, b: number): Colour => ({ r, g, b });

const HEX_PATTERN = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

/**
 * Parses `#ab66ef`, `ab66ef` or `#ab66efff` (alpha is dropped).
 * Returns null for anything else.
 */
export function colourFromHex(hex: string): Colour | null {
  const withoutAlpha = hex.length === 8 || hex.length === 9 ? hex.slice(0, -2) : hex;
  const match = HEX_PATTERN.exec(withoutAlpha);
  if (!match) return null;
  return rgb(parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16));
}

export const colourToHex = ({ r, g, b }: Colour): string =>
  `#${[r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('')}`;

export const colourToCss = ({ r, g, b }: Colour): string => `rgb(${r}, ${g}, ${b})`;

/** Moves each component halfway towards white. */
export const lightenedColour = ({ r, g, b }: Colour): Colour => {
  const lighten = (c: number) => Math.round(c + 0.5 * (255 - c));
  return rgb(lighten(r), lighten(g), lighten(b));
};

/**
 * Derives a repeatable colour from any string (naive byte hash), so tags
 * without an explicit colour still get a consistent one.
 */
export function colourFromString(name: string): Colour {
  const bytes = new TextEncoder().encode(name);
  let r = 0;
  let g = 0;
  let b = 0;
  bytes.forEach((byte, i) => {
    if (i % 3 === 0) r = (r + byte) % 256;
    if ((i + 1) % 3 === 0) g = (g + byte) % 256;
    if ((i + 2) % 3 === 0) b = (b + byte) % 256;
  });
  return rgb(r, g, b);
}

export const DEFAULT_TIMELINE_COLOURS: TimelineColours = {
  background: {
    a: rgb(255, 255, 255), // #ffffff
    b: rgb(232, 248, 255), // #e8f8ff
  },
  dividingLine: { colour: rgb(0, 0, 0), thickness: 0.5 },
  entity: {
    textBox: { fillColour: rgb(230, 229, 234), border: null }, // #e6e5ea
    dateBox: { fillColour: rgb(134, 214, 149), border: null }, // #86d695
    textColour: rgb(0, 0, 0),
    highlightColour: rgb(255, 176, 0),
  },
  heading: {
    rect: { fillColour: rgb(0, 0, 170), border: null }, // #0000aa
    textColour: rgb(255, 255, 255),
  },
};

/**
 * Ordered tag → colour pairs. The first pair whose tag an entity carries wins,
 * so order expresses priority ("battle" beats "person").
 */
export type TagColours = ReadonlyArray<readonly [tag: string, colour: Colour]>;

export const DEFAULT_TAG_COLOURS: TagColours = [
  ['person', colourFromString('person')],
  ['battle', rgb(255, 0, 0)],
  ['book', rgb(170, 48, 52)],
  ['novel', colourFromString('novel')],
];

/**
 * Reads `tag=#hex` pairs separated by commas, e.g. `war=#cc3333, book=aa3034`.
 * Pairs with a malformed colour are skipped; order is kept.
 */
export function parseTagColours(config: string | null | undefined): TagColours {
  if (!config) return [];
  const pairs: Array<readonly [string, Colour]> = [];
  for (const entry of config.split(',')) {
    const [tag, hex] = entry.split('=').map((part) => part.trim());
    if (!tag || !hex) continue;
    const colour = colourFromHex(hex);
    if (colour) pairs.push([tag.toLowerCase(), colour]);
  }
  return pairs;
}

export function tagColourFor(tags: readonly string[] | undefined, tagColours: TagColours): Colour | null {
  if (!tags || tags.length === 0) return null;
  const match = tagColours.find(([tag]) => tags.includes(tag));
  return match ? match[1] : null;
}
