/**
 * packages/node/src/colors.ts — Color names to 24-bit SGR sequences.
 */

import namedColors from "./namedColors.json" with { type: "json" };

export type Rgb = Readonly<{ r: number; g: number; b: number }>;

const NAMED: Readonly<Record<string, string>> = namedColors;

/** Parses a color name, `#rgb` or `#rrggbb`; null when unrecognized. */
export function parseColor(color: string): Rgb | null {
  const key = color.trim().toLowerCase();
  const hex = NAMED[key] ?? key;
  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(hex);
  if (short !== null) {
    const [, r = "0", g = "0", b = "0"] = short;
    return { r: Number.parseInt(r + r, 16), g: Number.parseInt(g + g, 16), b: Number.parseInt(b + b, 16) };
  }
  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/.exec(hex);
  if (long !== null) {
    const [, r = "00", g = "00", b = "00"] = long;
    return { r: Number.parseInt(r, 16), g: Number.parseInt(g, 16), b: Number.parseInt(b, 16) };
  }
  return null;
}

export function sgrForeground(rgb: Rgb): string {
  return `\u001b[38;2;${String(rgb.r)};${String(rgb.g)};${String(rgb.b)}m`;
}
