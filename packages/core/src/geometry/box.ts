/**
 * packages/core/src/geometry/box.ts — Box-drawing frames.
 */

import { invalidConfig } from "../errors.js";
import { type CharGrid, type Vec2, fillGrid } from "./grid.js";

export type BoxStyle = "single" | "double";

type BoxGlyphs = Readonly<{
  h: string;
  v: string;
  tl: string;
  tr: string;
  bl: string;
  br: string;
}>;

const BOX_GLYPHS: Readonly<Record<BoxStyle, BoxGlyphs>> = Object.freeze({
  single: { h: "─", v: "│", tl: "┌", tr: "┐", bl: "└", br: "┘" },
  double: { h: "═", v: "║", tl: "╔", tr: "╗", bl: "╚", br: "╝" },
});

/** A `size` frame with a blank interior. Both sides must be at least 2. */
export function generateBox(size: Vec2, style: BoxStyle = "single"): CharGrid {
  const [w, h] = size;
  if (!Number.isInteger(w) || !Number.isInteger(h) || w < 2 || h < 2) {
    invalidConfig(`generateBox: size must be at least 2x2, got ${String(w)}x${String(h)}`);
  }
  const g = BOX_GLYPHS[style];
  const chars = fillGrid(w, h, " ");
  const top = chars[0];
  const bottom = chars[h - 1];
  if (top === undefined || bottom === undefined) return chars;
  for (let x = 1; x < w - 1; x++) {
    top[x] = g.h;
    bottom[x] = g.h;
  }
  for (let y = 1; y < h - 1; y++) {
    const row = chars[y];
    if (row === undefined) continue;
    row[0] = g.v;
    row[w - 1] = g.v;
  }
  top[0] = g.tl;
  top[w - 1] = g.tr;
  bottom[0] = g.bl;
  bottom[w - 1] = g.br;
  return chars;
}
