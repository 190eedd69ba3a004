/**
 * packages/core/src/geometry/rect.ts — Axis-aligned box tests on the cell grid.
 */

import type { Vec2 } from "./grid.js";

/** Inclusive-exclusive overlap of two boxes given as position and size. */
export function rectanglesCollide(pos1: Vec2, size1: Vec2, pos2: Vec2, size2: Vec2): boolean {
  return (
    pos1[0] < pos2[0] + size2[0] &&
    pos2[0] < pos1[0] + size1[0] &&
    pos1[1] < pos2[1] + size2[1] &&
    pos2[1] < pos1[1] + size1[1]
  );
}

/** True if `[a0, a1]` and `[b0, b1]` (inclusive) share at least one value. */
export function rangesIntersect(a0: number, a1: number, b0: number, b1: number): boolean {
  return a0 <= b1 && b0 <= a1;
}

/** True if a box at `pos` of `size` lies fully inside a `bounds`-sized area at the origin. */
export function boxInside(pos: Vec2, size: Vec2, bounds: Vec2): boolean {
  return pos[0] >= 0 && pos[1] >= 0 && pos[0] + size[0] <= bounds[0] && pos[1] + size[1] <= bounds[1];
}

export function isIntVec2(v: unknown): v is Vec2 {
  return (
    Array.isArray(v) &&
    v.length === 2 &&
    Number.isInteger(v[0]) &&
    Number.isInteger(v[1])
  );
}
