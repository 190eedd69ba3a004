/**
 * packages/core/src/geometry/rounding.ts — Round-half-to-even.
 *
 * Tile snapping and scroll bar placement round exact halves to the nearest
 * even integer: 0.5 → 0, 1.5 → 2, 2.5 → 2.
 */

const EPSILON = 1e-9;

export function roundHalfEven(v: number): number {
  if (!Number.isFinite(v)) return v;
  const floor = Math.floor(v);
  const diff = v - floor;
  if (Math.abs(diff - 0.5) < EPSILON) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(v);
}
