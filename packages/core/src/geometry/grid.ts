/**
 * packages/core/src/geometry/grid.ts — Row-major 2D grid helpers.
 *
 * Why: Widgets, layouts and loaders all pass around `grid[y][x]` arrays of
 * characters or colors. These helpers are the only place that builds, copies
 * and slices them, so shape rules stay in one spot.
 */

import { invalidConfig } from "../errors.js";

export type Grid<T> = T[][];
export type CharGrid = Grid<string>;
export type ColorGrid = Grid<string>;

/** `[x, y]` position or `[width, height]` size. */
export type Vec2 = readonly [number, number];

/** Chars and colors of one image, always equal in shape. */
export type CellImage = Readonly<{ chars: CharGrid; colors: ColorGrid }>;

export function isGrid(v: unknown): v is Grid<unknown> {
  return Array.isArray(v) && v.every((row) => Array.isArray(row));
}

/** True if `a` and `b` have the same number of rows and equal per-row lengths. */
export function shapesEqual(a: Grid<unknown>, b: Grid<unknown>): boolean {
  if (a.length !== b.length) return false;
  for (let y = 0; y < a.length; y++) {
    if ((a[y]?.length ?? 0) !== (b[y]?.length ?? 0)) return false;
  }
  return true;
}

/** Width of a grid, taken from its first row. */
export function gridWidth(g: Grid<unknown>): number {
  return g[0]?.length ?? 0;
}

export function gridSize(g: Grid<unknown>): Vec2 {
  return [gridWidth(g), g.length];
}

/** A new grid of the same shape as `g`, every cell set to `value`. */
export function copyShape<T>(g: Grid<unknown>, value: T): Grid<T> {
  return g.map((row) => row.map(() => value));
}

export function fillGrid<T>(width: number, height: number, value: T): Grid<T> {
  const out: Grid<T> = [];
  for (let y = 0; y < height; y++) out.push(new Array<T>(width).fill(value));
  return out;
}

export function cloneGrid<T>(g: Grid<T>): Grid<T> {
  return g.map((row) => row.slice());
}

/** Cells of `g` inside the `size` window at `pos`; the window must lie inside `g`. */
export function sliceGrid<T>(g: Grid<T>, pos: Vec2, size: Vec2): Grid<T> {
  const [x0, y0] = pos;
  const [w, h] = size;
  if (x0 < 0 || y0 < 0 || y0 + h > g.length || x0 + w > gridWidth(g)) {
    invalidConfig(
      `sliceGrid: window ${String(w)}x${String(h)} at (${String(x0)}, ${String(y0)}) is outside the grid`,
    );
  }
  const out: Grid<T> = [];
  for (let y = y0; y < y0 + h; y++) {
    const row = g[y];
    if (row === undefined) break;
    out.push(row.slice(x0, x0 + w));
  }
  return out;
}

/** Transposes a rectangular grid: rows become columns. */
export function rotateGrid<T>(g: Grid<T>): Grid<T> {
  const w = gridWidth(g);
  const out: Grid<T> = [];
  for (let x = 0; x < w; x++) {
    const column: T[] = [];
    for (const row of g) {
      const v = row[x];
      if (v !== undefined) column.push(v);
    }
    out.push(column);
  }
  return out;
}

/** Copy of `target` with `source` written over it at `(x, y)`. */
export function blit<T>(target: Grid<T>, source: Grid<T>, x: number, y: number): Grid<T> {
  if (x < 0 || y < 0 || x + gridWidth(source) > gridWidth(target) || y + source.length > target.length) {
    invalidConfig("blit: source does not fit into target at the given position");
  }
  const out = cloneGrid(target);
  for (let dy = 0; dy < source.length; dy++) {
    const src = source[dy];
    const dst = out[y + dy];
    if (src === undefined || dst === undefined) continue;
    for (let dx = 0; dx < src.length; dx++) {
      const v = src[dx];
      if (v !== undefined) dst[x + dx] = v;
    }
  }
  return out;
}

/** Splits equal-length text rows into a char grid. */
export function charsFromRows(rows: readonly string[]): CharGrid {
  return rows.map((row) => Array.from(row));
}

export function rowsFromChars(chars: CharGrid): string[] {
  return chars.map((row) => row.join(""));
}

/** Throws a config error unless `chars` and `colors` are non-empty grids of equal shape. */
export function assertImageShape(chars: unknown, colors: unknown, where: string): void {
  if (!isGrid(chars) || !isGrid(colors)) {
    invalidConfig(`${where}: chars and colors must be 2D arrays`);
  }
  if (!shapesEqual(chars, colors)) {
    invalidConfig(`${where}: chars and colors must have equal shape`);
  }
}
