/**
 * packages/core/src/terminal/cellBuffer.ts — Layered cell storage for backends.
 *
 * Why: Both the ANSI backend and the test stub need the same model of the
 * screen: one sparse grid per layer, a current layer and color, and a
 * composite where the highest layer with something in a cell wins.
 */

import type { Vec2 } from "../geometry/grid.js";

export type Cell = Readonly<{ char: string; color: string }>;

export class LayeredCellBuffer {
  private readonly layers = new Map<number, (Cell | null)[][]>();
  private width: number;
  private height: number;
  private layer = 0;
  private color: string;

  constructor(size: Vec2, defaultColor = "white") {
    this.width = size[0];
    this.height = size[1];
    this.color = defaultColor;
  }

  get size(): Vec2 {
    return [this.width, this.height];
  }

  get currentLayer(): number {
    return this.layer;
  }

  get currentColor(): string {
    return this.color;
  }

  setLayer(layer: number): void {
    this.layer = layer;
  }

  setColor(color: string): void {
    this.color = color;
  }

  /** Writes into the current layer with the current color; off-screen cells are ignored. */
  put(x: number, y: number, char: string): void {
    const row = this.grid(this.layer)[y];
    if (row === undefined || x < 0 || x >= this.width) return;
    row[x] = { char, color: this.color };
  }

  clearArea(x: number, y: number, w: number, h: number): void {
    const grid = this.grid(this.layer);
    for (let cy = Math.max(0, y); cy < Math.min(this.height, y + h); cy++) {
      const row = grid[cy];
      if (row === undefined) continue;
      for (let cx = Math.max(0, x); cx < Math.min(this.width, x + w); cx++) row[cx] = null;
    }
  }

  /** Cell as drawn in one layer. */
  cellAt(x: number, y: number, layer: number): Cell | null {
    return this.layers.get(layer)?.[y]?.[x] ?? null;
  }

  /** Visible cell: the highest layer that has one. */
  visibleAt(x: number, y: number): Cell | null {
    const ids = Array.from(this.layers.keys()).sort((a, b) => b - a);
    for (const id of ids) {
      const cell = this.layers.get(id)?.[y]?.[x] ?? null;
      if (cell !== null) return cell;
    }
    return null;
  }

  /** Visible text, one string per row, blank cells as spaces. */
  visibleRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = "";
      for (let x = 0; x < this.width; x++) line += this.visibleAt(x, y)?.char ?? " ";
      rows.push(line);
    }
    return rows;
  }

  /** Changes the size, keeping cells that are still on screen. */
  resize(size: Vec2): void {
    const [w, h] = size;
    for (const [id, grid] of this.layers) {
      const next = this.blank(w, h);
      for (let y = 0; y < Math.min(h, grid.length); y++) {
        const src = grid[y];
        const dst = next[y];
        if (src === undefined || dst === undefined) continue;
        for (let x = 0; x < Math.min(w, src.length); x++) dst[x] = src[x] ?? null;
      }
      this.layers.set(id, next);
    }
    this.width = w;
    this.height = h;
  }

  reset(): void {
    this.layers.clear();
    this.layer = 0;
  }

  private grid(layer: number): (Cell | null)[][] {
    const existing = this.layers.get(layer);
    if (existing !== undefined) return existing;
    const grid = this.blank(this.width, this.height);
    this.layers.set(layer, grid);
    return grid;
  }

  private blank(w: number, h: number): (Cell | null)[][] {
    const grid: (Cell | null)[][] = [];
    for (let y = 0; y < h; y++) grid.push(new Array<Cell | null>(w).fill(null));
    return grid;
  }
}
