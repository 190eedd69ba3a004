/**
 * packages/core/src/terminal/backend.ts — Contract for the native drawing surface.
 *
 * Why: The core never touches a real screen. Everything it needs from one
 * (cells, colors, layers, raw input codes) goes through this interface, so the
 * same widgets run on the ANSI backend and on the in-memory test stub.
 *
 * All methods are synchronous and must not block.
 */

import type { Vec2 } from "../geometry/grid.js";

export interface TerminalBackend {
  open(): void;
  close(): void;
  /** Applies a `section.key=value;...` option string. */
  setConfig(options: string): void;
  /** Presents everything drawn since the previous refresh. */
  refresh(): void;
  /** Selects the layer subsequent draw calls go to. */
  setLayer(layer: number): void;
  /** Selects the color subsequent `putCell` calls use. */
  setColor(color: string): void;
  putCell(x: number, y: number, char: string): void;
  clearArea(x: number, y: number, width: number, height: number): void;
  /** Window size in cells. */
  windowSize(): Vec2;
  /** Next pending raw input code, or null when there is none. */
  pollInput(): number | null;
  /** Value of a named-state query, by numeric state code. */
  queryState(code: number): number;
}
