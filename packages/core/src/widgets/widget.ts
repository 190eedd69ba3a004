/**
 * packages/core/src/widgets/widget.ts — Base widget: a fixed-shape grid of cells.
 *
 * Why: Every visual unit, from a single sprite to a whole layout, is a pair of
 * equal-shape char and color grids plus a z-level. Cell contents may change
 * at any time; the shape never does.
 */

import { invalidConfig } from "../errors.js";
import type { DispatchResult, GlyphEvent, Listener } from "../events/types.js";
import { type CharGrid, type ColorGrid, type Vec2, assertImageShape, gridSize, gridWidth, rowsFromChars } from "../geometry/grid.js";
import type { SerialRecord, Serializable } from "../serial/types.js";

/**
 * The drawing surface a widget may be attached to. Implemented by the
 * terminal; widgets use it to request their own repaint.
 */
export interface WidgetSurface {
  updateWidget(widget: Widget): void;
  /** Top-left corner of a widget placed directly on the surface. */
  widgetPosition(widget: Widget): Vec2 | undefined;
  /** Named input state, e.g. `"TK_MOUSE_X"`. */
  checkState(name: string): number;
}

export type WidgetParent = Widget | WidgetSurface;

export type FlipAxis = "x" | "horizontal" | "y" | "vertical";

export class Widget implements Listener, Serializable {
  chars: CharGrid;
  colors: ColorGrid;
  zLevel: number;
  private surface: WidgetSurface | null = null;
  private owner: WidgetParent | null = null;

  constructor(chars: CharGrid, colors: ColorGrid, zLevel = 0) {
    assertImageShape(chars, colors, this.constructor.name);
    this.chars = chars;
    this.colors = colors;
    this.zLevel = zLevel;
  }

  get terminal(): WidgetSurface | null {
    return this.surface;
  }

  set terminal(value: WidgetSurface | null) {
    this.surface = value;
    this.propagateTerminal(value);
  }

  /** The layout containing this widget, or the terminal it is placed on directly. */
  get parent(): WidgetParent | null {
    return this.owner;
  }

  set parent(value: WidgetParent | null) {
    this.owner = value;
  }

  get width(): number {
    return gridWidth(this.chars);
  }

  get height(): number {
    return this.chars.length;
  }

  get size(): Vec2 {
    return gridSize(this.chars);
  }

  /** True if the widget sits on a terminal directly rather than in a layout. */
  protected get placedOnTerminal(): boolean {
    return this.surface !== null && this.owner === this.surface;
  }

  /** Hook for containers that hand the terminal down to their children. */
  protected propagateTerminal(_value: WidgetSurface | null): void {}

  /**
   * Mirrors the current content. Only affects cells as they are now: content
   * written later (animation frames, label text) replaces it.
   */
  flip(axis: FlipAxis): void {
    if (axis === "x" || axis === "horizontal") {
      this.chars = this.chars.map((row) => row.slice().reverse());
      this.colors = this.colors.map((row) => row.slice().reverse());
      return;
    }
    if (axis === "y" || axis === "vertical") {
      this.chars = this.chars.slice().reverse();
      this.colors = this.colors.slice().reverse();
      return;
    }
    invalidConfig(`flip: unknown axis ${JSON.stringify(axis)}`);
  }

  onEvent(_event: GlyphEvent): DispatchResult {
    return undefined;
  }

  serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      chars: rowsFromChars(this.chars),
      colors: this.colors.map((row) => row.join(",")),
      z_level: this.zLevel,
    };
  }

  /** Registry name used as the `class` discriminator. */
  protected serialClass(): string {
    return "Widget";
  }
}
