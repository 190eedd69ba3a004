/**
 * packages/core/src/widgets/layout.ts — Widget that composites child widgets.
 *
 * Why: A layout owns a coverage stack per cell listing every child that claims
 * the cell, bottom to top in insertion order. Recompositing reads only those
 * stacks, so children can be added, moved and removed any number of times per
 * tick and the grid is rebuilt once, on `service: "tick_over"`.
 *
 * The first child is the background. It always covers every cell, can be
 * replaced by a widget of the same shape, and can never be removed.
 */

import { describeValue, layoutError, serializationError } from "../errors.js";
import { type DispatchResult, type GlyphEvent, isTickOver } from "../events/types.js";
import { type CharGrid, type ColorGrid, type Vec2, cloneGrid, gridWidth, shapesEqual } from "../geometry/grid.js";
import type { SerialRecord } from "../serial/types.js";
import { Widget, type WidgetSurface } from "./widget.js";

export class Layout extends Widget {
  /** Children in insertion order; index 0 is the background. */
  protected readonly childList: Widget[] = [];
  protected readonly childLocations = new Map<Widget, Vec2>();
  /** `coverage[y][x]`: children covering the cell, bottom to top. */
  protected readonly coverage: Widget[][][];
  /** Size of the composited field; equals `size` unless a subclass shows a window of it. */
  protected readonly field: Vec2;

  constructor(chars: CharGrid, colors: ColorGrid) {
    super(chars, colors);
    this.field = [gridWidth(chars), chars.length];
    this.coverage = [];
    for (let y = 0; y < this.field[1]; y++) {
      const row: Widget[][] = [];
      for (let x = 0; x < this.field[0]; x++) row.push([]);
      this.coverage.push(row);
    }
    this.addChild(new Widget(cloneGrid(chars), cloneGrid(colors)), [0, 0]);
  }

  get children(): readonly Widget[] {
    return this.childList;
  }

  get fieldSize(): Vec2 {
    return this.field;
  }

  /** Children added before the layout was placed get the terminal too. */
  protected override propagateTerminal(value: WidgetSurface | null): void {
    for (const child of this.childList) child.terminal = value;
  }

  get background(): Widget {
    const bg = this.childList[0];
    if (bg === undefined) {
      layoutError("Layout has no background");
    }
    return bg;
  }

  /** Swaps the background in every coverage stack. The new one must match the field shape. */
  set background(value: Widget) {
    if (!(value instanceof Widget)) {
      layoutError(`background must be a Widget, got ${describeValue(value)}`);
    }
    const [w, h] = this.field;
    if (value.width !== w || value.height !== h || !shapesEqual(value.chars, this.coverage)) {
      layoutError(`background must be ${String(w)}x${String(h)}`);
    }
    const old = this.background;
    for (const row of this.coverage) {
      for (const stack of row) stack[0] = value;
    }
    this.childLocations.delete(old);
    this.childLocations.set(value, [0, 0]);
    this.childList[0] = value;
    old.parent = null;
    old.terminal = null;
    value.parent = this;
    value.terminal = this.terminal;
  }

  /**
   * Places `child` with its top-left corner at `pos`. `skipChecks` re-adds a
   * child that is still listed, which is how {@link moveChild} keeps order.
   */
  addChild(child: Widget, pos: Vec2, skipChecks = false): void {
    if (!(child instanceof Widget)) {
      layoutError(`cannot add ${describeValue(child)} to a Layout`);
    }
    if (!skipChecks && this.childList.includes(child)) {
      layoutError("cannot add the same widget to a layout twice");
    }
    const [fw, fh] = this.field;
    if (child.width > fw || child.height > fh) {
      layoutError("cannot add a child bigger than the layout");
    }
    const [x, y] = pos;
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x + child.width > fw || y + child.height > fh) {
      layoutError(`child won't fit at (${String(x)}, ${String(y)})`);
    }
    if (child === this) {
      layoutError("cannot add a layout as its own child");
    }
    if (!skipChecks) this.childList.push(child);
    this.childLocations.set(child, [x, y]);
    child.terminal = this.terminal;
    child.parent = this;
    for (let dy = 0; dy < child.height; dy++) {
      const row = this.coverage[y + dy];
      if (row === undefined) continue;
      for (let dx = 0; dx < child.width; dx++) row[x + dx]?.push(child);
    }
  }

  /**
   * Takes `child` off the coverage stacks. With `fully = false` it stays in
   * the child list and keeps its parent, ready to be re-added elsewhere.
   */
  removeChild(child: Widget, fully = true): void {
    const pos = this.childLocations.get(child);
    if (pos === undefined || !this.childList.includes(child)) {
      layoutError("a layout can only remove its own child");
    }
    if (fully && child === this.childList[0]) {
      layoutError("cannot remove the layout background");
    }
    this.uncover(child, pos);
    if (!fully) return;
    this.childLocations.delete(child);
    this.childList.splice(this.childList.indexOf(child), 1);
    child.terminal = null;
    child.parent = null;
  }

  moveChild(child: Widget, newPos: Vec2): void {
    const oldPos = this.childLocations.get(child);
    this.removeChild(child, false);
    try {
      this.addChild(child, newPos, true);
    } catch (err) {
      // Put the child back where it was.
      if (oldPos !== undefined) this.addChild(child, oldPos, true);
      throw err;
    }
  }

  /** Position of a child in layout coordinates. */
  childPosition(child: Widget): Vec2 | undefined {
    return this.childLocations.get(child);
  }

  /** Topmost non-background child covering `pos`. */
  getChildOnPos(pos: Vec2, returnBackground = false): Widget | null {
    const stack = this.coverage[pos[1]]?.[pos[0]];
    if (stack === undefined) {
      layoutError(`position (${String(pos[0])}, ${String(pos[1])}) is outside the layout`);
    }
    const top = stack[stack.length - 1];
    if (stack.length > 1 && top !== undefined) return top;
    return returnBackground ? this.background : null;
  }

  /** Converts a position inside this layout to terminal coordinates. */
  getAbsolutePos(relativePos: Vec2): Vec2 {
    const origin = this.screenOrigin();
    if (origin === null) {
      layoutError("layout is not placed on a terminal");
    }
    return [origin[0] + relativePos[0], origin[1] + relativePos[1]];
  }

  /** Terminal position of this layout's top-left cell, or null when not on screen. */
  protected screenOrigin(): Vec2 | null {
    const parent = this.parent;
    if (parent instanceof Layout) {
      const own = parent.childPosition(this);
      const outer = parent.screenOrigin();
      if (own === undefined || outer === null) return null;
      const view = parent.viewOrigin();
      return [outer[0] + own[0] - view[0], outer[1] + own[1] - view[1]];
    }
    return this.terminal?.widgetPosition(this) ?? null;
  }

  /** Field position shown at the layout's top-left cell. */
  protected viewOrigin(): Vec2 {
    return [0, 0];
  }

  /** Recomposites the whole field into `chars` and `colors`. */
  rebuild(): void {
    const [w, h] = this.field;
    const out = this.composite([0, 0], [w, h]);
    this.chars = out.chars;
    this.colors = out.colors;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isTickOver(event)) {
      this.rebuild();
      if (this.placedOnTerminal) this.terminal?.updateWidget(this);
    }
    return undefined;
  }

  override serialize(): SerialRecord {
    return serializationError(`${this.serialClass()} does not support serialization`);
  }

  protected override serialClass(): string {
    return "Layout";
  }

  /**
   * Resolves the visible cell for every position in the window: the
   * highest-z covering child whose char is not a space wins, the later one on
   * ties. If every covering child is a space there, the background shows.
   */
  protected composite(origin: Vec2, size: Vec2): { chars: CharGrid; colors: ColorGrid } {
    const [ox, oy] = origin;
    const [w, h] = size;
    const chars: CharGrid = [];
    const colors: ColorGrid = [];
    for (let vy = 0; vy < h; vy++) {
      const charRow: string[] = [];
      const colorRow: string[] = [];
      const y = oy + vy;
      for (let vx = 0; vx < w; vx++) {
        const x = ox + vx;
        const stack = this.coverage[y]?.[x] ?? [];
        let pickedChar: string | undefined;
        let pickedColor: string | undefined;
        let bestZ = Number.NEGATIVE_INFINITY;
        for (const child of stack) {
          const cell = this.cellOf(child, x, y);
          if (cell === undefined || cell.char === " ") continue;
          if (child.zLevel >= bestZ) {
            bestZ = child.zLevel;
            pickedChar = cell.char;
            pickedColor = cell.color;
          }
        }
        if (pickedChar === undefined) {
          const bottom = stack[0];
          const bg = bottom === undefined ? undefined : this.cellOf(bottom, x, y);
          pickedChar = bg?.char ?? " ";
          pickedColor = bg?.color ?? "";
        }
        charRow.push(pickedChar);
        colorRow.push(pickedColor ?? "");
      }
      chars.push(charRow);
      colors.push(colorRow);
    }
    return { chars, colors };
  }

  /** Children covering a field cell, bottom to top. Callers must not mutate it. */
  protected coverageAt(x: number, y: number): readonly Widget[] {
    return this.coverage[y]?.[x] ?? [];
  }

  private cellOf(child: Widget, x: number, y: number): { char: string; color: string } | undefined {
    const pos = this.childLocations.get(child);
    if (pos === undefined) return undefined;
    const char = child.chars[y - pos[1]]?.[x - pos[0]];
    if (char === undefined) return undefined;
    return { char, color: child.colors[y - pos[1]]?.[x - pos[0]] ?? "" };
  }

  private uncover(child: Widget, pos: Vec2): void {
    const [x, y] = pos;
    for (let dy = 0; dy < child.height; dy++) {
      const row = this.coverage[y + dy];
      if (row === undefined) continue;
      for (let dx = 0; dx < child.width; dx++) {
        const stack = row[x + dx];
        if (stack === undefined) continue;
        const idx = stack.lastIndexOf(child);
        if (idx >= 0) stack.splice(idx, 1);
      }
    }
  }
}
