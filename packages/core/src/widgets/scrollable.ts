/**
 * packages/core/src/widgets/scrollable.ts — Windowed layouts and scroll bars.
 *
 * Why: A scrollable layout keeps coverage for its whole field but its own
 * grid is only the visible window, so it can sit in a parent layout or on a
 * terminal like any other widget of that size.
 */

import { invalidConfig, isGlyphError, layoutError, serializationError } from "../errors.js";
import { type DispatchResult, type GlyphEvent, isEventOf, isTickOver } from "../events/types.js";
import { type CharGrid, type ColorGrid, type Vec2, fillGrid, sliceGrid } from "../geometry/grid.js";
import { isIntVec2 } from "../geometry/rect.js";
import { roundHalfEven } from "../geometry/rounding.js";
import type { SerialRecord } from "../serial/types.js";
import { Layout } from "./layout.js";
import { Widget } from "./widget.js";

export type ViewOptions = Readonly<{
  viewPos?: Vec2;
  viewSize?: Vec2;
}>;

/**
 * A window of `size` cells onto a field, moved by its top-left corner.
 * Shared by every layout that shows part of its field.
 */
export class ViewWindow {
  private current: Vec2;
  readonly size: Vec2;
  private readonly field: Vec2;

  constructor(field: Vec2, opts: ViewOptions = {}) {
    const viewPos = opts.viewPos ?? [0, 0];
    const viewSize = opts.viewSize ?? [10, 10];
    const [fw, fh] = field;
    if (!isIntVec2(viewSize) || viewSize[0] <= 0 || viewSize[0] > fw || viewSize[1] <= 0 || viewSize[1] > fh) {
      layoutError("invalid view size");
    }
    this.field = field;
    this.size = [viewSize[0], viewSize[1]];
    if (!isIntVec2(viewPos) || !this.fits(viewPos)) {
      layoutError("initial view position is outside the scrollable layout");
    }
    this.current = [viewPos[0], viewPos[1]];
  }

  get pos(): Vec2 {
    return this.current;
  }

  scrollTo(pos: Vec2): void {
    if (!isIntVec2(pos)) {
      layoutError("view position must be two integers");
    }
    if (!this.fits(pos)) {
      layoutError(`cannot scroll to (${String(pos[0])}, ${String(pos[1])})`);
    }
    this.current = [pos[0], pos[1]];
  }

  scrollBy(shift: Vec2): void {
    this.scrollTo([this.current[0] + shift[0], this.current[1] + shift[1]]);
  }

  private fits(pos: Vec2): boolean {
    const [fw, fh] = this.field;
    return pos[0] >= 0 && pos[1] >= 0 && pos[0] + this.size[0] <= fw && pos[1] + this.size[1] <= fh;
  }
}

export class ScrollableLayout extends Layout {
  private readonly window: ViewWindow;

  /** `chars` and `colors` cover the whole field, not just the visible window. */
  constructor(chars: CharGrid, colors: ColorGrid, opts: ViewOptions = {}) {
    super(chars, colors);
    this.window = new ViewWindow(this.field, opts);
    this.rebuild();
  }

  get viewPos(): Vec2 {
    return this.window.pos;
  }

  get viewSize(): Vec2 {
    return this.window.size;
  }

  /** Moves the window's top-left corner to `pos` in field coordinates. */
  scrollTo(pos: Vec2): void {
    this.window.scrollTo(pos);
  }

  scrollBy(shift: Vec2): void {
    this.window.scrollBy(shift);
  }

  override rebuild(): void {
    const out = this.composite(this.window.pos, this.window.size);
    this.chars = out.chars;
    this.colors = out.colors;
  }

  protected override viewOrigin(): Vec2 {
    return this.window.pos;
  }

  protected override serialClass(): string {
    return "ScrollableLayout";
  }
}

export type ScrollBarOrientation = "vertical" | "horizontal";

export type ScrollBarOptions = Readonly<{
  orientation?: ScrollBarOrientation;
  length?: number;
  /** Track color, then thumb color. */
  colors?: readonly [string, string];
}>;

export class ScrollBar extends Widget {
  readonly orientation: ScrollBarOrientation;
  readonly length: number;
  private readonly trackColor: string;
  private readonly thumbColor: string;

  constructor(opts: ScrollBarOptions = {}) {
    const orientation = opts.orientation ?? "vertical";
    if (orientation !== "vertical" && orientation !== "horizontal") {
      invalidConfig(`ScrollBar: orientation must be "vertical" or "horizontal", got ${JSON.stringify(orientation)}`);
    }
    const length = opts.length ?? 10;
    if (!Number.isInteger(length) || length <= 0) {
      invalidConfig(`ScrollBar: length must be a positive integer, got ${String(length)}`);
    }
    const [trackColor, thumbColor] = opts.colors ?? ["gray", "white"];
    const w = orientation === "vertical" ? 1 : length;
    const h = orientation === "vertical" ? length : 1;
    super(fillGrid(w, h, "#"), fillGrid(w, h, trackColor));
    this.orientation = orientation;
    this.length = length;
    this.trackColor = trackColor;
    this.thumbColor = thumbColor;
  }

  /**
   * Paints the thumb. `position` is where it starts and `fraction` how long it
   * is, both as parts of the whole bar length.
   */
  showPos(position: number, fraction: number): void {
    const start = Math.max(0, roundHalfEven(this.length * position));
    const end = Math.min(this.length, start + roundHalfEven(this.length * fraction));
    const colors = fillGrid(this.width, this.height, this.trackColor);
    for (let i = start; i < end; i++) {
      const row = this.orientation === "vertical" ? colors[i] : colors[0];
      if (row === undefined) continue;
      row[this.orientation === "vertical" ? 0 : i] = this.thumbColor;
    }
    this.colors = colors;
  }

  override serialize(): SerialRecord {
    return serializationError("ScrollBar does not support serialization");
  }
}

export type InputScrollableOptions = ViewOptions &
  Readonly<{
    bottomBar?: boolean;
    rightBar?: boolean;
  }>;

/**
 * A scrollable window driven by the arrow keys, with optional scroll bars.
 * Space returns the view to the field origin. Children added after
 * construction go into the scrolled field.
 */
export class InputScrollable extends Layout {
  readonly scrollable: ScrollableLayout;
  readonly rightBar: ScrollBar | null;
  readonly bottomBar: ScrollBar | null;
  /** Unset while the layout's own children are being placed. */
  private forwarding?: boolean;

  constructor(chars: CharGrid, colors: ColorGrid, opts: InputScrollableOptions = {}) {
    const scrollable = new ScrollableLayout(chars, colors, opts);
    const [vw, vh] = scrollable.viewSize;
    const bottomBar = opts.bottomBar ?? false;
    const rightBar = opts.rightBar ?? false;
    const w = vw + (rightBar ? 1 : 0);
    const h = vh + (bottomBar ? 1 : 0);
    const bgChars = fillGrid(w, h, " ");
    const bgColors = fillGrid(w, h, "white");
    const viewChars = sliceGrid(chars, scrollable.viewPos, scrollable.viewSize);
    const viewColors = sliceGrid(colors, scrollable.viewPos, scrollable.viewSize);
    for (let y = 0; y < vh; y++) {
      for (let x = 0; x < vw; x++) {
        const bgRow = bgChars[y];
        const bgColorRow = bgColors[y];
        if (bgRow === undefined || bgColorRow === undefined) continue;
        bgRow[x] = viewChars[y]?.[x] ?? " ";
        bgColorRow[x] = viewColors[y]?.[x] ?? "white";
      }
    }
    super(bgChars, bgColors);
    this.scrollable = scrollable;
    this.addChild(scrollable, [0, 0]);
    this.rightBar = rightBar ? new ScrollBar({ orientation: "vertical", length: vh }) : null;
    this.bottomBar = bottomBar ? new ScrollBar({ orientation: "horizontal", length: vw }) : null;
    if (this.rightBar !== null) this.addChild(this.rightBar, [vw, 0]);
    if (this.bottomBar !== null) this.addChild(this.bottomBar, [0, vh]);
    this.forwarding = true;
    this.syncBars();
    this.rebuild();
  }

  override addChild(child: Widget, pos: Vec2, skipChecks = false): void {
    if (this.forwarding === true) {
      this.scrollable.addChild(child, pos, skipChecks);
      return;
    }
    super.addChild(child, pos, skipChecks);
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "key_down")) {
      const shift = SCROLL_KEYS[event.value];
      if (shift !== undefined) this.tryScroll(() => this.scrollable.scrollBy(shift));
      else if (event.value === "TK_SPACE") this.tryScroll(() => this.scrollable.scrollTo([0, 0]));
    }
    if (isTickOver(event)) this.scrollable.rebuild();
    return super.onEvent(event);
  }

  override serialize(): SerialRecord {
    return serializationError("InputScrollable does not support serialization");
  }

  private tryScroll(action: () => void): void {
    try {
      action();
    } catch (err) {
      // Scrolling past an edge leaves the view where it is.
      if (!isGlyphError(err, "GLYPH_LAYOUT_ERROR")) throw err;
      return;
    }
    this.syncBars();
  }

  private syncBars(): void {
    const [fw, fh] = this.scrollable.fieldSize;
    const [vx, vy] = this.scrollable.viewPos;
    const [vw, vh] = this.scrollable.viewSize;
    this.rightBar?.showPos(vy / fh, vh / fh);
    this.bottomBar?.showPos(vx / fw, vw / fw);
  }
}

const SCROLL_KEYS: Readonly<Record<string, Vec2>> = Object.freeze({
  TK_UP: [0, -1],
  TK_DOWN: [0, 1],
  TK_LEFT: [-1, 0],
  TK_RIGHT: [1, 0],
});
