/**
 * packages/core/src/terminal/terminal.ts — Widget placement and input translation over a backend.
 *
 * Why: The terminal is the root every widget tree hangs from. It owns one
 * cell-pointer grid per layer so it can refuse overlapping widgets within a
 * layer and answer "what is drawn here", and it turns the backend's raw input
 * codes into `key_down`/`key_up`/`misc_input` events.
 *
 * Held keys repeat: every `checkInput()` emits `key_down` for each key that
 * has been pressed and not yet released, so listeners see one per tick and
 * pace themselves.
 */

import { backendError, invalidConfig, layoutError } from "../errors.js";
import { type GlyphEvent, createEvent } from "../events/types.js";
import type { Vec2 } from "../geometry/grid.js";
import { type Logger, silentLogger } from "../logging.js";
import type { Widget, WidgetSurface } from "../widgets/widget.js";
import type { TerminalBackend } from "./backend.js";
import { type TerminalOptions, renderTerminalOptions } from "./config.js";
import { decodeInput, stateCode } from "./keyCodes.js";

export const MAX_LAYERS = 256;

export type WidgetLocation = Readonly<{ pos: Vec2; layer: number }>;

export type TerminalConfig = Readonly<{
  /** Font file handed to backends that render glyphs themselves. */
  fontPath?: string;
  options?: TerminalOptions;
  defaultColor?: string;
  logger?: Logger;
}>;

export class Terminal implements WidgetSurface {
  readonly backend: TerminalBackend;
  readonly defaultColor: string;
  private readonly fontPath: string | null;
  private readonly optionString: string | null;
  private readonly logger: Logger;
  private readonly locations = new Map<Widget, WidgetLocation>();
  /** `layers.get(layer)[y][x]`: the widget drawn in that cell. */
  private readonly layers = new Map<number, (Widget | null)[][]>();
  private readonly pressed = new Set<string>();
  private opened = false;

  constructor(backend: TerminalBackend, config: TerminalConfig = {}) {
    this.backend = backend;
    this.fontPath = config.fontPath ?? null;
    this.optionString = renderTerminalOptions(config.options ?? {});
    this.defaultColor = config.defaultColor ?? "white";
    this.logger = config.logger ?? silentLogger;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /** Widgets currently placed, with their positions and layers. */
  get widgets(): ReadonlyMap<Widget, WidgetLocation> {
    return this.locations;
  }

  /** Opens the backend and applies the font and option settings. */
  start(): void {
    this.backend.open();
    this.opened = true;
    if (this.fontPath !== null) {
      this.backend.setConfig(`font: ${this.fontPath}, size=12x12, codepage=437`);
    }
    if (this.optionString !== null) this.backend.setConfig(this.optionString);
    this.logger.debug("terminal started", { options: this.optionString });
    this.refresh();
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.backend.close();
    this.logger.debug("terminal closed");
  }

  refresh(): void {
    this.backend.refresh();
  }

  /** Removes every widget but keeps the terminal open. */
  clear(): void {
    for (const widget of Array.from(this.locations.keys())) this.removeWidget(widget);
    this.refresh();
  }

  /** Places `widget` and draws it. Widgets in one layer may not overlap. */
  addWidget(widget: Widget, pos: Vec2 = [0, 0], layer = 0, refresh = false): void {
    if (this.locations.has(widget)) {
      layoutError("cannot add the same widget to a terminal twice");
    }
    if (!Number.isInteger(layer) || layer < 0 || layer >= MAX_LAYERS) {
      invalidConfig(`layer must be an integer in [0, ${String(MAX_LAYERS - 1)}], got ${String(layer)}`);
    }
    const grid = this.layerGrid(layer);
    const [x0, y0] = pos;
    const [ww, wh] = this.backend.windowSize();
    if (!Number.isInteger(x0) || !Number.isInteger(y0) || x0 < 0 || y0 < 0 || x0 + widget.width > ww || y0 + widget.height > wh) {
      layoutError(`widget does not fit into the window at (${String(x0)}, ${String(y0)})`);
    }
    for (let y = y0; y < y0 + widget.height; y++) {
      for (let x = x0; x < x0 + widget.width; x++) {
        if ((grid[y]?.[x] ?? null) !== null) {
          layoutError(`widgets cannot overlap within layer ${String(layer)}`);
        }
      }
    }
    widget.terminal = this;
    widget.parent = this;
    this.locations.set(widget, { pos: [x0, y0], layer });
    this.updateWidget(widget, refresh);
  }

  /** Erases and forgets `widget`; the widget object itself is untouched. */
  removeWidget(widget: Widget, refresh = false): void {
    const loc = this.requireLocation(widget);
    const [x0, y0] = loc.pos;
    this.backend.setLayer(loc.layer);
    this.backend.clearArea(x0, y0, widget.width, widget.height);
    const grid = this.layerGrid(loc.layer);
    for (let y = y0; y < y0 + widget.height; y++) {
      const row = grid[y];
      if (row === undefined) continue;
      for (let x = x0; x < x0 + widget.width; x++) {
        if (row[x] === widget) row[x] = null;
      }
    }
    this.locations.delete(widget);
    widget.terminal = null;
    widget.parent = null;
    if (refresh) this.refresh();
  }

  /** Moves within the widget's layer. */
  moveWidget(widget: Widget, pos: Vec2, refresh = false): void {
    const { layer } = this.requireLocation(widget);
    this.removeWidget(widget);
    this.addWidget(widget, pos, layer);
    if (refresh) this.refresh();
  }

  /** Redraws `widget` from its current chars and colors. */
  updateWidget(widget: Widget, refresh = false): void {
    const loc = this.requireLocation(widget);
    const [x0, y0] = loc.pos;
    const grid = this.layerGrid(loc.layer);
    this.backend.setLayer(loc.layer);
    this.backend.clearArea(x0, y0, widget.width, widget.height);
    let runningColor = this.defaultColor;
    for (let y = 0; y < widget.height; y++) {
      const chars = widget.chars[y];
      const colors = widget.colors[y];
      const pointers = grid[y0 + y];
      if (chars === undefined) continue;
      for (let x = 0; x < chars.length; x++) {
        const color = colors?.[x] ?? "";
        if (color.length > 0 && color !== runningColor) {
          runningColor = color;
          this.backend.setColor(color);
        }
        this.backend.putCell(x0 + x, y0 + y, chars[x] ?? " ");
        if (pointers !== undefined) pointers[x0 + x] = widget;
      }
    }
    if (runningColor !== this.defaultColor) this.backend.setColor(this.defaultColor);
    if (refresh) this.refresh();
  }

  /** Widget drawn at `pos` in `layer`, or in the topmost layer that has one. */
  getWidgetByPos(pos: Vec2, layer?: number): Widget | null {
    const [x, y] = pos;
    if (layer !== undefined) return this.layers.get(layer)?.[y]?.[x] ?? null;
    const ids = Array.from(this.layers.keys()).sort((a, b) => b - a);
    for (const id of ids) {
      const hit = this.layers.get(id)?.[y]?.[x] ?? null;
      if (hit !== null) return hit;
    }
    return null;
  }

  widgetPosition(widget: Widget): Vec2 | undefined {
    return this.locations.get(widget)?.pos;
  }

  widgetLocation(widget: Widget): WidgetLocation | undefined {
    return this.locations.get(widget);
  }

  /**
   * Drains the backend's input: `misc_input` and `key_up` events in arrival
   * order, then one `key_down` per held key.
   */
  checkInput(): GlyphEvent[] {
    const out: GlyphEvent[] = [];
    for (let code = this.backend.pollInput(); code !== null; code = this.backend.pollInput()) {
      const input = decodeInput(code);
      if (input === null) {
        backendError(`unknown input code ${String(code)}`);
      }
      switch (input.kind) {
        case "misc_input":
          out.push(createEvent("misc_input", input.name));
          break;
        case "key_down":
          this.pressed.add(input.name);
          break;
        case "key_up":
          this.pressed.delete(input.name);
          out.push(createEvent("key_up", input.name));
          break;
      }
    }
    for (const name of this.pressed) out.push(createEvent("key_down", name));
    return out;
  }

  /** Named input state such as `"TK_MOUSE_X"` or `"TK_SHIFT"`. */
  checkState(name: string): number {
    const code = stateCode(name);
    if (code === undefined) {
      invalidConfig(`unknown state name "${name}"`);
    }
    return this.backend.queryState(code);
  }

  private requireLocation(widget: Widget): WidgetLocation {
    const loc = this.locations.get(widget);
    if (loc === undefined) {
      layoutError("widget is not on this terminal");
    }
    return loc;
  }

  private layerGrid(layer: number): (Widget | null)[][] {
    const existing = this.layers.get(layer);
    if (existing !== undefined) return existing;
    const [w, h] = this.backend.windowSize();
    const grid: (Widget | null)[][] = [];
    for (let y = 0; y < h; y++) grid.push(new Array<Widget | null>(w).fill(null));
    this.layers.set(layer, grid);
    return grid;
  }
}
