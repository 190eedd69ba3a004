/**
 * packages/core/src/widgets/menu.ts — Boxed buttons and a keyboard/mouse menu of them.
 */

import { invalidConfig, layoutError, serializationError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, isEventOf, toEventList } from "../events/types.js";
import { generateBox } from "../geometry/box.js";
import { type Vec2, copyShape, fillGrid } from "../geometry/grid.js";
import type { SerialRecord } from "../serial/types.js";
import { Label } from "./label.js";
import { Layout } from "./layout.js";
import type { Widget } from "./widget.js";

export type MenuAction = () => DispatchResult;

export type MenuItemOptions = Readonly<{
  color?: string;
  highlightColor?: string;
}>;

/**
 * A label in a single-line box. It handles no input itself; a menu calls
 * {@link activate}, {@link highlight} and {@link unhighlight}.
 */
export class MenuItem extends Layout {
  readonly text: string;
  readonly action: MenuAction;
  readonly color: string;
  readonly highlightColor: string;

  constructor(text: string, action: MenuAction, opts: MenuItemOptions = {}) {
    if (typeof action !== "function") {
      invalidConfig("MenuItem: action must be a function");
    }
    const color = opts.color ?? "white";
    const label = new Label(text, { color });
    const frame = generateBox([label.width + 2, label.height + 2], "single");
    super(frame, copyShape(frame, color));
    this.addChild(label, [1, 1]);
    this.text = text;
    this.action = action;
    this.color = color;
    this.highlightColor = opts.highlightColor ?? "green";
    this.rebuild();
  }

  highlight(): void {
    this.background.colors = copyShape(this.background.colors, this.highlightColor);
    this.rebuild();
  }

  unhighlight(): void {
    this.background.colors = copyShape(this.background.colors, this.color);
    this.rebuild();
  }

  activate(): DispatchResult {
    return this.action();
  }

  override serialize(): SerialRecord {
    return serializationError("MenuItem does not support serialization");
  }
}

export type MenuWidgetOptions = Readonly<{
  items: readonly MenuItem[];
  header?: string;
  /** Frame and header color. */
  color?: string;
  /** Top-left corner of the first item. */
  itemsPos?: Vec2;
  /** Replaces the default double-line box; must be at least as big as the items need. */
  background?: Widget;
  /** Seconds between accepted key presses. */
  inputDelay?: number;
}>;

const MENU_EVENT_TYPES = Object.freeze(["tick", "key_down", "misc_input", "service"]);

/**
 * A vertical list of {@link MenuItem}s. Up/W and Down/S move the highlight,
 * Space/Enter or a left click activates; hovering highlights. Subscribes
 * itself to the dispatcher it is given.
 */
export class MenuWidget extends Layout {
  readonly items: readonly MenuItem[];
  readonly inputDelay: number;
  private currentDelay: number;
  private highlighted: number;

  constructor(dispatcher: EventDispatcher, opts: MenuWidgetOptions) {
    const items = opts.items.slice();
    if (items.length === 0) {
      invalidConfig("MenuWidget: at least one item is required");
    }
    const color = opts.color ?? "white";
    const itemsPos = opts.itemsPos ?? [2, 2];
    let w = 4;
    let h = 3;
    for (const item of items) {
      if (!(item instanceof MenuItem)) {
        invalidConfig("MenuWidget: items must be MenuItems");
      }
      h += item.height + 1;
      if (item.width > w - 4) w = item.width + 4;
    }
    const custom = opts.background;
    if (custom !== undefined && (custom.width < w || custom.height < h)) {
      layoutError("MenuWidget: background is too small for the items");
    }
    const bgChars = custom === undefined ? generateBox([w, h], "double") : fillGrid(custom.width, custom.height, " ");
    const bgColors = custom === undefined ? copyShape(bgChars, color) : fillGrid(custom.width, custom.height, "black");
    if (custom === undefined) {
      for (let y = 1; y < h - 1; y++) {
        const row = bgChars[y];
        const colorRow = bgColors[y];
        if (row === undefined || colorRow === undefined) continue;
        for (let x = 1; x < w - 1; x++) {
          row[x] = "█";
          colorRow[x] = "black";
        }
      }
    }
    super(bgChars, bgColors);
    if (custom !== undefined) this.background = custom;
    if (opts.header !== undefined) {
      if (opts.header.length > this.width - 2) {
        layoutError("MenuWidget: header is too long");
      }
      const header = new Label(opts.header, { color });
      this.addChild(header, [Math.round((this.width - header.width) / 2), 0]);
    }
    let y = itemsPos[1];
    for (const item of items) {
      this.addChild(item, [itemsPos[0], y]);
      y += item.height + 1;
    }
    this.items = Object.freeze(items);
    this.inputDelay = opts.inputDelay ?? 0.2;
    this.currentDelay = this.inputDelay;
    this.highlighted = 0;
    this.itemAt(0).highlight();
    this.rebuild();
    dispatcher.register(this, MENU_EVENT_TYPES);
  }

  get currentHighlight(): number {
    return this.highlighted;
  }

  set currentHighlight(value: number) {
    if (!Number.isInteger(value) || value < 0 || value >= this.items.length) {
      invalidConfig(`MenuWidget: no item ${String(value)}`);
    }
    this.itemAt(this.highlighted).unhighlight();
    this.highlighted = value;
    this.itemAt(value).highlight();
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    const own = this.handleInput(event);
    const base = super.onEvent(event);
    return [...toEventList(own), ...toEventList(base)];
  }

  override serialize(): SerialRecord {
    return serializationError("MenuWidget does not support serialization");
  }

  private handleInput(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "tick")) {
      if (this.currentDelay <= this.inputDelay) this.currentDelay += event.value;
      return undefined;
    }
    if (isEventOf(event, "key_down")) {
      if (this.currentDelay < this.inputDelay) return undefined;
      this.currentDelay = 0;
      switch (event.value) {
        case "TK_SPACE":
        case "TK_ENTER":
          return this.itemAt(this.highlighted).activate();
        case "TK_UP":
        case "TK_W":
          if (this.highlighted > 0) this.currentHighlight = this.highlighted - 1;
          return undefined;
        case "TK_DOWN":
        case "TK_S":
          if (this.highlighted < this.items.length - 1) this.currentHighlight = this.highlighted + 1;
          return undefined;
        case "TK_MOUSE_LEFT": {
          const idx = this.itemUnderMouse();
          if (idx === null) return undefined;
          this.currentHighlight = idx;
          return this.itemAt(idx).activate();
        }
      }
      return undefined;
    }
    if (isEventOf(event, "misc_input") && event.value === "TK_MOUSE_MOVE") {
      const idx = this.itemUnderMouse();
      if (idx !== null && idx !== this.highlighted) this.currentHighlight = idx;
    }
    return undefined;
  }

  /** Index of the item under the mouse, or null; mouse input is ignored off-terminal. */
  private itemUnderMouse(): number | null {
    const terminal = this.terminal;
    const origin = this.screenOrigin();
    if (terminal === null || origin === null) return null;
    const x = terminal.checkState("TK_MOUSE_X") - origin[0];
    const y = terminal.checkState("TK_MOUSE_Y") - origin[1];
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    const hit = this.getChildOnPos([x, y]);
    const idx = this.items.findIndex((item) => item === hit);
    return idx >= 0 ? idx : null;
  }

  private itemAt(index: number): MenuItem {
    const item = this.items[index];
    if (item === undefined) {
      invalidConfig(`MenuWidget: no item ${String(index)}`);
    }
    return item;
  }
}
