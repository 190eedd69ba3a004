/**
 * packages/core/src/widgets/label.ts — Text labels and single-line input fields.
 *
 * Why: A label's size is fixed at construction like any widget's. Setting
 * new text re-renders into that area and fails loudly if it does not fit,
 * rather than growing the widget.
 */

import { invalidConfig } from "../errors.js";
import { type DispatchResult, type GlyphEvent, createEvent, isEventOf } from "../events/types.js";
import { type CharGrid, blit, copyShape, fillGrid } from "../geometry/grid.js";
import type { SerialRecord } from "../serial/types.js";
import keyChars from "./keyChars.json" with { type: "json" };
import { Widget } from "./widget.js";

export type Justification = "left" | "right" | "center";

export type LabelOptions = Readonly<{
  just?: Justification;
  color?: string;
  /** Defaults to the longest line of the initial text. */
  width?: number;
  /** Defaults to the line count of the initial text. */
  height?: number;
  zLevel?: number;
}>;

export function isJustification(v: unknown): v is Justification {
  return v === "left" || v === "right" || v === "center";
}

function justify(line: string, width: number, just: Justification): string {
  if (line.length >= width) return line;
  switch (just) {
    case "left":
      return line.padEnd(width);
    case "right":
      return line.padStart(width);
    case "center": {
      const leftWidth = width - Math.trunc((width - line.length) / 2);
      return line.padEnd(leftWidth).padStart(width);
    }
  }
}

/** Lays `text` out in a `width` x `height` block of chars. */
export function renderText(text: string, just: Justification, width?: number, height?: number): CharGrid {
  if (!isJustification(just)) {
    invalidConfig(`justification must be "left", "right" or "center", got ${JSON.stringify(just)}`);
  }
  const lines = text.split("\n");
  const w = width ?? Math.max(...lines.map((l) => l.length));
  const rows = lines.map((l) => Array.from(justify(l, w, just)));
  const h = height ?? rows.length;
  while (rows.length < h) rows.push(new Array<string>(w).fill(" "));
  return rows;
}

export class Label extends Widget {
  readonly color: string;
  private content: string;
  private justification: Justification;

  constructor(text: string, opts: LabelOptions = {}) {
    const just = opts.just ?? "left";
    const color = opts.color ?? "white";
    const chars = renderText(text, just, opts.width, opts.height);
    const { width, height } = opts;
    if ((width !== undefined && chars.some((row) => row.length > width)) || (height !== undefined && chars.length > height)) {
      invalidConfig("Label: text does not fit the given size");
    }
    super(chars, copyShape(chars, color), opts.zLevel ?? 0);
    this.color = color;
    this.content = text;
    this.justification = just;
    this.assertFits(text);
  }

  get text(): string {
    return this.content;
  }

  set text(value: string) {
    this.assertFits(value);
    const blank = fillGrid(this.width, this.height, " ");
    this.chars = blit(blank, renderText(value, this.justification, this.width, this.height), 0, 0);
    this.content = value;
    if (this.placedOnTerminal) this.terminal?.updateWidget(this);
  }

  get just(): Justification {
    return this.justification;
  }

  set just(value: Justification) {
    const chars = renderText(this.content, value, this.width, this.height);
    this.justification = value;
    this.chars = chars;
    if (this.placedOnTerminal) this.terminal?.updateWidget(this);
  }

  override serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      text: this.content,
      just: this.justification,
      color: this.color,
      width: this.width,
      height: this.height,
      z_level: this.zLevel,
    };
  }

  protected override serialClass(): string {
    return "Label";
  }

  private assertFits(text: string): void {
    const lines = text.split("\n");
    if (lines.length > this.height || lines.some((l) => l.length > this.width)) {
      invalidConfig(`text does not fit into a ${String(this.width)}x${String(this.height)} label`);
    }
  }
}

export type InputFieldOptions = Omit<LabelOptions, "width"> &
  Readonly<{
    width: number;
    name?: string;
    acceptInput?: boolean;
    finishing?: boolean;
  }>;

const PLAIN_CHARS: Readonly<Record<string, string>> = keyChars.plain;
const SHIFT_CHARS: Readonly<Record<string, string>> = keyChars.shift;

/** The key, and whether shift is held, that types a given character. */
export type KeyStroke = Readonly<{ name: string; shift: boolean }>;

const CHAR_KEYS = new Map<string, KeyStroke>();
for (const [symbol, ch] of Object.entries(PLAIN_CHARS)) {
  if (!symbol.startsWith("KP_") && !CHAR_KEYS.has(ch)) CHAR_KEYS.set(ch, { name: `TK_${symbol}`, shift: false });
}
for (const [symbol, ch] of Object.entries(SHIFT_CHARS)) {
  if (!CHAR_KEYS.has(ch)) CHAR_KEYS.set(ch, { name: `TK_${symbol}`, shift: true });
}

/** Inverse of the input field's key layout; null for characters it cannot type. */
export function keyForChar(ch: string): KeyStroke | null {
  if (/^[a-z0-9]$/.test(ch)) return { name: `TK_${ch.toUpperCase()}`, shift: false };
  if (/^[A-Z]$/.test(ch)) return { name: `TK_${ch}`, shift: true };
  return CHAR_KEYS.get(ch) ?? null;
}

/**
 * Single-line keyboard input over a QWERTY key layout. Enter finishes the
 * input and emits `text_input` with the field name and the typed text.
 */
export class InputField extends Label {
  readonly name: string;
  private acceptInput: boolean;
  private finishing: boolean;
  private shiftPressed = false;

  constructor(opts: InputFieldOptions) {
    if (!Number.isInteger(opts.width) || opts.width <= 0) {
      invalidConfig("InputField: width must be a positive integer");
    }
    super("", { ...opts, height: opts.height ?? 1 });
    this.name = opts.name ?? "Input field";
    this.acceptInput = opts.acceptInput ?? true;
    this.finishing = opts.finishing ?? false;
  }

  get accepting(): boolean {
    return this.acceptInput;
  }

  /** Stops input; `text_input` is emitted on the next delivered event. */
  finish(): void {
    this.acceptInput = false;
    this.finishing = true;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (this.finishing) {
      this.finishing = false;
      return createEvent("text_input", { field: this.name, text: this.text });
    }
    if (isEventOf(event, "key_up")) {
      if (event.value === "TK_SHIFT") this.shiftPressed = false;
      return undefined;
    }
    if (!this.acceptInput || !isEventOf(event, "key_down")) return undefined;
    const symbol = event.value.startsWith("TK_") ? event.value.slice(3) : event.value;
    switch (symbol) {
      case "BACKSPACE":
        this.text = this.text.slice(0, -1);
        return undefined;
      case "SHIFT":
        this.shiftPressed = true;
        return undefined;
      case "ENTER":
      case "RETURN":
        this.acceptInput = false;
        return createEvent("text_input", { field: this.name, text: this.text });
    }
    const ch = this.charFor(symbol);
    if (ch.length > 0 && this.text.length < this.width) this.text = this.text + ch;
    return undefined;
  }

  override serialize(): SerialRecord {
    return {
      ...super.serialize(),
      class: this.serialClass(),
      field_name: this.name,
      accept_input: this.acceptInput,
      finishing: this.finishing,
    };
  }

  protected override serialClass(): string {
    return "InputField";
  }

  private charFor(symbol: string): string {
    if (symbol.length === 1) {
      if (!this.shiftPressed) return symbol.toLowerCase();
      return SHIFT_CHARS[symbol] ?? symbol.toUpperCase();
    }
    if (this.shiftPressed) {
      const shifted = SHIFT_CHARS[symbol];
      if (shifted !== undefined) return shifted;
    }
    return PLAIN_CHARS[symbol] ?? "";
  }
}
