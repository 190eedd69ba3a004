/**
 * packages/node/src/ansiBackend.ts — TerminalBackend over an ANSI terminal.
 *
 * Why: The core draws into numbered layers and reads integer input codes.
 * This backend keeps the layers in a LayeredCellBuffer, composites them on
 * `refresh()` and writes only the cells that changed since the last frame.
 * Input arrives asynchronously on stdin and is queued until the loop polls.
 *
 * Terminals report key presses but not releases. A key pressed during one
 * polling round is released at the start of the next, so every press is one
 * `key_down` followed by one `key_up`.
 */

import {
  type Cell,
  LayeredCellBuffer,
  type Logger,
  MISC_CODES,
  TK_KEY_RELEASED,
  type TerminalBackend,
  type Vec2,
  backendError,
  keyCode,
  miscCode,
  silentLogger,
  stateCode,
} from "@glyphbox/core";
import terminalSize from "terminal-size";
import { parseColor, sgrForeground } from "./colors.js";
import { InputDecoder, type InputToken } from "./inputDecoder.js";

export const ENTER_ALT_SCREEN = "\u001b[?1049h";
export const LEAVE_ALT_SCREEN = "\u001b[?1049l";
export const HIDE_CURSOR = "\u001b[?25l";
export const SHOW_CURSOR = "\u001b[?25h";
export const ENABLE_MOUSE = "\u001b[?1003h\u001b[?1006h";
export const DISABLE_MOUSE = "\u001b[?1003l\u001b[?1006l";
export const RESET_ATTRIBUTES = "\u001b[0m";
export const CLEAR_SCREEN = "\u001b[2J";

/** The parts of `process.stdin` the backend uses. */
export interface AnsiInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  off(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of `process.stdout` the backend uses. */
export interface AnsiOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(chunk: string): unknown;
  on?(event: "resize", listener: () => void): unknown;
  off?(event: "resize", listener: () => void): unknown;
}

export type AnsiBackendOptions = Readonly<{
  input?: AnsiInput | null;
  output?: AnsiOutput;
  /** Fixed window size; otherwise read from the output stream. */
  size?: Vec2;
  altScreen?: boolean;
  color?: boolean;
  mouse?: boolean;
  defaultColor?: string;
  logger?: Logger;
}>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/** Window size from the stream, then from `terminal-size`, then 80x24. */
export function detectWindowSize(output: AnsiOutput): Vec2 {
  const columns = toPositiveIntOr(output.columns, 0);
  const rows = toPositiveIntOr(output.rows, 0);
  if (columns > 0 && rows > 0) return [columns, rows];
  try {
    const size = terminalSize();
    return [toPositiveIntOr(size.columns, 80), toPositiveIntOr(size.rows, 24)];
  } catch {
    return [80, 24];
  }
}

function requireCode(code: number | undefined, name: string): number {
  if (code === undefined) backendError(`no input code for ${name}`);
  return code;
}

/** Press codes of keyboard keys, the only ones whose release is synthesized. */
function isKeyboardCode(code: number): boolean {
  return code < TK_KEY_RELEASED && !MISC.has(code) && !MOUSE_BUTTONS.has(code);
}

function sameCell(a: Cell | null, b: Cell | null): boolean {
  if (a === null || b === null) return a === b;
  return a.char === b.char && a.color === b.color;
}

const CODE_SHIFT = requireCode(keyCode("TK_SHIFT"), "TK_SHIFT");
const CODE_CLOSE = requireCode(miscCode("TK_CLOSE"), "TK_CLOSE");
const CODE_RESIZED = requireCode(miscCode("TK_RESIZED"), "TK_RESIZED");
const CODE_MOUSE_MOVE = requireCode(miscCode("TK_MOUSE_MOVE"), "TK_MOUSE_MOVE");
const CODE_MOUSE_SCROLL = requireCode(miscCode("TK_MOUSE_SCROLL"), "TK_MOUSE_SCROLL");
const MOUSE_BUTTONS: ReadonlySet<number> = new Set(
  ["TK_MOUSE_LEFT", "TK_MOUSE_MIDDLE", "TK_MOUSE_RIGHT"].map((name) => requireCode(keyCode(name), name)),
);
const MISC: ReadonlySet<number> = new Set(Object.values(MISC_CODES));
const STATE_WIDTH = requireCode(stateCode("TK_WIDTH"), "TK_WIDTH");
const STATE_HEIGHT = requireCode(stateCode("TK_HEIGHT"), "TK_HEIGHT");
const STATE_MOUSE_X = requireCode(stateCode("TK_MOUSE_X"), "TK_MOUSE_X");
const STATE_MOUSE_Y = requireCode(stateCode("TK_MOUSE_Y"), "TK_MOUSE_Y");
const STATE_MOUSE_WHEEL = requireCode(stateCode("TK_MOUSE_WHEEL"), "TK_MOUSE_WHEEL");

export class AnsiBackend implements TerminalBackend {
  private readonly input: AnsiInput | null;
  private readonly output: AnsiOutput;
  private readonly fixedSize: Vec2 | null;
  private readonly altScreen: boolean;
  private readonly color: boolean;
  private readonly mouse: boolean;
  private readonly defaultColor: string;
  private readonly logger: Logger;
  private readonly buffer: LayeredCellBuffer;
  private readonly decoder = new InputDecoder();
  private readonly queue: number[] = [];
  /** Key codes delivered in the current polling round. */
  private readonly delivered = new Set<number>();
  /** Key codes to release when the next round starts. */
  private releasing = new Set<number>();
  /** Mouse buttons report real releases; these are the ones held down. */
  private readonly buttonsDown = new Set<number>();
  /** Held-back input survived a whole round without being completed. */
  private stalePending = false;
  private readonly states = new Map<number, number>();
  private readonly configs: string[] = [];
  private presented: (Cell | null)[][] = [];
  private fullRedraw = true;
  private roundOpen = false;
  private opened = false;
  private readonly onData = (chunk: string | Buffer): void => {
    this.feed(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  };
  private readonly onResize = (): void => {
    this.resize(detectWindowSize(this.output));
  };

  constructor(opts: AnsiBackendOptions = {}) {
    this.input = opts.input === undefined ? process.stdin : opts.input;
    this.output = opts.output ?? process.stdout;
    this.fixedSize = opts.size ?? null;
    this.altScreen = opts.altScreen ?? true;
    this.color = opts.color ?? true;
    this.mouse = opts.mouse ?? true;
    this.defaultColor = opts.defaultColor ?? "white";
    this.logger = (opts.logger ?? silentLogger).child("ansi-backend");
    this.buffer = new LayeredCellBuffer(this.fixedSize ?? detectWindowSize(this.output), this.defaultColor);
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /** Option strings received through `setConfig`, in order. */
  get appliedConfigs(): readonly string[] {
    return this.configs;
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.fullRedraw = true;
    let prelude = HIDE_CURSOR;
    if (this.altScreen) prelude = ENTER_ALT_SCREEN + prelude;
    if (this.mouse) prelude += ENABLE_MOUSE;
    this.output.write(prelude);
    if (this.fixedSize === null) this.output.on?.("resize", this.onResize);
    const input = this.input;
    if (input !== null) {
      if (input.isTTY === true) input.setRawMode?.(true);
      input.setEncoding("utf8");
      input.on("data", this.onData);
      input.resume();
    }
    this.logger.debug("opened", { size: this.buffer.size, altScreen: this.altScreen, mouse: this.mouse });
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    const input = this.input;
    if (input !== null) {
      input.off("data", this.onData);
      if (input.isTTY === true) input.setRawMode?.(false);
      input.pause();
    }
    if (this.fixedSize === null) this.output.off?.("resize", this.onResize);
    let epilogue = RESET_ATTRIBUTES;
    if (this.mouse) epilogue += DISABLE_MOUSE;
    epilogue += SHOW_CURSOR;
    if (this.altScreen) epilogue += LEAVE_ALT_SCREEN;
    this.output.write(epilogue);
    this.logger.debug("closed");
  }

  /** Options have no terminal equivalent; they are kept for inspection. */
  setConfig(options: string): void {
    this.configs.push(options);
    this.logger.debug("config ignored", { options });
  }

  refresh(): void {
    if (!this.opened) return;
    const [w, h] = this.buffer.size;
    const full = this.fullRedraw;
    let out = full ? RESET_ATTRIBUTES + CLEAR_SCREEN : "";
    let written: string | null = null;
    let cursor: Vec2 | null = null;
    const next: (Cell | null)[][] = [];
    for (let y = 0; y < h; y++) {
      const row: (Cell | null)[] = [];
      for (let x = 0; x < w; x++) {
        const cell = this.buffer.visibleAt(x, y);
        row.push(cell);
        if (!full && sameCell(cell, this.presented[y]?.[x] ?? null)) continue;
        if (cursor === null || cursor[0] !== x || cursor[1] !== y) out += `\u001b[${String(y + 1)};${String(x + 1)}H`;
        const color = cell?.color ?? this.defaultColor;
        if (this.color && color !== written) {
          out += this.sgr(color);
          written = color;
        }
        out += cell?.char ?? " ";
        cursor = [x + 1, y];
      }
      next.push(row);
    }
    this.presented = next;
    this.fullRedraw = false;
    if (out.length > 0) this.output.write(out);
  }

  setLayer(layer: number): void {
    this.buffer.setLayer(layer);
  }

  setColor(color: string): void {
    this.buffer.setColor(color);
  }

  putCell(x: number, y: number, char: string): void {
    this.buffer.put(x, y, char);
  }

  clearArea(x: number, y: number, width: number, height: number): void {
    this.buffer.clearArea(x, y, width, height);
  }

  windowSize(): Vec2 {
    return this.buffer.size;
  }

  /**
   * Next queued code. The first call of a round releases the keys delivered
   * in the previous round; returning null ends the round.
   */
  pollInput(): number | null {
    if (!this.roundOpen) {
      this.roundOpen = true;
      if (this.stalePending) this.enqueueTokens(this.decoder.flush());
      this.stalePending = this.decoder.hasPending;
      const releases = Array.from(this.releasing, (code) => code | TK_KEY_RELEASED);
      this.releasing = new Set();
      this.queue.unshift(...releases);
    }
    const code = this.queue.shift();
    if (code === undefined) {
      this.roundOpen = false;
      for (const delivered of this.delivered) this.releasing.add(delivered);
      this.delivered.clear();
      return null;
    }
    if (isKeyboardCode(code)) this.delivered.add(code);
    return code;
  }

  queryState(code: number): number {
    if (code === STATE_WIDTH) return this.buffer.size[0];
    if (code === STATE_HEIGHT) return this.buffer.size[1];
    if (MOUSE_BUTTONS.has(code)) return this.buttonsDown.has(code) ? 1 : 0;
    if (isKeyboardCode(code)) return this.delivered.has(code) || this.releasing.has(code) ? 1 : 0;
    return this.states.get(code) ?? 0;
  }

  /** Decodes raw input text into queued codes; stdin data lands here. */
  feed(text: string): void {
    this.stalePending = false;
    this.enqueueTokens(this.decoder.push(text));
  }

  /** Adopts a new window size and repaints everything on the next refresh. */
  resize(size: Vec2): void {
    const [w, h] = this.buffer.size;
    if (w === size[0] && h === size[1]) return;
    this.buffer.resize(size);
    this.fullRedraw = true;
    this.queue.push(CODE_RESIZED);
    this.logger.debug("resized", { size });
  }

  private enqueueTokens(tokens: readonly InputToken[]): void {
    for (const token of tokens) this.enqueue(token);
  }

  private enqueue(token: InputToken): void {
    switch (token.kind) {
      case "close":
        this.queue.push(CODE_CLOSE);
        return;
      case "key": {
        const code = keyCode(token.name);
        if (code === undefined) {
          this.logger.debug("unmapped key", { name: token.name });
          return;
        }
        if (token.shift) this.queue.push(CODE_SHIFT);
        this.queue.push(code);
        return;
      }
      case "move":
        this.setMouse(token.x, token.y);
        this.queue.push(CODE_MOUSE_MOVE);
        return;
      case "wheel":
        this.setMouse(token.x, token.y);
        this.states.set(STATE_MOUSE_WHEEL, token.delta);
        this.queue.push(CODE_MOUSE_SCROLL);
        return;
      case "button": {
        this.setMouse(token.x, token.y);
        const code = requireCode(keyCode(token.name), token.name);
        if (token.pressed) {
          this.buttonsDown.add(code);
          this.queue.push(code);
        } else {
          this.buttonsDown.delete(code);
          this.queue.push(code | TK_KEY_RELEASED);
        }
        return;
      }
    }
  }

  private setMouse(x: number, y: number): void {
    this.states.set(STATE_MOUSE_X, x);
    this.states.set(STATE_MOUSE_Y, y);
  }

  private sgr(color: string): string {
    const rgb = parseColor(color) ?? parseColor(this.defaultColor);
    return rgb === null ? "\u001b[39m" : sgrForeground(rgb);
  }
}
