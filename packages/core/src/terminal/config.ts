/**
 * packages/core/src/terminal/config.ts — Terminal option validation and loop settings.
 *
 * Why: Backend options are a flat `section.key=value;` string. Callers pass a
 * plain object keyed by option name; the section each option lives in is
 * fixed here and anything unknown is rejected before the backend sees it.
 */

import { invalidConfig } from "../errors.js";

export type TerminalOptionValue = string | number | boolean | readonly string[];
export type TerminalOptions = Readonly<Record<string, TerminalOptionValue>>;

/** Accepted option names and the config section each belongs to. */
export const TERMINAL_OPTION_SECTIONS: Readonly<Record<string, string>> = Object.freeze({
  encoding: "terminal",
  size: "window",
  cellsize: "window",
  title: "window",
  icon: "window",
  resizeable: "window",
  fullscreen: "window",
  filter: "input",
  "precise-mouse": "input",
  "mouse-cursor": "input",
  "cursor-symbol": "input",
  "cursor-blink-rate": "input",
  "alt-functions": "input",
  postformatting: "output",
  vsync: "output",
  "tab-width": "output",
  file: "log",
  level: "log",
  mode: "log",
});

function formatOptionValue(value: TerminalOptionValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return value.join(", ");
}

/**
 * Renders options as `section.key=value;...;`, in insertion order.
 * Returns null for an empty option set.
 */
export function renderTerminalOptions(options: TerminalOptions): string | null {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(options)) {
    const section = TERMINAL_OPTION_SECTIONS[key];
    if (section === undefined) {
      invalidConfig(`unknown terminal option "${key}"`);
    }
    parts.push(`${section}.${key}=${formatOptionValue(value)}`);
  }
  return parts.length === 0 ? null : `${parts.join(";")};`;
}

export type LoopConfig = Readonly<{
  fps: number;
}>;

export const DEFAULT_LOOP_CONFIG: LoopConfig = Object.freeze({ fps: 30 });

export function requirePositiveInt(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) {
    invalidConfig(`${name} must be a positive integer, got ${String(v)}`);
  }
  return v;
}

export function resolveLoopConfig(opts: Partial<LoopConfig> = {}): LoopConfig {
  return Object.freeze({
    fps: opts.fps === undefined ? DEFAULT_LOOP_CONFIG.fps : requirePositiveInt("fps", opts.fps),
  });
}
