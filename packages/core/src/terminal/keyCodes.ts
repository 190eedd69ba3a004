/**
 * packages/core/src/terminal/keyCodes.ts — Raw input codes and their `TK_*` names.
 *
 * Why: Backends report input as integers; listeners only ever see the stable
 * string names. Key and mouse-button releases are the press code with the
 * TK_KEY_RELEASED bit set.
 */

import table from "./keyCodes.json" with { type: "json" };

export const TK_KEY_RELEASED = 0x100;

export type InputCodeKind = "key_down" | "key_up" | "misc_input";

export type DecodedInput = Readonly<{ kind: InputCodeKind; name: string }>;

function invert(names: Readonly<Record<string, number>>): ReadonlyMap<number, string> {
  const out = new Map<number, string>();
  for (const [name, code] of Object.entries(names)) out.set(code, name);
  return out;
}

/** Press codes of keys and mouse buttons, by name. */
export const KEY_CODES: Readonly<Record<string, number>> = Object.freeze({ ...table.keys });
/** Codes of non-key input (mouse motion, window events), by name. */
export const MISC_CODES: Readonly<Record<string, number>> = Object.freeze({ ...table.misc });
/** Every name the backend state query understands. */
export const STATE_CODES: Readonly<Record<string, number>> = Object.freeze({
  ...table.keys,
  ...table.misc,
  ...table.constants,
});

const DOWN_NAMES = invert(KEY_CODES);
const MISC_NAMES = invert(MISC_CODES);

/** Name and kind of a raw input code, or null if the code is not in the table. */
export function decodeInput(code: number): DecodedInput | null {
  const misc = MISC_NAMES.get(code);
  if (misc !== undefined) return { kind: "misc_input", name: misc };
  const down = DOWN_NAMES.get(code);
  if (down !== undefined) return { kind: "key_down", name: down };
  if ((code & TK_KEY_RELEASED) !== 0) {
    const up = DOWN_NAMES.get(code & ~TK_KEY_RELEASED);
    if (up !== undefined) return { kind: "key_up", name: up };
  }
  return null;
}

export function keyCode(name: string): number | undefined {
  return KEY_CODES[name];
}

export function releaseCode(name: string): number | undefined {
  const code = KEY_CODES[name];
  return code === undefined ? undefined : code | TK_KEY_RELEASED;
}

export function miscCode(name: string): number | undefined {
  return MISC_CODES[name];
}

export function stateCode(name: string): number | undefined {
  return STATE_CODES[name];
}
