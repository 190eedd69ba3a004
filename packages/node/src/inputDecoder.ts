/**
 * packages/node/src/inputDecoder.ts — Raw-mode stdin bytes to key and mouse tokens.
 *
 * Why: A terminal in raw mode sends printable chars, control bytes, CSI/SS3
 * escape sequences for special keys and SGR reports for the mouse. The
 * decoder names them with the same `TK_*` keys the core uses. A sequence cut
 * in half by a chunk boundary is held until the next chunk completes it.
 */

import { keyForChar } from "@glyphbox/core";

export type MouseButton = "TK_MOUSE_LEFT" | "TK_MOUSE_MIDDLE" | "TK_MOUSE_RIGHT";

export type InputToken =
  | Readonly<{ kind: "key"; name: string; shift: boolean }>
  | Readonly<{ kind: "button"; name: MouseButton; pressed: boolean; x: number; y: number }>
  | Readonly<{ kind: "move"; x: number; y: number }>
  | Readonly<{ kind: "wheel"; delta: number; x: number; y: number }>
  | Readonly<{ kind: "close" }>;

const CSI_FINAL: Readonly<Record<string, string>> = Object.freeze({
  A: "TK_UP",
  B: "TK_DOWN",
  C: "TK_RIGHT",
  D: "TK_LEFT",
  H: "TK_HOME",
  F: "TK_END",
  P: "TK_F1",
  Q: "TK_F2",
  R: "TK_F3",
  S: "TK_F4",
  Z: "TK_TAB",
});

const CSI_TILDE: Readonly<Record<string, string>> = Object.freeze({
  "1": "TK_HOME",
  "2": "TK_INSERT",
  "3": "TK_DELETE",
  "4": "TK_END",
  "5": "TK_PAGEUP",
  "6": "TK_PAGEDOWN",
  "7": "TK_HOME",
  "8": "TK_END",
  "15": "TK_F5",
  "17": "TK_F6",
  "18": "TK_F7",
  "19": "TK_F8",
  "20": "TK_F9",
  "21": "TK_F10",
  "23": "TK_F11",
  "24": "TK_F12",
});

const SGR_MOUSE = /^\u001b\[<(\d+);(\d+);(\d+)([Mm])/;
const SGR_MOUSE_PREFIX = /^\u001b\[<[\d;]*$/;
const CSI = /^\u001b\[([\d;]*)([A-Za-z~])/;
const CSI_PREFIX = /^\u001b\[[\d;]*$/;
const SS3 = /^\u001bO([A-DFHP-S])/;

type Step = Readonly<{ tokens: readonly InputToken[]; length: number }>;

function key(name: string, shift = false): InputToken {
  return { kind: "key", name, shift };
}

function mouseToken(code: number, col: number, row: number, final: string): InputToken | null {
  const x = col - 1;
  const y = row - 1;
  if ((code & 64) !== 0) return { kind: "wheel", delta: (code & 1) === 0 ? -1 : 1, x, y };
  if ((code & 32) !== 0) return { kind: "move", x, y };
  const button = code & 3;
  const name: MouseButton | null =
    button === 0 ? "TK_MOUSE_LEFT" : button === 1 ? "TK_MOUSE_MIDDLE" : button === 2 ? "TK_MOUSE_RIGHT" : null;
  if (name === null) return null;
  return { kind: "button", name, pressed: final === "M", x, y };
}

export class InputDecoder {
  private pending = "";

  /** True while an incomplete escape sequence is held back. */
  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  push(chunk: string): InputToken[] {
    const text = this.pending + chunk;
    this.pending = "";
    const out: InputToken[] = [];
    let i = 0;
    while (i < text.length) {
      const step = this.step(text.slice(i));
      if (step === null) {
        this.pending = text.slice(i);
        break;
      }
      out.push(...step.tokens);
      i += step.length;
    }
    return out;
  }

  /** Gives up on held-back input: an escape nothing followed was the Escape key. */
  flush(): InputToken[] {
    const held = this.pending;
    this.pending = "";
    return held.length > 0 ? [key("TK_ESCAPE")] : [];
  }

  /** Decodes the token at the start of `rest`, or null if more input is needed. */
  private step(rest: string): Step | null {
    const ch = rest.charAt(0);
    if (ch === "\u001b") return this.escape(rest);
    switch (ch) {
      case "\u0003":
        return { tokens: [{ kind: "close" }], length: 1 };
      case "\r":
        return { tokens: [key("TK_ENTER")], length: rest.charAt(1) === "\n" ? 2 : 1 };
      case "\n":
        return { tokens: [key("TK_ENTER")], length: 1 };
      case "\t":
        return { tokens: [key("TK_TAB")], length: 1 };
      case "\u007f":
      case "\b":
        return { tokens: [key("TK_BACKSPACE")], length: 1 };
    }
    const cp = rest.codePointAt(0) ?? 0;
    const length = cp > 0xffff ? 2 : 1;
    if (cp < 0x20) return { tokens: [], length };
    const stroke = keyForChar(rest.slice(0, length));
    return { tokens: stroke === null ? [] : [key(stroke.name, stroke.shift)], length };
  }

  private escape(rest: string): Step | null {
    if (rest.length === 1) return null;
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse !== null) {
      const [seq = "", code = "0", col = "1", row = "1", final = "M"] = mouse;
      const token = mouseToken(Number(code), Number(col), Number(row), final);
      return { tokens: token === null ? [] : [token], length: seq.length };
    }
    if (SGR_MOUSE_PREFIX.test(rest) || CSI_PREFIX.test(rest)) return null;
    const csi = CSI.exec(rest);
    if (csi !== null) {
      const [seq = "", params = "", final = ""] = csi;
      const [first = "", modifier = "1"] = params.split(";");
      const shift = ((Number(modifier) - 1) & 1) === 1 || final === "Z";
      const name = final === "~" ? CSI_TILDE[first] : CSI_FINAL[final];
      return { tokens: name === undefined ? [] : [key(name, shift)], length: seq.length };
    }
    const ss3 = SS3.exec(rest);
    if (ss3 !== null) {
      const [seq = "", final = ""] = ss3;
      const name = CSI_FINAL[final];
      return { tokens: name === undefined ? [] : [key(name)], length: seq.length };
    }
    if (rest === "\u001bO") return null;
    // Escape followed by anything else is Escape, then that input.
    return { tokens: [key("TK_ESCAPE")], length: 1 };
  }
}
