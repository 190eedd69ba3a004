/**
 * packages/core/src/widgets/counters.ts — Diagnostic readouts: frame rate and mouse position.
 *
 * Neither is serializable; they are meant for debug overlays outside the ECS.
 */

import { invalidConfig, serializationError } from "../errors.js";
import { type DispatchResult, type GlyphEvent, isEventOf } from "../events/types.js";
import { roundHalfEven } from "../geometry/rounding.js";
import type { SerialRecord } from "../serial/types.js";
import { Label, type LabelOptions } from "./label.js";

const FPS_SAMPLES = 100;

/** Shows 1 / (mean tick length) over the last 100 ticks, as three digits. */
export class FPSCounter extends Label {
  private readonly samples: number[] = [];

  constructor(opts: Omit<LabelOptions, "width" | "height"> = {}) {
    super("030", opts);
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (!isEventOf(event, "tick")) return undefined;
    this.samples.push(event.value);
    if (this.samples.length > FPS_SAMPLES) this.samples.shift();
    const total = this.samples.reduce((a, b) => a + b, 0);
    if (total <= 0) return undefined;
    const fps = Math.min(999, roundHalfEven(this.samples.length / total));
    this.text = String(fps).padStart(3, "0");
    return undefined;
  }

  override serialize(): SerialRecord {
    return serializationError("FPSCounter does not support serialization");
  }
}

/**
 * Shows the mouse cell as `XXXxYYY`. Needs a terminal to read the mouse
 * state from, and reads "000x000" until the mouse first moves.
 */
export class MousePosWidget extends Label {
  constructor(opts: Omit<LabelOptions, "width" | "height"> = {}) {
    super("000x000", opts);
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "misc_input") && event.value === "TK_MOUSE_MOVE") {
      this.text = this.mouseLine();
    }
    return undefined;
  }

  override serialize(): SerialRecord {
    return serializationError("MousePosWidget does not support serialization");
  }

  private mouseLine(): string {
    const terminal = this.terminal;
    if (terminal === null) {
      invalidConfig("MousePosWidget is not connected to a terminal");
    }
    const x = String(terminal.checkState("TK_MOUSE_X")).padStart(3, "0");
    const y = String(terminal.checkState("TK_MOUSE_Y")).padStart(3, "0");
    return `${x}x${y}`;
  }
}
