/**
 * packages/core/src/widgets/listeners.ts — Non-visual listeners for the event queue.
 */

import { describeValue } from "../errors.js";
import { type DispatchResult, type GlyphEvent, type Listener, createEvent, isEventOf } from "../events/types.js";

/**
 * Turns a window close (`misc_input: TK_CLOSE`) into `service: shutdown_ready`
 * right away and `service: shutdown` two ticks later, giving listeners a tick
 * to save their state.
 */
export class ClosingListener implements Listener {
  private countdown = 2;
  private counting = false;

  get closing(): boolean {
    return this.counting;
  }

  onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "misc_input") && event.value === "TK_CLOSE") {
      if (this.counting) return undefined;
      this.counting = true;
      return createEvent("service", "shutdown_ready");
    }
    if (isEventOf(event, "tick") && this.counting) {
      this.countdown -= 1;
      if (this.countdown === 0) return createEvent("service", "shutdown");
    }
    return undefined;
  }
}

export interface TextSink {
  write(chunk: string): unknown;
}

export type LoggingListenerOptions = Readonly<{
  /** Seconds since the epoch; defaults to the wall clock. */
  now?: () => number;
}>;

/** Writes `<time>: type <type>, value <value>` for every event it receives. */
export class LoggingListener implements Listener {
  private readonly sink: TextSink;
  private readonly now: () => number;

  constructor(sink: TextSink, opts: LoggingListenerOptions = {}) {
    this.sink = sink;
    this.now = opts.now ?? (() => Date.now() / 1000);
  }

  onEvent(event: GlyphEvent): DispatchResult {
    this.sink.write(`${String(this.now())}: type ${event.type}, value ${formatEventValue(event.value)}\n`);
    return undefined;
  }
}

/** Primitives print as-is, plain data as JSON, anything else by class name. */
export function formatEventValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (typeof value !== "object") return String(value);
  const proto: unknown = Object.getPrototypeOf(value);
  if (Array.isArray(value) || proto === Object.prototype || proto === null) {
    return JSON.stringify(value);
  }
  return describeValue(value);
}
