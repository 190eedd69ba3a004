/**
 * packages/core/src/terminal/loop.ts — The tick loop.
 *
 * Each tick: poll input → enqueue input events → enqueue `tick(dt)` → drain →
 * enqueue `service: "tick_over"` → drain → refresh → sleep out the rest of the
 * frame. The stop flag is only read between ticks, so a tick always completes.
 */

import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, type Listener, createEvent, isService } from "../events/types.js";
import { type Logger, silentLogger } from "../logging.js";
import { type LoopConfig, requirePositiveInt, resolveLoopConfig } from "./config.js";
import type { Terminal } from "./terminal.js";

/** Time source in seconds. */
export interface LoopClock {
  now(): number;
  sleep(seconds: number): Promise<void>;
}

export const systemClock: LoopClock = Object.freeze({
  now: () => Date.now() / 1000,
  sleep: (seconds: number) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, Math.max(0, seconds * 1000));
    }),
});

export type GlyphLoopOptions = Partial<LoopConfig> &
  Readonly<{
    clock?: LoopClock;
    logger?: Logger;
  }>;

export class GlyphLoop implements Listener {
  readonly terminal: Terminal;
  readonly dispatcher: EventDispatcher;
  private readonly clock: LoopClock;
  private readonly logger: Logger;
  private frameTime: number;
  private stopped = false;
  private running = false;
  private ticks = 0;

  constructor(terminal: Terminal, dispatcher: EventDispatcher, opts: GlyphLoopOptions = {}) {
    const config = resolveLoopConfig(opts);
    this.terminal = terminal;
    this.dispatcher = dispatcher;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
    this.frameTime = 1 / config.fps;
    dispatcher.register(this, "service");
  }

  get fps(): number {
    return Math.round(1 / this.frameTime);
  }

  set fps(value: number) {
    this.frameTime = 1 / requirePositiveInt("fps", value);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Completed ticks since construction. */
  get tickCount(): number {
    return this.ticks;
  }

  /** Runs ticks until stopped, then closes the terminal. */
  async run(): Promise<void> {
    this.stopped = false;
    this.running = true;
    this.logger.info("loop started", { fps: this.fps });
    let last = this.clock.now() - this.frameTime;
    try {
      while (!this.stopped) {
        const start = this.clock.now();
        this.runIteration(start - last);
        last = start;
        const remaining = this.frameTime - (this.clock.now() - start);
        if (!this.stopped && remaining > 0.05 * this.frameTime) {
          await this.clock.sleep(remaining);
        }
      }
    } finally {
      this.running = false;
      this.terminal.close();
      this.logger.info("loop stopped", { ticks: this.ticks });
    }
  }

  /** Requests a stop after the current tick. */
  stop(): void {
    this.stopped = true;
  }

  /** One full tick with `dt` seconds of elapsed time. */
  runIteration(dt: number): void {
    for (const event of this.terminal.checkInput()) this.dispatcher.enqueue(event);
    this.dispatcher.enqueue(createEvent("tick", dt));
    this.dispatcher.drain();
    this.dispatcher.enqueue(createEvent("service", "tick_over"));
    this.dispatcher.drain();
    this.terminal.refresh();
    this.ticks += 1;
  }

  onEvent(event: GlyphEvent): DispatchResult {
    if (isService(event, "shutdown")) this.stop();
    return undefined;
  }
}
