/**
 * packages/core/src/events/dispatcher.ts — FIFO event queue with typed subscriptions.
 *
 * Why: Every subsystem talks through one queue. Events a listener returns are
 * appended behind whatever is already pending instead of being delivered
 * recursively, so processing order is stable and cascades never grow the stack.
 *
 * Delivery iterates a snapshot of the subscriber list. A listener registered
 * while an event is being delivered does not see that event; a listener
 * unregistered mid-delivery is skipped if it has not been reached yet.
 */

import { describeValue, dispatchError } from "../errors.js";
import { type Logger, silentLogger } from "../logging.js";
import {
  BUILTIN_EVENT_TYPES,
  type DispatchResult,
  type EventSelector,
  type GlyphEvent,
  type Listener,
  createEvent,
  isEventRecord,
  isListener,
} from "./types.js";

export type EventDispatcherOptions = Readonly<{
  logger?: Logger;
}>;

export class EventDispatcher {
  private readonly subscribers = new Map<string, Listener[]>();
  private readonly queue: GlyphEvent[] = [];
  private readonly logger: Logger;
  private draining = false;

  constructor(opts: EventDispatcherOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    for (const type of BUILTIN_EVENT_TYPES) this.subscribers.set(type, []);
  }

  /** Registered event types, in registration order. */
  get eventTypes(): readonly string[] {
    return Object.freeze(Array.from(this.subscribers.keys()));
  }

  /** Number of events waiting to be delivered. */
  get pending(): number {
    return this.queue.length;
  }

  isRegisteredType(type: string): boolean {
    return this.subscribers.has(type);
  }

  /** Current subscribers of `type`, in delivery order. */
  listenersOf(type: string): readonly Listener[] {
    return Object.freeze((this.subscribers.get(type) ?? []).slice());
  }

  /**
   * Subscribe `listener` to the types picked by `selector`.
   * Registering for a type the listener already has is a no-op.
   */
  register(listener: Listener, selector: EventSelector = "all"): void {
    if (!isListener(listener)) {
      dispatchError(`register: ${describeValue(listener)} has no onEvent method`);
    }
    for (const type of this.resolveSelector(selector)) {
      const list = this.subscribers.get(type);
      if (list === undefined) {
        dispatchError(`register: unknown event type "${type}"`);
      }
      if (!list.includes(listener)) list.push(listener);
    }
  }

  /** Idempotent: types the listener is not subscribed to are skipped. */
  unregister(listener: Listener, selector: EventSelector = "all"): void {
    for (const type of this.resolveSelector(selector)) {
      const list = this.subscribers.get(type);
      if (list === undefined) {
        dispatchError(`unregister: unknown event type "${type}"`);
      }
      const idx = list.indexOf(listener);
      if (idx >= 0) list.splice(idx, 1);
    }
  }

  /** Makes `type` valid for enqueue and register. No listener is subscribed to it. */
  registerType(type: string): void {
    if (typeof type !== "string" || type.length === 0) {
      dispatchError(`registerType: event type must be a non-empty string, got ${describeValue(type)}`);
    }
    if (this.subscribers.has(type)) return;
    this.subscribers.set(type, []);
    this.logger.debug("event type registered", { type });
  }

  enqueue(event: GlyphEvent): void {
    if (!isEventRecord(event)) {
      dispatchError(`enqueue: ${describeValue(event)} is not an event`);
    }
    if (!this.subscribers.has(event.type)) {
      dispatchError(`enqueue: unknown event type "${event.type}"`);
    }
    this.queue.push(event);
  }

  /** Enqueues the `service: "queue_started"` signal. */
  startQueue(): void {
    this.queue.push(createEvent("service", "queue_started"));
  }

  /**
   * Delivers pending events, oldest first, until the queue is empty,
   * including events produced along the way.
   */
  drain(): void {
    if (this.draining) {
      dispatchError("drain: called from inside a listener");
    }
    this.draining = true;
    try {
      for (let event = this.queue.shift(); event !== undefined; event = this.queue.shift()) {
        this.deliver(event);
      }
    } finally {
      this.draining = false;
    }
  }

  private deliver(event: GlyphEvent): void {
    const live = this.subscribers.get(event.type);
    if (live === undefined || live.length === 0) return;
    for (const listener of live.slice()) {
      if (!live.includes(listener)) continue;
      this.accept(listener.onEvent(event), event.type);
    }
  }

  private accept(result: DispatchResult, sourceType: string): void {
    if (result === undefined || result === null) return;
    if (Array.isArray(result)) {
      for (const item of result) this.acceptOne(item, sourceType);
      return;
    }
    this.acceptOne(result, sourceType);
  }

  private acceptOne(item: unknown, sourceType: string): void {
    if (!isEventRecord(item)) {
      dispatchError(
        `listener for "${sourceType}" returned ${describeValue(item)}; expected nothing, an event or a list of events`,
      );
    }
    this.enqueue(item);
  }

  private resolveSelector(selector: EventSelector): readonly string[] {
    if (typeof selector !== "string") {
      if (!Array.isArray(selector)) {
        dispatchError(`event selector must be a string or a list, got ${describeValue(selector)}`);
      }
      return selector;
    }
    if (selector === "all") return Array.from(this.subscribers.keys());
    if (selector.startsWith("*")) {
      const mask = selector.slice(1);
      return Array.from(this.subscribers.keys()).filter((type) => type.includes(mask));
    }
    return [selector];
  }
}
