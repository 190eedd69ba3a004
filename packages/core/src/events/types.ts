/**
 * packages/core/src/events/types.ts — Event records and the built-in taxonomy.
 *
 * Why: Listeners narrow on `event.type` and get a typed `value` for every
 * built-in type. Custom types registered at run time carry `unknown` values
 * and are narrowed by the listener that owns them.
 */

import type { Entity } from "../ecs/entity.js";
import type { Vec2 } from "../geometry/grid.js";

/**
 * Loop and queue lifecycle signals carried by `service` events.
 * - queue_started: the dispatcher was started
 * - tick_over: every event of the current tick has been delivered
 * - shutdown_ready: a close was requested; listeners may save state
 * - shutdown: the loop stops after the current tick
 */
export type ServiceSignal = "queue_started" | "tick_over" | "shutdown_ready" | "shutdown";

export type EntityPosition = Readonly<{ id: string; x: number; y: number }>;

/** `other === null` means the mover hit the layout border. */
export type EntityCollision = Readonly<{ mover: string; other: string | null }>;

export type TextInput = Readonly<{ field: string; text: string }>;

export interface BuiltinEventMap {
  /** Seconds since the previous tick. */
  tick: number;
  /** `TK_*` key name. Repeated every tick while the key is held. */
  key_down: string;
  key_up: string;
  misc_input: string;
  text_input: TextInput;
  play_sound: string;
  /** `null` stops background sound. */
  set_bg_sound: string | null;
  service: ServiceSignal;
  ecs_create: Entity;
  ecs_move: EntityPosition;
  ecs_add: EntityPosition;
  ecs_remove: string;
  ecs_destroy: string;
  ecs_collision: EntityCollision;
  ecs_update: null;
  ecs_scroll_by: Vec2;
  ecs_scroll_to: Vec2;
}

export type BuiltinEventType = keyof BuiltinEventMap;

export const BUILTIN_EVENT_TYPES: readonly BuiltinEventType[] = Object.freeze([
  "tick",
  "key_down",
  "key_up",
  "misc_input",
  "text_input",
  "play_sound",
  "set_bg_sound",
  "service",
  "ecs_create",
  "ecs_move",
  "ecs_collision",
  "ecs_add",
  "ecs_destroy",
  "ecs_remove",
  "ecs_scroll_by",
  "ecs_scroll_to",
  "ecs_update",
]);

export type EventValue<T extends string> = T extends BuiltinEventType ? BuiltinEventMap[T] : unknown;

/** Immutable `{ type, value }` record. Distributes over unions of types. */
export type GlyphEvent<T extends string = string> = T extends string
  ? Readonly<{ type: T; value: EventValue<T> }>
  : never;

/** A built-in event with its value type resolved. */
export type BuiltinEvent<T extends BuiltinEventType> = Readonly<{ type: T; value: BuiltinEventMap[T] }>;

/** What a listener may hand back to the dispatcher. */
export type DispatchResult = void | GlyphEvent | readonly GlyphEvent[];

export interface Listener {
  onEvent(event: GlyphEvent): DispatchResult;
}

/** "all", "*<substring>", one type, or an explicit list. */
export type EventSelector = "all" | string | readonly string[];

export function createEvent<T extends BuiltinEventType>(type: T, value: BuiltinEventMap[T]): BuiltinEvent<T>;
export function createEvent(type: string, value?: unknown): GlyphEvent;
export function createEvent(type: string, value: unknown = null): GlyphEvent {
  return Object.freeze({ type, value });
}

export function isEventOf<T extends BuiltinEventType>(event: GlyphEvent, type: T): event is BuiltinEvent<T> {
  return event.type === type;
}

export function isService(event: GlyphEvent, signal: ServiceSignal): boolean {
  return event.type === "service" && event.value === signal;
}

export function isTickOver(event: GlyphEvent): boolean {
  return isService(event, "tick_over");
}

export function isListener(v: unknown): v is Listener {
  return typeof v === "object" && v !== null && "onEvent" in v && typeof v.onEvent === "function";
}

/** Structural check for values returned by listeners. */
export function isEventRecord(v: unknown): v is GlyphEvent {
  return (
    typeof v === "object" &&
    v !== null &&
    !Array.isArray(v) &&
    "type" in v &&
    typeof v.type === "string" &&
    "value" in v
  );
}

export function isEventList(result: DispatchResult): result is readonly GlyphEvent[] {
  return Array.isArray(result);
}

/** Flattens a listener result into a (possibly empty) list. */
export function toEventList(result: DispatchResult): readonly GlyphEvent[] {
  if (isEventList(result)) return result;
  if (isEventRecord(result)) return [result];
  return [];
}
