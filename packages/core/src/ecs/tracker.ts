/**
 * packages/core/src/ecs/tracker.ts — Registry of live entities by id.
 *
 * Why: Components that react to another entity (a walker bumping into a wall)
 * only get its id from the event. The tracker is constructed by the
 * application and handed to whoever needs lookups; it learns entities from
 * `ecs_create` and forgets them on `ecs_destroy`.
 */

import { ecsError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, type Listener, isEventOf } from "../events/types.js";
import type { Entity } from "./entity.js";

const TRACKED_TYPES = ["ecs_create", "ecs_destroy"] as const;

export class EntityTracker implements Listener {
  private readonly entities = new Map<string, Entity>();
  private dispatcher: EventDispatcher | null = null;

  get size(): number {
    return this.entities.size;
  }

  get ids(): readonly string[] {
    return Array.from(this.entities.keys());
  }

  get attached(): boolean {
    return this.dispatcher !== null;
  }

  attach(dispatcher: EventDispatcher): void {
    if (this.dispatcher !== null) {
      ecsError("EntityTracker is already attached to a dispatcher");
    }
    dispatcher.register(this, TRACKED_TYPES);
    this.dispatcher = dispatcher;
  }

  /** Unsubscribes and forgets every entity. */
  detach(): void {
    this.dispatcher?.unregister(this, TRACKED_TYPES);
    this.dispatcher = null;
    this.entities.clear();
  }

  get(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  has(id: string): boolean {
    return this.entities.has(id);
  }

  /** Entities for which `predicate` holds, in creation order. */
  filter(predicate: (entity: Entity) => boolean): Entity[] {
    const out: Entity[] = [];
    for (const entity of this.entities.values()) {
      if (predicate(entity)) out.push(entity);
    }
    return out;
  }

  onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "ecs_create")) {
      this.entities.set(event.value.id, event.value);
    } else if (isEventOf(event, "ecs_destroy")) {
      this.entities.delete(event.value);
    }
    return undefined;
  }
}
