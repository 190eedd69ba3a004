/**
 * packages/core/src/ecs/component.ts — Base class for entity components.
 *
 * Why: A component is the only place entity behavior lives. Each one decides
 * which event types it subscribes to, and it is attached to exactly one
 * entity under a slot name shared by every class playing the same role.
 */

import { ecsError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import type { DispatchResult, EventSelector, GlyphEvent, Listener } from "../events/types.js";
import type { SerialRecord, Serializable } from "../serial/types.js";
import type { Entity } from "./entity.js";

/**
 * A component class usable as a typed slot key: `entity.get(PositionComponent)`.
 */
export type ComponentClass<C extends Component> = (abstract new (...args: never[]) => C) & { readonly slot: string };

export class Component implements Listener, Serializable {
  /** Slot name for instances of this class. Subclasses in the same role keep it. */
  static readonly slot: string = "component";

  readonly name: string;
  owner: Entity | null = null;
  protected readonly eventDispatcher: EventDispatcher | null;
  private readonly subscriptions: EventSelector[] = [];
  private detached = false;

  constructor(dispatcher: EventDispatcher | null, name: string) {
    if (typeof name !== "string" || name.length === 0) {
      ecsError("cannot create a component without a name");
    }
    this.eventDispatcher = dispatcher;
    this.name = name;
  }

  get dispatcher(): EventDispatcher | null {
    return this.eventDispatcher;
  }

  /**
   * Called by the entity when the component takes a slot. A component that
   * was detached earlier gets its subscriptions back.
   */
  attach(owner: Entity): void {
    this.owner = owner;
    if (!this.detached) return;
    this.detached = false;
    for (const selector of this.subscriptions) this.eventDispatcher?.register(this, selector);
  }

  /** Called by the entity when the component leaves its slot; it stops receiving events. */
  detach(): void {
    this.owner = null;
    this.detached = true;
    this.eventDispatcher?.unregister(this);
  }

  onEvent(_event: GlyphEvent): DispatchResult {
    return undefined;
  }

  serialize(): SerialRecord {
    return { class: this.serialClass() };
  }

  /** Registry name used as the `class` discriminator. */
  protected serialClass(): string {
    return "Component";
  }

  /** The owning entity; components that need one fail loudly without it. */
  protected requireOwner(): Entity {
    if (this.owner === null) {
      ecsError(`${this.serialClass()} "${this.name}" is not attached to an entity`);
    }
    return this.owner;
  }

  /** Registers with the dispatcher, if any, and remembers the selector for re-attachment. */
  protected subscribe(selector: EventSelector): void {
    this.subscriptions.push(selector);
    this.eventDispatcher?.register(this, selector);
  }

  protected requireDispatcher(): EventDispatcher {
    if (this.eventDispatcher === null) {
      ecsError(`${this.serialClass()} "${this.name}" has no dispatcher`);
    }
    return this.eventDispatcher;
  }
}
