/**
 * packages/core/src/ecs/destructor.ts — Two-phase entity teardown.
 *
 * Why: Events that reference an entity may still be queued when it is told
 * to die. `destroy()` announces the death and silences the siblings at once,
 * but the components are only detached at end of tick, after everything
 * already in flight has been delivered.
 */

import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, createEvent, isTickOver } from "../events/types.js";
import { Component } from "./component.js";

export class DestructorComponent extends Component {
  static override readonly slot: string = "destructor";

  private destroying = false;

  constructor(dispatcher: EventDispatcher | null) {
    super(dispatcher, "destructor");
    this.subscribe("service");
  }

  get isDestroying(): boolean {
    return this.destroying;
  }

  /** Emits `ecs_destroy` and unsubscribes every sibling. Repeated calls are no-ops. */
  destroy(): void {
    if (this.destroying) return;
    const owner = this.requireOwner();
    const dispatcher = this.requireDispatcher();
    dispatcher.enqueue(createEvent("ecs_destroy", owner.id));
    for (const name of owner.components) {
      const component = owner.getSlot(name);
      if (component !== undefined && component !== this) dispatcher.unregister(component);
    }
    this.destroying = true;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (!this.destroying || !isTickOver(event)) return undefined;
    const owner = this.requireOwner();
    const dispatcher = this.requireDispatcher();
    for (const name of owner.components) {
      const component = owner.getSlot(name);
      if (component === undefined || component === this) continue;
      dispatcher.unregister(component);
      owner.removeComponent(name);
    }
    dispatcher.unregister(this);
    owner.removeComponent(this.name);
    return undefined;
  }

  protected override serialClass(): string {
    return "DestructorComponent";
  }
}
