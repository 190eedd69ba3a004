/**
 * packages/core/src/ecs/entity.ts — An identified bag of components.
 *
 * Why: Entities have no behavior of their own. Components live in named slots
 * and are looked up by class, so a missing component is an `undefined`
 * result at the call site rather than an attribute error deep inside a tick.
 */

import { describeValue, ecsError } from "../errors.js";
import type { SerialRecord } from "../serial/types.js";
import { Component, type ComponentClass } from "./component.js";

/** Slot names that would shadow the entity's own fields. */
export const RESERVED_SLOTS: ReadonlySet<string> = new Set(["id", "components"]);

export type EntityRecord = Readonly<{
  id: string;
  components: Readonly<Record<string, SerialRecord>>;
}>;

export class Entity {
  readonly id: string;
  private readonly slots = new Map<string, Component>();

  constructor(id = "Default ID", components: readonly Component[] = []) {
    this.id = id;
    for (const component of components) this.addComponent(component);
  }

  /** Occupied slot names, in the order they were first filled. */
  get components(): readonly string[] {
    return Array.from(this.slots.keys());
  }

  /**
   * Attaches `component` under its name. An occupied slot is overwritten and
   * the component that held it is detached from the dispatcher.
   */
  addComponent(component: Component): void {
    if (!(component instanceof Component)) {
      ecsError(`only a Component can be added to an Entity, got ${describeValue(component)}`);
    }
    if (RESERVED_SLOTS.has(component.name)) {
      ecsError(`component name "${component.name}" clashes with an Entity field`);
    }
    const previous = this.slots.get(component.name);
    if (previous !== undefined && previous !== component) previous.detach();
    this.slots.set(component.name, component);
    component.attach(this);
  }

  removeComponent(name: string): void {
    const component = this.slots.get(name);
    if (component === undefined) {
      ecsError(`cannot remove component "${name}" that entity "${this.id}" doesn't have`);
    }
    this.slots.delete(name);
    component.detach();
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  getSlot(name: string): Component | undefined {
    return this.slots.get(name);
  }

  /** The component in `cls.slot` if it is an instance of `cls`. */
  get<C extends Component>(cls: ComponentClass<C>): C | undefined {
    const component = this.slots.get(cls.slot);
    return component instanceof cls ? component : undefined;
  }

  require<C extends Component>(cls: ComponentClass<C>): C {
    const component = this.get(cls);
    if (component === undefined) {
      ecsError(`entity "${this.id}" has no ${cls.name} in slot "${cls.slot}"`);
    }
    return component;
  }

  serialize(): EntityRecord {
    const components: Record<string, SerialRecord> = {};
    for (const [name, component] of this.slots) components[name] = component.serialize();
    return { id: this.id, components };
  }
}
