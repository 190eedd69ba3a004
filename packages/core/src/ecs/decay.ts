/**
 * packages/core/src/ecs/decay.ts — Self-destruction on a keypress or after a lifetime.
 */

import { ecsError, invalidConfig } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, isEventOf } from "../events/types.js";
import type { SerialRecord } from "../serial/types.js";
import { Component } from "./component.js";
import { DestructorComponent } from "./destructor.js";

export type DestroyCondition = "keypress" | "timeout";

export type DecayOptions = Readonly<{
  destroyCondition?: DestroyCondition;
  /** Seconds from creation to destruction under `"timeout"`. */
  lifetime?: number;
  /** Seconds already lived; set when restoring a saved entity. */
  age?: number;
}>;

export class DecayComponent extends Component {
  static override readonly slot: string = "decay";

  readonly destroyCondition: DestroyCondition;
  readonly lifetime: number;
  private currentAge: number;

  constructor(dispatcher: EventDispatcher | null, opts: DecayOptions = {}) {
    super(dispatcher, "decay");
    const condition = opts.destroyCondition ?? "keypress";
    if (condition !== "keypress" && condition !== "timeout") {
      invalidConfig(`destroyCondition should be either "keypress" or "timeout", got ${JSON.stringify(condition)}`);
    }
    this.destroyCondition = condition;
    this.lifetime = opts.lifetime ?? 1;
    this.currentAge = opts.age ?? 0;
    this.subscribe(condition === "keypress" ? "key_down" : "tick");
  }

  get age(): number {
    return this.currentAge;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (this.destroyCondition === "keypress" && isEventOf(event, "key_down")) {
      this.destructor().destroy();
    } else if (this.destroyCondition === "timeout" && isEventOf(event, "tick")) {
      this.currentAge += event.value;
      if (this.currentAge >= this.lifetime) this.destructor().destroy();
    }
    return undefined;
  }

  override serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      destroy_condition: this.destroyCondition,
      lifetime: this.lifetime,
      age: this.currentAge,
    };
  }

  protected override serialClass(): string {
    return "DecayComponent";
  }

  private destructor(): DestructorComponent {
    const destructor = this.requireOwner().get(DestructorComponent);
    if (destructor === undefined) {
      ecsError(`DecayComponent on "${this.requireOwner().id}" needs a DestructorComponent`);
    }
    return destructor;
  }
}
