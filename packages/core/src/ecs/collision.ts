/**
 * packages/core/src/ecs/collision.ts — Collision notifications and the walker policy.
 *
 * Why: Layouts only report collisions; they never block movement. What a
 * collision means is decided here, per entity: the base component routes the
 * notification to a hook, and the walker steps back out of anything solid.
 */

import { invalidConfig } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, isEventOf } from "../events/types.js";
import type { Vec2 } from "../geometry/grid.js";
import { isIntVec2 } from "../geometry/rect.js";
import type { SerialRecord } from "../serial/types.js";
import { Component } from "./component.js";
import { PositionComponent } from "./position.js";
import type { EntityTracker } from "./tracker.js";

export type CollisionOptions = Readonly<{
  /** Extra z-levels below the entity's own over which it can collide. */
  depth?: number;
  /** Offset of each deeper z-level from the one above it. */
  zShift?: Vec2;
  /** Top-left corner of the hitbox on the top z-level, relative to the widget. */
  facePosition?: Vec2;
  /** Hitbox size; `[0, 0]` means the whole widget. */
  faceSize?: Vec2;
  /** Whether movers may pass through. The base class only stores it. */
  passable?: boolean;
}>;

function requirePair(name: string, v: Vec2): Vec2 {
  if (!isIntVec2(v)) {
    invalidConfig(`${name} for a CollisionComponent should be a pair of integers`);
  }
  return [v[0], v[1]];
}

export class CollisionComponent extends Component {
  static override readonly slot: string = "collision";

  readonly depth: number;
  readonly zShift: Vec2;
  readonly facePosition: Vec2;
  readonly faceSize: Vec2;
  passable: boolean;

  constructor(dispatcher: EventDispatcher | null, opts: CollisionOptions = {}) {
    super(dispatcher, "collision");
    const depth = opts.depth ?? 0;
    if (!Number.isInteger(depth) || depth < 0) {
      invalidConfig(`depth for a CollisionComponent should be a non-negative integer, got ${String(depth)}`);
    }
    this.depth = depth;
    this.zShift = requirePair("zShift", opts.zShift ?? [0, 0]);
    this.facePosition = requirePair("facePosition", opts.facePosition ?? [0, 0]);
    this.faceSize = requirePair("faceSize", opts.faceSize ?? [0, 0]);
    this.passable = opts.passable ?? false;
    this.subscribe("ecs_collision");
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (!isEventOf(event, "ecs_collision") || this.owner === null) return undefined;
    const { mover, other } = event.value;
    if (mover === this.owner.id) return this.collidedInto(other);
    if (other === this.owner.id) return this.collidedBy(mover);
    return undefined;
  }

  /** The owner moved into `other`; `null` is the layout border. */
  collidedInto(_other: string | null): DispatchResult {
    return undefined;
  }

  /** `other` moved into the owner. */
  collidedBy(_other: string): DispatchResult {
    return undefined;
  }

  override serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      depth: this.depth,
      z_shift: [this.zShift[0], this.zShift[1]],
      face_position: [this.facePosition[0], this.facePosition[1]],
      face_size: [this.faceSize[0], this.faceSize[1]],
      passable: this.passable,
    };
  }

  protected override serialClass(): string {
    return "CollisionComponent";
  }
}

export type WalkerCollisionOptions = CollisionOptions &
  Readonly<{
    /** Resolves the ids in collision notifications. */
    tracker: EntityTracker;
  }>;

/**
 * Undoes the owner's last move when it walks into the border or into an
 * entity with an impassable collision component. At most one reversal per
 * tick, so the step back cannot trigger another one.
 */
export class WalkerCollisionComponent extends CollisionComponent {
  private readonly tracker: EntityTracker;
  private collidedThisTick = false;

  constructor(dispatcher: EventDispatcher | null, opts: WalkerCollisionOptions) {
    super(dispatcher, opts);
    this.tracker = opts.tracker;
    this.subscribe("tick");
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "tick")) {
      this.collidedThisTick = false;
      return undefined;
    }
    return super.onEvent(event);
  }

  override collidedInto(other: string | null): DispatchResult {
    if (this.collidedThisTick) return undefined;
    if (other !== null) {
      const target = this.tracker.get(other);
      if (target === undefined) return undefined;
      const collision = target.get(CollisionComponent);
      if (collision === undefined || collision.passable) return undefined;
    }
    this.stepBack();
    return undefined;
  }

  private stepBack(): void {
    const position = this.requireOwner().require(PositionComponent);
    const last = position.lastMove;
    position.relativeMove(-last[0], -last[1]);
    // The step back is not a move of its own; keep facing the same way.
    position.lastMove = last;
    this.collidedThisTick = true;
  }

  protected override serialClass(): string {
    return "WalkerCollisionComponent";
  }
}
