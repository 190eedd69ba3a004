/**
 * packages/core/src/ecs/position.ts — Entity position and tile-grid movement.
 *
 * Why: Velocity is in tiles per second but positions are whole tiles. Elapsed
 * time accumulates per moving axis; once it exceeds the per-tile delay the
 * entity jumps `round(waited / delay)` tiles and the accumulator resets. At
 * low frame rates this moves in chunks, and collision handling relies on
 * every step being a whole number of tiles.
 */

import { ecsError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type DispatchResult, type GlyphEvent, createEvent, isEventOf } from "../events/types.js";
import type { Vec2 } from "../geometry/grid.js";
import { roundHalfEven } from "../geometry/rounding.js";
import type { SerialRecord } from "../serial/types.js";
import { Component } from "./component.js";
import { WidgetComponent } from "./widgetComponent.js";

export type PositionOptions = Readonly<{
  x?: number;
  y?: number;
  /** Tiles per second along x. */
  vx?: number;
  vy?: number;
  lastMove?: Vec2;
  /** Keep the widget's z-level at `y + height` so lower entities draw on top. */
  affectZ?: boolean;
}>;

function delayFor(v: number): number | null {
  return v === 0 ? null : Math.abs(1 / v);
}

function requireFinite(name: string, v: number): number {
  if (typeof v !== "number" || !Number.isFinite(v)) {
    ecsError(`PositionComponent: ${name} must be a finite number, got ${String(v)}`);
  }
  return v;
}

export class PositionComponent extends Component {
  static override readonly slot: string = "position";

  readonly affectZ: boolean;
  private px: number;
  private py: number;
  private velX = 0;
  private velY = 0;
  private xDelay: number | null = null;
  private yDelay: number | null = null;
  private xWaited = 0;
  private yWaited = 0;
  private last: Vec2;

  constructor(dispatcher: EventDispatcher | null, opts: PositionOptions = {}) {
    super(dispatcher, "position");
    this.px = requireFinite("x", opts.x ?? 0);
    this.py = requireFinite("y", opts.y ?? 0);
    this.vx = opts.vx ?? 0;
    this.vy = opts.vy ?? 0;
    this.last = opts.lastMove ?? [1, 0];
    this.affectZ = opts.affectZ ?? true;
    this.subscribe("tick");
  }

  get x(): number {
    return this.px;
  }

  get y(): number {
    return this.py;
  }

  get pos(): Vec2 {
    return [this.px, this.py];
  }

  get vx(): number {
    return this.velX;
  }

  set vx(value: number) {
    this.velX = requireFinite("vx", value);
    this.xDelay = delayFor(value);
    if (value === 0) this.xWaited = 0;
  }

  get vy(): number {
    return this.velY;
  }

  set vy(value: number) {
    this.velY = requireFinite("vy", value);
    this.yDelay = delayFor(value);
    if (value === 0) this.yWaited = 0;
  }

  /** The displacement of the most recent move. */
  get lastMove(): Vec2 {
    return this.last;
  }

  set lastMove(value: Vec2) {
    this.last = value;
  }

  /**
   * Moves the owner to `(x, y)`. With `emitEvent` an `ecs_move` is queued so
   * the layout can relocate the widget and check collisions.
   */
  move(x: number, y: number, emitEvent = true): void {
    const owner = this.requireOwner();
    this.last = [x - this.px, y - this.py];
    this.px = x;
    this.py = y;
    if (this.affectZ) {
      const widget = owner.get(WidgetComponent);
      if (widget !== undefined) widget.zLevel = y + widget.height;
    }
    if (emitEvent) {
      this.requireDispatcher().enqueue(createEvent("ecs_move", { id: owner.id, x, y }));
    }
  }

  relativeMove(dx: number, dy: number, emitEvent = true): void {
    this.move(this.px + dx, this.py + dy, emitEvent);
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (!isEventOf(event, "tick")) return undefined;
    let newX = this.px;
    let newY = this.py;
    if (this.xDelay !== null) {
      this.xWaited += event.value;
      if (this.xWaited > this.xDelay) {
        newX += Math.sign(this.velX) * roundHalfEven(this.xWaited / this.xDelay);
        this.xWaited = 0;
      }
    }
    if (this.yDelay !== null) {
      this.yWaited += event.value;
      if (this.yWaited > this.yDelay) {
        newY += Math.sign(this.velY) * roundHalfEven(this.yWaited / this.yDelay);
        this.yWaited = 0;
      }
    }
    if (newX !== this.px || newY !== this.py) this.move(newX, newY);
    return undefined;
  }

  override serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      x: this.px,
      y: this.py,
      vx: this.velX,
      vy: this.velY,
      last_move: [this.last[0], this.last[1]],
      affect_z: this.affectZ,
    };
  }

  protected override serialClass(): string {
    return "PositionComponent";
  }
}
