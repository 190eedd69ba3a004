/**
 * packages/core/src/widgets/animation.ts — Frame sequences and widgets that play them.
 */

import { invalidConfig } from "../errors.js";
import { type DispatchResult, type GlyphEvent, createEvent, isEventOf, isTickOver } from "../events/types.js";
import { type CellImage, assertImageShape, rowsFromChars, shapesEqual } from "../geometry/grid.js";
import type { JsonObject, SerialRecord } from "../serial/types.js";
import { Widget } from "./widget.js";

/** A finite, restartable sequence of same-shape frames played at `fps`. */
export class Animation {
  readonly frames: readonly CellImage[];
  readonly fps: number;
  /** Seconds per frame. */
  readonly frameTime: number;
  /** Atlas element names, one per frame, when the frames came from an atlas. */
  readonly frameIds: readonly string[] | null;

  constructor(frames: readonly CellImage[], fps: number, frameIds: readonly string[] | null = null) {
    const first = frames[0];
    if (first === undefined) {
      invalidConfig("Animation: at least one frame is required");
    }
    for (const frame of frames) {
      assertImageShape(frame.chars, frame.colors, "Animation frame");
      if (!shapesEqual(frame.chars, first.chars)) {
        invalidConfig("Animation: all frames must have the same size");
      }
    }
    if (typeof fps !== "number" || !Number.isFinite(fps) || fps <= 0) {
      invalidConfig(`Animation: fps must be a positive number, got ${String(fps)}`);
    }
    if (frameIds !== null && frameIds.length !== frames.length) {
      invalidConfig("Animation: frameIds must have one entry per frame");
    }
    this.frames = Object.freeze(frames.slice());
    this.fps = fps;
    this.frameTime = 1 / fps;
    this.frameIds = frameIds === null ? null : Object.freeze(frameIds.slice());
  }

  get length(): number {
    return this.frames.length;
  }

  frame(index: number): CellImage {
    const f = this.frames[index];
    if (f === undefined) {
      invalidConfig(`Animation: no frame ${String(index)}`);
    }
    return f;
  }

  serialize(): JsonObject {
    if (this.frameIds !== null) {
      return { fps: this.fps, storage_type: "atlas", frame_ids: this.frameIds.slice() };
    }
    return {
      fps: this.fps,
      storage_type: "dump",
      frames: this.frames.map((f) => [rowsFromChars(f.chars), f.colors.map((row) => row.join(","))]),
    };
  }
}

/**
 * Shared frame clock: accumulates tick time and reports when the next frame
 * is due. Animation widgets on an ECS layout emit `ecs_update` per frame so
 * the layout knows to redraw.
 */
abstract class AnimatedWidget extends Widget {
  readonly emitEcs: boolean;
  protected runningIndex = 0;
  protected waited = 0;

  constructor(first: CellImage, emitEcs: boolean, zLevel: number) {
    super(first.chars, first.colors, zLevel);
    this.emitEcs = emitEcs;
  }

  protected abstract get current(): Animation;

  /** Index of the frame after `runningIndex`, or null to stop. */
  protected abstract nextIndex(): number | null;

  protected get running(): boolean {
    return true;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (!this.running) return undefined;
    if (isEventOf(event, "tick")) {
      this.waited += event.value;
      if (this.waited < this.current.frameTime) return undefined;
      this.waited = 0;
      const next = this.nextIndex();
      if (next === null) return undefined;
      this.runningIndex = next;
      const frame = this.current.frame(next);
      this.chars = frame.chars;
      this.colors = frame.colors;
      return this.emitEcs ? createEvent("ecs_update", null) : undefined;
    }
    if (isTickOver(event) && this.placedOnTerminal) {
      this.terminal?.updateWidget(this);
    }
    return undefined;
  }
}

export type SimpleAnimationOptions = Readonly<{
  emitEcs?: boolean;
  zLevel?: number;
}>;

/** Loops one animation forever. */
export class SimpleAnimationWidget extends AnimatedWidget {
  readonly animation: Animation;

  constructor(animation: Animation, opts: SimpleAnimationOptions = {}) {
    if (!(animation instanceof Animation)) {
      invalidConfig("SimpleAnimationWidget: an Animation instance is required");
    }
    super(animation.frame(0), opts.emitEcs ?? true, opts.zLevel ?? 0);
    this.animation = animation;
  }

  protected override get current(): Animation {
    return this.animation;
  }

  protected override nextIndex(): number {
    return (this.runningIndex + 1) % this.animation.length;
  }

  override serialize(): SerialRecord {
    return {
      class: this.serialClass(),
      animation: this.animation.serialize(),
      emit_ecs: this.emitEcs,
      z_level: this.zLevel,
    };
  }

  protected override serialClass(): string {
    return "SimpleAnimationWidget";
  }
}

export type MultipleAnimationOptions = Readonly<{
  emitEcs?: boolean;
  cycle?: boolean;
  zLevel?: number;
}>;

/**
 * Holds several named animations and plays one at a time. Without `cycle` it
 * stops on the last frame and stays idle until {@link setAnimation}.
 */
export class MultipleAnimationWidget extends AnimatedWidget {
  readonly animations: Readonly<Record<string, Animation>>;
  private currentId: string;
  private cycle: boolean;
  private amRunning = true;

  constructor(
    animations: Readonly<Record<string, Animation>>,
    initialAnimation: string,
    opts: MultipleAnimationOptions = {},
  ) {
    for (const anim of Object.values(animations)) {
      if (!(anim instanceof Animation)) {
        invalidConfig("MultipleAnimationWidget: every value must be an Animation");
      }
    }
    const initial = animations[initialAnimation];
    if (initial === undefined) {
      invalidConfig(`MultipleAnimationWidget: unknown initial animation "${initialAnimation}"`);
    }
    super(initial.frame(0), opts.emitEcs ?? true, opts.zLevel ?? 0);
    this.animations = animations;
    this.currentId = initialAnimation;
    this.cycle = opts.cycle ?? false;
  }

  get animationId(): string {
    return this.currentId;
  }

  get isRunning(): boolean {
    return this.amRunning;
  }

  get cycling(): boolean {
    return this.cycle;
  }

  protected override get current(): Animation {
    const anim = this.animations[this.currentId];
    if (anim === undefined) {
      invalidConfig(`MultipleAnimationWidget: unknown animation "${this.currentId}"`);
    }
    return anim;
  }

  protected override get running(): boolean {
    return this.amRunning;
  }

  /** Switches to `id` from its first frame on the next due tick. */
  setAnimation(id: string, cycle = false): void {
    if (this.animations[id] === undefined) {
      invalidConfig(`MultipleAnimationWidget: unknown animation "${id}"`);
    }
    this.currentId = id;
    this.cycle = cycle;
    this.runningIndex = -1;
    this.waited = 0;
    this.amRunning = true;
  }

  protected override nextIndex(): number | null {
    const next = this.runningIndex + 1;
    if (next < this.current.length) return next;
    if (this.cycle) return 0;
    this.amRunning = false;
    return null;
  }

  override serialize(): SerialRecord {
    const animations: Record<string, JsonObject> = {};
    for (const [id, anim] of Object.entries(this.animations)) animations[id] = anim.serialize();
    return {
      class: this.serialClass(),
      animations,
      initial_animation: this.currentId,
      emit_ecs: this.emitEcs,
      cycle: this.cycle,
      z_level: this.zLevel,
    };
  }

  protected override serialClass(): string {
    return "MultipleAnimationWidget";
  }
}
