import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { EventDispatcher } from "../../events/dispatcher.js";
import { type DispatchResult, createEvent } from "../../events/types.js";
import { CollisionComponent, WalkerCollisionComponent } from "../collision.js";
import { Entity } from "../entity.js";
import { EntityTracker } from "../tracker.js";
import { actor, ecsField, spawn } from "./helpers.js";

class ProbeCollision extends CollisionComponent {
  readonly seen: string[] = [];

  override collidedInto(other: string | null): DispatchResult {
    this.seen.push(`into ${String(other)}`);
    return undefined;
  }

  override collidedBy(other: string): DispatchResult {
    this.seen.push(`by ${other}`);
    return undefined;
  }
}

describe("CollisionComponent", () => {
  test("routes notifications by the owner's role", () => {
    const d = new EventDispatcher();
    const probe = new ProbeCollision(d);
    new Entity("me", [probe]);
    d.enqueue(createEvent("ecs_collision", { mover: "me", other: "wall" }));
    d.enqueue(createEvent("ecs_collision", { mover: "me", other: null }));
    d.enqueue(createEvent("ecs_collision", { mover: "bat", other: "me" }));
    d.enqueue(createEvent("ecs_collision", { mover: "bat", other: "wall" }));
    d.drain();
    assert.deepEqual(probe.seen, ["into wall", "into null", "by bat"]);
  });

  test("validates its options", () => {
    const isConfig = (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG");
    assert.throws(() => new CollisionComponent(null, { depth: -1 }), isConfig);
    assert.throws(() => new CollisionComponent(null, { zShift: [0.5, 0] }), isConfig);
    assert.throws(() => new CollisionComponent(null, { faceSize: JSON.parse("[1, 2, 3]") }), isConfig);
  });

  test("serializes its hitbox settings", () => {
    const c = new CollisionComponent(null, { depth: 2, zShift: [1, 0], faceSize: [3, 1], passable: true });
    assert.deepEqual(c.serialize(), {
      class: "CollisionComponent",
      depth: 2,
      z_shift: [1, 0],
      face_position: [0, 0],
      face_size: [3, 1],
      passable: true,
    });
  });
});

describe("WalkerCollisionComponent", () => {
  function scene(wallPassable: boolean) {
    const d = new EventDispatcher();
    const tracker = new EntityTracker();
    tracker.attach(d);
    const layout = ecsField(d, [10, 10]);
    const walker = actor(d, "walker", "w", {
      x: 2,
      y: 2,
      extra: [new WalkerCollisionComponent(d, { tracker })],
    });
    const wall = actor(d, "wall", "#", { x: 3, y: 2, extra: [new CollisionComponent(d, { passable: wallPassable })] });
    spawn(d, walker, wall);
    return { d, layout, walker };
  }

  test("steps back out of a solid entity and keeps facing forward", () => {
    const { d, layout, walker } = scene(false);
    walker.position.move(3, 2);
    d.drain();
    assert.deepEqual(walker.position.pos, [2, 2]);
    assert.deepEqual(walker.position.lastMove, [1, 0]);
    assert.deepEqual(layout.childPosition(walker.widget.widget), [2, 2]);
  });

  test("walks through passable entities", () => {
    const { d, walker } = scene(true);
    walker.position.move(3, 2);
    d.drain();
    assert.deepEqual(walker.position.pos, [3, 2]);
  });

  test("steps back from the border", () => {
    const { d, layout, walker } = scene(false);
    walker.position.move(10, 2);
    d.drain();
    assert.deepEqual(walker.position.pos, [2, 2]);
    assert.deepEqual(walker.position.lastMove, [8, 0]);
    assert.deepEqual(layout.childPosition(walker.widget.widget), [2, 2]);
  });

  test("reverses at most once per tick", () => {
    const { d, walker } = scene(false);
    walker.position.move(3, 2);
    d.drain();
    d.enqueue(createEvent("ecs_collision", { mover: "walker", other: null }));
    d.drain();
    assert.deepEqual(walker.position.pos, [2, 2]);
    d.enqueue(createEvent("tick", 0.1));
    d.enqueue(createEvent("ecs_collision", { mover: "walker", other: null }));
    d.drain();
    assert.deepEqual(walker.position.pos, [1, 2]);
  });

  test("ignores collisions with entities the tracker does not know", () => {
    const { d, walker } = scene(false);
    d.enqueue(createEvent("ecs_collision", { mover: "walker", other: "stranger" }));
    d.drain();
    assert.deepEqual(walker.position.pos, [2, 2]);
  });
});
