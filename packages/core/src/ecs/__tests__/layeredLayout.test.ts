import { assert, describe, test } from "@glyphbox/testkit";
import { EventDispatcher } from "../../events/dispatcher.js";
import { fillGrid } from "../../geometry/grid.js";
import { RecordingListener } from "../../testing/recordingListener.js";
import { CollisionComponent, type CollisionOptions } from "../collision.js";
import { type Hitbox, LayeredECSLayout, hitboxesCollide } from "../layeredLayout.js";
import { actor, spawn } from "./helpers.js";

function box(over: Partial<Hitbox>): Hitbox {
  return { pos: [0, 0], z: 5, depth: 0, shift: [0, 0], face: [0, 0], faceSize: [2, 2], ...over };
}

describe("hitboxesCollide", () => {
  test("boxes on the same z-level collide when they overlap", () => {
    assert.equal(hitboxesCollide(box({}), box({ pos: [1, 1] })), true);
    assert.equal(hitboxesCollide(box({}), box({ pos: [2, 0] })), false);
  });

  test("boxes whose z ranges do not meet never collide", () => {
    assert.equal(hitboxesCollide(box({}), box({ pos: [1, 1], z: 3 })), false);
    assert.equal(hitboxesCollide(box({}), box({ pos: [1, 1], z: 3, depth: 1 })), false);
  });

  test("depth reaches lower levels, shifted once per level", () => {
    assert.equal(hitboxesCollide(box({ depth: 2 }), box({ pos: [1, 1], z: 3 })), true);
    assert.equal(hitboxesCollide(box({ depth: 2, shift: [3, 0] }), box({ pos: [1, 1], z: 3 })), false);
    assert.equal(hitboxesCollide(box({ depth: 2, shift: [3, 0] }), box({ pos: [6, 0], z: 3 })), true);
  });

  test("the face offsets the box inside the widget", () => {
    assert.equal(hitboxesCollide(box({ face: [2, 0], faceSize: [1, 1] }), box({ pos: [2, 0], faceSize: [1, 1] })), true);
    assert.equal(hitboxesCollide(box({ face: [2, 0], faceSize: [1, 1] }), box({ faceSize: [1, 1] })), false);
  });
});

describe("LayeredECSLayout", () => {
  function scene() {
    const d = new EventDispatcher();
    const layout = new LayeredECSLayout(fillGrid(10, 10, "."), fillGrid(10, 10, "white"));
    d.register(layout, "*ecs_");
    d.register(layout, "service");
    const rec = new RecordingListener();
    d.register(rec, "ecs_collision");
    const solid = (opts: CollisionOptions = {}) => [new CollisionComponent(d, opts)];
    return { d, layout, rec, solid };
  }

  test("only entities sharing a z-level are reported", () => {
    const { d, rec, solid } = scene();
    const mover = actor(d, "mover", "m", { x: 0, y: 0, size: [2, 2], zLevel: 5, affectZ: false, extra: solid() });
    const same = actor(d, "same", "s", { x: 5, y: 5, size: [2, 2], zLevel: 5, affectZ: false, extra: solid() });
    const deeper = actor(d, "deeper", "d", { x: 4, y: 5, zLevel: 0, affectZ: false, extra: solid() });
    const ghost = actor(d, "ghost", "g", { x: 4, y: 4, zLevel: 5, affectZ: false });
    spawn(d, mover, same, deeper, ghost);
    mover.position.move(4, 4);
    d.drain();
    assert.deepEqual(rec.valuesOf("ecs_collision"), [{ mover: "mover", other: "same" }]);
  });

  test("a mover without a collision component collides with nothing", () => {
    const { d, rec, solid } = scene();
    const mover = actor(d, "mover", "m", { x: 0, y: 0, affectZ: false });
    const rock = actor(d, "rock", "r", { x: 3, y: 3, affectZ: false, extra: solid() });
    spawn(d, mover, rock);
    mover.position.move(3, 3);
    d.drain();
    assert.deepEqual(rec.events, []);
  });

  test("the border is still reported", () => {
    const { d, rec, solid } = scene();
    const mover = actor(d, "mover", "m", { x: 0, y: 0, extra: solid() });
    spawn(d, mover);
    mover.position.move(-1, 0);
    d.drain();
    assert.deepEqual(rec.valuesOf("ecs_collision"), [{ mover: "mover", other: null }]);
  });

  test("a depth-shifted hitbox collides on a lower level", () => {
    const { d, rec, solid } = scene();
    const tall = actor(d, "tall", "t", {
      x: 0,
      y: 0,
      zLevel: 5,
      affectZ: false,
      extra: solid({ depth: 2, zShift: [0, 1] }),
    });
    const low = actor(d, "low", "l", { x: 6, y: 2, zLevel: 3, affectZ: false, extra: solid() });
    spawn(d, tall, low);
    tall.position.move(6, 0);
    d.drain();
    assert.deepEqual(rec.valuesOf("ecs_collision"), [{ mover: "tall", other: "low" }]);
  });
});
