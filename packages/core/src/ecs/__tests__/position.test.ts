import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { EventDispatcher } from "../../events/dispatcher.js";
import { createEvent } from "../../events/types.js";
import { RecordingListener } from "../../testing/recordingListener.js";
import { Entity } from "../entity.js";
import { PositionComponent } from "../position.js";
import { actor } from "./helpers.js";

function ticks(d: EventDispatcher, ...dts: number[]): void {
  for (const dt of dts) {
    d.enqueue(createEvent("tick", dt));
    d.drain();
  }
}

function isEcsError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_ECS_ERROR");
}

describe("PositionComponent movement", () => {
  test("moves whole tiles once the per-tile delay is exceeded", () => {
    const d = new EventDispatcher();
    const rec = new RecordingListener();
    d.register(rec, "ecs_move");
    const position = new PositionComponent(d, { vx: 2 });
    const entity = new Entity("p", [position]);
    ticks(d, 0.5, 0.5, 0.5);
    assert.equal(position.x, 2);
    assert.equal(position.y, 0);
    assert.deepEqual(rec.valuesOf("ecs_move"), [{ id: entity.id, x: 2, y: 0 }]);
    assert.deepEqual(position.lastMove, [2, 0]);
  });

  test("negative velocity moves the other way", () => {
    const d = new EventDispatcher();
    const position = new PositionComponent(d, { y: 5, vy: -4 });
    new Entity("p", [position]);
    ticks(d, 0.3);
    assert.deepEqual(position.pos, [0, 4]);
  });

  test("a still axis does not accumulate time", () => {
    const d = new EventDispatcher();
    const position = new PositionComponent(d, { vx: 1 });
    new Entity("p", [position]);
    ticks(d, 0.8);
    position.vx = 0;
    position.vx = 1;
    ticks(d, 0.8);
    assert.equal(position.x, 0);
    ticks(d, 0.3);
    assert.equal(position.x, 1);
  });

  test("move keeps the widget z-level at the entity's lower edge", () => {
    const d = new EventDispatcher();
    const a = actor(d, "a", "@", { size: [1, 2] });
    a.position.move(3, 4);
    assert.equal(a.widget.zLevel, 6);
    const still = actor(d, "b", "@", { affectZ: false, zLevel: 1 });
    still.position.move(3, 4);
    assert.equal(still.widget.zLevel, 1);
  });

  test("relativeMove records the displacement and emits unless told not to", () => {
    const d = new EventDispatcher();
    const position = new PositionComponent(d, { x: 2, y: 2 });
    new Entity("p", [position]);
    position.relativeMove(-1, 3, false);
    assert.deepEqual(position.pos, [1, 5]);
    assert.deepEqual(position.lastMove, [-1, 3]);
    assert.equal(d.pending, 0);
    position.relativeMove(1, 0);
    assert.equal(d.pending, 1);
  });

  test("moving needs an owner, and emitting needs a dispatcher", () => {
    assert.throws(() => new PositionComponent(null).move(1, 1), isEcsError);
    const position = new PositionComponent(null);
    new Entity("p", [position]);
    assert.throws(() => position.move(1, 1), isEcsError);
    position.move(1, 1, false);
    assert.deepEqual(position.pos, [1, 1]);
  });

  test("rejects non-finite coordinates and velocities", () => {
    assert.throws(() => new PositionComponent(null, { x: Number.NaN }), isEcsError);
    assert.throws(() => new PositionComponent(null, { vx: Number.POSITIVE_INFINITY }), isEcsError);
  });

  test("serializes its state", () => {
    const position = new PositionComponent(null, { x: 1, y: 2, vx: 3, vy: -1, lastMove: [0, -1], affectZ: false });
    assert.deepEqual(position.serialize(), {
      class: "PositionComponent",
      x: 1,
      y: 2,
      vx: 3,
      vy: -1,
      last_move: [0, -1],
      affect_z: false,
    });
  });
});
