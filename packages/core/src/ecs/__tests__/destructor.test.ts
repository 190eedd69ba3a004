import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { EventDispatcher } from "../../events/dispatcher.js";
import { createEvent } from "../../events/types.js";
import { RecordingListener } from "../../testing/recordingListener.js";
import { DecayComponent } from "../decay.js";
import { DestructorComponent } from "../destructor.js";
import { Entity } from "../entity.js";
import { EntityTracker } from "../tracker.js";
import { actor, ecsField, spawn, tickOver } from "./helpers.js";

function isEcsError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_ECS_ERROR");
}

describe("DestructorComponent", () => {
  test("announces the death at once and detaches everything at end of tick", () => {
    const d = new EventDispatcher();
    const tracker = new EntityTracker();
    tracker.attach(d);
    const layout = ecsField(d, [5, 5]);
    const destructor = new DestructorComponent(d);
    const doomed = actor(d, "doomed", "x", { vx: 5, extra: [destructor] });
    spawn(d, doomed);

    destructor.destroy();
    assert.equal(destructor.isDestroying, true);
    assert.equal(d.listenersOf("tick").includes(doomed.position), false);
    d.drain();
    assert.equal(tracker.has("doomed"), false);
    assert.equal(layout.entities.has("doomed"), false);
    assert.deepEqual(doomed.entity.components, ["widget", "position", "destructor"]);

    tickOver(d);
    assert.deepEqual(doomed.entity.components, []);
    assert.equal(destructor.owner, null);
    assert.equal(d.listenersOf("service").includes(destructor), false);
  });

  test("a second destroy is a no-op", () => {
    const d = new EventDispatcher();
    const rec = new RecordingListener();
    d.register(rec, "ecs_destroy");
    const destructor = new DestructorComponent(d);
    new Entity("e", [destructor]);
    destructor.destroy();
    destructor.destroy();
    d.drain();
    assert.deepEqual(rec.valuesOf("ecs_destroy"), ["e"]);
  });

  test("does nothing at end of tick unless destroying", () => {
    const d = new EventDispatcher();
    const destructor = new DestructorComponent(d);
    const e = new Entity("e", [destructor]);
    tickOver(d);
    assert.deepEqual(e.components, ["destructor"]);
  });

  test("needs an owner", () => {
    assert.throws(() => new DestructorComponent(new EventDispatcher()).destroy(), isEcsError);
  });
});

describe("DecayComponent", () => {
  function doomed(d: EventDispatcher, decay: DecayComponent): RecordingListener {
    const rec = new RecordingListener();
    d.register(rec, "ecs_destroy");
    new Entity("e", [decay, new DestructorComponent(d)]);
    return rec;
  }

  test("keypress decay dies on the first key", () => {
    const d = new EventDispatcher();
    const rec = doomed(d, new DecayComponent(d));
    d.enqueue(createEvent("tick", 5));
    d.drain();
    assert.deepEqual(rec.events, []);
    d.enqueue(createEvent("key_down", "TK_SPACE"));
    d.drain();
    assert.deepEqual(rec.valuesOf("ecs_destroy"), ["e"]);
  });

  test("timeout decay dies once its age reaches the lifetime", () => {
    const d = new EventDispatcher();
    const decay = new DecayComponent(d, { destroyCondition: "timeout", lifetime: 1, age: 0.25 });
    const rec = doomed(d, decay);
    for (const dt of [0.5, 0.25, 0.5]) d.enqueue(createEvent("tick", dt));
    d.drain();
    assert.equal(decay.age, 1);
    assert.deepEqual(rec.valuesOf("ecs_destroy"), ["e"]);
  });

  test("needs a destructor sibling when it fires", () => {
    const d = new EventDispatcher();
    new Entity("e", [new DecayComponent(d)]);
    d.enqueue(createEvent("key_down", "TK_A"));
    assert.throws(() => d.drain(), isEcsError);
  });

  test("rejects unknown conditions and serializes its clock", () => {
    assert.throws(
      () => new DecayComponent(null, { destroyCondition: JSON.parse('"never"') }),
      (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"),
    );
    assert.deepEqual(new DecayComponent(null, { destroyCondition: "timeout", lifetime: 3, age: 1 }).serialize(), {
      class: "DecayComponent",
      destroy_condition: "timeout",
      lifetime: 3,
      age: 1,
    });
  });
});
