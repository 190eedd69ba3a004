import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { createEvent } from "../../events/types.js";
import { rowsFromChars } from "../../geometry/grid.js";
import { FPSCounter, MousePosWidget } from "../counters.js";
import { ClosingListener, LoggingListener, formatEventValue } from "../listeners.js";
import { Widget } from "../widget.js";
import { FakeSurface } from "./helpers.js";

describe("ClosingListener", () => {
  test("asks for shutdown_ready at once and shutdown two ticks later", () => {
    const l = new ClosingListener();
    assert.equal(l.onEvent(createEvent("tick", 0.1)), undefined);
    assert.deepEqual(l.onEvent(createEvent("misc_input", "TK_CLOSE")), { type: "service", value: "shutdown_ready" });
    assert.equal(l.closing, true);
    assert.equal(l.onEvent(createEvent("misc_input", "TK_CLOSE")), undefined);
    assert.equal(l.onEvent(createEvent("tick", 0.1)), undefined);
    assert.deepEqual(l.onEvent(createEvent("tick", 0.1)), { type: "service", value: "shutdown" });
  });
});

describe("LoggingListener", () => {
  test("writes one line per event", () => {
    const lines: string[] = [];
    const l = new LoggingListener({ write: (chunk: string) => lines.push(chunk) }, { now: () => 12.5 });
    l.onEvent(createEvent("key_down", "TK_A"));
    l.onEvent(createEvent("ecs_move", { id: "a", x: 1, y: 2 }));
    assert.deepEqual(lines, [
      "12.5: type key_down, value TK_A\n",
      '12.5: type ecs_move, value {"id":"a","x":1,"y":2}\n',
    ]);
  });

  test("formatEventValue names class instances", () => {
    assert.equal(formatEventValue(null), "null");
    assert.equal(formatEventValue([1, 2]), "[1,2]");
    assert.equal(formatEventValue(new Widget([["x"]], [["red"]])), "Widget");
  });
});

describe("FPSCounter", () => {
  test("shows the mean tick rate as three digits", () => {
    const c = new FPSCounter();
    assert.deepEqual(rowsFromChars(c.chars), ["030"]);
    c.onEvent(createEvent("tick", 0.5));
    assert.equal(c.text, "002");
    c.onEvent(createEvent("tick", 0.25));
    assert.equal(c.text, "003");
  });
});

describe("MousePosWidget", () => {
  test("reads the mouse cell from its terminal", () => {
    const w = new MousePosWidget();
    const surface = new FakeSurface();
    surface.state.set("TK_MOUSE_X", 7);
    surface.state.set("TK_MOUSE_Y", 12);
    surface.place(w);
    w.onEvent(createEvent("misc_input", "TK_MOUSE_MOVE"));
    assert.equal(w.text, "007x012");
  });

  test("needs a terminal", () => {
    assert.throws(
      () => new MousePosWidget().onEvent(createEvent("misc_input", "TK_MOUSE_MOVE")),
      (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"),
    );
  });
});
