import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { createEvent } from "../../events/types.js";
import { charsFromRows, copyShape, rowsFromChars } from "../../geometry/grid.js";
import { InputScrollable, ScrollBar, ScrollableLayout, ViewWindow } from "../scrollable.js";
import { block } from "./helpers.js";

function isLayoutError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_LAYOUT_ERROR");
}

const ROWS = ["abcdef", "ghijkl", "mnopqr", "stuvwx"];

function fieldChars() {
  return charsFromRows(ROWS);
}

describe("ViewWindow", () => {
  test("defaults to the origin and validates size and position", () => {
    const w = new ViewWindow([20, 20]);
    assert.deepEqual(w.pos, [0, 0]);
    assert.deepEqual(w.size, [10, 10]);
    assert.throws(() => new ViewWindow([5, 5]), isLayoutError);
    assert.throws(() => new ViewWindow([6, 4], { viewSize: [3, 2], viewPos: [4, 0] }), isLayoutError);
    assert.throws(() => new ViewWindow([6, 4], { viewSize: [0, 2] }), isLayoutError);
  });

  test("scrollTo and scrollBy stay inside the field", () => {
    const w = new ViewWindow([6, 4], { viewSize: [3, 2] });
    w.scrollBy([3, 2]);
    assert.deepEqual(w.pos, [3, 2]);
    assert.throws(() => w.scrollBy([1, 0]), isLayoutError);
    assert.throws(() => w.scrollTo([1.5, 0]), isLayoutError);
    assert.deepEqual(w.pos, [3, 2]);
  });
});

describe("ScrollableLayout", () => {
  test("shows only the window of its field", () => {
    const chars = fieldChars();
    const s = new ScrollableLayout(chars, copyShape(chars, "white"), { viewSize: [3, 2], viewPos: [1, 1] });
    assert.deepEqual(s.size, [3, 2]);
    assert.deepEqual(s.fieldSize, [6, 4]);
    assert.deepEqual(rowsFromChars(s.chars), ["hij", "nop"]);
  });

  test("children live in field coordinates and scroll into view", () => {
    const chars = fieldChars();
    const s = new ScrollableLayout(chars, copyShape(chars, "white"), { viewSize: [3, 2] });
    s.addChild(block("Z", 1, 1), [3, 2]);
    s.rebuild();
    assert.deepEqual(rowsFromChars(s.chars), ["abc", "ghi"]);
    s.scrollBy([2, 1]);
    s.rebuild();
    assert.deepEqual(s.viewPos, [2, 1]);
    assert.deepEqual(rowsFromChars(s.chars), ["ijk", "oZq"]);
  });

  test("an invalid scroll leaves the view unchanged", () => {
    const chars = fieldChars();
    const s = new ScrollableLayout(chars, copyShape(chars, "white"), { viewSize: [3, 2], viewPos: [3, 2] });
    assert.throws(() => s.scrollBy([0, 1]), isLayoutError);
    assert.deepEqual(s.viewPos, [3, 2]);
  });
});

describe("ScrollBar", () => {
  test("paints the thumb over the track", () => {
    const bar = new ScrollBar({ orientation: "horizontal", length: 4 });
    bar.showPos(0.5, 0.5);
    assert.deepEqual(bar.colors, [["gray", "gray", "white", "white"]]);
    assert.deepEqual(rowsFromChars(bar.chars), ["####"]);
  });

  test("rejects bad options", () => {
    assert.throws(() => new ScrollBar({ length: 0 }), (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"));
  });
});

describe("InputScrollable", () => {
  function make(): InputScrollable {
    const chars = fieldChars();
    return new InputScrollable(chars, copyShape(chars, "white"), {
      viewSize: [3, 2],
      rightBar: true,
      bottomBar: true,
    });
  }

  test("frames the window with scroll bars", () => {
    const isc = make();
    assert.deepEqual(isc.size, [4, 3]);
    assert.deepEqual(rowsFromChars(isc.chars), ["abc#", "ghi#", "### "]);
    assert.deepEqual(isc.rightBar?.colors, [["white"], ["gray"]]);
    assert.deepEqual(isc.bottomBar?.colors, [["white", "white", "gray"]]);
  });

  test("arrow keys scroll and the bars follow; scrolling past an edge is ignored", () => {
    const isc = make();
    isc.onEvent(createEvent("key_down", "TK_DOWN"));
    isc.onEvent(createEvent("key_down", "TK_DOWN"));
    isc.onEvent(createEvent("key_down", "TK_DOWN"));
    assert.deepEqual(isc.scrollable.viewPos, [0, 2]);
    assert.deepEqual(isc.rightBar?.colors, [["gray"], ["white"]]);
    isc.onEvent(createEvent("service", "tick_over"));
    assert.deepEqual(rowsFromChars(isc.chars), ["mno#", "stu#", "### "]);
    isc.onEvent(createEvent("key_down", "TK_SPACE"));
    assert.deepEqual(isc.scrollable.viewPos, [0, 0]);
  });

  test("children added after construction go into the scrolled field", () => {
    const isc = make();
    const child = block("Z", 1, 1);
    isc.addChild(child, [5, 3]);
    assert.equal(child.parent, isc.scrollable);
    assert.equal(isc.children.length, 4);
  });
});
