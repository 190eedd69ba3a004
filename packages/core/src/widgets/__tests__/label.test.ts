import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { createEvent } from "../../events/types.js";
import { rowsFromChars } from "../../geometry/grid.js";
import { InputField, Label, keyForChar, renderText } from "../label.js";
import { FakeSurface } from "./helpers.js";

function isConfigError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_INVALID_CONFIG");
}

describe("renderText", () => {
  test("justifies each line inside the width", () => {
    assert.deepEqual(rowsFromChars(renderText("ab", "left", 5)), ["ab   "]);
    assert.deepEqual(rowsFromChars(renderText("ab", "right", 5)), ["   ab"]);
    assert.deepEqual(rowsFromChars(renderText("ab", "center", 5)), [" ab  "]);
    assert.deepEqual(rowsFromChars(renderText("a", "left", 2, 2)), ["a ", "  "]);
  });
});

describe("Label", () => {
  test("sizes itself to the initial text", () => {
    const label = new Label("hi\nthere");
    assert.deepEqual(label.size, [5, 2]);
    assert.deepEqual(rowsFromChars(label.chars), ["hi   ", "there"]);
    assert.deepEqual(label.colors[0], ["white", "white", "white", "white", "white"]);
  });

  test("new text re-renders into the same area", () => {
    const label = new Label("abc", { width: 5, color: "red" });
    label.text = "xy";
    assert.equal(label.text, "xy");
    assert.deepEqual(rowsFromChars(label.chars), ["xy   "]);
    label.just = "right";
    assert.deepEqual(rowsFromChars(label.chars), ["   xy"]);
  });

  test("text that does not fit is rejected", () => {
    const label = new Label("abc", { width: 5 });
    assert.throws(() => {
      label.text = "abcdef";
    }, isConfigError);
    assert.equal(label.text, "abc");
    assert.throws(() => new Label("abcdef", { width: 3 }), isConfigError);
    assert.throws(() => new Label("a\nb", { height: 1 }), isConfigError);
  });

  test("a label on a terminal asks for a repaint when its text changes", () => {
    const label = new Label("abc");
    const surface = new FakeSurface();
    surface.place(label);
    label.text = "xyz";
    assert.deepEqual(surface.updated, [label]);
  });

  test("serializes its text and layout", () => {
    const label = new Label("ok", { width: 4, just: "center", color: "green", zLevel: 2 });
    assert.deepEqual(label.serialize(), {
      class: "Label",
      text: "ok",
      just: "center",
      color: "green",
      width: 4,
      height: 1,
      z_level: 2,
    });
  });
});

describe("InputField", () => {
  function type(field: InputField, kind: "key_down" | "key_up", ...keys: string[]) {
    return keys.map((key) => field.onEvent(createEvent(kind, key)));
  }

  test("types letters, shifted symbols and keypad characters", () => {
    const field = new InputField({ width: 5, name: "nick" });
    type(field, "key_down", "TK_A", "TK_SHIFT", "TK_B", "TK_1");
    type(field, "key_up", "TK_SHIFT");
    type(field, "key_down", "TK_MINUS", "TK_F1");
    assert.equal(field.text, "aB!-");
    type(field, "key_down", "TK_BACKSPACE");
    assert.equal(field.text, "aB!");
    assert.deepEqual(rowsFromChars(field.chars), ["aB!  "]);
  });

  test("enter emits text_input and stops accepting keys", () => {
    const field = new InputField({ width: 5, name: "nick" });
    type(field, "key_down", "TK_H", "TK_I");
    const [result] = type(field, "key_down", "TK_ENTER");
    assert.deepEqual(result, { type: "text_input", value: { field: "nick", text: "hi" } });
    assert.equal(field.accepting, false);
    type(field, "key_down", "TK_C");
    assert.equal(field.text, "hi");
  });

  test("stops at the field width", () => {
    const field = new InputField({ width: 2 });
    type(field, "key_down", "TK_A", "TK_B", "TK_C");
    assert.equal(field.text, "ab");
  });

  test("finish emits on the next delivered event", () => {
    const field = new InputField({ width: 3, name: "n" });
    type(field, "key_down", "TK_Q");
    field.finish();
    assert.deepEqual(field.onEvent(createEvent("tick", 0.1)), {
      type: "text_input",
      value: { field: "n", text: "q" },
    });
    assert.equal(field.onEvent(createEvent("tick", 0.1)), undefined);
  });

  test("serializes its field name and input state", () => {
    const field = new InputField({ width: 3, name: "n" });
    assert.deepEqual(field.serialize(), {
      class: "InputField",
      text: "",
      just: "left",
      color: "white",
      width: 3,
      height: 1,
      z_level: 0,
      field_name: "n",
      accept_input: true,
      finishing: false,
    });
  });

  test("requires a positive width", () => {
    assert.throws(() => new InputField({ width: 0 }), isConfigError);
  });
});

describe("keyForChar", () => {
  test("maps characters back to the keys that type them", () => {
    assert.deepEqual(keyForChar("q"), { name: "TK_Q", shift: false });
    assert.deepEqual(keyForChar("Q"), { name: "TK_Q", shift: true });
    assert.deepEqual(keyForChar("7"), { name: "TK_7", shift: false });
    assert.deepEqual(keyForChar("-"), { name: "TK_MINUS", shift: false });
    assert.deepEqual(keyForChar("_"), { name: "TK_MINUS", shift: true });
    assert.deepEqual(keyForChar("+"), { name: "TK_EQUALS", shift: true });
    assert.deepEqual(keyForChar("!"), { name: "TK_1", shift: true });
    assert.deepEqual(keyForChar(" "), { name: "TK_SPACE", shift: false });
    assert.equal(keyForChar("é"), null);
  });
});
