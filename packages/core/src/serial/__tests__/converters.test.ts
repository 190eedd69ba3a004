import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { type DecodedValue, convert, isConverterName } from "../converters.js";
import { FieldReader } from "../fields.js";

function isSerializationError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_SERIALIZATION_ERROR");
}

describe("convert", () => {
  test("int truncates numbers and parses integer text", () => {
    assert.equal(convert("int", "42"), 42);
    assert.equal(convert("int", " -7 "), -7);
    assert.equal(convert("int", 3.9), 3);
    assert.equal(convert("int", -3.9), -3);
    assert.equal(convert("int", true), 1);
    assert.throws(() => convert("int", "4.5"), isSerializationError);
    assert.throws(() => convert("int", null), isSerializationError);
  });

  test("float parses decimal text", () => {
    assert.equal(convert("float", "2.5"), 2.5);
    assert.equal(convert("float", ".5"), 0.5);
    assert.equal(convert("float", "1e3"), 1000);
    assert.equal(convert("float", false), 0);
    assert.throws(() => convert("float", "abc"), isSerializationError);
  });

  test("str accepts primitives only", () => {
    assert.equal(convert("str", 7), "7");
    assert.equal(convert("str", true), "true");
    assert.throws(() => convert("str", null), isSerializationError);
    assert.throws(() => convert("str", [1]), isSerializationError);
  });

  test("bool follows truthiness, with empty containers false", () => {
    assert.equal(convert("bool", []), false);
    assert.equal(convert("bool", [0]), true);
    assert.equal(convert("bool", {}), false);
    assert.equal(convert("bool", { a: 1 }), true);
    assert.equal(convert("bool", ""), false);
    assert.equal(convert("bool", "x"), true);
    assert.equal(convert("bool", 0), false);
  });

  test("list splits strings and takes object keys", () => {
    assert.deepEqual(convert("list", "ab"), ["a", "b"]);
    assert.deepEqual(convert("list", { x: 1, y: 2 }), ["x", "y"]);
    assert.deepEqual(convert("list", [1, "a"]), [1, "a"]);
    assert.throws(() => convert("list", 5), isSerializationError);
  });

  test("set collapses duplicates and refuses nested values", () => {
    assert.deepEqual(convert("set", [1, 1, "a"]), new Set([1, "a"]));
    assert.deepEqual(convert("set", "aab"), new Set(["a", "b"]));
    assert.throws(() => convert("set", [[1]]), isSerializationError);
  });

  test("isConverterName knows only the converter table", () => {
    assert.equal(isConverterName("int"), true);
    assert.equal(isConverterName("set"), true);
    assert.equal(isConverterName("dict"), false);
    assert.equal(isConverterName("toString"), false);
    assert.equal(isConverterName(3), false);
  });
});

describe("FieldReader", () => {
  const values = new Map<string, DecodedValue>([
    ["n", 2.5],
    ["count", 4],
    ["s", "x"],
    ["flag", true],
    ["pos", [1, 2]],
    ["tags", new Set(["b", "a"])],
    ["names", ["p", "q"]],
    ["obj", { k: 1 }],
  ]);
  const fields = new FieldReader("Thing", values);

  test("reads typed values", () => {
    assert.equal(fields.number("n"), 2.5);
    assert.equal(fields.int("count"), 4);
    assert.equal(fields.string("s"), "x");
    assert.equal(fields.bool("flag"), true);
    assert.deepEqual(fields.vec2("pos"), [1, 2]);
    assert.deepEqual(fields.stringList("tags"), ["b", "a"]);
    assert.deepEqual(fields.stringList("names"), ["p", "q"]);
    assert.deepEqual(fields.set("names"), new Set(["p", "q"]));
    assert.deepEqual(fields.object("obj"), { k: 1 });
    assert.equal(fields.has("s"), true);
    assert.equal(fields.keys.length, 8);
  });

  test("absent fields take the default or fail naming the class", () => {
    assert.equal(fields.string("missing", "d"), "d");
    assert.throws(() => fields.string("missing"), {
      code: "GLYPH_SERIALIZATION_ERROR",
      message: 'Thing: missing field "missing"',
    });
  });

  test("a field of the wrong type is a serialization error", () => {
    assert.throws(() => fields.int("n"), {
      code: "GLYPH_SERIALIZATION_ERROR",
      message: 'Thing: field "n" should be an integer, got 2.5',
    });
    assert.throws(() => fields.string("count"), isSerializationError);
    assert.throws(() => fields.vec2("n"), isSerializationError);
    assert.throws(() => fields.object("pos"), isSerializationError);
    assert.throws(() => fields.json("tags"), isSerializationError);
  });
});
