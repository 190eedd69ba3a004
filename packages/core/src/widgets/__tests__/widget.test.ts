import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { charsFromRows, copyShape, rowsFromChars } from "../../geometry/grid.js";
import { SwitchingWidget } from "../switchingWidget.js";
import { Widget } from "../widget.js";

function image(rows: readonly string[], color: string) {
  const chars = charsFromRows(rows);
  return { chars, colors: copyShape(chars, color) };
}

describe("Widget", () => {
  test("size comes from the char grid", () => {
    const w = new Widget(charsFromRows(["abc", "def"]), copyShape(charsFromRows(["abc", "def"]), "red"), 3);
    assert.equal(w.width, 3);
    assert.equal(w.height, 2);
    assert.deepEqual(w.size, [3, 2]);
    assert.equal(w.zLevel, 3);
  });

  test("rejects chars and colors of different shape", () => {
    assert.throws(
      () => new Widget(charsFromRows(["ab"]), [["red"]]),
      (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"),
    );
  });

  test("flip mirrors chars and colors on either axis", () => {
    const w = new Widget(charsFromRows(["ab", "cd"]), [
      ["r", "g"],
      ["b", "w"],
    ]);
    w.flip("x");
    assert.deepEqual(rowsFromChars(w.chars), ["ba", "dc"]);
    assert.deepEqual(w.colors, [
      ["g", "r"],
      ["w", "b"],
    ]);
    w.flip("vertical");
    assert.deepEqual(rowsFromChars(w.chars), ["dc", "ba"]);
    assert.throws(() => w.flip(JSON.parse('"z"')), (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"));
  });

  test("serializes rows and comma-joined colors", () => {
    const w = new Widget(charsFromRows(["ab"]), [["red", "blue"]], 2);
    assert.deepEqual(w.serialize(), { class: "Widget", chars: ["ab"], colors: ["red,blue"], z_level: 2 });
  });

  test("a fresh widget has no parent and no terminal", () => {
    const w = new Widget([["x"]], [["red"]]);
    assert.equal(w.parent, null);
    assert.equal(w.terminal, null);
  });
});

describe("SwitchingWidget", () => {
  const images = { idle: image(["o"], "white"), hit: image(["x"], "red") };

  test("starts on the initial image and switches by id", () => {
    const w = new SwitchingWidget(images, "idle");
    assert.equal(w.currentImage, "idle");
    assert.deepEqual(w.chars, [["o"]]);
    w.switchToImage("hit");
    assert.equal(w.currentImage, "hit");
    assert.deepEqual(w.chars, [["x"]]);
    assert.deepEqual(w.colors, [["red"]]);
  });

  test("rejects unknown ids and images of another size", () => {
    const w = new SwitchingWidget(images, "idle");
    assert.throws(() => w.switchToImage("gone"), (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"));
    assert.throws(() => new SwitchingWidget(images, "gone"), (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"));
    assert.throws(
      () => new SwitchingWidget({ idle: image(["o"], "white"), wide: image(["xx"], "red") }, "idle"),
      (err: unknown) => isGlyphError(err, "GLYPH_INVALID_CONFIG"),
    );
  });

  test("serializes every image and the current one as initial", () => {
    const w = new SwitchingWidget(images, "idle", 1);
    w.switchToImage("hit");
    assert.deepEqual(w.serialize(), {
      class: "SwitchingWidget",
      images: {
        idle: { chars: ["o"], colors: ["white"] },
        hit: { chars: ["x"], colors: ["red"] },
      },
      initial_image: "hit",
      z_level: 1,
    });
  });
});
