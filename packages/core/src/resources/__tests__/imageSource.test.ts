import { assert, describe, test } from "@glyphbox/testkit";
import { isGlyphError } from "../../errors.js";
import { charsFromRows } from "../../geometry/grid.js";
import { GridImageSource, ImageAtlas, isAtlasElement, regionOf } from "../imageSource.js";

function isConfigError(err: unknown): boolean {
  return isGlyphError(err, "GLYPH_INVALID_CONFIG");
}

const image = {
  chars: charsFromRows(["abc", "def"]),
  colors: [
    ["r", "g", "b"],
    ["c", "m", "y"],
  ],
};

describe("regionOf", () => {
  test("copies the requested window", () => {
    assert.deepEqual(regionOf(image, 1, 0, 2, 2), {
      chars: [
        ["b", "c"],
        ["e", "f"],
      ],
      colors: [
        ["g", "b"],
        ["m", "y"],
      ],
    });
  });

  test("refuses origins outside and windows past the edge", () => {
    assert.throws(() => regionOf(image, -1, 0, 1, 1), { message: "region outside the image boundaries" });
    assert.throws(() => regionOf(image, 4, 0, 1, 1), { message: "region outside the image boundaries" });
    assert.throws(() => regionOf(image, 2, 1, 2, 1), { message: "region too big for the image" });
  });
});

describe("GridImageSource", () => {
  test("hands out copies", () => {
    const source = new GridImageSource(image.chars, image.colors);
    const first = source.getImage();
    first.chars[0]?.splice(0, 1, "X");
    assert.deepEqual(source.getImage().chars[0], ["a", "b", "c"]);
    assert.deepEqual(source.getImageRegion(0, 1, 1, 1), { chars: [["d"]], colors: [["c"]] });
  });

  test("needs matching grids", () => {
    assert.throws(() => new GridImageSource(charsFromRows(["ab"]), [["r"]]), isConfigError);
  });
});

describe("ImageAtlas", () => {
  const atlas = new ImageAtlas(new GridImageSource(image.chars, image.colors), [
    { name: "top", x: 0, y: 0, xsize: 3, ysize: 1 },
    { name: "corner", x: 2, y: 1, xsize: 1, ysize: 1 },
  ]);

  test("resolves named elements", () => {
    assert.deepEqual(atlas.names, ["top", "corner"]);
    assert.equal(atlas.has("corner"), true);
    assert.deepEqual(atlas.getElement("top").chars, [["a", "b", "c"]]);
    assert.deepEqual(atlas.getElement("corner"), { chars: [["f"]], colors: [["y"]] });
  });

  test("unknown names and malformed elements are config errors", () => {
    assert.throws(() => atlas.getElement("nope"), { message: 'ImageAtlas: no element named "nope"' });
    assert.equal(isAtlasElement({ name: "a", x: 0, y: 0, xsize: 1 }), false);
    assert.equal(isAtlasElement({ name: "a", x: -1, y: 0, xsize: 1, ysize: 1 }), false);
    assert.equal(isAtlasElement({ name: "a", x: 0, y: 0, xsize: 1, ysize: 1 }), true);
    assert.throws(
      () => new ImageAtlas(new GridImageSource(image.chars, image.colors), JSON.parse('[{"name":"a","x":0.5}]')),
      isConfigError,
    );
  });
});
