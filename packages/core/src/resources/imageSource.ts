/**
 * packages/core/src/resources/imageSource.ts — Providers of ASCII-art images and regions.
 *
 * Why: Widgets and animations only need `{ chars, colors }` grids. Whatever
 * file format the art came from stays behind this interface; the node
 * package adds a plain-text loader on top of it.
 */

import { invalidConfig } from "../errors.js";
import { type CellImage, type CharGrid, type ColorGrid, assertImageShape, cloneGrid, gridWidth, sliceGrid } from "../geometry/grid.js";

export interface ImageSource {
  getImage(): CellImage;
  /** The `w` by `h` region with its top-left corner at `(x, y)`. */
  getImageRegion(x: number, y: number, w: number, h: number): CellImage;
}

/** Named regions of one image, e.g. the frames of a sprite sheet. */
export interface ElementSource {
  getElement(name: string): CellImage;
}

/** Bounds-checked region copy shared by every image source. */
export function regionOf(image: CellImage, x: number, y: number, w: number, h: number): CellImage {
  const width = gridWidth(image.chars);
  const height = image.chars.length;
  if (x < 0 || y < 0 || x > width || y > height) {
    invalidConfig("region outside the image boundaries");
  }
  if (x + w > width || y + h > height) {
    invalidConfig("region too big for the image");
  }
  return { chars: sliceGrid(image.chars, [x, y], [w, h]), colors: sliceGrid(image.colors, [x, y], [w, h]) };
}

/** An image held in memory. Returned grids are copies. */
export class GridImageSource implements ImageSource {
  private readonly chars: CharGrid;
  private readonly colors: ColorGrid;

  constructor(chars: CharGrid, colors: ColorGrid) {
    assertImageShape(chars, colors, "GridImageSource");
    this.chars = cloneGrid(chars);
    this.colors = cloneGrid(colors);
  }

  getImage(): CellImage {
    return { chars: cloneGrid(this.chars), colors: cloneGrid(this.colors) };
  }

  getImageRegion(x: number, y: number, w: number, h: number): CellImage {
    return regionOf({ chars: this.chars, colors: this.colors }, x, y, w, h);
  }
}

export type AtlasElement = Readonly<{
  name: string;
  x: number;
  y: number;
  xsize: number;
  ysize: number;
}>;

export function isAtlasElement(v: unknown): v is AtlasElement {
  if (typeof v !== "object" || v === null) return false;
  if (!("name" in v) || typeof v.name !== "string") return false;
  for (const key of ["x", "y", "xsize", "ysize"] as const) {
    if (!(key in v)) return false;
    const n: unknown = Reflect.get(v, key);
    if (typeof n !== "number" || !Number.isInteger(n) || n < 0) return false;
  }
  return true;
}

/** Named regions over an {@link ImageSource}. */
export class ImageAtlas implements ElementSource {
  readonly source: ImageSource;
  private readonly elements = new Map<string, AtlasElement>();

  constructor(source: ImageSource, elements: readonly AtlasElement[]) {
    this.source = source;
    for (const element of elements) {
      if (!isAtlasElement(element)) {
        invalidConfig("ImageAtlas: every element needs a name and integer x, y, xsize, ysize");
      }
      this.elements.set(element.name, element);
    }
  }

  get names(): readonly string[] {
    return Array.from(this.elements.keys());
  }

  has(name: string): boolean {
    return this.elements.has(name);
  }

  getElement(name: string): CellImage {
    const element = this.elements.get(name);
    if (element === undefined) {
      invalidConfig(`ImageAtlas: no element named "${name}"`);
    }
    return this.source.getImageRegion(element.x, element.y, element.xsize, element.ysize);
  }
}
