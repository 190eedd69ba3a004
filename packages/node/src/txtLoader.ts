/**
 * packages/node/src/txtLoader.ts — Plain-text ASCII art and JSON atlases from disk.
 *
 * Why: Text files carry no colors, so every char of a loaded image gets the
 * loader's default color. The file must exist when the loader is created but
 * is only read on first use.
 */

import { existsSync, readFileSync } from "node:fs";
import {
  type CellImage,
  type CharGrid,
  type ImageSource,
  ImageAtlas,
  copyShape,
  invalidConfig,
  isAtlasElement,
  regionOf,
} from "@glyphbox/core";

export type TxtLoaderOptions = Readonly<{
  defaultColor?: string;
  /** Read the file now instead of on the first image request. */
  eager?: boolean;
}>;

/** Splits file text into equal-length char rows; a trailing newline adds no row. */
export function parseTxtImage(text: string, where: string): CharGrid {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  const rows = lines.map((line) => Array.from(line));
  const width = rows[0]?.length ?? 0;
  if (width === 0) {
    invalidConfig(`${where}: the image is empty`);
  }
  if (rows.some((row) => row.length !== width)) {
    invalidConfig(`${where}: all lines should be equal length`);
  }
  return rows;
}

export class TxtLoader implements ImageSource {
  readonly path: string;
  readonly defaultColor: string;
  private image: CellImage | null = null;

  constructor(path: string, opts: TxtLoaderOptions = {}) {
    if (!existsSync(path)) {
      invalidConfig(`TxtLoader: nonexistent path ${path}`);
    }
    this.path = path;
    this.defaultColor = opts.defaultColor ?? "white";
    if (opts.eager === true) this.load();
  }

  get loaded(): boolean {
    return this.image !== null;
  }

  getImage(): CellImage {
    const { chars, colors } = this.load();
    return { chars: chars.map((row) => row.slice()), colors: colors.map((row) => row.slice()) };
  }

  getImageRegion(x: number, y: number, w: number, h: number): CellImage {
    return regionOf(this.load(), x, y, w, h);
  }

  private load(): CellImage {
    if (this.image !== null) return this.image;
    const chars = parseTxtImage(readFileSync(this.path, "utf8"), `TxtLoader(${this.path})`);
    this.image = { chars, colors: copyShape(chars, this.defaultColor) };
    return this.image;
  }
}

/** Reads a JSON list of `{ name, x, y, xsize, ysize }` regions over `source`. */
export function loadAtlas(source: ImageSource, jsonPath: string): ImageAtlas {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(jsonPath, "utf8"));
  } catch (err) {
    invalidConfig(`loadAtlas(${jsonPath}): ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(parsed) || !parsed.every(isAtlasElement)) {
    invalidConfig(`loadAtlas(${jsonPath}): expected a list of { name, x, y, xsize, ysize } elements`);
  }
  return new ImageAtlas(source, parsed);
}
