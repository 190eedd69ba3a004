/**
 * packages/core/src/widgets/switchingWidget.ts — Widget that flips between named images.
 */

import { invalidConfig } from "../errors.js";
import { type CellImage, assertImageShape, rowsFromChars, shapesEqual } from "../geometry/grid.js";
import type { JsonValue, SerialRecord } from "../serial/types.js";
import { Widget } from "./widget.js";

export type ImageSet = Readonly<Record<string, CellImage>>;

export class SwitchingWidget extends Widget {
  readonly images: ImageSet;
  private current: string;

  constructor(images: ImageSet, initialImage: string, zLevel = 0) {
    const first = images[initialImage];
    if (first === undefined) {
      invalidConfig(`SwitchingWidget: initial image "${initialImage}" is not in the image set`);
    }
    for (const [id, image] of Object.entries(images)) {
      assertImageShape(image.chars, image.colors, `SwitchingWidget image "${id}"`);
      if (!shapesEqual(image.chars, first.chars)) {
        invalidConfig(`SwitchingWidget: image "${id}" differs in size from "${initialImage}"`);
      }
    }
    super(first.chars, first.colors, zLevel);
    this.images = images;
    this.current = initialImage;
  }

  get currentImage(): string {
    return this.current;
  }

  switchToImage(id: string): void {
    if (id === this.current) return;
    const image = this.images[id];
    if (image === undefined) {
      invalidConfig(`SwitchingWidget: unknown image id "${id}"`);
    }
    this.chars = image.chars;
    this.colors = image.colors;
    this.current = id;
  }

  override serialize(): SerialRecord {
    const images: Record<string, JsonValue> = {};
    for (const [id, image] of Object.entries(this.images)) {
      images[id] = {
        chars: rowsFromChars(image.chars),
        colors: image.colors.map((row) => row.join(",")),
      };
    }
    return {
      class: this.serialClass(),
      images,
      initial_image: this.current,
      z_level: this.zLevel,
    };
  }

  protected override serialClass(): string {
    return "SwitchingWidget";
  }
}
