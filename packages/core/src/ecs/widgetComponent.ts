/**
 * packages/core/src/ecs/widgetComponent.ts — Widgets as entity components.
 *
 * Why: Some visual logic belongs to the widget (an animation keeps running on
 * its own), so the component forwards `tick` to it. Layouts find the widget to
 * place through this slot.
 */

import { ecsError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import type { DispatchResult, GlyphEvent } from "../events/types.js";
import type { Vec2 } from "../geometry/grid.js";
import type { SerialRecord } from "../serial/types.js";
import { SwitchingWidget } from "../widgets/switchingWidget.js";
import { Widget } from "../widgets/widget.js";
import { Component } from "./component.js";

export class WidgetComponent extends Component {
  static override readonly slot: string = "widget";

  readonly widget: Widget;

  constructor(dispatcher: EventDispatcher | null, widget: Widget) {
    if (!(widget instanceof Widget)) {
      ecsError("WidgetComponent needs a Widget");
    }
    super(dispatcher, "widget");
    this.widget = widget;
    this.subscribe("tick");
  }

  get width(): number {
    return this.widget.width;
  }

  get height(): number {
    return this.widget.height;
  }

  get size(): Vec2 {
    return this.widget.size;
  }

  get zLevel(): number {
    return this.widget.zLevel;
  }

  set zLevel(value: number) {
    this.widget.zLevel = value;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    return this.widget.onEvent(event);
  }

  override serialize(): SerialRecord {
    return { class: this.serialClass(), widget: this.widget.serialize() };
  }

  protected override serialClass(): string {
    return "WidgetComponent";
  }
}

/** A widget component whose widget switches between named images. */
export class SwitchWidgetComponent extends WidgetComponent {
  private readonly switching: SwitchingWidget;

  constructor(dispatcher: EventDispatcher | null, widget: SwitchingWidget) {
    if (!(widget instanceof SwitchingWidget)) {
      ecsError("SwitchWidgetComponent can only be used with a SwitchingWidget");
    }
    super(dispatcher, widget);
    this.switching = widget;
  }

  get currentImage(): string {
    return this.switching.currentImage;
  }

  /** Unknown ids raise a config error from the widget. */
  switchToImage(id: string): void {
    this.switching.switchToImage(id);
  }

  validateImage(id: string): boolean {
    return Object.hasOwn(this.switching.images, id);
  }

  protected override serialClass(): string {
    return "SwitchWidgetComponent";
  }
}
