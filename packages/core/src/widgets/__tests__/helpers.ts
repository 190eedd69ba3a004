import type { Vec2 } from "../../geometry/grid.js";
import { fillGrid } from "../../geometry/grid.js";
import { Widget, type WidgetSurface } from "../widget.js";

export function block(ch: string, w: number, h: number, color = "red", zLevel = 0): Widget {
  return new Widget(fillGrid(w, h, ch), fillGrid(w, h, color), zLevel);
}

/** Surface that places every widget at `origin` and records repaint requests. */
export class FakeSurface implements WidgetSurface {
  readonly updated: Widget[] = [];
  readonly state = new Map<string, number>();
  private readonly origin: Vec2;

  constructor(origin: Vec2 = [0, 0]) {
    this.origin = origin;
  }

  updateWidget(widget: Widget): void {
    this.updated.push(widget);
  }

  widgetPosition(_widget: Widget): Vec2 | undefined {
    return this.origin;
  }

  checkState(name: string): number {
    return this.state.get(name) ?? 0;
  }

  /** Attaches `widget` the way a terminal does for widgets it places directly. */
  place(widget: Widget): void {
    widget.terminal = this;
    widget.parent = this;
  }
}
