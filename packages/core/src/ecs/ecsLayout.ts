/**
 * packages/core/src/ecs/ecsLayout.ts — Layout of entity widgets driven by `ecs_*` events.
 *
 * Why: Entities never touch the layout directly. They announce creation,
 * placement, movement and destruction as events, and the layout keeps the
 * widgets in step, reports collisions and redraws at most once per tick.
 *
 * Collisions are advisory. A move that stays inside the field always happens
 * and yields one `ecs_collision` per distinct entity under the new box, in the
 * order their cells are first met scanning rows top to bottom. A move that
 * would leave the field does not happen and yields a single collision with
 * `other: null`.
 *
 * Events keep arriving for an entity between `destroy()` and end of tick.
 * Those naming an id the layout no longer knows are logged at debug level and
 * dropped.
 */

import { ecsError, isGlyphError } from "../errors.js";
import {
  type DispatchResult,
  type EntityPosition,
  type GlyphEvent,
  createEvent,
  isEventOf,
  isTickOver,
} from "../events/types.js";
import type { CharGrid, ColorGrid, Vec2 } from "../geometry/grid.js";
import { boxInside } from "../geometry/rect.js";
import { type Logger, silentLogger } from "../logging.js";
import { Layout } from "../widgets/layout.js";
import { type ViewOptions, ViewWindow } from "../widgets/scrollable.js";
import type { Widget } from "../widgets/widget.js";
import type { Entity } from "./entity.js";
import { WidgetComponent } from "./widgetComponent.js";

export type ECSLayoutOptions = Readonly<{
  logger?: Logger;
}>;

export class ECSLayout extends Layout {
  readonly entities = new Map<string, Entity>();
  readonly widgets = new Map<string, Widget>();
  /** Set by any change that needs a recomposite at end of tick. */
  needRedraw = false;
  protected readonly logger: Logger;
  private readonly widgetOwners = new Map<Widget, string>();

  constructor(chars: CharGrid, colors: ColorGrid, opts: ECSLayoutOptions = {}) {
    super(chars, colors);
    this.logger = (opts.logger ?? silentLogger).child("ecs-layout");
  }

  /** Registers the entity's widget. It is not shown until an `ecs_add` for it. */
  addEntity(entity: Entity): void {
    const component = entity.get(WidgetComponent);
    if (component === undefined) {
      ecsError(`entity "${entity.id}" has no widget component`);
    }
    const previous = this.widgets.get(entity.id);
    if (previous !== undefined) this.widgetOwners.delete(previous);
    this.entities.set(entity.id, entity);
    this.widgets.set(entity.id, component.widget);
    this.widgetOwners.set(component.widget, entity.id);
  }

  /** Id of the entity whose widget this is. */
  entityIdOf(widget: Widget): string | undefined {
    return this.widgetOwners.get(widget);
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "ecs_move")) return this.handleMove(event.value);
    if (isEventOf(event, "ecs_create")) {
      if (event.value.get(WidgetComponent) === undefined) {
        this.logger.debug("entity without a widget ignored", { id: event.value.id });
        return undefined;
      }
      this.addEntity(event.value);
      this.needRedraw = true;
    } else if (isEventOf(event, "ecs_add")) {
      this.handleAdd(event.value);
    } else if (isEventOf(event, "ecs_remove")) {
      this.hide(event.value);
    } else if (isEventOf(event, "ecs_destroy")) {
      this.forget(event.value);
    } else if (isEventOf(event, "ecs_update")) {
      this.needRedraw = true;
    } else if (isTickOver(event) && this.needRedraw) {
      this.rebuild();
      if (this.placedOnTerminal) this.terminal?.updateWidget(this);
      this.needRedraw = false;
    }
    return undefined;
  }

  /**
   * Ids of the entities the mover collides with at `pos`, without duplicates.
   * The mover's widget is already at `pos` when this runs.
   */
  protected collisionsAt(id: string, widget: Widget, pos: Vec2): string[] {
    const found: string[] = [];
    const [x, y] = pos;
    for (let dy = 0; dy < widget.height; dy++) {
      for (let dx = 0; dx < widget.width; dx++) {
        for (const other of this.coverageAt(x + dx, y + dy)) {
          const otherId = this.widgetOwners.get(other);
          if (otherId === undefined || otherId === id || found.includes(otherId)) continue;
          found.push(otherId);
        }
      }
    }
    return found;
  }

  private handleMove(move: EntityPosition): DispatchResult {
    const widget = this.widgets.get(move.id);
    if (widget === undefined || this.childPosition(widget) === undefined) {
      this.logger.debug("move for an entity not on the layout", { id: move.id });
      return undefined;
    }
    const pos: Vec2 = [move.x, move.y];
    if (!boxInside(pos, widget.size, this.field)) {
      return createEvent("ecs_collision", { mover: move.id, other: null });
    }
    this.moveChild(widget, pos);
    this.needRedraw = true;
    return this.collisionsAt(move.id, widget, pos).map((other) =>
      createEvent("ecs_collision", { mover: move.id, other }),
    );
  }

  private handleAdd(add: EntityPosition): void {
    const widget = this.widgets.get(add.id);
    if (widget === undefined) {
      this.logger.debug("add for an unknown entity", { id: add.id });
      return;
    }
    this.addChild(widget, [add.x, add.y]);
    this.needRedraw = true;
  }

  private hide(id: string): void {
    const widget = this.widgets.get(id);
    if (widget === undefined || this.childPosition(widget) === undefined) {
      this.logger.debug("remove for an entity not on the layout", { id });
      return;
    }
    this.removeChild(widget);
    this.needRedraw = true;
  }

  private forget(id: string): void {
    const widget = this.widgets.get(id);
    if (widget === undefined) {
      this.logger.debug("destroy for an unknown entity", { id });
      return;
    }
    if (this.childPosition(widget) !== undefined) this.removeChild(widget);
    this.widgets.delete(id);
    this.entities.delete(id);
    this.widgetOwners.delete(widget);
    this.needRedraw = true;
  }
}

/**
 * An ECS layout showing a window onto a larger field, moved by
 * `ecs_scroll_by` and `ecs_scroll_to`. Targets outside the field are ignored.
 */
export class ScrollableECSLayout extends ECSLayout {
  private readonly window: ViewWindow;

  /** `chars` and `colors` cover the whole field. */
  constructor(chars: CharGrid, colors: ColorGrid, opts: ViewOptions & ECSLayoutOptions = {}) {
    super(chars, colors, opts);
    this.window = new ViewWindow(this.field, opts);
    this.rebuild();
  }

  get viewPos(): Vec2 {
    return this.window.pos;
  }

  get viewSize(): Vec2 {
    return this.window.size;
  }

  override onEvent(event: GlyphEvent): DispatchResult {
    if (isEventOf(event, "ecs_scroll_by")) {
      const shift = event.value;
      this.tryScroll(() => this.window.scrollBy(shift));
      return undefined;
    }
    if (isEventOf(event, "ecs_scroll_to")) {
      const target = event.value;
      this.tryScroll(() => this.window.scrollTo(target));
      return undefined;
    }
    return super.onEvent(event);
  }

  override rebuild(): void {
    const out = this.composite(this.window.pos, this.window.size);
    this.chars = out.chars;
    this.colors = out.colors;
  }

  protected override viewOrigin(): Vec2 {
    return this.window.pos;
  }

  protected override serialClass(): string {
    return "ScrollableECSLayout";
  }

  private tryScroll(action: () => void): void {
    try {
      action();
    } catch (err) {
      if (!isGlyphError(err, "GLYPH_LAYOUT_ERROR")) throw err;
      this.logger.debug("scroll target ignored", { reason: err.message });
      return;
    }
    this.needRedraw = true;
  }
}
