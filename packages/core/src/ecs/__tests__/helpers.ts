import type { EventDispatcher } from "../../events/dispatcher.js";
import { createEvent } from "../../events/types.js";
import { type Vec2, fillGrid } from "../../geometry/grid.js";
import { Widget } from "../../widgets/widget.js";
import type { Component } from "../component.js";
import { ECSLayout, type ECSLayoutOptions } from "../ecsLayout.js";
import { Entity } from "../entity.js";
import { PositionComponent, type PositionOptions } from "../position.js";
import { WidgetComponent } from "../widgetComponent.js";

export function sprite(ch: string, size: Vec2 = [1, 1], zLevel = 0): Widget {
  return new Widget(fillGrid(size[0], size[1], ch), fillGrid(size[0], size[1], "white"), zLevel);
}

/** An ECS layout over a `.` field, subscribed to every `ecs_*` event and to `service`. */
export function ecsField(dispatcher: EventDispatcher, size: Vec2, opts: ECSLayoutOptions = {}): ECSLayout {
  const layout = new ECSLayout(fillGrid(size[0], size[1], "."), fillGrid(size[0], size[1], "white"), opts);
  dispatcher.register(layout, "*ecs_");
  dispatcher.register(layout, "service");
  return layout;
}

export type Actor = Readonly<{
  entity: Entity;
  position: PositionComponent;
  widget: WidgetComponent;
}>;

/** Entity with a widget and a position; `extra` components are added after those two. */
export function actor(
  dispatcher: EventDispatcher,
  id: string,
  ch: string,
  opts: PositionOptions & Readonly<{ size?: Vec2; zLevel?: number; extra?: readonly Component[] }> = {},
): Actor {
  const widget = new WidgetComponent(dispatcher, sprite(ch, opts.size, opts.zLevel));
  const position = new PositionComponent(dispatcher, opts);
  const entity = new Entity(id, [widget, position, ...(opts.extra ?? [])]);
  return { entity, position, widget };
}

/** Announces the actor and places it at its current position, then delivers everything. */
export function spawn(dispatcher: EventDispatcher, ...actors: readonly Actor[]): void {
  for (const a of actors) {
    dispatcher.enqueue(createEvent("ecs_create", a.entity));
    dispatcher.enqueue(createEvent("ecs_add", { id: a.entity.id, x: a.position.x, y: a.position.y }));
  }
  dispatcher.drain();
}

export function tickOver(dispatcher: EventDispatcher): void {
  dispatcher.enqueue(createEvent("service", "tick_over"));
  dispatcher.drain();
}
