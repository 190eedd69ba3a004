/**
 * packages/core/src/serial/builtins.ts — Registry entries for every built-in serializable class.
 */

import { CollisionComponent, WalkerCollisionComponent } from "../ecs/collision.js";
import { DecayComponent, type DestroyCondition } from "../ecs/decay.js";
import { DestructorComponent } from "../ecs/destructor.js";
import { PositionComponent } from "../ecs/position.js";
import { SwitchWidgetComponent, WidgetComponent } from "../ecs/widgetComponent.js";
import { serializationError } from "../errors.js";
import type { CellImage } from "../geometry/grid.js";
import { type Animation, MultipleAnimationWidget, SimpleAnimationWidget } from "../widgets/animation.js";
import { InputField, type Justification, Label, isJustification } from "../widgets/label.js";
import { SwitchingWidget } from "../widgets/switchingWidget.js";
import { Widget } from "../widgets/widget.js";
import type { FieldReader } from "./fields.js";
import { type DecodeContext, SerialRegistry, decodeImage } from "./registry.js";
import { isJsonObject } from "./types.js";

function justification(fields: FieldReader): Justification {
  const just = fields.string("just", "left");
  if (!isJustification(just)) {
    serializationError(`${fields.className}: unknown justification "${just}"`);
  }
  return just;
}

function destroyCondition(fields: FieldReader): DestroyCondition {
  const condition = fields.string("destroy_condition", "keypress");
  if (condition !== "keypress" && condition !== "timeout") {
    serializationError(`${fields.className}: unknown destroy_condition "${condition}"`);
  }
  return condition;
}

function imageSet(fields: FieldReader): Record<string, CellImage> {
  const images: Record<string, CellImage> = {};
  for (const [id, record] of Object.entries(fields.object("images"))) {
    if (!isJsonObject(record)) {
      serializationError(`${fields.className}: image "${id}" should be an object`);
    }
    images[id] = decodeImage(record["chars"], record["colors"], `${fields.className} image "${id}"`);
  }
  return images;
}

function animationSet(fields: FieldReader, registry: SerialRegistry, ctx: DecodeContext): Record<string, Animation> {
  const animations: Record<string, Animation> = {};
  for (const [id, record] of Object.entries(fields.object("animations"))) {
    animations[id] = registry.decodeAnimation(record, ctx.atlas);
  }
  return animations;
}

/** Registers the built-in widgets and components on `registry`. */
export function registerBuiltins(registry: SerialRegistry): SerialRegistry {
  registry
    .registerWidget("Widget", (f) => {
      const image = decodeImage(f.json("chars"), f.json("colors"), "Widget");
      return new Widget(image.chars, image.colors, f.int("z_level", 0));
    })
    .registerWidget(
      "SwitchingWidget",
      (f) => new SwitchingWidget(imageSet(f), f.string("initial_image"), f.int("z_level", 0)),
    )
    .registerWidget(
      "Label",
      (f) =>
        new Label(f.string("text"), {
          just: justification(f),
          color: f.string("color", "white"),
          width: f.has("width") ? f.int("width") : undefined,
          height: f.has("height") ? f.int("height") : undefined,
          zLevel: f.int("z_level", 0),
        }),
    )
    .registerWidget("InputField", (f) => {
      const field = new InputField({
        width: f.int("width"),
        height: f.has("height") ? f.int("height") : undefined,
        just: justification(f),
        color: f.string("color", "white"),
        zLevel: f.int("z_level", 0),
        name: f.string("field_name", "Input field"),
        acceptInput: f.bool("accept_input", true),
        finishing: f.bool("finishing", false),
      });
      field.text = f.string("text", "");
      return field;
    })
    .registerWidget(
      "SimpleAnimationWidget",
      (f, reg, ctx) =>
        new SimpleAnimationWidget(reg.decodeAnimation(f.json("animation"), ctx.atlas), {
          emitEcs: f.bool("emit_ecs", true),
          zLevel: f.int("z_level", 0),
        }),
    )
    .registerWidget(
      "MultipleAnimationWidget",
      (f, reg, ctx) =>
        new MultipleAnimationWidget(animationSet(f, reg, ctx), f.string("initial_animation"), {
          emitEcs: f.bool("emit_ecs", true),
          cycle: f.bool("cycle", false),
          zLevel: f.int("z_level", 0),
        }),
    );

  registry
    .registerComponent(
      "WidgetComponent",
      (f, reg, ctx) => new WidgetComponent(ctx.dispatcher ?? null, reg.decodeWidget(f.json("widget"), ctx)),
    )
    .registerComponent("SwitchWidgetComponent", (f, reg, ctx) => {
      const widget = reg.decodeWidget(f.json("widget"), ctx);
      if (!(widget instanceof SwitchingWidget)) {
        serializationError("SwitchWidgetComponent: widget should be a SwitchingWidget");
      }
      return new SwitchWidgetComponent(ctx.dispatcher ?? null, widget);
    })
    .registerComponent(
      "PositionComponent",
      (f, _reg, ctx) =>
        new PositionComponent(ctx.dispatcher ?? null, {
          x: f.number("x", 0),
          y: f.number("y", 0),
          vx: f.number("vx", 0),
          vy: f.number("vy", 0),
          lastMove: f.vec2("last_move", [1, 0]),
          affectZ: f.bool("affect_z", true),
        }),
    )
    .registerComponent(
      "CollisionComponent",
      (f, _reg, ctx) =>
        new CollisionComponent(ctx.dispatcher ?? null, {
          depth: f.int("depth", 0),
          zShift: f.vec2("z_shift", [0, 0]),
          facePosition: f.vec2("face_position", [0, 0]),
          faceSize: f.vec2("face_size", [0, 0]),
          passable: f.bool("passable", false),
        }),
    )
    .registerComponent("WalkerCollisionComponent", (f, _reg, ctx) => {
      if (ctx.tracker === undefined) {
        serializationError("WalkerCollisionComponent: an entity tracker is required to decode it");
      }
      return new WalkerCollisionComponent(ctx.dispatcher ?? null, {
        tracker: ctx.tracker,
        depth: f.int("depth", 0),
        zShift: f.vec2("z_shift", [0, 0]),
        facePosition: f.vec2("face_position", [0, 0]),
        faceSize: f.vec2("face_size", [0, 0]),
        passable: f.bool("passable", false),
      });
    })
    .registerComponent("DestructorComponent", (_f, _reg, ctx) => new DestructorComponent(ctx.dispatcher ?? null))
    .registerComponent(
      "DecayComponent",
      (f, _reg, ctx) =>
        new DecayComponent(ctx.dispatcher ?? null, {
          destroyCondition: destroyCondition(f),
          lifetime: f.number("lifetime", 1),
          age: f.number("age", 0),
        }),
    );
  return registry;
}

/** A registry holding every built-in serializable class. */
export function createDefaultRegistry(): SerialRegistry {
  return registerBuiltins(new SerialRegistry());
}
