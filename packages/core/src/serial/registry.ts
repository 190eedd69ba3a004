/**
 * packages/core/src/serial/registry.ts — Name-to-factory registry for saved widgets and components.
 *
 * Why: A record names its class with a `"class"` key and inlines the
 * constructor options next to it. Resolving the name goes through an explicit
 * table filled at startup, so only classes the application registered can be
 * created from data.
 *
 * Keys that would inject runtime wiring (`name`, `owner`, `dispatcher`,
 * `parent`, `terminal`) are refused. A `"<field>_type"` key names a primitive
 * converter applied to `<field>` before the factory sees it.
 */

import type { Component } from "../ecs/component.js";
import { Entity, type EntityRecord } from "../ecs/entity.js";
import type { EntityTracker } from "../ecs/tracker.js";
import { describeValue, isGlyphError, serializationError } from "../errors.js";
import type { EventDispatcher } from "../events/dispatcher.js";
import { type CellImage, charsFromRows } from "../geometry/grid.js";
import type { ElementSource } from "../resources/imageSource.js";
import { Animation } from "../widgets/animation.js";
import type { Widget } from "../widgets/widget.js";
import { type DecodedValue, convert, isConverterName } from "./converters.js";
import { FieldReader } from "./fields.js";
import { type JsonObject, type JsonValue, isJsonObject } from "./types.js";

export const FORBIDDEN_KEYS: ReadonlySet<string> = new Set(["name", "owner", "dispatcher", "parent", "terminal"]);

const TYPE_SUFFIX = "_type";

function converterTarget(key: string): string | null {
  return key.endsWith(TYPE_SUFFIX) && key.length > TYPE_SUFFIX.length ? key.slice(0, -TYPE_SUFFIX.length) : null;
}

/** Runtime collaborators a factory may need; never part of the saved data. */
export type DecodeContext = Readonly<{
  dispatcher?: EventDispatcher | null;
  tracker?: EntityTracker;
  /** Resolves `frame_ids` of atlas-backed animations. */
  atlas?: ElementSource;
}>;

export type WidgetFactory = (fields: FieldReader, registry: SerialRegistry, ctx: DecodeContext) => Widget;

export type ComponentFactory = (fields: FieldReader, registry: SerialRegistry, ctx: DecodeContext) => Component;

/** A record as text or as already-parsed JSON. */
export type SerialInput = string | JsonValue;

type ParsedRecord = Readonly<{ className: string; fields: FieldReader }>;

function parseJson(text: string, what: string): JsonValue {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (err) {
    return serializationError(`${what}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
}

function parse(serial: SerialInput, what: string): JsonObject {
  const value = typeof serial === "string" ? parseJson(serial, what) : serial;
  if (!isJsonObject(value)) {
    serializationError(`${what}: expected a JSON object, got ${describeValue(value)}`);
  }
  return value;
}

/** Converts a row list and a comma-joined color row list back into an image. */
export function decodeImage(chars: JsonValue | undefined, colors: JsonValue | undefined, where: string): CellImage {
  if (!Array.isArray(chars) || !chars.every((row): row is string => typeof row === "string")) {
    serializationError(`${where}: chars should be a list of strings`);
  }
  if (!Array.isArray(colors) || !colors.every((row): row is string => typeof row === "string")) {
    serializationError(`${where}: colors should be a list of strings`);
  }
  return { chars: charsFromRows(chars), colors: colors.map((row) => row.split(",")) };
}

export class SerialRegistry {
  private readonly widgets = new Map<string, WidgetFactory>();
  private readonly components = new Map<string, ComponentFactory>();

  registerWidget(className: string, factory: WidgetFactory): this {
    this.widgets.set(className, factory);
    return this;
  }

  registerComponent(className: string, factory: ComponentFactory): this {
    this.components.set(className, factory);
    return this;
  }

  get widgetClasses(): readonly string[] {
    return Array.from(this.widgets.keys());
  }

  get componentClasses(): readonly string[] {
    return Array.from(this.components.keys());
  }

  decodeWidget(serial: SerialInput, ctx: DecodeContext = {}): Widget {
    const { className, fields } = this.readRecord(serial, "widget");
    const factory = this.widgets.get(className);
    if (factory === undefined) {
      serializationError(`widget class "${className}" is not registered`);
    }
    return this.build(className, () => factory(fields, this, ctx));
  }

  decodeComponent(serial: SerialInput, ctx: DecodeContext = {}): Component {
    const { className, fields } = this.readRecord(serial, "component");
    const factory = this.components.get(className);
    if (factory === undefined) {
      serializationError(`component class "${className}" is not registered`);
    }
    return this.build(className, () => factory(fields, this, ctx));
  }

  /**
   * Rebuilds an entity and its components. Nothing is announced: emitting
   * `ecs_create` and `ecs_add` is up to the caller.
   */
  decodeEntity(serial: SerialInput, ctx: DecodeContext = {}): Entity {
    const record = parse(serial, "entity");
    const id = record["id"];
    const components = record["components"];
    if (typeof id !== "string") {
      serializationError("entity: id should be a string");
    }
    if (!isJsonObject(components)) {
      serializationError("entity: components should be an object of component records");
    }
    return new Entity(
      id,
      Object.values(components).map((c) => this.decodeComponent(c, ctx)),
    );
  }

  /** `storage_type: "atlas"` needs `atlas` to resolve the frame ids. */
  decodeAnimation(serial: SerialInput, atlas?: ElementSource): Animation {
    const record = parse(serial, "animation");
    const fields = this.readFields("Animation", record);
    const fps = fields.number("fps");
    const storage = fields.string("storage_type");
    if (storage === "atlas") {
      if (atlas === undefined) {
        serializationError("animation: an atlas is required to load atlas-backed frames");
      }
      const source = atlas;
      const ids = fields.stringList("frame_ids");
      return this.build("Animation", () =>
        new Animation(
          ids.map((frameId) => source.getElement(frameId)),
          fps,
          ids,
        ),
      );
    }
    if (storage === "dump") {
      const frames = fields.json("frames");
      if (!Array.isArray(frames)) {
        serializationError("animation: frames should be a list of [chars, colors] pairs");
      }
      const images = frames.map((frame: JsonValue, i: number) => {
        if (!Array.isArray(frame) || frame.length !== 2) {
          serializationError(`animation: frame ${String(i)} should be a [chars, colors] pair`);
        }
        return decodeImage(frame[0], frame[1], `animation frame ${String(i)}`);
      });
      return this.build("Animation", () => new Animation(images, fps));
    }
    return serializationError(`animation: unknown storage_type "${storage}"`);
  }

  /** JSON text of anything that can describe itself. */
  encode(value: Readonly<{ serialize(): JsonObject | EntityRecord }>): string {
    return JSON.stringify(value.serialize());
  }

  private readRecord(serial: SerialInput, what: string): ParsedRecord {
    const record = parse(serial, what);
    const className = record["class"];
    if (className === undefined) {
      serializationError(`${what}: no class provided`);
    }
    if (typeof className !== "string") {
      serializationError(`${what}: class should be a string, got ${describeValue(className)}`);
    }
    const rest: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(record)) {
      if (key !== "class") rest[key] = value;
    }
    return { className, fields: this.readFields(className, rest) };
  }

  /** `<field>_type` names a converter only when `<field>` sits beside it; otherwise it is a plain field. */
  private readFields(className: string, record: JsonObject): FieldReader {
    const values = new Map<string, DecodedValue>();
    for (const [key, value] of Object.entries(record)) {
      if (FORBIDDEN_KEYS.has(key)) {
        serializationError(`${className}: forbidden key "${key}"`);
      }
      const base = converterTarget(key);
      if (base !== null && Object.hasOwn(record, base)) continue;
      const name = record[`${key}${TYPE_SUFFIX}`];
      if (name === undefined) {
        values.set(key, value);
        continue;
      }
      if (!isConverterName(name)) {
        serializationError(`${className}: unknown converter ${describeValue(name)} in "${key}${TYPE_SUFFIX}"`);
      }
      values.set(key, convert(name, value));
    }
    return new FieldReader(className, values);
  }

  /** Runs a constructor, reporting its config errors as serialization errors. */
  private build<T>(className: string, make: () => T): T {
    try {
      return make();
    } catch (err) {
      if (isGlyphError(err, "GLYPH_INVALID_CONFIG") || isGlyphError(err, "GLYPH_ECS_ERROR")) {
        serializationError(`${className}: ${err.message}`);
      }
      throw err;
    }
  }
}
