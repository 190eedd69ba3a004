/**
 * packages/core/src/serial/fields.ts — Typed access to the fields of a decoded record.
 */

import { describeValue, serializationError } from "../errors.js";
import type { Vec2 } from "../geometry/grid.js";
import { isIntVec2 } from "../geometry/rect.js";
import type { DecodedValue } from "./converters.js";
import { type JsonObject, type JsonPrimitive, type JsonValue, isJsonObject } from "./types.js";

export function isDecodedSet(v: DecodedValue): v is ReadonlySet<JsonPrimitive> {
  return v instanceof Set;
}

/**
 * Field lookups for one record. Absent fields take the given default; a
 * present field of the wrong type is a serialization error naming the class.
 */
export class FieldReader {
  readonly className: string;
  private readonly values: ReadonlyMap<string, DecodedValue>;

  constructor(className: string, values: ReadonlyMap<string, DecodedValue>) {
    this.className = className;
    this.values = values;
  }

  get keys(): readonly string[] {
    return Array.from(this.values.keys());
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  string(key: string, fallback?: string): string {
    const v = this.raw(key, fallback);
    if (typeof v !== "string") this.wrong(key, "a string", v);
    return v;
  }

  number(key: string, fallback?: number): number {
    const v = this.raw(key, fallback);
    if (typeof v !== "number" || !Number.isFinite(v)) this.wrong(key, "a number", v);
    return v;
  }

  int(key: string, fallback?: number): number {
    const v = this.number(key, fallback);
    if (!Number.isInteger(v)) this.wrong(key, "an integer", v);
    return v;
  }

  bool(key: string, fallback?: boolean): boolean {
    const v = this.raw(key, fallback);
    if (typeof v !== "boolean") this.wrong(key, "a boolean", v);
    return v;
  }

  vec2(key: string, fallback?: Vec2): Vec2 {
    const v = this.raw(key, fallback);
    if (!isIntVec2(v)) this.wrong(key, "a pair of integers", v);
    return [v[0], v[1]];
  }

  stringList(key: string, fallback?: readonly string[]): string[] {
    const v = this.raw(key, fallback);
    let items: readonly unknown[];
    if (isDecodedSet(v)) items = Array.from(v);
    else if (Array.isArray(v)) items = v;
    else return this.wrong(key, "a list of strings", v);
    const out: string[] = [];
    for (const item of items) {
      if (typeof item !== "string") this.wrong(key, "a list of strings", v);
      out.push(item);
    }
    return out;
  }

  object(key: string): JsonObject {
    const v = this.raw(key);
    if (isDecodedSet(v) || !isJsonObject(v)) this.wrong(key, "an object", v);
    return v;
  }

  /** A converted `set` field, or a plain list read as one. */
  set(key: string, fallback?: ReadonlySet<JsonPrimitive>): ReadonlySet<JsonPrimitive> {
    const v = this.raw(key, fallback);
    if (isDecodedSet(v)) return v;
    if (Array.isArray(v) && v.every((item): item is JsonPrimitive => item === null || typeof item !== "object")) {
      return new Set(v);
    }
    return this.wrong(key, "a set", v);
  }

  /** Any JSON value, unchecked. */
  json(key: string): JsonValue {
    const v = this.raw(key);
    if (isDecodedSet(v)) this.wrong(key, "a JSON value", v);
    return v;
  }

  private raw(key: string, fallback?: DecodedValue): DecodedValue {
    const v = this.values.get(key);
    if (v !== undefined) return v;
    if (fallback !== undefined) return fallback;
    return serializationError(`${this.className}: missing field "${key}"`);
  }

  private wrong(key: string, expected: string, got: unknown): never {
    return serializationError(`${this.className}: field "${key}" should be ${expected}, got ${describeValue(got)}`);
  }
}
