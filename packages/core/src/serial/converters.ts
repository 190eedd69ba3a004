/**
 * packages/core/src/serial/converters.ts — Primitive converters named by `<field>_type` keys.
 *
 * Why: JSON has no sets and no integer type. A record may name one of a
 * fixed set of converters next to a field, and the raw value is passed
 * through it before the constructor sees it.
 */

import { describeValue, serializationError } from "../errors.js";
import type { JsonPrimitive, JsonValue } from "./types.js";

/** A field value after conversion. Only `set` leaves JSON. */
export type DecodedValue = JsonValue | ReadonlySet<JsonPrimitive>;

export type ConverterName = "set" | "int" | "float" | "str" | "bool" | "list";

const INT_TEXT = /^\s*[+-]?\d+\s*$/;
const FLOAT_TEXT = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

function isPrimitive(v: JsonValue): v is JsonPrimitive {
  return v === null || typeof v !== "object";
}

function fail(name: ConverterName, v: JsonValue): never {
  return serializationError(`converter "${name}" cannot convert ${describeValue(v)}`);
}

function items(name: ConverterName, v: JsonValue): readonly JsonValue[] {
  if (Array.isArray(v)) return v;
  if (typeof v === "string") return Array.from(v);
  if (typeof v === "object" && v !== null) return Object.keys(v);
  return fail(name, v);
}

function truthy(v: JsonValue): boolean {
  if (Array.isArray(v)) return v.length > 0;
  if (typeof v === "object" && v !== null) return Object.keys(v).length > 0;
  return Boolean(v);
}

const CONVERTERS: Readonly<Record<ConverterName, (v: JsonValue) => DecodedValue>> = Object.freeze({
  int: (v) => {
    if (typeof v === "number" && Number.isFinite(v)) return Math.trunc(v);
    if (typeof v === "boolean") return v ? 1 : 0;
    if (typeof v === "string" && INT_TEXT.test(v)) return Number.parseInt(v, 10);
    return fail("int", v);
  },
  float: (v) => {
    if (typeof v === "number") return v;
    if (typeof v === "boolean") return v ? 1 : 0;
    if (typeof v === "string" && FLOAT_TEXT.test(v)) return Number.parseFloat(v);
    return fail("float", v);
  },
  str: (v) => {
    if (typeof v === "string") return v;
    if (typeof v === "number" || typeof v === "boolean") return String(v);
    return fail("str", v);
  },
  bool: (v) => truthy(v),
  list: (v) => items("list", v).slice(),
  set: (v) => {
    const out = new Set<JsonPrimitive>();
    for (const item of items("set", v)) {
      if (!isPrimitive(item)) fail("set", item);
      out.add(item);
    }
    return out;
  },
});

export function isConverterName(v: unknown): v is ConverterName {
  return typeof v === "string" && Object.hasOwn(CONVERTERS, v);
}

export function convert(name: ConverterName, value: JsonValue): DecodedValue {
  return CONVERTERS[name](value);
}
