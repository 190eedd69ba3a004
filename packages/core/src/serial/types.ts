/**
 * packages/core/src/serial/types.ts — JSON shapes used by the serialization protocol.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | readonly JsonValue[] | { readonly [key: string]: JsonValue };
export type JsonObject = { readonly [key: string]: JsonValue };

/** A serialized widget, component or entity: constructor options plus a `class` discriminator. */
export type SerialRecord = Readonly<{ class: string }> & JsonObject;

/** Anything that can describe itself as a {@link SerialRecord}. */
export interface Serializable {
  serialize(): SerialRecord;
}

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
