/**
 * packages/core/src/errors.ts — Error taxonomy for glyphbox.
 *
 * Why: Callers decide per call site whether a failure is tolerable (a move for
 * an entity that is already being destroyed, a scroll past an edge). A single
 * error class with a stable `code` lets them catch exactly one kind and let
 * everything else propagate.
 */

/**
 * Deterministic error codes for all runtime violations.
 */
export type GlyphErrorCode =
  /** Malformed construction arguments: shape mismatch, bad option value. */
  | "GLYPH_INVALID_CONFIG"
  /** Child does not fit, duplicate add, remove of a non-member, bad scroll target. */
  | "GLYPH_LAYOUT_ERROR"
  /** Slot collision, missing component, unknown entity id. */
  | "GLYPH_ECS_ERROR"
  /** Unregistered event type, bad listener return, non-listener registration. */
  | "GLYPH_DISPATCH_ERROR"
  /** Forbidden field, missing or unknown class, non-serializable object. */
  | "GLYPH_SERIALIZATION_ERROR"
  /** Backend contract violation, e.g. an input code outside the table. */
  | "GLYPH_BACKEND_ERROR";

export class GlyphError extends Error {
  override readonly name = "GlyphError";
  readonly code: GlyphErrorCode;

  constructor(code: GlyphErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GlyphError);
    }
  }
}

export function isGlyphError(err: unknown, code?: GlyphErrorCode): err is GlyphError {
  if (!(err instanceof GlyphError)) return false;
  return code === undefined || err.code === code;
}

export function invalidConfig(detail: string): never {
  throw new GlyphError("GLYPH_INVALID_CONFIG", detail);
}

export function layoutError(detail: string): never {
  throw new GlyphError("GLYPH_LAYOUT_ERROR", detail);
}

export function ecsError(detail: string): never {
  throw new GlyphError("GLYPH_ECS_ERROR", detail);
}

export function dispatchError(detail: string): never {
  throw new GlyphError("GLYPH_DISPATCH_ERROR", detail);
}

export function serializationError(detail: string): never {
  throw new GlyphError("GLYPH_SERIALIZATION_ERROR", detail);
}

export function backendError(detail: string): never {
  throw new GlyphError("GLYPH_BACKEND_ERROR", detail);
}

/** Short, stable description of an arbitrary value for error messages. */
export function describeValue(v: unknown): string {
  if (v === null) return "null";
  if (v === undefined) return "undefined";
  if (typeof v === "string") return JSON.stringify(v);
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (Array.isArray(v)) return `array(${String(v.length)})`;
  if (typeof v === "function") return "function";
  if (typeof v === "object") {
    const ctor: unknown = Object.getPrototypeOf(v)?.constructor;
    if (typeof ctor === "function" && ctor.name.length > 0) return ctor.name;
    return "object";
  }
  return typeof v;
}
