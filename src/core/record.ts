import type { JsonObject, JsonValue } from "./logger.js";
import { isPlainObject } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

/** Input text fields echoed into every record and compared to detect drift. */
export type InputFields = Record<string, string>;

export type SubResult = { ok: true; value: JsonObject } | { ok: false; error: string };

export type BatchItem = {
  id: number;
  inputs: InputFields;
  /** Echoed into the record but never compared. */
  context: JsonObject;
  /** Sub-result key -> text sent to the remote for that key. */
  requests: Record<string, string>;
};

export type EvalRecord = {
  id: number;
  inputs: InputFields;
  context: JsonObject;
  results: Record<string, SubResult>;
  /** Top-level keys outside the layout, carried through untouched (e.g. another job's results). */
  extras: JsonObject;
  /** Key order of the stored line; empty for records first seen in this run. */
  storedKeys: readonly string[];
};

/**
 * Which top-level snapshot keys a job reads back, and the order they are written in.
 * Other keys on a stored line are kept as extras and written back where they stood.
 */
export type RecordLayout = {
  contextKeys: readonly string[];
  inputKeys: readonly string[];
  resultKeys: readonly string[];
};

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function okResult(value: JsonObject): SubResult {
  return { ok: true, value };
}

export function errorResult(error: string): SubResult {
  return { ok: false, error };
}

export function emptyRecord(id: number, inputs: InputFields, context: JsonObject): EvalRecord {
  return { id, inputs, context, results: {}, extras: {}, storedKeys: [] };
}

export function inputsEqual(left: InputFields, right: InputFields): boolean {
  const leftKeys = Object.keys(left);
  const rightKeys = Object.keys(right);
  if (leftKeys.length !== rightKeys.length) return false;

  return leftKeys.every((key) => Object.hasOwn(right, key) && left[key] === right[key]);
}

// =============================================================================
// SERIALIZATION
// =============================================================================

/**
 * Layout fields come out in layout order. A record read from a snapshot keeps its stored
 * key order instead, with new layout fields appended after it.
 */
export function serializeRecord(record: EvalRecord, layout: RecordLayout): JsonObject {
  const fields: JsonObject = {};
  appendOrdered(fields, record.context, layout.contextKeys);
  appendOrdered(fields, record.inputs, layout.inputKeys);

  const results: JsonObject = {};
  for (const [key, result] of Object.entries(record.results)) {
    results[key] = result.ok ? result.value : { error: result.error };
  }
  appendOrdered(fields, results, layout.resultKeys);

  const out: JsonObject = { id: record.id };
  for (const key of record.storedKeys) {
    if (Object.hasOwn(record.extras, key)) {
      out[key] = record.extras[key];
    } else if (Object.hasOwn(fields, key)) {
      out[key] = fields[key];
    }
  }
  appendOrdered(out, fields, []);
  appendOrdered(out, record.extras, []);

  return out;
}

export function parseRecord(raw: unknown, layout: RecordLayout): EvalRecord | null {
  if (!isPlainObject(raw)) return null;

  const id = raw.id;
  if (typeof id !== "number" || !Number.isInteger(id)) return null;

  const inputs: InputFields = {};
  for (const key of layout.inputKeys) {
    const value = raw[key];
    if (typeof value === "string") inputs[key] = value;
  }

  const context: JsonObject = {};
  for (const key of layout.contextKeys) {
    const value = raw[key];
    if (isJsonValue(value)) context[key] = value;
  }

  const results: Record<string, SubResult> = {};
  for (const key of layout.resultKeys) {
    const value = raw[key];
    if (!isJsonObject(value)) continue;

    results[key] = typeof value.error === "string" ? errorResult(value.error) : okResult(value);
  }

  const layoutKeys = new Set([
    "id",
    ...layout.contextKeys,
    ...layout.inputKeys,
    ...layout.resultKeys,
  ]);
  const extras: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!layoutKeys.has(key) && isJsonValue(value)) extras[key] = value;
  }

  return { id, inputs, context, results, extras, storedKeys: Object.keys(raw) };
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}

// =============================================================================
// INTERNALS
// =============================================================================

function appendOrdered(
  out: JsonObject,
  source: Record<string, JsonValue>,
  order: readonly string[],
): void {
  for (const key of order) {
    if (Object.hasOwn(source, key)) out[key] = source[key];
  }
  for (const [key, value] of Object.entries(source)) {
    if (!Object.hasOwn(out, key)) out[key] = value;
  }
}
