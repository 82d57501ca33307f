import { InvalidFieldPathError, UnknownReferenceError } from "./errors";
import { JsonObject, JsonValue, ParamValue, PriorOutputs, isJsonObject } from "./types";

export const REFERENCE_PATTERN = /^\$([A-Za-z0-9_]+)\.output\.(.+)$/;

const INDEX_SEGMENT = /^\d+$/;

/** Turns a raw JSON parameter from a workflow document into a tagged ParamValue. */
export function parseParamValue(raw: JsonValue): ParamValue {
  if (Array.isArray(raw)) return { kind: "array", items: raw.map(parseParamValue) };
  if (isJsonObject(raw)) {
    const entries: Record<string, ParamValue> = {};
    for (const [k, v] of Object.entries(raw)) entries[k] = parseParamValue(v);
    return { kind: "object", entries };
  }
  if (typeof raw === "string") {
    const m = REFERENCE_PATTERN.exec(raw);
    if (m) return { kind: "reference", raw, operationId: m[1], fieldPath: m[2].split(".") };
  }
  return { kind: "literal", value: raw };
}

export function parseParams(raw: JsonObject): Record<string, ParamValue> {
  const out: Record<string, ParamValue> = {};
  for (const [k, v] of Object.entries(raw)) out[k] = parseParamValue(v);
  return out;
}

/** Inverse of parseParamValue, used when a workflow is echoed back or re-serialized. */
export function toRawValue(v: ParamValue): JsonValue {
  switch (v.kind) {
    case "literal":
      return v.value;
    case "reference":
      return v.raw;
    case "array":
      return v.items.map(toRawValue);
    case "object": {
      const o: JsonObject = {};
      for (const [k, item] of Object.entries(v.entries)) o[k] = toRawValue(item);
      return o;
    }
  }
}

function walkPath(root: JsonValue, segments: string[], reference: string): JsonValue {
  let cur = root;
  for (const seg of segments) {
    if (Array.isArray(cur) && INDEX_SEGMENT.test(seg)) {
      const idx = Number(seg);
      if (idx >= cur.length) throw new InvalidFieldPathError(reference, seg);
      cur = cur[idx];
      continue;
    }
    if (isJsonObject(cur) && Object.prototype.hasOwnProperty.call(cur, seg)) {
      cur = cur[seg];
      continue;
    }
    throw new InvalidFieldPathError(reference, seg);
  }
  return cur;
}

export function resolveValue(v: ParamValue, prior: PriorOutputs): JsonValue {
  switch (v.kind) {
    case "literal":
      return v.value;
    case "reference": {
      const record = prior.get(v.operationId);
      if (!record) throw new UnknownReferenceError(v.raw, v.operationId);
      return walkPath(record, ["output", ...v.fieldPath], v.raw);
    }
    case "array":
      return v.items.map((item) => resolveValue(item, prior));
    case "object": {
      const o: JsonObject = {};
      for (const [k, item] of Object.entries(v.entries)) o[k] = resolveValue(item, prior);
      return o;
    }
  }
}

export function resolveParams(params: Record<string, ParamValue>, prior: PriorOutputs): JsonObject {
  const out: JsonObject = {};
  for (const [k, v] of Object.entries(params)) out[k] = resolveValue(v, prior);
  return out;
}

export function collectReferences(v: ParamValue): Array<Extract<ParamValue, { kind: "reference" }>> {
  switch (v.kind) {
    case "literal":
      return [];
    case "reference":
      return [v];
    case "array":
      return v.items.flatMap(collectReferences);
    case "object":
      return Object.values(v.entries).flatMap(collectReferences);
  }
}
