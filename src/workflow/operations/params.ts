import { InvalidParameterTypeError, MissingParameterError } from "../../runtime/errors";
import { JsonObject, JsonValue, isJsonObject } from "../../runtime/types";
import { ParamSpec, ParamType, ParameterError, RemoteTaskRequest, ValidationResult } from "./types";

export function describeType(t: ParamType): string {
  switch (t.kind) {
    case "numberTuple":
      return `number[${t.length}]`;
    case "column":
      return "string|integer";
    case "transfer":
      return `{compound: ${t.compounds.join("|")}, amount: number}`;
    default:
      return t.kind;
  }
}

const isFiniteNumber = (v: JsonValue): v is number => typeof v === "number" && Number.isFinite(v);

export function matchesType(t: ParamType, v: JsonValue): boolean {
  switch (t.kind) {
    case "number":
      return isFiniteNumber(v);
    case "integer":
      return isFiniteNumber(v) && Number.isInteger(v);
    case "string":
      return typeof v === "string";
    case "boolean":
      return typeof v === "boolean";
    case "numberTuple":
      return Array.isArray(v) && v.length === t.length && v.every(isFiniteNumber);
    case "column":
      return typeof v === "string" || (isFiniteNumber(v) && Number.isInteger(v));
    case "transfer":
      return isTransfer(v, t.compounds);
  }
}

function isTransfer(v: JsonValue, compounds: readonly string[]): boolean {
  if (!isJsonObject(v)) return false;
  const compound = v["compound"];
  const amount = v["amount"];
  return typeof compound === "string" && compounds.includes(compound) && isFiniteNumber(amount) && amount >= 0;
}

// null counts as "not given", matching optional fields left empty in documents
function isAbsent(v: JsonValue | undefined): v is undefined | null {
  return v === undefined || v === null;
}

export function validateParams(specs: readonly ParamSpec[], operationId: string, params: JsonObject): ValidationResult {
  const errors: ParameterError[] = [];
  for (const spec of specs) {
    const v = params[spec.name];
    if (isAbsent(v)) {
      if (spec.required) errors.push(new MissingParameterError(operationId, spec.name));
      continue;
    }
    if (!matchesType(spec.type, v)) {
      errors.push(new InvalidParameterTypeError(operationId, spec.name, describeType(spec.type)));
    }
  }
  return { ok: errors.length === 0, errors };
}

export function buildRequest(specs: readonly ParamSpec[], params: JsonObject): RemoteTaskRequest {
  const req: RemoteTaskRequest = {};
  for (const spec of specs) {
    const given = params[spec.name];
    const v = isAbsent(given) ? spec.defaultValue : given;
    if (v === undefined) continue;
    req[spec.remoteName ?? spec.name] = v;
  }
  return req;
}
