import { InvalidParameterTypeError, MissingParameterError } from "../../runtime/errors";
import { JsonObject, JsonValue } from "../../runtime/types";

export type ParamType =
  | { kind: "number" }
  | { kind: "integer" }
  | { kind: "string" }
  | { kind: "boolean" }
  | { kind: "numberTuple"; length: number }
  // a data column, addressed by header name or position
  | { kind: "column" }
  | { kind: "transfer"; compounds: readonly string[] };

export type ParamSpec = {
  name: string;
  type: ParamType;
  description?: string;
  required?: boolean;
  // filled in by toRemoteRequest when the workflow leaves the parameter out
  defaultValue?: JsonValue;
  // key used in the remote request when it differs from the workflow key
  remoteName?: string;
};

export type OperationMeta = {
  title: string;
  description?: string;
  params: ParamSpec[];
  outputs?: { description?: string };
};

export type RemoteTaskRequest = JsonObject;

export type ParameterError = MissingParameterError | InvalidParameterTypeError;

export type ValidationResult = {
  ok: boolean;
  errors: ParameterError[];
};

export interface OperationHandler {
  /** Operation type as written in workflow documents, e.g. `uo_sdl2_cv`. */
  type: string;
  /** Task kind on the remote service, e.g. `cv` for `POST /tasks/cv/`. */
  kind: string;
  meta: OperationMeta;

  validate(operationId: string, params: JsonObject): ValidationResult;
  toRemoteRequest(params: JsonObject): RemoteTaskRequest;
}

export type OperationCatalogEntry = {
  type: string;
  kind: string;
  meta: OperationMeta;
};
