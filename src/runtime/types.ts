export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// A parameter is either wholly a reference or wholly a literal; containers are resolved item by item.
export type ParamValue =
  | { kind: "literal"; value: JsonPrimitive }
  | { kind: "reference"; raw: string; operationId: string; fieldPath: string[] }
  | { kind: "array"; items: ParamValue[] }
  | { kind: "object"; entries: Record<string, ParamValue> };

export type Operation = {
  id: string;
  type: string;
  params: Record<string, ParamValue>;
};

export type Workflow = {
  name: string;
  description: string;
  operations: Operation[];
};

export type StepStatus = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED" | "TIMED_OUT";
export type FinalStatus = "SUCCEEDED" | "FAILED";

export type ErrorInfo = {
  code: string;
  message: string;
  details?: JsonObject;
};

export type StepResult = {
  operationId: string;
  operationType: string;
  remoteTaskId: string | null;
  status: StepStatus;
  output: JsonValue | null;
  error: ErrorInfo | null;
  startedAt: string;
  finishedAt: string | null;
  durationMs: number | null;
};

export type WorkflowResult = {
  workflowName: string;
  steps: StepResult[];
  finalStatus: FinalStatus;
  error: ErrorInfo | null;
  startedAt: string;
  completedAt: string;
};

export type ExecuteConfig = {
  pollIntervalSeconds: number;
  maxWaitSeconds: number;
  signal?: AbortSignal;
};

/** Output of each succeeded step, keyed by operation id. Entries are shaped `{ output }`. */
export type PriorOutputs = Map<string, JsonObject>;
