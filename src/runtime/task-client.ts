import { JsonValue, isJsonObject } from "./types";
import { RemoteTaskRequest } from "../workflow/operations/types";

export type RemoteStatus = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED";

export type RemoteTaskStatus = {
  status: RemoteStatus;
  errorDetail?: string;
};

/** Boundary to the remote task service. Implementations never retry on their own. */
export interface RemoteTaskClient {
  submit(kind: string, request: RemoteTaskRequest): Promise<string>;
  getStatus(taskId: string): Promise<RemoteTaskStatus>;
  fetchResult(taskId: string): Promise<JsonValue>;
}

// Older deployments of the task service report numeric codes and COMPLETED/ERROR.
const LEGACY_STATUS_CODES: Record<number, RemoteStatus> = {
  0: "PENDING",
  1: "SUCCEEDED",
  2: "RUNNING",
  3: "FAILED",
};

const STATUS_NAMES: Record<string, RemoteStatus> = {
  PENDING: "PENDING",
  RUNNING: "RUNNING",
  SUCCEEDED: "SUCCEEDED",
  FAILED: "FAILED",
  COMPLETED: "SUCCEEDED",
  ERROR: "FAILED",
};

export function normalizeStatus(raw: JsonValue | undefined): RemoteStatus | null {
  if (typeof raw === "number") return LEGACY_STATUS_CODES[raw] ?? null;
  if (typeof raw === "string") return STATUS_NAMES[raw.toUpperCase()] ?? null;
  return null;
}

export type TaskDocument = {
  status: RemoteStatus;
  result: JsonValue | null;
  errorDetail?: string;
};

/**
 * Reads a `GET /task/{id}` body. Returns a string describing the problem when the body
 * is not a task document.
 */
export function parseTaskDocument(body: JsonValue): TaskDocument | string {
  if (!isJsonObject(body)) return "response body is not an object";
  const status = normalizeStatus(body.status);
  if (!status) return `unknown task status ${JSON.stringify(body.status ?? null)}`;

  const result = body.result ?? body.output ?? null;
  const err = body.error;
  const doc: TaskDocument = { status, result };
  if (typeof err === "string" && err.length > 0) doc.errorDetail = err;
  else if (err != null && typeof err === "object") doc.errorDetail = JSON.stringify(err);
  return doc;
}

/** Reads a `POST /tasks/{kind}/` body. */
export function parseSubmission(body: JsonValue): string | null {
  if (!isJsonObject(body)) return null;
  const id = body.taskId ?? body.id;
  if (typeof id === "string" && id.length > 0) return id;
  if (typeof id === "number") return String(id);
  return null;
}
