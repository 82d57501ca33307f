import { ErrorInfo, JsonObject } from "./types";

/**
 * Base class of every failure the runtime knows about.
 * Messages start with the error code, e.g. `UNKNOWN_REFERENCE $cv1.output.id in peaks`.
 */
export abstract class WorkflowError extends Error {
  abstract readonly code: string;

  constructor(message: string, readonly details: JsonObject = {}) {
    super(message);
    this.name = new.target.name;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message, details: this.details };
  }
}

// ===== structural: the workflow document is wrong, never retried =====

export class WorkflowDocumentError extends WorkflowError {
  readonly code = "INVALID_WORKFLOW_DOCUMENT";

  constructor(reason: string, readonly problems: string[] = []) {
    super(`INVALID_WORKFLOW_DOCUMENT ${reason}`, { reason, problems });
  }
}

export class DuplicateOperationIdError extends WorkflowError {
  readonly code = "DUPLICATE_OPERATION_ID";

  constructor(readonly operationIds: string[]) {
    super(`DUPLICATE_OPERATION_ID ids=${operationIds.join(",")}`, { operationIds });
  }
}

export class UnsupportedOperationError extends WorkflowError {
  readonly code = "UNSUPPORTED_OPERATION";

  constructor(readonly operationType: string) {
    super(`UNSUPPORTED_OPERATION type=${operationType}`, { operationType });
  }
}

export class MissingParameterError extends WorkflowError {
  readonly code = "MISSING_PARAMETER";

  constructor(readonly operationId: string, readonly paramName: string) {
    super(`MISSING_PARAMETER ${operationId}.params.${paramName}`, { operationId, paramName });
  }
}

export class InvalidParameterTypeError extends WorkflowError {
  readonly code = "INVALID_PARAMETER_TYPE";

  constructor(readonly operationId: string, readonly paramName: string, readonly expectedType: string) {
    super(`INVALID_PARAMETER_TYPE ${operationId}.params.${paramName} expected=${expectedType}`, {
      operationId,
      paramName,
      expectedType,
    });
  }
}

export class UnknownReferenceError extends WorkflowError {
  readonly code = "UNKNOWN_REFERENCE";

  constructor(readonly reference: string, readonly operationId: string) {
    super(`UNKNOWN_REFERENCE ${reference} (no succeeded operation "${operationId}" before this one)`, {
      reference,
      operationId,
    });
  }
}

export class InvalidFieldPathError extends WorkflowError {
  readonly code = "INVALID_FIELD_PATH";

  constructor(readonly reference: string, readonly segment: string) {
    super(`INVALID_FIELD_PATH ${reference} segment=${segment}`, { reference, segment });
  }
}

// ===== remote communication =====

export class SubmissionError extends WorkflowError {
  readonly code = "SUBMISSION_FAILED";

  constructor(readonly kind: string, reason: string, readonly httpStatus: number | null = null) {
    super(`SUBMISSION_FAILED kind=${kind} ${reason}`, { kind, reason, httpStatus });
  }
}

export class StatusQueryError extends WorkflowError {
  readonly code = "STATUS_QUERY_FAILED";

  constructor(readonly taskId: string, reason: string, readonly httpStatus: number | null = null) {
    super(`STATUS_QUERY_FAILED taskId=${taskId} ${reason}`, { taskId, reason, httpStatus });
  }
}

export class ResultFetchError extends WorkflowError {
  readonly code = "RESULT_FETCH_FAILED";

  constructor(readonly taskId: string, reason: string, readonly httpStatus: number | null = null) {
    super(`RESULT_FETCH_FAILED taskId=${taskId} ${reason}`, { taskId, reason, httpStatus });
  }
}

// ===== terminal outcomes, recorded on the step rather than thrown out of execute =====

export class WaiterTimeoutError extends WorkflowError {
  readonly code = "TASK_TIMED_OUT";

  constructor(readonly taskId: string, readonly waitedMs: number, readonly cancelled: boolean) {
    super(
      cancelled
        ? `TASK_TIMED_OUT taskId=${taskId} wait cancelled after ${waitedMs}ms`
        : `TASK_TIMED_OUT taskId=${taskId} still not finished after ${waitedMs}ms`,
      { taskId, waitedMs, cancelled },
    );
  }
}

export class RemoteTaskFailedError extends WorkflowError {
  readonly code = "REMOTE_TASK_FAILED";

  constructor(readonly taskId: string, readonly errorDetail: string | null) {
    super(`REMOTE_TASK_FAILED taskId=${taskId}${errorDetail ? ` ${errorDetail}` : ""}`, {
      taskId,
      errorDetail,
    });
  }
}

// ===== application =====

export class RunNotFoundError extends WorkflowError {
  readonly code = "RUN_NOT_FOUND";

  constructor(readonly runId: string) {
    super(`RUN_NOT_FOUND runId=${runId}`, { runId });
  }
}

export function toErrorInfo(e: unknown): ErrorInfo {
  if (e instanceof WorkflowError) return e.toInfo();
  if (e instanceof Error) return { code: "INTERNAL_ERROR", message: e.message };
  return { code: "INTERNAL_ERROR", message: String(e) };
}
