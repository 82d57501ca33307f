import { FinalStatus, WorkflowResult, isJsonObject } from "./types";

export const RESULT_STORE = "ResultStore";

export type RunSummary = {
  runId: string;
  workflowName: string;
  finalStatus: FinalStatus;
  stepCount: number;
  completedAt: string;
};

export type ListRunsParams = {
  workflowName?: string;
  finalStatus?: FinalStatus;
  limit?: number;
  offset?: number;
};

/** Persists the result of each workflow execution under a run id. */
export interface ResultStore {
  save(result: WorkflowResult): Promise<string>;
  load(runId: string): Promise<WorkflowResult | null>;
  list(params?: ListRunsParams): Promise<RunSummary[]>;
}

export function rndId(prefix: string) {
  return `${prefix}_${Math.random().toString(16).slice(2)}`;
}

export function clampPage(params?: ListRunsParams) {
  const limit = Math.min(Math.max(Math.floor(Number(params?.limit ?? 50)) || 50, 1), 200);
  const offset = Math.max(Math.floor(Number(params?.offset ?? 0)) || 0, 0);
  return { limit, offset };
}

export function isFinalStatus(v: unknown): v is FinalStatus {
  return v === "SUCCEEDED" || v === "FAILED";
}

export function isWorkflowResult(v: unknown): v is WorkflowResult {
  return (
    isJsonObject(v) &&
    typeof v.workflowName === "string" &&
    Array.isArray(v.steps) &&
    isFinalStatus(v.finalStatus) &&
    typeof v.completedAt === "string"
  );
}

export function summarize(runId: string, r: WorkflowResult): RunSummary {
  return {
    runId,
    workflowName: r.workflowName,
    finalStatus: r.finalStatus,
    stepCount: r.steps.length,
    completedAt: r.completedAt,
  };
}
