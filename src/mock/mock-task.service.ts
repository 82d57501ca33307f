import { Injectable } from "@nestjs/common";
import { JsonObject, JsonValue } from "../runtime/types";

export type TaskPlan = {
  /** Status reads before the task turns terminal. The first read is PENDING, the rest RUNNING. */
  pollsUntilDone: number;
  /** When set, the task ends FAILED with this text as `error`. */
  fail?: string;
  /** `null` finishes the task without a result. */
  result?: JsonValue;
};

type MockTask = {
  taskId: string;
  kind: string;
  request: JsonObject;
  plan: TaskPlan;
  reads: number;
};

// kinds whose results are stored as CSV documents downstream operations read by id
const CSV_KINDS = new Set(["cv", "rolling_mean"]);
// kinds that finish without a result document
const NO_RESULT_KINDS = new Set(["complexation"]);

/**
 * In-process task service used by the end-to-end tests and local demos.
 * Every task finishes on its own after a fixed number of status reads.
 */
@Injectable()
export class MockTaskService {
  private readonly tasks = new Map<string, MockTask>();
  private readonly plans = new Map<string, TaskPlan>();
  private seq = 0;
  private csvSeq = 0;

  apiKey: string | null = null;

  plan(kind: string, plan: TaskPlan) {
    this.plans.set(kind, plan);
    return this;
  }

  reset() {
    this.tasks.clear();
    this.plans.clear();
    this.seq = 0;
    this.csvSeq = 0;
    this.apiKey = null;
  }

  submit(kind: string, request: JsonObject): string {
    const taskId = `task-${++this.seq}`;
    const plan = this.plans.get(kind) ?? { pollsUntilDone: 1 };
    this.tasks.set(taskId, { taskId, kind, request, plan, reads: 0 });
    return taskId;
  }

  /** Submitted requests in order, for assertions. */
  submitted(): Array<{ kind: string; request: JsonObject }> {
    return [...this.tasks.values()].map((t) => ({ kind: t.kind, request: t.request }));
  }

  read(taskId: string): JsonObject | null {
    const t = this.tasks.get(taskId);
    if (!t) return null;

    t.reads++;
    if (t.reads <= t.plan.pollsUntilDone) {
      return { taskId, status: t.reads === 1 ? "PENDING" : "RUNNING", result: null };
    }
    if (t.plan.fail !== undefined) {
      return { taskId, status: "FAILED", result: null, error: t.plan.fail };
    }
    if (t.plan.result === undefined) t.plan = { ...t.plan, result: this.defaultResult(t.kind) };
    return { taskId, status: "SUCCEEDED", result: t.plan.result ?? null };
  }

  private defaultResult(kind: string): JsonValue {
    if (CSV_KINDS.has(kind)) return { id: `csv-${++this.csvSeq}`, kind };
    if (NO_RESULT_KINDS.has(kind)) return null;
    return { msg: "done" };
  }
}
