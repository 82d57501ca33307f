import { Logger } from "@nestjs/common";
import { OperationRegistry } from "../workflow/operations/registry";
import { Clock, systemClock } from "./clock";
import { DuplicateOperationIdError, RemoteTaskFailedError, WaiterTimeoutError, toErrorInfo } from "./errors";
import { RemoteTaskClient } from "./task-client";
import {
  ErrorInfo,
  ExecuteConfig,
  JsonValue,
  Operation,
  PriorOutputs,
  StepResult,
  StepStatus,
  Workflow,
  WorkflowResult,
} from "./types";
import { resolveParams } from "./value";
import { CompletionWaiter, NO_STATUS_RETRY, StatusRetryPolicy } from "./waiter";

export function assertUniqueOperationIds(workflow: Workflow) {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const op of workflow.operations) {
    if (seen.has(op.id)) dupes.add(op.id);
    seen.add(op.id);
  }
  if (dupes.size > 0) throw new DuplicateOperationIdError([...dupes]);
}

export type EngineOptions = {
  clock?: Clock;
  statusRetry?: StatusRetryPolicy;
};

/**
 * Runs the operations of a workflow one by one, in declaration order, and stops at the
 * first step that does not succeed. `execute` does not throw.
 */
export class WorkflowEngine {
  private readonly logger = new Logger(WorkflowEngine.name);
  private readonly clock: Clock;
  private readonly waiter: CompletionWaiter;

  constructor(
    private readonly client: RemoteTaskClient,
    private readonly registry: OperationRegistry,
    opts: EngineOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.waiter = new CompletionWaiter(client, this.clock, opts.statusRetry ?? NO_STATUS_RETRY);
  }

  private timestamp() {
    return new Date(this.clock.now()).toISOString();
  }

  async execute(workflow: Workflow, config: ExecuteConfig): Promise<WorkflowResult> {
    const startedAt = this.timestamp();
    this.logger.log(`executing workflow "${workflow.name}" with ${workflow.operations.length} operation(s)`);

    try {
      assertUniqueOperationIds(workflow);
    } catch (e) {
      return this.finish(workflow, [], startedAt, toErrorInfo(e));
    }

    const prior: PriorOutputs = new Map();
    const steps: StepResult[] = [];

    for (const op of workflow.operations) {
      const step = await this.runOperation(op, prior, config);
      steps.push(step);
      if (step.status !== "SUCCEEDED") {
        this.logger.error(`operation ${op.id} ended ${step.status}: ${step.error?.message ?? "no detail"}`);
        break;
      }
    }

    const failed = steps.find((s) => s.status !== "SUCCEEDED");
    return this.finish(workflow, steps, startedAt, failed?.error ?? null);
  }

  private finish(workflow: Workflow, steps: StepResult[], startedAt: string, error: ErrorInfo | null): WorkflowResult {
    const ok = error === null && steps.every((s) => s.status === "SUCCEEDED");
    const result: WorkflowResult = {
      workflowName: workflow.name,
      steps,
      finalStatus: ok ? "SUCCEEDED" : "FAILED",
      error,
      startedAt,
      completedAt: this.timestamp(),
    };
    this.logger.log(`workflow "${workflow.name}" ${result.finalStatus} after ${steps.length} step(s)`);
    return result;
  }

  private async runOperation(op: Operation, prior: PriorOutputs, config: ExecuteConfig): Promise<StepResult> {
    const startedMs = this.clock.now();
    let remoteTaskId: string | null = null;

    const settle = (status: StepStatus, output: JsonValue | null, error: ErrorInfo | null): StepResult => {
      const finishedMs = this.clock.now();
      return Object.freeze({
        operationId: op.id,
        operationType: op.type,
        remoteTaskId,
        status,
        output,
        error,
        startedAt: new Date(startedMs).toISOString(),
        finishedAt: new Date(finishedMs).toISOString(),
        durationMs: finishedMs - startedMs,
      });
    };

    try {
      // references first, so a dangling reference is never reported as a missing parameter
      const params = resolveParams(op.params, prior);
      const handler = this.registry.createHandler(op.type);
      const validation = handler.validate(op.id, params);
      if (!validation.ok) throw validation.errors[0];
      const request = handler.toRemoteRequest(params);

      this.logger.log(`operation ${op.id} (${op.type}) -> ${handler.kind}`);
      const taskId = await this.client.submit(handler.kind, request);
      remoteTaskId = taskId;

      const outcome = await this.waiter.wait(taskId, {
        pollIntervalMs: Math.max(0, config.pollIntervalSeconds * 1000),
        maxWaitMs: Math.max(0, config.maxWaitSeconds * 1000),
        signal: config.signal,
      });

      switch (outcome.status) {
        case "SUCCEEDED": {
          const output = await this.client.fetchResult(taskId);
          prior.set(op.id, { output });
          this.logger.log(`operation ${op.id} succeeded after ${outcome.polls} poll(s)`);
          return settle("SUCCEEDED", output, null);
        }
        case "FAILED":
          return settle("FAILED", null, new RemoteTaskFailedError(taskId, outcome.errorDetail).toInfo());
        case "TIMED_OUT":
          return settle("TIMED_OUT", null, new WaiterTimeoutError(taskId, outcome.elapsedMs, outcome.cancelled).toInfo());
      }
    } catch (e) {
      return settle("FAILED", null, toErrorInfo(e));
    }
  }
}
