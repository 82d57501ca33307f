import { ListRunsParams, ResultStore, RunSummary, clampPage, rndId, summarize } from "./store";
import { WorkflowResult } from "./types";

export class InMemoryResultStore implements ResultStore {
  private runs = new Map<string, WorkflowResult>();

  async save(result: WorkflowResult): Promise<string> {
    const runId = rndId("run");
    this.runs.set(runId, structuredClone(result));
    return runId;
  }

  async load(runId: string): Promise<WorkflowResult | null> {
    const r = this.runs.get(runId);
    return r ? structuredClone(r) : null;
  }

  async list(params?: ListRunsParams): Promise<RunSummary[]> {
    const { limit, offset } = clampPage(params);
    // newest first
    return [...this.runs.entries()]
      .reverse()
      .filter(([, r]) => !params?.workflowName || r.workflowName === params.workflowName)
      .filter(([, r]) => !params?.finalStatus || r.finalStatus === params.finalStatus)
      .slice(offset, offset + limit)
      .map(([runId, r]) => summarize(runId, r));
  }
}
