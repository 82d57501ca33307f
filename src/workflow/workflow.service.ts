import { Inject, Injectable } from "@nestjs/common";
import { RUNTIME_CONFIG, RuntimeConfig } from "../runtime/config";
import { WorkflowEngine } from "../runtime/engine";
import { RunNotFoundError, WorkflowDocumentError } from "../runtime/errors";
import { ListRunsParams, RESULT_STORE, ResultStore, RunSummary } from "../runtime/store";
import { Workflow, WorkflowResult } from "../runtime/types";
import { WorkflowLoader } from "./workflow.loader";
import { WorkflowValidationResult, WorkflowValidationService } from "./workflow-validation.service";

export type RunRecord = WorkflowResult & { runId: string };

@Injectable()
export class WorkflowService {
  constructor(
    private readonly engine: WorkflowEngine,
    private readonly loader: WorkflowLoader,
    private readonly validator: WorkflowValidationService,
    @Inject(RESULT_STORE) private readonly store: ResultStore,
    @Inject(RUNTIME_CONFIG) private readonly cfg: RuntimeConfig,
  ) {}

  async execute(workflow: Workflow, signal?: AbortSignal): Promise<RunRecord> {
    const { pollIntervalSeconds, maxWaitSeconds } = this.cfg.polling;
    const result = await this.engine.execute(workflow, { pollIntervalSeconds, maxWaitSeconds, signal });
    const runId = await this.store.save(result);
    return { runId, ...result };
  }

  async run(doc: unknown, signal?: AbortSignal): Promise<RunRecord> {
    return this.execute(this.loader.parseWorkflow(doc), signal);
  }

  async runFile(file: string, signal?: AbortSignal): Promise<RunRecord> {
    return this.execute(await this.loader.loadFile(file), signal);
  }

  validate(doc: unknown): WorkflowValidationResult {
    let workflow: Workflow;
    try {
      workflow = this.loader.parseWorkflow(doc);
    } catch (e) {
      if (!(e instanceof WorkflowDocumentError)) throw e;
      const problems = e.problems.length > 0 ? e.problems : [e.message];
      return { ok: false, errors: problems.map((message) => ({ code: e.code, message })) };
    }
    return this.validator.validate(workflow);
  }

  async getRun(runId: string): Promise<RunRecord> {
    const r = await this.store.load(runId);
    if (!r) throw new RunNotFoundError(runId);
    return { runId, ...r };
  }

  async listRuns(params: ListRunsParams): Promise<RunSummary[]> {
    return this.store.list(params);
  }
}
