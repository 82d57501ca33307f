import type { RowDataPacket } from "mysql2/promise";
import { OnModuleDestroy } from "@nestjs/common";
import { createMySqlPoolFromEnv } from "./mysql.pool";
import { ListRunsParams, ResultStore, RunSummary, clampPage, isFinalStatus, isWorkflowResult, rndId } from "./store";
import { WorkflowResult } from "./types";

function parseJson(v: unknown): unknown {
  if (v == null) return undefined;
  return typeof v === "string" ? JSON.parse(v) : v;
}

/** The part of a mysql2 `Pool` the store uses. */
export interface RunsPool {
  execute(sql: string, values: (string | number)[]): Promise<unknown>;
  query(sql: string, values: string[]): Promise<[RowDataPacket[], unknown]>;
  end(): Promise<void>;
}

/** Table layout in sql/001_workflow_runs.sql. */
export class MySqlResultStore implements ResultStore, OnModuleDestroy {
  private pool: RunsPool;
  private ownedPool: boolean;

  constructor(pool?: RunsPool, ownsPool = !pool) {
    this.pool = pool ?? createMySqlPoolFromEnv();
    // a pool created here, or handed over by the factory, is closed with the module
    this.ownedPool = ownsPool;
  }

  async onModuleDestroy() {
    if (this.ownedPool) {
      await this.pool.end();
    }
  }

  async save(result: WorkflowResult): Promise<string> {
    const runId = rndId("run");
    await this.pool.execute(
      `INSERT INTO workflow_runs (run_id, workflow_name, final_status, step_count, result_json, completed_at)
       VALUES (?, ?, ?, ?, CAST(? AS JSON), ?)`,
      [runId, result.workflowName, result.finalStatus, result.steps.length, JSON.stringify(result), result.completedAt],
    );
    return runId;
  }

  async load(runId: string): Promise<WorkflowResult | null> {
    const [rows] = await this.pool.query(
      `SELECT result_json FROM workflow_runs WHERE run_id=? LIMIT 1`,
      [runId],
    );
    if (!rows.length) return null;

    const parsed = parseJson(rows[0].result_json);
    if (!isWorkflowResult(parsed)) throw new Error(`DB_RUN_RESULT_INVALID runId=${runId}`);
    return parsed;
  }

  async list(params?: ListRunsParams): Promise<RunSummary[]> {
    const { limit, offset } = clampPage(params);

    const where: string[] = [];
    const args: string[] = [];
    if (params?.workflowName) { where.push("workflow_name=?"); args.push(params.workflowName); }
    if (params?.finalStatus) { where.push("final_status=?"); args.push(params.finalStatus); }
    const whereSql = where.length ? `WHERE ${where.join(" AND ")}` : "";

    // LIMIT/OFFSET inlined as integers; some MySQL versions reject placeholders there
    const [rows] = await this.pool.query(
      `SELECT run_id, workflow_name, final_status, step_count, completed_at
         FROM workflow_runs
         ${whereSql}
        ORDER BY id DESC
        LIMIT ${limit} OFFSET ${offset}`,
      args,
    );

    return rows.map((r) => {
      const status = String(r.final_status);
      if (!isFinalStatus(status)) throw new Error(`DB_RUN_STATUS_INVALID status=${status}`);
      return {
        runId: String(r.run_id),
        workflowName: String(r.workflow_name),
        finalStatus: status,
        stepCount: Number(r.step_count),
        completedAt: String(r.completed_at),
      };
    });
  }
}
