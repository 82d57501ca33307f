import { WorkflowEngine } from "../../src/runtime/engine";
import { StatusQueryError, SubmissionError } from "../../src/runtime/errors";
import { JsonObject, Operation, Workflow } from "../../src/runtime/types";
import { parseParams } from "../../src/runtime/value";
import { createBuiltinRegistry } from "../../src/workflow/operations/builtin";
import { OperationRegistry } from "../../src/workflow/operations/registry";
import { OperationHandler, RemoteTaskRequest, ValidationResult } from "../../src/workflow/operations/types";
import { FakeClock, FakeTaskClient } from "../helpers/fakes";

function op(id: string, type: string, params: JsonObject = {}): Operation {
  return { id, type, params: parseParams(params) };
}

function workflow(...operations: Operation[]): Workflow {
  return { name: "wf_test", description: "", operations };
}

const fast = { pollIntervalSeconds: 1, maxWaitSeconds: 60 };

function spyHandler(type: string) {
  const validate = jest.fn<ValidationResult, [string, JsonObject]>(() => ({ ok: true, errors: [] }));
  const toRemoteRequest = jest.fn<RemoteTaskRequest, [JsonObject]>((params) => params);
  const handler: OperationHandler = {
    type,
    kind: type,
    meta: { title: type, params: [] },
    validate,
    toRemoteRequest,
  };
  return { handler, validate, toRemoteRequest };
}

describe("workflow engine", () => {
  let client: FakeTaskClient;
  let clock: FakeClock;

  beforeEach(() => {
    client = new FakeTaskClient();
    clock = new FakeClock();
  });

  const engine = (registry: OperationRegistry = createBuiltinRegistry()) =>
    new WorkflowEngine(client, registry, { clock });

  test("N succeeding operations produce N SUCCEEDED steps with outputs in order", async () => {
    client.script("pump", { statuses: [{ status: "SUCCEEDED" }], result: { msg: "moved" } });
    const wf = workflow(
      op("p1", "uo_sdl2_pump_transfer", { source: 1, target: 2 }),
      op("p2", "uo_sdl2_pump_transfer", { source: 2, target: 3 }),
      op("p3", "uo_sdl2_pump_transfer", { source: 3, target: 4 }),
    );

    const r = await engine().execute(wf, fast);

    expect(r.finalStatus).toBe("SUCCEEDED");
    expect(r.error).toBeNull();
    expect(r.workflowName).toBe("wf_test");
    expect(r.steps.map((s) => [s.operationId, s.status, s.remoteTaskId])).toEqual([
      ["p1", "SUCCEEDED", "t-1"],
      ["p2", "SUCCEEDED", "t-2"],
      ["p3", "SUCCEEDED", "t-3"],
    ]);
    expect(r.steps.every((s) => s.error === null)).toBe(true);
    expect(r.steps[2].output).toEqual({ msg: "moved" });
    expect(client.submitted.map((s) => s.request)).toEqual([
      { source: 1, target: 2 },
      { source: 2, target: 3 },
      { source: 3, target: 4 },
    ]);
  });

  test("runs a CV sweep and feeds its CSV id into the next operation", async () => {
    client.script("cv", { statuses: [{ status: "PENDING" }, { status: "SUCCEEDED" }], result: { id: "csv-1" } });
    const wf = workflow(
      op("cv1", "uo_sdl2_cv", { v_range: [-0.5, 0.5], freq: 0.1 }),
      op("smooth", "uo_sdl2_rolling_mean", { csv_id: "$cv1.output.id", window_size: 5 }),
    );

    const r = await engine().execute(wf, fast);

    expect(r.finalStatus).toBe("SUCCEEDED");
    expect(r.steps[0].output).toEqual({ id: "csv-1" });
    expect(r.steps[0].durationMs).toBe(1000);
    expect(client.submitted).toEqual([
      { kind: "cv", request: { v_range: [-0.5, 0.5], freq: 0.1 } },
      { kind: "rolling_mean", request: { csv_id: "csv-1", x_col: "time", y_col: "current", window_size: 5 } },
    ]);
    expect(r.startedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(r.completedAt).toBe("2026-01-01T00:00:01.000Z");
  });

  test("duplicate ids fail the workflow before any remote call", async () => {
    const wf = workflow(
      op("a", "uo_sdl2_pump_transfer", { source: 1, target: 2 }),
      op("b", "uo_sdl2_pump_transfer", { source: 1, target: 2 }),
      op("a", "uo_sdl2_pump_transfer", { source: 1, target: 2 }),
    );

    const r = await engine().execute(wf, fast);

    expect(r.finalStatus).toBe("FAILED");
    expect(r.steps).toEqual([]);
    expect(r.error?.code).toBe("DUPLICATE_OPERATION_ID");
    expect(r.error?.message).toBe("DUPLICATE_OPERATION_ID ids=a");
    expect(client.submitted).toHaveLength(0);
  });

  test("a forward reference fails the operation that holds it", async () => {
    const wf = workflow(
      op("peaks", "uo_sdl2_peak_detection", { csv_id: "$cv1.output.id" }),
      op("cv1", "uo_sdl2_cv", { v_range: [0, 1], freq: 1 }),
    );

    const r = await engine().execute(wf, fast);

    expect(r.finalStatus).toBe("FAILED");
    expect(r.steps).toHaveLength(1);
    expect(r.steps[0].status).toBe("FAILED");
    expect(r.steps[0].remoteTaskId).toBeNull();
    expect(r.steps[0].error?.code).toBe("UNKNOWN_REFERENCE");
    expect(r.error).toEqual(r.steps[0].error);
    expect(client.submitted).toHaveLength(0);
  });

  test("stops at the first failed operation and never touches the rest", async () => {
    const [h1, h2, h3] = [spyHandler("t_one"), spyHandler("t_two"), spyHandler("t_three")];
    const registry = new OperationRegistry().register(h1.handler).register(h2.handler).register(h3.handler);
    client.script("t_two", { statuses: [{ status: "RUNNING" }, { status: "FAILED", errorDetail: "pump jammed" }] });

    const r = await engine(registry).execute(workflow(op("o1", "t_one"), op("o2", "t_two"), op("o3", "t_three")), fast);

    expect(r.finalStatus).toBe("FAILED");
    expect(r.steps.map((s) => s.status)).toEqual(["SUCCEEDED", "FAILED"]);
    expect(r.steps[1].error).toEqual({
      code: "REMOTE_TASK_FAILED",
      message: "REMOTE_TASK_FAILED taskId=t-2 pump jammed",
      details: { taskId: "t-2", errorDetail: "pump jammed" },
    });
    expect(h2.toRemoteRequest).toHaveBeenCalledTimes(1);
    expect(h3.validate).not.toHaveBeenCalled();
    expect(h3.toRemoteRequest).not.toHaveBeenCalled();
  });

  test("a task that stays RUNNING past maxWait ends the step TIMED_OUT", async () => {
    client.script("cv", { statuses: [{ status: "RUNNING" }] });

    const r = await engine().execute(workflow(op("cv1", "uo_sdl2_cv", { v_range: [0, 1], freq: 1 })), {
      pollIntervalSeconds: 1,
      maxWaitSeconds: 2,
    });

    expect(r.finalStatus).toBe("FAILED");
    expect(r.steps[0].status).toBe("TIMED_OUT");
    expect(r.steps[0].remoteTaskId).toBe("t-1");
    expect(r.steps[0].error?.message).toBe("TASK_TIMED_OUT taskId=t-1 still not finished after 2000ms");
    expect(client.statusQueries).toEqual(["t-1", "t-1", "t-1"]);
  });

  test("cancelling through the signal marks the in-flight step TIMED_OUT", async () => {
    const ac = new AbortController();
    ac.abort();

    const r = await engine().execute(workflow(op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 })), {
      ...fast,
      signal: ac.signal,
    });

    expect(r.steps[0].status).toBe("TIMED_OUT");
    expect(r.steps[0].error?.message).toBe("TASK_TIMED_OUT taskId=t-1 wait cancelled after 0ms");
    expect(client.statusQueries).toEqual([]);
  });

  test("parameter problems fail the step without a submission", async () => {
    const r = await engine().execute(workflow(op("cv1", "uo_sdl2_cv", { v_range: [0, 1] })), fast);

    expect(r.steps[0].status).toBe("FAILED");
    expect(r.steps[0].error?.code).toBe("MISSING_PARAMETER");
    expect(r.steps[0].error?.message).toBe("MISSING_PARAMETER cv1.params.freq");
    expect(client.submitted).toHaveLength(0);
  });

  test("an unknown operation type fails the step", async () => {
    const r = await engine().execute(workflow(op("x", "uo_nope")), fast);

    expect(r.steps[0].error?.code).toBe("UNSUPPORTED_OPERATION");
    expect(r.steps[0].operationType).toBe("uo_nope");
  });

  test("remote errors are recorded on the step, never thrown", async () => {
    client.submitError = new SubmissionError("pump", "HTTP_500", 500);
    const submitFailed = await engine().execute(
      workflow(op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 })),
      fast,
    );
    expect(submitFailed.steps[0].error?.code).toBe("SUBMISSION_FAILED");
    expect(submitFailed.steps[0].remoteTaskId).toBeNull();
    expect(client.statusQueries).toEqual([]);

    client.submitError = null;
    jest.spyOn(client, "getStatus").mockRejectedValue(new StatusQueryError("t-2", "HTTP_502", 502));
    const statusFailed = await engine().execute(
      workflow(op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 })),
      fast,
    );
    expect(statusFailed.steps[0].status).toBe("FAILED");
    expect(statusFailed.steps[0].remoteTaskId).toBe("t-2");
    expect(statusFailed.steps[0].error?.code).toBe("STATUS_QUERY_FAILED");
  });

  test("unexpected errors become INTERNAL_ERROR", async () => {
    jest.spyOn(client, "fetchResult").mockRejectedValue(new Error("socket hang up"));

    const r = await engine().execute(workflow(op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 })), fast);

    expect(r.steps[0].error).toEqual({ code: "INTERNAL_ERROR", message: "socket hang up" });
  });

  test("optional status retry rides out a flaky status endpoint", async () => {
    jest
      .spyOn(client, "getStatus")
      .mockRejectedValueOnce(new StatusQueryError("t-1", "HTTP_503", 503))
      .mockResolvedValue({ status: "SUCCEEDED" });
    const retrying = new WorkflowEngine(client, createBuiltinRegistry(), {
      clock,
      statusRetry: { maxAttempts: 2, backoffMs: 50, backoffMultiplier: 2 },
    });

    const r = await retrying.execute(workflow(op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 })), fast);

    expect(r.finalStatus).toBe("SUCCEEDED");
    expect(r.steps[0].durationMs).toBe(50);
  });

  test("a task that succeeds without a result yields a null output", async () => {
    client.script("complexation", { statuses: [{ status: "SUCCEEDED" }] });
    const wf = workflow(
      op("complex", "uo_sdl2_complexation", {
        buffer: { compound: "PH3", amount: 2 },
        ligand: { compound: "L2", amount: 1 },
        metal: { compound: "Cu", amount: 0.5 },
      }),
      op("p", "uo_sdl2_pump_transfer", { source: 1, target: 2 }),
      op("peaks", "uo_sdl2_peak_detection", { csv_id: "$complex.output.id" }),
    );

    const r = await engine().execute(wf, fast);

    expect(r.steps.map((s) => [s.status, s.output])).toEqual([
      ["SUCCEEDED", null],
      ["SUCCEEDED", { msg: "done" }],
      ["FAILED", null],
    ]);
    expect(r.steps[2].error?.message).toBe("INVALID_FIELD_PATH $complex.output.id segment=id");
  });

  test("an empty workflow succeeds with no steps", async () => {
    const r = await engine().execute(workflow(), fast);
    expect(r).toMatchObject({ finalStatus: "SUCCEEDED", steps: [], error: null });
  });
});
