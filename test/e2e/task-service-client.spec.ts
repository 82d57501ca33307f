import { HttpTaskClient } from "../../src/connectors/task-service.client";
import { ResultFetchError, StatusQueryError, SubmissionError } from "../../src/runtime/errors";
import { MockTaskApp, startMockTaskApp } from "../helpers/mock-task-app";

describe("HTTP task client against the mock task service", () => {
  let mock: MockTaskApp;
  let client: HttpTaskClient;

  beforeAll(async () => {
    mock = await startMockTaskApp();
  });

  afterAll(async () => {
    await mock.app.close();
  });

  beforeEach(() => {
    mock.tasks.reset();
    client = new HttpTaskClient({ baseUrl: `${mock.url}/`, timeoutMs: 5000 });
  });

  test("submit, poll and fetch one task", async () => {
    const taskId = await client.submit("cv", { v_range: [-0.5, 0.5], freq: 0.1 });

    expect(taskId).toBe("task-1");
    expect(mock.tasks.submitted()).toEqual([{ kind: "cv", request: { v_range: [-0.5, 0.5], freq: 0.1 } }]);
    expect(await client.getStatus(taskId)).toEqual({ status: "PENDING" });
    expect(await client.getStatus(taskId)).toEqual({ status: "SUCCEEDED" });
    expect(await client.fetchResult(taskId)).toEqual({ id: "csv-1", kind: "cv" });
  });

  test("a complexation task succeeds without a result", async () => {
    const taskId = await client.submit("complexation", {
      buffer: { compound: "PH7", amount: 1 },
      ligand: { compound: "L1", amount: 1 },
      metal: { compound: "Fe", amount: 1 },
    });

    expect(await client.getStatus(taskId)).toEqual({ status: "PENDING" });
    expect(await client.getStatus(taskId)).toEqual({ status: "SUCCEEDED" });
    expect(await client.fetchResult(taskId)).toBeNull();
  });

  test("a failed task reports its error and has no result", async () => {
    mock.tasks.plan("pump", { pollsUntilDone: 0, fail: "pump jammed" });
    const taskId = await client.submit("pump", { source: 1, target: 2 });

    expect(await client.getStatus(taskId)).toEqual({ status: "FAILED", errorDetail: "pump jammed" });
    await expect(client.fetchResult(taskId)).rejects.toThrow(
      new ResultFetchError(taskId, "task is FAILED").message,
    );
  });

  test("results are only fetched once the task succeeded", async () => {
    mock.tasks.plan("cv", { pollsUntilDone: 5 });
    const taskId = await client.submit("cv", { v_range: [0, 1], freq: 1 });

    await expect(client.fetchResult(taskId)).rejects.toThrow("RESULT_FETCH_FAILED taskId=task-1 task is PENDING");
  });

  test("unknown tasks fail the status query", async () => {
    await expect(client.getStatus("nope")).rejects.toThrow(StatusQueryError);
    await expect(client.getStatus("nope")).rejects.toThrow("STATUS_QUERY_FAILED taskId=nope HTTP_404");
  });

  test("the API key travels in X-API-Key", async () => {
    mock.tasks.apiKey = "test-secret";

    await expect(client.submit("cv", { v_range: [0, 1], freq: 1 })).rejects.toThrow(SubmissionError);
    await expect(client.submit("cv", { v_range: [0, 1], freq: 1 })).rejects.toThrow("SUBMISSION_FAILED kind=cv HTTP_401");

    const keyed = new HttpTaskClient({ baseUrl: mock.url, apiKey: "test-secret", timeoutMs: 5000 });
    const taskId = await keyed.submit("cv", { v_range: [0, 1], freq: 1 });
    expect(await keyed.getStatus(taskId)).toEqual({ status: "PENDING" });
  });

  test("an unreachable service is a submission error", async () => {
    const offline = new HttpTaskClient({ baseUrl: "http://127.0.0.1:1", timeoutMs: 2000 });
    await expect(offline.submit("cv", {})).rejects.toThrow(/^SUBMISSION_FAILED kind=cv /);
  });
});
