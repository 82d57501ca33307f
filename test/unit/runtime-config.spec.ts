import { loadRuntimeConfigFromEnv } from "../../src/runtime/config";

test("defaults apply when nothing is set", () => {
  expect(loadRuntimeConfigFromEnv({})).toEqual({
    taskService: { baseUrl: "http://localhost:8000", apiKey: undefined, timeoutMs: 10_000 },
    polling: {
      pollIntervalSeconds: 5,
      maxWaitSeconds: 3600,
      statusRetry: { maxAttempts: 1, backoffMs: 500, backoffMultiplier: 2 },
    },
    resultFile: "result.json",
  });
});

test("reads every setting from the environment", () => {
  const cfg = loadRuntimeConfigFromEnv({
    LABFLOW_TASK_API_BASE_URL: "http://lab-host:9000/api",
    LABFLOW_TASK_API_KEY: " test-key ",
    LABFLOW_TASK_HTTP_TIMEOUT_MS: "2500",
    LABFLOW_TASK_POLL_INTERVAL_SECONDS: "0.5",
    LABFLOW_TASK_MAX_WAIT_SECONDS: "120",
    LABFLOW_STATUS_RETRY_ATTEMPTS: "3.7",
    LABFLOW_STATUS_RETRY_BACKOFF_MS: "250",
    LABFLOW_STATUS_RETRY_BACKOFF_MULTIPLIER: "1.5",
    LABFLOW_RESULT_FILE: "out/run.json",
  });

  expect(cfg.taskService).toEqual({ baseUrl: "http://lab-host:9000/api", apiKey: "test-key", timeoutMs: 2500 });
  expect(cfg.polling).toEqual({
    pollIntervalSeconds: 0.5,
    maxWaitSeconds: 120,
    statusRetry: { maxAttempts: 3, backoffMs: 250, backoffMultiplier: 1.5 },
  });
  expect(cfg.resultFile).toBe("out/run.json");
});

test("invalid numbers fall back to the defaults", () => {
  const cfg = loadRuntimeConfigFromEnv({
    LABFLOW_TASK_API_KEY: "   ",
    LABFLOW_TASK_HTTP_TIMEOUT_MS: "0",
    LABFLOW_TASK_POLL_INTERVAL_SECONDS: "soon",
    LABFLOW_TASK_MAX_WAIT_SECONDS: "-1",
    LABFLOW_STATUS_RETRY_ATTEMPTS: "0",
    LABFLOW_STATUS_RETRY_BACKOFF_MULTIPLIER: "0.5",
  });

  expect(cfg.taskService.apiKey).toBeUndefined();
  expect(cfg.taskService.timeoutMs).toBe(10_000);
  expect(cfg.polling.pollIntervalSeconds).toBe(5);
  expect(cfg.polling.maxWaitSeconds).toBe(3600);
  expect(cfg.polling.statusRetry).toEqual({ maxAttempts: 1, backoffMs: 500, backoffMultiplier: 2 });
});
