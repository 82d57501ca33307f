import { TaskServiceConfig } from "../connectors/task-service.client";
import { StatusRetryPolicy } from "./waiter";

export const RUNTIME_CONFIG = "RuntimeConfig";

export type RuntimeConfig = {
  taskService: TaskServiceConfig;
  polling: {
    pollIntervalSeconds: number;
    maxWaitSeconds: number;
    statusRetry: StatusRetryPolicy;
  };
  resultFile: string;
};

type Env = Record<string, string | undefined>;

function ensureNumber(v: string | undefined, fallback: number, min = 0) {
  if (v == null || v.trim() === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

export function loadRuntimeConfigFromEnv(env: Env = process.env): RuntimeConfig {
  const apiKey = env.LABFLOW_TASK_API_KEY?.trim();

  return {
    taskService: {
      baseUrl: env.LABFLOW_TASK_API_BASE_URL || "http://localhost:8000",
      apiKey: apiKey ? apiKey : undefined,
      timeoutMs: ensureNumber(env.LABFLOW_TASK_HTTP_TIMEOUT_MS, 10_000, 1),
    },
    polling: {
      pollIntervalSeconds: ensureNumber(env.LABFLOW_TASK_POLL_INTERVAL_SECONDS, 5),
      maxWaitSeconds: ensureNumber(env.LABFLOW_TASK_MAX_WAIT_SECONDS, 3600),
      statusRetry: {
        maxAttempts: Math.floor(ensureNumber(env.LABFLOW_STATUS_RETRY_ATTEMPTS, 1, 1)),
        backoffMs: ensureNumber(env.LABFLOW_STATUS_RETRY_BACKOFF_MS, 500),
        backoffMultiplier: ensureNumber(env.LABFLOW_STATUS_RETRY_BACKOFF_MULTIPLIER, 2, 1),
      },
    },
    resultFile: env.LABFLOW_RESULT_FILE || "result.json",
  };
}
