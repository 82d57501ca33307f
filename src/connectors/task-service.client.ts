import { Logger } from "@nestjs/common";
import { ResultFetchError, StatusQueryError, SubmissionError } from "../runtime/errors";
import { RemoteTaskClient, RemoteTaskStatus, parseSubmission, parseTaskDocument } from "../runtime/task-client";
import { JsonValue } from "../runtime/types";
import { RemoteTaskRequest } from "../workflow/operations/types";

export type TaskServiceConfig = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

type Reply = {
  httpStatus: number;
  body: JsonValue;
};

function describeFailure(e: unknown, timeoutMs: number): string {
  if (e instanceof Error) {
    if (e.name === "AbortError") return `HTTP_TIMEOUT timeoutMs=${timeoutMs}`;
    const cause = e.cause instanceof Error ? ` (${e.cause.message})` : "";
    return `${e.message}${cause}`;
  }
  return String(e);
}

/** HTTP client for the task service: `POST /tasks/{kind}/`, `GET /task/{taskId}`. */
export class HttpTaskClient implements RemoteTaskClient {
  private readonly logger = new Logger(HttpTaskClient.name);
  private readonly baseUrl: string;

  constructor(private readonly cfg: TaskServiceConfig) {
    this.baseUrl = cfg.baseUrl.replace(/\/+$/, "");
  }

  private async send(method: "GET" | "POST", path: string, body?: RemoteTaskRequest): Promise<Reply> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.cfg.apiKey) headers["X-API-Key"] = this.cfg.apiKey;
    if (body !== undefined) headers["content-type"] = "application/json";

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.cfg.timeoutMs);

    try {
      const resp = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const contentType = resp.headers.get("content-type") || "";
      const text = await resp.text();
      const parsed: JsonValue = contentType.includes("application/json") && text ? JSON.parse(text) : text;
      return { httpStatus: resp.status, body: parsed };
    } finally {
      clearTimeout(t);
    }
  }

  async submit(kind: string, request: RemoteTaskRequest): Promise<string> {
    let reply: Reply;
    try {
      reply = await this.send("POST", `/tasks/${encodeURIComponent(kind)}/`, request);
    } catch (e) {
      throw new SubmissionError(kind, describeFailure(e, this.cfg.timeoutMs));
    }
    if (reply.httpStatus < 200 || reply.httpStatus >= 300) {
      throw new SubmissionError(kind, `HTTP_${reply.httpStatus}`, reply.httpStatus);
    }

    const taskId = parseSubmission(reply.body);
    if (!taskId) throw new SubmissionError(kind, "response carries no task id", reply.httpStatus);

    this.logger.log(`created ${kind} task ${taskId}`);
    return taskId;
  }

  private async readTask(taskId: string) {
    return this.send("GET", `/task/${encodeURIComponent(taskId)}`);
  }

  async getStatus(taskId: string): Promise<RemoteTaskStatus> {
    let reply: Reply;
    try {
      reply = await this.readTask(taskId);
    } catch (e) {
      throw new StatusQueryError(taskId, describeFailure(e, this.cfg.timeoutMs));
    }
    if (reply.httpStatus < 200 || reply.httpStatus >= 300) {
      throw new StatusQueryError(taskId, `HTTP_${reply.httpStatus}`, reply.httpStatus);
    }

    const doc = parseTaskDocument(reply.body);
    if (typeof doc === "string") throw new StatusQueryError(taskId, doc, reply.httpStatus);

    this.logger.debug(`task ${taskId} is ${doc.status}`);
    return doc.errorDetail === undefined ? { status: doc.status } : { status: doc.status, errorDetail: doc.errorDetail };
  }

  async fetchResult(taskId: string): Promise<JsonValue> {
    let reply: Reply;
    try {
      reply = await this.readTask(taskId);
    } catch (e) {
      throw new ResultFetchError(taskId, describeFailure(e, this.cfg.timeoutMs));
    }
    if (reply.httpStatus < 200 || reply.httpStatus >= 300) {
      throw new ResultFetchError(taskId, `HTTP_${reply.httpStatus}`, reply.httpStatus);
    }

    const doc = parseTaskDocument(reply.body);
    if (typeof doc === "string") throw new ResultFetchError(taskId, doc, reply.httpStatus);
    if (doc.status !== "SUCCEEDED") throw new ResultFetchError(taskId, `task is ${doc.status}`);
    // liquid handling tasks finish without a result document
    return doc.result;
  }
}
