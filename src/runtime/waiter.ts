import { Logger } from "@nestjs/common";
import { Clock, systemClock } from "./clock";
import { StatusQueryError } from "./errors";
import { RemoteTaskClient, RemoteTaskStatus } from "./task-client";

/** Bounded retry around status queries only. `maxAttempts: 1` means a failed query ends the wait. */
export type StatusRetryPolicy = {
  maxAttempts: number;
  backoffMs: number;
  backoffMultiplier: number;
};

export const NO_STATUS_RETRY: StatusRetryPolicy = { maxAttempts: 1, backoffMs: 0, backoffMultiplier: 1 };

export type WaitOptions = {
  pollIntervalMs: number;
  maxWaitMs: number;
  signal?: AbortSignal;
};

type Progress = { polls: number; elapsedMs: number };

export type TerminalOutcome =
  | ({ status: "SUCCEEDED" } & Progress)
  | ({ status: "FAILED"; errorDetail: string | null } & Progress)
  | ({ status: "TIMED_OUT"; cancelled: boolean } & Progress);

/**
 * Polls one remote task until it is terminal or `maxWaitMs` has passed since the first query.
 * Timing out is local: the remote task is left running.
 */
export class CompletionWaiter {
  private readonly logger = new Logger(CompletionWaiter.name);

  constructor(
    private readonly client: RemoteTaskClient,
    private readonly clock: Clock = systemClock,
    private readonly retry: StatusRetryPolicy = NO_STATUS_RETRY,
  ) {}

  async wait(taskId: string, opts: WaitOptions): Promise<TerminalOutcome> {
    const started = this.clock.now();
    let polls = 0;
    const progress = (): Progress => ({ polls, elapsedMs: this.clock.now() - started });

    const cancelled = (): TerminalOutcome => {
      this.logger.warn(`wait for task ${taskId} cancelled`);
      return { status: "TIMED_OUT", cancelled: true, ...progress() };
    };

    for (;;) {
      if (opts.signal?.aborted) return cancelled();

      const s = await this.queryStatus(taskId, opts.signal);
      if (s === null) return cancelled();
      polls++;

      if (s.status === "SUCCEEDED") return { status: "SUCCEEDED", ...progress() };
      if (s.status === "FAILED") return { status: "FAILED", errorDetail: s.errorDetail ?? null, ...progress() };

      const p = progress();
      if (p.elapsedMs >= opts.maxWaitMs) {
        this.logger.warn(`task ${taskId} still ${s.status} after ${p.elapsedMs}ms, giving up`);
        return { status: "TIMED_OUT", cancelled: false, ...p };
      }
      await this.clock.sleep(opts.pollIntervalMs, opts.signal);
    }
  }

  /** Resolves to null when the signal aborts between retries. */
  private async queryStatus(taskId: string, signal?: AbortSignal): Promise<RemoteTaskStatus | null> {
    let delay = this.retry.backoffMs;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.getStatus(taskId);
      } catch (e) {
        if (!(e instanceof StatusQueryError) || attempt >= this.retry.maxAttempts) throw e;
        if (signal?.aborted) return null;
        this.logger.warn(`${e.message} (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms`);
        if (delay > 0) await this.clock.sleep(delay, signal);
        if (signal?.aborted) return null;
        delay = Math.floor(delay * this.retry.backoffMultiplier);
      }
    }
  }
}
