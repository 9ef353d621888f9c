import {
  type IngestionJob,
  type IngestionJobError,
  TERMINAL_FAILURE_STATUSES,
  TERMINAL_SUCCESS_STATUSES,
} from "../../domain/entities/ingestion-job";
import { PollAbortedError, PollTimeoutError } from "../../domain/errors/file-search.errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface JobPollerOptions {
  intervalMs?: number; // Fixed delay between status checks (default: 5000)
  maxAttempts?: number; // Status checks before giving up; 0 or unset polls forever
  sleep?: Sleep;
  label?: string; // Used in log lines, e.g. "File batch"
}

export type PollOutcome<T extends IngestionJob = IngestionJob> =
  | { status: "completed"; job: T; attempts: number }
  | { status: "failed"; job: T; attempts: number; error?: IngestionJobError };

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Repeatedly runs a status check until the job reports a terminal status.
 * No backoff: every retry waits the same interval.
 */
export class JobPoller {
  private readonly intervalMs: number;
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;
  private readonly label: string;

  constructor(options: JobPollerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxAttempts = options.maxAttempts ?? 0;
    this.sleep = options.sleep ?? delay;
    this.label = options.label ?? "Job";
  }

  async pollUntilTerminal<T extends IngestionJob>(
    check: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<PollOutcome<T>> {
    let attempts = 0;

    while (true) {
      if (signal?.aborted) {
        throw new PollAbortedError(attempts);
      }

      const job = await check();
      attempts++;

      if (TERMINAL_SUCCESS_STATUSES.includes(job.status)) {
        return { status: "completed", job, attempts };
      }

      if (TERMINAL_FAILURE_STATUSES.includes(job.status)) {
        return { status: "failed", job, attempts, error: job.lastError };
      }

      console.log(`${this.label} status: ${job.status}`);

      if (this.maxAttempts > 0 && attempts >= this.maxAttempts) {
        throw new PollTimeoutError(attempts, job.status);
      }

      try {
        await this.sleep(this.intervalMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new PollAbortedError(attempts);
        }
        throw error;
      }
    }
  }
}
