import { z } from "zod";
import {
  CancelledError,
  JobFailedError,
  TimeoutError,
} from "../errors/index.js";
import type { Job, JobFetcher } from "../models/job.js";
import { parseModel } from "../models/parse.js";
import {
  DEFAULT_BACKOFF_FACTOR,
  DEFAULT_COMPLETED_STATUS,
  DEFAULT_FAILED_STATUSES,
  DEFAULT_MAX_WAIT,
  DEFAULT_POLL_INTERVAL,
  MAX_POLL_DELAY,
} from "./constants.js";

/**
 * Configuration options for polling a job until it reaches a terminal status.
 *
 * @example
 * ```typescript
 * const pollOptions: PollOptions = {
 *   pollInterval: 500,   // first wait, in ms
 *   backoffFactor: 2,    // 500, 1000, 2000, ...
 *   maxWait: 120000,     // give up after 2 minutes
 *   onProgress: (job) => console.log(job.status),
 * };
 * ```
 */
export interface PollOptions {
  /** First delay between two fetches, in ms, at most 2^31 - 1. Default: 1000 */
  pollInterval?: number;

  /** Maximum wait time in ms. Default: 60000 (1min) */
  maxWait?: number;

  /** Multiplier applied to the delay after each pending status. Default: 1.5 */
  backoffFactor?: number;

  /** Status that ends polling successfully, any casing. Default: COMPLETED */
  completedStatus?: string;

  /** Statuses that end polling with a JobFailedError, any casing. Default: FAILED, CANCELED */
  failedStatuses?: readonly string[];

  /** Called with every fetched job, terminal or not */
  onProgress?: (job: Job) => void;

  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

/**
 * Poll options after defaults are applied and statuses are uppercased
 */
export interface PollConfig {
  pollInterval: number;
  maxWait: number;
  backoffFactor: number;
  completedStatus: string;
  failedStatuses: ReadonlySet<string>;
  onProgress?: (job: Job) => void;
  signal?: AbortSignal;
}

const PollTimingSchema = z.object({
  pollInterval: z.number().positive().max(MAX_POLL_DELAY),
  maxWait: z.number().nonnegative(),
  backoffFactor: z.number().finite().min(1),
  completedStatus: z.string().min(1),
  failedStatuses: z.array(z.string()),
});

/**
 * Apply defaults and check the polling invariants.
 *
 * @throws {InvalidInputError} If an interval, wait or factor is out of range
 */
export function resolvePollConfig(options: PollOptions = {}): PollConfig {
  const timing = parseModel(
    PollTimingSchema,
    {
      pollInterval: options.pollInterval ?? DEFAULT_POLL_INTERVAL,
      maxWait: options.maxWait ?? DEFAULT_MAX_WAIT,
      backoffFactor: options.backoffFactor ?? DEFAULT_BACKOFF_FACTOR,
      completedStatus: options.completedStatus ?? DEFAULT_COMPLETED_STATUS,
      failedStatuses: options.failedStatuses ?? DEFAULT_FAILED_STATUSES,
    },
    "poll options",
  );

  return {
    pollInterval: timing.pollInterval,
    maxWait: timing.maxWait,
    backoffFactor: timing.backoffFactor,
    completedStatus: timing.completedStatus.toUpperCase(),
    failedStatuses: new Set(timing.failedStatuses.map((s) => s.toUpperCase())),
    onProgress: options.onProgress,
    signal: options.signal,
  };
}

/**
 * Wait `ms`, or reject with a CancelledError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Polling cancelled"));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Polling cancelled"));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Poll a job until it reaches a terminal status.
 *
 * Each iteration fetches the job once. A completed status returns the job,
 * a failed status rejects with a {@link JobFailedError}. Otherwise the
 * poller sleeps for the current delay and multiplies it by
 * `backoffFactor`, never past {@link MAX_POLL_DELAY}, unless that sleep
 * would end past the deadline (`maxWait` after the call), in which case it
 * rejects with a {@link TimeoutError} without sleeping. The completed status wins when it
 * is also listed as failed.
 *
 * Errors thrown by `fetchJob` propagate unchanged and are not retried.
 *
 * @param fetchJob - Reads the job; called with the signal so an abort also cancels the request
 * @throws {JobFailedError} If the job reports a failed status
 * @throws {TimeoutError} If no further delay fits before the deadline
 * @throws {CancelledError} If the signal aborts
 *
 * @example
 * ```typescript
 * const job = await waitForJob(
 *   (id, signal) => client.transformations.get(id, { signal }),
 *   submission.id,
 *   { pollInterval: 2000, maxWait: 300000 },
 * );
 * ```
 */
export async function waitForJob(
  fetchJob: JobFetcher,
  jobId: string,
  options: PollOptions = {},
): Promise<Job> {
  const config = resolvePollConfig(options);
  const deadline = Date.now() + config.maxWait;
  let delay = config.pollInterval;

  while (true) {
    if (config.signal?.aborted) {
      throw new CancelledError("Polling cancelled");
    }

    const job = await fetchJob(jobId, config.signal);
    config.onProgress?.(job);

    const status = job.status.toUpperCase();
    if (status === config.completedStatus) {
      return job;
    }
    if (config.failedStatuses.has(status)) {
      throw new JobFailedError(jobId, job.status);
    }

    // Refuse a sleep that would certainly end past the deadline
    if (Date.now() + delay > deadline) {
      throw new TimeoutError(jobId, config.maxWait);
    }

    await sleep(delay, config.signal);
    delay = Math.min(delay * config.backoffFactor, MAX_POLL_DELAY);
  }
}
