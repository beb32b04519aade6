import { APIError } from "./api.js";
import { SDKError } from "./base.js";

/**
 * Error thrown when polling observes a failed job status.
 *
 * It is an {@link APIError} so that callers handling API failures also see
 * jobs the server gave up on.
 */
export class JobFailedError extends APIError {
  constructor(
    public jobId: string,
    public jobStatus: string,
  ) {
    super(`Job ${jobId} failed with status ${jobStatus}`, 500, undefined, "JOB_FAILED");
  }
}

/**
 * Error thrown when polling gives up before the job reached a terminal status
 */
export class TimeoutError extends SDKError {
  constructor(
    public jobId: string,
    public maxWait: number,
  ) {
    super(`Job ${jobId} timed out after ${maxWait}ms`, "TIMEOUT_ERROR");
  }
}
