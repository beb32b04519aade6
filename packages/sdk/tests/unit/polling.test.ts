import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  APIError,
  CancelledError,
  InvalidInputError,
  JobFailedError,
  NetworkError,
  TimeoutError,
} from "../../src/errors/index.js";
import type { Job } from "../../src/models/job.js";
import { MAX_POLL_DELAY } from "../../src/utils/constants.js";
import { resolvePollConfig, waitForJob } from "../../src/utils/polling.js";

/**
 * Fetcher reporting the given statuses in order, repeating the last one
 */
function fetcherReturning(...statuses: string[]) {
  let call = 0;
  return vi.fn(async (jobId: string, _signal?: AbortSignal): Promise<Job> => {
    const status = statuses[Math.min(call, statuses.length - 1)];
    call++;
    return { id: jobId, status, downloadUrl: `https://files.test/${jobId}/${call}` };
  });
}

describe("Polling Logic", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("resolvePollConfig", () => {
    it("should apply defaults", () => {
      const config = resolvePollConfig();

      expect(config.pollInterval).toBe(1000);
      expect(config.maxWait).toBe(60000);
      expect(config.backoffFactor).toBe(1.5);
      expect(config.completedStatus).toBe("COMPLETED");
      expect([...config.failedStatuses]).toEqual(["FAILED", "CANCELED"]);
    });

    it("should uppercase configured statuses once", () => {
      const config = resolvePollConfig({
        completedStatus: "done",
        failedStatuses: ["Rejected", "error"],
      });

      expect(config.completedStatus).toBe("DONE");
      expect(config.failedStatuses).toEqual(new Set(["REJECTED", "ERROR"]));
    });

    it.each([
      [{ pollInterval: 0 }, "pollInterval"],
      [{ pollInterval: -5 }, "pollInterval"],
      [{ pollInterval: 2 ** 31 }, "pollInterval"],
      [{ backoffFactor: 0.5 }, "backoffFactor"],
      [{ maxWait: -1 }, "maxWait"],
      [{ completedStatus: "" }, "completedStatus"],
    ])("should reject %o", (options, field) => {
      expect(() => resolvePollConfig(options)).toThrow(InvalidInputError);
      expect(() => resolvePollConfig(options)).toThrow(field);
    });

    it("should reject a bare string of failed statuses", () => {
      const options = JSON.parse('{"failedStatuses":"FAILED"}');

      expect(() => resolvePollConfig(options)).toThrow(
        "failedStatuses: Expected array, received string",
      );
    });

    it("should accept the longest timer delay as pollInterval", () => {
      expect(resolvePollConfig({ pollInterval: MAX_POLL_DELAY }).pollInterval).toBe(
        2 ** 31 - 1,
      );
    });

    it("should accept a zero maxWait and a backoffFactor of 1", () => {
      const config = resolvePollConfig({ maxWait: 0, backoffFactor: 1 });

      expect(config.maxWait).toBe(0);
      expect(config.backoffFactor).toBe(1);
    });
  });

  describe("waitForJob", () => {
    it.each(["COMPLETED", "completed", "Completed", "cOmPlEtEd"])(
      "should return on the first fetch reporting %s",
      async (status) => {
        const fetchJob = fetcherReturning(status);

        const job = await waitForJob(fetchJob, "job-1");

        expect(job).toEqual({
          id: "job-1",
          status,
          downloadUrl: "https://files.test/job-1/1",
        });
        expect(fetchJob).toHaveBeenCalledTimes(1);
        expect(vi.getTimerCount()).toBe(0);
      },
    );

    it.each(["FAILED", "failed", "Canceled", "canceled"])(
      "should fail on the first fetch reporting %s",
      async (status) => {
        const fetchJob = fetcherReturning(status);

        const error = await waitForJob(fetchJob, "job-7").catch((e: unknown) => e);

        expect(error).toBeInstanceOf(JobFailedError);
        expect(error).toBeInstanceOf(APIError);
        expect(error).toMatchObject({
          jobId: "job-7",
          jobStatus: status,
          statusCode: 500,
          code: "JOB_FAILED",
          message: `Job job-7 failed with status ${status}`,
        });
        expect(fetchJob).toHaveBeenCalledTimes(1);
      },
    );

    it("should use custom terminal statuses case-insensitively", async () => {
      const fetchJob = fetcherReturning("queued", "rejected");

      const promise = waitForJob(fetchJob, "job-2", {
        pollInterval: 10,
        failedStatuses: ["REJECTED"],
      });
      const assertion = expect(promise).rejects.toThrow(
        "Job job-2 failed with status rejected",
      );

      await vi.runAllTimersAsync();
      await assertion;
      expect(fetchJob).toHaveBeenCalledTimes(2);
    });

    it("should let the completed status win when it is also listed as failed", async () => {
      const fetchJob = fetcherReturning("done");

      const job = await waitForJob(fetchJob, "job-3", {
        completedStatus: "DONE",
        failedStatuses: ["done", "FAILED"],
      });

      expect(job.status).toBe("done");
    });

    it("should poll until the job completes", async () => {
      const fetchJob = fetcherReturning("PENDING", "PROCESSING", "COMPLETED");

      const promise = waitForJob(fetchJob, "job-42", {
        pollInterval: 10,
        backoffFactor: 1.5,
        maxWait: 100,
      });
      await vi.runAllTimersAsync();
      const job = await promise;

      expect(job).toEqual({
        id: "job-42",
        status: "COMPLETED",
        downloadUrl: "https://files.test/job-42/3",
      });
      expect(fetchJob).toHaveBeenCalledTimes(3);
    });

    it("should grow the delay by the backoff factor", async () => {
      const fetchJob = fetcherReturning("PENDING", "PENDING", "COMPLETED");

      const promise = waitForJob(fetchJob, "job-5", {
        pollInterval: 10,
        backoffFactor: 1.5,
        maxWait: 1000,
      });

      expect(fetchJob).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(9);
      expect(fetchJob).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetchJob).toHaveBeenCalledTimes(2);

      // second delay is 15ms
      await vi.advanceTimersByTimeAsync(14);
      expect(fetchJob).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetchJob).toHaveBeenCalledTimes(3);

      await expect(promise).resolves.toMatchObject({ status: "COMPLETED" });
    });

    it("should time out without sleeping when the first delay overshoots", async () => {
      const fetchJob = fetcherReturning("PENDING");

      const error = await waitForJob(fetchJob, "job-9", {
        pollInterval: 10,
        maxWait: 5,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).not.toBeInstanceOf(APIError);
      expect(error).toMatchObject({
        jobId: "job-9",
        maxWait: 5,
        message: "Job job-9 timed out after 5ms",
      });
      expect(fetchJob).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("should cap a grown delay at the longest timer delay", async () => {
      const fetchJob = fetcherReturning("PENDING", "PENDING", "COMPLETED");

      const promise = waitForJob(fetchJob, "job-8", {
        pollInterval: MAX_POLL_DELAY,
        backoffFactor: 2,
        maxWait: 10 * MAX_POLL_DELAY,
      });

      await vi.advanceTimersByTimeAsync(MAX_POLL_DELAY - 1);
      expect(fetchJob).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetchJob).toHaveBeenCalledTimes(2);

      // doubled delay would overflow the timer; it stays at the cap
      await vi.advanceTimersByTimeAsync(MAX_POLL_DELAY - 1);
      expect(fetchJob).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetchJob).toHaveBeenCalledTimes(3);

      await expect(promise).resolves.toMatchObject({ status: "COMPLETED" });
    });

    it("should check the deadline before sleeping", async () => {
      const fetchJob = fetcherReturning("PENDING");

      // 0: fetch, sleep 10 (10 <= 20); 10: fetch, next sleep ends at 25 > 20
      const start = Date.now();
      const promise = waitForJob(fetchJob, "job-42", {
        pollInterval: 10,
        maxWait: 20,
      });
      const assertion = expect(promise).rejects.toThrow(TimeoutError);

      await vi.runAllTimersAsync();
      await assertion;

      expect(fetchJob).toHaveBeenCalledTimes(2);
      expect(Date.now() - start).toBe(10);
    });

    it("should fetch at least once when maxWait is zero", async () => {
      const fetchJob = fetcherReturning("completed");

      const job = await waitForJob(fetchJob, "job-0", { maxWait: 0 });

      expect(job.status).toBe("completed");
      expect(fetchJob).toHaveBeenCalledTimes(1);
    });

    it("should propagate fetch errors without retrying", async () => {
      const failure = new NetworkError("Network error: socket hang up");
      const fetchJob = vi.fn(async (_jobId: string): Promise<Job> => {
        throw failure;
      });

      await expect(waitForJob(fetchJob, "job-1")).rejects.toBe(failure);
      expect(fetchJob).toHaveBeenCalledTimes(1);
    });

    it("should call onProgress with every fetched job", async () => {
      const fetchJob = fetcherReturning("PENDING", "PROCESSING", "COMPLETED");
      const onProgress = vi.fn();

      const promise = waitForJob(fetchJob, "job-4", {
        pollInterval: 10,
        onProgress,
      });
      await vi.runAllTimersAsync();
      await promise;

      expect(onProgress).toHaveBeenCalledTimes(3);
      expect(onProgress.mock.calls.map(([job]) => job.status)).toEqual([
        "PENDING",
        "PROCESSING",
        "COMPLETED",
      ]);
    });

    it("should forward the signal to the fetcher", async () => {
      const controller = new AbortController();
      const fetchJob = fetcherReturning("COMPLETED");

      await waitForJob(fetchJob, "job-6", { signal: controller.signal });

      expect(fetchJob).toHaveBeenCalledWith("job-6", controller.signal);
    });

    it("should not fetch when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const fetchJob = fetcherReturning("COMPLETED");

      await expect(
        waitForJob(fetchJob, "job-6", { signal: controller.signal }),
      ).rejects.toThrow(CancelledError);
      expect(fetchJob).not.toHaveBeenCalled();
    });

    it("should stop sleeping when the signal aborts", async () => {
      const controller = new AbortController();
      const fetchJob = fetcherReturning("PENDING");

      const promise = waitForJob(fetchJob, "job-6", {
        pollInterval: 100,
        maxWait: 10000,
        signal: controller.signal,
      });
      const assertion = expect(promise).rejects.toThrow("Polling cancelled");

      await vi.advanceTimersByTimeAsync(50);
      controller.abort();

      await assertion;
      expect(fetchJob).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("should reject invalid options before fetching", async () => {
      const fetchJob = fetcherReturning("COMPLETED");

      await expect(
        waitForJob(fetchJob, "job-1", { pollInterval: 0 }),
      ).rejects.toThrow(InvalidInputError);
      expect(fetchJob).not.toHaveBeenCalled();
    });
  });
});
