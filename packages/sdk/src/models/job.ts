import { z } from "zod";

/**
 * Server-side asynchronous unit of work (transformation or generation).
 *
 * `status` is free-form; the poller compares it case-insensitively against
 * its completed and failed statuses.
 */
export const JobSchema = z.object({
  id: z.string(),
  status: z.string(),
  downloadUrl: z.string().nullish(),
  reportDownloadUrl: z.string().nullish(),
});

/**
 * Acknowledgement returned by the submission endpoints. Fields beyond `id`
 * and `status` vary per endpoint and are kept as received.
 */
export const JobSubmissionSchema = z
  .object({
    id: z.string(),
    status: z.string().nullish(),
  })
  .passthrough();

export type Job = z.output<typeof JobSchema>;
export type JobSubmission = z.output<typeof JobSubmissionSchema>;

/**
 * Reads the current state of a job. Each resource family that runs jobs
 * provides one; {@link waitForJob} calls it once per polling iteration.
 */
export type JobFetcher = (jobId: string, signal?: AbortSignal) => Promise<Job>;
