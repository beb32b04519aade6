import type { HttpTransport } from "../lib/http.js";
import { GenerationPayloadSchema, type GenerationPayloadInput } from "../models/invoice.js";
import { JobSchema, JobSubmissionSchema, type Job, type JobSubmission } from "../models/job.js";
import { parseModel } from "../models/parse.js";
import type { RequestOptions, SubmitOptions } from "../types/requests.js";
import { waitForJob, type PollOptions } from "../utils/polling.js";

/**
 * Generation service: renders a Factur-X invoice from structured data alone
 */
export class GenerationsService {
  constructor(private readonly http: HttpTransport) {}

  /**
   * Submit an invoice payload for generation, as a JSON body.
   *
   * @throws {InvalidInputError} If the payload does not match the invoice model
   */
  async submit(
    payload: GenerationPayloadInput,
    options: SubmitOptions = {},
  ): Promise<JobSubmission> {
    const body = parseModel(GenerationPayloadSchema, payload, "generation payload");

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (options.idempotencyKey) {
      headers["Idempotency-Key"] = options.idempotencyKey;
    }

    return this.http.requestModel(
      JobSubmissionSchema,
      {
        method: "POST",
        path: "/api/v1/generations",
        data: body,
        headers,
        signal: options.signal,
      },
      "generation submission",
    );
  }

  async get(jobId: string, options: RequestOptions = {}): Promise<Job> {
    return this.http.requestModel(
      JobSchema,
      {
        method: "GET",
        path: `/api/v1/generations/${encodeURIComponent(jobId)}`,
        signal: options.signal,
      },
      "generation job",
    );
  }

  /**
   * Poll a generation job until it completes, fails or the wait expires
   */
  async waitUntilDone(jobId: string, options: PollOptions = {}): Promise<Job> {
    return waitForJob((id, signal) => this.get(id, { signal }), jobId, options);
  }
}
