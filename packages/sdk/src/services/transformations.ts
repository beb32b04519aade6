import { appendFile, readFileInput } from "../lib/files.js";
import type { HttpTransport } from "../lib/http.js";
import { TransformationMetadataSchema, type TransformationMetadataInput } from "../models/invoice.js";
import { JobSchema, JobSubmissionSchema, type Job, type JobSubmission } from "../models/job.js";
import { parseModel } from "../models/parse.js";
import type {
  FileInput,
  RequestOptions,
  TransformationSubmitOptions,
} from "../types/requests.js";
import { waitForJob, type PollOptions } from "../utils/polling.js";

/**
 * Transformation service: turns a plain PDF invoice into a Factur-X
 * document, using the supplied invoice metadata.
 */
export class TransformationsService {
  constructor(private readonly http: HttpTransport) {}

  /**
   * Submit a PDF and its invoice metadata for transformation.
   *
   * The metadata is validated, then sent as a single `metadata` form field
   * holding its JSON serialization, next to the `file` part.
   *
   * @returns The created job; poll it with {@link waitUntilDone}
   * @throws {InvalidInputError} If the metadata does not match the invoice model
   * @throws {FileError} If the document cannot be read
   * @throws {APIError} If the API rejects the submission
   *
   * @example
   * ```typescript
   * const job = await client.transformations.submit('./invoice.pdf', metadata, {
   *   idempotencyKey: 'inv-2024-42',
   * });
   * const done = await client.transformations.waitUntilDone(job.id);
   * console.log(done.downloadUrl);
   * ```
   */
  async submit(
    file: FileInput,
    metadata: TransformationMetadataInput,
    options: TransformationSubmitOptions = {},
  ): Promise<JobSubmission> {
    const parsed = parseModel(TransformationMetadataSchema, metadata, "transformation metadata");
    const part = await readFileInput(file, options);

    const form = new FormData();
    appendFile(form, "file", part);
    form.append("metadata", JSON.stringify(parsed));

    return this.http.requestModel(
      JobSubmissionSchema,
      {
        method: "POST",
        path: "/api/v1/transformations",
        data: form,
        headers: options.idempotencyKey
          ? { "Idempotency-Key": options.idempotencyKey }
          : undefined,
        signal: options.signal,
      },
      "transformation submission",
    );
  }

  /**
   * Fetch a transformation job
   *
   * @throws {UnexpectedResponseError} If the API answers with a binary body
   */
  async get(jobId: string, options: RequestOptions = {}): Promise<Job> {
    return this.http.requestModel(
      JobSchema,
      {
        method: "GET",
        path: `/api/v1/transformations/${encodeURIComponent(jobId)}`,
        signal: options.signal,
      },
      "transformation job",
    );
  }

  /**
   * Poll a transformation job until it completes, fails or the wait expires
   */
  async waitUntilDone(jobId: string, options: PollOptions = {}): Promise<Job> {
    return waitForJob((id, signal) => this.get(id, { signal }), jobId, options);
  }
}
