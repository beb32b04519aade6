import { appendFile, readFileInput } from "../lib/files.js";
import type { HttpTransport } from "../lib/http.js";
import { JobSubmissionSchema, type JobSubmission } from "../models/job.js";
import {
  ValidationReportSchema,
  type ValidationReport,
} from "../models/validation.js";
import type {
  FileInput,
  ListValidationsQuery,
  RequestOptions,
  ValidationSubmitOptions,
} from "../types/requests.js";

/**
 * Validation service: checks e-invoices (Factur-X PDF, UBL or CII XML)
 * against the EN 16931 rules and returns a conformance report.
 *
 * @example
 * ```typescript
 * const client = new InvoiceIQ({ apiKey: 'your-key' });
 *
 * const submission = await client.validations.submit('./invoice.pdf', {
 *   referenceId: 'order-1234',
 * });
 * const report = await client.validations.getReport(submission.id);
 * console.log(report.finalScore, report.issues);
 * ```
 */
export class ValidationsService {
  constructor(private readonly http: HttpTransport) {}

  /**
   * Submit a document for validation.
   *
   * Sent as `multipart/form-data` with the document in the `file` part and
   * the optional `callbackUrl` and `referenceId` string fields.
   *
   * @param file - Local path, Buffer or readable stream of the document
   * @param options.idempotencyKey - Sent as `Idempotency-Key`
   * @throws {FileError} If the document cannot be read or is not a PDF/XML file
   * @throws {APIError} If the API rejects the submission
   */
  async submit(
    file: FileInput,
    options: ValidationSubmitOptions = {},
  ): Promise<JobSubmission> {
    const part = await readFileInput(file, options);

    const form = new FormData();
    appendFile(form, "file", part);
    if (options.callbackUrl) {
      form.append("callbackUrl", options.callbackUrl);
    }
    if (options.referenceId) {
      form.append("referenceId", options.referenceId);
    }

    return this.http.requestModel(
      JobSubmissionSchema,
      {
        method: "POST",
        path: "/v1/validations",
        data: form,
        headers: options.idempotencyKey
          ? { "Idempotency-Key": options.idempotencyKey }
          : undefined,
        signal: options.signal,
      },
      "validation submission",
    );
  }

  /**
   * Fetch the report of a validation.
   *
   * @throws {UnexpectedResponseError} If the API answers with a binary body
   */
  async getReport(
    validationId: string,
    options: RequestOptions = {},
  ): Promise<ValidationReport> {
    return this.http.requestModel(
      ValidationReportSchema,
      {
        method: "GET",
        path: `/v1/validations/${encodeURIComponent(validationId)}/report`,
        signal: options.signal,
      },
      "validation report",
    );
  }

  /**
   * List validations. The query is forwarded as-is and the response body is
   * returned without parsing.
   */
  async list(
    query: ListValidationsQuery = {},
    options: RequestOptions = {},
  ): Promise<unknown> {
    return this.http.request({
      method: "GET",
      path: "/v1/validations",
      params: query,
      signal: options.signal,
    });
  }
}
