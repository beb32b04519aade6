import Axios from "axios";
import { InvalidInputError } from "./errors/index.js";
import { HttpTransport } from "./lib/http.js";
import type { Job, JobFetcher } from "./models/job.js";
import { GenerationsService } from "./services/generations.js";
import { TransformationsService } from "./services/transformations.js";
import { ValidationsService } from "./services/validations.js";
import type { ClientConfig, ResolvedClientConfig } from "./types/config.js";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from "./utils/constants.js";
import { waitForJob, type PollOptions } from "./utils/polling.js";

/**
 * Apply defaults to a client configuration
 *
 * @throws {InvalidInputError} If the timeout is not a positive number
 */
export function resolveClientConfig(config: ClientConfig = {}): ResolvedClientConfig {
  const timeout = config.timeout ?? DEFAULT_TIMEOUT;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidInputError(`Invalid timeout: ${timeout}`, [
      "timeout: must be a positive number of milliseconds",
    ]);
  }

  return {
    apiKey: config.apiKey || undefined,
    bearerToken: config.bearerToken || undefined,
    baseURL: (config.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    timeout,
    httpClient: config.httpClient ?? Axios.create(),
    debug: config.debug ?? false,
    logger: config.logger ?? console,
  };
}

/**
 * Main InvoiceIQ SDK client for e-invoice validation, transformation and
 * generation.
 *
 * @example
 * ```typescript
 * import { InvoiceIQ } from 'invoiceiq-sdk';
 *
 * const client = new InvoiceIQ({
 *   apiKey: 'your-api-key',
 *   baseURL: 'https://api.invoiceiq.fr', // optional
 * });
 *
 * // Turn a PDF into a Factur-X invoice
 * const submission = await client.transformations.submit('./invoice.pdf', metadata);
 * const job = await client.transformations.waitUntilDone(submission.id);
 * console.log(job.downloadUrl);
 * ```
 */
export class InvoiceIQ {
  private readonly config: ResolvedClientConfig;
  private readonly http: HttpTransport;
  private _validations?: ValidationsService;
  private _transformations?: TransformationsService;
  private _generations?: GenerationsService;

  constructor(config: ClientConfig = {}) {
    this.config = resolveClientConfig(config);
    this.http = new HttpTransport(this.config);
  }

  /**
   * Base URL requests are sent to, without trailing slash
   */
  get baseURL(): string {
    return this.config.baseURL;
  }

  /**
   * Access the validation service: submit documents, fetch reports, list
   * past validations.
   */
  get validations(): ValidationsService {
    if (!this._validations) {
      this._validations = new ValidationsService(this.http);
    }
    return this._validations;
  }

  /**
   * Access the transformation service: PDF + metadata to Factur-X.
   */
  get transformations(): TransformationsService {
    if (!this._transformations) {
      this._transformations = new TransformationsService(this.http);
    }
    return this._transformations;
  }

  /**
   * Access the generation service: structured data to Factur-X.
   */
  get generations(): GenerationsService {
    if (!this._generations) {
      this._generations = new GenerationsService(this.http);
    }
    return this._generations;
  }

  /**
   * Poll any job until it reaches a terminal status.
   *
   * @example
   * ```typescript
   * const job = await client.waitForJob(
   *   (id, signal) => client.generations.get(id, { signal }),
   *   submission.id,
   *   { maxWait: 120000 },
   * );
   * ```
   */
  waitForJob(fetchJob: JobFetcher, jobId: string, options: PollOptions = {}): Promise<Job> {
    return waitForJob(fetchJob, jobId, options);
  }
}
