import type { Readable } from "stream";

/**
 * A document to upload: a local file path, its bytes, or a readable stream
 */
export type FileInput = string | Buffer | Readable;

export interface FileOptions {
  /**
   * File name sent with the multipart part. Defaults to the basename of a
   * path input, or `document.pdf` for Buffer and stream inputs.
   */
  fileName?: string;
}

export interface RequestOptions {
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

export interface SubmitOptions extends RequestOptions {
  /** Lets the server deduplicate a retried submission */
  idempotencyKey?: string;
}

export interface ValidationSubmitOptions extends SubmitOptions, FileOptions {
  /** URL the API calls once the validation report is ready */
  callbackUrl?: string;

  /** Caller reference echoed back in the report */
  referenceId?: string;
}

export interface TransformationSubmitOptions extends SubmitOptions, FileOptions {}

/**
 * Query parameters for listing validations, passed through as-is
 */
export type ListValidationsQuery = Record<string, string | number | boolean | undefined>;
