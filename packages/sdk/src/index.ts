/**
 * InvoiceIQ SDK for JavaScript/TypeScript
 *
 * @packageDocumentation
 */

// Main client
export { InvoiceIQ, resolveClientConfig } from "./client.js";

// Services
export { ValidationsService } from "./services/validations.js";
export { TransformationsService } from "./services/transformations.js";
export { GenerationsService } from "./services/generations.js";

// Types
export type {
  ClientConfig,
  Logger,
  FileInput,
  FileOptions,
  SubmitOptions,
  RequestOptions,
  ValidationSubmitOptions,
  TransformationSubmitOptions,
  ListValidationsQuery,
} from "./types/index.js";

// Models
export * from "./models/index.js";

// Errors
export {
  SDKError,
  APIError,
  UnexpectedResponseError,
  AuthenticationError,
  AuthorizationError,
  RateLimitError,
  ValidationError,
  InvalidInputError,
  FileError,
  JobFailedError,
  TimeoutError,
  NetworkError,
  CancelledError,
} from "./errors/index.js";

// Polling
export { waitForJob, resolvePollConfig } from "./utils/polling.js";
export type { PollOptions, PollConfig } from "./utils/polling.js";

// Constants
export {
  DEFAULT_BASE_URL,
  MAX_FILE_SIZE,
  SUPPORTED_EXTENSIONS,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_MAX_WAIT,
  DEFAULT_BACKOFF_FACTOR,
  MAX_POLL_DELAY,
  SDK_VERSION,
} from "./utils/constants.js";

// Utilities (for advanced use)
export { validateFile, validateBuffer } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";
