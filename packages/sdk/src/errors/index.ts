/**
 * Error classes for the InvoiceIQ SDK
 */

export { SDKError } from "./base.js";
export { APIError, UnexpectedResponseError } from "./api.js";
export { AuthenticationError, AuthorizationError } from "./auth.js";
export { RateLimitError } from "./rate-limit.js";
export { ValidationError } from "./validation.js";
export { InvalidInputError } from "./input.js";
export { FileError } from "./file.js";
export { JobFailedError, TimeoutError } from "./job.js";
export { NetworkError, CancelledError } from "./network.js";
