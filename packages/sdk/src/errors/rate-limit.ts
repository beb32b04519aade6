import type { AxiosResponse } from "axios";
import { APIError } from "./api.js";

/**
 * Error thrown when rate limit is exceeded (429)
 */
export class RateLimitError extends APIError {
  constructor(
    message: string,
    public retryAfter?: number, // seconds
    response?: AxiosResponse,
  ) {
    super(message, 429, response, "RATE_LIMIT_ERROR");
  }
}
