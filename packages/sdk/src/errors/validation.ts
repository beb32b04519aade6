import type { AxiosResponse } from "axios";
import { APIError } from "./api.js";

/**
 * Error thrown when the API rejects a request as invalid (400, 422)
 */
export class ValidationError extends APIError {
  constructor(
    message: string,
    statusCode: number,
    public fields?: Record<string, string[]>,
    response?: AxiosResponse,
  ) {
    super(message, statusCode, response, "VALIDATION_ERROR");
  }
}
