import type { AxiosResponse } from "axios";
import { SDKError } from "./base.js";

/**
 * Error raised for every response with a status of 400 or above, and for
 * responses that break the JSON contract of a typed endpoint.
 */
export class APIError extends SDKError {
  constructor(
    message: string,
    statusCode: number,
    public response?: AxiosResponse,
    code: string = "API_ERROR",
  ) {
    super(message, code, statusCode);
  }
}

/**
 * The server answered a JSON endpoint with binary or malformed content
 */
export class UnexpectedResponseError extends APIError {
  constructor(message: string, response?: AxiosResponse) {
    super(message, 500, response, "UNEXPECTED_RESPONSE");
  }
}
