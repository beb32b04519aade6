import type { AxiosResponse } from "axios";
import { APIError } from "./api.js";

/**
 * Error thrown when authentication fails (401)
 */
export class AuthenticationError extends APIError {
  constructor(message: string = "Invalid API key", response?: AxiosResponse) {
    super(message, 401, response, "AUTHENTICATION_ERROR");
  }
}

/**
 * Error thrown when authorization fails (403)
 */
export class AuthorizationError extends APIError {
  constructor(message: string = "Access forbidden", response?: AxiosResponse) {
    super(message, 403, response, "AUTHORIZATION_ERROR");
  }
}
