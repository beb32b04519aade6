import { SDKError } from "./base.js";

/**
 * Error thrown before any request is sent, when a payload or an option
 * does not satisfy its schema
 */
export class InvalidInputError extends SDKError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, "INVALID_INPUT");
  }
}
