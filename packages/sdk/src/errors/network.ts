import { SDKError } from "./base.js";

/**
 * Error thrown when no response was received
 */
export class NetworkError extends SDKError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", undefined, cause);
  }
}

/**
 * Error thrown when a request or a polling run is aborted through its signal
 */
export class CancelledError extends SDKError {
  constructor(message: string = "Operation cancelled", cause?: Error) {
    super(message, "CANCELLED", undefined, cause);
  }
}
