/**
 * Root of every error the SDK raises.
 *
 * `code` is a stable identifier such as `API_ERROR` or `TIMEOUT_ERROR`;
 * `statusCode` is set whenever an HTTP status applies.
 */
export class SDKError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public cause?: Error,
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }

  /** Summary for structured logs, without the raw response or cause */
  toJSON(): { name: string; code: string; message: string; statusCode?: number } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}
