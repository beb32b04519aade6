import Axios, {
  type AxiosInstance,
  type AxiosResponse,
  type Method,
} from "axios";
import type { z } from "zod";
import {
  APIError,
  AuthenticationError,
  AuthorizationError,
  CancelledError,
  NetworkError,
  RateLimitError,
  SDKError,
  UnexpectedResponseError,
  ValidationError,
} from "../errors/index.js";
import { parseResponse } from "../models/parse.js";
import type { ResolvedClientConfig } from "../types/config.js";
import { SDK_VERSION } from "../utils/constants.js";

const JSON_CONTENT_TYPE = /[\/+]json\b/i;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: Method;
  path: string;
  params?: QueryParams;
  /** A FormData for multipart bodies, any JSON-serializable value otherwise */
  data?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function headerValue(
  response: AxiosResponse<unknown>,
  name: string,
): string | undefined {
  const value: unknown = response.headers[name];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

/**
 * Bodies are requested as bytes; a custom adapter may still hand back a
 * string or an already-parsed value.
 */
function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") return Buffer.from(data, "utf8");
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), "utf8");
}

function tryParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract message - `message` first, then `error` as a string or an object
 */
function extractMessage(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;

  const { message, error } = payload;
  if (typeof message === "string" && message) return message;
  if (typeof error === "string" && error) return error;
  if (isRecord(error) && typeof error.message === "string") return error.message;
  return undefined;
}

function extractFields(payload: unknown): Record<string, string[]> | undefined {
  if (!isRecord(payload) || !isRecord(payload.fields)) return undefined;

  const fields: Record<string, string[]> = {};
  for (const [name, messages] of Object.entries(payload.fields)) {
    if (Array.isArray(messages)) {
      fields[name] = messages.filter((m): m is string => typeof m === "string");
    } else if (typeof messages === "string") {
      fields[name] = [messages];
    }
  }
  return fields;
}

/**
 * Map a response with status >= 400 to an SDK error
 */
export function mapErrorResponse(response: AxiosResponse<unknown>): APIError {
  const status = response.status;
  const text = toBuffer(response.data).toString("utf8");
  const payload = tryParseJSON(text);
  const message = extractMessage(payload) ?? (text || `HTTP ${status}`);

  switch (status) {
    case 401:
      return new AuthenticationError(message, response);

    case 403:
      return new AuthorizationError(message, response);

    case 429: {
      const retryAfter = headerValue(response, "retry-after");
      const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
      return new RateLimitError(
        message,
        Number.isNaN(seconds) ? undefined : seconds,
        response,
      );
    }

    case 400:
    case 422:
      return new ValidationError(message, status, extractFields(payload), response);

    default:
      return new APIError(message, status, response);
  }
}

/**
 * Decode a successful body: JSON content-types are parsed, anything else is
 * returned as raw bytes for the caller to accept or reject.
 */
export function decodeBody(response: AxiosResponse<unknown>): unknown {
  const raw = toBuffer(response.data);
  const contentType = headerValue(response, "content-type") ?? "";

  if (!JSON_CONTENT_TYPE.test(contentType)) {
    return raw;
  }

  const text = raw.toString("utf8");
  if (text.trim() === "") {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UnexpectedResponseError(
      `Malformed JSON response: ${error instanceof Error ? error.message : String(error)}`,
      response,
    );
  }
}

/**
 * Thin axios wrapper: attaches credentials, classifies statuses and decodes
 * bodies. Every call is exactly one HTTP exchange.
 */
export class HttpTransport {
  private readonly http: AxiosInstance;

  constructor(private readonly config: ResolvedClientConfig) {
    this.http = config.httpClient;
  }

  /**
   * Log a step of this client's own exchanges when debug is on
   */
  private debugLog(message: string, details: unknown): void {
    if (this.config.debug) {
      this.config.logger.log(`[InvoiceIQ] ${message}`, details);
    }
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": `invoiceiq-sdk-js/${SDK_VERSION}`,
    };
    if (this.config.apiKey) {
      headers["X-API-KEY"] = this.config.apiKey;
    }
    if (this.config.bearerToken) {
      headers["Authorization"] = `Bearer ${this.config.bearerToken}`;
    }
    return { ...headers, ...extra };
  }

  /**
   * Send one request and return the response with its body decoded.
   *
   * @throws {APIError} For any status >= 400
   * @throws {NetworkError} If no response was received
   * @throws {CancelledError} If the signal aborted the request
   */
  async send(request: HttpRequest): Promise<AxiosResponse<unknown>> {
    this.debugLog("Request:", {
      method: request.method.toUpperCase(),
      url: request.path,
      params: request.params,
    });

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        baseURL: this.config.baseURL,
        url: request.path,
        timeout: this.config.timeout,
        params: request.params,
        data: request.data,
        headers: this.headers(request.headers),
        signal: request.signal,
        responseType: "arraybuffer",
        validateStatus: () => true,
      });

      this.debugLog("Response:", {
        status: response.status,
        contentType: headerValue(response, "content-type"),
      });

      if (response.status >= 400) {
        throw mapErrorResponse(response);
      }

      return { ...response, data: decodeBody(response) };
    } catch (error) {
      const sdkError = this.mapError(error);
      if (this.config.debug) {
        this.config.logger.error("[InvoiceIQ] Response Error:", sdkError);
      }
      throw sdkError;
    }
  }

  /**
   * Map transport failures to SDK errors
   */
  private mapError(error: unknown): unknown {
    if (error instanceof SDKError) {
      return error;
    }

    if (Axios.isCancel(error)) {
      return new CancelledError("Request cancelled");
    }

    if (Axios.isAxiosError(error)) {
      if (error.response) {
        return mapErrorResponse(error.response);
      }
      return new NetworkError(`Network error: ${error.message}`, error);
    }

    return error;
  }

  /**
   * Send one request and return its decoded body, untyped
   */
  async request(request: HttpRequest): Promise<unknown> {
    const response = await this.send(request);
    return response.data;
  }

  /**
   * Send one request to a JSON endpoint and parse the body into its model
   *
   * @throws {UnexpectedResponseError} If the body is binary or does not match the model
   */
  async requestModel<S extends z.ZodTypeAny>(
    schema: S,
    request: HttpRequest,
    label: string,
  ): Promise<z.output<S>> {
    const response = await this.send(request);
    return parseResponse(schema, response, label);
  }
}
