import type { AxiosInstance } from "axios";

/**
 * Sink for debug output. `console` satisfies it.
 */
export interface Logger {
  log(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

/**
 * Client configuration options.
 *
 * Credentials are optional: without either one, requests are sent
 * anonymously (public endpoints only).
 */
export interface ClientConfig {
  /** API key, sent as `X-API-KEY` */
  apiKey?: string;

  /** Access token, sent as `Authorization: Bearer <token>` */
  bearerToken?: string;

  /** Base API URL. Default: https://api.invoiceiq.fr */
  baseURL?: string;

  /** Request timeout in milliseconds. Default: 30000 (30s) */
  timeout?: number;

  /** Custom Axios instance (advanced). May be shared; the SDK installs nothing on it. */
  httpClient?: AxiosInstance;

  /** Enable debug logging */
  debug?: boolean;

  /** Where debug output goes. Default: console */
  logger?: Logger;
}

/**
 * Configuration after defaults are applied
 */
export interface ResolvedClientConfig {
  apiKey?: string;
  bearerToken?: string;
  baseURL: string;
  timeout: number;
  httpClient: AxiosInstance;
  debug: boolean;
  logger: Logger;
}
