/**
 * Type definitions for the InvoiceIQ SDK
 */

export type { ClientConfig, Logger, ResolvedClientConfig } from "./config.js";
export type {
  FileInput,
  FileOptions,
  SubmitOptions,
  RequestOptions,
  ValidationSubmitOptions,
  TransformationSubmitOptions,
  ListValidationsQuery,
} from "./requests.js";
