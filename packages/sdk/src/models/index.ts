export {
  AddressSchema,
  PartySchema,
  LogoOptionsSchema,
  FooterOptionsSchema,
  RenderingOptionsSchema,
  InvoiceLineSchema,
  TaxSummarySchema,
  TransformationMetadataSchema,
  GenerationPayloadSchema,
} from "./invoice.js";
export type {
  Address,
  Party,
  LogoOptions,
  FooterOptions,
  RenderingOptions,
  InvoiceLine,
  InvoiceLineInput,
  TaxSummary,
  TaxSummaryInput,
  TransformationMetadata,
  TransformationMetadataInput,
  GenerationPayload,
  GenerationPayloadInput,
} from "./invoice.js";
export { JobSchema, JobSubmissionSchema } from "./job.js";
export type { Job, JobSubmission, JobFetcher } from "./job.js";
export { ValidationReportSchema } from "./validation.js";
export type { ValidationReport } from "./validation.js";
export { parseModel, parseResponse } from "./parse.js";
