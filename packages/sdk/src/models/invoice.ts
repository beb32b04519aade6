/**
 * Invoice data model shared by transformations and generations.
 *
 * Each schema is the single source of truth for its type: the parsed shape
 * is exported under the model's name, the accepted shape (defaults still
 * optional) under `<Name>Input`.
 *
 * @packageDocumentation
 */

import { z } from "zod";

// Optional fields follow the API: absent and null are both accepted.
const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();

export const AddressSchema = z.object({
  line1: optionalString,
  line2: optionalString,
  postCode: optionalString,
  city: optionalString,
  /** ISO 3166-1 alpha-2, e.g. `FR` */
  countryCode: optionalString,
});

export const PartySchema = z.object({
  name: z.string(),
  /** SIREN/SIRET or any national registration number */
  registrationId: optionalString,
  vatId: optionalString,
  countryCode: optionalString,
  address: AddressSchema.nullish(),
});

export const LogoOptionsSchema = z.object({
  url: optionalString,
  width: z.number().int().nullish(),
  align: z.enum(["left", "center", "right"]).nullish(),
});

export const FooterOptionsSchema = z.object({
  extraText: optionalString,
  showPageNumbers: z.boolean().nullish(),
});

/**
 * Presentation options for the rendered PDF
 */
export const RenderingOptionsSchema = z.object({
  template: optionalString,
  font: optionalString,
  primaryColor: optionalString,
  accentColor: optionalString,
  logo: LogoOptionsSchema.nullish(),
  footer: FooterOptionsSchema.nullish(),
  notes: optionalString,
  locale: optionalString,
});

export const InvoiceLineSchema = z.object({
  id: optionalString,
  name: z.string(),
  description: optionalString,
  quantity: z.number(),
  /** UN/ECE rec 20 unit code, C62 = "one" */
  unitCode: z.string().nullish().default("C62"),
  netPrice: optionalNumber,
  unitPrice: optionalNumber,
  taxRate: optionalNumber,
  taxCategoryCode: z.string().nullish().default("S"),
  taxExemptionReason: optionalString,
  totalAmount: z.number(),
});

export const TaxSummarySchema = z.object({
  taxRate: optionalNumber,
  basisAmount: optionalNumber,
  taxableAmount: optionalNumber,
  taxAmount: optionalNumber,
  taxCategoryCode: z.string().nullish().default("S"),
  taxExemptionReason: optionalString,
});

/**
 * Invoice metadata attached to a PDF transformation.
 *
 * @example
 * ```typescript
 * const metadata: TransformationMetadataInput = {
 *   invoiceNumber: 'INV-2024-42',
 *   issueDate: '2024-02-22',
 *   seller: { name: 'Seller SAS', countryCode: 'FR' },
 *   buyer: { name: 'Buyer SARL', countryCode: 'FR' },
 *   totalTaxExclusiveAmount: 100,
 *   taxTotalAmount: 20,
 *   totalTaxInclusiveAmount: 120,
 * };
 * ```
 */
export const TransformationMetadataSchema = z.object({
  invoiceNumber: z.string(),
  /** ISO date, `YYYY-MM-DD` */
  issueDate: z.string(),
  currency: z.string().nullish().default("EUR"),
  /** UNTDID 1001 document type, 380 = commercial invoice */
  typeCode: z.string().nullish().default("380"),
  seller: PartySchema,
  buyer: PartySchema,
  lines: z.array(InvoiceLineSchema).nullish(),
  taxes: z.array(TaxSummarySchema).nullish(),
  taxSummaries: z.array(TaxSummarySchema).nullish(),
  totalTaxExclusiveAmount: z.number(),
  taxTotalAmount: z.number(),
  totalTaxInclusiveAmount: z.number(),
  purchaseOrderReference: optionalString,
  rendering: RenderingOptionsSchema.nullish(),
}).passthrough();

/**
 * Generations take the same payload as transformation metadata.
 */
export const GenerationPayloadSchema = TransformationMetadataSchema;

export type Address = z.output<typeof AddressSchema>;
export type Party = z.output<typeof PartySchema>;
export type LogoOptions = z.output<typeof LogoOptionsSchema>;
export type FooterOptions = z.output<typeof FooterOptionsSchema>;
export type RenderingOptions = z.output<typeof RenderingOptionsSchema>;
export type InvoiceLine = z.output<typeof InvoiceLineSchema>;
export type InvoiceLineInput = z.input<typeof InvoiceLineSchema>;
export type TaxSummary = z.output<typeof TaxSummarySchema>;
export type TaxSummaryInput = z.input<typeof TaxSummarySchema>;
export type TransformationMetadata = z.output<typeof TransformationMetadataSchema>;
export type TransformationMetadataInput = z.input<typeof TransformationMetadataSchema>;
export type GenerationPayload = z.output<typeof GenerationPayloadSchema>;
export type GenerationPayloadInput = z.input<typeof GenerationPayloadSchema>;
