import { z } from "zod";

/**
 * Conformance report of a validated e-invoice
 */
export const ValidationReportSchema = z.object({
  transformation: z.string().nullish(),
  finalScore: z.number().nullish(),
  /** Detected profile, e.g. `EN16931` */
  profile: z.string().nullish(),
  issues: z.array(z.unknown()).nullish(),
});

export type ValidationReport = z.output<typeof ValidationReportSchema>;
