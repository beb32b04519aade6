/**
 * Validation example: check an e-invoice and print its report
 */

import { InvoiceIQ } from "invoiceiq-sdk";

async function main() {
  const client = new InvoiceIQ({ apiKey: process.env.INVOICEIQ_API_KEY });

  const file = process.argv[2] ?? "./sample.pdf";
  const submission = await client.validations.submit(file, {
    referenceId: "example-validation",
  });
  console.log(`Validation ${submission.id} submitted`);

  const report = await client.validations.getReport(submission.id);
  console.log(`Profile: ${report.profile ?? "unknown"}`);
  console.log(`Score: ${report.finalScore ?? "n/a"}`);
  for (const issue of report.issues ?? []) {
    console.log(" -", issue);
  }

  console.log("\nRecent validations:");
  console.log(await client.validations.list({ limit: 5 }));
}

main().catch((error) => {
  console.error("Error:", error);
  process.exitCode = 1;
});
