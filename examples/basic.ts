/**
 * Basic example: turn a PDF invoice into Factur-X and wait for the result
 */

import { InvoiceIQ, type TransformationMetadataInput } from "invoiceiq-sdk";

const metadata: TransformationMetadataInput = {
  invoiceNumber: "INV-2024-42",
  issueDate: "2024-02-22",
  seller: { name: "Seller SAS", countryCode: "FR", vatId: "FR00123456789" },
  buyer: { name: "Buyer SARL", countryCode: "FR" },
  lines: [{ name: "Consulting", quantity: 1, unitPrice: 100, taxRate: 20, totalAmount: 100 }],
  totalTaxExclusiveAmount: 100,
  taxTotalAmount: 20,
  totalTaxInclusiveAmount: 120,
};

async function main() {
  const client = new InvoiceIQ({
    apiKey: process.env.INVOICEIQ_API_KEY,
    debug: true,
  });

  try {
    console.log("Submitting transformation...\n");
    const submission = await client.transformations.submit("./sample.pdf", metadata, {
      idempotencyKey: metadata.invoiceNumber,
    });

    const job = await client.transformations.waitUntilDone(submission.id, {
      pollInterval: 2000,
      maxWait: 120000,
      onProgress: (current) => console.log(`Status: ${current.status}`),
    });

    console.log("\n✓ Transformation complete!");
    console.log("Download:", job.downloadUrl);
  } catch (error) {
    console.error("Error:", error);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exitCode = 1;
});
