/**
 * Advanced example: generation with cancellation and error handling
 */

import {
  APIError,
  CancelledError,
  InvoiceIQ,
  JobFailedError,
  RateLimitError,
  TimeoutError,
} from "invoiceiq-sdk";

async function main() {
  const client = new InvoiceIQ({ apiKey: process.env.INVOICEIQ_API_KEY });
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const submission = await client.generations.submit(
      {
        invoiceNumber: "F-2024-43",
        issueDate: "2024-03-01",
        seller: { name: "Seller SAS", countryCode: "FR" },
        buyer: { name: "Buyer SARL", countryCode: "FR" },
        totalTaxExclusiveAmount: 250,
        taxTotalAmount: 50,
        totalTaxInclusiveAmount: 300,
        rendering: { template: "classic", logo: { align: "right" } },
      },
      { idempotencyKey: "F-2024-43", signal: controller.signal },
    );
    console.log(`✓ Generation queued, Job ID: ${submission.id}`);

    const job = await client.waitForJob(
      (id, signal) => client.generations.get(id, { signal }),
      submission.id,
      { pollInterval: 500, backoffFactor: 2, maxWait: 60000, signal: controller.signal },
    );
    console.log("✓ Invoice ready:", job.downloadUrl);
  } catch (error) {
    if (error instanceof TimeoutError) {
      console.error(`Still running after ${error.maxWait}ms, check job ${error.jobId} later`);
    } else if (error instanceof JobFailedError) {
      console.error(`Generation ended with status ${error.jobStatus}`);
    } else if (error instanceof RateLimitError) {
      console.error(`Rate limited, retry in ${error.retryAfter ?? "?"}s`);
    } else if (error instanceof CancelledError) {
      console.error("Cancelled");
    } else if (error instanceof APIError) {
      console.error(`API error ${error.statusCode}: ${error.message}`);
    } else {
      throw error;
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exitCode = 1;
});
