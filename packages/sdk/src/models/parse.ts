import type { AxiosResponse } from "axios";
import type { z } from "zod";
import { InvalidInputError, UnexpectedResponseError } from "../errors/index.js";

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a caller-supplied payload, applying the schema's defaults.
 *
 * @throws {InvalidInputError} When the payload does not match the schema
 */
export function parseModel<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidInputError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Validate a decoded response body against the model a typed endpoint
 * promises.
 *
 * @throws {UnexpectedResponseError} When the body is binary or does not match
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  response: AxiosResponse<unknown>,
  label: string,
): z.output<S> {
  if (Buffer.isBuffer(response.data)) {
    throw new UnexpectedResponseError(
      `Unexpected binary response for ${label}`,
      response,
    );
  }

  const result = schema.safeParse(response.data);
  if (!result.success) {
    throw new UnexpectedResponseError(
      `Malformed ${label}: ${formatIssues(result.error).join("; ")}`,
      response,
    );
  }
  return result.data;
}
