import { readFileSync } from "fs";
import { basename, extname } from "path";
import type { Readable } from "stream";
import { FileError } from "../errors/index.js";
import type { FileInput, FileOptions } from "../types/requests.js";
import { validateBuffer, validateFile } from "../utils/validation.js";

const DEFAULT_FILE_NAME = "document.pdf";

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".xml": "application/xml",
};

/**
 * A file ready to be appended to a multipart form
 */
export interface FilePart {
  fileName: string;
  contentType: string;
  content: Buffer;
}

/**
 * Get content type from file name
 */
export function getContentType(fileName: string): string {
  return CONTENT_TYPES[extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

async function drain(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Load a caller file input into memory and check it against the upload
 * limits.
 *
 * @throws {FileError} If the file is missing, unreadable, too large or of an unsupported type
 */
export async function readFileInput(
  input: FileInput,
  options: FileOptions = {},
): Promise<FilePart> {
  if (typeof input === "string") {
    const validation = validateFile(input);
    if (!validation.valid) {
      throw new FileError(validation.error ?? "Invalid file", input);
    }

    let content: Buffer;
    try {
      content = readFileSync(input);
    } catch (error) {
      throw new FileError(
        `Failed to read file: ${input}`,
        input,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }

    const fileName = options.fileName ?? basename(input);
    return { fileName, contentType: getContentType(fileName), content };
  }

  const content = Buffer.isBuffer(input) ? input : await drain(input);
  const fileName = options.fileName ?? DEFAULT_FILE_NAME;

  const validation = validateBuffer(content, fileName);
  if (!validation.valid) {
    throw new FileError(validation.error ?? "Invalid file", fileName, content.length);
  }

  return { fileName, contentType: getContentType(fileName), content };
}

/**
 * Append a file part to a multipart form
 */
export function appendFile(form: FormData, field: string, part: FilePart): void {
  form.append(field, new Blob([part.content], { type: part.contentType }), part.fileName);
}
