import { accessSync, constants as fsConstants, statSync, type Stats } from "fs";
import { extname } from "path";
import { MAX_FILE_SIZE, SUPPORTED_EXTENSIONS } from "./constants.js";

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface ValidationOptions {
  /** Largest accepted document, in bytes. Default: 100MB */
  maxSize?: number;
  /** Lowercase extensions with their dot. Default: .pdf, .xml */
  allowedTypes?: readonly string[];
}

function valid(): ValidationResult {
  return { valid: true };
}

function invalid(error: string): ValidationResult {
  return { valid: false, error };
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function checkExtension(
  fileName: string,
  allowedTypes: readonly string[],
): ValidationResult {
  const ext = extname(fileName).toLowerCase();
  return allowedTypes.includes(ext)
    ? valid()
    : invalid(`File type '${ext}' not supported. Allowed: ${allowedTypes.join(", ")}`);
}

function statPath(filePath: string): Stats | ValidationResult {
  try {
    return statSync(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return invalid(`File not found: ${filePath}`);
    }
    return invalid(
      `Failed to validate file: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function isReadable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check a local document before upload: it must exist, be a non-empty
 * readable file within the size limit, and carry a supported extension.
 */
export function validateFile(
  filePath: string,
  options: ValidationOptions = {},
): ValidationResult {
  const maxSize = options.maxSize ?? MAX_FILE_SIZE;
  const allowedTypes = options.allowedTypes ?? SUPPORTED_EXTENSIONS;

  const stats = statPath(filePath);
  if ("valid" in stats) return stats;

  if (!stats.isFile()) return invalid(`Path is not a file: ${filePath}`);
  if (stats.size === 0) return invalid(`File is empty: ${filePath}`);
  if (stats.size > maxSize) {
    return invalid(
      `File size ${formatBytes(stats.size)} exceeds maximum ${formatBytes(maxSize)}`,
    );
  }

  const typeCheck = checkExtension(filePath, allowedTypes);
  if (!typeCheck.valid) return typeCheck;

  return isReadable(filePath) ? valid() : invalid(`File not readable: ${filePath}`);
}

/**
 * Same checks for in-memory content; `fileName` supplies the extension.
 */
export function validateBuffer(
  buffer: Buffer,
  fileName: string,
  options: ValidationOptions = {},
): ValidationResult {
  const maxSize = options.maxSize ?? MAX_FILE_SIZE;
  const allowedTypes = options.allowedTypes ?? SUPPORTED_EXTENSIONS;

  if (buffer.length > maxSize) {
    return invalid(
      `Buffer size ${formatBytes(buffer.length)} exceeds maximum ${formatBytes(maxSize)}`,
    );
  }
  if (buffer.length === 0) return invalid(`File is empty: ${fileName}`);

  return checkExtension(fileName, allowedTypes);
}
