import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { validateBuffer, validateFile } from "../../src/utils/validation.js";

describe("File Validation", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "invoiceiq-validation-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("validateFile", () => {
    it("should validate valid PDF file", () => {
      const filePath = join(testDir, "invoice.pdf");
      writeFileSync(filePath, Buffer.from("%PDF-1.7"));

      const result = validateFile(filePath);
      expect(result.valid).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it("should validate valid XML file", () => {
      const filePath = join(testDir, "invoice.xml");
      writeFileSync(filePath, "<Invoice/>");

      expect(validateFile(filePath).valid).toBe(true);
    });

    it("should accept upper-case extensions", () => {
      const filePath = join(testDir, "INVOICE.PDF");
      writeFileSync(filePath, Buffer.from("%PDF-1.7"));

      expect(validateFile(filePath).valid).toBe(true);
    });

    it("should reject non-existent file", () => {
      const filePath = join(testDir, "nonexistent.pdf");

      const result = validateFile(filePath);
      expect(result.valid).toBe(false);
      expect(result.error).toBe(`File not found: ${filePath}`);
    });

    it("should reject an empty file", () => {
      const filePath = join(testDir, "empty.pdf");
      writeFileSync(filePath, "");

      expect(validateFile(filePath)).toEqual({
        valid: false,
        error: `File is empty: ${filePath}`,
      });
    });

    it("should reject directory", () => {
      const dirPath = join(testDir, "testdir");
      mkdirSync(dirPath);

      const result = validateFile(dirPath);
      expect(result.valid).toBe(false);
      expect(result.error).toBe(`Path is not a file: ${dirPath}`);
    });

    it("should reject unsupported file type", () => {
      const filePath = join(testDir, "invoice.png");
      writeFileSync(filePath, "png content");

      const result = validateFile(filePath);
      expect(result.valid).toBe(false);
      expect(result.error).toBe("File type '.png' not supported. Allowed: .pdf, .xml");
    });

    it("should reject files over the size limit", () => {
      const filePath = join(testDir, "large.pdf");
      writeFileSync(filePath, Buffer.alloc(2048));

      const result = validateFile(filePath, { maxSize: 1024 });
      expect(result.valid).toBe(false);
      expect(result.error).toBe("File size 2.0 KB exceeds maximum 1.0 KB");
    });

    it("should honour custom allowed types", () => {
      const filePath = join(testDir, "invoice.json");
      writeFileSync(filePath, "{}");

      expect(validateFile(filePath, { allowedTypes: [".json"] }).valid).toBe(true);
    });
  });

  describe("validateBuffer", () => {
    it("should validate a PDF buffer", () => {
      const result = validateBuffer(Buffer.from("%PDF-1.7"), "invoice.pdf");
      expect(result).toEqual({ valid: true });
    });

    it("should reject an empty buffer", () => {
      const result = validateBuffer(Buffer.alloc(0), "invoice.pdf");
      expect(result).toEqual({ valid: false, error: "File is empty: invoice.pdf" });
    });

    it("should reject a buffer over the size limit", () => {
      const result = validateBuffer(Buffer.alloc(600), "invoice.pdf", { maxSize: 512 });
      expect(result).toEqual({
        valid: false,
        error: "Buffer size 600 B exceeds maximum 512 B",
      });
    });

    it("should reject an unsupported file name", () => {
      const result = validateBuffer(Buffer.from("data"), "invoice");
      expect(result).toEqual({
        valid: false,
        error: "File type '' not supported. Allowed: .pdf, .xml",
      });
    });
  });
});
