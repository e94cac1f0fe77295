import { extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import type { DocumentFileType } from "@lorebase/shared";

export interface DocumentFileLike {
  path: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: DocumentFileType;
  mimeType: string;
  size: number;
}

const extensionToType: Record<string, DocumentFileType> = {
  ".pdf": "pdf",
  ".md": "md",
  ".markdown": "md",
  ".txt": "txt"
};

const allowedMimeTypes: Record<DocumentFileType, string[]> = {
  pdf: ["application/pdf"],
  md: ["text/markdown", "text/x-markdown", "text/plain"],
  txt: ["text/plain"]
};

const extensionFallbackMime: Record<DocumentFileType, string> = {
  pdf: "application/pdf",
  md: "text/markdown",
  txt: "text/plain"
};

export function fileTypeForPath(path: string): DocumentFileType | null {
  return extensionToType[extname(path).toLowerCase()] ?? null;
}

/**
 * Checks a document file by extension, size and binary signature. Text formats carry no
 * signature, so for them only a detected binary format is a mismatch.
 */
export async function validateDocumentFile(
  file: DocumentFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const fileType = fileTypeForPath(file.path);
  if (!fileType) {
    throw new Error("Unsupported file extension. Only .pdf, .md, .txt are allowed.");
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new Error(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`);
  }

  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();
  const extension = extname(file.path).toLowerCase();

  if (detectedMime && !allowedMimeTypes[fileType].includes(detectedMime)) {
    throw new Error(`Binary signature mismatch for ${extension}. Detected ${detectedMime}.`);
  }

  if (fileType === "pdf" && !detectedMime) {
    throw new Error("File has a .pdf extension but no PDF signature.");
  }

  return {
    fileType,
    mimeType: detectedMime ?? extensionFallbackMime[fileType],
    size: file.size
  };
}
