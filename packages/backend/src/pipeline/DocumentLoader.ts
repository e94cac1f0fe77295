import { createHash } from "node:crypto";
import { readFile, readdir, stat } from "node:fs/promises";
import { basename, join, relative, resolve, sep } from "node:path";
import type { Document, DocumentFileType } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { IngestionError, describeError } from "../errors.js";
import {
  MarkdownParser,
  PDFParser,
  TextParser,
  fileTypeForPath,
  validateDocumentFile,
  type DocumentParser
} from "../parsers/index.js";
import { logger } from "../utils/logger.js";

export interface DocumentSource {
  absolutePath: string;
  /** Path relative to the documents directory, always with forward slashes. */
  sourcePath: string;
  name: string;
}

export interface DocumentLoaderOptions {
  maxFileSizeBytes: number;
}

export class DocumentDirectoryNotFoundError extends Error {
  constructor(readonly directory: string) {
    super(`Documents directory not found: ${directory}`);
    this.name = "DocumentDirectoryNotFoundError";
  }
}

export function documentIdFor(sourcePath: string): string {
  return createHash("sha256").update(sourcePath).digest("hex").slice(0, 16);
}

export function hashText(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/** Finds supported files under a directory and turns each into a parsed Document. */
export class DocumentLoader {
  private readonly options: DocumentLoaderOptions;
  private readonly parsers: Record<DocumentFileType, DocumentParser>;

  constructor(options: Partial<DocumentLoaderOptions> = {}) {
    this.options = {
      maxFileSizeBytes: options.maxFileSizeBytes ?? appConfig.MAX_FILE_SIZE
    };
    this.parsers = {
      pdf: new PDFParser(),
      md: new MarkdownParser(),
      txt: new TextParser()
    };
  }

  async scan(directory: string): Promise<DocumentSource[]> {
    const root = resolve(directory);
    const rootStat = await stat(root).catch(() => null);
    if (!rootStat?.isDirectory()) {
      throw new DocumentDirectoryNotFoundError(root);
    }

    const sources: DocumentSource[] = [];
    await this.walk(root, root, sources);
    return sources.sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
  }

  async load(source: DocumentSource): Promise<Document> {
    let buffer: Buffer;
    try {
      buffer = await readFile(source.absolutePath);
    } catch (error) {
      throw new IngestionError(source.sourcePath, `unreadable file: ${describeError(error)}`, {
        cause: error
      });
    }

    try {
      const validated = await validateDocumentFile(
        { path: source.absolutePath, size: buffer.length, buffer },
        { maxSizeBytes: this.options.maxFileSizeBytes }
      );
      const parsed = await this.parsers[validated.fileType].parse(buffer);

      const metadata: Document["metadata"] = {
        wordCount: parsed.metadata.wordCount,
        fileSize: buffer.length
      };
      if (parsed.metadata.pageCount !== undefined) {
        metadata.pageCount = parsed.metadata.pageCount;
      }

      return {
        id: documentIdFor(source.sourcePath),
        name: source.name,
        sourcePath: source.sourcePath,
        fileType: validated.fileType,
        text: parsed.text,
        contentHash: hashText(parsed.text),
        ingestedAt: new Date(),
        metadata
      };
    } catch (error) {
      throw new IngestionError(source.sourcePath, describeError(error), { cause: error });
    }
  }

  private async walk(root: string, directory: string, sources: DocumentSource[]): Promise<void> {
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }

      const absolutePath = join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(root, absolutePath, sources);
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }

      if (!fileTypeForPath(entry.name)) {
        logger.debug({ file: absolutePath }, "Skipping unsupported file");
        continue;
      }

      sources.push({
        absolutePath,
        sourcePath: relative(root, absolutePath).split(sep).join("/"),
        name: basename(entry.name)
      });
    }
  }
}
