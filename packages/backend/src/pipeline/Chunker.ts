import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import type { Document, DocumentChunk } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";

export type ChunkStrategy = "fixed" | "recursive";

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  strategy: ChunkStrategy;
}

const defaultOptions: ChunkerOptions = {
  chunkSize: appConfig.CHUNK_SIZE,
  chunkOverlap: appConfig.CHUNK_OVERLAP,
  strategy: appConfig.CHUNK_STRATEGY
};

interface Span {
  start: number;
  end: number;
}

export function chunkId(documentId: string, start: number): string {
  return `${documentId}:${start}`;
}

/**
 * Splits document text into overlapping character windows. Output depends only on the
 * text and the options, so re-chunking unchanged text yields the same ids.
 */
export class Chunker {
  private readonly options: ChunkerOptions;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };

    const { chunkSize, chunkOverlap } = this.options;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new RangeError(
        `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap} for size ${chunkSize}`
      );
    }
  }

  get chunkSize(): number {
    return this.options.chunkSize;
  }

  get chunkOverlap(): number {
    return this.options.chunkOverlap;
  }

  get strategy(): ChunkStrategy {
    return this.options.strategy;
  }

  async chunk(document: Pick<Document, "id" | "text">): Promise<DocumentChunk[]> {
    const { text } = document;
    if (text.trim().length === 0) {
      logger.debug({ documentId: document.id }, "Document has no text, nothing to chunk");
      return [];
    }

    const spans =
      this.options.strategy === "recursive"
        ? await this.recursiveSpans(text)
        : fixedWindowSpans(text.length, this.options.chunkSize, this.options.chunkOverlap);

    return linkChunks(document.id, text, spans);
  }

  private async recursiveSpans(text: string): Promise<Span[]> {
    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap
    });
    return locatePieces(text, await splitter.splitText(text));
  }
}

/**
 * Maps splitter output back to source offsets, in order. A piece that is not found
 * verbatim is skipped: every span must slice exactly the text the splitter produced.
 */
export function locatePieces(text: string, pieces: readonly string[]): Span[] {
  const spans: Span[] = [];
  let searchFrom = 0;
  for (const piece of pieces) {
    if (piece.length === 0) {
      continue;
    }
    const start = text.indexOf(piece, searchFrom);
    if (start < 0) {
      logger.warn({ pieceLength: piece.length, searchFrom }, "Splitter piece not found in source text, skipping it");
      continue;
    }
    spans.push({ start, end: start + piece.length });
    searchFrom = start + 1;
  }
  return spans;
}

export function fixedWindowSpans(length: number, chunkSize: number, chunkOverlap: number): Span[] {
  const stride = chunkSize - chunkOverlap;
  const spans: Span[] = [];
  for (let start = 0; start < length; start += stride) {
    const end = Math.min(start + chunkSize, length);
    spans.push({ start, end });
    if (end >= length) {
      break;
    }
  }
  return spans;
}

function linkChunks(documentId: string, text: string, spans: Span[]): DocumentChunk[] {
  return spans.map((span, index) => {
    const previous = spans[index - 1];
    const next = spans[index + 1];
    return {
      id: chunkId(documentId, span.start),
      documentId,
      index,
      text: text.slice(span.start, span.end),
      start: span.start,
      end: span.end,
      previousChunkId: previous ? chunkId(documentId, previous.start) : null,
      nextChunkId: next ? chunkId(documentId, next.start) : null
    };
  });
}
