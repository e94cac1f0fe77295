import type {
  DocumentRef,
  EmbeddingModelInfo,
  IndexRecord,
  RetrievalResult,
  StoredChunk
} from "@lorebase/shared";
import { IndexModelMismatchError } from "../errors.js";

export interface SearchEntry extends StoredChunk {
  document: DocumentRef;
  /** Insertion sequence; lower wins ties. */
  seq: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Cosine ranking over `entries`; equal scores keep insertion order. */
export function rankEntries(
  entries: readonly SearchEntry[],
  vector: readonly number[],
  k: number
): RetrievalResult {
  if (k <= 0 || entries.length === 0) {
    return [];
  }

  return entries
    .map((entry) => ({ entry, score: cosineSimilarity(entry.vector, vector) }))
    .sort((a, b) => b.score - a.score || a.entry.seq - b.entry.seq)
    .slice(0, k)
    .map(({ entry, score }) => ({
      chunk: entry.chunk,
      document: entry.document,
      score
    }));
}

export function assertModelMatches(
  stored: EmbeddingModelInfo,
  requested: EmbeddingModelInfo
): void {
  if (stored.model !== requested.model || stored.dimensions !== requested.dimensions) {
    throw new IndexModelMismatchError(stored, requested);
  }
}

export function assertQueryVector(stored: EmbeddingModelInfo | null, vector: readonly number[]): void {
  if (stored && vector.length !== stored.dimensions) {
    throw new IndexModelMismatchError(stored, { model: stored.model, dimensions: vector.length });
  }
}

/** Rejects records that would break the index invariants before anything is written. */
export function validateRecords(
  stored: EmbeddingModelInfo | null,
  records: readonly IndexRecord[],
  documentId?: string
): void {
  if (records.length === 0) {
    return;
  }
  if (!stored) {
    throw new Error("Index has no embedding model pinned; call reset() or assertCompatible() first");
  }

  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.chunk.id)) {
      throw new Error(`Duplicate chunk id in batch: ${record.chunk.id}`);
    }
    seen.add(record.chunk.id);

    if (record.vector.length !== stored.dimensions) {
      throw new IndexModelMismatchError(stored, {
        model: stored.model,
        dimensions: record.vector.length
      });
    }
    if (documentId !== undefined && record.chunk.documentId !== documentId) {
      throw new Error(
        `Chunk ${record.chunk.id} belongs to ${record.chunk.documentId}, not ${documentId}`
      );
    }
  }
}
