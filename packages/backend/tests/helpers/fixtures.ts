import type { DocumentChunk, IndexRecord, IndexedDocument, VectorIndex } from "@lorebase/shared";
import { chunkId } from "../../src/pipeline/Chunker.js";
import type { FakeEmbeddingGateway } from "./FakeEmbeddingGateway.js";

export function buildChunk(documentId: string, start: number, text: string, index = 0): DocumentChunk {
  return {
    id: chunkId(documentId, start),
    documentId,
    index,
    text,
    start,
    end: start + text.length,
    previousChunkId: null,
    nextChunkId: null
  };
}

export function buildRecord(chunk: DocumentChunk, vector: number[], name = `${chunk.documentId}.txt`): IndexRecord {
  return {
    chunk,
    vector,
    document: { id: chunk.documentId, name, sourcePath: name }
  };
}

export function buildIndexedDocument(id: string, chunkCount: number, overrides: Partial<IndexedDocument> = {}): IndexedDocument {
  return {
    id,
    name: `${id}.txt`,
    sourcePath: `${id}.txt`,
    fileType: "txt",
    contentHash: `hash-${id}`,
    chunkCount,
    ingestedAt: new Date("2024-01-01T00:00:00.000Z"),
    ...overrides
  };
}

/** Stores each text as a one-chunk document `<name without extension>`. */
export async function seedIndex(
  index: VectorIndex,
  embeddings: FakeEmbeddingGateway,
  documents: Array<{ name: string; text: string }>
): Promise<void> {
  const info = embeddings.modelInfo();
  await index.assertCompatible({ model: info.model, dimensions: info.dimensions ?? 0 });
  for (const { name, text } of documents) {
    const id = name.replace(/\.[^.]+$/, "");
    const record = buildRecord(buildChunk(id, 0, text), embeddings.vectorFor(text), name);
    await index.replaceDocument(buildIndexedDocument(id, 1, { name, sourcePath: name }), [record]);
  }
}
