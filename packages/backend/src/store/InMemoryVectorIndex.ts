import type {
  EmbeddingModelInfo,
  IndexRecord,
  IndexStats,
  IndexedDocument,
  RetrievalResult,
  StoredChunk,
  VectorIndex
} from "@lorebase/shared";
import {
  assertModelMatches,
  assertQueryVector,
  rankEntries,
  validateRecords,
  type SearchEntry
} from "./indexSupport.js";

/** Process-local index with the same semantics as the SQLite one. */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly documents = new Map<string, IndexedDocument>();
  private readonly entries = new Map<string, SearchEntry>();
  private modelInfo: EmbeddingModelInfo | null;
  private nextSeq = 1;

  constructor(modelInfo: EmbeddingModelInfo | null = null) {
    this.modelInfo = modelInfo ? { ...modelInfo } : null;
  }

  async upsert(records: IndexRecord[]): Promise<void> {
    validateRecords(this.modelInfo, records);
    for (const record of records) {
      const existing = this.entries.get(record.chunk.id);
      this.entries.set(record.chunk.id, this.toEntry(record, existing?.seq));
    }
  }

  async replaceDocument(document: IndexedDocument, records: IndexRecord[]): Promise<void> {
    validateRecords(this.modelInfo, records, document.id);
    this.removeChunks(document.id);
    for (const record of records) {
      this.entries.set(record.chunk.id, this.toEntry(record));
    }
    this.documents.set(document.id, { ...document, chunkCount: records.length });
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    const removedChunks = this.removeChunks(documentId);
    const removedDocument = this.documents.delete(documentId);
    return removedChunks > 0 || removedDocument;
  }

  async search(vector: number[], k: number): Promise<RetrievalResult> {
    if (this.entries.size === 0) {
      return [];
    }
    assertQueryVector(this.modelInfo, vector);
    return rankEntries([...this.entries.values()], vector, k);
  }

  async stats(): Promise<IndexStats> {
    const entries = [...this.entries.values()];
    const documentIds = new Set(entries.map((entry) => entry.chunk.documentId));
    return {
      documentCount: documentIds.size,
      chunkCount: entries.length,
      characterCount: entries.reduce((sum, entry) => sum + entry.chunk.text.length, 0)
    };
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    return [...this.documents.values()].sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
  }

  async getDocument(documentId: string): Promise<IndexedDocument | null> {
    return this.documents.get(documentId) ?? null;
  }

  async getChunksByDocument(documentId: string): Promise<StoredChunk[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.chunk.documentId === documentId)
      .sort((a, b) => a.chunk.index - b.chunk.index)
      .map((entry) => ({ chunk: entry.chunk, vector: [...entry.vector] }));
  }

  async getModelInfo(): Promise<EmbeddingModelInfo | null> {
    return this.modelInfo ? { ...this.modelInfo } : null;
  }

  async assertCompatible(info: EmbeddingModelInfo): Promise<void> {
    if (!this.modelInfo) {
      this.modelInfo = { ...info };
      return;
    }
    assertModelMatches(this.modelInfo, info);
  }

  async reset(info: EmbeddingModelInfo | null): Promise<void> {
    this.entries.clear();
    this.documents.clear();
    this.modelInfo = info ? { ...info } : null;
  }

  async close(): Promise<void> {}

  private toEntry(record: IndexRecord, seq?: number): SearchEntry {
    const entry: SearchEntry = {
      chunk: { ...record.chunk },
      vector: [...record.vector],
      document: { ...record.document },
      seq: seq ?? this.nextSeq
    };
    if (seq === undefined) {
      this.nextSeq += 1;
    }
    return entry;
  }

  private removeChunks(documentId: string): number {
    let removed = 0;
    for (const [chunkId, entry] of this.entries) {
      if (entry.chunk.documentId === documentId) {
        this.entries.delete(chunkId);
        removed += 1;
      }
    }
    return removed;
  }
}
