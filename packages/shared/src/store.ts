import type {
  DocumentChunk,
  EmbeddingModelInfo,
  IndexRecord,
  IndexedDocument,
  RetrievalResult
} from "./types/document.js";

export interface IndexStats {
  documentCount: number;
  chunkCount: number;
  /** Sum of chunk text lengths. */
  characterCount: number;
}

export interface StoredChunk {
  chunk: DocumentChunk;
  vector: number[];
}

export interface VectorIndex {
  /** Inserts or replaces records by chunk id in a single transaction. */
  upsert(records: IndexRecord[]): Promise<void>;
  /**
   * Replaces every chunk of `document` with `records` and stores the document row,
   * atomically. Readers see either the old or the new document, never a mix.
   */
  replaceDocument(document: IndexedDocument, records: IndexRecord[]): Promise<void>;
  deleteDocument(documentId: string): Promise<boolean>;
  search(vector: number[], k: number): Promise<RetrievalResult>;
  stats(): Promise<IndexStats>;

  listDocuments(): Promise<IndexedDocument[]>;
  getDocument(documentId: string): Promise<IndexedDocument | null>;
  getChunksByDocument(documentId: string): Promise<StoredChunk[]>;

  getModelInfo(): Promise<EmbeddingModelInfo | null>;
  assertCompatible(info: EmbeddingModelInfo): Promise<void>;
  /** Drops every record and pins the index to `info`. */
  reset(info: EmbeddingModelInfo | null): Promise<void>;
  close(): Promise<void>;
}
