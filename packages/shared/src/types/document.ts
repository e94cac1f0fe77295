export type DocumentFileType = "pdf" | "md" | "txt";

export interface Document {
  id: string;
  name: string;
  sourcePath: string;
  fileType: DocumentFileType;
  text: string;
  contentHash: string;
  ingestedAt: Date;
  metadata: {
    pageCount?: number;
    wordCount?: number;
    fileSize?: number;
  };
}

/** The part of a document that travels with every index record. */
export interface DocumentRef {
  id: string;
  name: string;
  sourcePath: string;
}

export interface IndexedDocument extends DocumentRef {
  fileType: DocumentFileType;
  contentHash: string;
  chunkCount: number;
  ingestedAt: Date;
}

export interface DocumentChunk {
  id: string;
  documentId: string;
  index: number;
  text: string;
  start: number;
  end: number;
  previousChunkId: string | null;
  nextChunkId: string | null;
}

export interface IndexRecord {
  chunk: DocumentChunk;
  vector: number[];
  document: DocumentRef;
}

export interface RetrievedChunk {
  chunk: DocumentChunk;
  document: DocumentRef;
  score: number;
}

export type RetrievalResult = RetrievedChunk[];

export interface EmbeddingModelInfo {
  model: string;
  dimensions: number;
}
