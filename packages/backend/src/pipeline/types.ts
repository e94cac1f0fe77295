import type { DocumentOutcome } from "@lorebase/shared";

export type PipelinePhase =
  | "loading"
  | "chunking"
  | "embedding"
  | "saving"
  | "completed"
  | "unchanged"
  | "removed"
  | "error";

export interface PipelineStatusEvent {
  documentId: string | null;
  sourcePath: string;
  phase: PipelinePhase;
  progress: number;
  message?: string;
}

export interface IndexingPipelineOptions {
  /** Texts per embedding request. */
  batchSize: number;
  /** Embedding requests in flight per document. */
  embeddingConcurrency: number;
  /** Documents processed at once. */
  indexConcurrency: number;
  probeTopK: number;
}

export interface IndexRunOptions {
  directory: string;
  force?: boolean;
  /** Drop indexed documents whose file is gone from the directory. Defaults to true. */
  prune?: boolean;
  probe?: string;
  signal?: AbortSignal;
}

export interface DocumentIndexOptions {
  force?: boolean;
  signal?: AbortSignal;
}

export type DocumentIndexOutcome = DocumentOutcome & { documentId: string };
