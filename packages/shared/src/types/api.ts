import type { Answer, ChatSession, Citation, ConversationTurn } from "./chat.js";
import type { IndexedDocument } from "./document.js";

export type FailureStage = "request" | "ingestion" | "embedding" | "retrieval" | "generation";

export interface ApiErrorResponse {
  error: string;
  code?: string;
  stage?: FailureStage;
  details?: unknown;
}

export interface QueryRequest {
  question: string;
  sessionId?: string;
  k?: number;
}

export interface QueryResponse {
  answer: string;
  citations: Citation[];
  grounded: boolean;
  sessionId?: string;
}

export interface CreateChatSessionRequest {
  title?: string;
}

export interface CreateChatSessionResponse {
  session: ChatSession;
}

export interface ListChatSessionsResponse {
  sessions: ChatSession[];
}

export interface ChatSessionDetailResponse {
  session: ChatSession & {
    turns: ConversationTurn[];
  };
}

export interface CreateChatMessageRequest {
  content: string;
  k?: number;
}

export interface CreateChatMessageResponse {
  sessionId: string;
  answer: Answer;
}

export interface ListDocumentsResponse {
  documents: IndexedDocument[];
}

export interface IndexStatsResponse {
  collection: string;
  documentCount: number;
  chunkCount: number;
  embeddingModel: string | null;
  dimensions: number | null;
}

export interface IndexRunRequest {
  force?: boolean;
  /** Question searched once the run commits, as a smoke test of the fresh index. */
  probe?: string;
}

export type DocumentOutcomeStatus = "indexed" | "unchanged" | "empty" | "failed" | "removed";

export interface DocumentOutcome {
  sourcePath: string;
  documentId: string | null;
  status: DocumentOutcomeStatus;
  chunkCount: number;
  embeddedChunkCount: number;
  stage?: FailureStage;
  error?: string;
}

export interface IndexRunReport {
  force: boolean;
  startedAt: string;
  durationMs: number;
  outcomes: DocumentOutcome[];
  totals: {
    documents: number;
    indexed: number;
    unchanged: number;
    empty: number;
    removed: number;
    failed: number;
    chunks: number;
    averageChunkSize: number;
  };
  sources: string[];
  probe?: ProbeResult;
}

export interface ProbeResult {
  query: string;
  hits: Array<{
    chunkId: string;
    documentName: string;
    score: number;
    excerpt: string;
  }>;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    embedding: ServiceConnectionStatus;
    generation: ServiceConnectionStatus;
  };
  index?: {
    documentCount: number;
    chunkCount: number;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
