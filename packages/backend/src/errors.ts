import type { FailureStage } from "@lorebase/shared";

export type RagErrorCode =
  | "INGESTION_FAILED"
  | "EMBEDDING_SERVICE_FAILED"
  | "INDEX_MODEL_MISMATCH"
  | "GENERATION_SERVICE_FAILED"
  | "EMPTY_KNOWLEDGE_BASE"
  | "SESSION_NOT_FOUND";

interface RagErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  readonly stage: FailureStage;
  readonly retryable: boolean;

  protected constructor(message: string, stage: FailureStage, options: RagErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.retryable = options.retryable ?? false;
  }
}

/** A single document could not be read or parsed. The batch carries on without it. */
export class IngestionError extends RagError {
  readonly code = "INGESTION_FAILED";

  constructor(
    readonly sourcePath: string,
    message: string,
    options: RagErrorOptions = {}
  ) {
    super(`Failed to ingest ${sourcePath}: ${message}`, "ingestion", options);
  }
}

export class EmbeddingServiceError extends RagError {
  readonly code = "EMBEDDING_SERVICE_FAILED";

  constructor(message: string, options: RagErrorOptions & { stage?: FailureStage } = {}) {
    super(message, options.stage ?? "embedding", { retryable: true, ...options });
  }
}

export class IndexModelMismatchError extends RagError {
  readonly code = "INDEX_MODEL_MISMATCH";

  constructor(
    readonly expected: { model: string; dimensions: number },
    readonly actual: { model: string; dimensions: number }
  ) {
    super(
      `Index was built with ${expected.model} (${expected.dimensions} dimensions) ` +
        `but the embedding service produced ${actual.model} (${actual.dimensions} dimensions). ` +
        "Re-index the documents with --force.",
      "retrieval"
    );
  }
}

export class GenerationServiceError extends RagError {
  readonly code = "GENERATION_SERVICE_FAILED";

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, "generation", { retryable: true, ...options });
  }
}

export class EmptyKnowledgeBaseError extends RagError {
  readonly code = "EMPTY_KNOWLEDGE_BASE";

  constructor() {
    super("The knowledge base has no indexed chunks.", "retrieval");
  }
}

export class ChatSessionNotFoundError extends RagError {
  readonly code = "SESSION_NOT_FOUND";

  constructor(sessionId: string) {
    super(`Chat session does not exist: ${sessionId}`, "request");
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/** What users see for a failure; a failed generation says no answer could be produced. */
export function userMessage(error: RagError): string {
  return error.code === "GENERATION_SERVICE_FAILED" ? `Could not generate an answer: ${error.message}` : error.message;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
