import { EventEmitter } from "node:events";
import type {
  Document,
  DocumentChunk,
  DocumentOutcome,
  IndexRecord,
  IndexRunReport,
  IndexedDocument,
  ProbeResult,
  VectorIndex
} from "@lorebase/shared";
import { appConfig } from "../config.js";
import {
  EmbeddingServiceError,
  IndexModelMismatchError,
  describeError,
  isAbortError,
  isRagError
} from "../errors.js";
import { trimSnippet } from "../services/ContextAssembler.js";
import type { EmbeddingGatewayLike } from "../services/llmTypes.js";
import { runWithConcurrency, toBatches } from "../utils/concurrency.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";
import { logger } from "../utils/logger.js";
import { Chunker } from "./Chunker.js";
import { DocumentLoader, type DocumentSource } from "./DocumentLoader.js";
import type {
  DocumentIndexOptions,
  DocumentIndexOutcome,
  IndexRunOptions,
  IndexingPipelineOptions,
  PipelinePhase,
  PipelineStatusEvent
} from "./types.js";

const defaultOptions: IndexingPipelineOptions = {
  batchSize: appConfig.EMBEDDING_BATCH_SIZE,
  embeddingConcurrency: appConfig.EMBEDDING_CONCURRENCY,
  indexConcurrency: appConfig.INDEX_CONCURRENCY,
  probeTopK: appConfig.DEFAULT_TOP_K
};

export interface IndexingPipelineDeps {
  loader?: DocumentLoader;
  chunker?: Chunker;
  /** Share one mutex with every other writer of the same index. */
  mutex?: KeyedMutex;
  eventEmitter?: EventEmitter;
}

/**
 * Builds and refreshes a vector index from a documents directory. A document whose
 * content hash is unchanged is skipped; a changed one is re-chunked and swapped in
 * atomically, reusing stored vectors for chunks whose id and text survived.
 */
export class IndexingPipeline {
  private readonly eventEmitter: EventEmitter;
  private readonly options: IndexingPipelineOptions;
  private readonly loader: DocumentLoader;
  private readonly chunker: Chunker;
  private readonly mutex: KeyedMutex;

  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingGatewayLike,
    deps: IndexingPipelineDeps = {},
    options: Partial<IndexingPipelineOptions> = {}
  ) {
    this.eventEmitter = deps.eventEmitter ?? new EventEmitter();
    this.loader = deps.loader ?? new DocumentLoader();
    this.chunker = deps.chunker ?? new Chunker();
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  onStatus(listener: (event: PipelineStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  async run(options: IndexRunOptions): Promise<IndexRunReport> {
    const startedAt = new Date();
    const force = options.force ?? false;
    const controller = new AbortController();
    const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;

    const sources = await this.loader.scan(options.directory);
    await this.prepareIndex(force);

    logger.info(
      { directory: options.directory, files: sources.length, force },
      "Indexing run started"
    );

    const outcomes: DocumentOutcome[] = [];
    try {
      await runWithConcurrency(sources, this.options.indexConcurrency, async (source) => {
        outcomes.push(await this.indexSource(source, { force, signal }));
      });
    } catch (error) {
      // Per-document failures become outcomes; anything that escapes ends the run.
      controller.abort();
      throw error;
    }

    if (options.prune ?? true) {
      outcomes.push(...(await this.pruneMissing(sources)));
    }

    outcomes.sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
    const report = await this.buildReport(force, startedAt, outcomes);
    if (options.probe && options.probe.trim().length > 0) {
      const probe = await this.runProbe(options.probe.trim(), options.signal);
      if (probe) {
        report.probe = probe;
      }
    }

    logger.info(
      {
        durationMs: report.durationMs,
        ...report.totals
      },
      "Indexing run finished"
    );
    return report;
  }

  /** Indexes one already-parsed document under its document lock. */
  async indexDocument(document: Document, options: DocumentIndexOptions = {}): Promise<DocumentIndexOutcome> {
    return this.mutex.runExclusive(document.id, () => this.indexLocked(document, options));
  }

  async removeDocument(documentId: string): Promise<boolean> {
    return this.mutex.runExclusive(documentId, () => this.index.deleteDocument(documentId));
  }

  private async prepareIndex(force: boolean): Promise<void> {
    const gateway = this.embeddings.modelInfo();
    const pinnedInfo = gateway.dimensions === null ? null : { model: gateway.model, dimensions: gateway.dimensions };

    if (force) {
      await this.index.reset(pinnedInfo);
      logger.info({ model: gateway.model }, "Index reset for a forced rebuild");
      return;
    }

    const stored = await this.index.getModelInfo();
    if (!stored) {
      if (pinnedInfo) {
        await this.index.assertCompatible(pinnedInfo);
      }
      return;
    }

    if (stored.model !== gateway.model || (gateway.dimensions !== null && gateway.dimensions !== stored.dimensions)) {
      throw new IndexModelMismatchError(stored, {
        model: gateway.model,
        dimensions: gateway.dimensions ?? stored.dimensions
      });
    }
  }

  private async indexSource(source: DocumentSource, options: DocumentIndexOptions): Promise<DocumentOutcome> {
    this.emitStatus(null, source.sourcePath, "loading", 0);

    let document: Document;
    try {
      document = await this.loader.load(source);
    } catch (error) {
      if (!isRagError(error)) {
        throw error;
      }
      logger.warn({ sourcePath: source.sourcePath, err: error }, "Skipping document that failed to load");
      this.emitStatus(null, source.sourcePath, "error", 100, error.message);
      return {
        sourcePath: source.sourcePath,
        documentId: null,
        status: "failed",
        chunkCount: 0,
        embeddedChunkCount: 0,
        stage: error.stage,
        error: error.message
      };
    }

    return this.indexDocument(document, options);
  }

  private async indexLocked(document: Document, options: DocumentIndexOptions): Promise<DocumentIndexOutcome> {
    const outcome = (
      status: DocumentOutcome["status"],
      chunkCount: number,
      embeddedChunkCount: number
    ): DocumentIndexOutcome => ({
      sourcePath: document.sourcePath,
      documentId: document.id,
      status,
      chunkCount,
      embeddedChunkCount
    });

    const existing = await this.index.getDocument(document.id);
    if (!options.force && existing && existing.contentHash === document.contentHash) {
      this.emitStatus(document.id, document.sourcePath, "unchanged", 100);
      logger.debug({ sourcePath: document.sourcePath }, "Document unchanged, skipping");
      return outcome("unchanged", existing.chunkCount, 0);
    }

    try {
      this.emitStatus(document.id, document.sourcePath, "chunking", 20);
      const chunks = await this.chunker.chunk(document);

      this.emitStatus(document.id, document.sourcePath, "embedding", 40);
      const reused = existing ? await this.reusableVectors(document.id) : new Map<string, number[]>();
      const { vectors, embeddedCount } = await this.embedChunks(chunks, reused, options.signal);

      const first = vectors.values().next();
      if (!first.done) {
        await this.index.assertCompatible({
          model: this.embeddings.modelInfo().model,
          dimensions: first.value.length
        });
      }

      this.emitStatus(document.id, document.sourcePath, "saving", 90);
      const records = chunks.map((chunk) => toRecord(document, chunk, vectors));
      await this.index.replaceDocument(toIndexedDocument(document, chunks.length), records);

      this.emitStatus(document.id, document.sourcePath, "completed", 100);
      const status = chunks.length === 0 ? "empty" : "indexed";
      logger.info(
        {
          sourcePath: document.sourcePath,
          chunks: chunks.length,
          embedded: embeddedCount,
          reused: chunks.length - embeddedCount
        },
        status === "empty" ? "Indexed empty document" : "Indexed document"
      );
      return outcome(status, chunks.length, embeddedCount);
    } catch (error) {
      if (error instanceof IndexModelMismatchError || isAbortError(error) || !isRagError(error)) {
        throw error;
      }
      logger.warn({ sourcePath: document.sourcePath, err: error }, "Document failed to index");
      this.emitStatus(document.id, document.sourcePath, "error", 100, error.message);
      return {
        ...outcome("failed", 0, 0),
        stage: error.stage,
        error: error.message
      };
    }
  }

  private async reusableVectors(documentId: string): Promise<Map<string, number[]>> {
    const stored = await this.index.getChunksByDocument(documentId);
    const reusable = new Map<string, number[]>();
    for (const item of stored) {
      reusable.set(reuseKey(item.chunk.id, item.chunk.text), item.vector);
    }
    return reusable;
  }

  private async embedChunks(
    chunks: DocumentChunk[],
    reused: Map<string, number[]>,
    signal?: AbortSignal
  ): Promise<{ vectors: Map<string, number[]>; embeddedCount: number }> {
    const vectors = new Map<string, number[]>();
    const pending: DocumentChunk[] = [];
    for (const chunk of chunks) {
      const vector = reused.get(reuseKey(chunk.id, chunk.text));
      if (vector) {
        vectors.set(chunk.id, vector);
      } else {
        pending.push(chunk);
      }
    }

    const batches = toBatches(pending, this.options.batchSize);
    await runWithConcurrency(batches, this.options.embeddingConcurrency, async (batch) => {
      const embedded = await this.embeddings.embedBatch(
        batch.map((chunk) => chunk.text),
        signal ? { signal } : {}
      );
      if (embedded.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding service returned ${embedded.length} vectors for ${batch.length} texts`
        );
      }
      batch.forEach((chunk, index) => {
        const vector = embedded[index];
        if (vector) {
          vectors.set(chunk.id, vector);
        }
      });
    });

    return { vectors, embeddedCount: pending.length };
  }

  private async pruneMissing(sources: DocumentSource[]): Promise<DocumentOutcome[]> {
    const present = new Set(sources.map((source) => source.sourcePath));
    const indexed = await this.index.listDocuments();
    const outcomes: DocumentOutcome[] = [];

    for (const document of indexed) {
      if (present.has(document.sourcePath)) {
        continue;
      }
      await this.removeDocument(document.id);
      this.emitStatus(document.id, document.sourcePath, "removed", 100);
      logger.info({ sourcePath: document.sourcePath }, "Removed document that is no longer on disk");
      outcomes.push({
        sourcePath: document.sourcePath,
        documentId: document.id,
        status: "removed",
        chunkCount: document.chunkCount,
        embeddedChunkCount: 0
      });
    }

    return outcomes;
  }

  private async buildReport(
    force: boolean,
    startedAt: Date,
    outcomes: DocumentOutcome[]
  ): Promise<IndexRunReport> {
    const stats = await this.index.stats();
    const documents = await this.index.listDocuments();
    const count = (status: DocumentOutcome["status"]): number =>
      outcomes.filter((item) => item.status === status).length;

    return {
      force,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      outcomes,
      totals: {
        documents: stats.documentCount,
        indexed: count("indexed"),
        unchanged: count("unchanged"),
        empty: count("empty"),
        removed: count("removed"),
        failed: count("failed"),
        chunks: stats.chunkCount,
        averageChunkSize: stats.chunkCount > 0 ? Math.round(stats.characterCount / stats.chunkCount) : 0
      },
      sources: documents.map((document) => document.sourcePath)
    };
  }

  private async runProbe(query: string, signal?: AbortSignal): Promise<ProbeResult | null> {
    try {
      const stats = await this.index.stats();
      if (stats.chunkCount === 0) {
        return { query, hits: [] };
      }
      const vector = await this.embeddings.embed(query, signal ? { signal } : {});
      const results = await this.index.search(vector, this.options.probeTopK);
      return {
        query,
        hits: results.map((item) => ({
          chunkId: item.chunk.id,
          documentName: item.document.name,
          score: item.score,
          excerpt: trimSnippet(item.chunk.text, 120)
        }))
      };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.warn({ query, error: describeError(error) }, "Probe search failed after indexing");
      return null;
    }
  }

  private emitStatus(
    documentId: string | null,
    sourcePath: string,
    phase: PipelinePhase,
    progress: number,
    message?: string
  ): void {
    const payload: PipelineStatusEvent = {
      documentId,
      sourcePath,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }

    this.eventEmitter.emit("status", payload);
  }
}

function reuseKey(chunkId: string, text: string): string {
  return `${chunkId}\u0000${text}`;
}

function toRecord(document: Document, chunk: DocumentChunk, vectors: Map<string, number[]>): IndexRecord {
  const vector = vectors.get(chunk.id);
  if (!vector) {
    throw new EmbeddingServiceError(`No vector was produced for chunk ${chunk.id}`, { retryable: false });
  }
  return {
    chunk,
    vector,
    document: { id: document.id, name: document.name, sourcePath: document.sourcePath }
  };
}

function toIndexedDocument(document: Document, chunkCount: number): IndexedDocument {
  return {
    id: document.id,
    name: document.name,
    sourcePath: document.sourcePath,
    fileType: document.fileType,
    contentHash: document.contentHash,
    chunkCount,
    ingestedAt: document.ingestedAt
  };
}
