import type { RetrievalResult, VectorIndex } from "@lorebase/shared";
import { appConfig } from "../config.js";
import {
  EmbeddingServiceError,
  EmptyKnowledgeBaseError,
  IndexModelMismatchError,
  describeError,
  isAbortError
} from "../errors.js";
import { logger } from "../utils/logger.js";
import type { Conversation } from "./Conversation.js";
import type { CallOptions, EmbeddingGatewayLike, GeneratorLike } from "./llmTypes.js";

export type QueryRewritePolicy = "none" | "concatenate" | "generate";

export interface RetrieverOptions {
  rewritePolicy: QueryRewritePolicy;
  /** User turns folded into the query, most recent last. */
  rewriteHistoryTurns: number;
  /** Results scoring below this are dropped; 0 or less keeps everything. */
  similarityThreshold: number;
  defaultTopK: number;
}

const defaultOptions: RetrieverOptions = {
  rewritePolicy: appConfig.QUERY_REWRITE_POLICY,
  rewriteHistoryTurns: appConfig.REWRITE_HISTORY_TURNS,
  similarityThreshold: appConfig.SIMILARITY_THRESHOLD,
  defaultTopK: appConfig.DEFAULT_TOP_K
};

export class Retriever {
  private readonly options: RetrieverOptions;
  private readonly generator: GeneratorLike | null;

  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingGatewayLike,
    deps: { generator?: GeneratorLike } = {},
    options: Partial<RetrieverOptions> = {}
  ) {
    this.generator = deps.generator ?? null;
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  get defaultTopK(): number {
    return this.options.defaultTopK;
  }

  /** Top-k chunks for a query; an empty index yields an empty result. */
  async retrieve(
    query: string,
    k: number = this.options.defaultTopK,
    conversation: Conversation | null = null,
    options: CallOptions = {}
  ): Promise<RetrievalResult> {
    try {
      return await this.search(query, k, conversation, options);
    } catch (error) {
      if (error instanceof EmptyKnowledgeBaseError) {
        logger.debug("Knowledge base is empty, nothing to retrieve");
        return [];
      }
      throw error;
    }
  }

  /** Like `retrieve`, but an empty index is an `EmptyKnowledgeBaseError`. */
  async search(
    query: string,
    k: number = this.options.defaultTopK,
    conversation: Conversation | null = null,
    options: CallOptions = {}
  ): Promise<RetrievalResult> {
    const stats = await this.index.stats();
    if (stats.chunkCount === 0) {
      throw new EmptyKnowledgeBaseError();
    }
    if (k <= 0) {
      return [];
    }
    await this.assertSameModel();

    const searchText = await this.rewrite(query, conversation, options);
    let vector: number[];
    try {
      vector = await this.embeddings.embed(searchText, options);
    } catch (error) {
      if (error instanceof EmbeddingServiceError) {
        throw new EmbeddingServiceError(error.message, {
          stage: "retrieval",
          retryable: error.retryable,
          cause: error
        });
      }
      throw error;
    }

    const results = await this.index.search(vector, k);
    const threshold = this.options.similarityThreshold;
    const kept = threshold > 0 ? results.filter((item) => item.score >= threshold) : results;

    logger.debug(
      { k, returned: kept.length, filtered: results.length - kept.length },
      "Retrieved chunks"
    );
    return kept;
  }

  /** Same-sized vectors from another model still rank as nonsense, so the name must match too. */
  private async assertSameModel(): Promise<void> {
    const stored = await this.index.getModelInfo();
    const current = this.embeddings.modelInfo();
    if (stored && stored.model !== current.model) {
      throw new IndexModelMismatchError(stored, {
        model: current.model,
        dimensions: current.dimensions ?? stored.dimensions
      });
    }
  }

  /** The text that is actually embedded for `query`, per the rewrite policy. */
  async rewrite(query: string, conversation: Conversation | null, options: CallOptions = {}): Promise<string> {
    if (!conversation || conversation.size === 0 || this.options.rewritePolicy === "none") {
      return query;
    }

    if (this.options.rewritePolicy === "generate" && this.generator) {
      try {
        const rewritten = await this.generator.rewriteQuery(
          query,
          conversation.history(this.options.rewriteHistoryTurns * 2),
          options
        );
        if (rewritten.trim().length > 0) {
          return rewritten.trim();
        }
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        logger.warn({ error: describeError(error) }, "Query rewrite failed, concatenating history instead");
      }
    }

    return this.concatenate(query, conversation);
  }

  private concatenate(query: string, conversation: Conversation): string {
    if (this.options.rewriteHistoryTurns <= 0) {
      return query;
    }
    const previousQuestions = conversation
      .history()
      .filter((turn) => turn.role === "user")
      .slice(-this.options.rewriteHistoryTurns)
      .map((turn) => turn.text);
    return [...previousQuestions, query].join("\n");
  }
}
