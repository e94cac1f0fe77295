import OpenAI from "openai";
import { z } from "zod";
import { appConfig } from "../config.js";
import { EmbeddingServiceError, describeError, isAbortError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  CallOptions,
  EmbeddingGatewayConfig,
  EmbeddingGatewayLike,
  EmbeddingModelDescriptor,
  LLMEndpointConfig,
  OpenAICompatibleClient
} from "./llmTypes.js";

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative().optional(),
      embedding: z.array(z.number().finite()).min(1)
    })
  )
});

export function createOpenAICompatibleClient(endpoint: LLMEndpointConfig): OpenAICompatibleClient {
  // Retries belong to LLMRateLimiter; the SDK's own would multiply them.
  return new OpenAI({
    apiKey: endpoint.apiKey,
    baseURL: endpoint.baseURL,
    maxRetries: 0
  });
}

export class EmbeddingGateway implements EmbeddingGatewayLike {
  private readonly client: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly model: string;
  private readonly requestedDimensions: number | null;
  private dimensions: number | null;

  constructor(
    config: EmbeddingGatewayConfig,
    deps: {
      client?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
      endpoint?: LLMEndpointConfig;
    } = {}
  ) {
    this.model = config.model;
    this.requestedDimensions = config.dimensions ?? null;
    this.dimensions = this.requestedDimensions;
    this.client =
      deps.client ??
      createOpenAICompatibleClient(
        deps.endpoint ?? { apiKey: appConfig.LLM_API_KEY, baseURL: appConfig.LLM_BASE_URL }
      );
    this.rateLimiter =
      deps.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: config.maxConcurrent ?? 4,
        maxRetries: config.maxRetries ?? 3,
        retryDelayMs: config.retryDelayMs ?? 1000,
        requestsPerMinute: config.requestsPerMinute ?? 600,
        timeoutMs: config.timeoutMs ?? 120_000
      });
  }

  static fromEnv(): EmbeddingGateway {
    const config: EmbeddingGatewayConfig = {
      model: appConfig.EMBEDDING_MODEL,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    };
    if (appConfig.EMBEDDING_DIMENSIONS !== undefined) {
      config.dimensions = appConfig.EMBEDDING_DIMENSIONS;
    }

    return new EmbeddingGateway(config, {
      endpoint: {
        apiKey: appConfig.EMBEDDING_API_KEY || appConfig.LLM_API_KEY,
        baseURL: appConfig.EMBEDDING_BASE_URL || appConfig.LLM_BASE_URL
      }
    });
  }

  modelInfo(): EmbeddingModelDescriptor {
    return { model: this.model, dimensions: this.dimensions };
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) {
      throw new EmbeddingServiceError("Embedding service returned no vector");
    }
    return vector;
  }

  async ping(options: CallOptions = {}): Promise<void> {
    await this.embed("ping", options);
  }

  async embedBatch(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: unknown;
    try {
      response = await this.rateLimiter.run(
        (signal) =>
          this.client.embeddings.create(
            {
              model: this.model,
              input: texts,
              encoding_format: "float",
              ...(this.requestedDimensions !== null ? { dimensions: this.requestedDimensions } : {})
            },
            { signal }
          ),
        {
          ...(options.signal ? { signal: options.signal } : {}),
          onRetry: (attempt, error) => {
            logger.warn(
              { attempt, model: this.model, batchSize: texts.length, error: describeError(error) },
              "Retrying embedding request"
            );
          }
        }
      );
    } catch (error) {
      if (isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      throw new EmbeddingServiceError(`Embedding service call failed: ${describeError(error)}`, {
        cause: error
      });
    }

    return this.readVectors(response, texts.length);
  }

  private readVectors(response: unknown, expectedCount: number): number[][] {
    const parsed = embeddingResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new EmbeddingServiceError("Embedding service returned malformed output", {
        cause: parsed.error,
        retryable: false
      });
    }

    const items = parsed.data.data;
    if (items.length !== expectedCount) {
      throw new EmbeddingServiceError(
        `Embedding service returned ${items.length} vectors for ${expectedCount} inputs`,
        { retryable: false }
      );
    }

    const ordered = items.every((item) => item.index !== undefined)
      ? [...items].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : items;
    const vectors = ordered.map((item) => item.embedding);

    const expectedDimensions = this.dimensions ?? vectors[0]?.length ?? 0;
    const mismatch = vectors.find((vector) => vector.length !== expectedDimensions);
    if (mismatch) {
      throw new EmbeddingServiceError(
        `Embedding dimensionality changed: expected ${expectedDimensions}, received ${mismatch.length}`,
        { retryable: false }
      );
    }

    this.dimensions = expectedDimensions;
    return vectors;
  }
}
