import type OpenAI from "openai";
import type { ConversationTurn } from "@lorebase/shared";

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface LLMEndpointConfig {
  apiKey: string;
  baseURL: string;
}

export interface EmbeddingGatewayConfig extends Partial<LLMRateLimitConfig> {
  model: string;
  /** Requested output size; when absent the size is learned from the first response. */
  dimensions?: number;
}

export interface GeneratorConfig extends Partial<LLMRateLimitConfig> {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * The slice of the OpenAI SDK both gateways use. Any OpenAI-compatible server (Ollama,
 * vLLM, LM Studio) can sit behind it.
 */
export interface OpenAICompatibleClient {
  chat: {
    completions: Pick<OpenAI["chat"]["completions"], "create">;
  };
  embeddings: Pick<OpenAI["embeddings"], "create">;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingModelDescriptor {
  model: string;
  dimensions: number | null;
}

export interface EmbeddingGatewayLike {
  embed(text: string, options?: CallOptions): Promise<number[]>;
  /** Order preserving and atomic: either every vector is returned or the call throws. */
  embedBatch(texts: string[], options?: CallOptions): Promise<number[][]>;
  modelInfo(): EmbeddingModelDescriptor;
  /** Cheapest call that proves the service answers. */
  ping(options?: CallOptions): Promise<void>;
}

export interface GenerationInput {
  contextText: string;
  query: string;
  history: ConversationTurn[];
}

export interface GeneratorLike {
  generate(input: GenerationInput, options?: CallOptions): Promise<string>;
  stream(input: GenerationInput, options?: CallOptions): AsyncGenerator<string>;
  rewriteQuery(query: string, history: ConversationTurn[], options?: CallOptions): Promise<string>;
  ping(options?: CallOptions): Promise<void>;
  readonly model: string;
}
