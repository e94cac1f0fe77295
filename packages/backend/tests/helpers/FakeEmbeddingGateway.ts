import { EmbeddingServiceError } from "../../src/errors.js";
import type {
  CallOptions,
  EmbeddingGatewayLike,
  EmbeddingModelDescriptor
} from "../../src/services/llmTypes.js";

/**
 * Bag-of-words embeddings: every distinct lowercase word gets its own dimension the first
 * time it is seen, so cosine scores are exact word-overlap ratios.
 */
export class FakeEmbeddingGateway implements EmbeddingGatewayLike {
  readonly embeddedTexts: string[] = [];
  batchCalls = 0;
  pingCalls = 0;
  failWhen: ((text: string) => boolean) | null = null;
  pingError: Error | null = null;

  private readonly vocabulary = new Map<string, number>();

  constructor(
    private readonly model = "fake-embed",
    private readonly dimensions = 256
  ) {}

  modelInfo(): EmbeddingModelDescriptor {
    return { model: this.model, dimensions: this.dimensions };
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) {
      throw new EmbeddingServiceError("no vector");
    }
    return vector;
  }

  async embedBatch(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    this.batchCalls += 1;
    if (options.signal?.aborted) {
      const error = new Error("The operation was aborted");
      error.name = "AbortError";
      throw error;
    }
    if (this.failWhen && texts.some((text) => this.failWhen?.(text))) {
      throw new EmbeddingServiceError("Embedding service call failed: simulated outage");
    }

    this.embeddedTexts.push(...texts);
    return texts.map((text) => this.vectorFor(text));
  }

  async ping(): Promise<void> {
    this.pingCalls += 1;
    if (this.pingError) {
      throw this.pingError;
    }
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let slot = this.vocabulary.get(token);
      if (slot === undefined) {
        slot = this.vocabulary.size % this.dimensions;
        this.vocabulary.set(token, slot);
      }
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }
}
