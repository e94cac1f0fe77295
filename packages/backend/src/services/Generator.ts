import type OpenAI from "openai";
import type { ConversationTurn } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { GenerationServiceError, describeError, isAbortError } from "../errors.js";
import { QUERY_REWRITE_SYSTEM_PROMPT, buildAnswerSystemPrompt, buildRewritePrompt } from "../prompts/index.js";
import { logger } from "../utils/logger.js";
import { createOpenAICompatibleClient } from "./EmbeddingGateway.js";
import { LLMRateLimiter, LLMTimeoutError, type RateLimitedCallOptions } from "./LLMRateLimiter.js";
import type {
  CallOptions,
  GenerationInput,
  GeneratorConfig,
  GeneratorLike,
  LLMEndpointConfig,
  OpenAICompatibleClient
} from "./llmTypes.js";

type NormalizedGeneratorConfig = GeneratorConfig & {
  temperature: number;
  maxTokens: number;
};

export class Generator implements GeneratorLike {
  private readonly client: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly config: NormalizedGeneratorConfig;

  constructor(
    config: GeneratorConfig,
    deps: {
      client?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
      endpoint?: LLMEndpointConfig;
    } = {}
  ) {
    this.config = {
      ...config,
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 1024
    };
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

  static fromEnv(): Generator {
    return new Generator({
      model: appConfig.GENERATION_MODEL,
      temperature: appConfig.GENERATION_TEMPERATURE,
      maxTokens: appConfig.GENERATION_MAX_TOKENS,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    });
  }

  get model(): string {
    return this.config.model;
  }

  async generate(input: GenerationInput, options: CallOptions = {}): Promise<string> {
    const messages = buildAnswerMessages(input);

    let content: string;
    try {
      const response = await this.rateLimiter.run(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.config.model,
              temperature: this.config.temperature,
              max_tokens: this.config.maxTokens,
              messages
            },
            { signal }
          ),
        this.limiterOptions("answer", options)
      );
      content = response.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw this.wrapError(error, options);
    }

    const answer = content.trim();
    if (answer.length === 0) {
      throw new GenerationServiceError("Generation service returned an empty answer", {
        retryable: false
      });
    }
    return answer;
  }

  async *stream(input: GenerationInput, options: CallOptions = {}): AsyncGenerator<string> {
    const messages = buildAnswerMessages(input);
    // The limiter's timeout ends once the stream opens; this one covers reading it.
    const deadline = new AbortController();
    const readSignal = linkSignals(deadline.signal, options.signal);
    let timer: ReturnType<typeof setTimeout> | null = null;
    let produced = false;

    try {
      const stream = await this.rateLimiter.run(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.config.model,
              temperature: this.config.temperature,
              max_tokens: this.config.maxTokens,
              stream: true,
              messages
            },
            { signal: AbortSignal.any([signal, readSignal]) }
          ),
        this.limiterOptions("answer-stream", options)
      );

      const timeoutMs = this.rateLimiter.timeoutMs;
      if (timeoutMs > 0) {
        timer = setTimeout(() => deadline.abort(new LLMTimeoutError(timeoutMs)), timeoutMs);
      }

      const iterator = stream[Symbol.asyncIterator]();
      while (true) {
        const next = await nextUnlessAborted(iterator, readSignal);
        if (next.done) {
          break;
        }
        const delta = next.value.choices[0]?.delta?.content;
        if (delta) {
          produced = produced || delta.trim().length > 0;
          yield delta;
        }
      }
    } catch (error) {
      if (deadline.signal.aborted) {
        throw new GenerationServiceError(
          `Generation service call failed: ${describeError(deadline.signal.reason)}`,
          { cause: error }
        );
      }
      throw this.wrapError(error, options);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      // Closes the connection when the consumer stops early.
      deadline.abort();
    }

    if (!produced) {
      throw new GenerationServiceError("Generation service returned an empty answer", {
        retryable: false
      });
    }
  }

  async rewriteQuery(
    query: string,
    history: ConversationTurn[],
    options: CallOptions = {}
  ): Promise<string> {
    if (history.length === 0) {
      return query;
    }

    try {
      const response = await this.rateLimiter.run(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.config.model,
              temperature: 0,
              max_tokens: 200,
              messages: [
                { role: "system", content: QUERY_REWRITE_SYSTEM_PROMPT },
                { role: "user", content: buildRewritePrompt(query, history) }
              ]
            },
            { signal }
          ),
        this.limiterOptions("rewrite", options)
      );
      const rewritten = (response.choices[0]?.message?.content ?? "").trim();
      return rewritten.length > 0 ? rewritten : query;
    } catch (error) {
      throw this.wrapError(error, options);
    }
  }

  async ping(options: CallOptions = {}): Promise<void> {
    try {
      await this.rateLimiter.run(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.config.model,
              max_tokens: 1,
              messages: [{ role: "user", content: "ping" }]
            },
            { signal }
          ),
        this.limiterOptions("ping", options)
      );
    } catch (error) {
      throw this.wrapError(error, options);
    }
  }

  private limiterOptions(purpose: string, options: CallOptions): RateLimitedCallOptions {
    return {
      ...(options.signal ? { signal: options.signal } : {}),
      onRetry: (attempt, error) => {
        logger.warn(
          { attempt, purpose, model: this.config.model, error: describeError(error) },
          "Retrying generation request"
        );
      }
    };
  }

  private wrapError(error: unknown, options: CallOptions): unknown {
    if (error instanceof GenerationServiceError) {
      return error;
    }
    if (isAbortError(error) || options.signal?.aborted) {
      return error;
    }
    return new GenerationServiceError(`Generation service call failed: ${describeError(error)}`, {
      cause: error
    });
  }
}

export function buildAnswerMessages(input: GenerationInput): OpenAI.ChatCompletionMessageParam[] {
  return [
    { role: "system", content: buildAnswerSystemPrompt(input.contextText) },
    ...input.history.map(
      (turn): OpenAI.ChatCompletionMessageParam =>
        turn.role === "user"
          ? { role: "user", content: turn.text }
          : { role: "assistant", content: turn.text }
    ),
    { role: "user", content: input.query }
  ];
}

function linkSignals(own: AbortSignal, outer: AbortSignal | undefined): AbortSignal {
  return outer ? AbortSignal.any([own, outer]) : own;
}

/** `iterator.next()`, rejected with the signal's reason if it fires first. */
function nextUnlessAborted<T>(iterator: AsyncIterator<T>, signal: AbortSignal): Promise<IteratorResult<T>> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void iterator
      .next()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}
