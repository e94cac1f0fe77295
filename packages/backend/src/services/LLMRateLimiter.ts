import type { LLMRateLimitConfig } from "./llmTypes.js";

type Attempt<T> = (signal: AbortSignal) => Promise<T>;

interface QueuedTask {
  start: () => Promise<void>;
  cancel: (reason: unknown) => void;
}

export interface RateLimitedCallOptions {
  signal?: AbortSignal;
  /** Called before each retry with the attempt number (1-based) and the failure. */
  onRetry?: (attempt: number, error: unknown) => void;
}

export class LLMTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`LLM request timeout after ${timeoutMs}ms`);
    this.name = "LLMTimeoutError";
  }
}

export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 4,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 600,
      timeoutMs: config.timeoutMs ?? 120_000
    };
  }

  /** Per-attempt limit, also applied by callers to reading a streamed response. */
  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Queues `task` behind the concurrency and per-minute limits. Each attempt gets its own
   * signal, aborted on timeout or when the caller's signal fires.
   */
  run<T>(task: Attempt<T>, options: RateLimitedCallOptions = {}): Promise<T> {
    const { signal } = options;

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const onAbort = (): void => {
        const index = this.queue.indexOf(queued);
        if (index >= 0) {
          this.queue.splice(index, 1);
          queued.cancel(abortReason(signal));
        }
      };

      const queued: QueuedTask = {
        start: () =>
          this.executeTask(task, options)
            .then(resolve, reject)
            .finally(() => signal?.removeEventListener("abort", onAbort)),
        cancel: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(queued);
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item.start().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: Attempt<T>, options: RateLimitedCallOptions): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.withTimeout(task, this.config.timeoutMs, options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          throw abortReason(options.signal);
        }

        const shouldRetry = isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        options.onRetry?.(attempt, error);
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        await sleep(backoff, options.signal);
      }
    }
  }

  private withTimeout<T>(task: Attempt<T>, timeoutMs: number, parent?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(parent ? abortReason(parent) : undefined);
    parent?.addEventListener("abort", forwardAbort, { once: true });

    return new Promise<T>((resolve, reject) => {
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              const error = new LLMTimeoutError(timeoutMs);
              controller.abort(error);
              reject(error);
            }, timeoutMs)
          : null;

      const cleanup = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        parent?.removeEventListener("abort", forwardAbort);
      };

      task(controller.signal)
        .then((value) => {
          cleanup();
          resolve(value);
        })
        .catch((error: unknown) => {
          cleanup();
          reject(error);
        });
    });
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof LLMTimeoutError) {
    return true;
  }
  if (typeof error !== "object" || error === null) {
    return false;
  }

  const status = "status" in error ? error.status : undefined;
  if (typeof status === "number") {
    return status === 408 || status === 429 || status >= 500;
  }
  const name = "name" in error ? error.name : undefined;
  if (name === "APIConnectionError" || name === "APIConnectionTimeoutError") {
    return true;
  }
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ECONNABORTED", "EAI_AGAIN"].includes(code);
  }
  const message = "message" in error ? error.message : undefined;
  if (typeof message === "string") {
    return /timeout|timed out|temporarily unavailable|fetch failed|econnrefused|econnreset/i.test(message);
  }
  return false;
}

function abortReason(signal: AbortSignal | undefined): unknown {
  if (signal?.reason !== undefined) {
    return signal.reason;
  }
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
