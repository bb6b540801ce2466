import type { LLMRateLimitConfig } from "./llmTypes.js";

export class LLMTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`LLM request timeout after ${timeoutMs}ms`);
    this.name = "LLMTimeoutError";
  }
}

export class LLMAbortError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("LLM request aborted", options);
    this.name = "AbortError";
  }
}

interface QueuedTask {
  execute: () => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Bounds concurrency and request rate for provider calls. Each attempt gets
 * its own AbortSignal that fires on timeout or when the caller aborts; aborted
 * work is never retried.
 */
export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  run<T>(task: (signal: AbortSignal) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new LLMAbortError());
    }

    return new Promise<T>((resolve, reject) => {
      const entry: QueuedTask = {
        execute: async () => {
          signal?.removeEventListener("abort", onQueuedAbort);
          try {
            resolve(await this.executeWithRetry(task, signal));
          } catch (error) {
            reject(error);
          }
        }
      };

      // Still waiting for a slot: leave the queue right away.
      const onQueuedAbort = () => {
        const index = this.queue.indexOf(entry);
        if (index >= 0) {
          this.queue.splice(index, 1);
          reject(new LLMAbortError());
        }
      };

      signal?.addEventListener("abort", onQueuedAbort, { once: true });
      this.queue.push(entry);
      this.drainQueue();
    });
  }

  get pending(): number {
    return this.queue.length;
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
      void item.execute().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeWithRetry<T>(
    task: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.runAttempt(task, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error instanceof LLMAbortError ? error : new LLMAbortError({ cause: error });
        }
        const shouldRetry = this.isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        await this.sleep(backoff, signal);
      }
    }
  }

  private runAttempt<T>(
    task: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    const controller = new AbortController();
    const { timeoutMs } = this.config;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const settle = (complete: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
        complete();
      };

      const onAbort = () => {
        controller.abort();
        settle(() => reject(new LLMAbortError()));
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          controller.abort();
          settle(() => reject(new LLMTimeoutError(timeoutMs)));
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      task(controller.signal).then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
    });
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof LLMTimeoutError) {
      return true;
    }
    if (typeof error !== "object" || error === null) {
      return false;
    }
    if ("status" in error && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500;
    }
    if ("code" in error && typeof error.code === "string") {
      return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
    }
    if (error instanceof Error) {
      return /timeout|timed out|temporarily unavailable/i.test(error.message);
    }
    return false;
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
    if (firstInWindow === undefined) {
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

  private sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new LLMAbortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
