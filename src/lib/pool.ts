/**
 * AI Pool - shared concurrency management for model calls made by the
 * face detector and the distance estimator.
 *
 * - Semaphore-style max concurrency with a FIFO queue
 * - Global backoff on rate limiting (429)
 * - Retries with exponential backoff on transient errors
 */

import { generateObject, type CoreMessage } from 'ai';
import { google } from '@ai-sdk/google';
import { z } from 'zod';
import { statusOf } from './errors';

// ============================================
// Types
// ============================================

export type PoolConfig = {
  /** Max concurrent model calls */
  maxConcurrency: number;
  /** Model name, e.g. 'gemini-2.5-flash' */
  model: string;
  /** Base delay for retries in ms (default: 2000) */
  baseDelayMs?: number;
  /** Max attempts per call (default: 6) */
  maxRetries?: number;
  debug?: boolean;
};

export type GenerateOptions<T> = {
  schema: z.ZodType<T>;
  messages: CoreMessage[];
  temperature?: number;
};

export type ObjectRequest<T> = {
  model: string;
  schema: z.ZodType<T>;
  messages: CoreMessage[];
  temperature: number;
};

export type ObjectResponse<T> = {
  object: T;
  usage?: { promptTokens: number; completionTokens: number };
};

/** Performs one structured-output call. */
export type ObjectExecutor = <T>(request: ObjectRequest<T>) => Promise<ObjectResponse<T>>;

type QueuedTask = {
  execute: () => Promise<void>;
};

export const geminiExecutor: ObjectExecutor = async (request) => {
  const result = await generateObject({
    model: google(request.model),
    schema: request.schema,
    messages: request.messages,
    temperature: request.temperature,
  });
  return {
    object: result.object,
    usage: {
      promptTokens: result.usage.promptTokens,
      completionTokens: result.usage.completionTokens,
    },
  };
};

// ============================================
// Pool Implementation
// ============================================

export class AIPool {
  private config: Required<PoolConfig>;
  private executor: ObjectExecutor;
  private inFlight = 0;
  private queue: QueuedTask[] = [];
  private globalBackoffUntil = 0;
  private consecutiveRateLimits = 0;
  private stats = {
    totalCalls: 0,
    totalPromptTokens: 0,
    totalCompletionTokens: 0,
  };

  constructor(config: PoolConfig, executor: ObjectExecutor = geminiExecutor) {
    this.config = {
      maxConcurrency: Math.max(1, config.maxConcurrency),
      model: config.model,
      baseDelayMs: config.baseDelayMs ?? 2000,
      maxRetries: config.maxRetries ?? 6,
      debug: config.debug ?? false,
    };
    this.executor = executor;
  }

  /**
   * Run a structured-output call through the pool
   */
  async generateObject<T>(options: GenerateOptions<T>): Promise<T> {
    return this.enqueue(() => this.executeWithRetry(options));
  }

  getStats() {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxConcurrency: this.config.maxConcurrency,
      backoffActive: Date.now() < this.globalBackoffUntil,
    };
  }

  getUsageStats() {
    return { ...this.stats };
  }

  // ============================================
  // Private Methods
  // ============================================

  private async enqueue<T>(execute: () => Promise<T>): Promise<T> {
    await this.waitForBackoff();

    if (this.inFlight < this.config.maxConcurrency) {
      return this.runTask(execute);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute: () => this.runTask(execute).then(resolve, reject),
      });
      this.log(`Queued task (queue size: ${this.queue.length})`);
    });
  }

  private async runTask<T>(execute: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.log(`Starting task (in-flight: ${this.inFlight})`);

    try {
      const result = await execute();
      this.consecutiveRateLimits = 0;
      return result;
    } finally {
      this.inFlight--;
      this.log(`Completed task (in-flight: ${this.inFlight})`);
      this.processQueue();
    }
  }

  private processQueue() {
    if (this.inFlight >= this.config.maxConcurrency) return;
    const task = this.queue.shift();
    if (!task) return;
    const waitMs = this.globalBackoffUntil - Date.now();
    if (waitMs > 0) {
      // resume once the backoff window closes
      setTimeout(() => void task.execute(), waitMs);
      return;
    }
    void task.execute();
  }

  private async waitForBackoff() {
    const now = Date.now();
    if (now < this.globalBackoffUntil) {
      const waitMs = this.globalBackoffUntil - now;
      this.log(`Waiting for global backoff: ${waitMs}ms`);
      await sleep(waitMs);
    }
  }

  private applyRateLimitBackoff() {
    this.consecutiveRateLimits++;
    // 2x per consecutive rate limit, capped at 60s
    const backoffMs = Math.min(this.config.baseDelayMs * Math.pow(2, this.consecutiveRateLimits), 60000);
    this.globalBackoffUntil = Date.now() + backoffMs;
    this.log(`Rate limited! Global backoff for ${backoffMs}ms (consecutive: ${this.consecutiveRateLimits})`);
  }

  private async executeWithRetry<T>(options: GenerateOptions<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.config.maxRetries; attempt++) {
      try {
        const result = await this.executor({
          model: this.config.model,
          schema: options.schema,
          messages: options.messages,
          temperature: options.temperature ?? 0.2,
        });

        this.stats.totalCalls++;
        if (result.usage) {
          this.stats.totalPromptTokens += result.usage.promptTokens;
          this.stats.totalCompletionTokens += result.usage.completionTokens;
        }
        return result.object;
      } catch (error) {
        lastError = error;

        if (isRateLimitError(error)) {
          this.applyRateLimitBackoff();
          await this.waitForBackoff();
        } else if (isRetryableError(error)) {
          const delay = this.config.baseDelayMs * Math.pow(2, attempt);
          this.log(`Retryable error, waiting ${delay}ms (attempt ${attempt + 1}/${this.config.maxRetries})`);
          await sleep(delay);
        } else {
          throw error;
        }
      }
    }

    throw lastError;
  }

  private log(message: string) {
    if (this.config.debug) {
      console.log(`[AIPool] ${message}`);
    }
  }
}

// ============================================
// Helpers
// ============================================

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export function isRateLimitError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return (
    message.includes('rate limit') ||
    message.includes('429') ||
    message.includes('too many requests') ||
    message.includes('quota') ||
    statusOf(error) === 429
  );
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const status = statusOf(error);
  return (
    (status !== undefined && status >= 500 && status < 600) ||
    error.message.includes('timeout') ||
    error.message.includes('ECONNRESET') ||
    error.message.includes('ETIMEDOUT') ||
    error.message.includes('other side closed') ||
    error.message.includes('fetch failed') ||
    error.message.includes('socket')
  );
}

export function createAIPool(config: PoolConfig, executor?: ObjectExecutor): AIPool {
  return new AIPool(config, executor);
}
