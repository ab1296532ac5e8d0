import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { AIPool, isRateLimitError, isRetryableError, ObjectExecutor } from './pool';

const schema = z.object({ value: z.number() });
const messages = [{ role: 'user' as const, content: 'test' }];

function httpError(message: string, status: number) {
  return Object.assign(new Error(message), { status });
}

describe('AIPool', () => {
  it('never exceeds maxConcurrency', async () => {
    let active = 0;
    let peak = 0;
    const executor: ObjectExecutor = async (request) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return { object: request.schema.parse({ value: 1 }) };
    };
    const pool = new AIPool({ maxConcurrency: 2, model: 'test-model' }, executor);

    const results = await Promise.all(Array.from({ length: 5 }, () => pool.generateObject({ schema, messages })));

    expect(results).toEqual(Array.from({ length: 5 }, () => ({ value: 1 })));
    expect(peak).toBe(2);
    expect(pool.getStats()).toEqual({ inFlight: 0, queued: 0, maxConcurrency: 2, backoffActive: false });
  });

  it('retries server errors', async () => {
    let calls = 0;
    const executor: ObjectExecutor = async (request) => {
      calls++;
      if (calls === 1) throw httpError('Service Unavailable', 503);
      return { object: request.schema.parse({ value: 2 }) };
    };
    const pool = new AIPool({ maxConcurrency: 1, model: 'test-model', baseDelayMs: 1 }, executor);

    expect(await pool.generateObject({ schema, messages })).toEqual({ value: 2 });
    expect(calls).toBe(2);
  });

  it('backs off and retries after a rate limit', async () => {
    let calls = 0;
    const executor: ObjectExecutor = async (request) => {
      calls++;
      if (calls === 1) throw new Error('Too Many Requests');
      return { object: request.schema.parse({ value: 3 }), usage: { promptTokens: 10, completionTokens: 5 } };
    };
    const pool = new AIPool({ maxConcurrency: 1, model: 'test-model', baseDelayMs: 1 }, executor);

    expect(await pool.generateObject({ schema, messages })).toEqual({ value: 3 });
    expect(pool.getUsageStats()).toEqual({ totalCalls: 1, totalPromptTokens: 10, totalCompletionTokens: 5 });
  });

  it('throws other errors without retrying', async () => {
    const executor = vi.fn(async () => {
      throw new Error('invalid request');
    });
    const pool = new AIPool({ maxConcurrency: 1, model: 'test-model', baseDelayMs: 1 }, executor);

    await expect(pool.generateObject({ schema, messages })).rejects.toThrow('invalid request');
    expect(executor).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const executor = vi.fn(async () => {
      throw httpError('Bad Gateway', 502);
    });
    const pool = new AIPool({ maxConcurrency: 1, model: 'test-model', baseDelayMs: 1, maxRetries: 3 }, executor);

    await expect(pool.generateObject({ schema, messages })).rejects.toThrow('Bad Gateway');
    expect(executor).toHaveBeenCalledTimes(3);
  });

  it('passes the model name and default temperature to the executor', async () => {
    const seen: { model: string; temperature: number }[] = [];
    const executor: ObjectExecutor = async (request) => {
      seen.push({ model: request.model, temperature: request.temperature });
      return { object: request.schema.parse({ value: 4 }) };
    };
    const pool = new AIPool({ maxConcurrency: 1, model: 'test-model' }, executor);

    await pool.generateObject({ schema, messages });
    expect(seen).toEqual([{ model: 'test-model', temperature: 0.2 }]);
  });
});

describe('error classification', () => {
  it('recognizes rate limits', () => {
    expect(isRateLimitError(new Error('Resource exhausted: quota exceeded'))).toBe(true);
    expect(isRateLimitError(httpError('slow down', 429))).toBe(true);
    expect(isRateLimitError('429')).toBe(false);
  });

  it('recognizes transient failures', () => {
    expect(isRetryableError(httpError('Internal', 500))).toBe(true);
    expect(isRetryableError(new Error('fetch failed'))).toBe(true);
    expect(isRetryableError(httpError('Bad Request', 400))).toBe(false);
  });
});
