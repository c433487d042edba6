/**
 * Provider-agnostic helpers for language-model calls.
 *
 * Features:
 * - Exponential backoff retry (configurable retries, 1s/2s/4s delays)
 * - Request timeouts linked to a caller's AbortSignal
 * - Classification of SDK / HTTP errors into ProviderError kinds
 * - Per-run call records for usage reporting
 */

import { ProviderError, describeError } from './errors.js';
import type { LlmCallRecord } from './types.js';
import { generateId, now, sleep } from './utils.js';

// ─── Token Estimation ──────────────────────────────────────────────

/** Rough token count estimation (~3.5 chars per token for English and code) */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 3.5);
}

// ─── Usage Tracking ────────────────────────────────────────────────

/** Collects call records for one run */
export class UsageTracker {
  private readonly records: LlmCallRecord[] = [];

  record(call: Omit<LlmCallRecord, 'id' | 'timestamp'>): LlmCallRecord {
    const record: LlmCallRecord = { id: generateId(), timestamp: now(), ...call };
    this.records.push(record);
    return record;
  }

  get calls(): readonly LlmCallRecord[] {
    return this.records;
  }

  totals(): { calls: number; failed: number; inputTokens: number; outputTokens: number; latencyMs: number } {
    return this.records.reduce(
      (acc, r) => ({
        calls: acc.calls + 1,
        failed: acc.failed + (r.ok ? 0 : 1),
        inputTokens: acc.inputTokens + r.inputTokens,
        outputTokens: acc.outputTokens + r.outputTokens,
        latencyMs: acc.latencyMs + r.latencyMs,
      }),
      { calls: 0, failed: 0, inputTokens: 0, outputTokens: 0, latencyMs: 0 },
    );
  }
}

// ─── Error Classification ──────────────────────────────────────────

function readProperty(value: unknown, key: string): unknown {
  if (value !== null && typeof value === 'object' && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Turn whatever an SDK threw into a ProviderError.
 * SDK errors expose `status`; network failures expose `code` or a name.
 */
export function classifyProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = describeError(error);
  const status = readProperty(error, 'status');
  const statusCode = typeof status === 'number' ? status : undefined;
  const name = error instanceof Error ? error.name : '';
  const code = readProperty(error, 'code');

  if (statusCode !== undefined) {
    if (statusCode === 401 || statusCode === 403) {
      return new ProviderError(`${provider} rejected the API key: ${message}`, provider, 'auth', statusCode);
    }
    if (statusCode === 408) return new ProviderError(message, provider, 'timeout', statusCode);
    if (statusCode === 429) return new ProviderError(message, provider, 'rate_limit', statusCode);
    if (statusCode >= 500) return new ProviderError(message, provider, 'server', statusCode);
    return new ProviderError(message, provider, 'invalid_request', statusCode);
  }

  if (name === 'AbortError') {
    return new ProviderError(`${provider} request cancelled`, provider, 'cancelled');
  }
  if (/timeout|timed out/i.test(name) || /timed? ?out/i.test(message) || code === 'ETIMEDOUT') {
    return new ProviderError(message, provider, 'timeout');
  }
  if (
    /connection/i.test(name) ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    /fetch failed|network/i.test(message)
  ) {
    return new ProviderError(message, provider, 'network');
  }
  if (/quota|rate limit|429/i.test(message)) {
    return new ProviderError(message, provider, 'rate_limit');
  }
  return new ProviderError(message, provider, 'server');
}

// ─── Timeout ───────────────────────────────────────────────────────

/**
 * Run `call` with its own AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts. A timeout surfaces as a ProviderError of kind 'timeout'.
 */
export async function withTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; provider: string; parent?: AbortSignal },
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort();
  if (opts.parent?.aborted) controller.abort();
  opts.parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(
        new ProviderError(
          `${opts.provider} did not answer within ${opts.timeoutMs}ms`,
          opts.provider,
          'timeout',
        ),
      );
    }, opts.timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } catch (error) {
    if (timedOut) {
      throw new ProviderError(
        `${opts.provider} did not answer within ${opts.timeoutMs}ms`,
        opts.provider,
        'timeout',
      );
    }
    throw classifyProviderError(error, opts.provider);
  } finally {
    clearTimeout(timer);
    opts.parent?.removeEventListener('abort', onParentAbort);
  }
}

// ─── Retry ─────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** Decide whether an error is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
}

/** Transient ProviderErrors are retried; everything else is not */
export function isTransientError(error: unknown): boolean {
  return error instanceof ProviderError && error.transient;
}

/**
 * Run `fn` with exponential backoff: baseDelay * 2^(attempt-1).
 * Rate limits wait one extra doubling. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const shouldRetry = opts.shouldRetry ?? isTransientError;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;
      if (attempt === opts.maxRetries || !shouldRetry(error) || opts.signal?.aborted) {
        throw error;
      }
      const rateLimited = error instanceof ProviderError && error.kind === 'rate_limit';
      const delayMs = opts.baseDelayMs * Math.pow(2, rateLimited ? attempt + 1 : attempt);
      opts.onRetry?.({ attempt: attempt + 1, delayMs, error });
      await sleep(delayMs, opts.signal);
    }
  }

  throw lastError;
}
