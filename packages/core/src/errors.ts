/**
 * Error taxonomy for the report pipeline.
 *
 * Every error carries a stable string `code`. Whether an error is fatal is
 * decided by the stage that catches it, not by the class itself.
 */

import type { RunStage } from './types.js';

export class GitBriefError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'GitBriefError';
  }
}

export class ConfigError extends GitBriefError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

// ─── Source ────────────────────────────────────────────────────────

export class SourceUnavailableError extends GitBriefError {
  constructor(
    public readonly location: string,
    reason: string,
  ) {
    super(`Commit source ${location} is unavailable: ${reason}`, 'SOURCE_UNAVAILABLE');
    this.name = 'SourceUnavailableError';
  }
}

// ─── Provider ──────────────────────────────────────────────────────

export type ProviderErrorKind =
  | 'timeout'
  | 'rate_limit'
  | 'server'
  | 'network'
  | 'auth'
  | 'invalid_request'
  | 'empty'
  | 'cancelled';

const TRANSIENT_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  'timeout',
  'rate_limit',
  'server',
  'network',
]);

export class ProviderError extends GitBriefError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    public readonly statusCode?: number,
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`);
    this.name = 'ProviderError';
  }

  /** Timeouts, rate limits, 5xx and connection failures are worth retrying */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export class UnknownProviderError extends GitBriefError {
  constructor(
    public readonly requested: string,
    public readonly available: readonly string[],
  ) {
    super(
      `Unknown LLM provider "${requested}". Registered providers: ${available.join(', ') || '(none)'}`,
      'UNKNOWN_PROVIDER',
    );
    this.name = 'UnknownProviderError';
  }
}

export class ProviderConfigError extends GitBriefError {
  constructor(provider: string, apiKeyEnv: string) {
    super(
      `\nAPI key required for provider "${provider}".\n\n` +
        `Set it as an environment variable (or in .env):\n\n` +
        `  export ${apiKeyEnv}=...\n`,
      'PROVIDER_NOT_CONFIGURED',
    );
    this.name = 'ProviderConfigError';
  }
}

// ─── Pipeline ──────────────────────────────────────────────────────

export class MapItemFailedError extends GitBriefError {
  constructor(
    public readonly commit: string,
    cause: unknown,
  ) {
    super(`Summary failed for commit ${commit}: ${describeError(cause)}`, 'MAP_ITEM_FAILED');
    this.name = 'MapItemFailedError';
  }
}

export class SummarizationFailedError extends GitBriefError {
  constructor(
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Daily summary failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(cause)}`,
      'REDUCE_FAILED',
    );
    this.name = 'SummarizationFailedError';
  }
}

export class DistillFailedError extends GitBriefError {
  constructor(cause: unknown) {
    super(`Memory distillation failed: ${describeError(cause)}`, 'DISTILL_FAILED');
    this.name = 'DistillFailedError';
  }
}

export class RenderFailedError extends GitBriefError {
  constructor(what: string, cause: unknown) {
    super(`Rendering ${what} failed: ${describeError(cause)}`, 'RENDER_FAILED');
    this.name = 'RenderFailedError';
  }
}

export class DeliveryFailedError extends GitBriefError {
  constructor(
    public readonly channel: string,
    reason: string,
  ) {
    super(`Delivery via ${channel} failed: ${reason}`, 'DELIVERY_FAILED');
    this.name = 'DeliveryFailedError';
  }
}

export class UnknownNotifierError extends GitBriefError {
  constructor(
    public readonly requested: string,
    public readonly available: readonly string[],
  ) {
    super(
      `Unknown notification channel "${requested}". Available channels: ${available.join(', ')}`,
      'UNKNOWN_NOTIFIER',
    );
    this.name = 'UnknownNotifierError';
  }
}

// ─── Memory ────────────────────────────────────────────────────────

export class MemoryWriteError extends GitBriefError {
  constructor(filePath: string, cause: unknown) {
    super(`Could not write ${filePath}: ${describeError(cause)}`, 'MEMORY_WRITE_FAILED');
    this.name = 'MemoryWriteError';
  }
}

export class MemoryOrderError extends GitBriefError {
  constructor(date: string, lastDate: string) {
    super(
      `Refusing to append a memory entry dated ${date} after an entry dated ${lastDate}`,
      'MEMORY_OUT_OF_ORDER',
    );
    this.name = 'MemoryOrderError';
  }
}

export class RunLockedError extends GitBriefError {
  constructor(project: string, holderPid: number) {
    super(
      `Another run for project "${project}" is in progress (pid ${holderPid})`,
      'RUN_LOCKED',
    );
    this.name = 'RunLockedError';
  }
}

// ─── Helpers ───────────────────────────────────────────────────────

/** The message of an Error, or the stringified value */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Code used in run failure reports for an arbitrary thrown value */
export function errorCode(error: unknown): string {
  if (error instanceof GitBriefError) return error.code;
  return 'UNEXPECTED';
}

/**
 * Map an error to a short human-readable reason for the final
 * "Run failed" message.
 */
export function getFailureReason(error: unknown, stage?: RunStage): string {
  const where = stage ? ` during ${stage}` : '';
  if (error instanceof UnknownProviderError) return `Unknown provider "${error.requested}"`;
  if (error instanceof ProviderConfigError) return 'Provider API key missing';
  if (error instanceof SourceUnavailableError) return `Repository unreachable${where}`;
  if (error instanceof SummarizationFailedError) return `LLM summary failed after retries${where}`;
  if (error instanceof MemoryWriteError) return 'Memory log could not be written';
  if (error instanceof RenderFailedError) return 'Report could not be rendered';
  if (error instanceof RunLockedError) return 'Project is locked by another run';
  if (error instanceof ProviderError) {
    if (error.kind === 'auth') return `${error.provider} authentication failed`;
    return `${error.provider} error (${error.kind})${where}`;
  }
  if (error instanceof GitBriefError) return `${error.code}${where}`;
  return describeError(error);
}
