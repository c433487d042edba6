/**
 * Map-Reduce summarisation.
 *
 * Map summarises each eligible commit independently through a bounded
 * pool; Reduce folds the Map lines, statistics and project memory into
 * one daily summary.
 */

import {
  MapItemFailedError,
  SummarizationFailedError,
  describeError,
  withRetry,
  type Commit,
  type CommitOrder,
  type CommitSource,
  type Diagnostic,
  type DiffSummary,
  type GitBriefConfig,
  type Logger,
} from '@gitbrief/core';
import type { ChangeFilter } from './filter.js';
import { runPool } from './pool.js';
import type { LLMProvider, ReduceInput } from './providers/types.js';

// ─── Types ────────────────────────────────────────────────────────

export interface MapOptions {
  /** Filtered commits in source order */
  commits: readonly Commit[];
  source: CommitSource;
  provider: LLMProvider;
  filter: ChangeFilter;
  config: GitBriefConfig;
  logger: Logger;
  /** Aborting stops new Map calls; in-flight calls get the grace period */
  signal?: AbortSignal;
}

export interface MapResult {
  /** One entry per eligible commit, oldest first */
  summaries: DiffSummary[];
  diagnostics: Diagnostic[];
}

type MapItem =
  | { kind: 'summary'; text: string }
  | { kind: 'empty' }
  | { kind: 'no_diff'; reason: string };

// ─── Helpers ──────────────────────────────────────────────────────

export function placeholderFor(commit: Pick<Commit, 'shortSha'>): string {
  return `summary unavailable for commit ${commit.shortSha}`;
}

/** Merges and commits touching only noise files are not sent to the model */
export function isMapEligible(commit: Commit): boolean {
  return !commit.isMerge && commit.files.some((f) => f.significant);
}

export function truncateDiff(diff: string, maxChars: number): string {
  if (diff.length <= maxChars) return diff;
  return `${diff.slice(0, maxChars)}\n... [diff truncated: ${maxChars} of ${diff.length} characters shown]\n`;
}

/** Oldest first; commits with equal timestamps are ordered by their position in `sourceOrder` */
export function chronological(commits: readonly Commit[], sourceOrder: CommitOrder): Commit[] {
  const tie = sourceOrder === 'newest-first' ? -1 : 1;
  return commits
    .map((commit, index) => ({ commit, index, time: Date.parse(commit.timestamp) }))
    .sort((a, b) => (a.time !== b.time ? a.time - b.time : tie * (a.index - b.index)))
    .map((entry) => entry.commit);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// ─── Map ──────────────────────────────────────────────────────────

export async function runMap(opts: MapOptions): Promise<MapResult> {
  const { provider, source, filter, config, logger } = opts;
  const eligible = chronological(opts.commits, source.order).filter(isMapEligible);

  const outcomes = await runPool(
    eligible,
    async (commit, _index, abandon): Promise<MapItem> => {
      let rawDiff: string;
      try {
        rawDiff = await source.getDiff(commit);
      } catch (error) {
        return { kind: 'no_diff', reason: describeError(error) };
      }

      const diff = filter.filterDiff(rawDiff);
      if (!diff.trim()) return { kind: 'empty' };

      const text = await withRetry(
        () => provider.summarizeDiff(commit, truncateDiff(diff, config.llm.maxDiffChars), { signal: abandon }),
        {
          maxRetries: config.llm.maxRetries,
          baseDelayMs: config.llm.retryBaseDelayMs,
          signal: opts.signal,
          onRetry: ({ attempt, delayMs }) =>
            logger.debug('map', `Retrying ${commit.shortSha} (${attempt}/${config.llm.maxRetries}) in ${delayMs}ms`),
        },
      );
      return { kind: 'summary', text: collapse(text) };
    },
    {
      concurrency: config.llm.mapConcurrency,
      signal: opts.signal,
      gracePeriodMs: config.run.gracePeriodMs,
    },
  );

  const summaries: DiffSummary[] = [];
  const diagnostics: Diagnostic[] = [];

  outcomes.forEach((outcome, i) => {
    const commit = eligible[i];
    const base = {
      sha: commit.sha,
      shortSha: commit.shortSha,
      author: commit.author,
      timestamp: commit.timestamp,
    };

    if (outcome.status === 'fulfilled') {
      const item = outcome.value;
      if (item.kind === 'empty') return;
      if (item.kind === 'summary') {
        summaries.push({ ...base, status: 'ok', text: item.text });
        return;
      }
      const message = `Diff for ${commit.shortSha} could not be read: ${item.reason}`;
      logger.warn('map', message);
      diagnostics.push({ code: 'DIFF_UNAVAILABLE', stage: 'mapping', message, commit: commit.sha });
      summaries.push({ ...base, status: 'failed', text: placeholderFor(commit) });
      return;
    }

    if (outcome.status === 'rejected') {
      const failure = new MapItemFailedError(commit.shortSha, outcome.error);
      logger.warn('map', failure.message);
      diagnostics.push({ code: 'MAP_ITEM_FAILED', stage: 'mapping', message: failure.message, commit: commit.sha });
      summaries.push({ ...base, status: 'failed', text: placeholderFor(commit) });
      return;
    }

    const message = `Summary for ${commit.shortSha} cancelled`;
    diagnostics.push({ code: 'MAP_CANCELLED', stage: 'mapping', message, commit: commit.sha });
    summaries.push({ ...base, status: 'cancelled', text: placeholderFor(commit) });
  });

  if (summaries.length > 0 && summaries.every((s) => s.status !== 'ok')) {
    const message = `All ${summaries.length} commit summaries failed; the daily summary uses statistics only`;
    logger.warn('map', message);
    diagnostics.push({ code: 'MAP_ALL_FAILED', stage: 'mapping', message });
  }

  logger.info('map', `Summarised ${summaries.filter((s) => s.status === 'ok').length}/${eligible.length} commits`);
  return { summaries, diagnostics };
}

// ─── Reduce ───────────────────────────────────────────────────────

export interface ReduceOptions {
  provider: LLMProvider;
  input: ReduceInput;
  config: GitBriefConfig;
  logger: Logger;
  signal?: AbortSignal;
}

/** Throws SummarizationFailedError once retries are exhausted or the error is not transient */
export async function runReduce(opts: ReduceOptions): Promise<string> {
  const { provider, input, config, logger } = opts;
  let attempts = 0;

  try {
    return await withRetry(
      (attempt) => {
        attempts = attempt;
        return provider.reduceSummaries(input, { signal: opts.signal });
      },
      {
        maxRetries: config.llm.maxRetries,
        baseDelayMs: config.llm.retryBaseDelayMs,
        signal: opts.signal,
        onRetry: ({ attempt, delayMs, error }) =>
          logger.warn('reduce', `Reduce attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: describeError(error),
          }),
      },
    );
  } catch (error) {
    throw new SummarizationFailedError(attempts, error);
  }
}
