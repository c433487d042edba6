/**
 * Memory distillation: rebuild project_memory.md from the full log.
 */

import {
  DistillFailedError,
  withRetry,
  type GitBriefConfig,
  type Logger,
} from '@gitbrief/core';
import type { LLMProvider } from '../providers/types.js';
import type { MemoryStore } from './store.js';

/** True when the log has just reached a multiple of `distillEvery` entries */
export function shouldDistill(entryCount: number, distillEvery: number): boolean {
  return distillEvery > 0 && entryCount > 0 && entryCount % distillEvery === 0;
}

export interface DistillOptions {
  project: string;
  provider: LLMProvider;
  store: MemoryStore;
  config: GitBriefConfig;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Distil the whole log and replace the memory document.
 * Any failure is wrapped in DistillFailedError; the log is never touched.
 */
export async function distillProjectMemory(opts: DistillOptions): Promise<string> {
  const { store, provider, config, logger } = opts;
  const log = store.readAll();
  if (log.length === 0) {
    throw new DistillFailedError('the memory log is empty');
  }

  let document: string;
  try {
    document = await withRetry(
      () =>
        provider.distillMemory(
          {
            project: opts.project,
            log,
            recencyWeight: config.memory.recencyWeight,
            magnitudeWeight: config.memory.magnitudeWeight,
          },
          { signal: opts.signal },
        ),
      {
        maxRetries: config.llm.maxRetries,
        baseDelayMs: config.llm.retryBaseDelayMs,
        signal: opts.signal,
        onRetry: ({ attempt, delayMs }) =>
          logger.debug('memory', `Distill retry ${attempt}/${config.llm.maxRetries} in ${delayMs}ms`),
      },
    );
  } catch (error) {
    throw new DistillFailedError(error);
  }

  try {
    store.writeMemory(document);
  } catch (error) {
    throw new DistillFailedError(error);
  }
  logger.info('memory', `Distilled ${log.length} log entries for ${opts.project}`);
  return document;
}
