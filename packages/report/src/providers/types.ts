/**
 * Provider capability interface and the inputs of each operation.
 */

import type {
  ChangeStats,
  Commit,
  DailySummary,
  DiffSummary,
  GitBriefConfig,
  Logger,
  MemoryLogEntry,
  ProviderSettings,
  UsageTracker,
} from '@gitbrief/core';
import type { PromptLibrary } from '../prompts.js';

export type Weight = GitBriefConfig['memory']['recencyWeight'];

export interface ReduceInput {
  project: string;
  date: string;
  /** Map output, oldest commit first; failed items carry placeholders */
  diffSummaries: DiffSummary[];
  stats: ChangeStats;
  textReport: string;
  /** Current project memory, '' when none exists yet */
  priorMemory: string;
}

export interface DistillInput {
  project: string;
  /** The full log in chronological order */
  log: MemoryLogEntry[];
  recencyWeight: Weight;
  magnitudeWeight: Weight;
}

export interface ArticleInput {
  project: string;
  summary: DailySummary;
  style: string;
  readme: string | null;
  /** Current project memory, '' when none exists yet */
  priorMemory: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/** A language-model backend */
export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  summarizeDiff(commit: Commit, diffText: string, opts?: CallOptions): Promise<string>;
  reduceSummaries(input: ReduceInput, opts?: CallOptions): Promise<string>;
  distillMemory(input: DistillInput, opts?: CallOptions): Promise<string>;
  generateStyledArticle(input: ArticleInput, opts?: CallOptions): Promise<string>;
}

/** Everything a provider factory may need besides its settings */
export interface ProviderDeps {
  name: string;
  settings: ProviderSettings;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  requestTimeoutMs: number;
  prompts: PromptLibrary;
  usage: UsageTracker;
  logger: Logger;
}

export type ProviderFactory = (deps: ProviderDeps) => LLMProvider;
