/**
 * @gitbrief/report - the report pipeline.
 * Filters commits, summarises them with a language model (Map-Reduce),
 * keeps per-project memory, renders reports and hands them to notifiers.
 */

// ─── Runs ─────────────────────────────────────────────────────────

export {
  Orchestrator,
  runProject,
  distillProject,
  type RunResult,
  type RunStatus,
  type StateChange,
  type StateListener,
} from './orchestrator.js';

export { createRunContext, describeWindow, type RunContext, type RunOptions } from './context.js';

export {
  runMap,
  runReduce,
  chronological,
  isMapEligible,
  placeholderFor,
  truncateDiff,
  type MapOptions,
  type MapResult,
  type ReduceOptions,
} from './pipeline.js';

export { runPool, type PoolOptions, type PoolOutcome } from './pool.js';

// ─── Sources & Filtering ──────────────────────────────────────────

export { LocalGitSource, createCommitSource } from './sources/local-git.js';

export {
  ChangeFilter,
  aggregateStats,
  basenameRule,
  binaryRule,
  buildFileStats,
  directoryRule,
  suffixRule,
  type FilterResult,
  type FilterRules,
  type NoiseRule,
} from './filter.js';

// ─── Providers & Prompts ──────────────────────────────────────────

export {
  ProviderRegistry,
  createDefaultProviderRegistry,
  type ProviderRuntime,
} from './providers/registry.js';
export { PromptedProvider, type Completion } from './providers/base.js';
export { MockProvider } from './providers/mock.js';
export type {
  ArticleInput,
  CallOptions,
  DistillInput,
  LLMProvider,
  ProviderDeps,
  ProviderFactory,
  ReduceInput,
  Weight,
} from './providers/types.js';
export { PromptLibrary, type RenderedPrompt } from './prompts.js';

// ─── Memory ───────────────────────────────────────────────────────

export { MemoryStore, LOG_FILENAME, MEMORY_FILENAME, type LogReadResult } from './memory/store.js';
export { ProjectLock, LOCK_FILENAME, isProcessAlive } from './memory/lock.js';
export { distillProjectMemory, shouldDistill, type DistillOptions } from './memory/distiller.js';

// ─── Hooks ────────────────────────────────────────────────────────

export {
  HookManager,
  type Hook,
  type HookContext,
  type HookPayloads,
  type HookPoint,
  type HookRunResult,
} from './hooks/manager.js';
export {
  cleanOutputHook,
  createBuiltinHooks,
  footerHook,
  redact,
  redactLinesHook,
  redactSummaryHook,
  stripMarkdownFence,
} from './hooks/builtin.js';

// ─── Rendering ────────────────────────────────────────────────────

export {
  ReportRenderer,
  articleFileName,
  reportFileName,
  buildReportModel,
  buildTextReport,
  groupByAuthor,
  type AuthorGroup,
  type CommitLine,
  type ReportFormat,
  type ReportModel,
  type ReportModelInput,
} from './renderer/index.js';

// ─── Scheduler ────────────────────────────────────────────────────

export {
  ReportScheduler,
  type JobStatus,
  type SchedulerOptions,
  type ResultCallback,
  type ErrorCallback,
} from './scheduler.js';
