/**
 * Shared type definitions for gitbrief.
 * Interfaces used across packages live here; configuration types are
 * inferred from the schema in config.ts.
 */

// ─── Commit Types ──────────────────────────────────────────────────

/** A single file touched by a commit */
export interface FileChange {
  path: string;
  additions: number;
  deletions: number;
  /** Reported as binary by the source (numstat `-`/`-` or a binary patch) */
  binary: boolean;
  /** Set by the change filter; false until the filter has run */
  significant: boolean;
}

/** A commit as yielded by a CommitSource */
export interface Commit {
  sha: string;
  shortSha: string;
  author: string;
  authorEmail: string;
  /** ISO-8601 author timestamp */
  timestamp: string;
  message: string;
  /** Branch / tag names pointing at this commit, if any */
  refs: string[];
  isMerge: boolean;
  files: FileChange[];
}

/** Either a `git log --since` phrase or a commit count */
export type CommitWindow =
  | { kind: 'since'; since: string }
  | { kind: 'count'; count: number };

/** Capability interface for anything that yields commits and diffs */
/** Order in which a source's `fetch` returns commits */
export type CommitOrder = 'newest-first' | 'oldest-first';

export interface CommitSource {
  readonly kind: 'local' | 'github';
  /** Used to order commits that share a timestamp */
  readonly order: CommitOrder;
  /** Path or URL the source reads from */
  readonly location: string;
  /** Throws SourceUnavailableError when the repository cannot be reached */
  validate(): Promise<void>;
  /** Commits in the window, in whatever order the backend returns them */
  fetch(window: CommitWindow): Promise<Commit[]>;
  /** Unified diff text for a single commit */
  getDiff(commit: Commit): Promise<string>;
  getReadme(): Promise<string | null>;
}

// ─── Statistics ────────────────────────────────────────────────────

/** Aggregate line counts over significant files */
export interface ChangeStats {
  commits: number;
  filesChanged: number;
  additions: number;
  deletions: number;
}

/** Per-path totals across all commits of a run */
export interface FileStat {
  path: string;
  additions: number;
  deletions: number;
  commits: number;
  significant: boolean;
}

// ─── Summary Types ─────────────────────────────────────────────────

export type DiffSummaryStatus = 'ok' | 'failed' | 'cancelled';

/** Map-phase output for one commit */
export interface DiffSummary {
  sha: string;
  shortSha: string;
  author: string;
  timestamp: string;
  status: DiffSummaryStatus;
  /** Summary text, or the placeholder when status is not 'ok' */
  text: string;
}

/** Reduce-phase output for one run */
export interface DailySummary {
  /** Report date, YYYY-MM-DD */
  date: string;
  text: string;
  provider: string;
  generatedAt: string;
}

/** One line of the on-disk memory log */
export interface MemoryLogEntry {
  date: string;
  summary: string;
  additions: number;
  deletions: number;
  magnitude: number;
}

// ─── Run Types ─────────────────────────────────────────────────────

export type RunStage =
  | 'fetching'
  | 'filtering'
  | 'mapping'
  | 'reducing'
  | 'distilling'
  | 'hooking'
  | 'rendering'
  | 'notifying';

export type RunState = 'idle' | RunStage | 'done' | 'failed';

export type DiagnosticCode =
  | 'MAP_ITEM_FAILED'
  | 'MAP_CANCELLED'
  | 'MAP_ALL_FAILED'
  | 'DIFF_UNAVAILABLE'
  | 'DISTILL_FAILED'
  | 'HOOK_FAILED'
  | 'ARTICLE_FAILED'
  | 'EXPORT_FAILED'
  | 'DELIVERY_FAILED'
  | 'MEMORY_LINE_SKIPPED';

/** A non-fatal problem collected during a run */
export interface Diagnostic {
  code: DiagnosticCode;
  stage: RunStage;
  message: string;
  commit?: string;
  channel?: string;
}

/** Why a run ended in the failed state */
export interface RunFailure {
  stage: RunStage;
  code: string;
  message: string;
}

// ─── Delivery Types ────────────────────────────────────────────────

export type ArtifactKind = 'html' | 'markdown' | 'text' | 'article' | 'pdf';

export interface ArtifactFile {
  kind: ArtifactKind;
  path: string;
}

/** What a notifier is asked to deliver */
export interface DeliveryArtifact {
  project: string;
  /** Report date, YYYY-MM-DD */
  date: string;
  subject: string;
  stats: ChangeStats;
  /** AI summary markdown, null in no-AI runs */
  summary: string | null;
  textReport: string;
  /** Files to attach, primary document first */
  files: ArtifactFile[];
}

export interface RecipientResult {
  ok: boolean;
  messageId?: string;
  error?: string;
}

/** Outcome of one channel's delivery, keyed by recipient */
export interface DeliveryResult {
  channel: string;
  ok: boolean;
  /** Channel-specific delivery mode, e.g. 'app' or 'webhook' */
  mode?: string;
  recipients: Record<string, RecipientResult>;
  error?: string;
}

/** A delivery channel */
export interface Notifier {
  readonly name: string;
  /** True when every setting the channel needs is present */
  isEnabled(): boolean;
  deliver(artifact: DeliveryArtifact, recipients: readonly string[]): Promise<DeliveryResult>;
}

/** Converts a rendered HTML document into a fixed-layout file */
export interface DocumentExporter {
  readonly format: 'pdf';
  /** Returns the path of the written file */
  export(htmlPath: string): Promise<string>;
}

// ─── LLM Types ─────────────────────────────────────────────────────

export type LlmOperation = 'summarize_diff' | 'reduce' | 'distill' | 'article';

/** One recorded provider call */
export interface LlmCallRecord {
  id: string;
  provider: string;
  model: string;
  operation: LlmOperation;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
  ok: boolean;
  timestamp: string;
}
