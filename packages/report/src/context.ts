/**
 * Run context: everything one run needs, resolved up front and frozen.
 *
 * Building the context is where configuration errors surface. An unknown
 * provider or notifier, or a missing API key, fails here before the
 * repository or any remote service is contacted.
 */

import * as path from 'node:path';
import {
  UsageTracker,
  getLogger,
  isRemoteLocation,
  projectDataDir,
  resolveProject,
  type CommitSource,
  type CommitWindow,
  type DocumentExporter,
  type GitBriefConfig,
  type Logger,
  type Notifier,
  type ProjectEntry,
} from '@gitbrief/core';
import {
  PrinceExporter,
  createDefaultNotifierRegistry,
  type Env,
  type NotifierRegistry,
} from '@gitbrief/integrations';
import { ChangeFilter } from './filter.js';
import { createBuiltinHooks } from './hooks/builtin.js';
import type { HookManager } from './hooks/manager.js';
import { MemoryStore } from './memory/store.js';
import { PromptLibrary } from './prompts.js';
import { createDefaultProviderRegistry, type ProviderRegistry } from './providers/registry.js';
import type { LLMProvider } from './providers/types.js';
import { ReportRenderer, type ReportFormat } from './renderer/index.js';
import { createCommitSource } from './sources/local-git.js';

export interface RunOptions {
  /** Project alias from the config, or a repository path / URL */
  project: string;
  config: GitBriefConfig;
  /** Directory the config's relative paths resolve against */
  baseDir: string;
  env: Env;

  provider?: string;
  style?: string;
  window?: CommitWindow;
  recipients?: readonly string[];
  channels?: readonly string[];
  formats?: readonly ReportFormat[];
  /** Skip Map, Reduce and memory; render statistics only */
  noAi?: boolean;
  article?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
  /** IANA zone for the report date and file stamps; host time when omitted */
  timeZone?: string;
  logger?: Logger;

  // Collaborator overrides
  source?: CommitSource;
  providers?: ProviderRegistry;
  notifiers?: NotifierRegistry;
  exporter?: DocumentExporter | null;
  hooks?: HookManager;
  prompts?: PromptLibrary;
  renderer?: ReportRenderer;
}

export interface RunContext {
  readonly project: ProjectEntry;
  /** `<dataDir>/projects/<alias>` */
  readonly projectDir: string;
  readonly config: GitBriefConfig;
  /** Null in no-AI runs */
  readonly provider: LLMProvider | null;
  readonly style: string;
  readonly window: CommitWindow;
  readonly recipients: readonly string[];
  readonly formats: readonly ReportFormat[];
  readonly articleEnabled: boolean;
  readonly source: CommitSource;
  readonly filter: ChangeFilter;
  readonly store: MemoryStore;
  readonly notifiers: readonly Notifier[];
  /** Null unless the article is attached as PDF */
  readonly exporter: DocumentExporter | null;
  readonly hooks: HookManager;
  readonly renderer: ReportRenderer;
  readonly usage: UsageTracker;
  readonly logger: Logger;
  /** The run's clock reading; every date in the run derives from it */
  readonly startedAt: Date;
  /** Zone `startedAt` is read in; undefined means host time */
  readonly timeZone: string | undefined;
  /** Aborts on the external signal or when `run.timeoutMs` elapses */
  readonly signal: AbortSignal;
  /** Stop the run timer */
  dispose(): void;
}

/** Human-readable label for a commit window */
export function describeWindow(window: CommitWindow): string {
  return window.kind === 'since' ? `since ${window.since}` : `last ${window.count} commit(s)`;
}

export function createRunContext(opts: RunOptions): RunContext {
  const { config, env } = opts;
  const logger = opts.logger ?? getLogger();
  const usage = new UsageTracker();
  const project = resolveProject(config, opts.project);
  const projectDir = projectDataDir(config, opts.baseDir, project.alias);

  const location = isRemoteLocation(project.location)
    ? project.location
    : path.resolve(opts.baseDir, project.location);

  let provider: LLMProvider | null = null;
  if (!opts.noAi) {
    const providers = opts.providers ?? createDefaultProviderRegistry();
    provider = providers.create(opts.provider ?? config.llm.provider, config, env, {
      prompts: opts.prompts ?? new PromptLibrary(),
      usage,
      logger,
    });
  }

  const notifierRegistry = opts.notifiers ?? createDefaultNotifierRegistry();
  const notifiers = notifierRegistry.createAll(opts.channels ?? config.notify.channels, config, env);

  const articleEnabled = !opts.noAi && (opts.article ?? config.article.enabled);
  let exporter: DocumentExporter | null = null;
  if (opts.exporter !== undefined) {
    exporter = opts.exporter;
  } else if (articleEnabled && config.article.attachFormat === 'pdf') {
    exporter = new PrinceExporter({
      command: config.article.pdfCommand,
      stylesheet: config.article.pdfStylesheet,
      timeoutMs: config.article.pdfTimeoutMs,
    });
  }

  const source = opts.source ?? createCommitSource(location, config, env, opts.now);

  const { signal, dispose } = runSignal(opts.signal, config.run.timeoutMs, () =>
    logger.warn('run', `${project.alias}: run timed out after ${config.run.timeoutMs}ms`),
  );

  return Object.freeze<RunContext>({
    project,
    projectDir,
    config,
    provider,
    style: opts.style ?? config.llm.style,
    window: opts.window ?? { kind: 'since', since: config.source.since },
    recipients: opts.recipients ?? config.notify.recipients,
    formats: opts.formats ?? config.report.formats,
    articleEnabled,
    source,
    filter: new ChangeFilter(config.filter),
    store: new MemoryStore(projectDir, logger),
    notifiers,
    exporter,
    hooks: opts.hooks ?? createBuiltinHooks(config.hooks),
    renderer: opts.renderer ?? new ReportRenderer(),
    usage,
    logger,
    startedAt: (opts.now ?? (() => new Date()))(),
    timeZone: opts.timeZone,
    signal,
    dispose,
  });
}

/** A signal that follows `parent` and fires by itself after `timeoutMs` */
function runSignal(
  parent: AbortSignal | undefined,
  timeoutMs: number,
  onTimeout: () => void,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    onTimeout();
    controller.abort(new Error(`run timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
