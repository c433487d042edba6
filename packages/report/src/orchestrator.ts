/**
 * Orchestrator: drives one run through its stages.
 *
 *   idle → fetching → filtering → mapping → reducing → (distilling)
 *        → hooking → rendering → notifying → done
 *
 * `failed` is reachable from fetching, filtering, reducing and rendering.
 * Mapping, distilling and notifying problems become diagnostics. Nothing
 * is written to the memory log after a failure.
 */

import {
  ConfigError,
  DeliveryFailedError,
  RunLockedError,
  describeError,
  errorCode,
  formatDate,
  withRetry,
  type ArtifactFile,
  type Commit,
  type DailySummary,
  type DeliveryArtifact,
  type DeliveryResult,
  type Diagnostic,
  type DiffSummary,
  type MemoryLogEntry,
  type RunFailure,
  type RunStage,
  type RunState,
  type UsageTracker,
} from '@gitbrief/core';
import { deliveryFailure } from '@gitbrief/integrations';
import { createRunContext, describeWindow, type RunContext, type RunOptions } from './context.js';
import { aggregateStats } from './filter.js';
import type { HookContext, HookPayloads, HookPoint } from './hooks/manager.js';
import { distillProjectMemory, shouldDistill } from './memory/distiller.js';
import { ProjectLock } from './memory/lock.js';
import { runMap, runReduce } from './pipeline.js';
import type { LLMProvider } from './providers/types.js';
import { articleFileName, reportFileName } from './renderer/index.js';
import { buildReportModel, type ReportModel } from './renderer/model.js';
import { buildTextReport } from './renderer/text-report.js';

// ─── Types ────────────────────────────────────────────────────────

export type RunStatus = 'completed' | 'no_activity' | 'failed';

export interface StateChange {
  project: string;
  from: RunState;
  to: RunState;
}

export type StateListener = (change: StateChange) => void;

export interface RunResult {
  status: RunStatus;
  state: RunState;
  project: string;
  /** Null in no-AI runs, empty windows and failed runs */
  summary: DailySummary | null;
  /** Entry appended to the memory log, if any */
  memoryEntry: MemoryLogEntry | null;
  artifacts: ArtifactFile[];
  diagnostics: Diagnostic[];
  deliveries: DeliveryResult[];
  failure?: RunFailure;
  usage: ReturnType<UsageTracker['totals']>;
}

/** Thrown inside a stage to end the run in `failed` */
class StageFailure extends Error {
  constructor(
    readonly stage: RunStage,
    readonly reason: unknown,
  ) {
    super(describeError(reason));
    this.name = 'StageFailure';
  }
}

// ─── Orchestrator ─────────────────────────────────────────────────

export class Orchestrator {
  private readonly ctx: RunContext;
  private readonly listeners: StateListener[] = [];
  private current: RunState = 'idle';
  private diagnostics: Diagnostic[] = [];
  private artifacts: ArtifactFile[] = [];

  constructor(ctx: RunContext) {
    this.ctx = ctx;
  }

  get state(): RunState {
    return this.current;
  }

  onStateChange(listener: StateListener): this {
    this.listeners.push(listener);
    return this;
  }

  /** Run once, serialised against other runs of the same project */
  async run(): Promise<RunResult> {
    const lock = new ProjectLock(this.ctx.projectDir, this.ctx.project.alias);
    try {
      return await lock.run(() => this.execute());
    } catch (error) {
      if (error instanceof RunLockedError) {
        return this.failed(new StageFailure('fetching', error));
      }
      throw error;
    } finally {
      this.ctx.dispose();
    }
  }

  private async execute(): Promise<RunResult> {
    this.diagnostics = [];
    this.artifacts = [];
    const { ctx } = this;
    const date = formatDate(ctx.startedAt, ctx.timeZone);

    try {
      const commits = await this.fetch();

      this.transition('filtering');
      const filtered = commits.map((commit) => ctx.filter.filterCommit(commit));
      const stats = aggregateStats(filtered);
      if (filtered.length === 0) {
        ctx.logger.info('run', `${ctx.project.alias}: no commits ${describeWindow(ctx.window)}`);
        this.transition('done');
        return this.result('no_activity', null, null, []);
      }

      const baseModel = buildReportModel({
        title: ctx.config.report.title,
        project: ctx.project.alias,
        date,
        now: ctx.startedAt,
        timeZone: ctx.timeZone,
        windowLabel: describeWindow(ctx.window),
        provider: ctx.provider?.name ?? null,
        summary: null,
        stats,
        commits: filtered,
      });

      let summary: DailySummary | null = null;
      let memoryEntry: MemoryLogEntry | null = null;
      if (ctx.provider) {
        const mapped = await this.map(ctx.provider, filtered);
        summary = await this.reduce(ctx.provider, mapped, baseModel, date);
        memoryEntry = this.appendMemory(summary, baseModel);
        await this.maybeDistill(ctx.provider);
      }

      this.transition('hooking');
      const model = await this.runHook('pre-render', { ...baseModel, summary: summary?.text ?? null });

      this.transition('rendering');
      const textReport = buildTextReport(model);
      const reportFiles = await this.render(model, textReport);
      const articleFiles =
        summary && ctx.provider && ctx.articleEnabled
          ? await this.article(ctx.provider, summary)
          : { all: [], attach: [] };
      this.artifacts = [...reportFiles, ...articleFiles.all];

      this.transition('notifying');
      const deliveries = await this.notify({
        project: ctx.project.alias,
        date,
        subject: `${ctx.config.report.title}: ${ctx.project.alias} (${date})`,
        stats,
        summary: summary?.text ?? null,
        textReport,
        files: [...articleFiles.attach, ...reportFiles],
      });

      this.transition('done');
      return this.result('completed', summary, memoryEntry, deliveries);
    } catch (error) {
      if (error instanceof StageFailure) {
        return this.failed(error);
      }
      throw error;
    }
  }

  // ── Stages ──────────────────────────────────────────────────────

  private async fetch(): Promise<Commit[]> {
    const { source, window } = this.ctx;
    this.transition('fetching');
    try {
      await source.validate();
      const commits = await source.fetch(window);
      this.ctx.logger.info('fetch', `Fetched ${commits.length} commit(s) from ${source.location}`);
      return commits;
    } catch (error) {
      throw new StageFailure('fetching', error);
    }
  }

  private async map(provider: LLMProvider, commits: readonly Commit[]): Promise<DiffSummary[]> {
    const { ctx } = this;
    this.transition('mapping');
    const { summaries, diagnostics } = await runMap({
      commits,
      source: ctx.source,
      provider,
      filter: ctx.filter,
      config: ctx.config,
      logger: ctx.logger,
      signal: ctx.signal,
    });
    this.diagnostics.push(...diagnostics);

    const lines = await this.runHook('post-map', summaries.map((s) => s.text));
    if (lines.length !== summaries.length) {
      ctx.logger.warn('hooks', 'post-map hooks changed the number of lines; keeping the original lines');
      return summaries;
    }
    return summaries.map((s, i) => ({ ...s, text: lines[i] }));
  }

  private async reduce(
    provider: LLMProvider,
    summaries: DiffSummary[],
    model: ReportModel,
    date: string,
  ): Promise<DailySummary> {
    const { ctx } = this;
    this.transition('reducing');

    const { skippedLines } = ctx.store.readLog();
    for (const line of skippedLines) {
      this.diagnostics.push({
        code: 'MEMORY_LINE_SKIPPED',
        stage: 'reducing',
        message: `Skipped malformed line ${line} of ${ctx.store.logPath}`,
      });
    }

    let text: string;
    try {
      // Runs even when the run signal has aborted during Map
      text = await runReduce({
        provider,
        input: {
          project: ctx.project.alias,
          date,
          diffSummaries: summaries,
          stats: model.stats,
          textReport: buildTextReport(model),
          priorMemory: ctx.store.readMemory(),
        },
        config: ctx.config,
        logger: ctx.logger,
      });
    } catch (error) {
      throw new StageFailure('reducing', error);
    }

    const cleaned = await this.runHook('post-reduce', text);
    return {
      date,
      text: cleaned,
      provider: provider.name,
      generatedAt: ctx.startedAt.toISOString(),
    };
  }

  private appendMemory(summary: DailySummary, model: ReportModel): MemoryLogEntry {
    const entry: MemoryLogEntry = {
      date: summary.date,
      summary: summary.text,
      additions: model.stats.additions,
      deletions: model.stats.deletions,
      magnitude: model.stats.additions + model.stats.deletions,
    };
    try {
      this.ctx.store.append(entry);
    } catch (error) {
      throw new StageFailure('reducing', error);
    }
    return entry;
  }

  private async maybeDistill(provider: LLMProvider): Promise<void> {
    const { ctx } = this;
    const count = ctx.store.readAll().length;
    if (!shouldDistill(count, ctx.config.memory.distillEvery)) return;

    this.transition('distilling');
    try {
      await distillProjectMemory({
        project: ctx.project.alias,
        provider,
        store: ctx.store,
        config: ctx.config,
        logger: ctx.logger,
      });
    } catch (error) {
      const message = describeError(error);
      ctx.logger.warn('memory', message);
      this.diagnostics.push({ code: 'DISTILL_FAILED', stage: 'distilling', message });
    }
  }

  private async render(model: ReportModel, textReport: string): Promise<ArtifactFile[]> {
    const { ctx } = this;
    const files: ArtifactFile[] = [];
    try {
      for (const format of ctx.formats) {
        const fileName = reportFileName(ctx.config.report.outputPrefix, ctx.startedAt, format, ctx.timeZone);
        let content = format === 'text' ? textReport : ctx.renderer.render(format, model);
        if (format === 'html') {
          content = await this.runHook('post-render', content);
        }
        files.push({ kind: format, path: ctx.renderer.write(ctx.projectDir, fileName, content) });
      }
    } catch (error) {
      throw new StageFailure('rendering', error);
    }
    for (const file of files) {
      ctx.logger.info('render', `Wrote ${file.path}`);
    }
    return files;
  }

  /**
   * The styled article is optional: a provider, write or export failure
   * leaves a diagnostic and the run continues without it.
   */
  private async article(
    provider: LLMProvider,
    summary: DailySummary,
  ): Promise<{ all: ArtifactFile[]; attach: ArtifactFile[] }> {
    const { ctx } = this;

    let readme: string | null = null;
    try {
      readme = await ctx.source.getReadme();
    } catch (error) {
      ctx.logger.debug('article', `README unavailable: ${describeError(error)}`);
    }

    let body: string;
    try {
      body = await withRetry(
        () =>
          provider.generateStyledArticle({
            project: ctx.project.alias,
            summary,
            style: ctx.style,
            readme,
            priorMemory: ctx.store.readMemory(),
          }),
        { maxRetries: ctx.config.llm.maxRetries, baseDelayMs: ctx.config.llm.retryBaseDelayMs },
      );
    } catch (error) {
      const message = `Styled article failed: ${describeError(error)}`;
      ctx.logger.warn('article', message);
      this.diagnostics.push({ code: 'ARTICLE_FAILED', stage: 'rendering', message });
      return { all: [], attach: [] };
    }

    let markdown: ArtifactFile;
    let html: ArtifactFile;
    try {
      const title = `${ctx.project.alias}: ${summary.date}`;
      markdown = {
        kind: 'article',
        path: ctx.renderer.write(ctx.projectDir, articleFileName(ctx.style, ctx.startedAt, 'md', ctx.timeZone), body),
      };
      html = {
        kind: 'article',
        path: ctx.renderer.write(
          ctx.projectDir,
          articleFileName(ctx.style, ctx.startedAt, 'html', ctx.timeZone),
          ctx.renderer.renderArticleHtml(title, body),
        ),
      };
    } catch (error) {
      const message = `Styled article failed: ${describeError(error)}`;
      ctx.logger.warn('article', message);
      this.diagnostics.push({ code: 'ARTICLE_FAILED', stage: 'rendering', message });
      return { all: [], attach: [] };
    }

    if (!ctx.exporter) {
      return { all: [markdown, html], attach: [markdown] };
    }

    try {
      const pdf: ArtifactFile = { kind: 'pdf', path: await ctx.exporter.export(html.path) };
      return { all: [markdown, html, pdf], attach: [pdf] };
    } catch (error) {
      const message = describeError(error);
      ctx.logger.warn('article', message);
      this.diagnostics.push({ code: 'EXPORT_FAILED', stage: 'rendering', message });
      return { all: [markdown, html], attach: [markdown, html] };
    }
  }

  private async notify(artifact: DeliveryArtifact): Promise<DeliveryResult[]> {
    const { ctx } = this;
    const deliveries = await Promise.all(
      ctx.notifiers.map(async (notifier): Promise<DeliveryResult> => {
        try {
          return await notifier.deliver(artifact, ctx.recipients);
        } catch (error) {
          const failure = new DeliveryFailedError(notifier.name, describeError(error));
          return deliveryFailure(notifier.name, ctx.recipients, failure.message);
        }
      }),
    );

    for (const delivery of deliveries) {
      if (delivery.ok) {
        ctx.logger.info('notify', `Delivered via ${delivery.channel}`, { recipients: Object.keys(delivery.recipients) });
        continue;
      }
      const message = `${delivery.channel}: ${delivery.error ?? 'delivery failed'}`;
      ctx.logger.warn('notify', message);
      this.diagnostics.push({ code: 'DELIVERY_FAILED', stage: 'notifying', message, channel: delivery.channel });
    }
    return deliveries;
  }

  // ── Plumbing ────────────────────────────────────────────────────

  private async runHook<P extends HookPoint>(point: P, payload: HookPayloads[P]): Promise<HookPayloads[P]> {
    const hookCtx: HookContext = { project: this.ctx.project.alias, logger: this.ctx.logger };
    const { payload: result, diagnostics } = await this.ctx.hooks.run(point, payload, hookCtx);
    this.diagnostics.push(...diagnostics);
    return result;
  }

  private transition(to: RunState): void {
    const from = this.current;
    this.current = to;
    this.ctx.logger.stage(this.ctx.project.alias, from, to);
    for (const listener of this.listeners) {
      listener({ project: this.ctx.project.alias, from, to });
    }
  }

  private failed(failure: StageFailure): RunResult {
    const { reason, stage } = failure;
    this.ctx.logger.error('run', `${this.ctx.project.alias}: failed during ${stage}: ${describeError(reason)}`);
    this.transition('failed');
    return {
      ...this.result('failed', null, null, []),
      failure: { stage, code: errorCode(reason), message: describeError(reason) },
    };
  }

  private result(
    status: RunStatus,
    summary: DailySummary | null,
    memoryEntry: MemoryLogEntry | null,
    deliveries: DeliveryResult[],
  ): RunResult {
    return {
      status,
      state: this.current,
      project: this.ctx.project.alias,
      summary,
      memoryEntry,
      artifacts: this.artifacts,
      diagnostics: this.diagnostics,
      deliveries,
      usage: this.ctx.usage.totals(),
    };
  }
}

// ─── Entry points ─────────────────────────────────────────────────

/** Build a context for `opts` and run it once */
export async function runProject(opts: RunOptions, listener?: StateListener): Promise<RunResult> {
  const orchestrator = new Orchestrator(createRunContext(opts));
  if (listener) orchestrator.onStateChange(listener);
  return orchestrator.run();
}

/** Rebuild project_memory.md from the full log, outside a report run */
export async function distillProject(opts: RunOptions): Promise<string> {
  const ctx = createRunContext({ ...opts, noAi: false, channels: [] });
  try {
    const provider = ctx.provider;
    if (!provider) {
      throw new ConfigError('Distillation needs a language model provider');
    }
    const lock = new ProjectLock(ctx.projectDir, ctx.project.alias);
    return await lock.run(() =>
      distillProjectMemory({
        project: ctx.project.alias,
        provider,
        store: ctx.store,
        config: ctx.config,
        logger: ctx.logger,
        signal: ctx.signal,
      }),
    );
  } finally {
    ctx.dispose();
  }
}
