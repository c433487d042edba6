/**
 * Base class for providers that render prompts from the prompt library
 * and send them as one system + one user message.
 *
 * Retries are the caller's concern; a provider makes exactly one attempt
 * per operation, bounded by the request timeout.
 */

import {
  ProviderError,
  classifyProviderError,
  estimateTokens,
  withTimeout,
  type Commit,
  type LlmOperation,
  type Logger,
  type UsageTracker,
} from '@gitbrief/core';
import type { PromptLibrary, RenderedPrompt } from '../prompts.js';
import type {
  ArticleInput,
  CallOptions,
  DistillInput,
  LLMProvider,
  ProviderDeps,
  ReduceInput,
} from './types.js';

/** What a backend returns for one completion */
export interface Completion {
  text: string;
  inputTokens?: number;
  outputTokens?: number;
}

export abstract class PromptedProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;
  protected readonly temperature: number;
  protected readonly maxTokens: number;
  private readonly requestTimeoutMs: number;
  private readonly prompts: PromptLibrary;
  private readonly usage: UsageTracker;
  private readonly logger: Logger;

  constructor(deps: ProviderDeps) {
    this.name = deps.name;
    this.model = deps.settings.model;
    this.temperature = deps.temperature;
    this.maxTokens = deps.maxTokens;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.prompts = deps.prompts;
    this.usage = deps.usage;
    this.logger = deps.logger;
  }

  /** Send one prompt to the backend */
  protected abstract complete(prompt: RenderedPrompt, signal: AbortSignal): Promise<Completion>;

  async summarizeDiff(commit: Commit, diffText: string, opts: CallOptions = {}): Promise<string> {
    const prompt = this.prompts.render(this.name, 'summarize_diff', {
      commit: { shortSha: commit.shortSha, author: commit.author, message: commit.message },
      diff: diffText,
    });
    return this.call('summarize_diff', prompt, opts, commit.shortSha);
  }

  async reduceSummaries(input: ReduceInput, opts: CallOptions = {}): Promise<string> {
    const prompt = this.prompts.render(this.name, 'reduce', {
      project: input.project,
      date: input.date,
      mapLines: input.diffSummaries.map((s) => `* ${s.shortSha} (${s.author}): ${s.text}`),
      stats: input.stats,
      textReport: input.textReport,
      priorMemory: input.priorMemory,
    });
    return this.call('reduce', prompt, opts);
  }

  async distillMemory(input: DistillInput, opts: CallOptions = {}): Promise<string> {
    const newestFirst = [...input.log].reverse();
    const prompt = this.prompts.render(this.name, 'distill', {
      project: input.project,
      recencyWeight: input.recencyWeight,
      magnitudeWeight: input.magnitudeWeight,
      entries: newestFirst.map((entry, i) => ({ ...entry, rank: i + 1 })),
    });
    return this.call('distill', prompt, opts);
  }

  async generateStyledArticle(input: ArticleInput, opts: CallOptions = {}): Promise<string> {
    const prompt = this.prompts.render(
      this.name,
      'article',
      { project: input.project, summary: input.summary, readme: input.readme, priorMemory: input.priorMemory },
      input.style,
    );
    return this.call('article', prompt, opts);
  }

  private async call(
    operation: LlmOperation,
    prompt: RenderedPrompt,
    opts: CallOptions,
    commit?: string,
  ): Promise<string> {
    const inputEstimate = estimateTokens(prompt.system + prompt.user);
    this.logger.llmRequest({
      provider: this.name,
      operation,
      model: this.model,
      inputTokens: inputEstimate,
      commit,
    });

    const start = Date.now();
    try {
      const completion = await withTimeout((signal) => this.complete(prompt, signal), {
        timeoutMs: this.requestTimeoutMs,
        provider: this.name,
        parent: opts.signal,
      });
      const text = completion.text.trim();
      if (!text) {
        throw new ProviderError(`${this.name} returned an empty response`, this.name, 'empty');
      }

      const latencyMs = Date.now() - start;
      const outputTokens = completion.outputTokens ?? estimateTokens(text);
      this.usage.record({
        provider: this.name,
        model: this.model,
        operation,
        inputTokens: completion.inputTokens ?? inputEstimate,
        outputTokens,
        latencyMs,
        ok: true,
      });
      this.logger.llmResponse({ provider: this.name, operation, model: this.model, outputTokens, latencyMs });
      return text;
    } catch (error) {
      const failure = classifyProviderError(error, this.name);
      this.usage.record({
        provider: this.name,
        model: this.model,
        operation,
        inputTokens: inputEstimate,
        outputTokens: 0,
        latencyMs: Date.now() - start,
        ok: false,
      });
      this.logger.llmError({
        provider: this.name,
        operation,
        kind: failure.kind,
        errorMessage: failure.message,
        statusCode: failure.statusCode,
      });
      throw failure;
    }
  }
}
