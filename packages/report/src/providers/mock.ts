/**
 * Deterministic provider for dry runs and tests. Needs no key and makes
 * no network calls; every answer is derived from its input.
 */

import { estimateTokens, type Commit, type LlmOperation, type UsageTracker } from '@gitbrief/core';
import type { ArticleInput, DistillInput, LLMProvider, ProviderDeps, ReduceInput } from './types.js';

export class MockProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;
  private readonly usage: UsageTracker;

  constructor(deps: ProviderDeps) {
    this.name = deps.name;
    this.model = deps.settings.model;
    this.usage = deps.usage;
  }

  async summarizeDiff(commit: Commit, diffText: string): Promise<string> {
    const files = diffText.match(/^diff --git /gm)?.length ?? 0;
    return this.answer('summarize_diff', diffText, `${commit.message} (${files} file(s) changed)`);
  }

  async reduceSummaries(input: ReduceInput): Promise<string> {
    const { stats } = input;
    const lines = input.diffSummaries.map((s) => `- ${s.shortSha}: ${s.text}`);
    const text = [
      '## Summary',
      `${input.project} received ${stats.commits} commit(s) on ${input.date} (+${stats.additions} / -${stats.deletions}).`,
      '',
      '## Highlights',
      ...(lines.length > 0 ? lines : ['- No commit summaries.']),
    ].join('\n');
    return this.answer('reduce', input.textReport, text);
  }

  async distillMemory(input: DistillInput): Promise<string> {
    const newestFirst = [...input.log].reverse();
    const text = [
      `# Project memory: ${input.project}`,
      '',
      `Weighting: recency ${input.recencyWeight}, magnitude ${input.magnitudeWeight}.`,
      '',
      ...newestFirst.map(
        (entry, i) => `${i + 1}. ${entry.date} (magnitude ${entry.magnitude}): ${firstLine(entry.summary)}`,
      ),
    ].join('\n');
    return this.answer('distill', '', text);
  }

  async generateStyledArticle(input: ArticleInput): Promise<string> {
    const text = `# ${input.project}: ${input.summary.date} (${input.style})\n\n${input.summary.text}`;
    return this.answer('article', input.summary.text, text);
  }

  private answer(operation: LlmOperation, input: string, text: string): string {
    this.usage.record({
      provider: this.name,
      model: this.model,
      operation,
      inputTokens: estimateTokens(input),
      outputTokens: estimateTokens(text),
      latencyMs: 0,
      ok: true,
    });
    return text;
  }
}

function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim() && !l.startsWith('#'));
  return (line ?? '').trim();
}
