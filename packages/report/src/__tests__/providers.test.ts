import { describe, it, expect, vi } from 'vitest';
import {
  ConfigError,
  Logger,
  ProviderConfigError,
  ProviderError,
  UnknownProviderError,
  UsageTracker,
  getDefaultConfig,
  type DiffSummary,
} from '@gitbrief/core';
import { PromptLibrary, type RenderedPrompt } from '../prompts.js';
import { PromptedProvider, type Completion } from '../providers/base.js';
import { MockProvider } from '../providers/mock.js';
import { ProviderRegistry, createDefaultProviderRegistry, type ProviderRuntime } from '../providers/registry.js';
import type { ProviderDeps, ReduceInput } from '../providers/types.js';
import { StubProvider, makeCommit, makeDiff } from './helpers.js';

function runtime(usage = new UsageTracker()): ProviderRuntime {
  return { prompts: new PromptLibrary(), usage, logger: new Logger() };
}

function deps(name: string, usage = new UsageTracker()): ProviderDeps {
  return {
    name,
    settings: { model: `${name}-model` },
    temperature: 0.4,
    maxTokens: 1024,
    requestTimeoutMs: 1000,
    ...runtime(usage),
  };
}

/** Answers from a queue and keeps every prompt it was sent */
class EchoProvider extends PromptedProvider {
  readonly sent: RenderedPrompt[] = [];
  readonly answers: Array<Completion | Error> = [];

  protected async complete(prompt: RenderedPrompt): Promise<Completion> {
    this.sent.push(prompt);
    const next = this.answers.shift() ?? { text: 'ok' };
    if (next instanceof Error) throw next;
    return next;
  }
}

function summary(n: number, text: string): DiffSummary {
  const commit = makeCommit(n);
  return { sha: commit.sha, shortSha: commit.shortSha, author: commit.author, timestamp: commit.timestamp, status: 'ok', text };
}

function reduceInput(diffSummaries: DiffSummary[]): ReduceInput {
  return {
    project: 'widgets',
    date: '2024-05-10',
    diffSummaries,
    stats: { commits: 2, filesChanged: 2, additions: 12, deletions: 4 },
    textReport: 'report body',
    priorMemory: '',
  };
}

describe('ProviderRegistry', () => {
  it('rejects an unknown provider before any factory runs', () => {
    const factory = vi.fn(() => new StubProvider());
    const registry = new ProviderRegistry().register('mock', factory);

    expect(() => registry.create('foo', getDefaultConfig(), {}, runtime())).toThrow(UnknownProviderError);
    expect(() => registry.create('foo', getDefaultConfig(), {}, runtime())).toThrow(
      'Unknown LLM provider "foo". Registered providers: mock',
    );
    expect(factory).not.toHaveBeenCalled();
  });

  it('requires the API key named by the provider settings', () => {
    const factory = vi.fn(() => new StubProvider());
    const registry = new ProviderRegistry().register('anthropic', factory);

    expect(() => registry.create('anthropic', getDefaultConfig(), {}, runtime())).toThrow(ProviderConfigError);
    expect(factory).not.toHaveBeenCalled();
  });

  it('passes the key and merged settings to the factory', () => {
    const factory = vi.fn((_deps: ProviderDeps) => new StubProvider());
    const registry = new ProviderRegistry().register('anthropic', factory);
    const config = getDefaultConfig();
    config.llm.maxTokens = 2048;

    registry.create('anthropic', config, { ANTHROPIC_API_KEY: 'test-secret' }, runtime());

    expect(factory).toHaveBeenCalledTimes(1);
    const passed = factory.mock.calls[0][0];
    expect(passed.apiKey).toBe('test-secret');
    expect(passed.settings.model).toBe('claude-sonnet-4-5');
    expect(passed.maxTokens).toBe(2048);
  });

  it('needs settings for a registered provider without defaults', () => {
    const registry = new ProviderRegistry().register('custom', () => new StubProvider());
    expect(() => registry.create('custom', getDefaultConfig(), {}, runtime())).toThrow(ConfigError);
  });

  it('registers the built-in providers', () => {
    expect(createDefaultProviderRegistry().names()).toEqual([
      'anthropic',
      'deepseek',
      'gemini',
      'mock',
      'ollama',
      'openai',
    ]);
  });
});

describe('MockProvider', () => {
  it('derives every answer from its input', async () => {
    const usage = new UsageTracker();
    const provider = new MockProvider(deps('mock', usage));
    const diff = makeDiff('src/a.ts', 'one') + makeDiff('src/b.ts', 'two');

    await expect(provider.summarizeDiff(makeCommit(1), diff)).resolves.toBe('fix a (2 file(s) changed)');
    await expect(provider.reduceSummaries(reduceInput([summary(1, 'did a')]))).resolves.toBe(
      [
        '## Summary',
        'widgets received 2 commit(s) on 2024-05-10 (+12 / -4).',
        '',
        '## Highlights',
        '- 1111111: did a',
      ].join('\n'),
    );
    expect(usage.totals().calls).toBe(2);
  });

  it('says so when there are no commit summaries', async () => {
    const text = await new MockProvider(deps('mock')).reduceSummaries(reduceInput([]));
    expect(text).toMatch(/## Highlights\n- No commit summaries\.$/);
  });
});

describe('PromptedProvider', () => {
  it('renders the shipped prompts and trims the answer', async () => {
    const usage = new UsageTracker();
    const provider = new EchoProvider(deps('anthropic', usage));
    provider.answers.push({ text: '  Adds the parser.  ', inputTokens: 120, outputTokens: 4 });

    const text = await provider.summarizeDiff(makeCommit(1), makeDiff('src/a.ts', 'one'));

    expect(text).toBe('Adds the parser.');
    expect(provider.sent[0].system).toContain('Answer with a single sentence.');
    expect(provider.sent[0].user).toContain('Commit: 1111111 by Ada');
    expect(provider.sent[0].user).toContain('+one');
    expect(usage.calls).toHaveLength(1);
    expect(usage.calls[0]).toMatchObject({
      provider: 'anthropic',
      model: 'anthropic-model',
      operation: 'summarize_diff',
      inputTokens: 120,
      outputTokens: 4,
      ok: true,
    });
  });

  it('lists each Map line in the reduce prompt', async () => {
    const provider = new EchoProvider(deps('anthropic'));

    await provider.reduceSummaries(reduceInput([summary(1, 'did a'), summary(2, 'did b')]));

    const { user, system } = provider.sent[0];
    expect(user).toContain('* 1111111 (Ada): did a\n* 2222222 (Ada): did b');
    expect(user).toContain('Lines added: 12');
    expect(user).not.toContain('<project_memory>');
    expect(system).toContain('Write GitHub-flavoured Markdown.');
  });

  it('gives the styled article the project memory and README', async () => {
    const provider = new EchoProvider(deps('anthropic'));

    await provider.generateStyledArticle({
      project: 'widgets',
      summary: { date: '2024-05-10', text: 'Shipped the parser.', provider: 'anthropic', generatedAt: '2024-05-10T18:00:00.000Z' },
      style: 'technical',
      readme: 'Widgets renders widgets.',
      priorMemory: 'The parser rewrite started in April.',
    });

    const { user } = provider.sent[0];
    expect(user).toContain('<project_memory>\nThe parser rewrite started in April.\n</project_memory>');
    expect(user).toContain('<project_readme>\nWidgets renders widgets.\n</project_readme>');
    expect(user).toContain('<report>\nShipped the parser.\n</report>');
  });

  it('leaves the memory block out of the article when there is none', async () => {
    const provider = new EchoProvider(deps('anthropic'));

    await provider.generateStyledArticle({
      project: 'widgets',
      summary: { date: '2024-05-10', text: 'Shipped the parser.', provider: 'anthropic', generatedAt: '2024-05-10T18:00:00.000Z' },
      style: 'default',
      readme: null,
      priorMemory: '',
    });

    expect(provider.sent[0].user).not.toContain('<project_memory>');
  });

  it('treats an empty answer as a provider error', async () => {
    const usage = new UsageTracker();
    const provider = new EchoProvider(deps('anthropic', usage));
    provider.answers.push({ text: '   ' });

    const failure = await provider.summarizeDiff(makeCommit(1), 'diff').catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure).toMatchObject({ kind: 'empty', provider: 'anthropic' });
    expect(usage.totals().failed).toBe(1);
  });

  it('classifies SDK errors by status code', async () => {
    const provider = new EchoProvider(deps('openai'));
    provider.answers.push(Object.assign(new Error('slow down'), { status: 429 }));

    await expect(provider.reduceSummaries(reduceInput([]))).rejects.toMatchObject({
      kind: 'rate_limit',
      statusCode: 429,
    });
  });
});
