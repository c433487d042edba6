/**
 * In-process stand-ins shared by the report tests.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  getDefaultConfig,
  type Commit,
  type CommitOrder,
  type CommitSource,
  type FileChange,
  type GitBriefConfig,
} from '@gitbrief/core';
import type { ArticleInput, CallOptions, DistillInput, LLMProvider, ReduceInput } from '../providers/types.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gitbrief-report-'));
}

export function makeFile(filePath: string, additions = 1, deletions = 0, binary = false): FileChange {
  return { path: filePath, additions, deletions, binary, significant: false };
}

/** Commit n (1-9) at 0n:00 UTC on 2024-05-10, touching src/file<n>.ts */
export function makeCommit(n: number, overrides: Partial<Commit> = {}): Commit {
  return {
    sha: String(n).repeat(40),
    shortSha: String(n).repeat(7),
    author: 'Ada',
    authorEmail: 'ada@example.com',
    timestamp: `2024-05-10T0${n}:00:00Z`,
    message: `fix ${String.fromCharCode(96 + n)}`,
    refs: [],
    isMerge: false,
    files: [makeFile(`src/file${n}.ts`, 10 * n, n)],
    ...overrides,
  };
}

export function makeDiff(filePath: string, line: string): string {
  return [
    `diff --git a/${filePath} b/${filePath}`,
    `--- a/${filePath}`,
    `+++ b/${filePath}`,
    '@@ -0,0 +1 @@',
    `+${line}`,
    '',
  ].join('\n');
}

/** Commits and diffs held in memory; `fetch` returns them in `order` */
export class FakeSource implements CommitSource {
  readonly kind = 'local' as const;
  order: CommitOrder = 'newest-first';
  readonly location = '/fake/repo';
  readonly diffs = new Map<string, string>();
  diffRequests = 0;

  constructor(
    private readonly commits: Commit[],
    diffs: Record<string, string> = {},
  ) {
    for (const [sha, diff] of Object.entries(diffs)) this.diffs.set(sha, diff);
  }

  /** Diff text for each commit is `fix <letter>` in its own file */
  static withDiffs(commits: Commit[]): FakeSource {
    const source = new FakeSource(commits);
    for (const commit of commits) {
      source.diffs.set(commit.sha, makeDiff(commit.files[0]?.path ?? 'src/x.ts', commit.message));
    }
    return source;
  }

  async validate(): Promise<void> {}

  async fetch(): Promise<Commit[]> {
    return this.order === 'newest-first' ? [...this.commits].reverse() : [...this.commits];
  }

  async getDiff(commit: Commit): Promise<string> {
    this.diffRequests++;
    const diff = this.diffs.get(commit.sha);
    if (diff === undefined) throw new Error(`no diff for ${commit.shortSha}`);
    return diff;
  }

  async getReadme(): Promise<string | null> {
    return '# Fake repo';
  }
}

/** A provider whose answers are plain functions the test can replace */
export class StubProvider implements LLMProvider {
  readonly name = 'stub';
  readonly model = 'stub-1';

  summarize = async (commit: Commit, _diff: string, _opts?: CallOptions): Promise<string> =>
    `summary of ${commit.message}`;
  reduce = async (input: ReduceInput): Promise<string> =>
    input.diffSummaries.map((s) => s.text).join('\n');
  distill = async (input: DistillInput): Promise<string> =>
    input.log.map((e) => e.date).join(',');
  article = async (input: ArticleInput): Promise<string> => `article: ${input.summary.text}`;

  summarizeDiff(commit: Commit, diffText: string, opts?: CallOptions): Promise<string> {
    return this.summarize(commit, diffText, opts);
  }

  reduceSummaries(input: ReduceInput): Promise<string> {
    return this.reduce(input);
  }

  distillMemory(input: DistillInput): Promise<string> {
    return this.distill(input);
  }

  generateStyledArticle(input: ArticleInput): Promise<string> {
    return this.article(input);
  }
}

/** Defaults with no retry delay, a short grace period and the stub provider selected */
export function testConfig(): GitBriefConfig {
  const config = getDefaultConfig();
  config.llm.provider = 'stub';
  config.llm.providers.stub = { model: 'stub-1' };
  config.llm.maxRetries = 0;
  config.llm.retryBaseDelayMs = 0;
  config.run.gracePeriodMs = 50;
  config.hooks.cleanOutput = false;
  return config;
}
