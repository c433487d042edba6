import { describe, it, expect, vi } from 'vitest';
import { ConfigError, SourceUnavailableError } from '@gitbrief/core';
import {
  buildDiffFromFiles,
  parseRepoUrl,
  type GitHubCommitApi,
  type RemoteCommit,
  type RemoteCommitFile,
} from '../github/api.js';
import { GitHubCommitSource, parseSincePhrase } from '../github/commit-source.js';

const NOW = new Date('2024-05-10T12:00:00Z');

function fakeApi(commits: RemoteCommit[], files: Record<string, RemoteCommitFile[]>) {
  const api = {
    getRepository: vi.fn(async () => ({ fullName: 'acme/widgets', defaultBranch: 'main' })),
    listCommits: vi.fn(async (_ref: { owner: string; repo: string }, opts: { since?: string; limit: number }) =>
      commits.slice(0, opts.limit),
    ),
    getCommitFiles: vi.fn(async (_ref: { owner: string; repo: string }, sha: string) => files[sha] ?? []),
    getReadme: vi.fn(async () => '# Widgets'),
  } satisfies GitHubCommitApi;
  return api;
}

const COMMITS: RemoteCommit[] = [
  {
    sha: 'a1b2c3d4e5f60718293a',
    author: 'Dana',
    email: 'dana@example.com',
    date: '2024-05-09T08:00:00Z',
    message: 'Add widget endpoint\n\nLonger body text',
    parentCount: 1,
  },
  {
    sha: 'ffeeddccbbaa99887766',
    author: 'Lee',
    email: 'lee@example.com',
    date: '2024-05-09T09:00:00Z',
    message: 'Merge branch feature',
    parentCount: 2,
  },
];

const FILES: Record<string, RemoteCommitFile[]> = {
  a1b2c3d4e5f60718293a: [
    { filename: 'src/widget.ts', status: 'modified', additions: 1, deletions: 1, patch: '@@ -1 +1 @@\n-a\n+b' },
    { filename: 'assets/logo.png', status: 'added', additions: 0, deletions: 0 },
  ],
};

describe('parseRepoUrl', () => {
  it('accepts https and ssh forms', () => {
    expect(parseRepoUrl('https://github.com/acme/widgets')).toEqual({ owner: 'acme', repo: 'widgets' });
    expect(parseRepoUrl('https://github.com/acme/widgets.git/')).toEqual({ owner: 'acme', repo: 'widgets' });
    expect(parseRepoUrl('git@github.com:acme/widgets.git')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it('returns null for anything else', () => {
    expect(parseRepoUrl('/home/dev/widgets')).toBeNull();
    expect(parseRepoUrl('https://github.com/acme')).toBeNull();
  });
});

describe('parseSincePhrase', () => {
  it('resolves relative phrases against the clock', () => {
    expect(parseSincePhrase('2 days ago', NOW)).toBe('2024-05-08T12:00:00.000Z');
    expect(parseSincePhrase('1 hour ago', NOW)).toBe('2024-05-10T11:00:00.000Z');
    expect(parseSincePhrase('yesterday', NOW)).toBe('2024-05-09T12:00:00.000Z');
  });

  it('passes absolute dates through', () => {
    expect(parseSincePhrase('2024-05-01T00:00:00Z', NOW)).toBe('2024-05-01T00:00:00.000Z');
  });

  it('rejects phrases it cannot interpret', () => {
    expect(() => parseSincePhrase('whenever', NOW)).toThrow(ConfigError);
  });
});

describe('buildDiffFromFiles', () => {
  it('skips files without a patch', () => {
    expect(buildDiffFromFiles(FILES.a1b2c3d4e5f60718293a)).toBe(
      'diff --git a/src/widget.ts b/src/widget.ts\n--- a/src/widget.ts\n+++ b/src/widget.ts\n@@ -1 +1 @@\n-a\n+b',
    );
  });
});

describe('GitHubCommitSource', () => {
  it('maps listed commits and caps the count at maxCommits', async () => {
    const api = fakeApi(COMMITS, FILES);
    const source = new GitHubCommitSource({
      url: 'https://github.com/acme/widgets',
      api,
      maxCommits: 5,
      now: () => NOW,
    });

    const commits = await source.fetch({ kind: 'count', count: 10 });

    expect(api.listCommits).toHaveBeenCalledWith({ owner: 'acme', repo: 'widgets' }, { since: undefined, limit: 5 });
    expect(commits).toHaveLength(2);
    expect(commits[0]).toEqual({
      sha: 'a1b2c3d4e5f60718293a',
      shortSha: 'a1b2c3d',
      author: 'Dana',
      authorEmail: 'dana@example.com',
      timestamp: '2024-05-09T08:00:00Z',
      message: 'Add widget endpoint',
      refs: [],
      isMerge: false,
      files: [
        { path: 'src/widget.ts', additions: 1, deletions: 1, binary: false, significant: false },
        { path: 'assets/logo.png', additions: 0, deletions: 0, binary: true, significant: false },
      ],
    });
    expect(commits[1].isMerge).toBe(true);
  });

  it('turns a since phrase into an ISO timestamp', async () => {
    const api = fakeApi(COMMITS, FILES);
    const source = new GitHubCommitSource({
      url: 'https://github.com/acme/widgets',
      api,
      maxCommits: 50,
      now: () => NOW,
    });

    await source.fetch({ kind: 'since', since: '1 day ago' });

    expect(api.listCommits).toHaveBeenCalledWith(
      { owner: 'acme', repo: 'widgets' },
      { since: '2024-05-09T12:00:00.000Z', limit: 50 },
    );
  });

  it('answers getDiff from the patches fetched with the commit', async () => {
    const api = fakeApi(COMMITS, FILES);
    const source = new GitHubCommitSource({ url: 'https://github.com/acme/widgets', api, maxCommits: 5 });

    const [first] = await source.fetch({ kind: 'count', count: 1 });
    const diff = await source.getDiff(first);

    expect(diff).toContain('+++ b/src/widget.ts');
    expect(api.getCommitFiles).toHaveBeenCalledTimes(1);
  });

  it('reports an unreachable repository as SourceUnavailableError', async () => {
    const api = fakeApi(COMMITS, FILES);
    api.getRepository.mockRejectedValueOnce(new Error('Not Found'));
    const source = new GitHubCommitSource({ url: 'https://github.com/acme/missing', api, maxCommits: 5 });

    await expect(source.validate()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('rejects a location that is not a repository URL', async () => {
    const source = new GitHubCommitSource({
      url: 'https://github.com/acme',
      api: fakeApi([], {}),
      maxCommits: 5,
    });

    await expect(source.fetch({ kind: 'count', count: 1 })).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
