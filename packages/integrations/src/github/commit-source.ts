/**
 * CommitSource backed by the GitHub REST API.
 *
 * The commits endpoint carries no file statistics, so each listed commit
 * costs one extra detail request. Patches from that request are kept to
 * answer `getDiff` without a second round trip.
 */

import {
  ConfigError,
  SourceUnavailableError,
  describeError,
  type Commit,
  type CommitSource,
  type CommitWindow,
  type FileChange,
  type GitBriefConfig,
} from '@gitbrief/core';
import type { Env } from '../delivery.js';
import {
  buildDiffFromFiles,
  createGitHubClient,
  createOctokitCommitApi,
  parseRepoUrl,
  type GitHubCommitApi,
  type RemoteCommitFile,
  type RepoRef,
} from './api.js';

export interface GitHubCommitSourceOptions {
  url: string;
  api: GitHubCommitApi;
  /** Upper bound on commits fetched per run */
  maxCommits: number;
  now?: () => Date;
}

const UNIT_MS: Record<string, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
  week: 7 * 86_400_000,
  month: 30 * 86_400_000,
};

/**
 * Translate a `git log --since` phrase into an ISO timestamp.
 * Accepts "N unit(s) ago", "yesterday" and anything Date can parse.
 */
export function parseSincePhrase(phrase: string, now: Date): string {
  const text = phrase.trim().toLowerCase();
  if (text === 'yesterday') {
    return new Date(now.getTime() - UNIT_MS.day).toISOString();
  }

  const relative = text.match(/^(\d+)\s*(minute|hour|day|week|month)s?(?:\s+ago)?$/);
  if (relative) {
    return new Date(now.getTime() - parseInt(relative[1], 10) * UNIT_MS[relative[2]]).toISOString();
  }

  const absolute = new Date(phrase);
  if (!Number.isNaN(absolute.getTime())) {
    return absolute.toISOString();
  }

  throw new ConfigError(`Cannot interpret "${phrase}" as a time window`);
}

export class GitHubCommitSource implements CommitSource {
  readonly kind = 'github' as const;
  readonly order = 'newest-first' as const;
  readonly location: string;
  private readonly api: GitHubCommitApi;
  private readonly maxCommits: number;
  private readonly now: () => Date;
  private readonly patches = new Map<string, string>();

  constructor(opts: GitHubCommitSourceOptions) {
    this.location = opts.url;
    this.api = opts.api;
    this.maxCommits = opts.maxCommits;
    this.now = opts.now ?? (() => new Date());
  }

  async validate(): Promise<void> {
    const ref = this.repoRef();
    try {
      await this.api.getRepository(ref);
    } catch (error) {
      throw new SourceUnavailableError(this.location, describeError(error));
    }
  }

  async fetch(window: CommitWindow): Promise<Commit[]> {
    const ref = this.repoRef();
    const since = window.kind === 'since' ? parseSincePhrase(window.since, this.now()) : undefined;
    const limit = window.kind === 'count' ? Math.min(window.count, this.maxCommits) : this.maxCommits;

    try {
      const listed = await this.api.listCommits(ref, { since, limit });
      const commits: Commit[] = [];

      for (const remote of listed) {
        const files = await this.api.getCommitFiles(ref, remote.sha);
        this.patches.set(remote.sha, buildDiffFromFiles(files));
        commits.push({
          sha: remote.sha,
          shortSha: remote.sha.slice(0, 7),
          author: remote.author,
          authorEmail: remote.email,
          timestamp: remote.date,
          // The subject line, as `git log %s` would give it
          message: remote.message.split('\n', 1)[0] ?? '',
          refs: [],
          isMerge: remote.parentCount > 1,
          files: files.map(toFileChange),
        });
      }

      return commits;
    } catch (error) {
      throw new SourceUnavailableError(this.location, describeError(error));
    }
  }

  async getDiff(commit: Commit): Promise<string> {
    const cached = this.patches.get(commit.sha);
    if (cached !== undefined) return cached;

    const files = await this.api.getCommitFiles(this.repoRef(), commit.sha);
    const diff = buildDiffFromFiles(files);
    this.patches.set(commit.sha, diff);
    return diff;
  }

  async getReadme(): Promise<string | null> {
    return this.api.getReadme(this.repoRef());
  }

  private repoRef(): RepoRef {
    const ref = parseRepoUrl(this.location);
    if (!ref) {
      throw new SourceUnavailableError(this.location, 'not a recognised GitHub repository URL');
    }
    return ref;
  }
}

function toFileChange(file: RemoteCommitFile): FileChange {
  // GitHub omits the patch for binary files (and for very large ones)
  const binary = file.patch === undefined && file.additions === 0 && file.deletions === 0;
  return {
    path: file.filename,
    additions: file.additions,
    deletions: file.deletions,
    binary,
    significant: false,
  };
}

/** Build a GitHub source with the token named by `source.githubTokenEnv` */
export function createGitHubCommitSource(
  url: string,
  config: GitBriefConfig,
  env: Env,
  now?: () => Date,
): GitHubCommitSource {
  const octokit = createGitHubClient({
    token: env[config.source.githubTokenEnv],
    baseUrl: config.source.githubBaseUrl,
  });
  return new GitHubCommitSource({
    url,
    api: createOctokitCommitApi(octokit),
    maxCommits: config.source.maxCommits,
    now,
  });
}
