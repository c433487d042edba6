/**
 * GitHub API client wrapper.
 * Provides typed functions for reading commit history, per-commit file
 * patches and README contents through Octokit.
 */

import { Octokit } from '@octokit/rest';

// ─── Types ────────────────────────────────────────────────────────

/** Options for creating a GitHub API client */
export interface GitHubClientOptions {
  /** Personal access token; anonymous access works for public repositories */
  token?: string;
  /** Optional base URL for GitHub Enterprise */
  baseUrl?: string;
}

/** Repository owner and name pair */
export interface RepoRef {
  owner: string;
  repo: string;
}

/** A commit as listed by the commits endpoint */
export interface RemoteCommit {
  sha: string;
  author: string;
  email: string;
  date: string;
  message: string;
  parentCount: number;
}

/** A changed file of a single commit */
export interface RemoteCommitFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}

/** The subset of the REST API a commit source needs */
export interface GitHubCommitApi {
  getRepository(ref: RepoRef): Promise<{ fullName: string; defaultBranch: string }>;
  listCommits(ref: RepoRef, opts: { since?: string; limit: number }): Promise<RemoteCommit[]>;
  getCommitFiles(ref: RepoRef, sha: string): Promise<RemoteCommitFile[]>;
  getReadme(ref: RepoRef): Promise<string | null>;
}

// ─── Client ──────────────────────────────────────────────────────

/** Create a configured Octokit instance */
export function createGitHubClient(options: GitHubClientOptions): Octokit {
  return new Octokit({
    ...(options.token ? { auth: options.token } : {}),
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
  });
}

/**
 * Parse `https://host/owner/repo(.git)` and `git@host:owner/repo(.git)`.
 * Returns null for anything else.
 */
export function parseRepoUrl(url: string): RepoRef | null {
  const match = url
    .trim()
    .replace(/\/+$/, '')
    .match(/^(?:https?:\/\/[^/]+\/|git@[^:]+:)([^/\s]+)\/([^/\s]+?)(?:\.git)?$/);
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}

// ─── API Functions ───────────────────────────────────────────────

/** Wrap an Octokit instance in the GitHubCommitApi interface */
export function createOctokitCommitApi(octokit: Octokit): GitHubCommitApi {
  return {
    async getRepository(ref) {
      const { data } = await octokit.repos.get({ owner: ref.owner, repo: ref.repo });
      return { fullName: data.full_name, defaultBranch: data.default_branch };
    },

    async listCommits(ref, opts) {
      const commits: RemoteCommit[] = [];
      const perPage = Math.min(opts.limit, 100);

      for (let page = 1; commits.length < opts.limit; page++) {
        const { data } = await octokit.repos.listCommits({
          owner: ref.owner,
          repo: ref.repo,
          per_page: perPage,
          page,
          ...(opts.since ? { since: opts.since } : {}),
        });

        for (const item of data) {
          commits.push({
            sha: item.sha,
            author: item.commit.author?.name ?? 'unknown',
            email: item.commit.author?.email ?? '',
            date: item.commit.author?.date ?? item.commit.committer?.date ?? '',
            message: item.commit.message,
            parentCount: item.parents.length,
          });
        }

        if (data.length < perPage) break;
      }

      return commits.slice(0, opts.limit);
    },

    async getCommitFiles(ref, sha) {
      const { data } = await octokit.repos.getCommit({ owner: ref.owner, repo: ref.repo, ref: sha });
      return (data.files ?? []).map((file) => ({
        filename: file.filename,
        status: file.status,
        additions: file.additions,
        deletions: file.deletions,
        patch: file.patch,
      }));
    },

    async getReadme(ref) {
      try {
        const { data } = await octokit.repos.getReadme({ owner: ref.owner, repo: ref.repo });
        return Buffer.from(data.content, 'base64').toString('utf-8');
      } catch (error) {
        // 404 means no README, which is not an error condition
        if (isOctokitError(error) && error.status === 404) {
          return null;
        }
        throw error;
      }
    },
  };
}

// ─── Helpers ─────────────────────────────────────────────────────

/** Rebuild a unified diff from per-file patches */
export function buildDiffFromFiles(files: readonly RemoteCommitFile[]): string {
  return files
    .filter((file) => file.patch !== undefined)
    .map((file) =>
      [
        `diff --git a/${file.filename} b/${file.filename}`,
        `--- a/${file.filename}`,
        `+++ b/${file.filename}`,
        file.patch ?? '',
      ].join('\n'),
    )
    .join('\n');
}

export function isOctokitError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}
