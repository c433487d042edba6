/**
 * CommitSource over a local clone, through simple-git.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { SimpleGit } from 'simple-git';
import {
  SourceUnavailableError,
  createGitClient,
  describeError,
  getCommitDiff,
  getCommitLog,
  isGitRepo,
  isRemoteLocation,
  readFileSafe,
  type Commit,
  type CommitSource,
  type CommitWindow,
  type GitBriefConfig,
} from '@gitbrief/core';
import { createGitHubCommitSource, type Env } from '@gitbrief/integrations';

const README_NAMES = ['README.md', 'readme.md', 'README.rst', 'README.txt', 'README'];

export class LocalGitSource implements CommitSource {
  readonly kind = 'local' as const;
  // git log default
  readonly order = 'newest-first' as const;
  readonly location: string;
  private git: SimpleGit | null = null;

  constructor(location: string) {
    this.location = path.resolve(location);
  }

  async validate(): Promise<void> {
    if (!fs.existsSync(this.location)) {
      throw new SourceUnavailableError(this.location, 'directory does not exist');
    }
    if (!(await isGitRepo(this.location))) {
      throw new SourceUnavailableError(this.location, 'not a git repository');
    }
  }

  async fetch(window: CommitWindow): Promise<Commit[]> {
    try {
      return await getCommitLog(this.client(), window);
    } catch (error) {
      throw new SourceUnavailableError(this.location, describeError(error));
    }
  }

  async getDiff(commit: Commit): Promise<string> {
    return getCommitDiff(this.client(), commit.sha);
  }

  async getReadme(): Promise<string | null> {
    for (const name of README_NAMES) {
      const content = readFileSafe(path.join(this.location, name));
      if (content !== null) return content;
    }
    return null;
  }

  /** simple-git throws on a missing directory, so the client is built on first use */
  private client(): SimpleGit {
    if (!this.git) {
      this.git = createGitClient(this.location);
    }
    return this.git;
  }
}

/** GitHub for http(s) and scp-style URLs, a local clone for everything else */
export function createCommitSource(
  location: string,
  config: GitBriefConfig,
  env: Env,
  now?: () => Date,
): CommitSource {
  if (isRemoteLocation(location)) {
    return createGitHubCommitSource(location, config, env, now);
  }
  return new LocalGitSource(location);
}
