/**
 * Git helper utilities using simple-git.
 * Provides log, numstat and diff access for local repositories.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import type { Commit, CommitWindow, FileChange } from './types.js';

/** Create a git client for the given directory */
export function createGitClient(cwd: string): SimpleGit {
  return simpleGit(cwd);
}

/** Check if a directory is a git repository */
export async function isGitRepo(dir: string): Promise<boolean> {
  const git = simpleGit(dir);
  try {
    await git.revparse(['--git-dir']);
    return true;
  } catch {
    return false;
  }
}

// ─── Log ────────────────────────────────────────────────────────────

const RECORD_SEP = '\x1e';
const FIELD_SEP = '\x1f';

/** sha, short sha, author, email, ISO date, parents, ref names, subject */
const LOG_FORMAT = `--format=${RECORD_SEP}%H${FIELD_SEP}%h${FIELD_SEP}%an${FIELD_SEP}%ae${FIELD_SEP}%aI${FIELD_SEP}%P${FIELD_SEP}%D${FIELD_SEP}%s`;

/** Translate a commit window into `git log` arguments */
export function windowArgs(window: CommitWindow): string[] {
  switch (window.kind) {
    case 'since':
      return [`--since=${window.since}`];
    case 'count':
      return [`--max-count=${window.count}`];
    default: {
      const _exhaustive: never = window;
      throw new Error(`Unknown commit window: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** Commits in the window with per-file numstat, newest first (git's order) */
export async function getCommitLog(git: SimpleGit, window: CommitWindow): Promise<Commit[]> {
  const raw = await git.raw(['log', '--numstat', '--no-color', LOG_FORMAT, ...windowArgs(window)]);
  return parseNumstatLog(raw);
}

/**
 * Parse the output of `git log --numstat` run with LOG_FORMAT.
 * Binary files appear in numstat as `-\t-\tpath`.
 */
export function parseNumstatLog(raw: string): Commit[] {
  const commits: Commit[] = [];

  for (const record of raw.split(RECORD_SEP)) {
    if (!record.trim()) continue;

    const lines = record.split('\n');
    const fields = lines[0]?.split(FIELD_SEP) ?? [];
    if (fields.length < 8) continue;

    const [sha, shortSha, author, authorEmail, timestamp, parents, refNames] = fields;
    const message = fields.slice(7).join(FIELD_SEP);
    const files: FileChange[] = [];

    for (const line of lines.slice(1)) {
      const match = line.match(/^(\d+|-)\t(\d+|-)\t(.+)$/);
      if (!match) continue;
      const binary = match[1] === '-' && match[2] === '-';
      files.push({
        path: resolveRenamedPath(match[3]),
        additions: binary ? 0 : parseInt(match[1], 10),
        deletions: binary ? 0 : parseInt(match[2], 10),
        binary,
        significant: false,
      });
    }

    commits.push({
      sha,
      shortSha,
      author,
      authorEmail,
      timestamp,
      message,
      refs: parseRefNames(refNames),
      isMerge: parents.split(' ').filter(Boolean).length > 1,
      files,
    });
  }

  return commits;
}

/** `src/{old => new}/a.ts` and `old.ts => new.ts` resolve to the new path */
export function resolveRenamedPath(numstatPath: string): string {
  const braced = numstatPath.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braced) {
    return `${braced[1]}${braced[3]}${braced[4]}`.replace(/\/\//g, '/');
  }
  const plain = numstatPath.split(' => ');
  return plain.length === 2 ? plain[1] : numstatPath;
}

function parseRefNames(refNames: string): string[] {
  return refNames
    .split(',')
    .map((ref) => ref.trim().replace(/^HEAD -> /, '').replace(/^tag: /, ''))
    .filter((ref) => ref.length > 0 && ref !== 'HEAD');
}

// ─── Diff ───────────────────────────────────────────────────────────

/** Get the unified diff a commit introduced (merge commits yield an empty diff) */
export async function getCommitDiff(git: SimpleGit, commitSha: string): Promise<string> {
  return git.raw(['show', commitSha, '--format=', '--no-color', '--unified=3']);
}

/** One file's section of a unified diff */
export interface DiffSection {
  filePath: string;
  oldPath?: string;
  binary: boolean;
  /** The section text including its `diff --git` header */
  text: string;
}

/** Split a unified diff string into per-file sections */
export function splitDiffByFile(raw: string): DiffSection[] {
  const sections: DiffSection[] = [];
  const fileSections = raw.split(/^diff --git /m).filter((s) => s.trim().length > 0);

  for (const section of fileSections) {
    const header = section.split('\n', 1)[0] ?? '';
    const headerMatch = header.match(/a\/(.+) b\/(.+)/);
    if (!headerMatch) continue;

    const oldPath = headerMatch[1];
    const newPath = headerMatch[2];

    sections.push({
      filePath: newPath,
      oldPath: oldPath !== newPath ? oldPath : undefined,
      binary: /^(Binary files .* differ|GIT binary patch)$/m.test(section) || section.includes('\0'),
      text: `diff --git ${section}`,
    });
  }

  return sections;
}
