/**
 * Change filter.
 *
 * Classifies each changed file as significant or noise. Noise files stay in
 * the commit's file inventory (flagged) but are dropped from statistics and
 * from the diff text sent to the model.
 */

import * as path from 'node:path';
import {
  splitDiffByFile,
  type ChangeStats,
  type Commit,
  type FileChange,
  type FileStat,
  type GitBriefConfig,
} from '@gitbrief/core';

export type FilterRules = GitBriefConfig['filter'];

/** Returns true when the change is noise */
export type NoiseRule = (change: Pick<FileChange, 'path' | 'binary'>) => boolean;

// ─── Rules ────────────────────────────────────────────────────────

export function suffixRule(suffixes: readonly string[]): NoiseRule {
  const lowered = suffixes.map((s) => s.toLowerCase());
  return (change) => {
    const p = change.path.toLowerCase();
    return lowered.some((suffix) => p.endsWith(suffix));
  };
}

/** Matches a directory name at any depth: `dist/a.js` and `pkg/dist/a.js` */
export function directoryRule(directories: readonly string[]): NoiseRule {
  const names = new Set(directories.map((d) => d.replace(/\/+$/, '')));
  return (change) => {
    const segments = change.path.split('/').slice(0, -1);
    return segments.some((segment) => names.has(segment));
  };
}

export function basenameRule(basenames: readonly string[]): NoiseRule {
  const names = new Set(basenames);
  return (change) => names.has(path.posix.basename(change.path));
}

export const binaryRule: NoiseRule = (change) => change.binary;

// ─── Filter ───────────────────────────────────────────────────────

export interface FilterResult {
  /** Every change, with `significant` set */
  all: FileChange[];
  significant: FileChange[];
  stats: Omit<ChangeStats, 'commits'>;
}

export class ChangeFilter {
  private readonly rules: NoiseRule[];

  constructor(config: FilterRules) {
    this.rules = [suffixRule(config.suffixes), directoryRule(config.directories), basenameRule(config.basenames)];
    if (config.excludeBinary) {
      this.rules.push(binaryRule);
    }
  }

  isNoise(change: Pick<FileChange, 'path' | 'binary'>): boolean {
    return this.rules.some((rule) => rule(change));
  }

  /** Returns new FileChange objects; the input is not touched */
  classify(changes: readonly FileChange[]): FilterResult {
    const all = changes.map((change) => ({ ...change, significant: !this.isNoise(change) }));
    const significant = all.filter((c) => c.significant);
    return {
      all,
      significant,
      stats: {
        filesChanged: significant.length,
        additions: significant.reduce((sum, c) => sum + c.additions, 0),
        deletions: significant.reduce((sum, c) => sum + c.deletions, 0),
      },
    };
  }

  /** A copy of the commit with every file classified */
  filterCommit(commit: Commit): Commit {
    return { ...commit, files: this.classify(commit.files).all };
  }

  /** Drop the sections of noise files (and binary sections) from a unified diff */
  filterDiff(diff: string): string {
    return splitDiffByFile(diff)
      .filter((section) => !section.binary && !this.isNoise({ path: section.filePath, binary: false }))
      .map((section) => section.text)
      .join('');
  }
}

// ─── Aggregation ──────────────────────────────────────────────────

/** Totals over the significant files of already-filtered commits */
export function aggregateStats(commits: readonly Commit[]): ChangeStats {
  const paths = new Set<string>();
  let additions = 0;
  let deletions = 0;

  for (const commit of commits) {
    for (const file of commit.files) {
      if (!file.significant) continue;
      paths.add(file.path);
      additions += file.additions;
      deletions += file.deletions;
    }
  }

  return { commits: commits.length, filesChanged: paths.size, additions, deletions };
}

/** Per-path totals across commits, noise included (flagged), sorted by path */
export function buildFileStats(commits: readonly Commit[]): FileStat[] {
  const byPath = new Map<string, FileStat>();

  for (const commit of commits) {
    for (const file of commit.files) {
      const stat = byPath.get(file.path) ?? {
        path: file.path,
        additions: 0,
        deletions: 0,
        commits: 0,
        significant: file.significant,
      };
      stat.additions += file.additions;
      stat.deletions += file.deletions;
      stat.commits += 1;
      byPath.set(file.path, stat);
    }
  }

  return [...byPath.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
