/**
 * The structure every report format is rendered from.
 */

import {
  formatDateTime,
  type ChangeStats,
  type Commit,
  type FileStat,
} from '@gitbrief/core';
import { buildFileStats } from '../filter.js';

export interface CommitLine {
  shortSha: string;
  /** YYYY-MM-DD HH:MM:SS in the run's zone */
  time: string;
  message: string;
  refs: string[];
  isMerge: boolean;
  additions: number;
  deletions: number;
}

export interface AuthorGroup {
  author: string;
  email: string;
  commits: CommitLine[];
  additions: number;
  deletions: number;
}

export interface ReportModel {
  title: string;
  project: string;
  date: string;
  generatedAt: string;
  windowLabel: string;
  /** Provider that wrote the summary, null in no-AI runs */
  provider: string | null;
  summary: string | null;
  stats: ChangeStats;
  files: FileStat[];
  noiseFileCount: number;
  authors: AuthorGroup[];
}

export interface ReportModelInput {
  title: string;
  project: string;
  date: string;
  now: Date;
  /** Zone for every time shown; host time when omitted */
  timeZone?: string;
  windowLabel: string;
  provider: string | null;
  summary: string | null;
  stats: ChangeStats;
  /** Filtered commits, newest first as the source returned them */
  commits: readonly Commit[];
}

export function buildReportModel(input: ReportModelInput): ReportModel {
  const files = buildFileStats(input.commits);
  return {
    title: input.title,
    project: input.project,
    date: input.date,
    generatedAt: formatDateTime(input.now, input.timeZone),
    windowLabel: input.windowLabel,
    provider: input.provider,
    summary: input.summary,
    stats: input.stats,
    files,
    noiseFileCount: files.filter((f) => !f.significant).length,
    authors: groupByAuthor(input.commits, input.timeZone),
  };
}

/** Authors in order of first appearance; their commits keep source order */
export function groupByAuthor(commits: readonly Commit[], timeZone?: string): AuthorGroup[] {
  const groups = new Map<string, AuthorGroup>();

  for (const commit of commits) {
    const group = groups.get(commit.author) ?? {
      author: commit.author,
      email: commit.authorEmail,
      commits: [],
      additions: 0,
      deletions: 0,
    };

    const significant = commit.files.filter((f) => f.significant);
    const additions = significant.reduce((sum, f) => sum + f.additions, 0);
    const deletions = significant.reduce((sum, f) => sum + f.deletions, 0);

    group.commits.push({
      shortSha: commit.shortSha,
      time: formatDateTime(new Date(commit.timestamp), timeZone),
      message: commit.message,
      refs: commit.refs,
      isMerge: commit.isMerge,
      additions,
      deletions,
    });
    group.additions += additions;
    group.deletions += deletions;
    groups.set(commit.author, group);
  }

  return [...groups.values()];
}
