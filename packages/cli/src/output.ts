/**
 * Plain-text summaries of run outcomes. Commands add colour; these
 * functions stay free of terminal escapes.
 */

import type { MemoryLogEntry } from '@gitbrief/core';
import type { RunResult, RunStatus } from '@gitbrief/report';

const STATUS_LABEL: Record<RunStatus, string> = {
  completed: 'report completed',
  no_activity: 'no commits in the window',
  failed: 'run failed',
};

export function statusLine(result: RunResult): string {
  return `${result.project}: ${STATUS_LABEL[result.status]}`;
}

/** Indented detail lines printed under the status line */
export function resultDetails(result: RunResult): string[] {
  const lines: string[] = [];

  if (result.failure) {
    const { stage, message, code } = result.failure;
    lines.push(`  Failed during ${stage}: ${message} [${code}]`);
  }

  for (const artifact of result.artifacts) {
    lines.push(`  Wrote ${artifact.path}`);
  }

  for (const delivery of result.deliveries) {
    if (delivery.ok) {
      const count = Object.keys(delivery.recipients).length;
      lines.push(`  ${delivery.channel}: delivered to ${count} recipient(s)`);
    } else {
      lines.push(`  ${delivery.channel}: not delivered (${delivery.error ?? 'unknown error'})`);
    }
  }

  for (const diagnostic of result.diagnostics) {
    lines.push(`  ! ${diagnostic.code}: ${diagnostic.message}`);
  }

  const { usage } = result;
  if (usage.calls > 0) {
    lines.push(
      `  LLM calls: ${usage.calls} (${usage.failed} failed), ~${usage.inputTokens} input / ~${usage.outputTokens} output tokens`,
    );
  }

  return lines;
}

/** One line per memory log entry, newest first */
export function historyLines(entries: readonly MemoryLogEntry[], limit: number): string[] {
  return [...entries]
    .reverse()
    .slice(0, limit)
    .map((entry) => {
      const headline = entry.summary
        .split('\n')
        .map((line) => line.trim())
        .find((line) => line.length > 0 && !line.startsWith('#'));
      return `${entry.date}  +${entry.additions} -${entry.deletions}  ${headline ?? '(empty summary)'}`;
    });
}
