/**
 * Plain-text report: the Reduce input and the fallback message body.
 */

import type { ReportModel } from './model.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export function buildTextReport(model: ReportModel): string {
  const { stats } = model;
  const lines = [
    RULE,
    `${model.title}: ${model.project}`,
    RULE,
    `Generated: ${model.generatedAt}`,
    `Window: ${model.windowLabel}`,
    `Commits: ${stats.commits}`,
    `Changes: +${stats.additions} -${stats.deletions} (files changed: ${stats.filesChanged})`,
    '',
  ];

  if (model.authors.length === 0) {
    lines.push('No commits found.');
  }

  for (const group of model.authors) {
    lines.push(`Author: ${group.author} (${group.commits.length} commit${group.commits.length === 1 ? '' : 's'})`);
    lines.push('-'.repeat(40));
    for (const commit of group.commits) {
      const refs = commit.refs.length > 0 ? ` (${commit.refs.join(', ')})` : '';
      const merge = commit.isMerge ? ' [merge]' : '';
      lines.push(`${commit.shortSha}${refs} - ${commit.message}${merge} (${commit.time})`);
    }
    lines.push('');
  }

  if (model.files.length > 0) {
    lines.push(RULE, 'File changes', RULE);
    lines.push(` ${'added'.padEnd(7)} | ${'removed'.padEnd(7)} | file`);
    lines.push(THIN_RULE);
    for (const file of model.files) {
      const noise = file.significant ? '' : ' [excluded]';
      lines.push(` +${String(file.additions).padEnd(6)} | -${String(file.deletions).padEnd(6)} | ${file.path}${noise}`);
    }
    lines.push(THIN_RULE);
  }

  lines.push(RULE);
  return lines.join('\n');
}
