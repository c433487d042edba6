/**
 * Parsing of the option values shared by several commands.
 */

import { ConfigError, type CommitWindow } from '@gitbrief/core';
import type { ReportFormat } from '@gitbrief/report';

const FORMAT_ALIASES: Record<string, ReportFormat> = {
  html: 'html',
  markdown: 'markdown',
  md: 'markdown',
  text: 'text',
  txt: 'text',
};

/** Split a comma-separated option; undefined when the option was not given */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseFormats(value: string | undefined): ReportFormat[] | undefined {
  const names = parseList(value);
  if (!names) return undefined;

  const formats = names.map((name) => {
    const format = FORMAT_ALIASES[name.toLowerCase()];
    if (!format) {
      throw new ConfigError(`Unknown report format "${name}". Use one of: html, markdown, text`);
    }
    return format;
  });
  return [...new Set(formats)];
}

/** `--since` and `-n` are mutually exclusive; neither means the configured default */
export function parseWindow(opts: { since?: string; count?: string }): CommitWindow | undefined {
  if (opts.since !== undefined && opts.count !== undefined) {
    throw new ConfigError('Use either --since or -n/--count, not both');
  }
  if (opts.count !== undefined) {
    const count = Number(opts.count);
    if (!/^\d+$/.test(opts.count) || count < 1) {
      throw new ConfigError(`Invalid commit count "${opts.count}"`);
    }
    return { kind: 'count', count };
  }
  if (opts.since !== undefined) {
    return { kind: 'since', since: opts.since };
  }
  return undefined;
}
