/**
 * Hooks enabled from the `hooks` config section.
 */

import type { GitBriefConfig } from '@gitbrief/core';
import { escapeHtml } from '@gitbrief/integrations';
import { HookManager, type Hook } from './manager.js';

const FENCE_START = /^```(?:markdown|md)?[ \t]*\r?\n/i;
const FENCE_END = /\r?\n?```$/;

/** Strip a code fence wrapped around the whole answer */
export function stripMarkdownFence(text: string): string {
  const trimmed = text.trim();
  if (!FENCE_START.test(trimmed)) return trimmed;
  return trimmed.replace(FENCE_START, '').replace(FENCE_END, '').trim();
}

export const cleanOutputHook: Hook<'post-reduce'> = {
  name: 'clean-output',
  run: (summary) => stripMarkdownFence(summary),
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Replace every configured term, ignoring case, with *** */
export function redact(text: string, terms: readonly string[]): string {
  const active = terms.filter((t) => t.length > 0);
  if (active.length === 0) return text;
  const pattern = new RegExp(active.map(escapeRegExp).join('|'), 'gi');
  return text.replace(pattern, '***');
}

export function redactLinesHook(terms: readonly string[]): Hook<'post-map'> {
  return { name: 'redact', run: (lines) => lines.map((line) => redact(line, terms)) };
}

export function redactSummaryHook(terms: readonly string[]): Hook<'post-reduce'> {
  return { name: 'redact', run: (summary) => redact(summary, terms) };
}

/** Insert a footer paragraph before </body> */
export function footerHook(footer: string): Hook<'post-render'> {
  const html = `<p class="report-footer">${escapeHtml(footer)}</p>`;
  return {
    name: 'footer',
    run: (document) =>
      document.includes('</body>') ? document.replace('</body>', () => `${html}\n</body>`) : `${document}\n${html}`,
  };
}

/** A manager holding the built-in hooks the config enables */
export function createBuiltinHooks(config: GitBriefConfig['hooks']): HookManager {
  const manager = new HookManager();
  if (config.cleanOutput) {
    manager.register('post-reduce', cleanOutputHook);
  }
  if (config.redactTerms.length > 0) {
    manager.register('post-map', redactLinesHook(config.redactTerms));
    manager.register('post-reduce', redactSummaryHook(config.redactTerms));
  }
  if (config.footer) {
    manager.register('post-render', footerHook(config.footer));
  }
  return manager;
}
