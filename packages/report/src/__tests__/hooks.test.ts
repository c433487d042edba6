import { describe, it, expect } from 'vitest';
import { Logger } from '@gitbrief/core';
import {
  createBuiltinHooks,
  footerHook,
  redact,
  stripMarkdownFence,
} from '../hooks/builtin.js';
import { HookManager, type HookContext } from '../hooks/manager.js';

const ctx: HookContext = { project: 'widgets', logger: new Logger() };

describe('HookManager', () => {
  it('runs hooks in registration order, each on the previous result', async () => {
    const manager = new HookManager()
      .register('post-reduce', { name: 'upper', run: (s) => s.toUpperCase() })
      .register('post-reduce', { name: 'suffix', run: (s) => `${s}!` });

    const { payload, diagnostics } = await manager.run('post-reduce', 'done', ctx);

    expect(payload).toBe('DONE!');
    expect(diagnostics).toEqual([]);
    expect(manager.list('post-reduce')).toEqual(['upper', 'suffix']);
  });

  it('skips a failing hook and carries the previous payload on', async () => {
    const manager = new HookManager()
      .register('post-map', { name: 'first', run: (lines) => lines.map((l) => `${l}.`) })
      .register('post-map', {
        name: 'broken',
        run: () => {
          throw new Error('boom');
        },
      })
      .register('post-map', { name: 'last', run: (lines) => [...lines, 'tail'] });

    const { payload, diagnostics } = await manager.run('post-map', ['a', 'b'], ctx);

    expect(payload).toEqual(['a.', 'b.', 'tail']);
    expect(diagnostics).toEqual([
      { code: 'HOOK_FAILED', stage: 'mapping', message: 'Hook "broken" at post-map failed: boom' },
    ]);
  });

  it('hands each hook its own copy of the payload', async () => {
    const original = ['a'];
    const manager = new HookManager()
      .register('post-map', {
        name: 'mutate-then-throw',
        run: (lines) => {
          lines.push('leaked');
          throw new Error('after mutating');
        },
      });

    const { payload } = await manager.run('post-map', original, ctx);

    expect(payload).toEqual(['a']);
    expect(original).toEqual(['a']);
  });

  it('awaits async hooks', async () => {
    const manager = new HookManager().register('post-render', {
      name: 'async',
      run: async (html) => html.replace('x', 'y'),
    });
    expect((await manager.run('post-render', '<p>x</p>', ctx)).payload).toBe('<p>y</p>');
  });
});

describe('built-in hooks', () => {
  it('strips a wrapping markdown fence', () => {
    expect(stripMarkdownFence('```markdown\n## Summary\nDone.\n```')).toBe('## Summary\nDone.');
    expect(stripMarkdownFence('```\nplain\n```')).toBe('plain');
    expect(stripMarkdownFence('## Summary\n`code`')).toBe('## Summary\n`code`');
  });

  it('redacts terms regardless of case', () => {
    expect(redact('Deployed to ACME prod (acme.internal)', ['acme'])).toBe('Deployed to *** prod (***.internal)');
    expect(redact('a+b', ['a+b'])).toBe('***');
    expect(redact('unchanged', [])).toBe('unchanged');
  });

  it('inserts an escaped footer before </body>', async () => {
    const hook = footerHook('Sent by <bot>');
    expect(await hook.run('<html><body><h1>R</h1></body></html>', ctx)).toBe(
      '<html><body><h1>R</h1><p class="report-footer">Sent by &lt;bot&gt;</p>\n</body></html>',
    );
  });

  it('inserts dollar signs in the footer literally', async () => {
    const hook = footerHook("Costs $' and $& apply");
    expect(await hook.run('<html><body></body></html>', ctx)).toBe(
      "<html><body><p class=\"report-footer\">Costs $' and $&amp; apply</p>\n</body></html>",
    );
  });

  it('registers only what the config enables', () => {
    const none = createBuiltinHooks({ cleanOutput: false, redactTerms: [] });
    expect(none.list('post-reduce')).toEqual([]);

    const all = createBuiltinHooks({ cleanOutput: true, redactTerms: ['secret'], footer: 'bye' });
    expect(all.list('post-map')).toEqual(['redact']);
    expect(all.list('post-reduce')).toEqual(['clean-output', 'redact']);
    expect(all.list('post-render')).toEqual(['footer']);
  });
});
