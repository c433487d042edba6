import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError } from '@gitbrief/core';
import { PromptLibrary } from '../prompts.js';
import { makeTempDir } from './helpers.js';

let root: string;

function write(relative: string, content: string): void {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

beforeEach(() => {
  root = makeTempDir();
  write('default/system.hbs', 'default system for {{stage}}');
  write('default/reduce.hbs', 'default reduce {{project}}');
  write('default/articles/default.hbs', 'default article');
  write('default/articles/technical.hbs', 'technical article');
  write('acme/reduce.hbs', 'acme reduce {{project}}');
  write('acme/articles/default.hbs', 'acme article');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('PromptLibrary', () => {
  it('prefers the provider directory and falls back to default', () => {
    const prompts = new PromptLibrary(root);

    expect(prompts.resolve('acme', 'reduce')).toBe(path.join(root, 'acme', 'reduce.hbs'));
    expect(prompts.resolve('other', 'reduce')).toBe(path.join(root, 'default', 'reduce.hbs'));
    expect(prompts.resolve('acme', 'system')).toBe(path.join(root, 'default', 'system.hbs'));
  });

  it('resolves article styles through the four-step fallback', () => {
    const prompts = new PromptLibrary(root);

    expect(prompts.candidates('acme', 'article', 'storytelling')).toEqual([
      path.join(root, 'acme', 'articles', 'storytelling.hbs'),
      path.join(root, 'default', 'articles', 'storytelling.hbs'),
      path.join(root, 'acme', 'articles', 'default.hbs'),
      path.join(root, 'default', 'articles', 'default.hbs'),
    ]);
    expect(prompts.resolve('acme', 'article', 'technical')).toBe(path.join(root, 'default', 'articles', 'technical.hbs'));
    expect(prompts.resolve('acme', 'article', 'storytelling')).toBe(path.join(root, 'acme', 'articles', 'default.hbs'));
    expect(prompts.resolve('other', 'article', 'storytelling')).toBe(
      path.join(root, 'default', 'articles', 'default.hbs'),
    );
  });

  it('throws ConfigError when no template exists', () => {
    expect(() => new PromptLibrary(root).resolve('acme', 'distill')).toThrow(ConfigError);
  });

  it('renders system and user parts with the stage in context', () => {
    const rendered = new PromptLibrary(root).render('acme', 'reduce', { project: 'widgets' });

    expect(rendered.system).toBe('default system for reduce');
    expect(rendered.user).toBe('acme reduce widgets');
    expect(rendered.sources.user).toBe(path.join(root, 'acme', 'reduce.hbs'));
  });

  it('does not HTML-escape values', () => {
    write('default/summarize_diff.hbs', '{{diff}}');
    const rendered = new PromptLibrary(root).render('acme', 'summarize_diff', { diff: 'if (a < b && c > d)' });
    expect(rendered.user).toBe('if (a < b && c > d)');
  });

  it('lists styles from the provider and default directories', () => {
    expect(new PromptLibrary(root).listStyles('acme')).toEqual(['default', 'technical']);
  });
});

describe('shipped prompts', () => {
  const prompts = new PromptLibrary();

  it('ask for a single sentence only at the summarize_diff stage', () => {
    const map = prompts.render('anthropic', 'summarize_diff', {
      commit: { shortSha: 'abc1234', author: 'Ada', message: 'fix a' },
      diff: '+x',
    });
    const reduce = prompts.render('anthropic', 'reduce', {
      project: 'widgets',
      date: '2024-05-10',
      mapLines: [],
      stats: { commits: 0, filesChanged: 0, additions: 0, deletions: 0 },
      textReport: '',
      priorMemory: '',
    });

    expect(map.system).toContain('Answer with a single sentence.');
    expect(map.user).toContain('Commit: abc1234 by Ada');
    expect(reduce.system).toContain('Do not wrap the answer in a code fence.');
    expect(reduce.system).not.toContain('single sentence');
    expect(reduce.user).toContain('(no per-commit summaries are available)');
    expect(reduce.user).not.toContain('<project_memory>');
  });

  it('use the ollama override for diff summaries', () => {
    expect(prompts.resolve('ollama', 'summarize_diff')).toBe(path.join(prompts.rootDir, 'ollama', 'summarize_diff.hbs'));
    expect(prompts.resolve('ollama', 'reduce')).toBe(path.join(prompts.rootDir, 'default', 'reduce.hbs'));
  });

  it('ship three article styles', () => {
    expect(prompts.listStyles('anthropic')).toEqual(['default', 'storytelling', 'technical']);
  });
});
