/**
 * Prompt library.
 *
 * Prompts are Handlebars files looked up by provider, stage and (for
 * articles) style:
 *
 *   prompts/<provider>/<stage>.hbs        → prompts/default/<stage>.hbs
 *   prompts/<provider>/articles/<style>.hbs → prompts/default/articles/<style>.hbs
 *     → prompts/<provider>/articles/default.hbs → prompts/default/articles/default.hbs
 *
 * `system.hbs` is resolved the same way and becomes the system message.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Handlebars from 'handlebars';
import { ConfigError, type LlmOperation } from '@gitbrief/core';
import { assetDir } from './assets.js';

export interface RenderedPrompt {
  system: string;
  user: string;
  /** Files the two parts came from, for logging */
  sources: { system: string; user: string };
}

const DEFAULT_DIR = 'default';

export class PromptLibrary {
  readonly rootDir: string;
  private readonly hbs = Handlebars.create();
  private readonly cache = new Map<string, Handlebars.TemplateDelegate>();

  constructor(rootDir: string = assetDir('prompts')) {
    this.rootDir = rootDir;
    this.hbs.registerHelper('eq', (a: unknown, b: unknown) => a === b);
  }

  /** Candidate files for a stage, most specific first */
  candidates(provider: string, stage: LlmOperation | 'system', style = 'default'): string[] {
    if (stage === 'article') {
      const styles = style === 'default' ? ['default'] : [style, 'default'];
      return styles.flatMap((s) => [
        path.join(this.rootDir, provider, 'articles', `${s}.hbs`),
        path.join(this.rootDir, DEFAULT_DIR, 'articles', `${s}.hbs`),
      ]);
    }
    return [
      path.join(this.rootDir, provider, `${stage}.hbs`),
      path.join(this.rootDir, DEFAULT_DIR, `${stage}.hbs`),
    ];
  }

  /** First existing candidate; throws ConfigError when none exists */
  resolve(provider: string, stage: LlmOperation | 'system', style?: string): string {
    const candidates = this.candidates(provider, stage, style);
    const found = candidates.find((file) => fs.existsSync(file));
    if (!found) {
      throw new ConfigError(`No prompt template for ${provider}/${stage} (looked in ${candidates.join(', ')})`);
    }
    return found;
  }

  /** Styles available to a provider, from both its own and the default directory */
  listStyles(provider: string): string[] {
    const styles = new Set<string>();
    for (const dir of [provider, DEFAULT_DIR]) {
      const articles = path.join(this.rootDir, dir, 'articles');
      if (!fs.existsSync(articles)) continue;
      for (const file of fs.readdirSync(articles)) {
        if (file.endsWith('.hbs')) styles.add(file.slice(0, -'.hbs'.length));
      }
    }
    return [...styles].sort();
  }

  render(
    provider: string,
    stage: LlmOperation,
    context: Record<string, unknown>,
    style?: string,
  ): RenderedPrompt {
    const systemFile = this.resolve(provider, 'system', style);
    const userFile = this.resolve(provider, stage, style);
    const fullContext = { ...context, provider, stage };
    return {
      system: this.template(systemFile)(fullContext).trim(),
      user: this.template(userFile)(fullContext).trim(),
      sources: { system: systemFile, user: userFile },
    };
  }

  private template(file: string): Handlebars.TemplateDelegate {
    let compiled = this.cache.get(file);
    if (!compiled) {
      compiled = this.hbs.compile(fs.readFileSync(file, 'utf-8'), { noEscape: true });
      this.cache.set(file, compiled);
    }
    return compiled;
  }
}
