/**
 * Report renderer.
 *
 * HTML and Markdown come from Handlebars templates in `templates/`; the
 * plain-text report is built in code. Rendering is pure: every timestamp
 * comes from the model. Writing files is a separate step so hooks can
 * rewrite the rendered HTML first.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Handlebars from 'handlebars';
import {
  RenderFailedError,
  atomicWrite,
  dateStamp,
  timestampStamp,
} from '@gitbrief/core';
import { assetDir } from '../assets.js';
import type { ReportModel } from './model.js';
import { buildTextReport } from './text-report.js';

export type ReportFormat = 'html' | 'markdown' | 'text';

const TEMPLATE_FILES = {
  html: 'report.html.hbs',
  markdown: 'report.md.hbs',
  article: 'article.html.hbs',
} as const;

type TemplateName = keyof typeof TEMPLATE_FILES;

const EXTENSIONS: Record<ReportFormat, string> = {
  html: 'html',
  markdown: 'md',
  text: 'txt',
};

/** `<prefix>_<YYYYMMDD_HHMMSS>.<ext>` */
export function reportFileName(prefix: string, at: Date, format: ReportFormat, timeZone?: string): string {
  return `${prefix}_${timestampStamp(at, timeZone)}.${EXTENSIONS[format]}`;
}

/** `Article_<style>_<YYYYMMDD>.<ext>` */
export function articleFileName(style: string, at: Date, ext: 'md' | 'html', timeZone?: string): string {
  return `Article_${style}_${dateStamp(at, timeZone)}.${ext}`;
}

export class ReportRenderer {
  readonly templatesDir: string;
  private readonly hbs = Handlebars.create();
  private readonly cache = new Map<TemplateName, Handlebars.TemplateDelegate>();

  constructor(templatesDir: string = assetDir('templates')) {
    this.templatesDir = templatesDir;
  }

  renderHtml(model: ReportModel): string {
    return this.apply('html', model);
  }

  renderMarkdown(model: ReportModel): string {
    return this.apply('markdown', model);
  }

  renderText(model: ReportModel): string {
    return buildTextReport(model);
  }

  /** Printable HTML version of an article, the input for PDF export */
  renderArticleHtml(title: string, body: string): string {
    return this.apply('article', { title, body });
  }

  render(format: ReportFormat, model: ReportModel): string {
    switch (format) {
      case 'html':
        return this.renderHtml(model);
      case 'markdown':
        return this.renderMarkdown(model);
      case 'text':
        return this.renderText(model);
      default: {
        const _exhaustive: never = format;
        throw new RenderFailedError('report', `unknown format ${String(_exhaustive)}`);
      }
    }
  }

  /** Write one artifact into `dir` and return its path */
  write(dir: string, fileName: string, content: string): string {
    const filePath = path.join(dir, fileName);
    try {
      atomicWrite(filePath, content);
    } catch (error) {
      throw new RenderFailedError(fileName, error);
    }
    return filePath;
  }

  private apply(name: TemplateName, context: object): string {
    try {
      return this.template(name)(context);
    } catch (error) {
      if (error instanceof RenderFailedError) throw error;
      throw new RenderFailedError(TEMPLATE_FILES[name], error);
    }
  }

  private template(name: TemplateName): Handlebars.TemplateDelegate {
    let compiled = this.cache.get(name);
    if (!compiled) {
      const file = path.join(this.templatesDir, TEMPLATE_FILES[name]);
      let source: string;
      try {
        source = fs.readFileSync(file, 'utf-8');
      } catch (error) {
        throw new RenderFailedError(TEMPLATE_FILES[name], error);
      }
      // Markdown output is not HTML-escaped
      compiled = this.hbs.compile(source, { noEscape: name === 'markdown' });
      this.cache.set(name, compiled);
    }
    return compiled;
  }
}

export { buildTextReport } from './text-report.js';
export { buildReportModel, groupByAuthor, type AuthorGroup, type CommitLine, type ReportModel, type ReportModelInput } from './model.js';
