/**
 * PDF export through the PrinceXML command-line tool.
 */

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import type { DocumentExporter } from '@gitbrief/core';

export interface PrinceExporterOptions {
  /** Executable name or path */
  command: string;
  stylesheet?: string;
  timeoutMs: number;
}

export class PdfExportError extends Error {
  constructor(
    public readonly inputPath: string,
    reason: string,
  ) {
    super(`PDF export of ${path.basename(inputPath)} failed: ${reason}`);
    this.name = 'PdfExportError';
  }
}

export class PrinceExporter implements DocumentExporter {
  readonly format = 'pdf' as const;
  private readonly opts: PrinceExporterOptions;

  constructor(opts: PrinceExporterOptions) {
    this.opts = opts;
  }

  /** `<dir>/<name>.html` becomes `<dir>/<name>.pdf` */
  outputPath(htmlPath: string): string {
    const parsed = path.parse(htmlPath);
    return path.join(parsed.dir, `${parsed.name}.pdf`);
  }

  export(htmlPath: string): Promise<string> {
    const output = this.outputPath(htmlPath);
    const args = [htmlPath, '-o', output];
    if (this.opts.stylesheet) {
      args.push('--style', this.opts.stylesheet);
    }

    return new Promise((resolve, reject) => {
      execFile(this.opts.command, args, { timeout: this.opts.timeoutMs, encoding: 'utf8' }, (error, _stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() || error.message;
          reject(new PdfExportError(htmlPath, detail));
          return;
        }
        resolve(output);
      });
    });
  }
}
