/**
 * Per-project memory on disk.
 *
 *   <dataDir>/projects/<project>/project_log.jsonl   one entry per line, append-only
 *   <dataDir>/projects/<project>/project_memory.md   distilled view of the log
 *
 * The log is the source of truth; the memory document can always be
 * regenerated from it.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  MemoryOrderError,
  MemoryWriteError,
  atomicWrite,
  getLogger,
  readFileSafe,
  type Logger,
  type MemoryLogEntry,
} from '@gitbrief/core';

export const LOG_FILENAME = 'project_log.jsonl';
export const MEMORY_FILENAME = 'project_memory.md';

const entrySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  summary: z.string(),
  additions: z.number().int().min(0),
  deletions: z.number().int().min(0),
  magnitude: z.number().int().min(0),
});

export interface LogReadResult {
  entries: MemoryLogEntry[];
  /** 1-based line numbers that could not be parsed */
  skippedLines: number[];
}

export class MemoryStore {
  readonly dir: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger = getLogger()) {
    this.dir = dir;
    this.logger = logger;
  }

  get logPath(): string {
    return path.join(this.dir, LOG_FILENAME);
  }

  get memoryPath(): string {
    return path.join(this.dir, MEMORY_FILENAME);
  }

  /**
   * Append one entry. Entries dated before the last one are rejected with
   * MemoryOrderError; I/O failures surface as MemoryWriteError.
   */
  append(entry: MemoryLogEntry): void {
    const parsed = entrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new MemoryWriteError(this.logPath, `invalid entry: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const { entries } = this.readLog();
    const last = entries[entries.length - 1];
    if (last && entry.date < last.date) {
      throw new MemoryOrderError(entry.date, last.date);
    }

    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.appendFileSync(this.logPath, JSON.stringify(parsed.data) + '\n', 'utf-8');
    } catch (error) {
      throw new MemoryWriteError(this.logPath, error);
    }
    this.logger.info('memory', `Appended log entry for ${entry.date}`, { magnitude: entry.magnitude });
  }

  /** Every valid entry in file order; malformed lines are skipped */
  readAll(): MemoryLogEntry[] {
    return this.readLog().entries;
  }

  readLog(): LogReadResult {
    const raw = readFileSafe(this.logPath);
    if (raw === null) return { entries: [], skippedLines: [] };

    const entries: MemoryLogEntry[] = [];
    const skippedLines: number[] = [];

    raw.split('\n').forEach((line, i) => {
      if (!line.trim()) return;
      const parsed = entrySchema.safeParse(parseJson(line));
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        skippedLines.push(i + 1);
      }
    });

    if (skippedLines.length > 0) {
      this.logger.warn('memory', `Skipped malformed log lines in ${this.logPath}`, { lines: skippedLines });
    }
    return { entries, skippedLines };
  }

  /** The distilled memory document, '' when none exists */
  readMemory(): string {
    return readFileSafe(this.memoryPath) ?? '';
  }

  /** Replace the memory document atomically */
  writeMemory(document: string): void {
    try {
      atomicWrite(this.memoryPath, document);
    } catch (error) {
      throw new MemoryWriteError(this.memoryPath, error);
    }
    this.logger.info('memory', `Rewrote ${MEMORY_FILENAME}`, { chars: document.length });
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
