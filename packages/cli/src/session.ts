/**
 * Per-invocation setup shared by the commands: `.env`, `.gitbrief.yml` and
 * the session log file under `<dataDir>/logs`.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import dotenv from 'dotenv';
import {
  formatLogLine,
  initLogger,
  loadConfig,
  type GitBriefConfig,
  type LogEntry,
  type Logger,
} from '@gitbrief/core';

export interface SessionOptions {
  /** Directory holding .gitbrief.yml and .env */
  path: string;
  /** Echo every log entry to stderr */
  verbose?: boolean;
}

export interface Session {
  baseDir: string;
  config: GitBriefConfig;
  env: Readonly<Record<string, string | undefined>>;
  logger: Logger;
}

export function openSession(opts: SessionOptions, label = 'run'): Session {
  const baseDir = path.resolve(opts.path);

  // Variables already set in the environment win over .env
  dotenv.config({ path: path.join(baseDir, '.env') });

  const config = loadConfig(baseDir);
  const logger = initLogger({
    logDir: path.join(baseDir, config.dataDir, 'logs'),
    fileLabel: label,
    onLog: opts.verbose ? echo : undefined,
  });

  return { baseDir, config, env: process.env, logger };
}

function echo(entry: LogEntry): void {
  const paint = entry.level === 'error' ? chalk.red : entry.level === 'warn' ? chalk.yellow : chalk.gray;
  console.error(paint(formatLogLine(entry)));
}
