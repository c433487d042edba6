/**
 * `gitbrief history` command: show a project's memory log.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig, projectDataDir, resolveProject } from '@gitbrief/core';
import { MemoryStore } from '@gitbrief/report';
import { historyLines } from '../output.js';

interface HistoryOptions {
  project: string;
  limit: string;
  memory?: boolean;
  json?: boolean;
  path: string;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description("Show a project's daily summaries, newest first")
    .requiredOption('-p, --project <alias>', 'Project alias, repository path or URL')
    .option('--limit <n>', 'Number of entries to show', '10')
    .option('--memory', 'Print the distilled project memory instead')
    .option('--json', 'Output the log entries as JSON')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .action((options: HistoryOptions) => {
      const baseDir = path.resolve(options.path);
      const config = loadConfig(baseDir);
      const project = resolveProject(config, options.project);
      const store = new MemoryStore(projectDataDir(config, baseDir, project.alias));

      if (options.memory) {
        const memory = store.readMemory();
        console.log(memory ? `\n${memory}\n` : chalk.gray('\n  No project memory yet.\n'));
        return;
      }

      const { entries, skippedLines } = store.readLog();
      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      if (entries.length === 0) {
        console.log(chalk.gray(`\n  No history for ${project.alias}.\n`));
        return;
      }

      const limit = Math.max(1, parseInt(options.limit, 10) || 10);
      console.log(chalk.bold(`\n  ${project.alias}: ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}\n`));
      for (const line of historyLines(entries, limit)) {
        console.log(`  ${line}`);
      }
      if (skippedLines.length > 0) {
        console.log(chalk.yellow(`\n  Skipped malformed line(s): ${skippedLines.join(', ')}`));
      }
      console.log('');
    });
}
