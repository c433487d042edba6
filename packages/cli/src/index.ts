#!/usr/bin/env node

/**
 * @gitbrief/cli - the `gitbrief` command.
 * Daily commit reports with LLM summaries, project memory and delivery.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { GitBriefError, getFailureReason } from '@gitbrief/core';
import { registerDistillCommand } from './commands/distill.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerInitCommand } from './commands/init.js';
import { registerProjectCommand } from './commands/project.js';
import { registerProvidersCommand } from './commands/providers.js';
import { registerRunCommand } from './commands/run.js';
import { registerScheduleCommand } from './commands/schedule.js';

const program = new Command();

program
  .name('gitbrief')
  .version('0.1.0')
  .description('Daily git activity reports summarised by a language model');

// Register all subcommands
registerRunCommand(program);
registerInitCommand(program);
registerProjectCommand(program);
registerDistillCommand(program);
registerHistoryCommand(program);
registerProvidersCommand(program);
registerScheduleCommand(program);

// Global error handler
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Help and version output exit with code 0
      process.exit(error.exitCode);
    }
    const reason = getFailureReason(error);
    console.error(chalk.red(`\nError: ${reason}`));
    if (error instanceof GitBriefError && error.message !== reason) {
      console.error(chalk.gray(error.message.trim()));
    }
    if (process.env.GITBRIEF_DEBUG && error instanceof Error) {
      console.error(chalk.gray(error.stack ?? ''));
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
