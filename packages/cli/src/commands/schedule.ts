/**
 * `gitbrief schedule` command.
 *
 * Starts the cron scheduler for the `schedules` entries of .gitbrief.yml
 * and keeps running until interrupted.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from '@gitbrief/core';
import { ReportScheduler } from '@gitbrief/report';
import { resultDetails, statusLine } from '../output.js';
import { openSession } from '../session.js';

export function registerScheduleCommand(program: Command): void {
  program
    .command('schedule')
    .description('Run the configured schedules until interrupted')
    .option('--list', 'Print the configured schedules and exit')
    .option('--trigger <alias>', 'Run one project now and exit')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .option('-v, --verbose', 'Echo log entries to stderr')
    .action(async (options: { list?: boolean; trigger?: string; path: string; verbose?: boolean }) => {
      const session = openSession(options, 'schedule');
      const { config, baseDir, env, logger } = session;

      const scheduler = new ReportScheduler({
        config,
        runOptions: (schedule) => ({ project: schedule.project, config, baseDir, env, logger }),
        logger,
        onResult: (result) => {
          const paint = result.status === 'failed' ? chalk.red : chalk.green;
          console.log(paint(`  ${new Date().toISOString()} ${statusLine(result)}`));
          for (const line of resultDetails(result)) console.log(chalk.gray(line));
        },
        onError: (error, schedule) => {
          console.error(chalk.red(`  ${schedule.project}: ${describeError(error)}`));
        },
      });

      if (options.list) {
        if (config.schedules.length === 0) {
          console.log(chalk.gray('\n  No schedules configured.\n'));
        }
        for (const s of config.schedules) {
          console.log(`  ${chalk.bold(s.project)}  ${s.cron}  ${chalk.gray(s.timezone)}`);
        }
        logger.close();
        return;
      }

      if (options.trigger) {
        const result = await scheduler.triggerNow(options.trigger);
        logger.close();
        if (!result || result.status === 'failed') process.exitCode = 1;
        return;
      }

      if (config.schedules.length === 0) {
        logger.close();
        console.log(chalk.yellow('\n  No schedules configured. Add entries under `schedules` in .gitbrief.yml.\n'));
        return;
      }

      scheduler.start();
      for (const status of scheduler.getStatus()) {
        console.log(
          `  ${chalk.bold(status.project)}  ${status.cron} (${status.timezone})  next: ${status.nextRun ?? 'n/a'}`,
        );
      }
      console.log(chalk.gray('\n  Scheduler running. Press Ctrl+C to stop.\n'));

      await new Promise<void>((resolve) => {
        process.once('SIGINT', () => {
          scheduler.stop();
          logger.close();
          resolve();
        });
      });
    });
}
