/**
 * `gitbrief run` command.
 *
 * Runs the report pipeline once for one project, or for every configured
 * project in turn. Exits with status 1 when any run fails.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getFailureReason, resolveProject } from '@gitbrief/core';
import { runProject, type RunOptions, type RunResult } from '@gitbrief/report';
import { parseFormats, parseList, parseWindow } from '../options.js';
import { resultDetails, statusLine } from '../output.js';
import { openSession } from '../session.js';
import { createRunSpinner, followStages } from '../spinner.js';

interface RunCommandOptions {
  project?: string;
  provider?: string;
  style?: string;
  since?: string;
  count?: string;
  to?: string;
  channels?: string;
  format?: string;
  ai: boolean;
  article?: boolean;
  path: string;
  verbose?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Summarise recent commits and deliver the daily report')
    .option('-p, --project <alias>', 'Project alias, repository path or URL (default: every configured project)')
    .option('--provider <name>', 'LLM provider (overrides llm.provider)')
    .option('--style <style>', 'Article style (overrides llm.style)')
    .option('--since <phrase>', 'Commit window, e.g. "2 days ago"')
    .option('-n, --count <n>', 'Use the last n commits instead of a time window')
    .option('--to <emails>', 'Comma-separated recipients (overrides notify.recipients)')
    .option('--channels <names>', 'Comma-separated channels: email, slack, feishu')
    .option('--format <formats>', 'Comma-separated report formats: html, markdown, text')
    .option('--no-ai', 'Skip the language model and render statistics only')
    .option('--article', 'Also write the styled article')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .option('-v, --verbose', 'Echo log entries to stderr')
    .action(async (options: RunCommandOptions) => {
      const session = openSession(options);
      const { config, baseDir } = session;

      const targets = options.project
        ? [options.project]
        : config.projects.length > 0
          ? config.projects.map((p) => p.alias)
          : [baseDir];

      const controller = new AbortController();
      const onInterrupt = (): void => {
        console.error(chalk.yellow('\n  Interrupted; finishing in-flight work...'));
        controller.abort(new Error('interrupted'));
      };
      process.once('SIGINT', onInterrupt);

      const results: RunResult[] = [];
      try {
        for (const target of targets) {
          const runOptions: RunOptions = {
            project: target,
            config,
            baseDir,
            env: session.env,
            logger: session.logger,
            provider: options.provider,
            style: options.style,
            window: parseWindow(options),
            recipients: parseList(options.to),
            channels: parseList(options.channels),
            formats: parseFormats(options.format),
            noAi: !options.ai,
            article: options.article,
            signal: controller.signal,
          };

          const alias = resolveProject(config, target).alias;
          const spinner = createRunSpinner().start(`${alias}: starting`);
          try {
            const result = await runProject(runOptions, followStages(spinner));
            results.push(result);
            if (result.status === 'failed') {
              spinner.fail(statusLine(result));
            } else if (result.diagnostics.length > 0) {
              spinner.warn(statusLine(result));
            } else {
              spinner.succeed(statusLine(result));
            }
            for (const line of resultDetails(result)) {
              console.log(line.trimStart().startsWith('!') ? chalk.yellow(line) : chalk.gray(line));
            }
          } catch (error) {
            spinner.fail(`${alias}: ${getFailureReason(error)}`);
            throw error;
          }

          if (controller.signal.aborted) break;
        }
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        session.logger.close();
      }

      if (session.logger.filePath) {
        console.log(chalk.gray(`\n  Log: ${session.logger.filePath}\n`));
      }
      if (results.some((r) => r.status === 'failed')) {
        process.exitCode = 1;
      }
    });
}
