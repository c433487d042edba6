/**
 * `gitbrief distill` command: rebuild a project's memory document from
 * its full log.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getFailureReason } from '@gitbrief/core';
import { distillProject } from '@gitbrief/report';
import { openSession } from '../session.js';

export function registerDistillCommand(program: Command): void {
  program
    .command('distill')
    .description('Rebuild project_memory.md from the memory log')
    .requiredOption('-p, --project <alias>', 'Project alias, repository path or URL')
    .option('--provider <name>', 'LLM provider (overrides llm.provider)')
    .option('--print', 'Print the new memory document')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .option('-v, --verbose', 'Echo log entries to stderr')
    .action(
      async (options: { project: string; provider?: string; print?: boolean; path: string; verbose?: boolean }) => {
        const session = openSession(options, 'distill');
        const spinner = ora(`Distilling memory for ${options.project}...`).start();

        try {
          const document = await distillProject({
            project: options.project,
            provider: options.provider,
            config: session.config,
            baseDir: session.baseDir,
            env: session.env,
            logger: session.logger,
          });
          spinner.succeed(`Memory rebuilt for ${options.project}`);
          if (options.print) {
            console.log(`\n${document}\n`);
          }
        } catch (error) {
          spinner.fail(getFailureReason(error));
          throw error;
        } finally {
          session.logger.close();
        }
      },
    );
}
