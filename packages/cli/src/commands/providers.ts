/**
 * `gitbrief providers` command: list language model providers, their
 * models and whether their API keys are present.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_PROVIDER_SETTINGS } from '@gitbrief/core';
import { PromptLibrary, createDefaultProviderRegistry } from '@gitbrief/report';
import { openSession } from '../session.js';

export function registerProvidersCommand(program: Command): void {
  program
    .command('providers')
    .description('List LLM providers and article styles')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .action((options: { path: string }) => {
      const { config, env, logger } = openSession(options, 'providers');
      const names = createDefaultProviderRegistry().names();
      const width = Math.max(...names.map((n) => n.length));

      console.log(chalk.bold('\n  Providers\n'));
      for (const name of names) {
        const settings = { ...DEFAULT_PROVIDER_SETTINGS[name], ...config.llm.providers[name] };
        const marker = name === config.llm.provider ? chalk.green('*') : ' ';
        const key = !settings.apiKeyEnv
          ? chalk.gray('no key needed')
          : env[settings.apiKeyEnv]
            ? chalk.green(`${settings.apiKeyEnv} set`)
            : chalk.yellow(`${settings.apiKeyEnv} missing`);
        console.log(`  ${marker} ${name.padEnd(width)}  ${settings.model.padEnd(20)}  ${key}`);
      }

      const styles = new PromptLibrary().listStyles(config.llm.provider);
      console.log(chalk.bold('\n  Article styles\n'));
      console.log(`    ${styles.map((s) => (s === config.llm.style ? chalk.green(s) : s)).join(', ')}\n`);
      logger.close();
    });
}
