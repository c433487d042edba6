/**
 * `gitbrief init` command.
 *
 * Interactive setup: writes .gitbrief.yml, registers the current
 * repository as a project and checks the provider's API key.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import {
  CONFIG_FILENAME,
  DEFAULT_PROVIDER_SETTINGS,
  deriveAlias,
  isGitRepo,
  loadConfig,
  saveConfig,
  writeDefaultConfig,
} from '@gitbrief/core';
import { createDefaultProviderRegistry } from '@gitbrief/report';

/** Prompt the user for a line of input */
function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .gitbrief.yml in the current directory')
    .option('--path <dir>', 'Directory to initialise', '.')
    .option('--non-interactive', 'Use defaults without prompting')
    .action(async (options: { path: string; nonInteractive?: boolean }) => {
      const baseDir = path.resolve(options.path);

      console.log(chalk.bold('\n  gitbrief setup\n'));

      const configPath = path.join(baseDir, CONFIG_FILENAME);
      if (fs.existsSync(configPath)) {
        const overwrite = options.nonInteractive
          ? 'n'
          : await prompt(chalk.yellow(`  ${CONFIG_FILENAME} already exists. Overwrite? (y/N): `));
        if (overwrite.toLowerCase() !== 'y') {
          console.log(chalk.gray('  Keeping existing configuration.\n'));
          return;
        }
      }

      // Step 1: provider
      console.log(chalk.bold('  Step 1: Language model\n'));
      const providers = createDefaultProviderRegistry().names();
      let provider = 'anthropic';
      if (!options.nonInteractive) {
        console.log(chalk.gray(`  Available: ${providers.join(', ')}`));
        const answer = await prompt(chalk.cyan(`  Provider [${provider}]: `));
        if (answer) {
          if (!providers.includes(answer)) {
            console.log(chalk.yellow(`  Unknown provider "${answer}"; keeping ${provider}.`));
          } else {
            provider = answer;
          }
        }
      }

      const keyEnv = DEFAULT_PROVIDER_SETTINGS[provider]?.apiKeyEnv;
      if (!keyEnv) {
        console.log(chalk.green(`  ✓ ${provider} needs no API key\n`));
      } else if (process.env[keyEnv]) {
        console.log(chalk.green(`  ✓ ${keyEnv} is set\n`));
      } else {
        console.log(chalk.yellow(`  ⚠ ${keyEnv} is not set.\n`));
        console.log(chalk.white('  Set it in your shell or in a .env file next to the config:\n'));
        console.log(chalk.cyan(`    ${keyEnv}=...\n`));
        console.log(chalk.gray('  `gitbrief run --no-ai` works without a key.\n'));
      }

      // Step 2: config file
      console.log(chalk.bold('  Step 2: Configuration\n'));
      const writeSpinner = ora(`Writing ${CONFIG_FILENAME}...`).start();
      writeDefaultConfig(baseDir);
      const config = loadConfig(baseDir);
      config.llm.provider = provider;

      // Step 3: register this repository
      if (await isGitRepo(baseDir)) {
        const alias = deriveAlias(baseDir);
        config.projects.push({ alias, location: '.' });
        writeSpinner.text = `Registering ${alias}...`;
      }

      if (config.llm.provider !== 'anthropic' || config.projects.length > 0) {
        saveConfig(baseDir, config);
      }
      writeSpinner.succeed(`Configuration written to ${chalk.bold(CONFIG_FILENAME)}`);

      const gitignore = path.join(baseDir, '.gitignore');
      const ignored = fs.existsSync(gitignore) ? fs.readFileSync(gitignore, 'utf-8') : '';
      if (!ignored.split('\n').some((line) => line.trim() === `${config.dataDir}/`)) {
        fs.appendFileSync(gitignore, `${ignored && !ignored.endsWith('\n') ? '\n' : ''}${config.dataDir}/\n`);
        console.log(chalk.gray(`  Added ${config.dataDir}/ to .gitignore`));
      }

      console.log(chalk.green('\n  gitbrief initialised.'));
      console.log('');
      console.log(chalk.white('  Next steps:'));
      console.log(chalk.cyan('    gitbrief run --no-ai    ') + chalk.gray('# Statistics-only report'));
      console.log(chalk.cyan('    gitbrief run            ') + chalk.gray('# Full report with the daily summary'));
      console.log(chalk.cyan('    gitbrief project add    ') + chalk.gray('# Track another repository'));
      console.log('');
    });
}
