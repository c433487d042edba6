/**
 * `gitbrief project` commands: manage the alias → repository table in
 * .gitbrief.yml.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import {
  ConfigError,
  deriveAlias,
  isRemoteLocation,
  loadConfig,
  saveConfig,
} from '@gitbrief/core';

interface PathOption {
  path: string;
}

export function registerProjectCommand(program: Command): void {
  const project = program.command('project').description('Manage tracked repositories');

  project
    .command('add <location> [alias]')
    .description('Track a local repository path or a GitHub URL')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .action((location: string, alias: string | undefined, options: PathOption) => {
      const baseDir = path.resolve(options.path);
      const config = loadConfig(baseDir);
      const name = alias ?? deriveAlias(isRemoteLocation(location) ? location : path.resolve(baseDir, location));

      if (config.projects.some((p) => p.alias === name)) {
        throw new ConfigError(`Project "${name}" already exists; remove it first or choose another alias`);
      }

      config.projects.push({ alias: name, location });
      saveConfig(baseDir, config);
      console.log(chalk.green(`\n  Added ${chalk.bold(name)} → ${location}\n`));
    });

  project
    .command('list')
    .description('List tracked repositories')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .action((options: PathOption) => {
      const config = loadConfig(path.resolve(options.path));
      if (config.projects.length === 0) {
        console.log(chalk.gray('\n  No projects configured. Add one with `gitbrief project add <location>`.\n'));
        return;
      }

      const width = Math.max(...config.projects.map((p) => p.alias.length));
      console.log('');
      for (const p of config.projects) {
        console.log(`  ${chalk.bold(p.alias.padEnd(width))}  ${chalk.gray(p.location)}`);
      }
      console.log('');
    });

  project
    .command('remove <alias>')
    .description('Stop tracking a repository (its memory files are kept)')
    .option('--path <dir>', 'Directory holding .gitbrief.yml', '.')
    .action((alias: string, options: PathOption) => {
      const baseDir = path.resolve(options.path);
      const config = loadConfig(baseDir);
      const before = config.projects.length;

      config.projects = config.projects.filter((p) => p.alias !== alias);
      if (config.projects.length === before) {
        throw new ConfigError(`No project named "${alias}"`);
      }
      config.schedules = config.schedules.filter((s) => s.project !== alias);

      saveConfig(baseDir, config);
      console.log(chalk.green(`\n  Removed ${chalk.bold(alias)}\n`));
    });
}
