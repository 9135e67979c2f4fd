/**
 * Config Command
 *
 *   chunkwise config get <key>           Print one value (dot path)
 *   chunkwise config set <key> <value>   Coerce, validate and store a value
 *   chunkwise config list                Every key with type, value and description
 *
 * Keys, kinds and descriptions come from the config schema.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { ConfigError } from '../../errors/index.js';
import {
  findConfigKey,
  getConfigPath,
  getConfigValue,
  listConfig,
  setConfigValue,
  type ConfigEntry,
  type ConfigKeyInfo,
} from '../../config/index.js';

function renderValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function renderKind(info: ConfigKeyInfo): string {
  return info.kind === 'enum' && info.choices ? info.choices.join(' | ') : info.kind;
}

function sectionOf(key: string): string {
  const dot = key.lastIndexOf('.');
  return dot === -1 ? '' : key.slice(0, dot);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const command = new Command('config').description('Read and change settings in config.toml');

  command
    .command('get <key>')
    .description('Print a setting, e.g. processing.excel.max_rows_per_chunk')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, 'Run: chunkwise config list  to see all keys');
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
        return;
      }
      ctx.log(renderValue(value));

      const info = findConfigKey(key);
      if (info) {
        ctx.debug(`${renderKind(info)}: ${info.description}`);
      }
    });

  command
    .command('set <key> <value>')
    .description('Store a setting, e.g. tagging.enabled true')
    .action((key: string, raw: string) => {
      const ctx = getContext();
      const value = setConfigValue(key, raw);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
        return;
      }
      ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(renderValue(value))}`);
    });

  command
    .command('list')
    .description('List every setting with its type and current value')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      ctx.log(chalk.dim(getConfigPath()));
      printSections(ctx, entries);
    });

  return command;
}

function printSections(ctx: CommandContext, entries: ConfigEntry[]): void {
  let section: string | null = null;
  for (const entry of entries) {
    const current = sectionOf(entry.key);
    if (current !== section) {
      section = current;
      ctx.log('');
      if (current !== '') ctx.log(chalk.bold(`[${current}]`));
    }
    const name = current === '' ? entry.key : entry.key.slice(current.length + 1);
    ctx.log(`  ${chalk.cyan(name)} = ${chalk.yellow(renderValue(entry.value))}  ${chalk.dim(`(${renderKind(entry)})`)}`);
    if (entry.description) {
      ctx.log(chalk.dim(`      ${entry.description}`));
    }
  }
}
