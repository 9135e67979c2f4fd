#!/usr/bin/env node
/**
 * chunkwise CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createProcessCommand } from './commands/process.js';
import { createMetadataCommand } from './commands/metadata.js';
import { createTagCommand } from './commands/tag.js';
import { createFormatsCommand } from './commands/formats.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.1.0';

const program = new Command();

program
  .name('chunkwise')
  .description('Turn code, spreadsheets and structured data into searchable chunks')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('chunkwise process ./src')}                 Chunk every supported file under ./src
  ${chalk.cyan('chunkwise process data.xlsx --tag')}       Chunk a workbook and auto-tag each sheet
  ${chalk.cyan('chunkwise metadata report.pdf')}           Show extracted file metadata
  ${chalk.cyan('chunkwise formats')}                       List supported extensions
  ${chalk.cyan('chunkwise config set search.top_k 20')}    Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    info: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(message));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root command after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createProcessCommand(getContext));
program.addCommand(createMetadataCommand(getContext));
program.addCommand(createTagCommand(getContext));
program.addCommand(createFormatsCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: chunkwise --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
