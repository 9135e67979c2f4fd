/**
 * Process Command
 *
 * Chunks files (or every supported file under a directory) with the
 * format processors and prints a summary.
 *
 * Usage:
 *   chunkwise process <paths...>          Process files and directories
 *   chunkwise process data.xlsx --tag     Auto-tag every produced context
 *   chunkwise process . --chunks          Print each chunk's text
 *   chunkwise process . --json            Emit the full batch as JSON
 */

import { Command } from 'commander';
import { existsSync, statSync } from 'node:fs';
import { relative } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { FileNotFoundError, UnsupportedFormatError } from '../../errors/index.js';
import {
  ProcessorRegistry,
  classifyExtension,
  createRawContext,
  fileExtension,
  expandPaths,
  type AutoTaggingService,
  type BatchProcessingResult,
  type FileProcessingResult,
  type ProcessedContext,
} from '../../processing/index.js';
import { createTagger } from '../tagger.js';

interface ProcessCommandOptions {
  tag?: boolean;
  chunks?: boolean;
}

export function createProcessCommand(getContext: () => CommandContext): Command {
  return new Command('process')
    .argument('<paths...>', 'Files or directories to process')
    .description('Split files into searchable chunks with metadata')
    .option('--tag', 'Auto-tag each context with the configured model', false)
    .option('--chunks', 'Print the text of every chunk', false)
    .action(async (paths: string[], cmdOptions: ProcessCommandOptions) => {
      const ctx = getContext();

      for (const path of paths) {
        if (!existsSync(path)) {
          throw new FileNotFoundError(path);
        }
        // A file named directly must be routable; directories are filtered by extension
        const extension = fileExtension(path);
        if (statSync(path).isFile() && classifyExtension(extension) === null) {
          throw new UnsupportedFormatError(path, extension);
        }
      }

      const config = loadConfig();
      const registry = ProcessorRegistry.withDefaults(config.processing, { logger: ctx });
      const tagger = cmdOptions.tag ? createTagger(config, ctx) : null;

      const files = await expandPaths(paths);
      ctx.debug(`Resolved ${files.length} file(s)`);

      const spinner = !ctx.options.json && process.stdout.isTTY
        ? ora({ text: `Processing ${files.length} file(s)...` }).start()
        : null;

      let processed = 0;
      const batch = await registry.processMany(
        files.map((file) => createRawContext(file)),
        (result) => {
          processed++;
          if (spinner) {
            spinner.text = `Processing ${processed}/${files.length}: ${relative(process.cwd(), result.filePath ?? '')}`;
          }
        }
      );

      if (tagger) {
        if (spinner) spinner.text = 'Auto-tagging contexts...';
        await tagBatch(batch, tagger);
      }

      spinner?.stop();

      if (ctx.options.json) {
        console.log(JSON.stringify(batch, null, 2));
        return;
      }

      for (const file of batch.files) {
        ctx.log(formatFileLine(file));
        if (cmdOptions.chunks) {
          for (const context of file.contexts) {
            printChunks(ctx, context);
          }
        }
      }

      ctx.log('');
      ctx.log(
        `${chalk.bold('Summary:')} ${chalk.green(`${batch.successCount} processed`)}, ` +
          `${batch.failureCount > 0 ? chalk.red(`${batch.failureCount} failed`) : '0 failed'}, ` +
          `${batch.unmatchedCount} skipped · ${batch.totalContexts} contexts, ${batch.totalChunks} chunks`
      );

      if (batch.failureCount > 0) {
        process.exitCode = 1;
      }
    });
}

async function tagBatch(batch: BatchProcessingResult, tagger: AutoTaggingService): Promise<void> {
  for (let i = 0; i < batch.files.length; i++) {
    const file = batch.files[i];
    if (!file || file.contexts.length === 0) continue;

    const enriched: ProcessedContext[] = [];
    for (const context of file.contexts) {
      enriched.push(await tagger.enrichContext(context));
    }
    batch.files[i] = { ...file, contexts: enriched };
  }
}

function formatFileLine(file: FileProcessingResult): string {
  const path = relative(process.cwd(), file.filePath ?? file.objectId);
  if (file.processor === null) {
    return `${chalk.dim('-')} ${path} ${chalk.dim('(unsupported)')}`;
  }
  if (!file.success) {
    return `${chalk.red('✗')} ${path} ${chalk.dim(`(${file.processor})`)}`;
  }
  const chunks = file.contexts.reduce((sum, context) => sum + context.chunks.length, 0);
  return `${chalk.green('✓')} ${path} ${chalk.dim(`(${file.processor})`)} ${file.contexts.length} context(s), ${chunks} chunk(s)`;
}

function printChunks(ctx: CommandContext, context: ProcessedContext): void {
  ctx.log(chalk.cyan(`  ${context.properties.title}`));
  if (context.properties.tags.length > 0) {
    ctx.log(chalk.dim(`  tags: ${context.properties.tags.join(', ')}`));
  }
  for (const chunk of context.chunks) {
    ctx.log(chalk.dim(`  ── chunk ${chunk.chunkIndex} [${chunk.keywords.join(', ')}]`));
    for (const line of chunk.text.split('\n')) {
      ctx.log(`    ${line}`);
    }
  }
}
