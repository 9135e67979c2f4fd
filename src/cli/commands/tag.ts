/**
 * Tag Command
 *
 *   chunkwise tag <file>               Ask the configured model for tags
 *   chunkwise tag <file> --title "Q3"  Prefix the content with a title
 *   chunkwise tag <file> --path-only   Tags from the file path, no model call
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { basename } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { FileNotFoundError } from '../../errors/index.js';
import { extractTagsFromFilePath, type TagSet } from '../../processing/index.js';
import { createTagger } from '../tagger.js';

interface TagCommandOptions {
  title?: string;
  pathOnly?: boolean;
}

const TAG_GROUPS: ReadonlyArray<keyof TagSet> = ['topics', 'keywords', 'entities', 'categories'];

export function createTagCommand(getContext: () => CommandContext): Command {
  return new Command('tag')
    .argument('<file>', 'Text file to tag')
    .description('Generate topics, keywords, entities and categories for a file')
    .option('-t, --title <title>', 'Title sent with the content (defaults to the file name)')
    .option('--path-only', 'Only derive tags from the file path', false)
    .action(async (file: string, cmdOptions: TagCommandOptions) => {
      const ctx = getContext();
      if (!existsSync(file)) {
        throw new FileNotFoundError(file);
      }

      if (cmdOptions.pathOnly) {
        const tags = extractTagsFromFilePath(file);
        if (ctx.options.json) {
          console.log(JSON.stringify({ tags }));
        } else {
          ctx.log(tags.join(', '));
        }
        return;
      }

      const config = loadConfig();
      const service = createTagger(config, ctx);

      const spinner = !ctx.options.json && process.stdout.isTTY
        ? ora({ text: `Tagging with ${config.default_model}...` }).start()
        : null;
      const tags = await service.generateTags(readFileSync(file, 'utf-8'), cmdOptions.title ?? basename(file));
      spinner?.stop();

      if (ctx.options.json) {
        console.log(JSON.stringify(tags, null, 2));
        return;
      }

      for (const group of TAG_GROUPS) {
        const values = tags[group];
        ctx.log(`${chalk.bold(group.padEnd(10))} ${values.length > 0 ? values.join(', ') : chalk.dim('(none)')}`);
      }
    });
}
