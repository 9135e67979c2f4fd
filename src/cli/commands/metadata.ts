/**
 * Metadata Command
 *
 *   chunkwise metadata <file>          Print universal and format-specific metadata
 *   chunkwise metadata <file> --json   Same, as a JSON object
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { FileNotFoundError } from '../../errors/index.js';
import { MetadataExtractor } from '../../processing/index.js';

export function createMetadataCommand(getContext: () => CommandContext): Command {
  return new Command('metadata')
    .argument('<file>', 'File to inspect')
    .description('Extract descriptive metadata from a file')
    .action(async (file: string) => {
      const ctx = getContext();
      if (!existsSync(file)) {
        throw new FileNotFoundError(file);
      }

      const metadata = await new MetadataExtractor({ logger: ctx }).extractMetadata(file);

      if (ctx.options.json) {
        console.log(JSON.stringify(metadata, null, 2));
        return;
      }

      const width = Math.max(0, ...Object.keys(metadata).map((key) => key.length));
      for (const [key, value] of Object.entries(metadata)) {
        ctx.log(`${chalk.cyan(key.padEnd(width))}  ${formatValue(value)}`);
      }
    });
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value.replace(/\s+/g, ' ');
  if (Array.isArray(value)) return value.map((item) => String(item)).join(', ');
  return JSON.stringify(value) ?? String(value);
}
