/**
 * Formats Command
 *
 *   chunkwise formats          Show which processor handles each extension
 *   chunkwise formats --json   Same, as JSON rows
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { ProcessorRegistry, categoryFor, type ProcessorName } from '../../processing/index.js';
import { formatTable } from '../../utils/index.js';

export function createFormatsCommand(getContext: () => CommandContext): Command {
  return new Command('formats')
    .description('List supported file extensions and their processors')
    .action(() => {
      const ctx = getContext();
      const config = loadConfig();
      const registry = ProcessorRegistry.withDefaults(config.processing, { logger: ctx });
      const enabled: Record<ProcessorName, boolean> = {
        code_processor: config.processing.code.enabled,
        excel_processor: config.processing.excel.enabled,
        structured_data_processor: config.processing.structured_data.enabled,
      };

      const routes = registry.listSupportedFormats().map((route) => ({
        ...route,
        enabled: enabled[route.processor],
        metadata: categoryFor(route.extension) ?? '-',
      }));

      if (ctx.options.json) {
        console.log(JSON.stringify(routes, null, 2));
        return;
      }

      ctx.log(
        formatTable(
          [
            { header: 'Extension', key: 'extension' },
            { header: 'Category', key: 'category' },
            { header: 'Processor', key: 'processor' },
            { header: 'Metadata', key: 'metadata' },
          ],
          routes.map((route) => ({
            extension: route.extension,
            category: route.category,
            processor: enabled[route.processor] ? route.processor : chalk.dim(`${route.processor} (disabled)`),
            metadata: route.metadata,
          }))
        )
      );
      ctx.log('');
      ctx.log(chalk.dim(`${routes.length} extensions across ${registry.processors.length} processors`));
    });
}
