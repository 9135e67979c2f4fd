/**
 * Metadata Extractor
 *
 * Two tiers: universal filesystem metadata for every file, then the
 * category extractor selected by extension. A category failure is logged
 * and only drops that category's fields.
 */

import { existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import type { Logger } from '../../utils/logger.js';
import { consoleLogger, describeError } from '../../utils/logger.js';
import { fileExtension } from '../base-processor.js';
import { CodeProcessor } from '../processors/code-processor.js';
import { getMimeType } from './mime.js';
import {
  extractCodeMetadata,
  extractDocxMetadata,
  extractImageMetadata,
  extractPdfMetadata,
  extractXlsxMetadata,
  type MetadataFields,
} from './extractors.js';

export type MetadataCategory = 'pdf' | 'docx' | 'xlsx' | 'image' | 'code';

export type CategoryExtractor = (path: string) => Promise<MetadataFields>;

export const CATEGORY_EXTENSIONS: Readonly<Record<MetadataCategory, ReadonlySet<string>>> = {
  pdf: new Set(['.pdf']),
  docx: new Set(['.docx', '.doc']),
  xlsx: new Set(['.xlsx', '.xls']),
  image: new Set(['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.webp']),
  code: CodeProcessor.SUPPORTED_FORMATS,
};

const CATEGORIES: readonly MetadataCategory[] = ['pdf', 'docx', 'xlsx', 'image', 'code'];

/**
 * Metadata category for a lower-cased extension, or null when the file
 * only gets the universal tier.
 */
export function categoryFor(extension: string): MetadataCategory | null {
  return CATEGORIES.find((category) => CATEGORY_EXTENSIONS[category].has(extension)) ?? null;
}

export interface MetadataExtractorOptions {
  logger?: Logger;
}

export class MetadataExtractor {
  private readonly logger: Logger;
  private readonly extractors: Readonly<Record<MetadataCategory, CategoryExtractor>>;

  constructor(options: MetadataExtractorOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.extractors = {
      pdf: extractPdfMetadata,
      docx: extractDocxMetadata,
      xlsx: extractXlsxMetadata,
      image: extractImageMetadata,
      code: extractCodeMetadata,
    } satisfies Record<MetadataCategory, CategoryExtractor>;
  }

  async extractMetadata(path: string): Promise<Record<string, unknown>> {
    const absolutePath = resolve(path);
    if (!existsSync(absolutePath)) {
      this.logger.warn(`File not found: ${absolutePath}`);
      return {};
    }

    let metadata: Record<string, unknown>;
    try {
      metadata = await this.universalMetadata(absolutePath);
    } catch (error) {
      this.logger.warn(`Failed to read file metadata for ${absolutePath}: ${describeError(error)}`);
      return {};
    }

    const category = categoryFor(fileExtension(absolutePath));
    if (category === null) {
      return metadata;
    }

    try {
      const fields = await this.extractors[category](absolutePath);
      return { ...metadata, ...fields };
    } catch (error) {
      this.logger.warn(`Failed to extract ${category} metadata from ${absolutePath}: ${describeError(error)}`);
      return metadata;
    }
  }

  private async universalMetadata(path: string): Promise<Record<string, unknown>> {
    const stats = await stat(path);
    const extension = fileExtension(path);

    const birth = stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
    const metadata: Record<string, unknown> = {
      file_name: basename(path),
      file_path: path,
      file_size: stats.size,
      file_size_mb: Math.round((stats.size / (1024 * 1024)) * 100) / 100,
      created_time: birth.toISOString(),
      modified_time: stats.mtime.toISOString(),
      accessed_time: stats.atime.toISOString(),
      file_extension: extension,
      file_stem: basename(path, extname(path)),
    };

    const mimeType = getMimeType(extension);
    if (mimeType !== undefined) {
      metadata.mime_type = mimeType;
    }

    if (process.platform !== 'win32') {
      metadata.permissions = (stats.mode & 0o777).toString(8).padStart(3, '0');
    }

    return metadata;
  }
}
