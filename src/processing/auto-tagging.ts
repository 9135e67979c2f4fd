/**
 * Auto-Tagging Service
 *
 * Asks a generation provider for topics, keywords, entities and categories
 * describing a piece of content. Every failure degrades to the empty tag
 * set; nothing here rejects.
 */

import { basename, dirname, extname } from 'node:path';
import { z } from 'zod';
import type { GenerationProvider, ChatMessage } from '../providers/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Logger } from '../utils/logger.js';
import { consoleLogger, describeError } from '../utils/logger.js';
import { parseJsonFromResponse } from '../utils/json.js';
import { dedupeCaseInsensitive } from './base-processor.js';
import type { ProcessedContext } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface TagSet {
  topics: string[];
  keywords: string[];
  entities: string[];
  categories: string[];
}

export interface AutoTaggingOptions {
  /** Characters of content sent to the model */
  maxContentLength?: number;
  maxTokens?: number;
  temperature?: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_TAGS = 10;
export const MAX_TAG_LENGTH = 100;
export const MAX_PATH_TAGS = 5;

export const TAGGING_SYSTEM_MESSAGE =
  'You are a helpful assistant that extracts tags and keywords from content.';

export function buildTaggingPrompt(content: string): string {
  return `You are an expert at analyzing content and extracting relevant tags and keywords.

Given the following content, extract:
1. Main topics (high-level themes)
2. Keywords (important terms and concepts)
3. Entities (people, organizations, locations, products)
4. Categories (content classification)

Content:
${content}

Respond with a JSON object in the following format:
{
    "topics": ["topic1", "topic2", ...],
    "keywords": ["keyword1", "keyword2", ...],
    "entities": ["entity1", "entity2", ...],
    "categories": ["category1", "category2", ...]
}

Keep the response concise and relevant. Limit each array to ${MAX_TAGS} items maximum.`;
}

export function emptyTagSet(): TagSet {
  return { topics: [], keywords: [], entities: [], categories: [] };
}

// ============================================================================
// CLEANING
// ============================================================================

function tagToString(value: unknown): string | null {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return null;
  }
}

/**
 * Normalize a model-provided tag list.
 *
 * Non-arrays yield []. Entries are coerced to strings and trimmed; empty
 * ones and ones of 100+ characters are dropped. Duplicates (ignoring case)
 * keep their first occurrence, and at most 10 survive.
 */
export function cleanTags(values: unknown): string[] {
  if (!Array.isArray(values)) {
    return [];
  }

  const cleaned: string[] = [];
  for (const value of values) {
    const tag = tagToString(value)?.trim();
    if (tag && tag.length < MAX_TAG_LENGTH) {
      cleaned.push(tag);
    }
  }
  return dedupeCaseInsensitive(cleaned, MAX_TAGS);
}

const TagListSchema = z.unknown().transform(cleanTags);

export const TagSetSchema = z.object({
  topics: TagListSchema,
  keywords: TagListSchema,
  entities: TagListSchema,
  categories: TagListSchema,
});

/**
 * Cheap tags from a path: stem, extension, then parent directory names
 * nearest first, stopping at five.
 */
export function extractTagsFromFilePath(filePath: string): string[] {
  const extension = extname(filePath);
  const tags = [basename(filePath, extension)];
  if (extension) {
    tags.push(extension.slice(1));
  }

  let dir = dirname(filePath);
  for (;;) {
    const name = basename(dir);
    if (name && name !== '.' && name !== '..') {
      tags.push(name);
      if (tags.length >= MAX_PATH_TAGS) break;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return tags;
}

// ============================================================================
// SERVICE
// ============================================================================

export class AutoTaggingService {
  private readonly maxContentLength: number;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(
    private readonly provider: GenerationProvider,
    options: AutoTaggingOptions = {},
    private readonly logger: Logger = consoleLogger
  ) {
    this.maxContentLength = options.maxContentLength ?? DEFAULT_CONFIG.tagging.max_content_length;
    this.maxTokens = options.maxTokens ?? DEFAULT_CONFIG.tagging.max_tokens;
    this.temperature = options.temperature ?? DEFAULT_CONFIG.tagging.temperature;
  }

  /**
   * Generate tags for `content`, optionally prefixed with a title.
   * Resolves to the empty tag set on any failure.
   */
  async generateTags(content: string, title?: string): Promise<TagSet> {
    try {
      let body = content.length > this.maxContentLength ? `${content.slice(0, this.maxContentLength)}...` : content;
      if (title) {
        body = `Title: ${title}\n\n${body}`;
      }

      const messages: ChatMessage[] = [
        { role: 'system', content: TAGGING_SYSTEM_MESSAGE },
        { role: 'user', content: buildTaggingPrompt(body) },
      ];

      const response = await this.provider.chat(messages, {
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });

      if (!response.content.trim()) {
        this.logger.warn('Empty response from model for tag generation');
        return emptyTagSet();
      }

      const parsed = TagSetSchema.safeParse(parseJsonFromResponse(response.content));
      if (!parsed.success) {
        this.logger.warn('Failed to parse JSON from model response');
        return emptyTagSet();
      }

      const tags = parsed.data;
      this.logger.info?.(
        `Generated tags: ${tags.topics.length} topics, ${tags.keywords.length} keywords, ` +
          `${tags.entities.length} entities, ${tags.categories.length} categories`
      );
      return tags;
    } catch (error) {
      this.logger.warn(`Error generating tags: ${describeError(error)}`);
      return emptyTagSet();
    }
  }

  /**
   * Fire-and-forget variant for call sites that cannot await.
   *
   * Starts one tagging run and hands its result to `callback`. A throwing
   * callback is logged.
   */
  generateTagsDetached(content: string, title: string | undefined, callback: (tags: TagSet) => void): void {
    void this.generateTags(content, title).then((tags) => {
      try {
        callback(tags);
      } catch (error) {
        this.logger.warn(`Tag callback failed: ${describeError(error)}`);
      }
    });
  }

  /** See {@link extractTagsFromFilePath} */
  extractTagsFromFilePath(filePath: string): string[] {
    return extractTagsFromFilePath(filePath);
  }

  /**
   * Tag a processed context and return a copy with the tags merged into its
   * tags, keywords and entities. The TagSet is kept under
   * `additionalMetadata.auto_tags`.
   */
  async enrichContext(context: ProcessedContext): Promise<ProcessedContext> {
    const content = context.chunks.map((chunk) => chunk.text).join('\n\n');
    const tags = await this.generateTags(content, context.properties.title);

    return {
      ...context,
      properties: {
        ...context.properties,
        tags: dedupeCaseInsensitive([
          ...context.properties.tags,
          ...tags.topics,
          ...tags.keywords,
          ...tags.categories,
        ]),
        additionalMetadata: { ...context.properties.additionalMetadata, auto_tags: tags },
      },
      extractedData: {
        ...context.extractedData,
        keywords: dedupeCaseInsensitive([...context.extractedData.keywords, ...tags.keywords]),
        entities: dedupeCaseInsensitive([...context.extractedData.entities, ...tags.entities]),
      },
    };
  }
}
