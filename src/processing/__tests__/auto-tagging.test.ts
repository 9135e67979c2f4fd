/**
 * Auto-Tagging Service Tests
 */

import { describe, it, expect, afterAll } from 'vitest';
import {
  AutoTaggingService,
  TAGGING_SYSTEM_MESSAGE,
  buildTaggingPrompt,
  cleanTags,
  emptyTagSet,
  extractTagsFromFilePath,
} from '../auto-tagging.js';
import { StructuredDataProcessor } from '../processors/structured-data-processor.js';
import { createRawContext } from '../dispatcher.js';
import { MockGenerationProvider, createRecordingLogger, createTempDir } from '../../test-utils/index.js';

const TAG_REPLY = JSON.stringify({
  topics: ['Planning', 'planning', 'Budget'],
  keywords: ['revenue', '  forecast  ', ''],
  entities: ['Acme Corp'],
  categories: ['finance'],
});

describe('cleanTags', () => {
  it('returns [] for non-arrays', () => {
    expect(cleanTags('a, b')).toEqual([]);
    expect(cleanTags(undefined)).toEqual([]);
  });

  it('trims, coerces, dedupes and caps', () => {
    expect(cleanTags([' Go ', 'go', 42, true, null, { x: 1 }, '', 'x'.repeat(100), 'x'.repeat(99)])).toEqual([
      'Go',
      '42',
      'true',
      'x'.repeat(99),
    ]);
    expect(cleanTags(Array.from({ length: 15 }, (_, i) => `t${i}`))).toHaveLength(10);
  });

  it('is idempotent', () => {
    const once = cleanTags(['B', 'b', ' c ', 'A']);
    expect(cleanTags(once)).toEqual(once);
  });
});

describe('extractTagsFromFilePath', () => {
  it('collects stem, extension and nearest parents up to five', () => {
    expect(extractTagsFromFilePath('/home/user/projects/reports/q1.xlsx')).toEqual([
      'q1',
      'xlsx',
      'reports',
      'projects',
      'user',
    ]);
  });

  it('handles short relative paths and files without extension', () => {
    expect(extractTagsFromFilePath('docs/README')).toEqual(['README', 'docs']);
    expect(extractTagsFromFilePath('a.txt')).toEqual(['a', 'txt']);
  });
});

describe('AutoTaggingService.generateTags', () => {
  it('sends the prompt and cleans the reply', async () => {
    const provider = new MockGenerationProvider('```json\n' + TAG_REPLY + '\n```');
    const logger = createRecordingLogger();
    const service = new AutoTaggingService(provider, { maxTokens: 200, temperature: 0.1 }, logger);

    const tags = await service.generateTags('Body text', 'Plan');

    expect(tags).toEqual({
      topics: ['Planning', 'Budget'],
      keywords: ['revenue', 'forecast'],
      entities: ['Acme Corp'],
      categories: ['finance'],
    });
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0]?.messages).toEqual([
      { role: 'system', content: TAGGING_SYSTEM_MESSAGE },
      { role: 'user', content: buildTaggingPrompt('Title: Plan\n\nBody text') },
    ]);
    expect(provider.calls[0]?.options).toEqual({ maxTokens: 200, temperature: 0.1 });
    expect(logger.infos).toEqual(['Generated tags: 2 topics, 2 keywords, 1 entities, 1 categories']);
  });

  it('truncates long content', async () => {
    const provider = new MockGenerationProvider(TAG_REPLY);
    const service = new AutoTaggingService(provider, { maxContentLength: 5 }, createRecordingLogger());

    await service.generateTags('abcdefghij');

    expect(provider.calls[0]?.messages[1]?.content).toBe(buildTaggingPrompt('abcde...'));
  });

  it('fills missing fields with empty lists', async () => {
    const provider = new MockGenerationProvider('{"topics": ["solo"], "keywords": "not a list"}');
    const service = new AutoTaggingService(provider, {}, createRecordingLogger());

    expect(await service.generateTags('x')).toEqual({ ...emptyTagSet(), topics: ['solo'] });
  });

  it('returns empty tags for a blank reply', async () => {
    const logger = createRecordingLogger();
    const service = new AutoTaggingService(new MockGenerationProvider('   '), {}, logger);

    expect(await service.generateTags('x')).toEqual(emptyTagSet());
    expect(logger.warnings).toEqual(['Empty response from model for tag generation']);
  });

  it('returns empty tags when no JSON object can be read', async () => {
    const logger = createRecordingLogger();
    const service = new AutoTaggingService(new MockGenerationProvider('I cannot help with that.'), {}, logger);

    expect(await service.generateTags('x')).toEqual(emptyTagSet());
    expect(logger.warnings).toEqual(['Failed to parse JSON from model response']);
  });

  it('returns empty tags when the provider throws', async () => {
    const logger = createRecordingLogger();
    const service = new AutoTaggingService(new MockGenerationProvider(new Error('rate limited')), {}, logger);

    expect(await service.generateTags('x')).toEqual(emptyTagSet());
    expect(logger.warnings).toEqual(['Error generating tags: rate limited']);
  });
});

describe('AutoTaggingService.generateTagsDetached', () => {
  it('hands the result to the callback', async () => {
    const service = new AutoTaggingService(new MockGenerationProvider(TAG_REPLY), {}, createRecordingLogger());

    const tags = await new Promise((resolve) => service.generateTagsDetached('x', undefined, resolve));

    expect(tags).toMatchObject({ entities: ['Acme Corp'] });
  });

  it('logs a throwing callback', async () => {
    const logger = createRecordingLogger();
    const service = new AutoTaggingService(new MockGenerationProvider(TAG_REPLY), {}, logger);

    await new Promise<void>((resolve) => {
      service.generateTagsDetached('x', undefined, () => {
        setTimeout(resolve, 0);
        throw new Error('callback broke');
      });
    });

    expect(logger.warnings).toEqual(['Tag callback failed: callback broke']);
  });
});

describe('AutoTaggingService.enrichContext', () => {
  const dir = createTempDir();
  afterAll(() => dir.cleanup());

  it('merges tags into a copy of the context', async () => {
    const path = dir.write('plan.json', '{"revenue": 10}');
    const processor = new StructuredDataProcessor({}, { clock: () => new Date(0) });
    const [context] = await processor.process(createRawContext(path));
    if (!context) throw new Error('expected a context');

    const provider = new MockGenerationProvider(TAG_REPLY);
    const service = new AutoTaggingService(provider, {}, createRecordingLogger());
    const enriched = await service.enrichContext(context);

    expect(enriched.properties.tags).toEqual([
      'plan.json',
      'json',
      'object',
      'revenue',
      'Planning',
      'Budget',
      'forecast',
      'finance',
    ]);
    expect(enriched.extractedData.keywords).toEqual(['plan.json', 'json', 'object', 'revenue', 'forecast']);
    expect(enriched.extractedData.entities).toEqual(['Acme Corp']);
    expect(enriched.properties.additionalMetadata.auto_tags).toEqual({
      topics: ['Planning', 'Budget'],
      keywords: ['revenue', 'forecast'],
      entities: ['Acme Corp'],
      categories: ['finance'],
    });
    expect(enriched.chunks).toBe(context.chunks);
    expect(context.properties.tags).toEqual(['plan.json', 'json', 'object', 'revenue']);

    const sent = provider.calls[0]?.messages[1]?.content ?? '';
    const body = context.chunks.map((c) => c.text).join('\n\n');
    expect(sent).toBe(buildTaggingPrompt(`Title: plan.json\n\n${body}`));
  });
});
