/**
 * Code Processor
 *
 * Splits a source file into an overview chunk plus one chunk per detected
 * function/class/struct definition. Detection is a per-line regex match, so
 * it is approximate: multi-line signatures, decorators and nested scopes
 * are not understood. When nothing matches (or the language has no
 * pattern set) the file is cut into fixed-size line windows instead.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  FileContextProcessor,
  dedupeCaseInsensitive,
  fileExtension,
  type ChunkDraft,
  type ProcessorOptions,
} from '../base-processor.js';
import type { ProcessedContext, RawContextProperties } from '../types.js';
import type { CodeProcessingConfig } from '../../config/schema.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';

export type CodeLanguage =
  | 'python'
  | 'javascript'
  | 'java'
  | 'go'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'ruby'
  | 'php'
  | 'swift'
  | 'kotlin'
  | 'rust';

export type CodeElementType = 'function' | 'class' | 'struct';

interface LanguagePatterns {
  function: RegExp;
  class?: RegExp;
  struct?: RegExp;
  import: RegExp;
  comment: RegExp;
}

export const EXTENSION_TO_LANGUAGE: Readonly<Record<string, CodeLanguage>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'javascript',
  '.tsx': 'javascript',
  '.java': 'java',
  '.go': 'go',
  '.c': 'c',
  '.cpp': 'cpp',
  '.h': 'c',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.rb': 'ruby',
  '.php': 'php',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.rs': 'rust',
};

const LANGUAGE_PATTERNS: Partial<Record<CodeLanguage, LanguagePatterns>> = {
  python: {
    function: /^\s*def\s+(\w+)/,
    class: /^\s*class\s+(\w+)/,
    import: /^\s*(?:from\s+[\w.]+\s+)?import\s+(.+)/,
    comment: /^\s*#(.+)/,
  },
  javascript: {
    function: /^\s*(?:function\s+(\w+)|const\s+(\w+)\s*=\s*(?:async\s+)?\()/,
    class: /^\s*class\s+(\w+)/,
    import: /^\s*import\s+(.+)/,
    comment: /^\s*\/\/(.+)/,
  },
  java: {
    function: /^\s*(?:public|private|protected)?\s+(?:static\s+)?[\w<>]+\s+(\w+)\s*\(/,
    class: /^\s*(?:public\s+)?class\s+(\w+)/,
    import: /^\s*import\s+(.+);/,
    comment: /^\s*\/\/(.+)/,
  },
  go: {
    function: /^\s*func\s+(?:\(\w+\s+\*?\w+\)\s+)?(\w+)/,
    struct: /^\s*type\s+(\w+)\s+struct/,
    import: /^\s*import\s+(.+)/,
    comment: /^\s*\/\/(.+)/,
  },
};

const ELEMENT_TYPES: readonly CodeElementType[] = ['function', 'class', 'struct'];
const OVERVIEW_PREVIEW_LINES = 20;
const MAX_IMPORTS = 20;
const MAX_ENTITIES = 20;

interface CodeElement {
  type: CodeElementType;
  name: string;
  /** 0-based line number */
  line: number;
}

/** First capture group that participated in the match */
function firstGroup(match: RegExpMatchArray): string | undefined {
  return match.slice(1).find((group) => group !== undefined && group !== '');
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function collectMatches(lines: readonly string[], pattern: RegExp): string[] {
  const found: string[] = [];
  for (const line of lines) {
    const match = line.match(pattern);
    const name = match ? firstGroup(match) : undefined;
    if (name !== undefined) found.push(name);
  }
  return found;
}

export function detectLanguage(path: string): CodeLanguage | 'unknown' {
  return EXTENSION_TO_LANGUAGE[fileExtension(path)] ?? 'unknown';
}

export class CodeProcessor extends FileContextProcessor {
  static readonly SUPPORTED_FORMATS: ReadonlySet<string> = new Set(Object.keys(EXTENSION_TO_LANGUAGE));

  readonly name = 'code_processor';
  readonly description = 'Processor for source code files with syntax-aware chunking';

  private readonly config: CodeProcessingConfig;

  constructor(config: Partial<CodeProcessingConfig> = {}, options: ProcessorOptions = {}) {
    const merged = { ...DEFAULT_CONFIG.processing.code, ...config };
    super(merged.enabled, options);
    this.config = merged;
  }

  getSupportedFormats(): ReadonlySet<string> {
    return CodeProcessor.SUPPORTED_FORMATS;
  }

  protected async processFile(path: string, raw: RawContextProperties): Promise<ProcessedContext[]> {
    const content = await readFile(path, 'utf-8');
    const fileName = basename(path);
    const language = detectLanguage(path);
    const lines = content.split('\n');

    const metadata = this.extractMetadata(lines, language, fileName, path);
    const chunks = this.createChunks(lines, language, fileName);

    const functions = metadata.functions ?? [];
    const classes = metadata.classes ?? [];

    let summary = `${capitalize(language)} code with ${lines.length} lines`;
    if (metadata.num_functions !== undefined) summary += `, ${metadata.num_functions} functions`;
    if (metadata.num_classes !== undefined) summary += `, ${metadata.num_classes} classes`;

    const context = this.buildContext(
      raw,
      {
        id: raw.objectId,
        title: fileName,
        summary,
        keywords: [fileName, language, 'code', ...functions.slice(0, 10), ...classes.slice(0, 10)],
        entities: dedupeCaseInsensitive([...functions, ...classes], MAX_ENTITIES),
        confidence: 90,
        importance: 80,
        metadata: { ...metadata },
      },
      chunks
    );
    return context ? [context] : [];
  }

  private extractMetadata(
    lines: readonly string[],
    language: CodeLanguage | 'unknown',
    fileName: string,
    path: string
  ): CodeMetadata {
    const metadata: CodeMetadata = {
      file_name: fileName,
      file_path: path,
      language,
      total_lines: lines.length,
      non_empty_lines: lines.filter((line) => line.trim() !== '').length,
    };

    const patterns = language === 'unknown' ? undefined : LANGUAGE_PATTERNS[language];
    if (!patterns) return metadata;

    if (this.config.extract_functions) {
      metadata.functions = collectMatches(lines, patterns.function);
      metadata.num_functions = metadata.functions.length;
    }
    if (this.config.extract_classes && patterns.class) {
      metadata.classes = collectMatches(lines, patterns.class);
      metadata.num_classes = metadata.classes.length;
    }
    if (this.config.extract_imports) {
      const imports = collectMatches(lines, patterns.import);
      metadata.imports = imports.slice(0, MAX_IMPORTS);
      metadata.num_imports = imports.length;
    }
    if (this.config.extract_comments) {
      metadata.num_comment_lines = lines.filter((line) => patterns.comment.test(line)).length;
    }
    return metadata;
  }

  private createChunks(
    lines: readonly string[],
    language: CodeLanguage | 'unknown',
    fileName: string
  ): ChunkDraft[] {
    const previewCount = Math.min(OVERVIEW_PREVIEW_LINES, lines.length);
    const overview: ChunkDraft = {
      text:
        `Code File: ${fileName}\n` +
        `Language: ${language}\n` +
        `Total Lines: ${lines.length}\n` +
        `\nFirst ${previewCount} lines:\n` +
        lines.slice(0, previewCount).join('\n'),
      keywords: [fileName, language, 'code', 'overview'],
    };

    const patterns = language === 'unknown' ? undefined : LANGUAGE_PATTERNS[language];
    const sections = patterns ? this.chunkBySyntax(lines, patterns, language, fileName) : [];

    return [overview, ...(sections.length > 0 ? sections : this.chunkByLines(lines, fileName))];
  }

  private chunkBySyntax(
    lines: readonly string[],
    patterns: LanguagePatterns,
    language: CodeLanguage | 'unknown',
    fileName: string
  ): ChunkDraft[] {
    const elements: CodeElement[] = [];
    lines.forEach((line, index) => {
      for (const type of ELEMENT_TYPES) {
        const pattern = patterns[type];
        const match = pattern ? line.match(pattern) : null;
        if (match) {
          elements.push({ type, name: firstGroup(match) ?? 'unknown', line: index });
        }
      }
    });

    return elements.map((element, i) => {
      const start = element.line;
      const end = elements[i + 1]?.line ?? lines.length;
      return {
        text:
          `${capitalize(element.type)}: ${element.name}\n` +
          `Lines ${start + 1}-${end}\n\n` +
          lines.slice(start, end).join('\n'),
        keywords: [fileName, language, element.type, element.name],
        entities: [element.name],
      };
    });
  }

  private chunkByLines(lines: readonly string[], fileName: string): ChunkDraft[] {
    const size = this.config.max_lines_per_chunk;
    const chunks: ChunkDraft[] = [];
    for (let i = 0; i < lines.length; i += size) {
      const window = lines.slice(i, i + size);
      const first = i + 1;
      const last = i + window.length;
      chunks.push({
        text: `Lines ${first}-${last}\n\n${window.join('\n')}`,
        keywords: [fileName, `lines_${first}_${last}`],
      });
    }
    return chunks;
  }
}

type CodeMetadata = {
  file_name: string;
  file_path: string;
  language: CodeLanguage | 'unknown';
  total_lines: number;
  non_empty_lines: number;
  functions?: string[];
  num_functions?: number;
  classes?: string[];
  num_classes?: number;
  imports?: string[];
  num_imports?: number;
  num_comment_lines?: number;
};
