/**
 * Processing Data Model
 *
 * Shapes that flow from a capture component, through a format processor,
 * to storage:
 *
 *   RawContextProperties ──► ContextProcessor.process() ──► ProcessedContext[]
 *
 * Everything a processor returns is readonly; consumers that want to enrich
 * a context (auto-tagging) build a new one.
 */

/** Where a raw file was captured from */
export type ContextSource =
  | 'local_file'
  | 'file_upload'
  | 'google_drive'
  | 'onedrive'
  | 'icloud'
  | 'notion'
  | 'chatgpt'
  | 'perplexity';

/** Sources whose payload is a file on disk that processors can open */
export const FILE_SOURCES: ReadonlySet<ContextSource> = new Set(['local_file', 'file_upload']);

export type ContentFormat = 'text' | 'image' | 'file';

/** Semantic classification attached to a processed context */
export type ContextType =
  | 'semantic_context'
  | 'activity_context'
  | 'procedural_context'
  | 'entity_context'
  | 'intent_context'
  | 'state_context';

/** Names of the processors shipped with this package */
export type ProcessorName = 'code_processor' | 'excel_processor' | 'structured_data_processor';

/**
 * Input envelope describing an unprocessed captured file.
 *
 * Exactly one of `rawData` and `contentPath` is set. The processors in
 * this package only handle `contentPath`.
 */
export interface RawContextProperties {
  readonly objectId: string;
  readonly source: ContextSource;
  readonly contentFormat: ContentFormat;
  readonly rawData?: Buffer;
  readonly contentPath?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createTime: Date;
}

/** One independently searchable text segment */
export interface Chunk {
  readonly text: string;
  /** 0..N-1, dense within one ProcessedContext */
  readonly chunkIndex: number;
  readonly keywords: readonly string[];
  readonly entities: readonly string[];
}

export interface ExtractedData {
  readonly title: string;
  readonly summary: string;
  readonly keywords: readonly string[];
  readonly entities: readonly string[];
  readonly contextType: ContextType;
  /** Integer in [0, 100] */
  readonly confidence: number;
  /** Integer in [0, 100] */
  readonly importance: number;
}

export interface ContextProperties {
  readonly contextType: ContextType;
  readonly source: ContextSource;
  readonly createTime: Date;
  readonly updateTime: Date;
  readonly contentPath: string | undefined;
  readonly contentFormat: ContentFormat;
  readonly title: string;
  readonly summary: string;
  readonly tags: readonly string[];
  /** Format-specific metadata plus `processor` */
  readonly additionalMetadata: Readonly<Record<string, unknown>>;
}

/**
 * The unit of storage and search: one document or sub-document (a single
 * spreadsheet sheet, for instance) with its chunks and summary fields.
 */
export interface ProcessedContext {
  /** objectId, or `${objectId}_${unitName}` for multi-unit files */
  readonly id: string;
  readonly properties: ContextProperties;
  /** Never empty */
  readonly chunks: readonly Chunk[];
  readonly extractedData: ExtractedData;
}

/**
 * Contract every format processor satisfies.
 *
 * `process` never rejects: failures are logged and produce `[]`.
 */
export interface ContextProcessor {
  readonly name: ProcessorName;
  readonly description: string;
  getSupportedFormats(): ReadonlySet<string>;
  canProcess(raw: RawContextProperties): boolean;
  process(raw: RawContextProperties): Promise<ProcessedContext[]>;
}
