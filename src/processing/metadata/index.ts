export {
  MetadataExtractor,
  CATEGORY_EXTENSIONS,
  categoryFor,
  type MetadataCategory,
  type CategoryExtractor,
  type MetadataExtractorOptions,
} from './metadata-extractor.js';
export {
  extractPdfMetadata,
  extractDocxMetadata,
  extractXlsxMetadata,
  extractImageMetadata,
  extractCodeMetadata,
  type MetadataFields,
} from './extractors.js';
export { getMimeType } from './mime.js';
