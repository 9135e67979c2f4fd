/**
 * Format processors
 */

export {
  CodeProcessor,
  EXTENSION_TO_LANGUAGE,
  detectLanguage,
  type CodeLanguage,
  type CodeElementType,
} from './code-processor.js';

export {
  ExcelProcessor,
  columnLetter,
  inferColumnType,
  toPrimitive,
  type ColumnType,
  type SheetTable,
  type SheetComment,
} from './excel-processor.js';

export {
  StructuredDataProcessor,
  parseStructuredData,
  typeName,
  ROOT_PATH,
  type DataTypeName,
  type SchemaNode,
} from './structured-data-processor.js';
