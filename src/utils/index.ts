/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output and chunk bodies
export {
  formatTable,
  renderTextTable,
  type Column,
  type Alignment,
  type Row,
} from './table.js';

// Safe JSON parsing
export { safeJsonParse, parseJsonFromResponse } from './json.js';

// Logging
export { consoleLogger, silentLogger, describeError, type Logger } from './logger.js';

// Type guards
export { isRecord, readString, readNumber } from './guards.js';
