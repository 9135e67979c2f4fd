/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTempDir, createRecordingLogger } from '../../test-utils/index.js';
 *
 * const dir = createTempDir();
 * afterAll(() => dir.cleanup());
 * ```
 */

export { InMemoryContextStorage, makeHit, type StorageCall } from './storage.js';
export { MockGenerationProvider, type ScriptedReply } from './provider.js';
export { createTempDir, type TempDir } from './fs.js';
export { createRecordingLogger, type RecordingLogger } from './logger.js';
