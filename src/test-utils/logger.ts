import type { Logger } from '../utils/logger.js';

export interface RecordingLogger extends Logger {
  warnings: string[];
  debugs: string[];
  infos: string[];
}

/** Logger that keeps every message for assertions */
export function createRecordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const debugs: string[] = [];
  const infos: string[] = [];
  return {
    warnings,
    debugs,
    infos,
    warn: (message) => warnings.push(message),
    debug: (message) => debugs.push(message),
    info: (message) => infos.push(message),
  };
}
