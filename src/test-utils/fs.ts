/**
 * Per-suite temporary directories.
 */

import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempDir {
  path: string;
  /** Write a file relative to the directory and return its absolute path */
  write(relativePath: string, content: string | Buffer): string;
  cleanup(): void;
}

export function createTempDir(prefix = 'chunkwise-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    write(relativePath, content) {
      const target = join(path, relativePath);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content);
      return target;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}
