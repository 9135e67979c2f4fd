/**
 * Centralized Path Definitions
 *
 * ~/.chunkwise/
 * └── config.toml
 *
 * CHUNKWISE_HOME replaces ~/.chunkwise when set.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const CONFIG_FILE_NAME = 'config.toml';

/**
 * @returns Absolute path to the chunkwise home directory
 */
export function getHomeDir(): string {
  return getEnv('CHUNKWISE_HOME') ?? join(homedir(), '.chunkwise');
}

/**
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getHomeDir(), CONFIG_FILE_NAME);
}
