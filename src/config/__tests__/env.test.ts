/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking. Blank values
 * count as unset, so stubbing '' masks anything in the host environment.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache, DEFAULT_OLLAMA_HOST } from '../env.js';
import { getHomeDir, getConfigPath } from '../paths.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('CHUNKWISE_HOME', '');
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  describe('loadEnv()', () => {
    it('loads OPENAI_API_KEY when set', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');
      expect(loadEnv().OPENAI_API_KEY).toBe('test-secret');
    });

    it('treats blank values as unset', () => {
      const env = loadEnv();

      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.OPENAI_BASE_URL).toBeUndefined();
      expect(env.CHUNKWISE_HOME).toBeUndefined();
    });

    it('provides default OLLAMA_HOST when not set', () => {
      expect(loadEnv().OLLAMA_HOST).toBe(DEFAULT_OLLAMA_HOST);
    });

    it('uses custom OLLAMA_HOST when set', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://gpu-box:11434');
      expect(loadEnv().OLLAMA_HOST).toBe('http://gpu-box:11434');
    });

    it('drops a malformed URL but keeps the other variables', () => {
      vi.stubEnv('OLLAMA_HOST', 'not a url');
      vi.stubEnv('OPENAI_BASE_URL', 'also bad');
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      const env = loadEnv();

      expect(env.OLLAMA_HOST).toBe(DEFAULT_OLLAMA_HOST);
      expect(env.OPENAI_BASE_URL).toBeUndefined();
      expect(env.OPENAI_API_KEY).toBe('test-secret');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENAI_API_KEY', 'first');
      loadEnv();
      vi.stubEnv('OPENAI_API_KEY', 'second');

      expect(loadEnv().OPENAI_API_KEY).toBe('first');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('OPENAI_API_KEY', 'first');
      loadEnv();
      vi.stubEnv('OPENAI_API_KEY', 'second');
      _clearEnvCache();

      expect(loadEnv().OPENAI_API_KEY).toBe('second');
    });
  });

  describe('getEnv()', () => {
    it('returns the value for a specific key', () => {
      vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:8080/v1');
      expect(getEnv('OPENAI_BASE_URL')).toBe('http://localhost:8080/v1');
    });
  });

  describe('blank values', () => {
    it('treats a whitespace-only key as missing', () => {
      vi.stubEnv('OPENAI_API_KEY', '   ');
      expect(getEnv('OPENAI_API_KEY')).toBeUndefined();
    });
  });

  describe('paths', () => {
    it('uses CHUNKWISE_HOME when set', () => {
      vi.stubEnv('CHUNKWISE_HOME', '/tmp/chunkwise-home');

      expect(getHomeDir()).toBe('/tmp/chunkwise-home');
      expect(getConfigPath()).toBe('/tmp/chunkwise-home/config.toml');
    });

    it('falls back to ~/.chunkwise', () => {
      expect(getHomeDir().endsWith('.chunkwise')).toBe(true);
    });
  });
});
