/**
 * In-memory ContextStorage for search tests.
 *
 * Hits are returned in insertion order (the order a vector store would
 * rank them), filtered by `metadata.context_type` when context types are
 * requested, and cut to topK.
 */

import type { ContextStorage, StorageSearchHit, StoredContext } from '../search/types.js';

export interface StorageCall {
  query: string;
  topK: number;
  contextTypes: readonly string[] | undefined;
}

export class InMemoryContextStorage implements ContextStorage {
  readonly calls: StorageCall[] = [];
  /** When set, every call rejects with this error */
  failure: Error | null = null;

  constructor(
    private readonly hits: StorageSearchHit[] = [],
    private readonly contexts: Record<string, StoredContext> = {}
  ) {}

  async searchContext(query: string, topK: number, contextTypes?: readonly string[]): Promise<StorageSearchHit[]> {
    this.calls.push({ query, topK, contextTypes });
    if (this.failure) throw this.failure;

    return this.hits
      .filter((hit) => {
        if (!contextTypes || contextTypes.length === 0) return true;
        const type = hit.metadata.context_type;
        return typeof type === 'string' && contextTypes.includes(type);
      })
      .slice(0, topK)
      .map((hit) => ({ ...hit, metadata: { ...hit.metadata } }));
  }

  async getContextById(id: string): Promise<StoredContext | null> {
    if (this.failure) throw this.failure;
    return this.contexts[id] ?? null;
  }
}

/** Build a hit with sensible metadata defaults */
export function makeHit(id: string, distance: number, metadata: Record<string, unknown> = {}): StorageSearchHit {
  return {
    id,
    distance,
    metadata: { context_type: 'semantic_context', ...metadata },
  };
}
