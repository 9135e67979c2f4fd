/**
 * Generation capability consumed by the auto-tagging service.
 */

import type { ProviderType } from '../config/schema.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface ChatResponse {
  /** Generated text; empty when the model produced nothing */
  content: string;
  finishReason?: string;
}

export interface GenerationProvider {
  readonly name: ProviderType;
  readonly model: string;
  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
  /** Resolves false instead of rejecting when the endpoint is unreachable */
  isAvailable(): Promise<boolean>;
}
