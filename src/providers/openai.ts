/**
 * Chat-completion provider on the OpenAI client.
 *
 * Covers OpenAI itself, Ollama's OpenAI-compatible /v1 endpoint and any
 * other OpenAI-compatible base URL. Keys are never logged or echoed in
 * error messages.
 */

import OpenAI from 'openai';
import type { ProviderType } from '../config/schema.js';
import type { ChatMessage, ChatOptions, ChatResponse, GenerationProvider } from './types.js';

export interface OpenAIGenerationProviderOptions {
  name: ProviderType;
  model: string;
  apiKey: string;
  baseURL?: string;
  /** @default 60000 */
  timeout?: number;
  /** @default 2 */
  maxRetries?: number;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name: ProviderType;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIGenerationProviderOptions) {
    this.name = options.name;
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? 2,
    });
  }

  async chat(messages: readonly ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map((message) => ({ role: message.role, content: message.content })),
    };
    if (options.maxTokens !== undefined) {
      params.max_tokens = options.maxTokens;
    }
    if (options.temperature !== undefined) {
      params.temperature = options.temperature;
    }

    const completion = await this.client.chat.completions.create(params);
    const choice = completion.choices[0];
    return {
      content: choice?.message.content ?? '',
      finishReason: choice?.finish_reason,
    };
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}
