/**
 * Scripted GenerationProvider for auto-tagging tests.
 */

import type { ChatMessage, ChatOptions, ChatResponse, GenerationProvider } from '../providers/types.js';

/** A reply is returned as content; an Error is thrown */
export type ScriptedReply = string | Error;

export class MockGenerationProvider implements GenerationProvider {
  readonly name = 'openai';
  readonly model = 'test-model';
  readonly calls: Array<{ messages: readonly ChatMessage[]; options: ChatOptions | undefined }> = [];
  private readonly replies: ScriptedReply[];

  /** The last reply repeats once the script runs out */
  constructor(...replies: ScriptedReply[]) {
    this.replies = replies.length > 0 ? replies : [''];
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages, options });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply instanceof Error) throw reply;
    return { content: reply ?? '' };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
