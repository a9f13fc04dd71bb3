/**
 * LLM provider base - the completion endpoint as the loop sees it
 *
 * A provider turns one request (history, tool manifest, system instruction)
 * into a stream of chunks. The loop assembles the chunks into one assistant
 * message; the final `done` chunk carries the stop condition.
 */

import type { ConversationMessage, StopReason } from '../types/messages';
import type { ToolDefinition } from '../types/tools';

export interface ProviderConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ChatOptions {
  /** System prompt, sent out of band from the message history */
  systemInstruction?: string;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export type LLMChunk =
  | { type: 'content'; delta: string }
  | { type: 'tool_call'; tool_call: { id: string; name: string; input: unknown } }
  | { type: 'usage'; usage: TokenUsage }
  | { type: 'done'; stopReason: StopReason };

export abstract class LLMProvider {
  protected readonly config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  abstract chat(
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    signal?: AbortSignal,
    options?: ChatOptions
  ): AsyncIterable<LLMChunk>;

  getModel(): string {
    return this.config.model;
  }
}

/** Parse tool arguments sent as a JSON string; unparseable text is passed through */
export function parseToolArguments(raw: string): unknown {
  if (raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
