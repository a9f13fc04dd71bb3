/**
 * Anthropic Provider implementation
 */

import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, type LLMChunk, type ChatOptions, type ProviderConfig } from './base';
import type { ConversationMessage, StopReason } from '../types/messages';
import type { ToolDefinition } from '../types/tools';

export interface AnthropicConfig extends ProviderConfig {}

const DEFAULT_MAX_TOKENS = 4096;

function toStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return reason;
    default:
      return 'end_turn';
  }
}

export class AnthropicProvider extends LLMProvider {
  private client: Anthropic;

  constructor(config: AnthropicConfig) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  async *chat(
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    signal?: AbortSignal,
    options?: ChatOptions
  ): AsyncIterable<LLMChunk> {
    const response = await this.client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: this.config.temperature,
        system: options?.systemInstruction,
        messages: this.convertMessages(messages),
        tools: tools?.map((tool) => ({
          name: tool.function.name,
          description: tool.function.description,
          input_schema: tool.function.parameters,
        })),
      },
      { signal }
    );

    for (const block of response.content) {
      if (block.type === 'text') {
        yield { type: 'content', delta: block.text };
      } else if (block.type === 'tool_use') {
        yield {
          type: 'tool_call',
          tool_call: { id: block.id, name: block.name, input: block.input },
        };
      }
    }

    yield {
      type: 'usage',
      usage: {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      },
    };

    yield { type: 'done', stopReason: toStopReason(response.stop_reason) };
  }

  private convertMessages(messages: ConversationMessage[]): Anthropic.MessageParam[] {
    return messages.map((msg): Anthropic.MessageParam => {
      if (msg.type === 'user') {
        const { content } = msg.message;
        if (typeof content === 'string') {
          return { role: 'user', content };
        }
        return {
          role: 'user',
          content: content.map((block): Anthropic.ContentBlockParam =>
            block.type === 'tool_result'
              ? {
                  type: 'tool_result',
                  tool_use_id: block.tool_use_id,
                  content: block.content,
                  is_error: block.is_error,
                }
              : { type: 'text', text: block.text }
          ),
        };
      }

      return {
        role: 'assistant',
        content: msg.message.content
          // The API rejects empty text blocks
          .filter((block) => block.type !== 'text' || block.text !== '')
          .map((block): Anthropic.ContentBlockParam =>
            block.type === 'text'
              ? { type: 'text', text: block.text }
              : { type: 'tool_use', id: block.id, name: block.name, input: block.input }
          ),
      };
    });
  }
}
