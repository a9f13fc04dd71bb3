/**
 * OpenAI Provider implementation
 */

import OpenAI from 'openai';
import { LLMProvider, parseToolArguments, type LLMChunk, type ChatOptions, type ProviderConfig } from './base';
import type { ConversationMessage, StopReason } from '../types/messages';
import type { ToolDefinition } from '../types/tools';

export interface OpenAIConfig extends ProviderConfig {}

function toStopReason(finishReason: string | null | undefined, sawToolCall: boolean): StopReason {
  if (finishReason === 'tool_calls' || (finishReason == null && sawToolCall)) return 'tool_use';
  if (finishReason === 'length') return 'max_tokens';
  return 'end_turn';
}

export class OpenAIProvider extends LLMProvider {
  private client: OpenAI;

  constructor(config: OpenAIConfig) {
    super(config);

    this.client = new OpenAI({
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
    // systemInstruction from options is prepended as a system message
    const openaiMessages = this.convertMessages(messages, options?.systemInstruction);

    const openaiTools = tools?.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.function.name,
        description: tool.function.description,
        parameters: tool.function.parameters,
      },
    }));

    const stream = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: openaiMessages,
        tools: openaiTools,
        tool_choice: openaiTools && openaiTools.length > 0 ? 'auto' : undefined,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        stream: true,
        stream_options: { include_usage: true },
      },
      { signal }
    );

    let currentToolCall: {
      id: string;
      name: string;
      arguments: string;
    } | null = null;
    let finishReason: string | null | undefined;
    let sawToolCall = false;

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      const delta = choice?.delta;

      if (delta?.content) {
        yield {
          type: 'content',
          delta: delta.content,
        };
      }

      if (delta?.tool_calls) {
        for (const toolCall of delta.tool_calls) {
          if (toolCall.id) {
            // New tool call starting
            if (currentToolCall) {
              yield {
                type: 'tool_call',
                tool_call: {
                  id: currentToolCall.id,
                  name: currentToolCall.name,
                  input: parseToolArguments(currentToolCall.arguments),
                },
              };
            }
            sawToolCall = true;
            currentToolCall = {
              id: toolCall.id,
              name: toolCall.function?.name || '',
              arguments: toolCall.function?.arguments || '',
            };
          } else if (currentToolCall && toolCall.function?.arguments) {
            // Accumulate arguments
            currentToolCall.arguments += toolCall.function.arguments;
          }
        }
      }

      if (choice?.finish_reason) {
        finishReason = choice.finish_reason;
      }

      // Usage arrives in the final chunk
      if (chunk.usage) {
        yield {
          type: 'usage',
          usage: {
            input_tokens: chunk.usage.prompt_tokens,
            output_tokens: chunk.usage.completion_tokens,
          },
        };
      }
    }

    // Yield any pending tool call
    if (currentToolCall) {
      yield {
        type: 'tool_call',
        tool_call: {
          id: currentToolCall.id,
          name: currentToolCall.name,
          input: parseToolArguments(currentToolCall.arguments),
        },
      };
    }

    yield { type: 'done', stopReason: toStopReason(finishReason, sawToolCall) };
  }

  private convertMessages(
    messages: ConversationMessage[],
    systemInstruction?: string
  ): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
    const result: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

    if (systemInstruction) {
      result.push({ role: 'system', content: systemInstruction });
    }

    for (const msg of messages) {
      if (msg.type === 'user') {
        const { content } = msg.message;
        if (typeof content === 'string') {
          result.push({ role: 'user', content });
          continue;
        }
        // Tool results become `tool` messages; any trailing text follows as a user turn
        for (const block of content) {
          if (block.type === 'tool_result') {
            result.push({ role: 'tool', tool_call_id: block.tool_use_id, content: block.content });
          }
        }
        const text = content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('');
        if (text) {
          result.push({ role: 'user', content: text });
        }
        continue;
      }

      const text = msg.message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      const toolCalls = msg.message.content.flatMap((block) =>
        block.type === 'tool_use'
          ? [
              {
                id: block.id,
                type: 'function' as const,
                function: { name: block.name, arguments: JSON.stringify(block.input ?? {}) },
              },
            ]
          : []
      );

      if (toolCalls.length > 0) {
        result.push({ role: 'assistant', content: text || null, tool_calls: toolCalls });
      } else {
        result.push({ role: 'assistant', content: text });
      }
    }

    return result;
  }
}
