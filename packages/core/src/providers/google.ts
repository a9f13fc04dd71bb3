import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { jsonSchema, streamText, tool, type ModelMessage, type ToolSet } from 'ai';
import { LLMProvider, type ProviderConfig, type LLMChunk, type ChatOptions } from './base';
import type { ConversationMessage, StopReason } from '../types/messages';
import type { ToolDefinition } from '../types/tools';

export interface GoogleConfig extends ProviderConfig {
  // Google-specific config
}

function toStopReason(finishReason: string): StopReason {
  if (finishReason === 'tool-calls') return 'tool_use';
  if (finishReason === 'length') return 'max_tokens';
  return 'end_turn';
}

export class GoogleProvider extends LLMProvider {
  private googleAI: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(config: GoogleConfig) {
    super(config);
    this.googleAI = createGoogleGenerativeAI({
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
    // Tools are declared without `execute`, so the SDK stops and hands the calls back
    const toolSet: ToolSet = {};
    for (const definition of tools ?? []) {
      toolSet[definition.function.name] = tool({
        description: definition.function.description,
        inputSchema: jsonSchema(definition.function.parameters),
      });
    }

    // Use Vercel AI SDK's streamText
    const result = streamText({
      model: this.googleAI(this.config.model),
      messages: this.convertToModelMessages(messages),
      system: options?.systemInstruction,
      tools: toolSet,
      maxOutputTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      abortSignal: signal,
    });

    for await (const textDelta of result.textStream) {
      yield { type: 'content', delta: textDelta };
    }

    for (const call of await result.toolCalls) {
      yield {
        type: 'tool_call',
        tool_call: { id: call.toolCallId, name: call.toolName, input: call.input },
      };
    }

    const usage = await result.usage;
    yield {
      type: 'usage',
      usage: {
        input_tokens: usage.inputTokens ?? 0,
        output_tokens: usage.outputTokens ?? 0,
      },
    };

    yield { type: 'done', stopReason: toStopReason(await result.finishReason) };
  }

  private convertToModelMessages(messages: ConversationMessage[]): ModelMessage[] {
    // Tool results must name their tool; remember names from the calls
    const toolNames = new Map<string, string>();
    const result: ModelMessage[] = [];

    for (const msg of messages) {
      if (msg.type === 'assistant') {
        result.push({
          role: 'assistant',
          content: msg.message.content.map((block) => {
            if (block.type === 'text') {
              return { type: 'text' as const, text: block.text };
            }
            toolNames.set(block.id, block.name);
            return {
              type: 'tool-call' as const,
              toolCallId: block.id,
              toolName: block.name,
              input: block.input,
            };
          }),
        });
        continue;
      }

      const { content } = msg.message;
      if (typeof content === 'string') {
        result.push({ role: 'user', content });
        continue;
      }

      const toolResults = content.flatMap((block) =>
        block.type === 'tool_result'
          ? [
              {
                type: 'tool-result' as const,
                toolCallId: block.tool_use_id,
                toolName: toolNames.get(block.tool_use_id) ?? 'unknown',
                output: { type: 'text' as const, value: block.content },
              },
            ]
          : []
      );
      if (toolResults.length > 0) {
        result.push({ role: 'tool', content: toolResults });
      }

      const text = content.map((block) => (block.type === 'text' ? block.text : '')).join('');
      if (text) {
        result.push({ role: 'user', content: text });
      }
    }

    return result;
  }
}
