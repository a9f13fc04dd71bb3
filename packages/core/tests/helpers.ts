/**
 * Shared fixtures: temp directories, tool contexts and a scripted provider
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { LLMProvider, type ChatOptions, type LLMChunk, type TokenUsage } from '../src/providers/base';
import { createSessionContext, type SessionContextOptions } from '../src/session/context';
import type { ConversationMessage, StopReason } from '../src/types/messages';
import type { Tool, ToolContext, ToolDefinition, ToolName } from '../src/types/tools';

export function createTempDir(prefix = 'stepwise-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function createTestContext(options: SessionContextOptions = {}): ToolContext {
  return createSessionContext({ sessionId: 'test-session', env: {}, ...options });
}

export interface ScriptedToolCall {
  id?: string;
  name: string;
  input: unknown;
}

export interface ScriptedTurn {
  text?: string;
  toolCalls?: ScriptedToolCall[];
  usage?: TokenUsage;
  /** Defaults to tool_use when the turn has tool calls, end_turn otherwise */
  stopReason?: StopReason;
}

export interface RecordedRequest {
  messages: ConversationMessage[];
  tools: ToolDefinition[];
  options?: ChatOptions;
}

/**
 * Provider that replays a script. `script(n)` returns the response to the
 * n-th request (0-based) across every loop sharing the provider.
 */
export class ScriptedProvider extends LLMProvider {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly script: (call: number) => ScriptedTurn) {
    super({ apiKey: 'test-secret', model: 'test-model' });
  }

  static sequence(turns: ScriptedTurn[]): ScriptedProvider {
    return new ScriptedProvider((call) => {
      const turn = turns[call];
      if (!turn) {
        throw new Error(`No scripted turn for request ${call}`);
      }
      return turn;
    });
  }

  async *chat(
    messages: ConversationMessage[],
    tools: ToolDefinition[] = [],
    _signal?: AbortSignal,
    options?: ChatOptions
  ): AsyncIterable<LLMChunk> {
    const call = this.requests.length;
    this.requests.push({ messages: [...messages], tools, options });
    const turn = this.script(call);

    if (turn.text) {
      yield { type: 'content', delta: turn.text };
    }
    const toolCalls = turn.toolCalls ?? [];
    for (const [index, toolCall] of toolCalls.entries()) {
      yield {
        type: 'tool_call',
        tool_call: {
          id: toolCall.id ?? `call_${call}_${index}`,
          name: toolCall.name,
          input: toolCall.input,
        },
      };
    }
    if (turn.usage) {
      yield { type: 'usage', usage: turn.usage };
    }
    yield {
      type: 'done',
      stopReason: turn.stopReason ?? (toolCalls.length > 0 ? 'tool_use' : 'end_turn'),
    };
  }
}

const anyInput = z.record(z.unknown());

/** Tool that answers with `respond(input)`; registered under an existing tool name */
export function createFakeTool(
  name: ToolName,
  respond: (input: Record<string, unknown>, context: ToolContext) => string | Promise<string>
): Tool<Record<string, unknown>> {
  return {
    name,
    description: `Fake ${name}`,
    parameters: { type: 'object', properties: {} },
    inputSchema: anyInput,
    handler: async (input, context) => ({ output: await respond(input, context) }),
  };
}
