/**
 * ReAct loop - the agent turn loop
 *
 * Each turn sends the full history to the provider. A response that stops for
 * tool use has every requested call dispatched in request order, and the
 * results go back as one user message keyed by tool_use_id. Any other stop
 * ends the run with the response text. Running out of turns is a normal
 * outcome (`exhausted`), not an error.
 */

import { randomUUID } from 'crypto';
import type { LLMProvider, TokenUsage } from '../providers/base';
import type { ToolRegistry } from '../tools/registry';
import type { ToolContext, ToolDefinition } from '../types/tools';
import type { TaskGraph } from '../tasks/task-graph';
import {
  createAssistantMessage,
  createResultMessage,
  createToolResultBlock,
  createUserMessage,
  extractText,
  extractToolUses,
  type AssistantContentBlock,
  type ConversationMessage,
  type SDKAssistantMessage,
  type SDKResultMessage,
  type StopReason,
  type ToolResultBlock,
  type UserContentBlock,
} from '../types/messages';
import { createSessionContext } from '../session/context';
import { clipText } from '../tools/safe-path';
import { logger } from '../utils/logger';
import { INITIAL_REMINDER, NAG_REMINDER } from './profiles';
import { formatSubagentResult, runSubagent } from './subagent-runner';

export const DEFAULT_TOOL_RESULT_LIMIT = 5000;
export const DEFAULT_NAG_AFTER_ROUNDS = 3;

export interface ReActLoopConfig {
  maxTurns: number;
  systemPrompt?: string;
  /** Characters of each tool result kept in the conversation (default: 5000) */
  toolResultLimit?: number;
  /** Remind the model to maintain its todo list */
  todoNag?: boolean;
  /** Rounds without a TodoWrite call before the reminder is sent (default: 3) */
  nagAfterRounds?: number;
  cwd?: string;
  env?: Record<string, string>;
  actor?: string;
  taskGraph?: TaskGraph;
  abortController?: AbortController;
  /** Existing session context to reuse instead of creating one */
  context?: ToolContext;
}

export type ReActOutcome = 'completed' | 'exhausted' | 'aborted';

export interface ToolCallRecord {
  id: string;
  name: string;
  input: unknown;
  /** Result as inserted into the conversation */
  result: string;
}

export interface ReActResult {
  outcome: ReActOutcome;
  /** Final text; null unless the run completed */
  result: string | null;
  /** Full transcript, including any history passed in */
  messages: ConversationMessage[];
  toolCalls: ToolCallRecord[];
  turnCount: number;
  usage: TokenUsage;
}

export type ReActStreamEvent =
  | { type: 'assistant'; message: SDKAssistantMessage }
  | { type: 'tool_result'; toolUseId: string; toolName: string; content: string; isError: boolean }
  | { type: 'result'; message: SDKResultMessage };

function isErrorResult(content: string): boolean {
  return content.startsWith('Error: ') || content.startsWith('Unknown tool: ');
}

export class ReActLoop {
  private readonly toolResultLimit: number;
  private readonly nagAfterRounds: number;
  private readonly id: string;
  private latestContext: ToolContext;
  private contextClaimed = false;

  constructor(
    private readonly provider: LLMProvider,
    private readonly toolRegistry: ToolRegistry,
    private readonly config: ReActLoopConfig,
    sessionId?: string
  ) {
    this.toolResultLimit = config.toolResultLimit ?? DEFAULT_TOOL_RESULT_LIMIT;
    this.nagAfterRounds = config.nagAfterRounds ?? DEFAULT_NAG_AFTER_ROUNDS;
    this.id = config.context?.sessionId ?? sessionId ?? randomUUID();
    this.latestContext = this.contextForRun();
  }

  get sessionId(): string {
    return this.id;
  }

  /**
   * Context of the most recent run. Each run gets its own unless one was
   * passed in `config.context`, which every run then shares.
   */
  get context(): ToolContext {
    return this.latestContext;
  }

  /** The first run takes the context built with the loop; later runs get a new one */
  private claimContext(): ToolContext {
    if (this.contextClaimed) {
      this.latestContext = this.contextForRun();
    }
    this.contextClaimed = true;
    return this.latestContext;
  }

  private contextForRun(): ToolContext {
    const context =
      this.config.context ??
      createSessionContext({
        sessionId: this.id,
        cwd: this.config.cwd,
        env: this.config.env,
        actor: this.config.actor,
        taskGraph: this.config.taskGraph,
        abortController: this.config.abortController,
      });

    if (this.toolRegistry.has('Task') && !context.launchSubagent) {
      context.launchSubagent = async (request) =>
        formatSubagentResult(
          await runSubagent(request, {
            provider: this.provider,
            cwd: context.cwd,
            env: context.env,
            actor: context.actor,
            taskGraph: context.taskGraph,
            abortController: context.abortController,
            maxTurns: this.config.maxTurns,
            toolResultLimit: this.toolResultLimit,
          })
        );
    }
    return context;
  }

  /** Run to completion, exhaustion or abort */
  async run(prompt: string, history: ConversationMessage[] = []): Promise<ReActResult> {
    const stream = this.runStream(prompt, history);
    for (;;) {
      const next = await stream.next();
      if (next.done) {
        return next.value;
      }
    }
  }

  async *runStream(
    prompt: string,
    history: ConversationMessage[] = []
  ): AsyncGenerator<ReActStreamEvent, ReActResult> {
    const startTime = Date.now();
    let apiTime = 0;
    const context = this.claimContext();
    const signal = context.abortController?.signal;
    const sessionId = context.sessionId;

    const seed = this.config.todoNag ? `${prompt}\n\n${INITIAL_REMINDER}` : prompt;
    const messages: ConversationMessage[] = [
      ...history,
      createUserMessage(seed, sessionId, randomUUID()),
    ];
    const toolCalls: ToolCallRecord[] = [];
    const usage: TokenUsage = { input_tokens: 0, output_tokens: 0 };
    const tools = this.toolRegistry.getDefinitions();
    let turnCount = 0;
    let roundsWithoutTodo = 0;

    const finish = (outcome: ReActOutcome, result: string | null): ReActResult => ({
      outcome,
      result,
      messages,
      toolCalls,
      turnCount,
      usage,
    });

    const resultMessage = (subtype: SDKResultMessage['subtype'], result: string | null) =>
      createResultMessage(
        subtype,
        result,
        Date.now() - startTime,
        apiTime,
        turnCount,
        { ...usage },
        sessionId,
        randomUUID()
      );

    while (turnCount < this.config.maxTurns) {
      if (signal?.aborted) {
        logger.debug('[ReActLoop] Aborted before turn:', { turn: turnCount + 1 });
        yield { type: 'result', message: resultMessage('error_aborted', null) };
        return finish('aborted', null);
      }

      turnCount++;
      logger.debug('[ReActLoop] Turn:', { turn: turnCount, messages: messages.length });

      const apiStart = Date.now();
      let assistant: SDKAssistantMessage;
      try {
        assistant = await this.requestTurn(messages, tools, signal, usage);
      } catch (error) {
        if (signal?.aborted) {
          yield { type: 'result', message: resultMessage('error_aborted', null) };
          return finish('aborted', null);
        }
        throw error;
      } finally {
        apiTime += Date.now() - apiStart;
      }

      messages.push(assistant);
      yield { type: 'assistant', message: assistant };

      const toolUses = extractToolUses(assistant);
      if (assistant.message.stop_reason !== 'tool_use' || toolUses.length === 0) {
        const text = extractText(assistant);
        logger.debug('[ReActLoop] Completed:', { turns: turnCount, toolCalls: toolCalls.length });
        yield { type: 'result', message: resultMessage('success', text) };
        return finish('completed', text);
      }

      const results: UserContentBlock[] = [];
      let usedTodo = false;
      for (const toolUse of toolUses) {
        const raw = await this.toolRegistry.dispatch(toolUse.name, toolUse.input, context);
        const content = clipText(raw, this.toolResultLimit);
        const block: ToolResultBlock = createToolResultBlock(
          toolUse.id,
          content,
          isErrorResult(content)
        );

        results.push(block);
        toolCalls.push({ id: toolUse.id, name: toolUse.name, input: toolUse.input, result: content });
        usedTodo ||= toolUse.name === 'TodoWrite';

        yield {
          type: 'tool_result',
          toolUseId: toolUse.id,
          toolName: toolUse.name,
          content,
          isError: block.is_error,
        };
      }

      if (this.config.todoNag) {
        roundsWithoutTodo = usedTodo ? 0 : roundsWithoutTodo + 1;
        if (roundsWithoutTodo >= this.nagAfterRounds) {
          results.push({ type: 'text', text: NAG_REMINDER });
          roundsWithoutTodo = 0;
        }
      }

      messages.push(createUserMessage(results, sessionId, randomUUID()));
    }

    logger.debug('[ReActLoop] Turn budget exhausted:', { maxTurns: this.config.maxTurns });
    yield { type: 'result', message: resultMessage('error_max_turns', null) };
    return finish('exhausted', null);
  }

  /** Send one request and assemble the streamed chunks into an assistant message */
  private async requestTurn(
    messages: ConversationMessage[],
    tools: ToolDefinition[],
    signal: AbortSignal | undefined,
    usage: TokenUsage
  ): Promise<SDKAssistantMessage> {
    let text = '';
    const toolUseBlocks: AssistantContentBlock[] = [];
    let stopReason: StopReason | undefined;

    for await (const chunk of this.provider.chat(messages, tools, signal, {
      systemInstruction: this.config.systemPrompt,
    })) {
      switch (chunk.type) {
        case 'content':
          text += chunk.delta;
          break;
        case 'tool_call':
          toolUseBlocks.push({
            type: 'tool_use',
            id: chunk.tool_call.id,
            name: chunk.tool_call.name,
            input: chunk.tool_call.input,
          });
          break;
        case 'usage':
          usage.input_tokens += chunk.usage.input_tokens;
          usage.output_tokens += chunk.usage.output_tokens;
          break;
        case 'done':
          stopReason = chunk.stopReason;
          break;
      }
    }

    const content: AssistantContentBlock[] = text ? [{ type: 'text', text }, ...toolUseBlocks] : toolUseBlocks;
    return createAssistantMessage(
      content,
      stopReason ?? (toolUseBlocks.length > 0 ? 'tool_use' : 'end_turn'),
      this.id,
      randomUUID()
    );
  }
}
