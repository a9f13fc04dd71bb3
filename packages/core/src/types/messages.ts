/**
 * Message types for Stepwise
 * The conversation protocol between user, agent, and tools
 */

/** UUID type for message identification */
export type UUID = string;

/** Why the model stopped generating */
export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

/** Base message interface */
export interface BaseMessage {
  type: string;
  uuid: UUID;
  session_id: string;
}

export interface TextBlock {
  type: 'text';
  text: string;
}

/** A tool invocation requested by the model; `id` is unique per invocation */
export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: unknown;
}

/** Content block for assistant message */
export type AssistantContentBlock = TextBlock | ToolUseBlock;

/** Result of one tool invocation, keyed by the invocation id */
export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error: boolean;
}

/** Tool results may carry a trailing text block (e.g. a reminder) */
export type UserContentBlock = ToolResultBlock | TextBlock;

/** Nested message structure for user messages */
export interface UserMessageContent {
  role: 'user';
  content: string | UserContentBlock[];
}

/** Nested message structure for assistant messages */
export interface AssistantMessageContent {
  role: 'assistant';
  content: AssistantContentBlock[];
  stop_reason: StopReason;
}

/** User message - the initial prompt, or the tool results of one turn */
export interface SDKUserMessage extends BaseMessage {
  type: 'user';
  message: UserMessageContent;
}

/** Assistant message - response from the LLM */
export interface SDKAssistantMessage extends BaseMessage {
  type: 'assistant';
  message: AssistantMessageContent;
}

/** Result message - final outcome of one loop run */
export interface SDKResultMessage extends BaseMessage {
  type: 'result';
  subtype: 'success' | 'error_max_turns' | 'error_aborted';
  duration_ms: number;
  duration_api_ms: number;
  is_error: boolean;
  num_turns: number;
  result: string | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

/** Messages that make up conversation history */
export type ConversationMessage = SDKUserMessage | SDKAssistantMessage;

/** Union type for all SDK messages */
export type SDKMessage = ConversationMessage | SDKResultMessage;

/** Helper function to create user message */
export function createUserMessage(
  content: string | UserContentBlock[],
  sessionId: string,
  uuid: UUID
): SDKUserMessage {
  return {
    type: 'user',
    uuid,
    session_id: sessionId,
    message: { role: 'user', content },
  };
}

/** Helper function to create assistant message */
export function createAssistantMessage(
  contentBlocks: AssistantContentBlock[],
  stopReason: StopReason,
  sessionId: string,
  uuid: UUID
): SDKAssistantMessage {
  return {
    type: 'assistant',
    uuid,
    session_id: sessionId,
    message: {
      role: 'assistant',
      content: contentBlocks,
      stop_reason: stopReason,
    },
  };
}

/** Helper function to create a tool result block */
export function createToolResultBlock(
  toolUseId: string,
  content: string,
  isError: boolean
): ToolResultBlock {
  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content,
    is_error: isError,
  };
}

/** Helper function to create result message */
export function createResultMessage(
  subtype: SDKResultMessage['subtype'],
  result: string | null,
  durationMs: number,
  durationApiMs: number,
  numTurns: number,
  usage: { input_tokens: number; output_tokens: number },
  sessionId: string,
  uuid: UUID
): SDKResultMessage {
  return {
    type: 'result',
    subtype,
    uuid,
    session_id: sessionId,
    duration_ms: durationMs,
    duration_api_ms: durationApiMs,
    is_error: subtype !== 'success',
    num_turns: numTurns,
    result,
    usage,
  };
}

/** Concatenate every text block of an assistant message */
export function extractText(message: SDKAssistantMessage): string {
  return message.message.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}

/** Tool use requests of an assistant message, in the order they were made */
export function extractToolUses(message: SDKAssistantMessage): ToolUseBlock[] {
  return message.message.content.filter(
    (block): block is ToolUseBlock => block.type === 'tool_use'
  );
}
