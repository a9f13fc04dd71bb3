/**
 * Stepwise - Core API
 * Single-query prompt function for one-shot agent interactions
 */

import { logger, type LogLevel } from './utils/logger';
import { loadConfig, type ProviderName } from './config';
import { createProvider } from './providers';
import { createProfileRegistry } from './tools/registry';
import { ReActLoop, type ReActOutcome } from './agent/react-loop';
import { PROFILES, type ProfileName } from './agent/profiles';
import { openTaskGraph } from './tasks/task-graph';
import { taskListDir } from './tasks/task-list-resolver';

export interface PromptOptions {
  /** Model identifier (default: STEPWISE_MODEL) */
  model?: string;
  /** API key (defaults to the provider's environment variable) */
  apiKey?: string;
  /** Provider to use (auto-detected from model name if not specified) */
  provider?: ProviderName;
  /** Base URL for API (OpenAI-compatible endpoints) */
  baseURL?: string;
  /** Maximum conversation turns (default: STEPWISE_MAX_TURNS) */
  maxTurns?: number;
  /** Capability profile deciding the tool set (default: 'tasks') */
  profile?: ProfileName;
  /** System prompt for the agent */
  systemPrompt?: string;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** AbortController for cancellation */
  abortController?: AbortController;
  /** Log level: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: STEPWISE_LOG_LEVEL) */
  logLevel?: LogLevel;
}

export interface PromptResult {
  outcome: ReActOutcome;
  /** Final result text; null when the turn budget ran out or the run was aborted */
  result: string | null;
  /** Total execution time in milliseconds */
  duration_ms: number;
  turnCount: number;
  /** Token usage statistics */
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

/**
 * Execute a single prompt with the agent
 * @param prompt - User's question or task
 *
 * @example
 * ```typescript
 * const result = await prompt("List the open tasks and start the first one", {
 *   model: "claude-sonnet-4-5",
 *   profile: "tasks",
 * });
 * console.log(result.result);
 * ```
 */
export async function prompt(prompt: string, options: PromptOptions = {}): Promise<PromptResult> {
  const config = loadConfig();
  logger.setLevel(options.logLevel ?? config.logLevel);

  const startTime = Date.now();
  const profile = PROFILES[options.profile ?? 'tasks'];
  const model = options.model ?? config.model;
  const providerName = options.provider ?? config.provider;

  const provider = createProvider({
    model,
    provider: providerName,
    apiKeys: options.apiKey
      ? { anthropic: options.apiKey, openai: options.apiKey, google: options.apiKey }
      : config.apiKeys,
    baseURL: options.baseURL ?? config.baseURL,
  });

  const taskGraph = profile.tools.includes('TaskCreate')
    ? await openTaskGraph(taskListDir(config), { defaultActor: config.actor })
    : undefined;

  const loop = new ReActLoop(provider, createProfileRegistry(profile.name), {
    maxTurns: options.maxTurns ?? config.maxTurns,
    systemPrompt: options.systemPrompt,
    todoNag: profile.todoNag,
    cwd: options.cwd,
    env: options.env,
    actor: config.actor,
    taskGraph,
    abortController: options.abortController,
  });

  const result = await loop.run(prompt);

  return {
    outcome: result.outcome,
    result: result.result,
    duration_ms: Date.now() - startTime,
    turnCount: result.turnCount,
    usage: result.usage,
  };
}

// Re-export core types
export type {
  StopReason,
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  AssistantContentBlock,
  UserContentBlock,
  ConversationMessage,
  SDKMessage,
  SDKUserMessage,
  SDKAssistantMessage,
  SDKResultMessage,
} from './types/messages';

export type {
  Tool,
  ToolName,
  ToolDefinition,
  ToolContext,
  ToolOutput,
  JSONSchema,
  JSONSchemaProperty,
  SubagentRequest,
  SubagentLauncher,
} from './types/tools';
export { TOOL_NAMES, isToolName } from './types/tools';

// Re-export task types
export type {
  Task,
  TaskStatus,
  TaskCreateFields,
  TaskUpdateFields,
  TaskUpdateResult,
} from './types/task';
export { TASK_STATUSES, isTaskStatus } from './types/task';

// Re-export task list engine
export { TaskStore, HIGH_WATERMARK_FILE, taskFileName } from './tasks/task-store';
export { TaskGraph, openTaskGraph, type TaskGraphOptions } from './tasks/task-graph';
export { KeyedMutex } from './tasks/keyed-mutex';
export {
  DEFAULT_TASK_LIST_ID,
  resolveTaskListId,
  sanitizeListId,
  taskListDir,
  type TaskListSource,
} from './tasks/task-list-resolver';

// Re-export session state
export { TodoManager, MAX_TODO_ITEMS, type TodoItem, type TodoItemInput, type TodoUpdateResult } from './todos/todo-manager';
export {
  BackgroundTracker,
  type BackgroundUnit,
  type BackgroundStatus,
  type BackgroundWork,
} from './session/background';
export { createSessionContext, type SessionContextOptions } from './session/context';

// Re-export providers
export {
  createProvider,
  detectProvider,
  LLMProvider,
  AnthropicProvider,
  OpenAIProvider,
  GoogleProvider,
  type CreateProviderOptions,
  type LLMChunk,
  type ProviderConfig,
  type ChatOptions,
  type TokenUsage,
} from './providers';

// Re-export tools
export {
  ToolRegistry,
  BUILT_IN_TOOLS,
  createToolRegistry,
  createProfileRegistry,
  createDefaultRegistry,
  formatToolOutput,
  BashTool,
  bashTool,
  ReadFileTool,
  readFileTool,
  WriteFileTool,
  writeFileTool,
  EditFileTool,
  editFileTool,
  TodoWriteTool,
  todoWriteTool,
  TaskCreateTool,
  taskCreateTool,
  TaskGetTool,
  taskGetTool,
  TaskUpdateTool,
  taskUpdateTool,
  TaskListTool,
  taskListTool,
  TaskOutputTool,
  taskOutputTool,
  TaskStopTool,
  taskStopTool,
  SubagentTool,
  subagentTool,
} from './tools/registry';
export { safePath, clipOutput, clipText } from './tools/safe-path';
export { formatTaskLine, formatTaskDetails } from './tools/task-format';

// Re-export agent
export {
  ReActLoop,
  DEFAULT_TOOL_RESULT_LIMIT,
  type ReActLoopConfig,
  type ReActResult,
  type ReActOutcome,
  type ReActStreamEvent,
  type ToolCallRecord,
} from './agent/react-loop';
export {
  PROFILES,
  PROFILE_NAMES,
  AGENT_TYPES,
  AGENT_TYPE_NAMES,
  INITIAL_REMINDER,
  NAG_REMINDER,
  isProfileName,
  getToolsForAgent,
  type ProfileName,
  type CapabilityProfile,
  type AgentType,
  type AgentTypeDefinition,
} from './agent/profiles';
export {
  runSubagent,
  isSubagentSuccess,
  formatSubagentResult,
  type SubagentResult,
  type SubagentContext,
} from './agent/subagent-runner';

// Re-export message helpers
export {
  createUserMessage,
  createAssistantMessage,
  createToolResultBlock,
  createResultMessage,
  extractText,
  extractToolUses,
} from './types/messages';

// Re-export configuration and errors
export { loadConfig, type StepwiseConfig, type ProviderName } from './config';
export { StepwiseError, ConfigError, TaskStoreError, ProviderError, errorMessage } from './errors';

// Re-export logger
export { logger, type LogLevel } from './utils/logger';
