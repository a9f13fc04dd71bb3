/**
 * Tool type definitions
 */

import type { z } from 'zod';
import type { TaskGraph } from '../tasks/task-graph';
import type { TodoManager } from '../todos/todo-manager';
import type { BackgroundTracker } from '../session/background';
import type { AgentType } from '../agent/profiles';

/** Every tool the engine knows how to register */
export type ToolName =
  | 'bash'
  | 'read_file'
  | 'write_file'
  | 'edit_file'
  | 'TodoWrite'
  | 'TaskCreate'
  | 'TaskGet'
  | 'TaskUpdate'
  | 'TaskList'
  | 'TaskOutput'
  | 'TaskStop'
  | 'Task';

export const TOOL_NAMES: readonly ToolName[] = [
  'bash',
  'read_file',
  'write_file',
  'edit_file',
  'TodoWrite',
  'TaskCreate',
  'TaskGet',
  'TaskUpdate',
  'TaskList',
  'TaskOutput',
  'TaskStop',
  'Task',
];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/** JSON Schema property, as sent to the model */
export type JSONSchemaProperty = {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
};

/** JSON Schema for a tool's input object */
export type JSONSchema = {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
};

/** Provider-neutral tool manifest entry */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: ToolName;
    description: string;
    parameters: JSONSchema;
  };
}

export interface SubagentRequest {
  description: string;
  prompt: string;
  agentType: AgentType;
}

export type SubagentLauncher = (request: SubagentRequest) => Promise<string>;

/**
 * Session-scoped state passed by reference into every tool call.
 * One context belongs to one loop run and is never shared between runs.
 */
export interface ToolContext {
  sessionId: string;
  cwd: string;
  env: Record<string, string>;
  /** Identity recorded as owner when a task is started */
  actor: string;
  /** Bound task list; task tools report an error when absent */
  taskGraph?: TaskGraph;
  todos: TodoManager;
  background: BackgroundTracker;
  abortController?: AbortController;
  /** Installed by the loop when the Task tool is registered */
  launchSubagent?: SubagentLauncher;
}

/** Common output shape: `output` is the text shown to the model */
export interface ToolOutput {
  output?: string;
  error?: string;
}

export interface Tool<I = unknown, O extends ToolOutput = ToolOutput> {
  name: ToolName;
  description: string;
  parameters: JSONSchema;
  /** Runtime validation of the raw input the model sent */
  inputSchema: z.ZodType<I, z.ZodTypeDef, unknown>;
  handler(input: I, context: ToolContext): Promise<O>;
}
