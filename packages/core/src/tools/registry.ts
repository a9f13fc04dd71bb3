/**
 * Tool registry - manages available tools and dispatches calls to them
 *
 * `dispatch` is the only way the loop runs a tool. It always resolves to the
 * text shown to the model: unknown names, invalid input and thrown errors all
 * come back as strings.
 */

import type { Tool, ToolContext, ToolDefinition, ToolName, ToolOutput } from '../types/tools';
import { isToolName } from '../types/tools';
import { errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { BashTool } from './bash';
import { ReadFileTool } from './read-file';
import { WriteFileTool } from './write-file';
import { EditFileTool } from './edit-file';
import { TodoWriteTool } from './todo-write';
import { TaskCreateTool } from './task-create';
import { TaskGetTool } from './task-get';
import { TaskUpdateTool } from './task-update';
import { TaskListTool } from './task-list';
import { TaskOutputTool } from './task-output';
import { TaskStopTool } from './task-stop';
import { SubagentTool } from './subagent';
import { PROFILES, type ProfileName } from '../agent/profiles';

/** Text the model sees for a tool's structured output */
export function formatToolOutput(output: ToolOutput): string {
  if (output.error !== undefined) {
    return `Error: ${output.error}`;
  }
  return output.output ?? '(no output)';
}

export class ToolRegistry {
  private tools = new Map<ToolName, Tool>();

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  getDefinitions(): ToolDefinition[] {
    return this.getAll().map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  getAllowedTools(allowedTools?: readonly string[]): Tool[] {
    if (!allowedTools || allowedTools.length === 0) {
      return this.getAll();
    }
    return allowedTools
      .map((name) => this.get(name))
      .filter((tool): tool is Tool => tool !== undefined);
  }

  /** Registry restricted to `allowedTools`, sharing the same tool instances */
  subset(allowedTools: readonly string[]): ToolRegistry {
    const subset = new ToolRegistry();
    for (const tool of this.getAllowedTools(allowedTools)) {
      subset.register(tool);
    }
    return subset;
  }

  /** Run one tool call. Never rejects. */
  async dispatch(name: string, args: unknown, context: ToolContext): Promise<string> {
    const tool = this.get(name);
    if (!tool) {
      return `Unknown tool: ${name}`;
    }

    const parsed = tool.inputSchema.safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      return `Error: Invalid input for ${name}: ${issues}`;
    }

    try {
      const output = await tool.handler(parsed.data, context);
      return formatToolOutput(output);
    } catch (error) {
      logger.debug('[ToolRegistry] Tool failed:', { tool: name, error: errorMessage(error) });
      return `Error: ${errorMessage(error)}`;
    }
  }
}

/** Constructors for every built-in tool, keyed by name */
export const BUILT_IN_TOOLS = {
  bash: () => new BashTool(),
  read_file: () => new ReadFileTool(),
  write_file: () => new WriteFileTool(),
  edit_file: () => new EditFileTool(),
  TodoWrite: () => new TodoWriteTool(),
  TaskCreate: () => new TaskCreateTool(),
  TaskGet: () => new TaskGetTool(),
  TaskUpdate: () => new TaskUpdateTool(),
  TaskList: () => new TaskListTool(),
  TaskOutput: () => new TaskOutputTool(),
  TaskStop: () => new TaskStopTool(),
  Task: () => new SubagentTool(),
} satisfies Record<ToolName, () => Tool>;

export function createToolRegistry(names: readonly ToolName[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const name of names) {
    const create: () => Tool = BUILT_IN_TOOLS[name];
    registry.register(create());
  }
  return registry;
}

/** Registry holding exactly the tools of a capability profile */
export function createProfileRegistry(profile: ProfileName): ToolRegistry {
  return createToolRegistry(PROFILES[profile].tools);
}

// Create default registry with every built-in tool
export function createDefaultRegistry(): ToolRegistry {
  return createToolRegistry(Object.keys(BUILT_IN_TOOLS).filter(isToolName));
}

// Re-export tools
export { BashTool, bashTool } from './bash';
export { ReadFileTool, readFileTool } from './read-file';
export { WriteFileTool, writeFileTool } from './write-file';
export { EditFileTool, editFileTool } from './edit-file';
export { TodoWriteTool, todoWriteTool } from './todo-write';
export { TaskCreateTool, taskCreateTool } from './task-create';
export { TaskGetTool, taskGetTool } from './task-get';
export { TaskUpdateTool, taskUpdateTool } from './task-update';
export { TaskListTool, taskListTool } from './task-list';
export { TaskOutputTool, taskOutputTool } from './task-output';
export { TaskStopTool, taskStopTool } from './task-stop';
export { SubagentTool, subagentTool } from './subagent';
