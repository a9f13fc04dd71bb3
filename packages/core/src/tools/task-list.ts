/**
 * TaskList tool - List all tasks
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { formatTaskLine, NO_TASK_LIST } from './task-format';

const inputSchema = z.object({});

export type TaskListInput = z.infer<typeof inputSchema>;

export interface TaskListOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {},
  required: [],
};

export class TaskListTool implements Tool<TaskListInput, TaskListOutput> {
  name = 'TaskList' as const;
  description = 'List all tasks with their status, owner and blockers.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (_input: TaskListInput, context: ToolContext): Promise<TaskListOutput> => {
    if (!context.taskGraph) {
      return { error: NO_TASK_LIST };
    }

    const tasks = context.taskGraph.listAll();
    if (tasks.length === 0) {
      return { output: 'No tasks found' };
    }

    return { output: tasks.map(formatTaskLine).join('\n') };
  };
}

// Export singleton instance
export const taskListTool = new TaskListTool();
