/**
 * TaskGet tool - Get task details by ID
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { formatTaskDetails, NO_TASK_LIST } from './task-format';

const inputSchema = z.object({
  taskId: z.coerce.string(),
});

export type TaskGetInput = z.infer<typeof inputSchema>;

export interface TaskGetOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    taskId: {
      type: 'string',
      description: 'Task ID to retrieve',
    },
  },
  required: ['taskId'],
};

export class TaskGetTool implements Tool<TaskGetInput, TaskGetOutput> {
  name = 'TaskGet' as const;
  description = 'Get the full details of a specific task by its ID.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TaskGetInput, context: ToolContext): Promise<TaskGetOutput> => {
    if (!context.taskGraph) {
      return { error: NO_TASK_LIST };
    }

    const task = context.taskGraph.get(input.taskId);
    if (!task) {
      return { error: `Task #${input.taskId} not found` };
    }

    return { output: formatTaskDetails(task) };
  };
}

// Export singleton instance
export const taskGetTool = new TaskGetTool();
