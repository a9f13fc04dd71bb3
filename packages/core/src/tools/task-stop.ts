/**
 * TaskStop tool - Ask a background unit to stop
 *
 * Stopping only flags the unit; the work notices the flag on its next poll.
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';

const inputSchema = z.object({
  task_id: z.string().min(1),
});

export type TaskStopInput = z.infer<typeof inputSchema>;

export interface TaskStopOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    task_id: {
      type: 'string',
      description: 'The background task ID to stop',
    },
  },
  required: ['task_id'],
};

export class TaskStopTool implements Tool<TaskStopInput, TaskStopOutput> {
  name = 'TaskStop' as const;
  description = 'Stop a running background task by its task_id.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TaskStopInput, context: ToolContext): Promise<TaskStopOutput> => {
    const unit = context.background.stop(input.task_id);
    if (!unit) {
      return { error: `Background task ${input.task_id} not found` };
    }

    const message =
      unit.status === 'stopped'
        ? `Task ${unit.id} has been stopped`
        : `Task ${unit.id} already finished with status ${unit.status}`;
    return {
      output: JSON.stringify({ task_id: unit.id, status: unit.status, message }),
    };
  };
}

export const taskStopTool = new TaskStopTool();
