/**
 * TaskCreate tool - Create a new task
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { NO_TASK_LIST } from './task-format';

const inputSchema = z.object({
  subject: z.string().trim().min(1),
  description: z.string().optional(),
  activeForm: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

export type TaskCreateInput = z.infer<typeof inputSchema>;

export interface TaskCreateOutput {
  output?: string;
  taskId?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    subject: {
      type: 'string',
      description: 'Task title in imperative form (e.g., "Run tests")',
    },
    description: {
      type: 'string',
      description: 'Detailed description with context and acceptance criteria',
    },
    activeForm: {
      type: 'string',
      description: 'Present continuous form shown when in_progress (e.g., "Running tests")',
    },
    metadata: {
      type: 'object',
      description: 'String key/value pairs stored with the task',
    },
  },
  required: ['subject'],
};

export class TaskCreateTool implements Tool<TaskCreateInput, TaskCreateOutput> {
  name = 'TaskCreate' as const;
  description = 'Create a new task with a subject, description, and optional active form.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TaskCreateInput, context: ToolContext): Promise<TaskCreateOutput> => {
    if (!context.taskGraph) {
      return { error: NO_TASK_LIST };
    }

    const task = await context.taskGraph.create({
      subject: input.subject,
      description: input.description,
      activeForm: input.activeForm,
      metadata: input.metadata,
    });

    return {
      output: `Task #${task.id} created successfully: ${task.subject}`,
      taskId: task.id,
    };
  };
}

// Export singleton instance
export const taskCreateTool = new TaskCreateTool();
