/**
 * TaskUpdate tool - Update task properties and dependencies
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import type { TaskUpdateFields } from '../types/task';
import { TASK_STATUSES } from '../types/task';
import { NO_TASK_LIST } from './task-format';

const idList = z.array(z.coerce.string());

const inputSchema = z.object({
  taskId: z.coerce.string(),
  status: z.string().optional(),
  subject: z.string().optional(),
  description: z.string().optional(),
  activeForm: z.string().optional(),
  owner: z.string().optional(),
  metadata: z.record(z.string().nullable()).optional(),
  addBlockedBy: idList.optional(),
  addBlocks: idList.optional(),
});

export type TaskUpdateInput = z.infer<typeof inputSchema>;

export interface TaskUpdateOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    taskId: {
      type: 'string',
      description: 'Task ID to update',
    },
    status: {
      type: 'string',
      enum: [...TASK_STATUSES],
      description: 'New task status',
    },
    subject: {
      type: 'string',
      description: 'New task title',
    },
    description: {
      type: 'string',
      description: 'New task description',
    },
    activeForm: {
      type: 'string',
      description: 'New present continuous form text',
    },
    owner: {
      type: 'string',
      description: 'Task owner/agent name',
    },
    metadata: {
      type: 'object',
      description: 'Metadata to merge (set key to null to delete)',
    },
    addBlockedBy: {
      type: 'array',
      items: { type: 'string' },
      description: 'Task IDs that must complete before this task can start',
    },
    addBlocks: {
      type: 'array',
      items: { type: 'string' },
      description: 'Task IDs that cannot start until this task completes',
    },
  },
  required: ['taskId'],
};

export class TaskUpdateTool implements Tool<TaskUpdateInput, TaskUpdateOutput> {
  name = 'TaskUpdate' as const;
  description =
    "Update a task's status, subject, description, owner, metadata or dependencies. Completing a task unblocks the tasks waiting on it.";
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TaskUpdateInput, context: ToolContext): Promise<TaskUpdateOutput> => {
    if (!context.taskGraph) {
      return { error: NO_TASK_LIST };
    }

    const updates: TaskUpdateFields = {};
    const updatedFields: string[] = [];

    if (input.status !== undefined) {
      updates.status = input.status;
      updatedFields.push('status');
    }
    if (input.subject !== undefined) {
      updates.subject = input.subject;
      updatedFields.push('subject');
    }
    if (input.description !== undefined) {
      updates.description = input.description;
      updatedFields.push('description');
    }
    if (input.activeForm !== undefined) {
      updates.activeForm = input.activeForm;
      updatedFields.push('activeForm');
    }
    if (input.owner !== undefined) {
      updates.owner = input.owner;
      updatedFields.push('owner');
    }
    if (input.metadata !== undefined) {
      updates.metadata = input.metadata;
      updatedFields.push('metadata');
    }
    if (input.addBlockedBy !== undefined && input.addBlockedBy.length > 0) {
      updates.addBlockedBy = input.addBlockedBy;
      updatedFields.push('blockedBy');
    }
    if (input.addBlocks !== undefined && input.addBlocks.length > 0) {
      updates.addBlocks = input.addBlocks;
      updatedFields.push('blocks');
    }

    const result = await context.taskGraph.update(input.taskId, updates, context.actor);
    if (!result.ok) {
      return result.reason === 'not_found'
        ? { error: `Task #${result.taskId} not found` }
        : { error: `Validation failed: ${result.message}` };
    }

    const { task } = result;
    if (updatedFields.length === 0) {
      return { output: `No changes made to task #${task.id}` };
    }
    if (updatedFields.length === 1) {
      const field = updatedFields[0];
      const detail = field === 'status' ? ` to ${task.status}` : '';
      return { output: `Updated task #${task.id} ${field}${detail}` };
    }
    return { output: `Updated task #${task.id} (${updatedFields.join(', ')})` };
  };
}

// Export singleton instance
export const taskUpdateTool = new TaskUpdateTool();
