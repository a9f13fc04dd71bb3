/**
 * TodoWrite tool - Replace the session's todo list
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { MAX_TODO_ITEMS } from '../todos/todo-manager';

const inputSchema = z.object({
  items: z.array(
    z.object({
      content: z.string().optional(),
      status: z.string().optional(),
      activeForm: z.string().optional(),
    })
  ),
});

export type TodoWriteInput = z.infer<typeof inputSchema>;

export interface TodoWriteOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    items: {
      type: 'array',
      description: `Complete todo list (max ${MAX_TODO_ITEMS} items, at most one in_progress)`,
      items: {
        type: 'object',
        properties: {
          content: { type: 'string', description: 'What needs to be done' },
          status: {
            type: 'string',
            enum: ['pending', 'in_progress', 'completed'],
          },
          activeForm: {
            type: 'string',
            description: 'Present continuous form shown while in progress (e.g. "Running tests")',
          },
        },
        required: ['content', 'status', 'activeForm'],
      },
    },
  },
  required: ['items'],
};

export class TodoWriteTool implements Tool<TodoWriteInput, TodoWriteOutput> {
  name = 'TodoWrite' as const;
  description = 'Update the todo list to plan and track progress on multi-step work.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TodoWriteInput, context: ToolContext): Promise<TodoWriteOutput> => {
    const result = context.todos.update(input.items);
    return result.ok ? { output: result.rendered } : { error: result.message };
  };
}

export const todoWriteTool = new TodoWriteTool();
