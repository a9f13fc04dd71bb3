/**
 * TaskOutput tool - Read the status and output of a background unit
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import type { BackgroundUnit } from '../session/background';

const DEFAULT_WAIT_MS = 30_000;

const inputSchema = z.object({
  task_id: z.string().min(1),
  block: z.boolean().default(true),
  timeout: z.number().int().positive().max(600_000).default(DEFAULT_WAIT_MS),
});

export type TaskOutputInput = z.infer<typeof inputSchema>;

export interface TaskOutputOutput {
  output?: string;
  status?: BackgroundUnit['status'];
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    task_id: {
      type: 'string',
      description: 'The background task ID (e.g. b1)',
    },
    block: {
      type: 'boolean',
      description: 'Wait for the task to finish before returning (default true)',
    },
    timeout: {
      type: 'number',
      description: `Maximum wait in milliseconds when blocking (default ${DEFAULT_WAIT_MS})`,
    },
  },
  required: ['task_id'],
};

export function describeUnit(unit: BackgroundUnit): string {
  return JSON.stringify(
    {
      task_id: unit.id,
      description: unit.description,
      status: unit.status,
      exit_code: unit.exitCode,
      output: unit.output,
    },
    null,
    2
  );
}

export class TaskOutputTool implements Tool<TaskOutputInput, TaskOutputOutput> {
  name = 'TaskOutput' as const;
  description =
    'Retrieve output from a background task by its task_id. Use block=true to wait for completion.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: TaskOutputInput, context: ToolContext): Promise<TaskOutputOutput> => {
    const unit = input.block
      ? await context.background.wait(input.task_id, input.timeout)
      : context.background.get(input.task_id);

    if (!unit) {
      return { error: `Background task ${input.task_id} not found` };
    }
    return { output: describeUnit(unit), status: unit.status };
  };
}

export const taskOutputTool = new TaskOutputTool();
