/**
 * read_file tool - Read a file inside the working directory
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { clipOutput, safePath } from './safe-path';

export const MAX_READ_CHARS = 50_000;

const inputSchema = z.object({
  path: z.string().min(1),
  limit: z.number().int().positive().optional(),
});

export type ReadFileInput = z.infer<typeof inputSchema>;

export interface ReadFileOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    path: {
      type: 'string',
      description: 'File path, relative to the working directory',
    },
    limit: {
      type: 'integer',
      description: 'Maximum number of lines to return',
    },
  },
  required: ['path'],
};

export class ReadFileTool implements Tool<ReadFileInput, ReadFileOutput> {
  name = 'read_file' as const;
  description = 'Read the contents of a file.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: ReadFileInput, context: ToolContext): Promise<ReadFileOutput> => {
    const content = await readFile(safePath(context.cwd, input.path), 'utf-8');

    if (input.limit !== undefined) {
      const lines = content.split('\n');
      if (lines.length > input.limit) {
        const shown = lines.slice(0, input.limit).join('\n');
        return {
          output: clipOutput(`${shown}\n... (${lines.length - input.limit} more lines)`, MAX_READ_CHARS),
        };
      }
    }

    return { output: clipOutput(content, MAX_READ_CHARS) };
  };
}

export const readFileTool = new ReadFileTool();
