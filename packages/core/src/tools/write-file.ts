/**
 * write_file tool - Create or overwrite a file inside the working directory
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { safePath } from './safe-path';

const inputSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export type WriteFileInput = z.infer<typeof inputSchema>;

export interface WriteFileOutput {
  output?: string;
  bytesWritten?: number;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    path: {
      type: 'string',
      description: 'File path, relative to the working directory',
    },
    content: {
      type: 'string',
      description: 'Full content to write',
    },
  },
  required: ['path', 'content'],
};

export class WriteFileTool implements Tool<WriteFileInput, WriteFileOutput> {
  name = 'write_file' as const;
  description = 'Write content to a file, creating parent directories and overwriting any existing file.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: WriteFileInput, context: ToolContext): Promise<WriteFileOutput> => {
    const target = safePath(context.cwd, input.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, input.content, 'utf-8');

    const bytesWritten = Buffer.byteLength(input.content, 'utf-8');
    return { output: `Wrote ${bytesWritten} bytes to ${input.path}`, bytesWritten };
  };
}

export const writeFileTool = new WriteFileTool();
