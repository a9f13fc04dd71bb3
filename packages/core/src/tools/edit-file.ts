/**
 * edit_file tool - Replace the first occurrence of a string in a file
 */

import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { safePath } from './safe-path';

const inputSchema = z.object({
  path: z.string().min(1),
  old_string: z.string().min(1),
  new_string: z.string(),
});

export type EditFileInput = z.infer<typeof inputSchema>;

export interface EditFileOutput {
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
    old_string: {
      type: 'string',
      description: 'Exact text to replace (first occurrence)',
    },
    new_string: {
      type: 'string',
      description: 'Replacement text',
    },
  },
  required: ['path', 'old_string', 'new_string'],
};

export class EditFileTool implements Tool<EditFileInput, EditFileOutput> {
  name = 'edit_file' as const;
  description = 'Replace the first occurrence of old_string with new_string in a file.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: EditFileInput, context: ToolContext): Promise<EditFileOutput> => {
    const target = safePath(context.cwd, input.path);
    const content = await readFile(target, 'utf-8');

    const index = content.indexOf(input.old_string);
    if (index === -1) {
      return { error: `Text not found in ${input.path}` };
    }

    const updated =
      content.slice(0, index) + input.new_string + content.slice(index + input.old_string.length);
    await writeFile(target, updated, 'utf-8');

    return { output: `Edited ${input.path}` };
  };
}

export const editFileTool = new EditFileTool();
