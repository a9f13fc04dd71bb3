/**
 * Task tool - Delegate a focused piece of work to a sub-agent
 *
 * The sub-agent runs with a fresh history and the tool set of its agent type.
 * Agent types never include this tool, so delegation cannot recurse.
 */

import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';
import { AGENT_TYPE_NAMES, AGENT_TYPES } from '../agent/profiles';

const inputSchema = z.object({
  description: z.string().min(1),
  prompt: z.string().min(1),
  agent_type: z.enum(AGENT_TYPE_NAMES),
});

export type SubagentInput = z.infer<typeof inputSchema>;

export interface SubagentOutput {
  output?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    description: {
      type: 'string',
      description: 'Short (3-5 word) description of the delegated work',
    },
    prompt: {
      type: 'string',
      description: 'Complete instructions for the sub-agent',
    },
    agent_type: {
      type: 'string',
      enum: [...AGENT_TYPE_NAMES],
      description: Object.entries(AGENT_TYPES)
        .map(([name, type]) => `${name}: ${type.description}`)
        .join('; '),
    },
  },
  required: ['description', 'prompt', 'agent_type'],
};

export class SubagentTool implements Tool<SubagentInput, SubagentOutput> {
  name = 'Task' as const;
  description =
    'Delegate a task to a sub-agent. Types: explore (read-only), code (full access), plan (read-only).';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: SubagentInput, context: ToolContext): Promise<SubagentOutput> => {
    if (!context.launchSubagent) {
      return { error: 'Sub-agents are not available in this session' };
    }

    const output = await context.launchSubagent({
      description: input.description,
      prompt: input.prompt,
      agentType: input.agent_type,
    });
    return { output };
  };
}

export const subagentTool = new SubagentTool();
