/**
 * Capability profiles and sub-agent types
 *
 * The agent grows one capability at a time: shell only, then file tools, then
 * a todo plan, then sub-agents, then the persistent task graph. Each stage is
 * the same loop with a different tool set and reminder behaviour.
 */

import type { ToolName } from '../types/tools';

export const PROFILE_NAMES = ['bash', 'tools', 'todo', 'subagent', 'tasks'] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

export interface CapabilityProfile {
  name: ProfileName;
  description: string;
  tools: readonly ToolName[];
  /** Remind the model to keep its todo list current */
  todoNag: boolean;
}

const FILE_TOOLS: readonly ToolName[] = ['bash', 'read_file', 'write_file', 'edit_file'];

const TASK_TOOLS: readonly ToolName[] = [
  'TaskCreate',
  'TaskGet',
  'TaskUpdate',
  'TaskList',
  'TaskOutput',
  'TaskStop',
];

export const PROFILES: Record<ProfileName, CapabilityProfile> = {
  bash: {
    name: 'bash',
    description: 'Shell access only',
    tools: ['bash'],
    todoNag: false,
  },
  tools: {
    name: 'tools',
    description: 'Shell plus file read/write/edit',
    tools: FILE_TOOLS,
    todoNag: false,
  },
  todo: {
    name: 'todo',
    description: 'File tools plus a todo list the model is reminded to maintain',
    tools: [...FILE_TOOLS, 'TodoWrite'],
    todoNag: true,
  },
  subagent: {
    name: 'subagent',
    description: 'Todo planning plus delegation to sub-agents',
    tools: [...FILE_TOOLS, 'TodoWrite', 'Task'],
    todoNag: true,
  },
  tasks: {
    name: 'tasks',
    description: 'Persistent task graph with dependencies, background work and sub-agents',
    tools: [...FILE_TOOLS, ...TASK_TOOLS, 'Task'],
    todoNag: false,
  },
};

export function isProfileName(value: string): value is ProfileName {
  return PROFILE_NAMES.some((name) => name === value);
}

export const INITIAL_REMINDER =
  '<reminder>Use TodoWrite to plan multi-step work before you start, and keep the todo list current.</reminder>';

export const NAG_REMINDER =
  '<reminder>You have not updated your todos in a while. Use TodoWrite to record progress.</reminder>';

export const AGENT_TYPE_NAMES = ['explore', 'code', 'plan'] as const;

export type AgentType = (typeof AGENT_TYPE_NAMES)[number];

export interface AgentTypeDefinition {
  description: string;
  tools: readonly ToolName[];
  systemPrompt: string;
}

const READ_ONLY_TOOLS: readonly ToolName[] = ['bash', 'read_file'];

export const AGENT_TYPES: Record<AgentType, AgentTypeDefinition> = {
  explore: {
    description: 'Read-only agent for searching and analyzing code',
    tools: READ_ONLY_TOOLS,
    systemPrompt:
      'You are an exploration agent. Search and read, never modify files. Return a concise summary.',
  },
  code: {
    description: 'Full-access agent for implementing changes',
    tools: FILE_TOOLS,
    systemPrompt: 'You are a coding agent. Implement the requested change efficiently.',
  },
  plan: {
    description: 'Read-only agent for designing an implementation plan',
    tools: READ_ONLY_TOOLS,
    systemPrompt:
      'You are a planning agent. Analyze the codebase and output a numbered implementation plan. Do not modify files.',
  },
};

/** Tools granted to a sub-agent; never includes `Task` */
export function getToolsForAgent(type: AgentType): ToolName[] {
  return AGENT_TYPES[type].tools.filter((name) => name !== 'Task');
}
