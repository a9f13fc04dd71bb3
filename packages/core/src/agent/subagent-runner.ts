/**
 * Sub-agent runner - executes delegated work in an isolated loop
 *
 * A sub-agent starts from a history of one user message, gets its own session
 * context (todos and background units are not shared with the parent) and the
 * tool set of its agent type. It shares the parent's provider, working
 * directory and task list.
 */

import type { LLMProvider, TokenUsage } from '../providers/base';
import type { TaskGraph } from '../tasks/task-graph';
import { createToolRegistry } from '../tools/registry';
import type { SubagentRequest } from '../types/tools';
import { logger } from '../utils/logger';
import { AGENT_TYPES, getToolsForAgent, type AgentType } from './profiles';
import { ReActLoop, type ReActOutcome } from './react-loop';

export interface SubagentContext {
  provider: LLMProvider;
  cwd: string;
  env: Record<string, string>;
  actor: string;
  taskGraph?: TaskGraph;
  abortController?: AbortController;
  maxTurns: number;
  toolResultLimit?: number;
}

export interface SubagentResult {
  agentType: AgentType;
  description: string;
  outcome: ReActOutcome;
  result: string | null;
  turnCount: number;
  toolCallCount: number;
  usage: TokenUsage;
}

export async function runSubagent(
  request: SubagentRequest,
  context: SubagentContext
): Promise<SubagentResult> {
  const definition = AGENT_TYPES[request.agentType];
  const registry = createToolRegistry(getToolsForAgent(request.agentType));

  logger.debug('[Subagent] Starting:', {
    agentType: request.agentType,
    description: request.description,
    tools: registry.names(),
  });

  const loop = new ReActLoop(context.provider, registry, {
    maxTurns: context.maxTurns,
    systemPrompt: `${definition.systemPrompt}\n\nWorking directory: ${context.cwd}`,
    toolResultLimit: context.toolResultLimit,
    cwd: context.cwd,
    env: context.env,
    actor: context.actor,
    taskGraph: context.taskGraph,
    abortController: context.abortController,
  });

  const result = await loop.run(request.prompt);

  logger.debug('[Subagent] Finished:', {
    agentType: request.agentType,
    outcome: result.outcome,
    turns: result.turnCount,
  });

  return {
    agentType: request.agentType,
    description: request.description,
    outcome: result.outcome,
    result: result.result,
    turnCount: result.turnCount,
    toolCallCount: result.toolCalls.length,
    usage: result.usage,
  };
}

export function isSubagentSuccess(result: SubagentResult): boolean {
  return result.outcome === 'completed';
}

/** Text returned to the parent agent */
export function formatSubagentResult(result: SubagentResult): string {
  switch (result.outcome) {
    case 'completed':
      return result.result || '(no summary)';
    case 'exhausted':
      return `Sub-agent (${result.agentType}) stopped after ${result.turnCount} turns without a final answer`;
    case 'aborted':
      return `Sub-agent (${result.agentType}) was aborted`;
  }
}
