import { describe, it, expect } from 'vitest';
import { ReActLoop } from '../../src/agent/react-loop';
import { AGENT_TYPES } from '../../src/agent/profiles';
import {
  formatSubagentResult,
  isSubagentSuccess,
  runSubagent,
  type SubagentResult,
} from '../../src/agent/subagent-runner';
import { createProfileRegistry } from '../../src/tools/registry';
import { ScriptedProvider } from '../helpers';

function subagentResult(overrides: Partial<SubagentResult>): SubagentResult {
  return {
    agentType: 'explore',
    description: 'Find config',
    outcome: 'completed',
    result: 'Found it',
    turnCount: 2,
    toolCallCount: 1,
    usage: { input_tokens: 0, output_tokens: 0 },
    ...overrides,
  };
}

describe('runSubagent', () => {
  it('should run with a fresh history and the tools of its type', async () => {
    const provider = ScriptedProvider.sequence([{ text: 'The config lives in src/config.ts' }]);

    const result = await runSubagent(
      { description: 'Find config', prompt: 'Where is the config?', agentType: 'explore' },
      { provider, cwd: '/work', env: {}, actor: 'agent', maxTurns: 5 }
    );

    expect(result).toMatchObject({
      agentType: 'explore',
      outcome: 'completed',
      result: 'The config lives in src/config.ts',
      turnCount: 1,
      toolCallCount: 0,
    });
    const [request] = provider.requests;
    expect(request.messages).toHaveLength(1);
    expect(request.tools.map((tool) => tool.function.name)).toEqual(['bash', 'read_file']);
    expect(request.options?.systemInstruction).toBe(
      `${AGENT_TYPES.explore.systemPrompt}\n\nWorking directory: /work`
    );
  });

  it('should return only the final text to the parent through the Task tool', async () => {
    const provider = ScriptedProvider.sequence([
      {
        toolCalls: [
          {
            id: 'call_task',
            name: 'Task',
            input: { description: 'Survey', prompt: 'List the modules', agent_type: 'plan' },
          },
        ],
      },
      { text: '1. parser\n2. printer' },
      { text: 'There are two modules' },
    ]);
    const loop = new ReActLoop(provider, createProfileRegistry('subagent'), { maxTurns: 5, cwd: '/work' });

    const result = await loop.run('What modules exist?');

    expect(result.outcome).toBe('completed');
    expect(result.result).toBe('There are two modules');
    expect(result.toolCalls).toEqual([
      {
        id: 'call_task',
        name: 'Task',
        input: { description: 'Survey', prompt: 'List the modules', agent_type: 'plan' },
        result: '1. parser\n2. printer',
      },
    ]);
    const subRequest = provider.requests[1];
    expect(subRequest.messages).toHaveLength(1);
    expect(subRequest.tools.map((tool) => tool.function.name)).not.toContain('Task');
    expect(provider.requests[2].messages).toHaveLength(3);
  });
});

describe('formatSubagentResult', () => {
  it('should pass through the final text', () => {
    expect(formatSubagentResult(subagentResult({}))).toBe('Found it');
    expect(formatSubagentResult(subagentResult({ result: '' }))).toBe('(no summary)');
  });

  it('should describe runs that ended without an answer', () => {
    expect(
      formatSubagentResult(subagentResult({ outcome: 'exhausted', result: null, turnCount: 8 }))
    ).toBe('Sub-agent (explore) stopped after 8 turns without a final answer');
    expect(formatSubagentResult(subagentResult({ outcome: 'aborted', agentType: 'code', result: null }))).toBe(
      'Sub-agent (code) was aborted'
    );
  });

  it('should only count completed runs as success', () => {
    expect(isSubagentSuccess(subagentResult({}))).toBe(true);
    expect(isSubagentSuccess(subagentResult({ outcome: 'exhausted' }))).toBe(false);
  });
});
