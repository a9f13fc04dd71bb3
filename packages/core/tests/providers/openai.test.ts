import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createUserMessage, createAssistantMessage, createToolResultBlock } from '../../src/types/messages';
import type { LLMChunk } from '../../src/providers/base';
import type { ToolDefinition } from '../../src/types/tools';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

import { OpenAIProvider } from '../../src/providers/openai';

async function* streamOf(chunks: unknown[]) {
  for (const chunk of chunks) {
    yield chunk;
  }
}

async function collect(stream: AsyncIterable<LLMChunk>): Promise<LLMChunk[]> {
  const chunks: LLMChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

const bashDefinition: ToolDefinition = {
  type: 'function',
  function: {
    name: 'bash',
    description: 'Run a shell command',
    parameters: { type: 'object', properties: { command: { type: 'string' } }, required: ['command'] },
  },
};

describe('OpenAIProvider', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('should stream text, usage and an end_turn stop', async () => {
    create.mockResolvedValue(
      streamOf([
        { choices: [{ delta: { content: 'Hello' } }], usage: null },
        { choices: [{ delta: { content: ' World' }, finish_reason: 'stop' }], usage: null },
        { choices: [], usage: { prompt_tokens: 10, completion_tokens: 2 } },
      ])
    );
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o' });

    const chunks = await collect(provider.chat([createUserMessage('Hi', 's1', 'u1')]));

    expect(chunks).toEqual([
      { type: 'content', delta: 'Hello' },
      { type: 'content', delta: ' World' },
      { type: 'usage', usage: { input_tokens: 10, output_tokens: 2 } },
      { type: 'done', stopReason: 'end_turn' },
    ]);
  });

  it('should assemble tool calls whose arguments arrive in pieces', async () => {
    create.mockResolvedValue(
      streamOf([
        {
          choices: [
            { delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'bash', arguments: '{"comm' } }] } },
          ],
        },
        { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'and":"ls"}' } }] } }] },
        {
          choices: [
            { delta: { tool_calls: [{ index: 1, id: 'call_2', function: { name: 'read_file', arguments: '' } }] } },
          ],
        },
        { choices: [{ delta: {}, finish_reason: 'tool_calls' }] },
      ])
    );
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o' });

    const chunks = await collect(provider.chat([createUserMessage('List', 's1', 'u1')], [bashDefinition]));

    expect(chunks).toEqual([
      { type: 'tool_call', tool_call: { id: 'call_1', name: 'bash', input: { command: 'ls' } } },
      { type: 'tool_call', tool_call: { id: 'call_2', name: 'read_file', input: {} } },
      { type: 'done', stopReason: 'tool_use' },
    ]);
  });

  it('should map a length cutoff to max_tokens', async () => {
    create.mockResolvedValue(streamOf([{ choices: [{ delta: { content: 'Part' }, finish_reason: 'length' }] }]));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o' });

    const chunks = await collect(provider.chat([createUserMessage('Write', 's1', 'u1')]));

    expect(chunks[chunks.length - 1]).toEqual({ type: 'done', stopReason: 'max_tokens' });
  });

  it('should send the system instruction, tool calls and tool results in chat format', async () => {
    create.mockResolvedValue(streamOf([{ choices: [{ delta: { content: 'ok' }, finish_reason: 'stop' }] }]));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o', maxTokens: 512 });
    const history = [
      createUserMessage('List files', 's1', 'u1'),
      createAssistantMessage(
        [
          { type: 'text', text: 'Checking' },
          { type: 'tool_use', id: 'call_1', name: 'bash', input: { command: 'ls' } },
        ],
        'tool_use',
        's1',
        'u2'
      ),
      createUserMessage(
        [createToolResultBlock('call_1', 'a.txt', false), { type: 'text', text: '<reminder>todo</reminder>' }],
        's1',
        'u3'
      ),
    ];
    const signal = new AbortController().signal;

    await collect(provider.chat(history, [bashDefinition], signal, { systemInstruction: 'Be brief' }));

    expect(create).toHaveBeenCalledTimes(1);
    const [request, requestOptions] = create.mock.calls[0];
    expect(request).toMatchObject({
      model: 'gpt-4o',
      max_tokens: 512,
      stream: true,
      stream_options: { include_usage: true },
      tool_choice: 'auto',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'List files' },
        {
          role: 'assistant',
          content: 'Checking',
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'bash', arguments: '{"command":"ls"}' } }],
        },
        { role: 'tool', tool_call_id: 'call_1', content: 'a.txt' },
        { role: 'user', content: '<reminder>todo</reminder>' },
      ],
    });
    expect(request.tools).toEqual([
      {
        type: 'function',
        function: {
          name: 'bash',
          description: 'Run a shell command',
          parameters: bashDefinition.function.parameters,
        },
      },
    ]);
    expect(requestOptions).toEqual({ signal });
  });
});
