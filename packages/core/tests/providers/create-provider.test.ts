import { describe, it, expect } from 'vitest';
import {
  AnthropicProvider,
  GoogleProvider,
  OpenAIProvider,
  createProvider,
  detectProvider,
  parseToolArguments,
} from '../../src/providers';
import { ProviderError } from '../../src/errors';

const apiKeys = { anthropic: 'test-secret', openai: 'test-secret', google: 'test-secret' };

describe('detectProvider', () => {
  it('should pick the provider from the model name', () => {
    expect(detectProvider('gemini-2.0-flash')).toBe('google');
    expect(detectProvider('claude-sonnet-4-5')).toBe('anthropic');
    expect(detectProvider('Claude-Haiku')).toBe('anthropic');
    expect(detectProvider('gpt-4o')).toBe('openai');
    expect(detectProvider('llama3')).toBe('openai');
  });
});

describe('createProvider', () => {
  it('should build the detected provider', () => {
    expect(createProvider({ model: 'gemini-2.0-flash', apiKeys })).toBeInstanceOf(GoogleProvider);
    expect(createProvider({ model: 'claude-sonnet-4-5', apiKeys })).toBeInstanceOf(AnthropicProvider);
    expect(createProvider({ model: 'gpt-4o', apiKeys })).toBeInstanceOf(OpenAIProvider);
  });

  it('should honour an explicit provider over detection', () => {
    const provider = createProvider({
      model: 'qwen2.5-coder',
      provider: 'openai',
      apiKeys,
      baseURL: 'http://localhost:11434/v1',
    });

    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.getModel()).toBe('qwen2.5-coder');
  });

  it('should name the missing environment variable', () => {
    expect(() => createProvider({ model: 'claude-sonnet-4-5', apiKeys: {} })).toThrow(ProviderError);
    expect(() => createProvider({ model: 'gemini-2.0-flash', apiKeys: { openai: 'test-secret' } })).toThrow(
      'google API key is required. Set the GEMINI_API_KEY environment variable.'
    );
  });
});

describe('parseToolArguments', () => {
  it('should treat empty arguments as an empty object', () => {
    expect(parseToolArguments('')).toEqual({});
    expect(parseToolArguments('  ')).toEqual({});
  });

  it('should parse JSON arguments', () => {
    expect(parseToolArguments('{"command":"ls -la"}')).toEqual({ command: 'ls -la' });
  });

  it('should pass unparseable text through for validation to reject', () => {
    expect(parseToolArguments('{"command":')).toBe('{"command":');
  });
});
