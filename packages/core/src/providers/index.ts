/**
 * Provider selection
 */

import type { ProviderName } from '../config';
import { ProviderError } from '../errors';
import { AnthropicProvider } from './anthropic';
import type { LLMProvider } from './base';
import { GoogleProvider } from './google';
import { OpenAIProvider } from './openai';

export interface CreateProviderOptions {
  model: string;
  /** Explicit provider; auto-detected from the model name when omitted */
  provider?: ProviderName;
  apiKeys: Partial<Record<ProviderName, string>>;
  /** Base URL override (OpenAI-compatible endpoints) */
  baseURL?: string;
  maxTokens?: number;
}

const API_KEY_VARIABLES: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GEMINI_API_KEY',
};

export function detectProvider(model: string): ProviderName {
  const modelLower = model.toLowerCase();
  if (modelLower.includes('gemini')) return 'google';
  if (modelLower.includes('claude')) return 'anthropic';
  return 'openai';
}

/**
 * Build the provider for a model.
 * @throws ProviderError when the provider's API key is missing
 */
export function createProvider(options: CreateProviderOptions): LLMProvider {
  const providerName = options.provider ?? detectProvider(options.model);
  const apiKey = options.apiKeys[providerName];

  if (!apiKey) {
    throw new ProviderError(
      `${providerName} API key is required. Set the ${API_KEY_VARIABLES[providerName]} environment variable.`
    );
  }

  const config = {
    apiKey,
    model: options.model,
    baseURL: options.baseURL,
    maxTokens: options.maxTokens,
  };

  switch (providerName) {
    case 'google':
      return new GoogleProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'openai':
      return new OpenAIProvider(config);
  }
}

export { LLMProvider, parseToolArguments, type LLMChunk, type ProviderConfig, type ChatOptions, type TokenUsage } from './base';
export { AnthropicProvider, type AnthropicConfig } from './anthropic';
export { OpenAIProvider, type OpenAIConfig } from './openai';
export { GoogleProvider, type GoogleConfig } from './google';
