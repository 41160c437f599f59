import type { LlmConfig } from '../config';
import type { ModelClient } from './types';
import type { FetchLike } from './http';
import { createOpenAiClient } from './openaiClient';
import { createAnthropicClient } from './anthropicClient';
import { createGeminiClient } from './geminiClient';

const DEFAULT_BASE_URLS = {
  openai: 'https://api.openai.com/v1',
  anthropic: 'https://api.anthropic.com/v1',
} as const;

/** Picks the provider named in config; callers only see ModelClient. */
export const createModelClient = (config: LlmConfig, deps: { fetch?: FetchLike } = {}): ModelClient => {
  switch (config.provider) {
    case 'openai':
      return createOpenAiClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl ?? DEFAULT_BASE_URLS.openai,
        model: config.model,
        timeoutMs: config.timeoutMs,
        fetch: deps.fetch,
      });
    case 'anthropic':
      return createAnthropicClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl ?? DEFAULT_BASE_URLS.anthropic,
        model: config.model,
        timeoutMs: config.timeoutMs,
        fetch: deps.fetch,
      });
    case 'gemini':
      return createGeminiClient({ apiKey: config.apiKey, model: config.model, timeoutMs: config.timeoutMs });
  }
};
