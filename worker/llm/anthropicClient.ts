import type { ModelClient } from './types';
import { ModelRejectedError, ModelUnavailableError } from './errors';
import { isRecord, postJson, readNumber, readString, type FetchLike } from './http';

export type AnthropicClientOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: FetchLike;
};

const PROVIDER = 'anthropic';
const ANTHROPIC_VERSION = '2023-06-01';

export const createAnthropicClient = (options: AnthropicClientOptions): ModelClient => {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/messages`;

  return {
    provider: PROVIDER,
    model: options.model,
    async generate({ prompt, system, maxTokens, temperature }) {
      const body = await postJson(PROVIDER, endpoint, {
        headers: {
          'x-api-key': options.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: {
          model: options.model,
          max_tokens: maxTokens,
          temperature,
          ...(system ? { system } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        timeoutMs: options.timeoutMs,
        fetch: options.fetch,
      });

      if (!isRecord(body) || !Array.isArray(body.content)) {
        throw new ModelUnavailableError('anthropic response is missing content');
      }

      const stopReason = readString(body.stop_reason);
      if (stopReason === 'refusal') {
        throw new ModelRejectedError('anthropic refused the request');
      }

      const text = body.content
        .filter(isRecord)
        .filter((block) => block.type === 'text')
        .map((block) => readString(block.text) ?? '')
        .join('');

      const usage = isRecord(body.usage) ? body.usage : {};
      const inputTokens = readNumber(usage.input_tokens);
      const outputTokens = readNumber(usage.output_tokens);

      return {
        text,
        model: readString(body.model) ?? options.model,
        tokensUsed: inputTokens === null && outputTokens === null ? null : (inputTokens ?? 0) + (outputTokens ?? 0),
        finishReason: stopReason,
        metadata: { id: readString(body.id), inputTokens, outputTokens },
      };
    },
  };
};
