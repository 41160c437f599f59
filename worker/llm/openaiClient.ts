import type { ModelClient } from './types';
import { ModelRejectedError, ModelUnavailableError } from './errors';
import { getAuthorizationHeader } from './bigmodelAuth';
import { isRecord, postJson, readNumber, readString, type FetchLike } from './http';

export type OpenAiClientOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: FetchLike;
};

const PROVIDER = 'openai';

/**
 * OpenAI-compatible chat completions. Any base URL speaking the same wire
 * format works, including BigModel (JWT auth) and local proxies.
 */
export const createOpenAiClient = (options: OpenAiClientOptions): ModelClient => {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;

  return {
    provider: PROVIDER,
    model: options.model,
    async generate({ prompt, system, maxTokens, temperature }) {
      const messages = [
        ...(system ? [{ role: 'system', content: system }] : []),
        { role: 'user', content: prompt },
      ];

      const body = await postJson(PROVIDER, endpoint, {
        headers: { Authorization: getAuthorizationHeader(options.apiKey, options.baseUrl) },
        body: {
          model: options.model,
          messages,
          temperature,
          max_tokens: maxTokens,
          response_format: { type: 'json_object' },
        },
        timeoutMs: options.timeoutMs,
        fetch: options.fetch,
      });

      if (!isRecord(body) || !Array.isArray(body.choices)) {
        throw new ModelUnavailableError('openai response is missing choices');
      }
      const choice: unknown = body.choices[0];
      const message = isRecord(choice) && isRecord(choice.message) ? choice.message : null;
      const finishReason = isRecord(choice) ? readString(choice.finish_reason) : null;

      if (finishReason === 'content_filter') {
        throw new ModelRejectedError('openai response was blocked by the content filter');
      }
      const refusal = message ? readString(message.refusal) : null;
      if (refusal) {
        throw new ModelRejectedError(`openai refused the request: ${refusal}`);
      }

      const usage = isRecord(body.usage) ? body.usage : {};
      return {
        text: (message && readString(message.content)) ?? '',
        model: readString(body.model) ?? options.model,
        tokensUsed: readNumber(usage.total_tokens),
        finishReason,
        metadata: {
          id: readString(body.id),
          promptTokens: readNumber(usage.prompt_tokens),
          completionTokens: readNumber(usage.completion_tokens),
        },
      };
    },
  };
};
