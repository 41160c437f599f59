import { GoogleGenAI, type GenerateContentResponse } from '@google/genai';
import type { ModelClient } from './types';
import { ModelRejectedError, ModelTimeoutError, ModelUnavailableError, isModelError, errorForStatus } from './errors';
import { isRecord, readNumber } from './http';

type GeminiModels = Pick<GoogleGenAI['models'], 'generateContent'>;

export type GeminiClientOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Overrides the SDK surface; tests pass a stub. */
  models?: GeminiModels;
};

const PROVIDER = 'gemini';
const BLOCKED_FINISH_REASONS = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'RECITATION']);

const statusOf = (error: unknown) => (isRecord(error) ? readNumber(error.status) : null);

const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timer = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new ModelTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timer]);
  } finally {
    clearTimeout(timeoutId);
  }
};

export const createGeminiClient = (options: GeminiClientOptions): ModelClient => {
  const models = options.models ?? new GoogleGenAI({ apiKey: options.apiKey }).models;

  return {
    provider: PROVIDER,
    model: options.model,
    async generate({ prompt, system, maxTokens, temperature }) {
      let response: GenerateContentResponse;
      try {
        response = await withTimeout(
          models.generateContent({
            model: options.model,
            contents: prompt,
            config: {
              systemInstruction: system,
              temperature,
              maxOutputTokens: maxTokens,
              responseMimeType: 'application/json',
            },
          }),
          options.timeoutMs
        );
      } catch (error) {
        if (isModelError(error)) throw error;
        const status = statusOf(error);
        if (status !== null) throw errorForStatus(PROVIDER, status, String(error));
        throw new ModelUnavailableError(`gemini request failed: ${String(error)}`, { cause: error });
      }

      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        throw new ModelRejectedError(`gemini blocked the prompt: ${String(blockReason)}`);
      }
      const candidate = response.candidates?.[0];
      const finishReason = candidate?.finishReason ? String(candidate.finishReason) : null;
      if (finishReason && BLOCKED_FINISH_REASONS.has(finishReason)) {
        throw new ModelRejectedError(`gemini stopped generation: ${finishReason}`);
      }

      const text = candidate?.content?.parts?.map((part) => part.text ?? '').join('') ?? '';
      return {
        text,
        model: response.modelVersion ?? options.model,
        tokensUsed: response.usageMetadata?.totalTokenCount ?? null,
        finishReason,
        metadata: {
          promptTokens: response.usageMetadata?.promptTokenCount ?? null,
          candidateTokens: response.usageMetadata?.candidatesTokenCount ?? null,
        },
      };
    },
  };
};
