import type { Logger } from '../logger';
import type { LlmCallStatus, ModelPurpose } from '../services/types';
import type { CallLedger } from './ledger';
import type { RetryExecutor } from './retry';
import type { ModelClient, ModelResponse } from './types';
import { ModelTimeoutError } from './errors';
import { MalformedOutputError } from './parser';

export type RunRequest = {
  purpose: ModelPurpose;
  userId?: string | null;
  prompt: string;
  system?: string;
  temperature: number;
  maxTokens: number;
  metadata?: Record<string, unknown>;
};

export type RunResult<T> = {
  value: T;
  response: ModelResponse;
  attempts: number;
};

export type ModelRunner = {
  run<T>(request: RunRequest, parse: (text: string) => T): Promise<RunResult<T>>;
};

const statusFor = (error: unknown): LlmCallStatus => (error instanceof ModelTimeoutError ? 'timeout' : 'error');

/**
 * Model call plus parse as one retryable unit. Every attempt lands in the
 * call ledger before the executor decides whether to retry.
 */
export const createModelRunner = (deps: {
  client: ModelClient;
  retry: RetryExecutor;
  ledger: CallLedger;
  logger: Logger;
  clock?: () => number;
}): ModelRunner => {
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ component: 'model-runner' });

  return {
    async run(request, parse) {
      return deps.retry.execute(async (attempt) => {
        const startedAt = clock();
        let response: ModelResponse | null = null;
        const base = {
          userId: request.userId ?? null,
          provider: deps.client.provider,
          purpose: request.purpose,
          attempt,
          prompt: request.prompt,
        };

        try {
          response = await deps.client.generate({
            prompt: request.prompt,
            system: request.system,
            maxTokens: request.maxTokens,
            temperature: request.temperature,
          });
          const value = parse(response.text);

          await deps.ledger.record({
            ...base,
            model: response.model,
            response: response.text,
            tokensUsed: response.tokensUsed,
            durationMs: clock() - startedAt,
            status: 'success',
            errorMessage: null,
            metadata: { ...request.metadata, ...response.metadata, finishReason: response.finishReason },
          });
          log.info('Model call succeeded', { purpose: request.purpose, attempt, model: response.model });
          return { value, response, attempts: attempt };
        } catch (error) {
          const status = statusFor(error);
          await deps.ledger.record({
            ...base,
            model: response?.model ?? deps.client.model,
            response: response?.text ?? (error instanceof MalformedOutputError ? error.raw : null),
            tokensUsed: response?.tokensUsed ?? null,
            durationMs: clock() - startedAt,
            status,
            errorMessage: error instanceof Error ? error.message : String(error),
            metadata: request.metadata ?? null,
          });
          log.warn('Model call attempt failed', {
            purpose: request.purpose,
            attempt,
            status,
            error: error instanceof Error ? error.message : String(error),
          });
          throw error;
        }
      });
    },
  };
};
