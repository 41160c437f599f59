export type ModelErrorCode = 'MODEL_UNAVAILABLE' | 'MODEL_TIMEOUT' | 'MODEL_REJECTED';

export class ModelError extends Error {
  code: ModelErrorCode;
  status?: number;

  constructor(code: ModelErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ModelError';
    this.code = code;
    this.status = options.status;
  }
}

/** Network failure, auth failure, rate limit or a 5xx from the provider. */
export class ModelUnavailableError extends ModelError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('MODEL_UNAVAILABLE', message, options);
    this.name = 'ModelUnavailableError';
  }
}

export class ModelTimeoutError extends ModelError {
  constructor(timeoutMs: number) {
    super('MODEL_TIMEOUT', `Model call timed out after ${timeoutMs}ms`);
    this.name = 'ModelTimeoutError';
  }
}

/** Content-policy refusal or a request the provider refuses as invalid. */
export class ModelRejectedError extends ModelError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('MODEL_REJECTED', message, options);
    this.name = 'ModelRejectedError';
  }
}

export const isModelError = (error: unknown): error is ModelError => error instanceof ModelError;

/** Maps a non-2xx provider status onto the error taxonomy. */
export const errorForStatus = (provider: string, status: number, detail: string): ModelError => {
  const message = `${provider} request failed (${status})${detail ? `: ${detail}` : ''}`;
  if (status === 400 || status === 422) return new ModelRejectedError(message, { status });
  return new ModelUnavailableError(message, { status });
};
