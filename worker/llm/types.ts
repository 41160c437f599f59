export type ModelRequest = {
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature: number;
};

export type ModelResponse = {
  text: string;
  model: string;
  tokensUsed: number | null;
  finishReason: string | null;
  metadata: Record<string, unknown>;
};

/**
 * One provider behind a single `generate` call. Implementations throw the
 * typed errors from ./errors and never log.
 */
export interface ModelClient {
  readonly provider: string;
  readonly model: string;
  generate(request: ModelRequest): Promise<ModelResponse>;
}
