import { ModelTimeoutError, ModelUnavailableError, errorForStatus } from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const readErrorDetail = async (response: Response) => {
  try {
    const text = await response.text();
    return text.slice(0, 500);
  } catch {
    return '';
  }
};

/**
 * POSTs a JSON body and returns the parsed JSON response. The timeout covers
 * the whole exchange, body included; a request that outlives `timeoutMs` is
 * aborted and surfaces as ModelTimeoutError.
 */
export const postJson = async (
  provider: string,
  endpoint: string,
  options: { headers: Record<string, string>; body: unknown; timeoutMs: number; fetch?: FetchLike }
): Promise<unknown> => {
  const fetchImpl = options.fetch ?? fetch;
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new ModelTimeoutError(options.timeoutMs));
      controller.abort();
    }, options.timeoutMs);
  });
  const withinDeadline = <T>(work: Promise<T>) => Promise.race([work, deadline]);

  try {
    let response: Response;
    try {
      response = await withinDeadline(
        fetchImpl(endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...options.headers },
          body: JSON.stringify(options.body),
          signal: controller.signal,
        })
      );
    } catch (error) {
      if (error instanceof ModelTimeoutError) throw error;
      throw new ModelUnavailableError(`${provider} request failed: ${String(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw errorForStatus(provider, response.status, await withinDeadline(readErrorDetail(response)));
    }

    try {
      return await withinDeadline(response.json());
    } catch (error) {
      if (error instanceof ModelTimeoutError) throw error;
      throw new ModelUnavailableError(`${provider} returned a non-JSON body`, { cause: error });
    }
  } finally {
    clearTimeout(timeoutId);
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const readString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
