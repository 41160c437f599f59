import type { Repository } from '../db/repository';
import type { Logger } from '../logger';
import type { LlmCallRecord } from '../services/types';

export type LedgerEntry = Omit<LlmCallRecord, 'id' | 'createdAt'>;

export type CallLedger = {
  record(entry: LedgerEntry): Promise<void>;
};

/**
 * Append-only audit of every model attempt. A failed write is logged and
 * never interrupts the call it describes.
 */
export const createCallLedger = (
  repo: Pick<Repository, 'appendLlmCall'>,
  logger: Logger,
  clock: () => number = Date.now
): CallLedger => ({
  async record(entry) {
    try {
      await repo.appendLlmCall({ ...entry, createdAt: clock() });
    } catch (error) {
      logger.error('Failed to append llm call log', {
        purpose: entry.purpose,
        attempt: entry.attempt,
        status: entry.status,
        error: String(error),
      });
    }
  },
});
