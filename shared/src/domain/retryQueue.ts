// Очередь повторных попыток синхронизации (одна запись на заметку, пока попытка не удалась).

export const MAX_SYNC_RETRIES = 5;

// Manual reset schedules the next attempt shortly after, never immediately.
export const RETRY_RESET_DELAY_MS = 60_000;

export type RetryQueueItem = {
  noteId: string;
  vaultId: string;
  retryCount: number;
  lastAttemptAt: number;
  nextRetryAt: number;
  lastErrorMessage: string | null;
  createdAt: number;
};

export function hasExceededMaxRetries(item: Pick<RetryQueueItem, 'retryCount'>, maxRetries = MAX_SYNC_RETRIES): boolean {
  return item.retryCount >= maxRetries;
}

export function isReadyForRetry(item: Pick<RetryQueueItem, 'nextRetryAt'>, now: number): boolean {
  return item.nextRetryAt <= now;
}
