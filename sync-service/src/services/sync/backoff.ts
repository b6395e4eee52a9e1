import type { RetryQueueItem } from '@notesync/shared';

export type BackoffPolicy = {
  baseMs: number;
  maxMs: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 30_000, maxMs: 60 * 60_000 };

/**
 * Delay before the next attempt after `retryCount` failures: 30s, 60s, 120s, ...
 * with the default policy, never above `maxMs`. Non-decreasing in `retryCount`.
 */
export function backoffDelayMs(retryCount: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, Math.floor(retryCount) - 1);
  // 2^31 already exceeds any sane cap; keeps the multiplication finite.
  const factor = 2 ** Math.min(exponent, 31);
  return Math.min(policy.maxMs, policy.baseMs * factor);
}

/**
 * Queue entry after one more failed attempt: created on the first failure,
 * otherwise the counter grows and the schedule is recomputed.
 */
export function nextRetryItem(
  existing: RetryQueueItem | null,
  failure: { noteId: string; vaultId: string; errorMessage: string | null; now: number },
  policy: BackoffPolicy = DEFAULT_BACKOFF,
): RetryQueueItem {
  const retryCount = (existing?.retryCount ?? 0) + 1;
  return {
    noteId: failure.noteId,
    vaultId: failure.vaultId,
    retryCount,
    lastAttemptAt: failure.now,
    nextRetryAt: failure.now + backoffDelayMs(retryCount, policy),
    lastErrorMessage: failure.errorMessage ?? existing?.lastErrorMessage ?? null,
    createdAt: existing?.createdAt ?? failure.now,
  };
}
