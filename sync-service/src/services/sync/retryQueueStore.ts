import { and, asc, count, desc, eq, gte, lt, lte } from 'drizzle-orm';

import { MAX_SYNC_RETRIES, RETRY_RESET_DELAY_MS, type RetryQueueItem } from '@notesync/shared';

import type { SyncDb } from '../../database/db.js';
import { syncQueue } from '../../database/schema.js';
import { storeCall } from './guard.js';

type SyncQueueRow = typeof syncQueue.$inferSelect;

function mapRow(row: SyncQueueRow): RetryQueueItem {
  return {
    noteId: row.noteId,
    vaultId: row.vaultId,
    retryCount: row.retryCount,
    lastAttemptAt: row.lastAttemptAt,
    nextRetryAt: row.nextRetryAt,
    lastErrorMessage: row.lastErrorMessage,
    createdAt: row.createdAt,
  };
}

/**
 * Retry queue: a row exists only while the latest sync attempt of the note failed.
 * Backoff is computed by the caller, the store only persists the schedule.
 */
export class RetryQueueStore {
  private readonly maxRetries: number;

  constructor(
    private readonly db: SyncDb,
    opts: { maxRetries?: number } = {},
  ) {
    this.maxRetries = opts.maxRetries ?? MAX_SYNC_RETRIES;
  }

  async get(noteId: string): Promise<RetryQueueItem | null> {
    return storeCall('sync_queue.get', async () => {
      const rows = await this.db.select().from(syncQueue).where(eq(syncQueue.noteId, noteId)).limit(1);
      return rows[0] ? mapRow(rows[0]) : null;
    });
  }

  async getAll(): Promise<RetryQueueItem[]> {
    return storeCall('sync_queue.getAll', async () => {
      const rows = await this.db.select().from(syncQueue).orderBy(asc(syncQueue.nextRetryAt), asc(syncQueue.noteId));
      return rows.map(mapRow);
    });
  }

  async getForVault(vaultId: string): Promise<RetryQueueItem[]> {
    return storeCall('sync_queue.getForVault', async () => {
      const rows = await this.db
        .select()
        .from(syncQueue)
        .where(eq(syncQueue.vaultId, vaultId))
        .orderBy(asc(syncQueue.nextRetryAt), asc(syncQueue.noteId));
      return rows.map(mapRow);
    });
  }

  /**
   * Items whose next attempt is due, earliest first. Items that used up their
   * retry budget are left out: they wait for a manual reset.
   */
  async getItemsReadyForRetry(now: number, vaultId?: string): Promise<RetryQueueItem[]> {
    return storeCall('sync_queue.getItemsReadyForRetry', async () => {
      const due = and(lte(syncQueue.nextRetryAt, now), lt(syncQueue.retryCount, this.maxRetries));
      const rows = await this.db
        .select()
        .from(syncQueue)
        .where(vaultId === undefined ? due : and(due, eq(syncQueue.vaultId, vaultId)))
        .orderBy(asc(syncQueue.nextRetryAt), asc(syncQueue.noteId));
      return rows.map(mapRow);
    });
  }

  async getFailedItems(): Promise<RetryQueueItem[]> {
    return storeCall('sync_queue.getFailedItems', async () => {
      const rows = await this.db
        .select()
        .from(syncQueue)
        .where(gte(syncQueue.retryCount, this.maxRetries))
        .orderBy(desc(syncQueue.lastAttemptAt), asc(syncQueue.noteId));
      return rows.map(mapRow);
    });
  }

  async getQueueSize(vaultId?: string): Promise<number> {
    return storeCall('sync_queue.getQueueSize', async () => {
      const rows = await this.db
        .select({ n: count() })
        .from(syncQueue)
        .where(vaultId === undefined ? undefined : eq(syncQueue.vaultId, vaultId));
      return rows[0]?.n ?? 0;
    });
  }

  async getReadyForRetryCount(now: number): Promise<number> {
    return storeCall('sync_queue.getReadyForRetryCount', async () => {
      const rows = await this.db
        .select({ n: count() })
        .from(syncQueue)
        .where(and(lte(syncQueue.nextRetryAt, now), lt(syncQueue.retryCount, this.maxRetries)));
      return rows[0]?.n ?? 0;
    });
  }

  async getFailedCount(vaultId?: string): Promise<number> {
    return storeCall('sync_queue.getFailedCount', async () => {
      const failed = gte(syncQueue.retryCount, this.maxRetries);
      const rows = await this.db
        .select({ n: count() })
        .from(syncQueue)
        .where(vaultId === undefined ? failed : and(failed, eq(syncQueue.vaultId, vaultId)));
      return rows[0]?.n ?? 0;
    });
  }

  async upsert(item: RetryQueueItem): Promise<void> {
    await storeCall('sync_queue.upsert', async () => {
      const { noteId: _noteId, ...set } = item;
      await this.db.insert(syncQueue).values(item).onConflictDoUpdate({ target: syncQueue.noteId, set });
    });
  }

  async upsertAll(items: readonly RetryQueueItem[]): Promise<void> {
    if (items.length === 0) return;
    await storeCall('sync_queue.upsertAll', async () => {
      this.db.transaction((tx) => {
        for (const item of items) {
          const { noteId: _noteId, ...set } = item;
          tx.insert(syncQueue).values(item).onConflictDoUpdate({ target: syncQueue.noteId, set }).run();
        }
      });
    });
  }

  async delete(noteId: string): Promise<void> {
    await storeCall('sync_queue.delete', async () => {
      await this.db.delete(syncQueue).where(eq(syncQueue.noteId, noteId));
    });
  }

  async deleteForVault(vaultId: string): Promise<number> {
    return storeCall('sync_queue.deleteForVault', async () => {
      return this.db.delete(syncQueue).where(eq(syncQueue.vaultId, vaultId)).run().changes;
    });
  }

  async deleteFailedItems(): Promise<number> {
    return storeCall('sync_queue.deleteFailedItems', async () => {
      return this.db.delete(syncQueue).where(gte(syncQueue.retryCount, this.maxRetries)).run().changes;
    });
  }

  async clear(): Promise<number> {
    return storeCall('sync_queue.clear', async () => this.db.delete(syncQueue).run().changes);
  }

  /** Zeroes the counter and schedules the next attempt a minute after `now`. */
  async resetRetryCount(noteId: string, now: number): Promise<boolean> {
    return storeCall('sync_queue.resetRetryCount', async () => {
      const r = this.db
        .update(syncQueue)
        .set({ retryCount: 0, nextRetryAt: now + RETRY_RESET_DELAY_MS })
        .where(eq(syncQueue.noteId, noteId))
        .run();
      return r.changes > 0;
    });
  }

  async resetAllFailedItems(now: number): Promise<number> {
    return storeCall('sync_queue.resetAllFailedItems', async () => {
      const r = this.db
        .update(syncQueue)
        .set({ retryCount: 0, nextRetryAt: now + RETRY_RESET_DELAY_MS })
        .where(gte(syncQueue.retryCount, this.maxRetries))
        .run();
      return r.changes;
    });
  }
}
