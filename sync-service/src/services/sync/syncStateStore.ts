import { and, asc, count, desc, eq, lt, or } from 'drizzle-orm';

import {
  MAX_SYNC_RETRIES,
  SyncStatus,
  emptySyncStatistics,
  isSyncStatus,
  type SyncStateItem,
  type SyncStatistics,
} from '@notesync/shared';

import type { SyncDb } from '../../database/db.js';
import { syncStates } from '../../database/schema.js';
import { storeCall } from './guard.js';

type SyncStateRow = typeof syncStates.$inferSelect;

function mapRow(row: SyncStateRow): SyncStateItem {
  if (!isSyncStatus(row.status)) throw new Error(`unknown sync status '${row.status}' for note ${row.noteId}`);
  return {
    noteId: row.noteId,
    vaultId: row.vaultId,
    status: row.status,
    localModifiedAt: row.localModifiedAt,
    remoteModifiedAt: row.remoteModifiedAt,
    lastSyncedAt: row.lastSyncedAt,
    lastSyncedHash: row.lastSyncedHash,
    remotePath: row.remotePath,
    retryCount: row.retryCount,
    lastError: row.lastError,
  };
}

function toRow(item: SyncStateItem): SyncStateRow {
  return {
    noteId: item.noteId,
    vaultId: item.vaultId,
    status: item.status,
    localModifiedAt: item.localModifiedAt,
    remoteModifiedAt: item.remoteModifiedAt,
    lastSyncedAt: item.lastSyncedAt,
    lastSyncedHash: item.lastSyncedHash,
    remotePath: item.remotePath,
    retryCount: item.retryCount,
    lastError: item.lastError,
  };
}

function updateSet(row: SyncStateRow) {
  const { noteId: _noteId, ...rest } = row;
  return rest;
}

/**
 * Persistent per-note sync state (one row per note).
 */
export class SyncStateStore {
  constructor(private readonly db: SyncDb) {}

  async get(noteId: string): Promise<SyncStateItem | null> {
    return storeCall('sync_states.get', async () => {
      const rows = await this.db.select().from(syncStates).where(eq(syncStates.noteId, noteId)).limit(1);
      return rows[0] ? mapRow(rows[0]) : null;
    });
  }

  async upsert(item: SyncStateItem): Promise<void> {
    await storeCall('sync_states.upsert', async () => {
      const row = toRow(item);
      await this.db.insert(syncStates).values(row).onConflictDoUpdate({ target: syncStates.noteId, set: updateSet(row) });
    });
  }

  async upsertAll(items: readonly SyncStateItem[]): Promise<void> {
    if (items.length === 0) return;
    await storeCall('sync_states.upsertAll', async () => {
      this.db.transaction((tx) => {
        for (const item of items) {
          const row = toRow(item);
          tx.insert(syncStates).values(row).onConflictDoUpdate({ target: syncStates.noteId, set: updateSet(row) }).run();
        }
      });
    });
  }

  async delete(noteId: string): Promise<void> {
    await storeCall('sync_states.delete', async () => {
      await this.db.delete(syncStates).where(eq(syncStates.noteId, noteId));
    });
  }

  async deleteForVault(vaultId: string): Promise<number> {
    return storeCall('sync_states.deleteForVault', async () => {
      const r = this.db.delete(syncStates).where(eq(syncStates.vaultId, vaultId)).run();
      return r.changes;
    });
  }

  /** Drops rows of already synced notes (housekeeping). */
  async deleteSynced(): Promise<number> {
    return storeCall('sync_states.deleteSynced', async () => {
      const r = this.db.delete(syncStates).where(eq(syncStates.status, SyncStatus.Synced)).run();
      return r.changes;
    });
  }

  async getForVault(vaultId: string): Promise<SyncStateItem[]> {
    return storeCall('sync_states.getForVault', async () => {
      const rows = await this.db.select().from(syncStates).where(eq(syncStates.vaultId, vaultId)).orderBy(asc(syncStates.noteId));
      return rows.map(mapRow);
    });
  }

  async getByStatus(status: SyncStatus, vaultId?: string): Promise<SyncStateItem[]> {
    return storeCall('sync_states.getByStatus', async () => {
      const where =
        vaultId === undefined
          ? eq(syncStates.status, status)
          : and(eq(syncStates.status, status), eq(syncStates.vaultId, vaultId));
      const rows = await this.db.select().from(syncStates).where(where).orderBy(asc(syncStates.localModifiedAt), asc(syncStates.noteId));
      return rows.map(mapRow);
    });
  }

  /**
   * Notes waiting for upload: explicitly pending, or errored with retries left.
   * Oldest local change first.
   */
  async getPendingUploads(vaultId: string, maxRetries = MAX_SYNC_RETRIES): Promise<SyncStateItem[]> {
    return storeCall('sync_states.getPendingUploads', async () => {
      const rows = await this.db
        .select()
        .from(syncStates)
        .where(
          and(
            eq(syncStates.vaultId, vaultId),
            or(
              eq(syncStates.status, SyncStatus.PendingUpload),
              and(eq(syncStates.status, SyncStatus.Error), lt(syncStates.retryCount, maxRetries)),
            ),
          ),
        )
        .orderBy(asc(syncStates.localModifiedAt), asc(syncStates.noteId));
      return rows.map(mapRow);
    });
  }

  async getPendingDownloads(vaultId: string): Promise<SyncStateItem[]> {
    return storeCall('sync_states.getPendingDownloads', async () => {
      const rows = await this.db
        .select()
        .from(syncStates)
        .where(and(eq(syncStates.vaultId, vaultId), eq(syncStates.status, SyncStatus.PendingDownload)))
        .orderBy(asc(syncStates.remoteModifiedAt), asc(syncStates.noteId));
      return rows.map(mapRow);
    });
  }

  // Newest conflicts first: those are what the user most likely remembers editing.
  async getConflicts(vaultId: string): Promise<SyncStateItem[]> {
    return storeCall('sync_states.getConflicts', async () => {
      const rows = await this.db
        .select()
        .from(syncStates)
        .where(and(eq(syncStates.vaultId, vaultId), eq(syncStates.status, SyncStatus.Conflict)))
        .orderBy(desc(syncStates.localModifiedAt), asc(syncStates.noteId));
      return rows.map(mapRow);
    });
  }

  async getCountByStatus(vaultId: string, status: SyncStatus): Promise<number> {
    return storeCall('sync_states.getCountByStatus', async () => {
      const rows = await this.db
        .select({ n: count() })
        .from(syncStates)
        .where(and(eq(syncStates.vaultId, vaultId), eq(syncStates.status, status)));
      return rows[0]?.n ?? 0;
    });
  }

  async getErrorCount(vaultId: string): Promise<number> {
    return this.getCountByStatus(vaultId, SyncStatus.Error);
  }

  async getStatistics(vaultId: string): Promise<SyncStatistics> {
    return storeCall('sync_states.getStatistics', async () => {
      const rows = await this.db
        .select({ status: syncStates.status, n: count() })
        .from(syncStates)
        .where(eq(syncStates.vaultId, vaultId))
        .groupBy(syncStates.status);
      const stats = emptySyncStatistics();
      for (const r of rows) {
        if (isSyncStatus(r.status)) stats[r.status] = r.n;
      }
      return stats;
    });
  }

  async resetRetryCount(noteId: string): Promise<boolean> {
    return storeCall('sync_states.resetRetryCount', async () => {
      const r = this.db.update(syncStates).set({ retryCount: 0 }).where(eq(syncStates.noteId, noteId)).run();
      return r.changes > 0;
    });
  }

  /** Gives every errored note a fresh retry budget. */
  async resetRetryCountsForErrors(): Promise<number> {
    return storeCall('sync_states.resetRetryCountsForErrors', async () => {
      const r = this.db.update(syncStates).set({ retryCount: 0 }).where(eq(syncStates.status, SyncStatus.Error)).run();
      return r.changes;
    });
  }
}
