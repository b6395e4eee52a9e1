// Состояние синхронизации заметки с хранилищем (vault).
// Все времена храним как Unix-time в миллисекундах.

export const SyncStatus = {
  NeverSynced: 'never_synced',
  PendingUpload: 'pending_upload',
  PendingDownload: 'pending_download',
  Synced: 'synced',
  Conflict: 'conflict',
  Error: 'error',
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

export const ALL_SYNC_STATUSES: readonly SyncStatus[] = Object.values(SyncStatus);

export function isSyncStatus(value: unknown): value is SyncStatus {
  return typeof value === 'string' && ALL_SYNC_STATUSES.some((s) => s === value);
}

export type SyncStateItem = {
  noteId: string;
  vaultId: string;
  status: SyncStatus;
  localModifiedAt: number;
  remoteModifiedAt: number | null;
  // Last successful sync and the content hash both sides agreed on at that moment (common ancestor).
  lastSyncedAt: number | null;
  lastSyncedHash: string | null;
  remotePath: string | null;
  retryCount: number;
  lastError: string | null;
};

export type SyncStatistics = Record<SyncStatus, number>;

export function emptySyncStatistics(): SyncStatistics {
  return {
    [SyncStatus.NeverSynced]: 0,
    [SyncStatus.PendingUpload]: 0,
    [SyncStatus.PendingDownload]: 0,
    [SyncStatus.Synced]: 0,
    [SyncStatus.Conflict]: 0,
    [SyncStatus.Error]: 0,
  };
}

/**
 * Fresh state for a note that was just produced locally.
 */
export function neverSyncedState(noteId: string, vaultId: string, localModifiedAt: number): SyncStateItem {
  return {
    noteId,
    vaultId,
    status: SyncStatus.NeverSynced,
    localModifiedAt,
    remoteModifiedAt: null,
    lastSyncedAt: null,
    lastSyncedHash: null,
    remotePath: null,
    retryCount: 0,
    lastError: null,
  };
}
