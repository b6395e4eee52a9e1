import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SyncStatus, neverSyncedState, type SyncStateItem } from '@notesync/shared';

import { StorageError } from '../errors/index.js';
import { SyncStateStore } from '../services/sync/syncStateStore.js';
import { T0, createTestDb } from './utils/testEnv.js';

function state(noteId: string, patch: Partial<SyncStateItem> = {}): SyncStateItem {
  return { ...neverSyncedState(noteId, 'vault-1', T0), ...patch };
}

describe('SyncStateStore', () => {
  let testDb: ReturnType<typeof createTestDb>;
  let store: SyncStateStore;

  beforeEach(() => {
    testDb = createTestDb();
    store = new SyncStateStore(testDb.db);
  });

  afterEach(() => {
    if (testDb.sqlite.open) testDb.sqlite.close();
  });

  it('returns null for unknown notes and round-trips every field', async () => {
    expect(await store.get('missing')).toBeNull();
    const item = state('n1', {
      status: SyncStatus.Error,
      remoteModifiedAt: T0 + 5,
      lastSyncedAt: T0 + 6,
      lastSyncedHash: 'abc',
      remotePath: 'remote/n1.md',
      retryCount: 2,
      lastError: 'provider_unavailable: offline',
    });
    await store.upsert(item);
    expect(await store.get('n1')).toEqual(item);
  });

  it('upsert replaces the existing row', async () => {
    await store.upsert(state('n1'));
    await store.upsert(state('n1', { status: SyncStatus.Synced, retryCount: 0, lastSyncedHash: 'h' }));
    const got = await store.get('n1');
    expect(got?.status).toBe(SyncStatus.Synced);
    expect(got?.lastSyncedHash).toBe('h');
    expect(await store.getForVault('vault-1')).toHaveLength(1);
  });

  it('pending uploads include errored notes below the retry limit, oldest first', async () => {
    await store.upsertAll([
      state('late', { status: SyncStatus.PendingUpload, localModifiedAt: T0 + 300 }),
      state('early', { status: SyncStatus.PendingUpload, localModifiedAt: T0 + 100 }),
      state('err-ok', { status: SyncStatus.Error, retryCount: 4, localModifiedAt: T0 + 200 }),
      state('err-dead', { status: SyncStatus.Error, retryCount: 5, localModifiedAt: T0 + 50 }),
      state('synced', { status: SyncStatus.Synced }),
      state('other-vault', { vaultId: 'vault-2', status: SyncStatus.PendingUpload }),
    ]);
    const ids = (await store.getPendingUploads('vault-1', 5)).map((s) => s.noteId);
    expect(ids).toEqual(['early', 'err-ok', 'late']);
  });

  it('lists conflicts newest first and pending downloads oldest remote change first', async () => {
    await store.upsertAll([
      state('c-old', { status: SyncStatus.Conflict, localModifiedAt: T0 + 1, remoteModifiedAt: T0 + 2 }),
      state('c-new', { status: SyncStatus.Conflict, localModifiedAt: T0 + 9, remoteModifiedAt: T0 + 9 }),
      state('d-2', { status: SyncStatus.PendingDownload, remoteModifiedAt: T0 + 20 }),
      state('d-1', { status: SyncStatus.PendingDownload, remoteModifiedAt: T0 + 10 }),
    ]);
    expect((await store.getConflicts('vault-1')).map((s) => s.noteId)).toEqual(['c-new', 'c-old']);
    expect((await store.getPendingDownloads('vault-1')).map((s) => s.noteId)).toEqual(['d-1', 'd-2']);
  });

  it('reports a count for every status', async () => {
    await store.upsertAll([
      state('a', { status: SyncStatus.Synced }),
      state('b', { status: SyncStatus.Synced }),
      state('c', { status: SyncStatus.Error, retryCount: 1 }),
    ]);
    expect(await store.getStatistics('vault-1')).toEqual({
      never_synced: 0,
      pending_upload: 0,
      pending_download: 0,
      synced: 2,
      conflict: 0,
      error: 1,
    });
    expect(await store.getCountByStatus('vault-1', SyncStatus.Synced)).toBe(2);
    expect(await store.getErrorCount('vault-1')).toBe(1);
    expect(await store.getByStatus(SyncStatus.Error, 'vault-2')).toEqual([]);
  });

  it('resets counters and deletes in bulk', async () => {
    await store.upsertAll([
      state('a', { status: SyncStatus.Error, retryCount: 5 }),
      state('b', { status: SyncStatus.Error, retryCount: 2 }),
      state('c', { status: SyncStatus.Synced }),
      state('d', { vaultId: 'vault-2', status: SyncStatus.Conflict, retryCount: 3 }),
    ]);
    expect(await store.resetRetryCountsForErrors()).toBe(2);
    expect((await store.get('a'))?.retryCount).toBe(0);
    expect(await store.resetRetryCount('d')).toBe(true);
    expect(await store.resetRetryCount('nope')).toBe(false);
    expect(await store.deleteSynced()).toBe(1);
    expect(await store.deleteForVault('vault-2')).toBe(1);
    await store.delete('a');
    expect((await store.getForVault('vault-1')).map((s) => s.noteId)).toEqual(['b']);
  });

  it('wraps driver failures in StorageError', async () => {
    testDb.sqlite.close();
    await expect(store.get('n1')).rejects.toBeInstanceOf(StorageError);
    const err = await store.upsert(state('n1')).catch((e: unknown) => e);
    expect(err instanceof StorageError ? [err.code, err.operation] : null).toEqual(['storage_error', 'sync_states.upsert']);
  });

  it('rejects rows with an unknown status', async () => {
    testDb.sqlite
      .prepare('INSERT INTO sync_states (note_id, vault_id, status, local_modified_at) VALUES (?, ?, ?, ?)')
      .run('weird', 'vault-1', 'exploded', T0);
    await expect(store.get('weird')).rejects.toBeInstanceOf(StorageError);
  });
});
