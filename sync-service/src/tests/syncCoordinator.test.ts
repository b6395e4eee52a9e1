import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConflictStrategy, SyncStatus, neverSyncedState, type SyncStateItem } from '@notesync/shared';

import { createSyncContext, type SyncContext } from '../context.js';
import { parseNoteFile } from '../providers/folderProvider.js';
import { hashContent } from '../utils/contentHash.js';
import { T0, createTestDb, createTestEnv, makeNote, makeVault, type TestEnv } from './utils/testEnv.js';

const VAULT = 'vault-1';
const NOTE = 'note-1';

describe('SyncCoordinator', () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = createTestEnv();
    await env.ctx.vaults.upsertVault(makeVault());
  });

  afterEach(() => env.close());

  async function seedSyncedBase(patch: Partial<SyncStateItem> = {}) {
    await env.ctx.stateStore.upsert({
      ...neverSyncedState(NOTE, VAULT, T0),
      status: SyncStatus.Synced,
      remoteModifiedAt: T0,
      lastSyncedAt: T0,
      lastSyncedHash: hashContent('base'),
      remotePath: `remote/${NOTE}.md`,
      ...patch,
    });
  }

  it('pushes a new note and records the agreement', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    env.clock.now = T0 + 500;

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'push' });
    expect(await env.ctx.stateStore.get(NOTE)).toEqual({
      noteId: NOTE,
      vaultId: VAULT,
      status: SyncStatus.Synced,
      localModifiedAt: T0,
      remoteModifiedAt: T0,
      lastSyncedAt: T0 + 500,
      lastSyncedHash: hashContent('milk'),
      remotePath: 'remote/note-1.md',
      retryCount: 0,
      lastError: null,
    });
    expect(await env.ctx.queueStore.get(NOTE)).toBeNull();
    expect(env.provider.getRemote(VAULT, NOTE)).toEqual({ content: 'milk', modifiedAt: T0 });
    const note = await env.ctx.notes.getNoteById(NOTE);
    expect([note?.isSynced, note?.filePath]).toEqual([true, 'remote/note-1.md']);
  });

  it('does not write again when nothing changed', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    await env.ctx.coordinator.syncNote(NOTE);
    const before = await env.ctx.stateStore.get(NOTE);

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'none' });
    expect(env.provider.saveCalls).toEqual([NOTE]);
    expect((await env.ctx.stateStore.get(NOTE))?.lastSyncedHash).toBe(before?.lastSyncedHash);
  });

  it('serializes concurrent syncs of the same note', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    const outcomes = await Promise.all([env.ctx.coordinator.syncNote(NOTE), env.ctx.coordinator.syncNote(NOTE)]);
    expect(outcomes.map((o) => (o.status === 'success' ? o.direction : o.status))).toEqual(['push', 'none']);
    expect(env.provider.saveCalls).toEqual([NOTE]);
  });

  it('backs off while the provider is unavailable', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    env.provider.available = false;

    for (const at of [T0, T0 + 30_000, T0 + 90_000]) {
      env.clock.now = at;
      const outcome = await env.ctx.coordinator.syncNote(NOTE);
      expect(outcome).toEqual({
        status: 'failed',
        noteId: NOTE,
        error: { code: 'provider_unavailable', message: 'provider unavailable for vault vault-1', recoverable: true },
      });
    }

    expect(await env.ctx.queueStore.get(NOTE)).toEqual({
      noteId: NOTE,
      vaultId: VAULT,
      retryCount: 3,
      lastAttemptAt: T0 + 90_000,
      nextRetryAt: T0 + 90_000 + 120_000,
      lastErrorMessage: 'provider_unavailable: provider unavailable for vault vault-1',
      createdAt: T0,
    });
    expect(await env.ctx.stateStore.get(NOTE)).toMatchObject({
      status: SyncStatus.Error,
      retryCount: 3,
      lastError: 'provider_unavailable: provider unavailable for vault vault-1',
    });
  });

  it('clears the retry entry once the note syncs', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    env.provider.available = false;
    await env.ctx.coordinator.syncNote(NOTE);
    env.provider.available = true;
    env.clock.now = T0 + 30_000;

    expect((await env.ctx.coordinator.syncNote(NOTE)).status).toBe('success');
    expect(await env.ctx.queueStore.get(NOTE)).toBeNull();
    expect(await env.ctx.stateStore.get(NOTE)).toMatchObject({ status: SyncStatus.Synced, retryCount: 0, lastError: null });
  });

  it('takes the remote version when it is newer and both sides changed', async () => {
    await seedSyncedBase();
    await env.ctx.notes.upsertNote(makeNote({ content: 'local edit', updatedAt: T0 + 1_000 }));
    env.provider.setRemote(VAULT, NOTE, 'remote edit', T0 + 2_000);

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'pull' });
    expect(await env.ctx.stateStore.get(NOTE)).toMatchObject({
      status: SyncStatus.Synced,
      localModifiedAt: T0 + 2_000,
      remoteModifiedAt: T0 + 2_000,
      lastSyncedHash: hashContent('remote edit'),
    });
    expect(await env.ctx.notes.getNoteById(NOTE)).toMatchObject({ content: 'remote edit', updatedAt: T0 + 2_000, isSynced: true });
    expect(env.provider.saveCalls).toEqual([]);
  });

  it('records a conflict when both sides changed at the same moment', async () => {
    await seedSyncedBase();
    await env.ctx.notes.upsertNote(makeNote({ content: 'local edit', updatedAt: T0 + 1_000 }));
    env.provider.setRemote(VAULT, NOTE, 'remote edit', T0 + 1_000);

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({
      status: 'conflict',
      noteId: NOTE,
      detail: `both sides changed at the same time (${T0 + 1_000})`,
    });
    const conflicts = await env.ctx.stateStore.getConflicts(VAULT);
    expect(conflicts.map((c) => [c.noteId, c.localModifiedAt, c.remoteModifiedAt, c.retryCount])).toEqual([
      [NOTE, T0 + 1_000, T0 + 1_000, 1],
    ]);
    expect((await env.ctx.queueStore.get(NOTE))?.retryCount).toBe(1);
    expect(env.provider.getRemote(VAULT, NOTE)?.content).toBe('remote edit');
  });

  it('merges append-only edits on vaults that allow it', async () => {
    await env.ctx.vaults.upsertVault(makeVault({ conflictStrategy: ConflictStrategy.MergeAppends }));
    await seedSyncedBase();
    await env.ctx.notes.upsertNote(makeNote({ content: 'base\nA', updatedAt: T0 + 1_000 }));
    env.provider.setRemote(VAULT, NOTE, 'base\nA\nB', T0 + 2_000);
    env.clock.now = T0 + 10_000;

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'merge' });
    expect(await env.ctx.notes.getNoteById(NOTE)).toMatchObject({ content: 'base\nA\nB', updatedAt: T0 + 10_000, isSynced: true });
    expect(env.provider.getRemote(VAULT, NOTE)).toEqual({ content: 'base\nA\nB', modifiedAt: T0 + 10_000 });
  });

  it('uploads local edits when the remote still matches the last agreement', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    await env.ctx.coordinator.syncNote(NOTE);
    await env.ctx.notes.upsertNote(makeNote({ content: 'milk\neggs', updatedAt: T0 + 5_000 }));

    expect(await env.ctx.coordinator.markLocalChange(NOTE)).toMatchObject({ status: SyncStatus.PendingUpload, localModifiedAt: T0 + 5_000 });
    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'push' });
    expect(env.provider.getRemote(VAULT, NOTE)).toEqual({ content: 'milk\neggs', modifiedAt: T0 + 5_000 });
  });

  it('flags and pulls remote edits of synced notes', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    await env.ctx.coordinator.syncNote(NOTE);
    env.provider.setRemote(VAULT, NOTE, 'milk and bread', T0 + 9_000);
    env.provider.setRemote(VAULT, 'remote-only', 'not ours', T0);

    expect(await env.ctx.coordinator.detectRemoteChanges(VAULT)).toBe(1);
    expect(await env.ctx.stateStore.get(NOTE)).toMatchObject({ status: SyncStatus.PendingDownload, remoteModifiedAt: T0 + 9_000 });
    expect(await env.ctx.stateStore.get('remote-only')).toBeNull();

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'pull' });
    expect((await env.ctx.notes.getNoteById(NOTE))?.content).toBe('milk and bread');
  });

  it('fails a pending download whose remote copy vanished', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    await seedSyncedBase({ status: SyncStatus.PendingDownload });

    const outcome = await env.ctx.coordinator.syncNote(NOTE);
    expect(outcome.status === 'failed' ? outcome.error.code : outcome.status).toBe('provider_read_error');
  });

  it('turns provider exceptions and write errors into failed outcomes', async () => {
    await seedSyncedBase();
    await env.ctx.notes.upsertNote(makeNote({ content: 'local edit', updatedAt: T0 + 1_000 }));
    env.provider.setRemote(VAULT, NOTE, 'remote edit', T0 + 2_000);
    env.provider.throwOnLoad = true;

    expect(await env.ctx.coordinator.syncNote(NOTE)).toEqual({
      status: 'failed',
      noteId: NOTE,
      error: { code: 'provider_read_error', message: 'provider call failed: socket hang up', recoverable: true },
    });

    await env.ctx.notes.upsertNote(makeNote({ id: 'note-2', content: 'fresh' }));
    env.provider.failSaves = true;
    const outcome = await env.ctx.coordinator.syncNote('note-2');
    expect(outcome.status === 'failed' ? [outcome.error.code, outcome.error.message] : null).toEqual(['provider_write_error', 'disk full']);
  });

  it('drops bookkeeping of notes that no longer exist', async () => {
    await env.ctx.stateStore.upsert(neverSyncedState('ghost', VAULT, T0));
    expect(await env.ctx.coordinator.syncNote('ghost')).toEqual({
      status: 'failed',
      noteId: 'ghost',
      error: { code: 'note_not_found', message: 'note not found: ghost', recoverable: false },
    });
    expect(await env.ctx.stateStore.get('ghost')).toBeNull();
    expect(await env.ctx.coordinator.markLocalChange('ghost')).toBeNull();
  });

  it('rebuilds vault state on forced resync', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    await env.ctx.coordinator.syncNote(NOTE);
    await env.ctx.notes.upsertNote(makeNote({ id: 'note-2', updatedAt: T0 + 1 }));
    env.provider.available = false;
    await env.ctx.coordinator.syncNote('note-2');

    expect(await env.ctx.coordinator.forceResync(VAULT)).toBe(2);
    expect((await env.ctx.stateStore.get(NOTE))?.status).toBe(SyncStatus.PendingUpload);
    expect((await env.ctx.stateStore.get('note-2'))?.status).toBe(SyncStatus.NeverSynced);
    expect(await env.ctx.queueStore.getQueueSize()).toBe(0);
    await expect(env.ctx.coordinator.forceResync('nope')).rejects.toThrow('vault not found: nope');
  });

  it('reports progress as the share of synced notes', async () => {
    expect(await env.ctx.coordinator.getSyncProgress(VAULT)).toBe(100);
    await env.ctx.notes.upsertNote(makeNote());
    await env.ctx.coordinator.syncNote(NOTE);
    await env.ctx.notes.upsertNote(makeNote({ id: 'note-2' }));
    await env.ctx.coordinator.markLocalChange('note-2');
    await env.ctx.notes.upsertNote(makeNote({ id: 'note-3' }));
    await env.ctx.coordinator.markLocalChange('note-3');
    expect(await env.ctx.coordinator.getSyncProgress(VAULT)).toBe(33);
  });

  it('resets failed items for another round of retries', async () => {
    await env.ctx.notes.upsertNote(makeNote());
    env.provider.available = false;
    for (let i = 0; i < 5; i += 1) await env.ctx.coordinator.syncNote(NOTE);
    expect((await env.ctx.failedItems.listFailedItems()).map((i) => [i.noteId, i.retryCount])).toEqual([[NOTE, 5]]);

    env.clock.now = T0 + 1_000;
    expect(await env.ctx.failedItems.resetRetryCount(NOTE)).toBe(true);
    expect(await env.ctx.queueStore.get(NOTE)).toMatchObject({ retryCount: 0, nextRetryAt: T0 + 61_000 });
    expect((await env.ctx.stateStore.get(NOTE))?.retryCount).toBe(0);
    expect(await env.ctx.failedItems.listFailedItems()).toEqual([]);
    expect(await env.ctx.failedItems.resetRetryCount('unknown')).toBe(false);
  });
});

describe('SyncCoordinator with a folder vault', () => {
  let root: string;
  let ctx: SyncContext;
  let close: () => void;
  const clock = { now: T0 };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'notesync-coordinator-'));
    const { sqlite, db } = createTestDb();
    close = () => sqlite.close();
    clock.now = T0;
    ctx = createSyncContext({
      db,
      config: { sweepIntervalMs: 60_000, sweepConcurrency: 1, backoff: { baseMs: 30_000, maxMs: 3_600_000 }, maxRetries: 5 },
      clock: () => clock.now,
    });
    await ctx.vaults.upsertVault(makeVault({ providerConfig: { rootPath: root } }));
  });

  afterEach(async () => {
    close();
    await rm(root, { recursive: true, force: true });
  });

  it('keeps an external edit that is newer than the local one', async () => {
    const file = path.join(root, `${NOTE}.md`);
    await ctx.notes.upsertNote(makeNote({ content: 'draft', updatedAt: T0 }));
    clock.now = T0 + 100;
    expect(await ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'push' });

    await ctx.notes.upsertNote(makeNote({ content: 'local edit', updatedAt: T0 + 1_000 }));
    const onDisk = await readFile(file, 'utf8');
    await writeFile(file, onDisk.replace(/draft$/, 'remote edit'));
    await utimes(file, new Date(T0 + 2_000), new Date(T0 + 2_000));
    clock.now = T0 + 5_000;

    expect(await ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'pull' });
    expect(await ctx.notes.getNoteById(NOTE)).toMatchObject({ content: 'remote edit', updatedAt: T0 + 2_000, isSynced: true });
    expect(parseNoteFile(await readFile(file, 'utf8')).body).toBe('remote edit');
    expect((await ctx.stateStore.get(NOTE))?.lastSyncedHash).toBe(hashContent('remote edit'));
  });

  it('pushes a local edit that is newer than the external one', async () => {
    const file = path.join(root, `${NOTE}.md`);
    await ctx.notes.upsertNote(makeNote({ content: 'draft', updatedAt: T0 }));
    await ctx.coordinator.syncNote(NOTE);

    const onDisk = await readFile(file, 'utf8');
    await writeFile(file, onDisk.replace(/draft$/, 'remote edit'));
    await utimes(file, new Date(T0 + 1_000), new Date(T0 + 1_000));
    await ctx.notes.upsertNote(makeNote({ content: 'local edit', updatedAt: T0 + 2_000 }));
    clock.now = T0 + 5_000;

    expect(await ctx.coordinator.syncNote(NOTE)).toEqual({ status: 'success', noteId: NOTE, direction: 'push' });
    expect(parseNoteFile(await readFile(file, 'utf8')).body).toBe('local edit');
  });
});
