import {
  ConflictOutcome,
  MAX_SYNC_RETRIES,
  SyncStatus,
  neverSyncedState,
  type NoteItem,
  type NoteVersion,
  type SyncDirection,
  type SyncOutcome,
  type SyncStateItem,
  type VaultItem,
} from '@notesync/shared';

import {
  AppError,
  NoteNotFoundError,
  ProviderReadError,
  ProviderUnavailableError,
  ProviderWriteError,
  StorageError,
  VaultNotFoundError,
  getErrorMessage,
} from '../../errors/index.js';
import type { ProviderRegistry } from '../../providers/providerRegistry.js';
import type { NoteProvider, SavedNote } from '../../providers/types.js';
import { hashContent } from '../../utils/contentHash.js';
import { KeyedMutex } from '../../utils/keyedMutex.js';
import { logDebug, logInfo, logWarn } from '../../utils/logger.js';
import type { NoteRepository } from '../noteRepository.js';
import type { VaultRepository } from '../vaultRepository.js';
import { DEFAULT_BACKOFF, nextRetryItem, type BackoffPolicy } from './backoff.js';
import { resolveConflict } from './conflictResolver.js';
import type { RetryQueueStore } from './retryQueueStore.js';
import type { SyncStateStore } from './syncStateStore.js';

export type SyncCoordinatorDeps = {
  stateStore: SyncStateStore;
  queueStore: RetryQueueStore;
  notes: NoteRepository;
  vaults: VaultRepository;
  providers: ProviderRegistry;
  locks?: KeyedMutex;
  clock?: () => number;
  backoff?: BackoffPolicy;
  maxRetries?: number;
};

type SyncTarget = {
  state: SyncStateItem;
  note: NoteItem;
  vault: VaultItem;
  provider: NoteProvider;
  local: NoteVersion;
  now: number;
};

type SuccessFacts = {
  localModifiedAt: number;
  remoteModifiedAt: number;
  hash: string;
  remotePath: string;
};

/**
 * Syncs one note at a time against its vault's provider and is the only writer
 * of SyncState. Calls for the same note are serialized through `locks`.
 */
export class SyncCoordinator {
  private readonly stateStore: SyncStateStore;
  private readonly queueStore: RetryQueueStore;
  private readonly notes: NoteRepository;
  private readonly vaults: VaultRepository;
  private readonly providers: ProviderRegistry;
  private readonly locks: KeyedMutex;
  private readonly clock: () => number;
  private readonly backoff: BackoffPolicy;
  readonly maxRetries: number;

  constructor(deps: SyncCoordinatorDeps) {
    this.stateStore = deps.stateStore;
    this.queueStore = deps.queueStore;
    this.notes = deps.notes;
    this.vaults = deps.vaults;
    this.providers = deps.providers;
    this.locks = deps.locks ?? new KeyedMutex();
    this.clock = deps.clock ?? Date.now;
    this.backoff = deps.backoff ?? DEFAULT_BACKOFF;
    this.maxRetries = deps.maxRetries ?? MAX_SYNC_RETRIES;
  }

  /**
   * Brings one note in line with its remote copy. Provider problems end up as a
   * `failed` outcome plus a retry queue entry; store failures are thrown.
   */
  async syncNote(noteId: string): Promise<SyncOutcome> {
    return this.locks.runExclusive(noteId, () => this.syncNoteLocked(noteId));
  }

  private async syncNoteLocked(noteId: string): Promise<SyncOutcome> {
    const now = this.clock();
    const note = await this.notes.getNoteById(noteId);
    if (!note) return this.forget(noteId, new NoteNotFoundError(noteId));
    const vault = await this.vaults.getVaultById(note.vaultId);
    if (!vault) return this.forget(noteId, new VaultNotFoundError(note.vaultId));

    const existing = await this.stateStore.get(noteId);
    // Заметка могла переехать в другой vault: старый предок к новому хранилищу не относится.
    const state =
      existing && existing.vaultId === vault.id ? existing : neverSyncedState(note.id, vault.id, note.updatedAt);

    const provider = this.providers.get(vault.providerType);
    if (!provider) {
      return this.recordFailure(state, new AppError(`no provider registered for type ${vault.providerType}`, 'provider_not_registered', false), now);
    }
    if (!(await this.checkAvailable(provider, vault))) {
      return this.recordFailure(state, new ProviderUnavailableError(vault.id), now);
    }

    const local: NoteVersion = { content: note.content, modifiedAt: note.updatedAt, contentHash: hashContent(note.content) };
    try {
      return await this.reconcile({ state, note, vault, provider, local, now });
    } catch (e) {
      if (e instanceof StorageError) throw e;
      return this.recordFailure(state, toSyncError(e), now);
    }
  }

  private async checkAvailable(provider: NoteProvider, vault: VaultItem): Promise<boolean> {
    try {
      return await provider.isAvailable(vault);
    } catch (e) {
      logWarn('provider availability check threw', { vaultId: vault.id, error: getErrorMessage(e) });
      return false;
    }
  }

  private async reconcile(t: SyncTarget): Promise<SyncOutcome> {
    const { state, local } = t;
    const metaResult = await t.provider.getMetadata(t.note.id, t.vault);
    if (!metaResult.ok) throw metaResult.error;
    const remoteMeta = metaResult.value;

    if (!remoteMeta) {
      if (state.status === SyncStatus.PendingDownload) {
        throw new ProviderReadError(`remote copy of note ${t.note.id} disappeared`);
      }
      return this.push(t, t.note, 'push');
    }

    // Обе стороны уже совпадают: писать нечего.
    if (remoteMeta.contentHash === local.contentHash) {
      await this.notes.markSynced(t.note.id, remoteMeta.path, t.note.updatedAt);
      return this.recordSuccess(
        state,
        { localModifiedAt: local.modifiedAt, remoteModifiedAt: remoteMeta.modifiedAt, hash: local.contentHash, remotePath: remoteMeta.path },
        t.now,
        'none',
      );
    }

    // Remote untouched since the last agreement: local edits go straight up.
    if (state.lastSyncedHash != null && remoteMeta.contentHash === state.lastSyncedHash) {
      return this.push(t, t.note, 'push');
    }

    const loaded = await t.provider.loadNote(t.note.id, t.vault);
    if (!loaded.ok) throw loaded.error;
    const remote = loaded.value;
    const decision = resolveConflict(local, remote, state.lastSyncedHash, t.vault.conflictStrategy);
    logDebug('conflict resolved', { noteId: t.note.id, outcome: decision.outcome, reason: decision.reason });

    switch (decision.outcome) {
      case ConflictOutcome.LocalWins:
        return this.push(t, t.note, 'push');
      case ConflictOutcome.RemoteWins:
        await this.notes.applyRemoteContent(t.note.id, remote.content, remote.modifiedAt, remote.path);
        return this.recordSuccess(
          state,
          { localModifiedAt: remote.modifiedAt, remoteModifiedAt: remote.modifiedAt, hash: remote.contentHash, remotePath: remote.path },
          t.now,
          'pull',
        );
      case ConflictOutcome.Merged: {
        const mergedAt = Math.max(t.now, local.modifiedAt, remote.modifiedAt);
        await this.notes.updateContent(t.note.id, decision.winningContent, mergedAt);
        return this.push(t, { ...t.note, content: decision.winningContent, updatedAt: mergedAt }, 'merge');
      }
      case ConflictOutcome.Unresolvable:
        return this.recordConflict(state, local, remote, decision.detail, t.now);
    }
  }

  private async push(t: SyncTarget, note: NoteItem, direction: SyncDirection): Promise<SyncOutcome> {
    let saved: SavedNote;
    try {
      const r = await t.provider.saveNote(note, t.vault);
      if (!r.ok) throw r.error;
      saved = r.value;
    } catch (e) {
      throw e instanceof AppError ? e : new ProviderWriteError(`provider write failed: ${getErrorMessage(e)}`, { cause: e });
    }
    await this.notes.markSynced(note.id, saved.path, note.updatedAt);
    return this.recordSuccess(
      t.state,
      { localModifiedAt: note.updatedAt, remoteModifiedAt: saved.modifiedAt, hash: saved.contentHash, remotePath: saved.path },
      t.now,
      direction,
    );
  }

  private async recordSuccess(state: SyncStateItem, facts: SuccessFacts, now: number, direction: SyncDirection): Promise<SyncOutcome> {
    await this.stateStore.upsert({
      ...state,
      status: SyncStatus.Synced,
      localModifiedAt: facts.localModifiedAt,
      remoteModifiedAt: facts.remoteModifiedAt,
      lastSyncedAt: now,
      lastSyncedHash: facts.hash,
      remotePath: facts.remotePath,
      retryCount: 0,
      lastError: null,
    });
    await this.queueStore.delete(state.noteId);
    logDebug('note synced', { noteId: state.noteId, vaultId: state.vaultId, direction });
    return { status: 'success', noteId: state.noteId, direction };
  }

  private async recordFailure(state: SyncStateItem, error: AppError, now: number): Promise<SyncOutcome> {
    const message = `${error.code}: ${error.message}`;
    await this.stateStore.upsert({ ...state, status: SyncStatus.Error, retryCount: state.retryCount + 1, lastError: message });
    const queued = await this.enqueueRetry(state, message, now);
    logWarn('note sync failed', {
      noteId: state.noteId,
      vaultId: state.vaultId,
      code: error.code,
      retryCount: queued.retryCount,
      nextRetryAt: queued.nextRetryAt,
    });
    return { status: 'failed', noteId: state.noteId, error: { code: error.code, message: error.message, recoverable: error.isRecoverable } };
  }

  private async recordConflict(
    state: SyncStateItem,
    local: NoteVersion,
    remote: NoteVersion,
    detail: string,
    now: number,
  ): Promise<SyncOutcome> {
    const message = `conflict: ${detail}`;
    await this.stateStore.upsert({
      ...state,
      status: SyncStatus.Conflict,
      localModifiedAt: local.modifiedAt,
      remoteModifiedAt: remote.modifiedAt,
      retryCount: state.retryCount + 1,
      lastError: message,
    });
    await this.enqueueRetry(state, message, now);
    logWarn('note sync conflict', { noteId: state.noteId, vaultId: state.vaultId, detail });
    return { status: 'conflict', noteId: state.noteId, detail };
  }

  private async enqueueRetry(state: SyncStateItem, message: string, now: number) {
    const existing = await this.queueStore.get(state.noteId);
    const item = nextRetryItem(existing, { noteId: state.noteId, vaultId: state.vaultId, errorMessage: message, now }, this.backoff);
    await this.queueStore.upsert(item);
    return item;
  }

  private async forget(noteId: string, error: AppError): Promise<SyncOutcome> {
    await this.stateStore.delete(noteId);
    await this.queueStore.delete(noteId);
    logWarn('dropping sync bookkeeping', { noteId, code: error.code });
    return { status: 'failed', noteId, error: { code: error.code, message: error.message, recoverable: false } };
  }

  /**
   * Capture-side hook after a note was created or edited locally.
   * Returns the new state, or `null` when the note does not exist.
   */
  async markLocalChange(noteId: string): Promise<SyncStateItem | null> {
    return this.locks.runExclusive(noteId, async () => {
      const note = await this.notes.getNoteById(noteId);
      if (!note) {
        await this.stateStore.delete(noteId);
        await this.queueStore.delete(noteId);
        return null;
      }
      const existing = await this.stateStore.get(noteId);
      let next: SyncStateItem;
      if (!existing || existing.vaultId !== note.vaultId) {
        next = neverSyncedState(note.id, note.vaultId, note.updatedAt);
      } else if (existing.status === SyncStatus.NeverSynced) {
        next = { ...existing, localModifiedAt: note.updatedAt };
      } else {
        next = { ...existing, status: SyncStatus.PendingUpload, localModifiedAt: note.updatedAt };
      }
      await this.stateStore.upsert(next);
      await this.notes.markUnsynced(noteId);
      return next;
    });
  }

  /**
   * Flags `Synced` notes whose remote copy changed since the last agreement as
   * `PendingDownload`. Returns how many notes were flagged.
   */
  async detectRemoteChanges(vaultId: string): Promise<number> {
    const vault = await this.vaults.getVaultById(vaultId);
    if (!vault) throw new VaultNotFoundError(vaultId);
    const provider = this.providers.get(vault.providerType);
    if (!provider || !(await this.checkAvailable(provider, vault))) {
      logWarn('remote change detection skipped: provider unavailable', { vaultId });
      return 0;
    }
    const listed = await provider.listNotes(vault);
    if (!listed.ok) {
      logWarn('remote change detection failed', { vaultId, code: listed.error.code, error: listed.error.message });
      return 0;
    }

    let flagged = 0;
    for (const meta of listed.value) {
      const changed = await this.locks.runExclusive(meta.noteId, async () => {
        const state = await this.stateStore.get(meta.noteId);
        if (!state || state.vaultId !== vaultId || state.status !== SyncStatus.Synced) return false;
        if (state.lastSyncedHash === meta.contentHash) return false;
        await this.stateStore.upsert({ ...state, status: SyncStatus.PendingDownload, remoteModifiedAt: meta.modifiedAt });
        return true;
      });
      if (changed) flagged += 1;
    }
    if (flagged > 0) logInfo('remote changes detected', { vaultId, flagged });
    return flagged;
  }

  /**
   * Forgets everything known about the vault's sync history and rebuilds state
   * from local notes. The next sweep re-verifies every note.
   */
  async forceResync(vaultId: string): Promise<number> {
    const vault = await this.vaults.getVaultById(vaultId);
    if (!vault) throw new VaultNotFoundError(vaultId);
    const localNotes = await this.notes.getNotesForVault(vaultId);
    await this.queueStore.deleteForVault(vaultId);
    await this.stateStore.deleteForVault(vaultId);
    const states = localNotes.map((n) => {
      const fresh = neverSyncedState(n.id, n.vaultId, n.updatedAt);
      return n.isSynced ? { ...fresh, status: SyncStatus.PendingUpload } : fresh;
    });
    await this.stateStore.upsertAll(states);
    logInfo('vault resync forced', { vaultId, notes: states.length }, { critical: true });
    return states.length;
  }

  /** Whole percent of tracked notes that are synced; 100 for an empty vault. */
  async getSyncProgress(vaultId: string): Promise<number> {
    const stats = await this.stateStore.getStatistics(vaultId);
    const total = Object.values(stats).reduce((a, b) => a + b, 0);
    if (total === 0) return 100;
    return Math.floor((stats[SyncStatus.Synced] * 100) / total);
  }

  /** Gives a note a fresh retry budget in both the queue and its state. */
  async resetRetry(noteId: string): Promise<boolean> {
    return this.locks.runExclusive(noteId, async () => {
      const queued = await this.queueStore.resetRetryCount(noteId, this.clock());
      const stated = await this.stateStore.resetRetryCount(noteId);
      return queued || stated;
    });
  }
}

function toSyncError(e: unknown): AppError {
  if (e instanceof AppError) return e;
  return new ProviderReadError(`provider call failed: ${getErrorMessage(e)}`, { cause: e });
}
