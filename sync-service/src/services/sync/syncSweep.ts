import {
  SyncMode,
  hasExceededMaxRetries,
  type SweepSummary,
  type SyncOutcome,
  type VaultItem,
} from '@notesync/shared';

import { getErrorMessage } from '../../errors/index.js';
import { logError, logInfo } from '../../utils/logger.js';
import type { NoteRepository } from '../noteRepository.js';
import type { VaultRepository } from '../vaultRepository.js';
import type { RetryQueueStore } from './retryQueueStore.js';
import type { SyncStateStore } from './syncStateStore.js';

export type NoteSyncer = {
  readonly maxRetries: number;
  syncNote(noteId: string): Promise<SyncOutcome>;
  detectRemoteChanges(vaultId: string): Promise<number>;
};

export type SyncSweepDeps = {
  coordinator: NoteSyncer;
  stateStore: SyncStateStore;
  queueStore: RetryQueueStore;
  notes: NoteRepository;
  vaults: VaultRepository;
  clock?: () => number;
  concurrency?: number;
};

type VaultRun = {
  vault: VaultItem;
  attempted: Set<string>;
  synced: number;
  failed: number;
  conflicts: number;
};

/**
 * One pass over every vault: due retries first, then new local notes, then
 * pending uploads, then remote changes. Each note is attempted at most once
 * per vault pass.
 */
export class SyncSweep {
  private readonly clock: () => number;
  private readonly concurrency: number;

  constructor(private readonly deps: SyncSweepDeps) {
    this.clock = deps.clock ?? Date.now;
    this.concurrency = Math.max(1, Math.floor(deps.concurrency ?? 1));
  }

  async runSweep(opts: { signal?: AbortSignal } = {}): Promise<SweepSummary> {
    const { signal } = opts;
    const startedAt = this.clock();
    const summary: SweepSummary = { totalSynced: 0, totalFailed: 0, totalConflicts: 0, vaultsProcessed: 0, cancelled: false };
    const vaultList = await this.deps.vaults.getAllVaults();
    logInfo('sync sweep started', { vaults: vaultList.length });

    for (const vault of vaultList) {
      if (signal?.aborted) break;
      if (vault.syncMode === SyncMode.Disabled) continue;

      const run: VaultRun = { vault, attempted: new Set(), synced: 0, failed: 0, conflicts: 0 };
      await this.syncVault(run, signal);
      summary.totalSynced += run.synced;
      summary.totalFailed += run.failed;
      summary.totalConflicts += run.conflicts;
      if (signal?.aborted) break;

      summary.vaultsProcessed += 1;
      if (run.failed === 0 && run.conflicts === 0) await this.deps.vaults.updateLastSynced(vault.id, this.clock());
    }

    summary.cancelled = signal?.aborted === true;
    logInfo('sync sweep finished', { ...summary, durationMs: this.clock() - startedAt }, { critical: summary.totalFailed > 0 });
    return summary;
  }

  private async syncVault(run: VaultRun, signal: AbortSignal | undefined): Promise<void> {
    const { vault } = run;
    const { coordinator, queueStore, stateStore, notes } = this.deps;

    const ready = await queueStore.getItemsReadyForRetry(this.clock(), vault.id);
    const retryIds = ready.filter((item) => !hasExceededMaxRetries(item, coordinator.maxRetries)).map((item) => item.noteId);
    await this.processBatch(run, retryIds, signal);
    if (signal?.aborted) return;

    if (vault.syncMode !== SyncMode.PullOnly) {
      const unsynced = await notes.getUnsyncedNotes(vault.id);
      await this.processBatch(run, await this.freshIds(run, unsynced.map((n) => n.id)), signal);
      if (signal?.aborted) return;

      const pending = await stateStore.getPendingUploads(vault.id, coordinator.maxRetries);
      await this.processBatch(run, await this.freshIds(run, pending.map((s) => s.noteId)), signal);
      if (signal?.aborted) return;
    }

    if (vault.syncMode !== SyncMode.PushOnly) {
      await coordinator.detectRemoteChanges(vault.id);
      const downloads = await stateStore.getPendingDownloads(vault.id);
      await this.processBatch(run, await this.freshIds(run, downloads.map((s) => s.noteId)), signal);
    }
  }

  // Notes already attempted in this pass or waiting in the retry queue are left alone.
  private async freshIds(run: VaultRun, noteIds: string[]): Promise<string[]> {
    const out: string[] = [];
    for (const noteId of noteIds) {
      if (run.attempted.has(noteId)) continue;
      if (await this.deps.queueStore.get(noteId)) continue;
      out.push(noteId);
    }
    return out;
  }

  private async processBatch(run: VaultRun, noteIds: string[], signal: AbortSignal | undefined): Promise<void> {
    let next = 0;
    const worker = async () => {
      while (next < noteIds.length) {
        if (signal?.aborted) return;
        const noteId = noteIds[next];
        next += 1;
        if (noteId === undefined || run.attempted.has(noteId)) continue;
        run.attempted.add(noteId);
        await this.syncOne(run, noteId);
      }
    };
    const workers = Math.min(this.concurrency, noteIds.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));
  }

  private async syncOne(run: VaultRun, noteId: string): Promise<void> {
    let outcome: SyncOutcome;
    try {
      outcome = await this.deps.coordinator.syncNote(noteId);
    } catch (e) {
      run.failed += 1;
      logError('note sync threw', { noteId, vaultId: run.vault.id, error: getErrorMessage(e) });
      return;
    }
    if (outcome.status === 'success') run.synced += 1;
    else if (outcome.status === 'conflict') run.conflicts += 1;
    else run.failed += 1;
  }
}
