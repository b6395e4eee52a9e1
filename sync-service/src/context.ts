import { ProviderType } from '@notesync/shared';

import type { SyncServiceConfig } from './config.js';
import type { SyncDb } from './database/db.js';
import { FolderProvider } from './providers/folderProvider.js';
import { ProviderRegistry } from './providers/providerRegistry.js';
import { NoteRepository } from './services/noteRepository.js';
import { FailedItemsService } from './services/sync/failedItemsService.js';
import { RetryQueueStore } from './services/sync/retryQueueStore.js';
import { SweepScheduler } from './services/sync/sweepScheduler.js';
import { SyncCoordinator } from './services/sync/syncCoordinator.js';
import { SyncStateStore } from './services/sync/syncStateStore.js';
import { SyncSweep } from './services/sync/syncSweep.js';
import { VaultRepository } from './services/vaultRepository.js';

export type SyncContext = {
  stateStore: SyncStateStore;
  queueStore: RetryQueueStore;
  notes: NoteRepository;
  vaults: VaultRepository;
  providers: ProviderRegistry;
  coordinator: SyncCoordinator;
  sweep: SyncSweep;
  scheduler: SweepScheduler;
  failedItems: FailedItemsService;
};

export function defaultProviders(): ProviderRegistry {
  const folder = new FolderProvider();
  return new ProviderRegistry().register(ProviderType.Folder, folder).register(ProviderType.Obsidian, folder);
}

export function createSyncContext(opts: {
  db: SyncDb;
  config: Pick<SyncServiceConfig, 'sweepIntervalMs' | 'sweepConcurrency' | 'backoff' | 'maxRetries'>;
  providers?: ProviderRegistry;
  clock?: () => number;
}): SyncContext {
  const { db, config } = opts;
  const clock = opts.clock ?? Date.now;
  const providers = opts.providers ?? defaultProviders();
  const stateStore = new SyncStateStore(db);
  const queueStore = new RetryQueueStore(db, { maxRetries: config.maxRetries });
  const notes = new NoteRepository(db);
  const vaults = new VaultRepository(db);
  const coordinator = new SyncCoordinator({
    stateStore,
    queueStore,
    notes,
    vaults,
    providers,
    clock,
    backoff: config.backoff,
    maxRetries: config.maxRetries,
  });
  const sweep = new SyncSweep({ coordinator, stateStore, queueStore, notes, vaults, clock, concurrency: config.sweepConcurrency });
  const scheduler = new SweepScheduler(sweep, config.sweepIntervalMs, clock);
  const failedItems = new FailedItemsService(queueStore, coordinator);
  return { stateStore, queueStore, notes, vaults, providers, coordinator, sweep, scheduler, failedItems };
}
