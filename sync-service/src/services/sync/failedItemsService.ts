import type { RetryQueueItem } from '@notesync/shared';

import { logInfo } from '../../utils/logger.js';
import type { RetryQueueStore } from './retryQueueStore.js';
import type { SyncCoordinator } from './syncCoordinator.js';

// Заметки, исчерпавшие лимит повторов: ждут ручного решения оператора.
export class FailedItemsService {
  constructor(
    private readonly queueStore: RetryQueueStore,
    private readonly coordinator: Pick<SyncCoordinator, 'resetRetry'>,
  ) {}

  listFailedItems(): Promise<RetryQueueItem[]> {
    return this.queueStore.getFailedItems();
  }

  resetRetryCount(noteId: string): Promise<boolean> {
    return this.coordinator.resetRetry(noteId);
  }

  async resetAllFailedItems(): Promise<number> {
    const failed = await this.queueStore.getFailedItems();
    let reset = 0;
    for (const item of failed) {
      if (await this.coordinator.resetRetry(item.noteId)) reset += 1;
    }
    logInfo('failed sync items reset', { count: reset }, { critical: true });
    return reset;
  }

  async discardFailedItems(): Promise<number> {
    const removed = await this.queueStore.deleteFailedItems();
    logInfo('failed sync items discarded', { count: removed }, { critical: true });
    return removed;
  }
}
