import {
  ConflictOutcome,
  ConflictStrategy,
  type ConflictDecision,
  type NoteVersion,
} from '@notesync/shared';

/**
 * Decides which version of a note survives. Pure: no I/O, no clock.
 *
 * `ancestorHash` is the content hash both sides agreed on at the last successful
 * sync, `null` when the note was never synced. Only when both sides moved away
 * from the ancestor does `strategy` come into play.
 */
export function resolveConflict(
  local: NoteVersion,
  remote: NoteVersion,
  ancestorHash: string | null,
  strategy: ConflictStrategy = ConflictStrategy.LastWriteWins,
): ConflictDecision {
  if (local.contentHash === remote.contentHash) {
    return { outcome: ConflictOutcome.LocalWins, winningContent: local.content, reason: 'identical' };
  }

  // Первая синхронизация: общего предка нет, конфликт не фиксируем.
  if (ancestorHash == null) {
    return remote.modifiedAt > local.modifiedAt
      ? { outcome: ConflictOutcome.RemoteWins, winningContent: remote.content, reason: 'first_sync' }
      : { outcome: ConflictOutcome.LocalWins, winningContent: local.content, reason: 'first_sync' };
  }

  const localChanged = local.contentHash !== ancestorHash;
  const remoteChanged = remote.contentHash !== ancestorHash;
  if (!remoteChanged) return { outcome: ConflictOutcome.LocalWins, winningContent: local.content, reason: 'local_changed' };
  if (!localChanged) return { outcome: ConflictOutcome.RemoteWins, winningContent: remote.content, reason: 'remote_changed' };

  return applyStrategy(local, remote, strategy);
}

function applyStrategy(local: NoteVersion, remote: NoteVersion, strategy: ConflictStrategy): ConflictDecision {
  switch (strategy) {
    case ConflictStrategy.LocalWins:
      return { outcome: ConflictOutcome.LocalWins, winningContent: local.content, reason: 'strategy' };
    case ConflictStrategy.RemoteWins:
      return { outcome: ConflictOutcome.RemoteWins, winningContent: remote.content, reason: 'strategy' };
    case ConflictStrategy.Manual:
      return {
        outcome: ConflictOutcome.Unresolvable,
        winningContent: null,
        reason: 'strategy',
        detail: 'both sides changed, manual resolution required',
      };
    case ConflictStrategy.MergeAppends: {
      const merged = mergeAppends(local.content, remote.content);
      if (merged != null) return { outcome: ConflictOutcome.Merged, winningContent: merged, reason: 'strategy' };
      return lastWriteWins(local, remote);
    }
    case ConflictStrategy.LastWriteWins:
      return lastWriteWins(local, remote);
  }
}

function lastWriteWins(local: NoteVersion, remote: NoteVersion): ConflictDecision {
  if (local.modifiedAt > remote.modifiedAt) {
    return { outcome: ConflictOutcome.LocalWins, winningContent: local.content, reason: 'strategy' };
  }
  if (remote.modifiedAt > local.modifiedAt) {
    return { outcome: ConflictOutcome.RemoteWins, winningContent: remote.content, reason: 'strategy' };
  }
  return {
    outcome: ConflictOutcome.Unresolvable,
    winningContent: null,
    reason: 'strategy',
    detail: `both sides changed at the same time (${local.modifiedAt})`,
  };
}

/**
 * When the lines of one text are the lines of the other with more lines
 * appended, returns the longer text. Returns `null` for any other divergence,
 * including an edit inside an existing line.
 */
export function mergeAppends(localContent: string, remoteContent: string): string | null {
  const local = localContent.replace(/\r\n/g, '\n').split('\n');
  const remote = remoteContent.replace(/\r\n/g, '\n').split('\n');
  if (remote.length > local.length && isLinePrefix(local, remote)) return remoteContent;
  if (local.length > remote.length && isLinePrefix(remote, local)) return localContent;
  return null;
}

function isLinePrefix(shorter: string[], longer: string[]): boolean {
  return shorter.every((line, i) => line === longer[i]);
}
