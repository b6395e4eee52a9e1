export const ConflictStrategy = {
  LastWriteWins: 'last_write_wins',
  LocalWins: 'local_wins',
  RemoteWins: 'remote_wins',
  // Both-sides changes are never decided automatically.
  Manual: 'manual',
  // Append-only edits are merged, anything else falls back to last-write-wins.
  MergeAppends: 'merge_appends',
} as const;

export type ConflictStrategy = (typeof ConflictStrategy)[keyof typeof ConflictStrategy];

export const ConflictOutcome = {
  LocalWins: 'local_wins',
  RemoteWins: 'remote_wins',
  Merged: 'merged',
  Unresolvable: 'unresolvable',
} as const;

export type ConflictOutcome = (typeof ConflictOutcome)[keyof typeof ConflictOutcome];

/**
 * One side of a note as seen by the resolver: local DB copy or the vault file.
 */
export type NoteVersion = {
  content: string;
  modifiedAt: number;
  contentHash: string;
};

export type ConflictReason =
  | 'identical'
  | 'first_sync'
  | 'local_changed'
  | 'remote_changed'
  | 'strategy';

export type ConflictDecision =
  | { outcome: typeof ConflictOutcome.LocalWins; winningContent: string; reason: ConflictReason }
  | { outcome: typeof ConflictOutcome.RemoteWins; winningContent: string; reason: ConflictReason }
  | { outcome: typeof ConflictOutcome.Merged; winningContent: string; reason: ConflictReason }
  | { outcome: typeof ConflictOutcome.Unresolvable; winningContent: null; reason: ConflictReason; detail: string };
