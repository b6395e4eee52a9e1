import type { NoteItem, NoteVersion, VaultItem } from '@notesync/shared';

import type { AppError } from '../errors/index.js';

export type ProviderResult<T> = { ok: true; value: T } | { ok: false; error: AppError };

export type RemoteNoteMetadata = {
  noteId: string;
  path: string;
  modifiedAt: number;
  contentHash: string;
};

export type RemoteNote = NoteVersion & { noteId: string; path: string };

export type SavedNote = {
  path: string;
  modifiedAt: number;
  contentHash: string;
};

/**
 * A place notes are exported to (a Markdown folder, an Obsidian vault, ...).
 * Content hashes must be produced with `hashContent` so they compare with the
 * ancestor hash kept in SyncState.
 */
export interface NoteProvider {
  isAvailable(vault: VaultItem): Promise<boolean>;
  saveNote(note: NoteItem, vault: VaultItem): Promise<ProviderResult<SavedNote>>;
  loadNote(noteId: string, vault: VaultItem): Promise<ProviderResult<RemoteNote>>;
  // `null` value: the note does not exist remotely.
  getMetadata(noteId: string, vault: VaultItem): Promise<ProviderResult<RemoteNoteMetadata | null>>;
  deleteNote(noteId: string, vault: VaultItem): Promise<ProviderResult<void>>;
  listNotes(vault: VaultItem): Promise<ProviderResult<RemoteNoteMetadata[]>>;
}
