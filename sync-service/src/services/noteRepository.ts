import { and, asc, eq } from 'drizzle-orm';

import { noteTagsSchema, type NoteItem } from '@notesync/shared';

import type { SyncDb } from '../database/db.js';
import { notes } from '../database/schema.js';
import { storeCall } from './sync/guard.js';

type NoteRow = typeof notes.$inferSelect;

function parseTags(noteId: string, raw: string): string[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`note ${noteId}: tags_json is not valid JSON`, { cause: e });
  }
  const parsed = noteTagsSchema.safeParse(json);
  if (!parsed.success) throw new Error(`note ${noteId}: tags_json is not a string array`);
  return parsed.data;
}

function mapNoteRow(row: NoteRow): NoteItem {
  return {
    id: row.id,
    vaultId: row.vaultId,
    title: row.title,
    content: row.content,
    tags: parseTags(row.id, row.tagsJson),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    filePath: row.filePath,
    isSynced: row.isSynced,
  };
}

/**
 * Local notes written by the capture side. The sync engine only reads them and
 * flips sync bookkeeping (`isSynced`, `filePath`), except when remote content wins.
 */
export class NoteRepository {
  constructor(private readonly db: SyncDb) {}

  async getNoteById(noteId: string): Promise<NoteItem | null> {
    return storeCall('notes.getById', async () => {
      const rows = await this.db.select().from(notes).where(eq(notes.id, noteId)).limit(1);
      return rows[0] ? mapNoteRow(rows[0]) : null;
    });
  }

  async getNotesForVault(vaultId: string): Promise<NoteItem[]> {
    return storeCall('notes.getForVault', async () => {
      const rows = await this.db.select().from(notes).where(eq(notes.vaultId, vaultId)).orderBy(asc(notes.updatedAt), asc(notes.id));
      return rows.map(mapNoteRow);
    });
  }

  async getUnsyncedNotes(vaultId: string): Promise<NoteItem[]> {
    return storeCall('notes.getUnsynced', async () => {
      const rows = await this.db
        .select()
        .from(notes)
        .where(and(eq(notes.vaultId, vaultId), eq(notes.isSynced, false)))
        .orderBy(asc(notes.updatedAt), asc(notes.id));
      return rows.map(mapNoteRow);
    });
  }

  async upsertNote(note: NoteItem): Promise<void> {
    await storeCall('notes.upsert', async () => {
      const row: NoteRow = {
        id: note.id,
        vaultId: note.vaultId,
        title: note.title,
        content: note.content,
        tagsJson: JSON.stringify(note.tags),
        createdAt: note.createdAt,
        updatedAt: note.updatedAt,
        filePath: note.filePath,
        isSynced: note.isSynced,
      };
      const { id: _id, ...set } = row;
      await this.db.insert(notes).values(row).onConflictDoUpdate({ target: notes.id, set });
    });
  }

  /**
   * Marks the note synced only if it was not edited after `syncedUpdatedAt`,
   * so an edit made during the upload keeps the note dirty.
   */
  async markSynced(noteId: string, filePath: string, syncedUpdatedAt: number): Promise<boolean> {
    return storeCall('notes.markSynced', async () => {
      const r = this.db
        .update(notes)
        .set({ isSynced: true, filePath })
        .where(and(eq(notes.id, noteId), eq(notes.updatedAt, syncedUpdatedAt)))
        .run();
      return r.changes > 0;
    });
  }

  async markUnsynced(noteId: string): Promise<void> {
    await storeCall('notes.markUnsynced', async () => {
      await this.db.update(notes).set({ isSynced: false }).where(eq(notes.id, noteId));
    });
  }

  // Remote side won: local copy takes the remote content and timestamp.
  async applyRemoteContent(noteId: string, content: string, modifiedAt: number, filePath: string): Promise<void> {
    await storeCall('notes.applyRemoteContent', async () => {
      await this.db
        .update(notes)
        .set({ content, updatedAt: modifiedAt, filePath, isSynced: true })
        .where(eq(notes.id, noteId));
    });
  }

  async updateContent(noteId: string, content: string, updatedAt: number): Promise<void> {
    await storeCall('notes.updateContent', async () => {
      await this.db.update(notes).set({ content, updatedAt, isSynced: false }).where(eq(notes.id, noteId));
    });
  }
}
