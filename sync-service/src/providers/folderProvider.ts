import { constants } from 'node:fs';
import { access, mkdir, readFile, readdir, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import type { NoteItem, VaultItem } from '@notesync/shared';

import { ProviderReadError, ProviderWriteError, getErrorMessage } from '../errors/index.js';
import { hashContent, normalizeContent } from '../utils/contentHash.js';
import { logDebug, logWarn } from '../utils/logger.js';
import type { NoteProvider, ProviderResult, RemoteNote, RemoteNoteMetadata, SavedNote } from './types.js';

// Markdown-папка (в том числе Obsidian vault): одна заметка = один файл <noteId>.md с front matter.

const NOTE_EXT = '.md';
const NOTE_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const frontMatterSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  tags: z.array(z.string()).optional(),
  updated: z.string().optional(),
});

export type FrontMatter = z.infer<typeof frontMatterSchema>;

export type ParsedNoteFile = {
  frontMatter: FrontMatter;
  body: string;
};

function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

export function renderNoteFile(note: NoteItem): string {
  const header = [
    '---',
    `id: ${note.id}`,
    `title: ${JSON.stringify(note.title ?? '')}`,
    `tags: ${JSON.stringify(note.tags)}`,
    `updated: ${new Date(note.updatedAt).toISOString()}`,
    '---',
  ].join('\n');
  return `${header}\n${normalizeContent(note.content)}`;
}

function parseHeaderValue(raw: string): unknown {
  if (!raw.startsWith('"') && !raw.startsWith('[')) return raw;
  return JSON.parse(raw);
}

/**
 * Splits a note file into front matter and body. A file without a leading
 * `---` block is all body. Throws on a malformed header value.
 */
export function parseNoteFile(text: string): ParsedNoteFile {
  const normalized = normalizeContent(text);
  if (!normalized.startsWith('---\n')) return { frontMatter: {}, body: normalized };

  let header: string;
  let body: string;
  const end = normalized.indexOf('\n---\n', 3);
  if (end >= 0) {
    header = normalized.slice(4, end);
    body = normalized.slice(end + 5);
  } else if (normalized.endsWith('\n---')) {
    header = normalized.slice(4, normalized.length - 4);
    body = '';
  } else {
    return { frontMatter: {}, body: normalized };
  }

  const fields: Record<string, unknown> = {};
  for (const line of header.split('\n')) {
    const sep = line.indexOf(':');
    if (sep <= 0) continue;
    const key = line.slice(0, sep).trim();
    fields[key] = parseHeaderValue(line.slice(sep + 1).trim());
  }
  const parsed = frontMatterSchema.safeParse(fields);
  if (!parsed.success) throw new Error(`invalid front matter: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
  return { frontMatter: parsed.data, body };
}

export class FolderProvider implements NoteProvider {
  notesDir(vault: VaultItem): string {
    const { rootPath, notesFolder } = vault.providerConfig;
    return notesFolder ? path.join(rootPath, notesFolder) : rootPath;
  }

  private filePath(noteId: string, vault: VaultItem): string | null {
    if (!NOTE_ID_RE.test(noteId)) return null;
    return path.join(this.notesDir(vault), `${noteId}${NOTE_EXT}`);
  }

  async isAvailable(vault: VaultItem): Promise<boolean> {
    const root = vault.providerConfig.rootPath;
    try {
      const s = await stat(root);
      if (!s.isDirectory()) return false;
      await access(root, constants.W_OK);
      return true;
    } catch (e) {
      logDebug('folder provider: root not available', { vaultId: vault.id, root, error: getErrorMessage(e) });
      return false;
    }
  }

  async saveNote(note: NoteItem, vault: VaultItem): Promise<ProviderResult<SavedNote>> {
    const file = this.filePath(note.id, vault);
    if (!file) return { ok: false, error: new ProviderWriteError(`note id is not usable as a file name: ${note.id}`) };
    const tmp = `${file}.tmp`;
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(tmp, renderNoteFile(note), 'utf8');
      await rename(tmp, file);
      // mtime несёт время версии: правка в редакторе сдвигает его вперёд.
      const at = new Date(note.updatedAt);
      await utimes(file, at, at);
    } catch (e) {
      return { ok: false, error: new ProviderWriteError(`failed to write ${file}: ${getErrorMessage(e)}`, { cause: e }) };
    }
    return { ok: true, value: { path: file, modifiedAt: note.updatedAt, contentHash: hashContent(note.content) } };
  }

  async loadNote(noteId: string, vault: VaultItem): Promise<ProviderResult<RemoteNote>> {
    const r = await this.readNote(noteId, vault);
    if (!r.ok) return r;
    if (!r.value) return { ok: false, error: new ProviderReadError(`remote note not found: ${noteId}`) };
    return { ok: true, value: r.value };
  }

  async getMetadata(noteId: string, vault: VaultItem): Promise<ProviderResult<RemoteNoteMetadata | null>> {
    const r = await this.readNote(noteId, vault);
    if (!r.ok || !r.value) return r;
    const { noteId: id, path: p, modifiedAt, contentHash } = r.value;
    return { ok: true, value: { noteId: id, path: p, modifiedAt, contentHash } };
  }

  async deleteNote(noteId: string, vault: VaultItem): Promise<ProviderResult<void>> {
    const file = this.filePath(noteId, vault);
    if (!file) return { ok: false, error: new ProviderWriteError(`note id is not usable as a file name: ${noteId}`) };
    try {
      await rm(file, { force: true });
      return { ok: true, value: undefined };
    } catch (e) {
      return { ok: false, error: new ProviderWriteError(`failed to delete ${file}: ${getErrorMessage(e)}`, { cause: e }) };
    }
  }

  async listNotes(vault: VaultItem): Promise<ProviderResult<RemoteNoteMetadata[]>> {
    const dir = this.notesDir(vault);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return { ok: true, value: [] };
      return { ok: false, error: new ProviderReadError(`failed to list ${dir}: ${getErrorMessage(e)}`, { cause: e }) };
    }

    const out: RemoteNoteMetadata[] = [];
    for (const name of names.sort()) {
      if (!name.endsWith(NOTE_EXT)) continue;
      const noteId = name.slice(0, -NOTE_EXT.length);
      if (!NOTE_ID_RE.test(noteId)) continue;
      const r = await this.getMetadata(noteId, vault);
      if (!r.ok) {
        logWarn('folder provider: skipping unreadable note file', { vaultId: vault.id, file: name, error: r.error.message });
        continue;
      }
      if (r.value) out.push(r.value);
    }
    return { ok: true, value: out };
  }

  private async readNote(noteId: string, vault: VaultItem): Promise<ProviderResult<RemoteNote | null>> {
    const file = this.filePath(noteId, vault);
    if (!file) return { ok: false, error: new ProviderReadError(`note id is not usable as a file name: ${noteId}`) };
    let text: string;
    let mtimeMs: number;
    try {
      text = await readFile(file, 'utf8');
      mtimeMs = (await stat(file)).mtimeMs;
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return { ok: true, value: null };
      return { ok: false, error: new ProviderReadError(`failed to read ${file}: ${getErrorMessage(e)}`, { cause: e }) };
    }

    let parsed: ParsedNoteFile;
    try {
      parsed = parseNoteFile(text);
    } catch (e) {
      return { ok: false, error: new ProviderReadError(`malformed note file ${file}: ${getErrorMessage(e)}`, { cause: e }) };
    }

    return {
      ok: true,
      value: {
        noteId,
        path: file,
        content: parsed.body,
        modifiedAt: Math.round(mtimeMs),
        contentHash: hashContent(parsed.body),
      },
    };
  }
}
