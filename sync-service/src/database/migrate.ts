import type Database from 'better-sqlite3';

import { logInfo } from '../utils/logger.js';

type Migration = {
  from: number;
  to: number;
  name: string;
  sql: string;
};

const MIGRATIONS: Migration[] = [
  {
    from: 0,
    to: 1,
    name: 'notes and vaults',
    sql: `
      CREATE TABLE IF NOT EXISTS vaults (
        id TEXT PRIMARY KEY NOT NULL,
        name TEXT NOT NULL,
        provider_type TEXT NOT NULL,
        provider_config_json TEXT NOT NULL,
        sync_mode TEXT NOT NULL DEFAULT 'bidirectional',
        conflict_strategy TEXT NOT NULL DEFAULT 'last_write_wins',
        is_default INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        last_synced_at INTEGER
      );
      CREATE TABLE IF NOT EXISTS notes (
        id TEXT PRIMARY KEY NOT NULL,
        vault_id TEXT NOT NULL,
        title TEXT,
        content TEXT NOT NULL,
        tags_json TEXT NOT NULL DEFAULT '[]',
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        file_path TEXT,
        is_synced INTEGER NOT NULL DEFAULT 0
      );
      CREATE INDEX IF NOT EXISTS notes_vault_synced_idx ON notes (vault_id, is_synced);
    `,
  },
  {
    from: 1,
    to: 2,
    name: 'sync state and retry queue',
    sql: `
      CREATE TABLE IF NOT EXISTS sync_states (
        note_id TEXT PRIMARY KEY NOT NULL,
        vault_id TEXT NOT NULL,
        status TEXT NOT NULL,
        local_modified_at INTEGER NOT NULL,
        remote_modified_at INTEGER,
        last_synced_at INTEGER,
        last_synced_hash TEXT,
        remote_path TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT
      );
      CREATE INDEX IF NOT EXISTS sync_states_vault_status_idx ON sync_states (vault_id, status);
      CREATE TABLE IF NOT EXISTS sync_queue (
        note_id TEXT PRIMARY KEY NOT NULL,
        vault_id TEXT NOT NULL,
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_attempt_at INTEGER NOT NULL,
        next_retry_at INTEGER NOT NULL,
        last_error_message TEXT,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS sync_queue_next_retry_idx ON sync_queue (next_retry_at);
      CREATE INDEX IF NOT EXISTS sync_queue_vault_idx ON sync_queue (vault_id);
    `,
  },
];

export const CURRENT_SCHEMA_VERSION = 2;

function buildMigrationChain(fromVersion: number, toVersion: number): Migration[] | null {
  if (fromVersion === toVersion) return [];
  const chain: Migration[] = [];
  let current = fromVersion;
  for (let i = 0; i < 1000 && current < toVersion; i += 1) {
    const next = MIGRATIONS.find((m) => m.from === current);
    if (!next) return null;
    chain.push(next);
    current = next.to;
  }
  return current === toVersion ? chain : null;
}

export function readSchemaVersion(sqlite: Database.Database): number {
  const raw = sqlite.pragma('user_version', { simple: true });
  return typeof raw === 'number' ? raw : Number(raw ?? 0);
}

/**
 * Applies pending migrations; each step runs in its own transaction together
 * with the user_version bump.
 */
export function migrateSqlite(sqlite: Database.Database): number {
  const stored = readSchemaVersion(sqlite);
  if (stored > CURRENT_SCHEMA_VERSION) {
    throw new Error(`database schema v${stored} is newer than supported v${CURRENT_SCHEMA_VERSION}`);
  }
  const chain = buildMigrationChain(stored, CURRENT_SCHEMA_VERSION);
  if (!chain) throw new Error(`no migration path from v${stored} to v${CURRENT_SCHEMA_VERSION}`);
  for (const m of chain) {
    sqlite.transaction(() => {
      sqlite.exec(m.sql);
      sqlite.pragma(`user_version = ${m.to}`);
    })();
    logInfo('schema migration applied', { name: m.name, to: m.to });
  }
  return CURRENT_SCHEMA_VERSION;
}
