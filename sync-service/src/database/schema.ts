import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Временные поля храним как Unix-time в миллисекундах (int),
// чтобы сравнение локальной и удалённой версии было простым сравнением чисел.

export const vaults = sqliteTable('vaults', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  providerType: text('provider_type').notNull(),
  providerConfigJson: text('provider_config_json').notNull(),
  syncMode: text('sync_mode').notNull().default('bidirectional'),
  conflictStrategy: text('conflict_strategy').notNull().default('last_write_wins'),
  isDefault: integer('is_default', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at').notNull(),
  lastSyncedAt: integer('last_synced_at'),
});

export const notes = sqliteTable(
  'notes',
  {
    id: text('id').primaryKey(),
    vaultId: text('vault_id').notNull(),
    title: text('title'),
    content: text('content').notNull(),
    tagsJson: text('tags_json').notNull().default('[]'),
    createdAt: integer('created_at').notNull(),
    updatedAt: integer('updated_at').notNull(),
    filePath: text('file_path'),
    isSynced: integer('is_synced', { mode: 'boolean' }).notNull().default(false),
  },
  (t) => ({
    vaultSyncedIdx: index('notes_vault_synced_idx').on(t.vaultId, t.isSynced),
  }),
);

export const syncStates = sqliteTable(
  'sync_states',
  {
    noteId: text('note_id').primaryKey(),
    vaultId: text('vault_id').notNull(),
    status: text('status').notNull(),
    localModifiedAt: integer('local_modified_at').notNull(),
    remoteModifiedAt: integer('remote_modified_at'),
    lastSyncedAt: integer('last_synced_at'),
    lastSyncedHash: text('last_synced_hash'),
    remotePath: text('remote_path'),
    retryCount: integer('retry_count').notNull().default(0),
    lastError: text('last_error'),
  },
  (t) => ({
    vaultStatusIdx: index('sync_states_vault_status_idx').on(t.vaultId, t.status),
  }),
);

// Очередь повторов: запись есть только пока последняя попытка синхронизации неуспешна.
export const syncQueue = sqliteTable(
  'sync_queue',
  {
    noteId: text('note_id').primaryKey(),
    vaultId: text('vault_id').notNull(),
    retryCount: integer('retry_count').notNull().default(0),
    lastAttemptAt: integer('last_attempt_at').notNull(),
    nextRetryAt: integer('next_retry_at').notNull(),
    lastErrorMessage: text('last_error_message'),
    createdAt: integer('created_at').notNull(),
  },
  (t) => ({
    nextRetryIdx: index('sync_queue_next_retry_idx').on(t.nextRetryAt),
    vaultIdx: index('sync_queue_vault_idx').on(t.vaultId),
  }),
);
