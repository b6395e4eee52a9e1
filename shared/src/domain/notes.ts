import type { ConflictStrategy } from './conflict.js';

export const ProviderType = {
  Folder: 'folder',
  Obsidian: 'obsidian',
} as const;

export type ProviderType = (typeof ProviderType)[keyof typeof ProviderType];

export const SyncMode = {
  PushOnly: 'push_only',
  PullOnly: 'pull_only',
  Bidirectional: 'bidirectional',
  Disabled: 'disabled',
} as const;

export type SyncMode = (typeof SyncMode)[keyof typeof SyncMode];

export type ProviderConfig = {
  rootPath: string;
  // Obsidian daily notes folder or any other subfolder inside the vault.
  notesFolder?: string | null;
};

export type VaultItem = {
  id: string;
  name: string;
  providerType: ProviderType;
  providerConfig: ProviderConfig;
  syncMode: SyncMode;
  conflictStrategy: ConflictStrategy;
  isDefault: boolean;
  createdAt: number;
  lastSyncedAt: number | null;
};

export type NoteItem = {
  id: string;
  vaultId: string;
  title: string | null;
  content: string;
  tags: string[];
  createdAt: number;
  updatedAt: number;
  filePath: string | null;
  isSynced: boolean;
};
