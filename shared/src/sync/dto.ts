import { z } from 'zod';

import { ConflictStrategy } from '../domain/conflict.js';
import { ProviderType, SyncMode } from '../domain/notes.js';
import { SyncStatus } from '../domain/syncState.js';

export const syncStatusSchema = z.nativeEnum(SyncStatus);
export const syncModeSchema = z.nativeEnum(SyncMode);
export const providerTypeSchema = z.nativeEnum(ProviderType);
export const conflictStrategySchema = z.nativeEnum(ConflictStrategy);

export const providerConfigSchema = z.object({
  rootPath: z.string().min(1),
  notesFolder: z.string().min(1).nullable().optional(),
});

export const noteTagsSchema = z.array(z.string());

export const noteIdParamsSchema = z.object({
  noteId: z.string().min(1),
});

export const vaultIdParamsSchema = z.object({
  vaultId: z.string().min(1),
});

export const syncStatusQuerySchema = z.object({
  vaultId: z.string().min(1),
});

export type SyncErrorInfo = {
  code: string;
  message: string;
  recoverable: boolean;
};

export type SyncDirection = 'push' | 'pull' | 'merge' | 'none';

export type SyncOutcome =
  | { status: 'success'; noteId: string; direction: SyncDirection }
  | { status: 'conflict'; noteId: string; detail: string }
  | { status: 'failed'; noteId: string; error: SyncErrorInfo };

export type SweepSummary = {
  totalSynced: number;
  totalFailed: number;
  totalConflicts: number;
  vaultsProcessed: number;
  cancelled: boolean;
};

export type VaultSyncStatusResponse = {
  ok: true;
  vaultId: string;
  counts: Record<SyncStatus, number>;
  progress: number;
  queueSize: number;
  failedCount: number;
};
