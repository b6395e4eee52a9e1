import { asc, eq } from 'drizzle-orm';

import {
  conflictStrategySchema,
  providerConfigSchema,
  providerTypeSchema,
  syncModeSchema,
  type VaultItem,
} from '@notesync/shared';

import type { SyncDb } from '../database/db.js';
import { vaults } from '../database/schema.js';
import { storeCall } from './sync/guard.js';

type VaultRow = typeof vaults.$inferSelect;

function mapVaultRow(row: VaultRow): VaultItem {
  let configJson: unknown;
  try {
    configJson = JSON.parse(row.providerConfigJson);
  } catch (e) {
    throw new Error(`vault ${row.id}: provider_config_json is not valid JSON`, { cause: e });
  }
  const config = providerConfigSchema.safeParse(configJson);
  if (!config.success) throw new Error(`vault ${row.id}: invalid provider config`);
  return {
    id: row.id,
    name: row.name,
    providerType: providerTypeSchema.parse(row.providerType),
    providerConfig: config.data,
    syncMode: syncModeSchema.parse(row.syncMode),
    conflictStrategy: conflictStrategySchema.parse(row.conflictStrategy),
    isDefault: row.isDefault,
    createdAt: row.createdAt,
    lastSyncedAt: row.lastSyncedAt,
  };
}

export class VaultRepository {
  constructor(private readonly db: SyncDb) {}

  async getAllVaults(): Promise<VaultItem[]> {
    return storeCall('vaults.getAll', async () => {
      const rows = await this.db.select().from(vaults).orderBy(asc(vaults.createdAt), asc(vaults.id));
      return rows.map(mapVaultRow);
    });
  }

  async getVaultById(vaultId: string): Promise<VaultItem | null> {
    return storeCall('vaults.getById', async () => {
      const rows = await this.db.select().from(vaults).where(eq(vaults.id, vaultId)).limit(1);
      return rows[0] ? mapVaultRow(rows[0]) : null;
    });
  }

  async upsertVault(vault: VaultItem): Promise<void> {
    await storeCall('vaults.upsert', async () => {
      const row: VaultRow = {
        id: vault.id,
        name: vault.name,
        providerType: vault.providerType,
        providerConfigJson: JSON.stringify(vault.providerConfig),
        syncMode: vault.syncMode,
        conflictStrategy: vault.conflictStrategy,
        isDefault: vault.isDefault,
        createdAt: vault.createdAt,
        lastSyncedAt: vault.lastSyncedAt,
      };
      const { id: _id, ...set } = row;
      await this.db.insert(vaults).values(row).onConflictDoUpdate({ target: vaults.id, set });
    });
  }

  async updateLastSynced(vaultId: string, at: number): Promise<void> {
    await storeCall('vaults.updateLastSynced', async () => {
      await this.db.update(vaults).set({ lastSyncedAt: at }).where(eq(vaults.id, vaultId));
    });
  }
}
