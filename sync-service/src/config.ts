import { z } from 'zod';

import { MAX_SYNC_RETRIES } from '@notesync/shared';

const envSchema = z.object({
  NOTESYNC_DB_PATH: z.string().min(1).default('./data/notesync.sqlite'),
  NOTESYNC_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1_000).default(15 * 60_000),
  NOTESYNC_SWEEP_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
  NOTESYNC_BACKOFF_BASE_MS: z.coerce.number().int().min(1).default(30_000),
  NOTESYNC_BACKOFF_MAX_MS: z.coerce.number().int().min(1).default(60 * 60_000),
  NOTESYNC_MAX_RETRIES: z.coerce.number().int().min(1).default(MAX_SYNC_RETRIES),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3020),
  // По умолчанию слушаем только localhost.
  HOST: z.string().min(1).default('127.0.0.1'),
});

export type SyncServiceConfig = {
  dbPath: string;
  sweepIntervalMs: number;
  sweepConcurrency: number;
  backoff: { baseMs: number; maxMs: number };
  maxRetries: number;
  port: number;
  host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${details}`);
  }
  const e = parsed.data;
  if (e.NOTESYNC_BACKOFF_MAX_MS < e.NOTESYNC_BACKOFF_BASE_MS) {
    throw new Error('invalid configuration: NOTESYNC_BACKOFF_MAX_MS must be >= NOTESYNC_BACKOFF_BASE_MS');
  }
  return {
    dbPath: e.NOTESYNC_DB_PATH,
    sweepIntervalMs: e.NOTESYNC_SWEEP_INTERVAL_MS,
    sweepConcurrency: e.NOTESYNC_SWEEP_CONCURRENCY,
    backoff: { baseMs: e.NOTESYNC_BACKOFF_BASE_MS, maxMs: e.NOTESYNC_BACKOFF_MAX_MS },
    maxRetries: e.NOTESYNC_MAX_RETRIES,
    port: e.PORT,
    host: e.HOST,
  };
}
