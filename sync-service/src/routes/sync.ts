import { Router } from 'express';

import { noteIdParamsSchema, syncStatusQuerySchema, vaultIdParamsSchema, type VaultSyncStatusResponse } from '@notesync/shared';

import type { SyncContext } from '../context.js';
import { logInfo } from '../utils/logger.js';

export function createSyncRouter(ctx: SyncContext) {
  const router = Router();

  router.get('/status', async (req, res, next) => {
    try {
      const parsed = syncStatusQuerySchema.safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const { vaultId } = parsed.data;
      const vault = await ctx.vaults.getVaultById(vaultId);
      if (!vault) return res.status(404).json({ ok: false, error: 'vault not found' });

      const body: VaultSyncStatusResponse = {
        ok: true,
        vaultId,
        counts: await ctx.stateStore.getStatistics(vaultId),
        progress: await ctx.coordinator.getSyncProgress(vaultId),
        queueSize: await ctx.queueStore.getQueueSize(vaultId),
        failedCount: await ctx.queueStore.getFailedCount(vaultId),
      };
      return res.json(body);
    } catch (e) {
      return next(e);
    }
  });

  router.get('/scheduler', (_req, res) => {
    res.json({ ok: true, ...ctx.scheduler.getStatus() });
  });

  router.get('/failed', async (_req, res, next) => {
    try {
      const items = await ctx.failedItems.listFailedItems();
      return res.json({ ok: true, items });
    } catch (e) {
      return next(e);
    }
  });

  router.post('/failed/reset-all', async (_req, res, next) => {
    try {
      const reset = await ctx.failedItems.resetAllFailedItems();
      return res.json({ ok: true, reset });
    } catch (e) {
      return next(e);
    }
  });

  router.post('/failed/:noteId/reset', async (req, res, next) => {
    try {
      const parsed = noteIdParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const found = await ctx.failedItems.resetRetryCount(parsed.data.noteId);
      if (!found) return res.status(404).json({ ok: false, error: 'note not tracked' });
      return res.json({ ok: true });
    } catch (e) {
      return next(e);
    }
  });

  router.delete('/failed', async (_req, res, next) => {
    try {
      const removed = await ctx.failedItems.discardFailedItems();
      return res.json({ ok: true, removed });
    } catch (e) {
      return next(e);
    }
  });

  router.post('/run', async (_req, res) => {
    const r = await ctx.scheduler.runOnce();
    if (r.ok) return res.json({ ok: true, summary: r.summary });
    return res.status(r.error === 'sweep busy' ? 409 : 500).json({ ok: false, error: r.error });
  });

  router.post('/notes/:noteId', async (req, res, next) => {
    try {
      const parsed = noteIdParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const outcome = await ctx.coordinator.syncNote(parsed.data.noteId);
      return res.json({ ok: true, outcome });
    } catch (e) {
      return next(e);
    }
  });

  router.post('/notes/:noteId/changed', async (req, res, next) => {
    try {
      const parsed = noteIdParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const state = await ctx.coordinator.markLocalChange(parsed.data.noteId);
      if (!state) return res.status(404).json({ ok: false, error: 'note not found' });
      return res.json({ ok: true, state });
    } catch (e) {
      return next(e);
    }
  });

  router.get('/conflicts/:vaultId', async (req, res, next) => {
    try {
      const parsed = vaultIdParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const conflicts = await ctx.stateStore.getConflicts(parsed.data.vaultId);
      return res.json({ ok: true, conflicts });
    } catch (e) {
      return next(e);
    }
  });

  router.post('/vaults/:vaultId/resync', async (req, res, next) => {
    try {
      const parsed = vaultIdParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ ok: false, error: parsed.error.flatten() });
      const notes = await ctx.coordinator.forceResync(parsed.data.vaultId);
      logInfo('resync requested over http', { vaultId: parsed.data.vaultId, notes });
      return res.json({ ok: true, notes });
    } catch (e) {
      return next(e);
    }
  });

  return router;
}
