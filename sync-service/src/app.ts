import express from 'express';
import cors from 'cors';

import type { SyncContext } from './context.js';
import { healthRouter } from './routes/health.js';
import { createSyncRouter } from './routes/sync.js';
import { errorHandler } from './middleware/errorHandler.js';

export function createApp(ctx: SyncContext) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', healthRouter);
  app.use('/sync', createSyncRouter(ctx));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
