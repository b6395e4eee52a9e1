import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createSyncContext } from './context.js';
import { openSqlite } from './database/db.js';
import { migrateSqlite } from './database/migrate.js';
import { getErrorMessage } from './errors/index.js';
import { logError, logInfo } from './utils/logger.js';
import { serviceVersion } from './version.js';

async function bootstrap() {
  const config = loadConfig();
  const { sqlite, db } = openSqlite(config.dbPath);
  migrateSqlite(sqlite);

  const ctx = createSyncContext({ db, config });
  const app = createApp(ctx);
  ctx.scheduler.start();

  const server = app.listen(config.port, config.host, () => {
    logInfo(`sync-service ${serviceVersion} listening on ${config.host}:${config.port}`, undefined, { critical: true });
  });

  const shutdown = (signal: string) => {
    logInfo('shutting down', { signal }, { critical: true });
    ctx.scheduler.stop();
    server.close(() => {
      sqlite.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((e) => {
  logError('sync-service failed to start', { error: getErrorMessage(e) });
  process.exit(1);
});
