import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { logger } from './logger';
import { createApiServer } from './server';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.level = cfg.LOG_LEVEL;
  logger.info(
    { accounts: cfg.watchedAccounts, assets: Object.fromEntries(cfg.assetVenues), dryRun: cfg.dryRun },
    'post-signal-trader starting',
  );

  const app = createApp(cfg, logger);
  const server = createApiServer(app, logger);
  server.listen(cfg.PORT, () => logger.info({ port: cfg.PORT }, 'API listening'));

  app.coordinator
    .recover()
    .then((outcomes) => {
      if (outcomes.length) logger.info({ count: outcomes.length }, 'recovery finished');
    })
    .catch((err: unknown) => logger.error({ err }, 'recovery failed'));

  const prune = setInterval(() => {
    const removed = app.dedup.prune(cfg.RETENTION_MS, new Date());
    if (removed) logger.info({ removed }, 'pruned old execution records');
  }, cfg.PRUNE_INTERVAL_MS);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down');
    clearInterval(prune);
    server.close();
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
