import { buildApp, type AppContainer } from './infra/container';
import { logger } from './infra/logger';

let app: AppContainer | null = null;
let stopping = false;

// Stop polling and close the database once, whichever signal comes first
async function stopApp(signal: NodeJS.Signals | 'crash'): Promise<void> {
  if (stopping || !app) {
    return;
  }
  stopping = true;
  logger.info({ signal, bot: app.botName }, 'Stopping gatekeeper');
  await app.stop();
  logger.info({ database: app.databasePath }, 'Database closed');
}

async function main(): Promise<void> {
  app = await buildApp();
  logger.info({ bot: app.botName, database: app.databasePath }, 'Launching gatekeeper');

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      stopApp(signal)
        .catch((err) => logger.error({ err, signal }, 'Gatekeeper did not stop cleanly'))
        .finally(() => process.exit(0));
    });
  }

  await app.start();
  logger.info({ bot: app.botName }, 'Polling Telegram for updates');
}

main().catch((err) => {
  logger.fatal({ err }, 'Gatekeeper failed to start');
  stopApp('crash')
    .catch((stopErr) => logger.error({ err: stopErr }, 'Cleanup after failed start also failed'))
    .finally(() => process.exit(1));
});
