import { buildApp } from './app';
import { env } from './config/env';
import { startSyncScheduler, stopSyncScheduler } from './jobs/sync-scheduler';
import { logEvent } from './services/telemetry.service';

const app = buildApp();

const start = async (): Promise<void> => {
  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
    startSyncScheduler();

    await logEvent({
      type: 'server.started',
      payload: { port: env.PORT, env: env.NODE_ENV, integrations: env.INTEGRATIONS_MODE },
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = async (signal: string): Promise<void> => {
  app.log.info({ signal }, 'Shutting down');
  stopSyncScheduler();
  await app.close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

void start();
