import path from 'node:path';
import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { StorageUnavailableError } from '../shared/errors';
import { AppContext } from './appContext';
import { APP_VERSION, loadConfig } from './config';
import { startServer } from './server';

const installDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });

const openContext = async (config: ReturnType<typeof loadConfig>): Promise<AppContext | null> => {
  try {
    return await AppContext.open({
      installDir,
      dataDir: config.dataDir,
      backupKeep: config.backupKeep,
      backupIntervalDays: config.backupIntervalDays,
      lockTimeoutMs: config.lockTimeoutMs,
      appVersion: APP_VERSION
    });
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      console.error(error.message);
      return null;
    }
    throw error;
  }
};

const setupApp = async () => {
  const config = loadConfig();
  const context = await openContext(config);
  if (!context) {
    process.exitCode = 1;
    return;
  }
  const server = await startServer(context, config);

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.info(`Received ${signal}; writing pending changes`);
    await context.shutdown();
    await closeServer(server);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      stop(signal).catch((error) => {
        console.error('Failed to shut down cleanly', error);
        process.exitCode = 1;
      });
    });
  }
};

setupApp().catch((error) => {
  console.error('Failed to start TaskVault', error);
  process.exitCode = 1;
});
