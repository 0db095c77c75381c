import { loadServiceConfig } from './config/serviceConfig';
import { buildApp } from './app';
import { getLogger } from './observability/logger';
import { createWarehouseRuntime } from './runtime';
import { closeCycleQueue, verifyQueueConnection } from './scheduler/queue';

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const logger = getLogger();
  const runtime = await createWarehouseRuntime(config, logger);
  const app = await buildApp(runtime);

  app.addHook('onClose', async () => {
    await runtime.close();
    await closeCycleQueue();
  });

  try {
    await verifyQueueConnection(config);
  } catch (err) {
    app.log.warn({ err }, 'ETL queue not reachable; /health will report degraded');
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { host: config.host, port: config.port, storage: config.storage.driver, catalog: config.catalogPath },
      'warehouse status service listening'
    );
  } catch (err) {
    app.log.error({ err }, 'failed to start warehouse status service');
    await app.close();
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down warehouse status service');
    try {
      await app.close();
    } catch (closeErr) {
      app.log.error({ err: closeErr }, 'error during shutdown');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((err) => {
  getLogger().fatal({ err }, 'fatal startup error');
  process.exit(1);
});
