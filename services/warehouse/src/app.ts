import fastify, { type FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { isWarehouseError, type WarehouseError } from './errors';
import { createLoggerOptions } from './observability/logger';
import { warehouseMetricsPlugin } from './observability/metricsPlugin';
import { registerHealthRoutes } from './routes/health';
import { registerStatusRoutes } from './routes/status';
import type { WarehouseRuntime } from './runtime';

export interface BuildAppOptions {
  /** Disable request logging, e.g. under test. */
  logger?: boolean;
}

function statusForError(error: WarehouseError): number {
  switch (error.code) {
    case 'UnknownTable':
    case 'UnknownAggregate':
      return 404;
    case 'StorageUnavailable':
    case 'SourceUnavailable':
      return 503;
    default:
      return 500;
  }
}

export async function buildApp(runtime: WarehouseRuntime, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const { config } = runtime;
  const app = fastify({
    logger: options.logger === false ? false : createLoggerOptions(config.logLevel)
  });

  await app.register(warehouseMetricsPlugin, {
    metrics: config.metrics
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.status(400).send({ error: 'invalid request', issues: error.issues });
      return;
    }
    if (isWarehouseError(error)) {
      const status = statusForError(error);
      if (status >= 500) {
        request.log.error({ err: error }, 'request failed');
      }
      reply.status(status).send({ error: error.message, code: error.code });
      return;
    }
    request.log.error({ err: error }, 'unhandled request error');
    reply.status(error.statusCode ?? 500).send({ error: error.message });
  });

  await registerHealthRoutes(app, { config, store: runtime.store });
  await registerStatusRoutes(app, {
    store: runtime.store,
    partitions: runtime.partitions,
    refresher: runtime.refresher,
    staging: runtime.staging
  });

  return app;
}
