import type { FastifyInstance } from 'fastify';
import type { ServiceConfig } from '../config/serviceConfig';
import { describeError } from '../errors';
import { getQueueHealth } from '../scheduler/queue';
import type { WarehouseStore } from '../storage/types';

export interface HealthRouteDeps {
  config: ServiceConfig;
  store: WarehouseStore;
}

export async function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): Promise<void> {
  app.get('/health', async () => {
    const queue = getQueueHealth(deps.config);
    return {
      status: queue.ready ? 'ok' : 'degraded',
      storage: deps.store.driver,
      queue
    };
  });

  app.get('/ready', async (_request, reply) => {
    try {
      await deps.store.ping();
    } catch (err) {
      reply.status(503);
      return {
        status: 'unavailable',
        reason: describeError(err).message
      };
    }
    return { status: 'ready', storage: deps.store.driver };
  });
}
