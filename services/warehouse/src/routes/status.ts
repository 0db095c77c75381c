import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AggregateRefresher } from '../aggregates/refresher';
import type { PartitionManager } from '../partitions/partitionManager';
import type { StagingBuffer } from '../staging/stagingBuffer';
import type { WarehouseStore } from '../storage/types';

export interface StatusRouteDeps {
  store: WarehouseStore;
  partitions: PartitionManager;
  refresher: AggregateRefresher;
  staging: StagingBuffer;
}

const isoInstant = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'expected an ISO-8601 date or time');

const rejectsQuerySchema = z.object({
  since: isoInstant,
  until: isoInstant,
  table: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1_000).optional()
});

const partitionParamsSchema = z.object({
  table: z.string().min(1)
});

const stageRunsQuerySchema = z.object({
  cycleId: z.string().min(1).optional(),
  stageId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

function toInstant(value: string): string {
  return new Date(value).toISOString();
}

export async function registerStatusRoutes(app: FastifyInstance, deps: StatusRouteDeps): Promise<void> {
  app.get('/status/watermarks', async () => ({
    watermarks: await deps.store.listWatermarks()
  }));

  app.get('/status/partitions/:table', async (request) => {
    const { table } = partitionParamsSchema.parse(request.params);
    return deps.partitions.coverage(table);
  });

  app.get('/status/aggregates', async () => ({
    aggregates: await deps.refresher.status()
  }));

  app.get('/status/staging', async () => ({
    staged: deps.staging.snapshot(),
    discarded: deps.staging.discarded()
  }));

  app.get('/status/stages', async (request) => {
    const query = stageRunsQuerySchema.parse(request.query ?? {});
    return {
      runs: await deps.store.listStageRuns({ cycleId: query.cycleId, stageId: query.stageId, limit: query.limit ?? 50 })
    };
  });

  app.get('/rejects', async (request, reply) => {
    const query = rejectsQuerySchema.parse(request.query ?? {});
    const since = toInstant(query.since);
    const until = toInstant(query.until);
    if (since >= until) {
      reply.status(400);
      return { error: 'since must be earlier than until' };
    }
    const rejections = await deps.store.listRejections({
      since,
      until,
      table: query.table,
      sourceId: query.source,
      limit: query.limit ?? 100
    });
    return { since, until, count: rejections.length, rejections };
  });
}
