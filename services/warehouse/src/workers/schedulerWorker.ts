import type { Job } from 'bullmq';
import { loadServiceConfig } from '../config/serviceConfig';
import { CADENCES, cadenceSchema, type Cadence } from '../model/types';
import { getLogger } from '../observability/logger';
import { setupMetrics } from '../observability/metrics';
import { createWarehouseRuntime, type WarehouseRuntime } from '../runtime';
import type { CycleResult } from '../scheduler/orchestrator';
import {
  closeCycleQueue,
  createCycleWorker,
  isInlineQueue,
  scheduleCadenceJobs,
  verifyQueueConnection,
  type CycleJobPayload
} from '../scheduler/queue';

interface CliOptions {
  once: boolean;
  cadences: Cadence[];
}

function parseCliOptions(args: string[]): CliOptions {
  const options: CliOptions = { once: false, cadences: [] };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--once') {
      options.once = true;
    } else if (arg === '--cadence') {
      const value = args[index + 1];
      index += 1;
      options.cadences.push(cadenceSchema.parse(value));
    } else if (arg?.startsWith('--cadence=')) {
      options.cadences.push(cadenceSchema.parse(arg.slice('--cadence='.length)));
    }
  }
  return options;
}

function summarize(result: CycleResult): Record<string, unknown> {
  return {
    cycleId: result.cycleId,
    status: result.status,
    stages: result.stages.map((stage) => ({ id: stage.stageId, status: stage.status, attempts: stage.attempts }))
  };
}

export async function processCycleJob(runtime: WarehouseRuntime, payload: CycleJobPayload): Promise<CycleResult> {
  if (payload.type === 'maintenance') {
    return runtime.orchestrator.runCycle({ includeEtl: false, refreshAggregates: false, maintenance: true });
  }
  return runtime.orchestrator.runCycle({ cadence: payload.cadence });
}

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const logger = getLogger();
  setupMetrics(config.metrics);
  const runtime = await createWarehouseRuntime(config, logger);
  const cli = parseCliOptions(process.argv.slice(2));

  if (cli.once) {
    const cadences = cli.cadences.length > 0 ? cli.cadences : [...CADENCES];
    let partial = false;
    for (const cadence of cadences) {
      const result = await processCycleJob(runtime, {
        type: 'cycle',
        cadence,
        trigger: 'manual',
        requestedAt: new Date().toISOString()
      });
      partial = partial || result.status !== 'succeeded';
      logger.info(summarize(result), 'cycle complete');
    }
    await runtime.close();
    process.exitCode = partial ? 1 : 0;
    return;
  }

  if (isInlineQueue(config)) {
    logger.info('REDIS_URL=inline - cadence queue disabled; use --once or the warehouse CLI to run cycles');
    process.stdin.resume();
    return;
  }

  await verifyQueueConnection(config);
  const worker = createCycleWorker(
    config,
    async (job: Job<CycleJobPayload>) => summarize(await processCycleJob(runtime, job.data)),
    { concurrency: 1 }
  );

  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, result }, 'cycle job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'cycle job failed');
  });
  worker.on('error', (err) => {
    logger.error({ err }, 'worker error');
  });

  const scheduled = await scheduleCadenceJobs(config);
  logger.info({ jobs: scheduled.map((job) => ({ name: job.name, pattern: job.pattern })) }, 'cadence jobs scheduled');

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'shutting down scheduler worker');
    await worker.close();
    await closeCycleQueue();
    await runtime.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  logger.info('scheduler worker online');
  process.stdin.resume();
}

if (require.main === module) {
  main().catch((err) => {
    getLogger().fatal({ err }, 'scheduler worker crashed');
    process.exit(1);
  });
}
