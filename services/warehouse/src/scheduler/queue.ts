import { Queue, Worker } from 'bullmq';
import type { JobsOptions, Processor, WorkerOptions } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import type { ServiceConfig } from '../config/serviceConfig';
import type { Cadence } from '../model/types';
import { CADENCES } from '../model/types';
import { getLogger } from '../observability/logger';

export type CycleJobPayload =
  | { type: 'cycle'; cadence: Cadence; trigger: 'schedule' | 'manual'; requestedAt: string }
  | { type: 'maintenance'; trigger: 'schedule' | 'manual'; requestedAt: string };

let queueInstance: Queue<CycleJobPayload> | null = null;
let connectionInstance: Redis | null = null;
let connectionReadyPromise: Promise<void> | null = null;
let queueReady = false;
let queueLastError: string | null = null;

export function isInlineQueue(config: ServiceConfig): boolean {
  return config.scheduler.inline;
}

function ensureConnection(config: ServiceConfig): Redis {
  if (connectionInstance) {
    return connectionInstance;
  }
  const logger = getLogger();
  connectionInstance = new IORedis(config.scheduler.redisUrl, {
    maxRetriesPerRequest: null,
    lazyConnect: true
  });
  connectionInstance.on('error', (err) => {
    queueReady = false;
    queueLastError = err instanceof Error ? err.message : String(err);
    logger.error({ err }, 'redis connection error');
  });
  connectionInstance.on('close', () => {
    queueReady = false;
    queueLastError = 'connection closed';
  });
  connectionInstance.on('ready', () => {
    queueReady = true;
    queueLastError = null;
  });
  return connectionInstance;
}

export async function verifyQueueConnection(config: ServiceConfig): Promise<void> {
  if (isInlineQueue(config)) {
    queueReady = true;
    queueLastError = null;
    return;
  }
  const connection = ensureConnection(config);
  if (!connectionReadyPromise) {
    connectionReadyPromise = (async () => {
      if (connection.status === 'wait') {
        await connection.connect();
      }
      await connection.ping();
      queueReady = true;
      queueLastError = null;
    })();
  }
  try {
    await connectionReadyPromise;
  } catch (err) {
    connectionReadyPromise = null;
    queueReady = false;
    queueLastError = err instanceof Error ? err.message : String(err);
    throw err instanceof Error ? err : new Error(String(err));
  }
}

export function ensureCycleQueue(config: ServiceConfig): Queue<CycleJobPayload> {
  if (isInlineQueue(config)) {
    throw new Error('ETL queue unavailable in inline mode');
  }
  if (queueInstance) {
    return queueInstance;
  }
  queueInstance = new Queue<CycleJobPayload>(config.scheduler.queueName, {
    connection: ensureConnection(config)
  });
  return queueInstance;
}

export function createCycleWorker(
  config: ServiceConfig,
  processor: Processor<CycleJobPayload>,
  options: Omit<WorkerOptions, 'connection'> = {}
): Worker<CycleJobPayload> {
  if (isInlineQueue(config)) {
    throw new Error('ETL worker unavailable in inline mode');
  }
  return new Worker<CycleJobPayload>(config.scheduler.queueName, processor, {
    connection: ensureConnection(config),
    ...options
  });
}

export interface ScheduledJob {
  name: string;
  pattern: string;
  payload: CycleJobPayload;
}

/** One repeatable job per cadence plus the daily partition maintenance job. */
export function plannedSchedules(config: ServiceConfig, now: Date = new Date()): ScheduledJob[] {
  const requestedAt = now.toISOString();
  const jobs: ScheduledJob[] = CADENCES.map((cadence) => ({
    name: `cycle:${cadence}`,
    pattern: config.scheduler.cadenceCrons[cadence] ?? '0 2 * * *',
    payload: { type: 'cycle', cadence, trigger: 'schedule', requestedAt }
  }));
  jobs.push({
    name: 'maintenance',
    pattern: config.scheduler.maintenanceCron,
    payload: { type: 'maintenance', trigger: 'schedule', requestedAt }
  });
  return jobs;
}

export async function scheduleCadenceJobs(config: ServiceConfig): Promise<ScheduledJob[]> {
  await verifyQueueConnection(config);
  const queue = ensureCycleQueue(config);
  const jobs = plannedSchedules(config);
  for (const job of jobs) {
    await queue.add(job.name, job.payload, {
      jobId: `warehouse-${job.name}`,
      repeat: { pattern: job.pattern },
      removeOnComplete: true,
      removeOnFail: false
    });
  }
  return jobs;
}

export async function enqueueCycleJob(
  config: ServiceConfig,
  payload: CycleJobPayload,
  options?: JobsOptions
): Promise<void> {
  if (isInlineQueue(config)) {
    throw new Error('Cannot enqueue ETL jobs when REDIS_URL=inline');
  }
  await verifyQueueConnection(config);
  const name = payload.type === 'cycle' ? `cycle:${payload.cadence}` : 'maintenance';
  await ensureCycleQueue(config).add(name, payload, options);
}

export function getQueueHealth(config: ServiceConfig): { inline: boolean; ready: boolean; lastError: string | null } {
  const inline = isInlineQueue(config);
  return {
    inline,
    ready: inline ? true : queueReady,
    lastError: inline ? null : queueLastError
  };
}

export async function closeCycleQueue(): Promise<void> {
  if (queueInstance) {
    await queueInstance.close();
    queueInstance = null;
  }
  if (connectionInstance) {
    await connectionInstance.quit();
    connectionInstance = null;
  }
  connectionReadyPromise = null;
  queueReady = false;
  queueLastError = null;
}
