import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import type { PipelineDefinition } from '../config/catalog';
import { loadServiceConfig } from '../config/serviceConfig';
import { describeError, isWarehouseError } from '../errors';
import { CADENCES, cadenceSchema, type Cadence, type RefreshStrategy } from '../model/types';
import { createStderrLogger } from '../observability/logger';
import { isIsoDate } from '../partitions/ranges';
import { createWarehouseRuntime, type WarehouseRuntime } from '../runtime';
import type { CycleResult } from '../scheduler/orchestrator';
import { partitionedTables } from '../scheduler/maintenance';
import type { RetireMode } from '../storage/types';
import { writeQualityReport } from '../validation/qualityReport';

export const EXIT_OK = 0;
export const EXIT_PARTIAL = 1;
export const EXIT_FATAL = 2;

type GlobalOptions = {
  pretty?: boolean;
};

type CliDependencies = {
  runtimeFactory?: () => Promise<WarehouseRuntime>;
  output?: (line: string) => void;
  setExitCode?: (code: number) => void;
};

/** Exit code of a finished cycle: a stage that lost its storage makes the run fatal. */
export function exitCodeForCycle(result: CycleResult): number {
  if (result.stages.some((stage) => stage.error?.code === 'StorageUnavailable')) {
    return EXIT_FATAL;
  }
  return result.status === 'succeeded' ? EXIT_OK : EXIT_PARTIAL;
}

export function exitCodeForError(error: unknown): number {
  if (isWarehouseError(error) && error.code === 'StorageUnavailable') {
    return EXIT_FATAL;
  }
  return EXIT_PARTIAL;
}

async function createDefaultRuntime(): Promise<WarehouseRuntime> {
  const config = loadServiceConfig();
  return createWarehouseRuntime(config, createStderrLogger(config.logLevel));
}

function parseCadence(value: string): Cadence {
  const parsed = cadenceSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`expected one of ${CADENCES.join(', ')}`);
  }
  return parsed.data;
}

function parseStrategy(value: string): RefreshStrategy {
  if (value !== 'full' && value !== 'incremental') {
    throw new InvalidArgumentError('expected full or incremental');
  }
  return value;
}

function parseRetireMode(value: string): RetireMode {
  if (value !== 'detach' && value !== 'drop') {
    throw new InvalidArgumentError('expected detach or drop');
  }
  return value;
}

function parseDate(value: string): string {
  if (!isIsoDate(value)) {
    throw new InvalidArgumentError('expected a YYYY-MM-DD date');
  }
  return value;
}

function parseInstant(value: string): string {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('expected an ISO-8601 date or time');
  }
  return new Date(parsed).toISOString();
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('expected a non-negative integer');
  }
  return parsed;
}

export interface EtlSelection {
  source?: string;
  cadence?: Cadence;
  pipeline?: string[];
  all?: boolean;
}

export function selectEtlPipelines(pipelines: PipelineDefinition[], selection: EtlSelection): PipelineDefinition[] {
  if (selection.pipeline && selection.pipeline.length > 0) {
    return selection.pipeline.map((id) => {
      const pipeline = pipelines.find((candidate) => candidate.id === id);
      if (!pipeline) {
        throw new Error(`unknown pipeline '${id}'`);
      }
      return pipeline;
    });
  }
  if (!selection.all && !selection.source && !selection.cadence) {
    throw new Error('select pipelines with --source, --cadence, --pipeline or --all');
  }
  const selected = pipelines.filter(
    (pipeline) =>
      (!selection.source || pipeline.sourceId === selection.source) &&
      (!selection.cadence || pipeline.cadence === selection.cadence)
  );
  if (selected.length === 0) {
    throw new Error('no configured pipeline matches the selection');
  }
  return selected;
}

function cycleSummary(result: CycleResult): Record<string, unknown> {
  return {
    cycleId: result.cycleId,
    status: result.status,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    stages: result.stages.map((stage) => ({
      stage: stage.stageId,
      status: stage.status,
      attempts: stage.attempts,
      watermark: stage.watermark,
      error: stage.error,
      blockedBy: stage.blockedBy.length > 0 ? stage.blockedBy : undefined,
      safeToRerun: stage.safeToRerun,
      batches:
        stage.result?.kind === 'etl'
          ? stage.result.pipeline.batches.map((batch) => ({
              batchId: batch.batchId,
              accepted: batch.accepted,
              rejected: batch.rejected,
              inserted: batch.load.inserted,
              updated: batch.load.updated,
              skipped: batch.load.skipped,
              unroutable: batch.load.unroutable,
              applied: batch.load.applied
            }))
          : undefined
    }))
  };
}

export function createInterface(deps: CliDependencies = {}): Command {
  const runtimeFactory = deps.runtimeFactory ?? createDefaultRuntime;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const program = new Command();

  const emit = (payload: unknown) => {
    const options = program.opts<GlobalOptions>();
    const line = options.pretty === false ? JSON.stringify(payload) : JSON.stringify(payload, null, 2);
    (deps.output ?? console.log)(line);
  };

  /** Runs a command against a fresh runtime and maps failures to exit codes. */
  const withRuntime = async (fn: (runtime: WarehouseRuntime) => Promise<number>) => {
    let runtime: WarehouseRuntime | null = null;
    try {
      runtime = await runtimeFactory();
      setExitCode(await fn(runtime));
    } catch (err) {
      emit({ error: describeError(err) });
      setExitCode(exitCodeForError(err));
    } finally {
      if (runtime) {
        await runtime.close();
      }
    }
  };

  program
    .name('warehouse')
    .description('Operate the bank warehouse ETL engine')
    .option('--no-pretty', 'Print compact single-line JSON');

  program
    .command('etl:run')
    .description('Run one ETL cycle for the selected pipelines')
    .option('--source <id>', 'Run pipelines reading this source')
    .option('--cadence <cadence>', 'Run pipelines on this cadence', parseCadence)
    .option('--pipeline <id...>', 'Run these pipelines')
    .option('--all', 'Run every configured pipeline', false)
    .option('--no-refresh', 'Skip aggregate refresh stages')
    .option('--strategy <strategy>', 'Aggregate refresh strategy (full|incremental)', parseStrategy)
    .option('--quality-report <file>', 'Write the data-quality report to this JSON file')
    .action(
      async (cmdOptions: EtlSelection & { refresh: boolean; strategy?: RefreshStrategy; qualityReport?: string }) => {
        await withRuntime(async (runtime) => {
          const pipelines = selectEtlPipelines(runtime.catalog.pipelines, cmdOptions);
          const result = await runtime.orchestrator.runCycle({
            pipelineIds: pipelines.map((pipeline) => pipeline.id),
            refreshAggregates: cmdOptions.refresh,
            refreshStrategy: cmdOptions.strategy
          });
          const reportDirectory = runtime.config.reports.qualityReportDirectory;
          const reportPath =
            cmdOptions.qualityReport ??
            (reportDirectory ? path.join(reportDirectory, `quality-report-${result.cycleId}.json`) : null);
          const summary = cycleSummary(result);
          if (reportPath) {
            const report = await writeQualityReport(reportPath, result.reports);
            summary.qualityReport = { path: reportPath, totalChecks: report.totalChecks, failedChecks: report.failedChecks };
          }
          emit(summary);
          return exitCodeForCycle(result);
        });
      }
    );

  program
    .command('aggregates:refresh')
    .description('Refresh one aggregate, or all of them')
    .argument('[aggregateId]', 'Aggregate to refresh')
    .option('--strategy <strategy>', 'full or incremental', parseStrategy)
    .action(async (aggregateId: string | undefined, cmdOptions: { strategy?: RefreshStrategy }) => {
      await withRuntime(async (runtime) => {
        const ids = aggregateId ? [aggregateId] : runtime.catalog.aggregates;
        const results: unknown[] = [];
        let failed = false;
        for (const id of ids) {
          try {
            results.push(await runtime.refresher.refresh(id, { strategy: cmdOptions.strategy }));
          } catch (err) {
            if (exitCodeForError(err) === EXIT_FATAL) {
              throw err;
            }
            failed = true;
            results.push({ aggregateId: id, error: describeError(err) });
          }
        }
        emit({ aggregates: results });
        return failed ? EXIT_PARTIAL : EXIT_OK;
      });
    });

  program
    .command('status:watermarks')
    .description('List applied load watermarks')
    .action(async () => {
      await withRuntime(async (runtime) => {
        emit({ watermarks: await runtime.store.listWatermarks() });
        return EXIT_OK;
      });
    });

  program
    .command('status:partitions')
    .description('Show partition coverage')
    .argument('[table]', 'Partitioned table; defaults to all')
    .action(async (table: string | undefined) => {
      await withRuntime(async (runtime) => {
        const tables = table ? [table] : partitionedTables(runtime.catalog);
        const coverage = [];
        for (const name of tables) {
          coverage.push(await runtime.partitions.coverage(name));
        }
        emit({ partitions: coverage });
        return EXIT_OK;
      });
    });

  program
    .command('status:aggregates')
    .description('Show aggregate refresh state and staleness')
    .action(async () => {
      await withRuntime(async (runtime) => {
        emit({ aggregates: await runtime.refresher.status() });
        return EXIT_OK;
      });
    });

  program
    .command('rejects:list')
    .description('List rejected records in a time window')
    .requiredOption('--since <instant>', 'Window start (inclusive)', parseInstant)
    .requiredOption('--until <instant>', 'Window end (exclusive)', parseInstant)
    .option('--table <table>', 'Only rejections for this table')
    .option('--source <id>', 'Only rejections from this source')
    .option('--limit <n>', 'Maximum rows', parseCount)
    .action(
      async (cmdOptions: { since: string; until: string; table?: string; source?: string; limit?: number }) => {
        await withRuntime(async (runtime) => {
          const rejections = await runtime.store.listRejections({
            since: cmdOptions.since,
            until: cmdOptions.until,
            table: cmdOptions.table,
            sourceId: cmdOptions.source,
            limit: cmdOptions.limit
          });
          emit({ count: rejections.length, rejections });
          return EXIT_OK;
        });
      }
    );

  program
    .command('partitions:ensure')
    .description('Create the partition covering a date, filling gaps')
    .argument('<table>', 'Partitioned table')
    .argument('<date>', 'Event date (YYYY-MM-DD)', parseDate)
    .action(async (table: string, date: string) => {
      await withRuntime(async (runtime) => {
        emit({ partition: await runtime.partitions.ensurePartition(table, date) });
        return EXIT_OK;
      });
    });

  program
    .command('partitions:precreate')
    .description('Create partitions ahead of incoming data')
    .argument('<table>', 'Partitioned table')
    .option('--periods <n>', 'Periods ahead of the current one', parseCount)
    .option('--from <date>', 'Start from this date instead of today', parseDate)
    .action(async (table: string, cmdOptions: { periods?: number; from?: string }) => {
      await withRuntime(async (runtime) => {
        const created = await runtime.partitions.precreate(table, cmdOptions.periods, cmdOptions.from);
        emit({ table, created });
        return EXIT_OK;
      });
    });

  program
    .command('partitions:retire')
    .description('Retire partitions wholly before a date')
    .argument('<table>', 'Partitioned table')
    .requiredOption('--before <date>', 'Cutoff date (YYYY-MM-DD)', parseDate)
    .option('--mode <mode>', 'detach or drop', parseRetireMode)
    .action(async (table: string, cmdOptions: { before: string; mode?: RetireMode }) => {
      await withRuntime(async (runtime) => {
        const result = await runtime.partitions.retire(table, cmdOptions.before, cmdOptions.mode);
        emit(result);
        return EXIT_OK;
      });
    });

  program
    .command('maintenance:run')
    .description('Pre-create partitions and apply retention for every partitioned table')
    .action(async () => {
      await withRuntime(async (runtime) => {
        const result = await runtime.orchestrator.runCycle({
          includeEtl: false,
          refreshAggregates: false,
          maintenance: true
        });
        emit(cycleSummary(result));
        return exitCodeForCycle(result);
      });
    });

  return program;
}
