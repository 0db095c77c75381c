import type { WarehouseCatalog } from '../config/catalog';
import { KeyedMutex } from '../concurrency/keyedMutex';
import { UnknownAggregateError } from '../errors';
import type { AggregateRow, AggregateState, RefreshStrategy, WarehouseRow } from '../model/types';
import type { Logger } from '../observability/logger';
import { observeAggregateRefresh } from '../observability/metrics';
import { monthRange } from '../partitions/ranges';
import type { SnapshotReader, WarehouseStore } from '../storage/types';
import { findAggregateDefinition, type AggregateDefinition, type DimensionLookup } from './definitions';

export interface AggregateRefresherDeps {
  catalog: WarehouseCatalog;
  store: WarehouseStore;
  logger: Logger;
  defaultStrategy: RefreshStrategy;
  now?: () => Date;
}

export interface RefreshOptions {
  strategy?: RefreshStrategy;
}

export interface RefreshResult {
  aggregateId: string;
  requestedStrategy: RefreshStrategy;
  strategy: RefreshStrategy;
  /** Periods recomputed; null when the aggregate was rebuilt wholesale. */
  periods: string[] | null;
  rowCount: number;
  refreshedThrough: Record<string, number>;
  fallbackReason: string | null;
}

export interface AggregateStatus {
  aggregateId: string;
  description: string;
  factTable: string;
  state: AggregateState | null;
  stale: boolean;
}

interface RefreshPlan {
  through: Record<string, number>;
  strategy: RefreshStrategy;
  periods: string[] | null;
  rows: AggregateRow[];
  rowCount: number;
  fallbackReason: string | null;
}

function aggregateLockKey(aggregateId: string): string {
  return `warehouse:aggregate:${aggregateId}`;
}

function sourceTables(definition: AggregateDefinition): string[] {
  return [definition.factTable, ...definition.dimensionTables];
}

export class AggregateRefresher {
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(private readonly deps: AggregateRefresherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  definitions(): AggregateDefinition[] {
    return this.deps.catalog.aggregates.map((id) => this.resolve(id));
  }

  /** Aggregates that read any of `tables`, in catalogue order. */
  readersOf(tables: Iterable<string>): string[] {
    const touched = new Set(tables);
    return this.definitions()
      .filter((definition) => sourceTables(definition).some((table) => touched.has(table)))
      .map((definition) => definition.id);
  }

  async refresh(aggregateId: string, options: RefreshOptions = {}): Promise<RefreshResult> {
    const definition = this.resolve(aggregateId);
    const requestedStrategy = options.strategy ?? this.deps.defaultStrategy;
    const started = process.hrtime.bigint();

    try {
      const result = await this.mutex.runExclusive(aggregateLockKey(aggregateId), () =>
        this.refreshExclusive(definition, requestedStrategy)
      );
      observeAggregateRefresh({
        aggregateId,
        strategy: result.strategy,
        result: 'success',
        durationSeconds: Number(process.hrtime.bigint() - started) / 1e9
      });
      this.deps.logger.info(
        {
          aggregateId,
          strategy: result.strategy,
          periods: result.periods,
          rowCount: result.rowCount,
          fallbackReason: result.fallbackReason
        },
        'refreshed aggregate'
      );
      return result;
    } catch (err) {
      observeAggregateRefresh({
        aggregateId,
        strategy: requestedStrategy,
        result: 'failure',
        durationSeconds: Number(process.hrtime.bigint() - started) / 1e9
      });
      this.deps.logger.error({ aggregateId, err }, 'aggregate refresh failed; previous snapshot kept');
      throw err;
    }
  }

  async isStale(aggregateId: string): Promise<boolean> {
    const definition = this.resolve(aggregateId);
    const state = await this.deps.store.getAggregateState(aggregateId);
    if (!state) {
      return true;
    }
    const current = await this.snapshotSequences(definition);
    return Object.entries(current).some(([table, sequence]) => sequence > (state.refreshedThrough[table] ?? 0));
  }

  async status(): Promise<AggregateStatus[]> {
    const statuses: AggregateStatus[] = [];
    for (const definition of this.definitions()) {
      statuses.push({
        aggregateId: definition.id,
        description: definition.description,
        factTable: definition.factTable,
        state: await this.deps.store.getAggregateState(definition.id),
        stale: await this.isStale(definition.id)
      });
    }
    return statuses;
  }

  private resolve(aggregateId: string): AggregateDefinition {
    const definition = findAggregateDefinition(aggregateId);
    if (!definition || !this.deps.catalog.aggregates.includes(aggregateId)) {
      throw new UnknownAggregateError(aggregateId);
    }
    return definition;
  }

  private async snapshotSequences(
    definition: AggregateDefinition,
    reader: SnapshotReader = this.deps.store
  ): Promise<Record<string, number>> {
    const sequences: Record<string, number> = {};
    for (const table of sourceTables(definition)) {
      sequences[table] = await reader.getTableSequence(table);
    }
    return sequences;
  }

  private async refreshExclusive(
    definition: AggregateDefinition,
    requestedStrategy: RefreshStrategy
  ): Promise<RefreshResult> {
    const { store } = this.deps;
    // Sequences and rows come from one snapshot, so every row counted is covered by `through`.
    const plan = await store.readSnapshot((reader) => this.computeFromSnapshot(definition, requestedStrategy, reader));
    const { through, strategy, periods, rows, rowCount, fallbackReason } = plan;
    const refreshedAt = this.now().toISOString();

    await store.transaction(
      async (tx) => {
        await tx.replaceAggregateRows(definition.id, periods, rows);
        await tx.setAggregateState({
          aggregateId: definition.id,
          refreshedThrough: through,
          strategy,
          refreshedAt,
          rowCount
        });
      },
      { lockKeys: [aggregateLockKey(definition.id)] }
    );

    return {
      aggregateId: definition.id,
      requestedStrategy,
      strategy,
      periods,
      rowCount,
      refreshedThrough: through,
      fallbackReason
    };
  }

  private async computeFromSnapshot(
    definition: AggregateDefinition,
    requestedStrategy: RefreshStrategy,
    reader: SnapshotReader
  ): Promise<RefreshPlan> {
    const through = await this.snapshotSequences(definition, reader);
    const previous = await reader.getAggregateState(definition.id);

    let fallbackReason: string | null = null;
    if (requestedStrategy === 'incremental') {
      if (!previous) {
        fallbackReason = 'aggregate has never been refreshed';
      } else {
        const changedDimension = definition.dimensionTables.find(
          (table) => (through[table] ?? 0) !== (previous.refreshedThrough[table] ?? 0)
        );
        if (changedDimension) {
          fallbackReason = `dimension ${changedDimension} changed since the last refresh`;
        }
      }
    }
    const strategy: RefreshStrategy = requestedStrategy === 'incremental' && !fallbackReason ? 'incremental' : 'full';

    let periods: string[] | null = null;
    let facts: WarehouseRow[];
    if (strategy === 'incremental' && previous) {
      const changes = await reader.listChanges(definition.factTable, previous.refreshedThrough[definition.factTable] ?? 0);
      const touched = new Set<string>();
      for (const change of changes) {
        change.periods.forEach((period) => touched.add(period));
      }
      periods = [...touched].sort();
      facts = [];
      for (const period of periods) {
        facts.push(...(await reader.scanRows(definition.factTable, monthRange(period))));
      }
    } else {
      facts = await reader.scanRows(definition.factTable);
    }

    const rows = definition.compute(facts, await this.loadDimensions(definition, reader));
    const replaced = periods === null ? null : new Set(periods);
    const kept: AggregateRow[] =
      replaced === null ? [] : (await reader.listAggregateRows(definition.id)).filter((row) => !replaced.has(row.period));

    return { through, strategy, periods, rows, rowCount: kept.length + rows.length, fallbackReason };
  }

  private async loadDimensions(definition: AggregateDefinition, reader: SnapshotReader): Promise<DimensionLookup> {
    const lookup: DimensionLookup = new Map();
    for (const table of definition.dimensionTables) {
      const rows = await reader.scanRows(table);
      lookup.set(table, new Map(rows.map((row) => [row.naturalKey, row])));
    }
    return lookup;
  }
}
