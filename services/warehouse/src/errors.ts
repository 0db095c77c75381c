export type WarehouseErrorCode =
  | 'SourceUnavailable'
  | 'SourceSchemaMismatch'
  | 'QualityThresholdExceeded'
  | 'NoPartitionForDate'
  | 'StorageUnavailable'
  | 'StagingConflict'
  | 'StagingQueueFull'
  | 'PipelineCancelled'
  | 'UnknownAggregate'
  | 'UnknownTable';

export abstract class WarehouseError extends Error {
  abstract readonly code: WarehouseErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceUnavailableError extends WarehouseError {
  readonly code = 'SourceUnavailable' as const;
  readonly retryable = true;

  constructor(readonly sourceId: string, detail: string, options?: { cause?: unknown }) {
    super(`source '${sourceId}' is unavailable: ${detail}`, options);
  }
}

export class SourceSchemaMismatchError extends WarehouseError {
  readonly code = 'SourceSchemaMismatch' as const;
  readonly retryable = false;

  constructor(readonly sourceId: string, detail: string) {
    super(`source '${sourceId}' returned an unexpected shape: ${detail}`);
  }
}

export class QualityThresholdExceededError extends WarehouseError {
  readonly code = 'QualityThresholdExceeded' as const;
  readonly retryable = false;

  constructor(
    readonly batchId: string,
    readonly rejectedCount: number,
    readonly totalCount: number,
    readonly threshold: number
  ) {
    const ratio = totalCount > 0 ? rejectedCount / totalCount : 0;
    super(
      `batch '${batchId}' rejected ${rejectedCount} of ${totalCount} records ` +
        `(${(ratio * 100).toFixed(1)}% > ${(threshold * 100).toFixed(1)}%)`
    );
  }
}

export type NoPartitionReason = 'archived' | 'missing';

export class NoPartitionForDateError extends WarehouseError {
  readonly code = 'NoPartitionForDate' as const;
  readonly retryable = false;

  constructor(readonly table: string, readonly date: string, readonly reason: NoPartitionReason) {
    super(
      reason === 'archived'
        ? `date ${date} precedes the earliest retained partition of '${table}'`
        : `no partition of '${table}' covers ${date} and auto-creation is disabled`
    );
  }
}

export class StorageUnavailableError extends WarehouseError {
  readonly code = 'StorageUnavailable' as const;
  readonly retryable = true;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`warehouse storage is unavailable: ${detail}`, options);
  }
}

export class StagingConflictError extends WarehouseError {
  readonly code = 'StagingConflict' as const;
  readonly retryable = true;

  constructor(readonly stagingKey: string, readonly inFlightBatchId: string) {
    super(`batch '${inFlightBatchId}' is already in flight for ${stagingKey}`);
  }
}

export class StagingQueueFullError extends WarehouseError {
  readonly code = 'StagingQueueFull' as const;
  readonly retryable = true;

  constructor(readonly stagingKey: string, capacity: number) {
    super(`staging queue for ${stagingKey} reached capacity (${capacity})`);
  }
}

export class PipelineCancelledError extends WarehouseError {
  readonly code = 'PipelineCancelled' as const;
  readonly retryable = true;

  constructor(stage: string) {
    super(`${stage} cancelled`);
  }
}

export class UnknownAggregateError extends WarehouseError {
  readonly code = 'UnknownAggregate' as const;
  readonly retryable = false;

  constructor(readonly aggregateId: string) {
    super(`unknown aggregate '${aggregateId}'`);
  }
}

export class UnknownTableError extends WarehouseError {
  readonly code = 'UnknownTable' as const;
  readonly retryable = false;

  constructor(readonly table: string) {
    super(`unknown warehouse table '${table}'`);
  }
}

export function isWarehouseError(error: unknown): error is WarehouseError {
  return error instanceof WarehouseError;
}

export function isRetryable(error: unknown): boolean {
  if (isWarehouseError(error)) {
    return error.retryable;
  }
  return false;
}

export function describeError(error: unknown): { code: string; message: string } {
  if (isWarehouseError(error)) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: error.name || 'Error', message: error.message };
  }
  return { code: 'Error', message: String(error) };
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}
