import { z } from 'zod';

export const cadenceSchema = z.enum(['daily', 'weekly', 'monthly', 'quarterly']);

export type Cadence = z.infer<typeof cadenceSchema>;

export const CADENCES: readonly Cadence[] = cadenceSchema.options;

/**
 * Watermarks are opaque strings produced by a source: ISO timestamps, numeric offsets or
 * zero-padded file cursors. See `compareWatermarks` for ordering.
 */
export type Watermark = string;

export interface SourceRecord {
  naturalKey: string;
  /** Logical event date, YYYY-MM-DD. Dimension records carry their extraction date. */
  eventDate: string;
  payload: Record<string, unknown>;
  sourceWatermark: Watermark;
}

export interface WatermarkRange {
  from: Watermark | null;
  to: Watermark;
}

export interface Batch {
  id: string;
  sourceId: string;
  cadence: Cadence;
  targetTable: string;
  extractedAt: string;
  watermarkRange: WatermarkRange;
  records: readonly SourceRecord[];
}

export type RejectionCode =
  | 'MissingField'
  | 'InvalidType'
  | 'OutOfRange'
  | 'InvalidDomain'
  | 'ImplausibleDate'
  | 'DanglingReference'
  | 'BusinessRule'
  | 'NoPartitionForDate';

export type CheckKind = 'completeness' | 'validity' | 'referential' | 'business';

export interface RejectionReason {
  code: RejectionCode;
  check: CheckKind;
  field?: string;
  message: string;
}

export interface RejectedRecord {
  record: SourceRecord;
  reasons: RejectionReason[];
}

export type ValidationOutcome =
  | { status: 'accepted'; record: SourceRecord }
  | { status: 'rejected'; record: SourceRecord; reasons: RejectionReason[] };

export interface QualityCheckSummary {
  table: string;
  checkKind: CheckKind;
  passedCount: number;
  failedCount: number;
  sampleFailures: Array<{ naturalKey: string; field?: string; message: string }>;
}

export interface QualityReport {
  batchId: string;
  table: string;
  generatedAt: string;
  totalRecords: number;
  acceptedCount: number;
  rejectedCount: number;
  checks: QualityCheckSummary[];
}

export type PartitionStatus = 'active' | 'retired';

export interface PartitionRecord {
  id: string;
  table: string;
  rangeStart: string;
  rangeEnd: string;
  status: PartitionStatus;
  createdAt: string;
  retiredAt: string | null;
}

export interface LoadWatermarkRecord {
  sourceId: string;
  targetTable: string;
  watermark: Watermark;
  batchId: string;
  loadSequence: number;
  appliedAt: string;
}

export interface WarehouseRow {
  naturalKey: string;
  eventDate: string;
  partitionId: string | null;
  payload: Record<string, unknown>;
  sourceId: string;
  sourcePriority: number;
  extractedAt: string;
  batchId: string;
  loadSequence: number;
  lastUpdated: string;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'skipped';

export interface LoadResult {
  batchId: string;
  targetTable: string;
  inserted: number;
  updated: number;
  skipped: number;
  /** Accepted records stored as rejections because no retained partition covers their date. */
  unroutable: number;
  applied: boolean;
  watermark: Watermark;
  loadSequence: number | null;
}

export interface AggregateRow {
  aggregateId: string;
  period: string;
  groupKey: string;
  values: Record<string, number | string | null>;
}

export type RefreshStrategy = 'full' | 'incremental';

export interface AggregateState {
  aggregateId: string;
  refreshedThrough: Record<string, number>;
  strategy: RefreshStrategy;
  refreshedAt: string;
  rowCount: number;
}

export type StageKind = 'etl' | 'refresh' | 'maintenance';

export type StageStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'blocked' | 'skipped';

export interface StageRunRecord {
  id: string;
  cycleId: string;
  stageId: string;
  kind: StageKind;
  status: StageStatus;
  attempts: number;
  startedAt: string;
  finishedAt: string | null;
  watermark: Watermark | null;
  errorCode: string | null;
  errorMessage: string | null;
  safeToRerun: boolean;
  details: Record<string, unknown>;
}

export interface StoredRejection {
  id: string;
  batchId: string;
  sourceId: string;
  targetTable: string;
  naturalKey: string;
  eventDate: string;
  payload: Record<string, unknown>;
  reasons: RejectionReason[];
  rejectedAt: string;
}
