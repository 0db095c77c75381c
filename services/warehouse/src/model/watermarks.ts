import { createHash } from 'node:crypto';
import type { Cadence, SourceRecord, Watermark } from './types';

const INTEGER_PATTERN = /^\d+$/;

export function compareWatermarks(a: Watermark, b: Watermark): number {
  if (INTEGER_PATTERN.test(a) && INTEGER_PATTERN.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    return left === right ? 0 : left < right ? -1 : 1;
  }
  return a === b ? 0 : a < b ? -1 : 1;
}

/** True when `candidate` is not newer than `current` (null means nothing applied yet). */
export function isAtOrBefore(candidate: Watermark, current: Watermark | null): boolean {
  if (current === null) {
    return false;
  }
  return compareWatermarks(candidate, current) <= 0;
}

export function sortByWatermark(records: SourceRecord[]): SourceRecord[] {
  return [...records].sort((a, b) => {
    const order = compareWatermarks(a.sourceWatermark, b.sourceWatermark);
    if (order !== 0) {
      return order;
    }
    return a.naturalKey < b.naturalKey ? -1 : a.naturalKey > b.naturalKey ? 1 : 0;
  });
}

/**
 * Cut a watermark-ordered extract to `limit` records without splitting records that share
 * the boundary watermark; the deferred records come back on the next extraction.
 * A batch made entirely of one watermark is kept whole.
 */
export function trimToWatermarkBoundary(records: SourceRecord[], limit: number): SourceRecord[] {
  if (records.length <= limit) {
    return records;
  }
  const boundary = records[limit]?.sourceWatermark;
  const head = records.slice(0, limit);
  if (boundary === undefined) {
    return head;
  }
  const trimmed = head.filter((record) => compareWatermarks(record.sourceWatermark, boundary) < 0);
  if (trimmed.length > 0) {
    return trimmed;
  }
  return records.filter((record) => compareWatermarks(record.sourceWatermark, boundary) === 0);
}

export function deriveBatchId(parts: {
  sourceId: string;
  cadence: Cadence;
  targetTable: string;
  from: Watermark | null;
  to: Watermark;
}): string {
  const digest = createHash('sha256')
    .update([parts.sourceId, parts.cadence, parts.targetTable, parts.from ?? '', parts.to].join('\u0000'))
    .digest('hex');
  return `batch-${digest.slice(0, 20)}`;
}

export function padCursor(value: number, width = 9): string {
  return String(value).padStart(width, '0');
}
