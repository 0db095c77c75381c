import type { SourceDefinition } from '../config/catalog';
import type { SourceRecord, Watermark } from '../model/types';

export interface ExtractRequest {
  /** Only records strictly after this watermark are returned. */
  since: Watermark | null;
  limit: number;
  extractedAt: string;
  signal?: AbortSignal;
}

/**
 * A connection to one upstream system. Implementations return records in ascending watermark
 * order and may return at most `limit` records.
 */
export interface SourceAdapter {
  readonly id: string;
  readonly kind: SourceDefinition['kind'];
  extract(request: ExtractRequest): Promise<SourceRecord[]>;
  close(): Promise<void>;
}
