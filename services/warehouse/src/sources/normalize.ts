import type { RecordMapping } from '../config/catalog';
import { SourceSchemaMismatchError } from '../errors';
import type { SourceRecord, Watermark } from '../model/types';

export type RawRow = Record<string, unknown>;

function keyFields(mapping: RecordMapping): string[] {
  return Array.isArray(mapping.naturalKey) ? mapping.naturalKey : [mapping.naturalKey];
}

function stringifyScalar(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

export function renameFields(row: RawRow, fieldMap: Record<string, string>): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const [column, value] of Object.entries(row)) {
    payload[fieldMap[column] ?? column] = value;
  }
  return payload;
}

/** YYYY-MM-DD from a Date, a date string or a timestamp string; other values pass through as text. */
export function toEventDate(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
  }
  const text = stringifyScalar(value);
  if (/^\d{4}-\d{2}-\d{2}([T ].*)?$/.test(text)) {
    return text.slice(0, 10);
  }
  return text;
}

/** Columns a source must expose for its mapping to work. */
export function requiredColumns(mapping: RecordMapping): string[] {
  const reverse = new Map(Object.entries(mapping.fieldMap).map(([column, field]) => [field, column]));
  const fields = [...keyFields(mapping)];
  if (mapping.eventDate) {
    fields.push(mapping.eventDate);
  }
  return fields.map((field) => reverse.get(field) ?? field);
}

export interface NormalizeOptions {
  sourceId: string;
  mapping: RecordMapping;
  extractedAt: string;
  /** Cursor computed by file adapters; relational and API sources read `mapping.watermark` instead. */
  cursor?: Watermark;
}

export function normalizeRow(row: RawRow, options: NormalizeOptions): SourceRecord {
  const { mapping } = options;
  const payload = renameFields(row, mapping.fieldMap);

  const naturalKey = keyFields(mapping)
    .map((field) => stringifyScalar(payload[field]))
    .join(':');

  const eventDate = mapping.eventDate ? toEventDate(payload[mapping.eventDate]) : options.extractedAt.slice(0, 10);

  let sourceWatermark = options.cursor;
  if (sourceWatermark === undefined) {
    if (!mapping.watermark) {
      throw new SourceSchemaMismatchError(options.sourceId, 'mapping declares no watermark field');
    }
    const raw = payload[mapping.watermark];
    const text = stringifyScalar(raw);
    if (text.length === 0) {
      throw new SourceSchemaMismatchError(options.sourceId, `record is missing watermark field '${mapping.watermark}'`);
    }
    sourceWatermark = text;
  }

  return { naturalKey, eventDate, payload, sourceWatermark };
}
