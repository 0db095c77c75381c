import type { FieldType } from '../config/catalog';
import { isIsoDate } from '../partitions/ranges';

export type CoercionResult = { ok: true; value: unknown } | { ok: false };

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const TRUE_TOKENS = new Set(['true', 't', '1', 'yes', 'y']);
const FALSE_TOKENS = new Set(['false', 'f', '0', 'no', 'n']);

export function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim().length === 0);
}

function coerceNumber(value: unknown, pattern: RegExp): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return pattern.test(trimmed) ? Number(trimmed) : null;
  }
  return null;
}

/** Coerces a present (non-missing) value to the declared field type. */
export function coerceValue(value: unknown, type: FieldType): CoercionResult {
  switch (type) {
    case 'string':
      if (typeof value === 'string') {
        return { ok: true, value: value.trim() };
      }
      if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return { ok: true, value: String(value) };
      }
      return { ok: false };
    case 'integer': {
      const parsed = coerceNumber(value, INTEGER);
      return parsed !== null && Number.isSafeInteger(parsed) ? { ok: true, value: parsed } : { ok: false };
    }
    case 'decimal': {
      const parsed = coerceNumber(value, DECIMAL);
      return parsed !== null ? { ok: true, value: parsed } : { ok: false };
    }
    case 'date': {
      if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? { ok: false } : { ok: true, value: value.toISOString().slice(0, 10) };
      }
      if (typeof value === 'string') {
        const candidate = value.trim().slice(0, 10);
        return isIsoDate(candidate) ? { ok: true, value: candidate } : { ok: false };
      }
      return { ok: false };
    }
    case 'timestamp': {
      const parsed = value instanceof Date ? value : typeof value === 'string' ? new Date(value.trim()) : null;
      if (!parsed || Number.isNaN(parsed.getTime())) {
        return { ok: false };
      }
      return { ok: true, value: parsed.toISOString() };
    }
    case 'boolean': {
      if (typeof value === 'boolean') {
        return { ok: true, value };
      }
      const token = String(value).trim().toLowerCase();
      if (TRUE_TOKENS.has(token)) {
        return { ok: true, value: true };
      }
      if (FALSE_TOKENS.has(token)) {
        return { ok: true, value: false };
      }
      return { ok: false };
    }
  }
}
