import type { FieldDefinition, TableDefinition } from '../config/catalog';
import type { RejectionReason, SourceRecord } from '../model/types';
import { isIsoDate, shiftDays } from '../partitions/ranges';
import { coerceValue, isMissing } from './coercion';

export interface RuleSettings {
  plausibleFrom: string;
  futureToleranceDays: number;
}

export interface RuleContext extends RuleSettings {
  table: TableDefinition;
  /** Today's date (UTC) at validation time. */
  today: string;
}

export interface CoercedRecord {
  payload: Record<string, unknown>;
  reasons: RejectionReason[];
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Checks a record's identity and required fields. Identity failures are reported even when
 * completeness rules are switched off since the loader cannot place such a record.
 */
export function checkCompleteness(record: SourceRecord, context: RuleContext, enabled: boolean): RejectionReason[] {
  const reasons: RejectionReason[] = [];
  if (record.naturalKey.replace(/:/g, '').trim().length === 0) {
    reasons.push({ code: 'MissingField', check: 'completeness', field: 'natural_key', message: 'natural key is empty' });
  }
  if (!enabled) {
    return reasons;
  }
  for (const field of context.table.fields) {
    if (field.required && isMissing(record.payload[field.name])) {
      reasons.push({
        code: 'MissingField',
        check: 'completeness',
        field: field.name,
        message: `required field '${field.name}' is missing`
      });
    }
  }
  return reasons;
}

/**
 * Coerces declared fields to their types. Undeclared payload fields pass through untouched.
 * When validity rules are off, values that do not coerce are kept as extracted.
 */
export function coerceRecord(record: SourceRecord, context: RuleContext, validity: boolean): CoercedRecord {
  const payload: Record<string, unknown> = { ...record.payload };
  const reasons: RejectionReason[] = [];
  for (const field of context.table.fields) {
    const value = record.payload[field.name];
    if (isMissing(value)) {
      payload[field.name] = null;
      continue;
    }
    const coerced = coerceValue(value, field.type);
    if (coerced.ok) {
      payload[field.name] = coerced.value;
    } else if (validity) {
      reasons.push({
        code: 'InvalidType',
        check: 'validity',
        field: field.name,
        message: `${describeValue(value)} is not a valid ${field.type}`
      });
    }
  }
  return { payload, reasons };
}

function checkField(field: FieldDefinition, value: unknown): RejectionReason | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    if (field.min !== undefined && value < field.min) {
      return {
        code: 'OutOfRange',
        check: 'validity',
        field: field.name,
        message: `${field.name}=${value} is below the minimum ${field.min}`
      };
    }
    if (field.max !== undefined && value > field.max) {
      return {
        code: 'OutOfRange',
        check: 'validity',
        field: field.name,
        message: `${field.name}=${value} is above the maximum ${field.max}`
      };
    }
  }
  if (field.allowed && !field.allowed.includes(String(value))) {
    return {
      code: 'InvalidDomain',
      check: 'validity',
      field: field.name,
      message: `${field.name}=${describeValue(value)} is not one of ${field.allowed.join(', ')}`
    };
  }
  return null;
}

/** Event date checks always run; range and domain checks only when validity is on. */
export function checkValidity(
  record: SourceRecord,
  payload: Record<string, unknown>,
  context: RuleContext,
  enabled: boolean
): RejectionReason[] {
  const reasons: RejectionReason[] = [];
  if (!isIsoDate(record.eventDate)) {
    reasons.push({
      code: 'InvalidType',
      check: 'validity',
      field: 'event_date',
      message: `event date ${describeValue(record.eventDate)} is not a YYYY-MM-DD date`
    });
    return reasons;
  }
  if (!enabled) {
    return reasons;
  }
  const latest = shiftDays(context.today, context.futureToleranceDays);
  if (record.eventDate < context.plausibleFrom || record.eventDate > latest) {
    reasons.push({
      code: 'ImplausibleDate',
      check: 'validity',
      field: 'event_date',
      message: `event date ${record.eventDate} is outside [${context.plausibleFrom}, ${latest}]`
    });
  }
  for (const field of context.table.fields) {
    const reason = checkField(field, payload[field.name]);
    if (reason) {
      reasons.push(reason);
    }
  }
  return reasons;
}

type BusinessRule = (payload: Record<string, unknown>) => string | null;

const businessRules: Record<string, BusinessRule> = {
  transaction_amount_sign: (payload) => {
    const amount = payload.amount;
    if (typeof amount !== 'number') {
      return null;
    }
    const kind = typeof payload.transaction_kind === 'string' ? payload.transaction_kind.toUpperCase() : null;
    if (kind === 'REVERSAL') {
      return amount < 0 ? null : `reversal amount ${amount} must be negative`;
    }
    return amount >= 0 ? null : `${kind ?? 'transaction'} amount ${amount} must not be negative`;
  },
  loan_dates_ordered: (payload) => {
    const applied = payload.application_date;
    const approved = payload.approval_date;
    if (typeof applied !== 'string' || typeof approved !== 'string') {
      return null;
    }
    return approved >= applied ? null : `approval_date ${approved} precedes application_date ${applied}`;
  }
};

export function isKnownBusinessRule(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(businessRules, name);
}

export function checkBusinessRules(payload: Record<string, unknown>, names: readonly string[]): RejectionReason[] {
  const reasons: RejectionReason[] = [];
  for (const name of names) {
    const rule = businessRules[name];
    if (!rule) {
      throw new Error(`unknown business rule '${name}'`);
    }
    const message = rule(payload);
    if (message) {
      reasons.push({ code: 'BusinessRule', check: 'business', field: name, message });
    }
  }
  return reasons;
}

/** Looks up which natural keys exist in a dimension table. */
export interface ReferenceResolver {
  existingKeys(table: string, naturalKeys: string[]): Promise<Set<string>>;
}

export function referenceKey(value: unknown): string | null {
  if (isMissing(value)) {
    return null;
  }
  return String(value).trim();
}

export function checkReferences(
  payload: Record<string, unknown>,
  table: TableDefinition,
  known: Map<string, Set<string>>
): RejectionReason[] {
  const reasons: RejectionReason[] = [];
  for (const reference of table.references) {
    const key = referenceKey(payload[reference.field]);
    if (key === null) {
      continue;
    }
    if (!known.get(reference.table)?.has(key)) {
      reasons.push({
        code: 'DanglingReference',
        check: 'referential',
        field: reference.field,
        message: `${reference.field}=${key} has no row in ${reference.table}`
      });
    }
  }
  return reasons;
}
