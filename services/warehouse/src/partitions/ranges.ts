export type PartitionGranularity = 'day' | 'month' | 'year';

export interface DateRange {
  /** Inclusive, YYYY-MM-DD. */
  start: string;
  /** Exclusive, YYYY-MM-DD. */
  end: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function toIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function parseIsoDate(value: string): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new Error(`expected a YYYY-MM-DD date, received '${value}'`);
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (toIsoDate(date) !== value) {
    throw new Error(`'${value}' is not a calendar date`);
  }
  return date;
}

export function isIsoDate(value: string): boolean {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
}

export function periodStart(date: string, granularity: PartitionGranularity): string {
  const parsed = parseIsoDate(date);
  switch (granularity) {
    case 'day':
      return date;
    case 'month':
      return `${pad(parsed.getUTCFullYear(), 4)}-${pad(parsed.getUTCMonth() + 1)}-01`;
    case 'year':
      return `${pad(parsed.getUTCFullYear(), 4)}-01-01`;
  }
}

export function addPeriods(start: string, granularity: PartitionGranularity, count: number): string {
  const parsed = parseIsoDate(start);
  switch (granularity) {
    case 'day':
      parsed.setUTCDate(parsed.getUTCDate() + count);
      break;
    case 'month':
      parsed.setUTCMonth(parsed.getUTCMonth() + count);
      break;
    case 'year':
      parsed.setUTCFullYear(parsed.getUTCFullYear() + count);
      break;
  }
  return toIsoDate(parsed);
}

export function periodRange(date: string, granularity: PartitionGranularity): DateRange {
  const start = periodStart(date, granularity);
  return { start, end: addPeriods(start, granularity, 1) };
}

/** Half-open containment: start <= date < end. ISO dates compare correctly as strings. */
export function rangeContains(range: DateRange, date: string): boolean {
  return range.start <= date && date < range.end;
}

export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Every period start in [from, to), stepping by the granularity. `from` must be aligned. */
export function enumeratePeriods(from: string, to: string, granularity: PartitionGranularity): DateRange[] {
  const ranges: DateRange[] = [];
  let cursor = from;
  while (cursor < to) {
    const next = addPeriods(cursor, granularity, 1);
    ranges.push({ start: cursor, end: next });
    cursor = next;
  }
  return ranges;
}

export function partitionName(table: string, start: string, granularity: PartitionGranularity): string {
  const [year, month, day] = start.split('-');
  switch (granularity) {
    case 'year':
      return `${table}_y${year}`;
    case 'month':
      return `${table}_y${year}m${month}`;
    case 'day':
      return `${table}_y${year}m${month}d${day}`;
  }
}

/** Calendar month key used by aggregates, YYYY-MM. */
export function monthKey(date: string): string {
  return date.slice(0, 7);
}

export function monthRange(period: string): DateRange {
  const start = `${period}-01`;
  return { start, end: addPeriods(start, 'month', 1) };
}

export function todayUtc(now: Date = new Date()): string {
  return toIsoDate(now);
}

export function shiftDays(date: string, days: number): string {
  return addPeriods(date, 'day', days);
}
