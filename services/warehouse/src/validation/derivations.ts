import { parseIsoDate } from '../partitions/ranges';

export interface DerivationContext {
  eventDate: string;
  /** Date the batch was extracted, YYYY-MM-DD; the reference point for ages and tenures. */
  referenceDate: string;
}

type Derivation = (payload: Record<string, unknown>, context: DerivationContext) => unknown;

const DAY_MS = 86_400_000;

function dateField(payload: Record<string, unknown>, field: string): Date | null {
  const value = payload[field];
  if (typeof value !== 'string') {
    return null;
  }
  try {
    return parseIsoDate(value.slice(0, 10));
  } catch {
    return null;
  }
}

function wholeYearsBetween(from: Date, to: Date): number {
  let years = to.getUTCFullYear() - from.getUTCFullYear();
  const beforeAnniversary =
    to.getUTCMonth() < from.getUTCMonth() ||
    (to.getUTCMonth() === from.getUTCMonth() && to.getUTCDate() < from.getUTCDate());
  if (beforeAnniversary) {
    years -= 1;
  }
  return years;
}

/** Fixed-date bank holidays (MM-DD). Movable feasts are not modelled. */
const FIXED_HOLIDAYS = new Set(['01-01', '05-01', '12-25', '12-26']);

function isWeekend(date: string): boolean {
  const day = parseIsoDate(date).getUTCDay();
  return day === 0 || day === 6;
}

const derivations: Record<string, Derivation> = {
  is_weekend: (_payload, context) => isWeekend(context.eventDate),
  is_holiday: (_payload, context) => FIXED_HOLIDAYS.has(context.eventDate.slice(5)),
  age: (payload, context) => {
    const birth = dateField(payload, 'date_of_birth');
    return birth ? wholeYearsBetween(birth, parseIsoDate(context.referenceDate)) : null;
  },
  customer_tenure_days: (payload, context) => {
    const acquired = dateField(payload, 'acquisition_date');
    if (!acquired) {
      return null;
    }
    return Math.floor((parseIsoDate(context.referenceDate).getTime() - acquired.getTime()) / DAY_MS);
  }
};

export function knownDerivations(): string[] {
  return Object.keys(derivations).sort();
}

export function isKnownDerivation(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(derivations, name);
}

/** Returns a copy of `payload` with the named derived fields added. */
export function applyDerivations(
  payload: Record<string, unknown>,
  names: readonly string[],
  context: DerivationContext
): Record<string, unknown> {
  const derived = { ...payload };
  for (const name of names) {
    const derive = derivations[name];
    if (derive) {
      derived[name] = derive(payload, context);
    }
  }
  return derived;
}
