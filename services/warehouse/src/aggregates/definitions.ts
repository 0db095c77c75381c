import type { AggregateRow, WarehouseRow } from '../model/types';
import { monthKey } from '../partitions/ranges';

/** Dimension rows by natural key, per dimension table. */
export type DimensionLookup = Map<string, Map<string, WarehouseRow>>;

export interface AggregateDefinition {
  id: string;
  description: string;
  factTable: string;
  dimensionTables: string[];
  compute(facts: readonly WarehouseRow[], dimensions: DimensionLookup): AggregateRow[];
}

/** Money is summed in integer cents; rates and scores keep six decimal places. */
const CENTS = 100;
const RATIO_SCALE = 1_000_000;

/** Sums in fixed-point units so monthly totals do not drift. */
class Accumulator {
  private units = 0n;
  count = 0;

  constructor(private readonly scale: number = CENTS) {}

  add(value: unknown): void {
    const amount = toNumber(value);
    if (amount === null) {
      return;
    }
    this.units += BigInt(Math.round(amount * this.scale));
    this.count += 1;
  }

  total(): number {
    return Number(this.units) / this.scale;
  }

  average(): number | null {
    if (this.count === 0) {
      return null;
    }
    return Math.round(Number(this.units) / this.count) / this.scale;
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function keyOf(value: unknown): string {
  return value === null || value === undefined ? 'unknown' : String(value);
}

function dimensionName(dimensions: DimensionLookup, table: string, key: string, field: string): string | null {
  const value = dimensions.get(table)?.get(key)?.payload[field];
  return typeof value === 'string' ? value : null;
}

function groupRows<G>(
  facts: readonly WarehouseRow[],
  groupField: string,
  create: () => G,
  fold: (group: G, row: WarehouseRow) => void
): Map<string, { period: string; groupKey: string; group: G }> {
  const groups = new Map<string, { period: string; groupKey: string; group: G }>();
  for (const row of facts) {
    const period = monthKey(row.eventDate);
    const groupKey = keyOf(row.payload[groupField]);
    const id = `${period}\u0000${groupKey}`;
    let entry = groups.get(id);
    if (!entry) {
      entry = { period, groupKey, group: create() };
      groups.set(id, entry);
    }
    fold(entry.group, row);
  }
  return groups;
}

function sortRows(rows: AggregateRow[]): AggregateRow[] {
  return rows.sort((a, b) =>
    a.period === b.period ? a.groupKey.localeCompare(b.groupKey) : a.period < b.period ? -1 : 1
  );
}

const monthlyBranchPerformance: AggregateDefinition = {
  id: 'monthly_branch_performance',
  description: 'Transaction count, total and average amount per branch and month',
  factTable: 'transaction_fact',
  dimensionTables: ['branch'],
  compute(facts, dimensions) {
    const groups = groupRows(
      facts,
      'branch_id',
      () => ({ amounts: new Accumulator(), transactions: new Set<string>() }),
      (group, row) => {
        group.transactions.add(row.naturalKey);
        group.amounts.add(row.payload.amount);
      }
    );
    return sortRows(
      [...groups.values()].map(({ period, groupKey, group }) => ({
        aggregateId: 'monthly_branch_performance',
        period,
        groupKey,
        values: {
          branch_name: dimensionName(dimensions, 'branch', groupKey, 'branch_name'),
          transaction_count: group.transactions.size,
          total_amount: group.amounts.total(),
          avg_amount: group.amounts.average()
        }
      }))
    );
  }
};

const monthlySegmentPerformance: AggregateDefinition = {
  id: 'monthly_segment_performance',
  description: 'Customer count, average balance and satisfaction per segment and month',
  factTable: 'customer_fact',
  dimensionTables: ['customer_segment'],
  compute(facts, dimensions) {
    const groups = groupRows(
      facts,
      'segment_id',
      () => ({ customers: new Set<string>(), balance: new Accumulator(), satisfaction: new Accumulator() }),
      (group, row) => {
        group.customers.add(keyOf(row.payload.customer_id));
        group.balance.add(row.payload.total_balance);
        group.satisfaction.add(row.payload.satisfaction_score);
      }
    );
    return sortRows(
      [...groups.values()].map(({ period, groupKey, group }) => ({
        aggregateId: 'monthly_segment_performance',
        period,
        groupKey,
        values: {
          segment_name: dimensionName(dimensions, 'customer_segment', groupKey, 'segment_name'),
          customer_count: group.customers.size,
          avg_balance: group.balance.average(),
          avg_satisfaction: group.satisfaction.average()
        }
      }))
    );
  }
};

const monthlyLoanPortfolio: AggregateDefinition = {
  id: 'monthly_loan_portfolio',
  description: 'Loan count, volume, average rate and default risk per loan type and month',
  factTable: 'loan_fact',
  dimensionTables: ['loan_type'],
  compute(facts, dimensions) {
    const groups = groupRows(
      facts,
      'loan_type_id',
      () => ({
        loans: new Set<string>(),
        amount: new Accumulator(),
        rate: new Accumulator(RATIO_SCALE),
        risk: new Accumulator(RATIO_SCALE)
      }),
      (group, row) => {
        group.loans.add(row.naturalKey);
        group.amount.add(row.payload.amount);
        group.rate.add(row.payload.interest_rate);
        group.risk.add(row.payload.default_risk);
      }
    );
    return sortRows(
      [...groups.values()].map(({ period, groupKey, group }) => ({
        aggregateId: 'monthly_loan_portfolio',
        period,
        groupKey,
        values: {
          loan_type: dimensionName(dimensions, 'loan_type', groupKey, 'type_name'),
          loan_count: group.loans.size,
          total_amount: group.amount.total(),
          avg_interest_rate: group.rate.average(),
          avg_default_risk: group.risk.average()
        }
      }))
    );
  }
};

export const AGGREGATE_DEFINITIONS: readonly AggregateDefinition[] = [
  monthlyBranchPerformance,
  monthlySegmentPerformance,
  monthlyLoanPortfolio
];

export function findAggregateDefinition(id: string): AggregateDefinition | undefined {
  return AGGREGATE_DEFINITIONS.find((definition) => definition.id === id);
}
