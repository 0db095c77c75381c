import { findTable, type TableDefinition, type WarehouseCatalog } from '../config/catalog';
import { throwIfAborted, UnknownTableError } from '../errors';
import type { Batch, CheckKind, QualityReport, RejectedRecord, SourceRecord } from '../model/types';
import type { Logger } from '../observability/logger';
import { todayUtc } from '../partitions/ranges';
import type { WarehouseStore } from '../storage/types';
import { applyDerivations, isKnownDerivation } from './derivations';
import { buildQualityReport } from './qualityReport';
import {
  checkBusinessRules,
  checkCompleteness,
  checkReferences,
  checkValidity,
  coerceRecord,
  isKnownBusinessRule,
  referenceKey,
  type ReferenceResolver,
  type RuleContext
} from './rules';

export interface RuleToggles {
  completeness: boolean;
  validity: boolean;
  referential: boolean;
  business: boolean;
}

export interface ValidationEngineOptions {
  catalog: WarehouseCatalog;
  resolver: ReferenceResolver;
  rejectionThreshold: number;
  rules: RuleToggles;
  plausibleFrom: string;
  futureToleranceDays: number;
  sampleSize: number;
  logger: Logger;
  now?: () => Date;
}

export interface ValidateOptions {
  signal?: AbortSignal;
}

export interface ValidationResult {
  /** Accepted records with coerced and derived payloads, in input order. */
  accepted: SourceRecord[];
  rejected: RejectedRecord[];
  report: QualityReport;
  thresholdExceeded: boolean;
}

export function storeReferenceResolver(store: WarehouseStore): ReferenceResolver {
  return {
    existingKeys: (table, naturalKeys) => store.findExistingKeys(table, naturalKeys)
  };
}

export class ValidationEngine {
  private readonly now: () => Date;

  constructor(private readonly options: ValidationEngineOptions) {
    this.now = options.now ?? (() => new Date());
    for (const table of options.catalog.tables) {
      for (const name of table.derive) {
        if (!isKnownDerivation(name)) {
          throw new Error(`table '${table.name}' derives unknown field '${name}'`);
        }
      }
      for (const name of table.businessRules) {
        if (!isKnownBusinessRule(name)) {
          throw new Error(`table '${table.name}' names unknown business rule '${name}'`);
        }
      }
    }
  }

  get rejectionThreshold(): number {
    return this.options.rejectionThreshold;
  }

  async validate(batch: Batch, options: ValidateOptions = {}): Promise<ValidationResult> {
    const table = findTable(this.options.catalog, batch.targetTable);
    if (!table) {
      throw new UnknownTableError(batch.targetTable);
    }
    const { rules } = this.options;
    const context: RuleContext = {
      table,
      today: todayUtc(this.now()),
      plausibleFrom: this.options.plausibleFrom,
      futureToleranceDays: this.options.futureToleranceDays
    };
    const referenceDate = batch.extractedAt.slice(0, 10);

    const coerced = batch.records.map((record) => {
      throwIfAborted(options.signal, 'validate');
      const result = coerceRecord(record, context, rules.validity);
      const reasons = [
        ...checkCompleteness(record, context, rules.completeness),
        ...result.reasons,
        ...checkValidity(record, result.payload, context, rules.validity)
      ];
      if (rules.business) {
        reasons.push(...checkBusinessRules(result.payload, table.businessRules));
      }
      return { record, payload: result.payload, reasons };
    });

    if (rules.referential && table.references.length > 0) {
      const known = await this.resolveReferences(table, coerced.map((entry) => entry.payload));
      throwIfAborted(options.signal, 'validate');
      for (const entry of coerced) {
        entry.reasons.push(...checkReferences(entry.payload, table, known));
      }
    }

    const accepted: SourceRecord[] = [];
    const rejected: RejectedRecord[] = [];
    for (const { record, payload, reasons } of coerced) {
      if (reasons.length > 0) {
        rejected.push({ record, reasons });
        continue;
      }
      accepted.push({
        ...record,
        payload: applyDerivations(payload, table.derive, { eventDate: record.eventDate, referenceDate })
      });
    }

    const report = buildQualityReport({
      batchId: batch.id,
      table: table.name,
      generatedAt: this.now().toISOString(),
      totalRecords: batch.records.length,
      rejected,
      checksRun: this.checksRun(table),
      sampleSize: this.options.sampleSize
    });

    const total = batch.records.length;
    const thresholdExceeded = total > 0 && rejected.length / total > this.options.rejectionThreshold;

    this.options.logger.info(
      {
        batchId: batch.id,
        table: table.name,
        accepted: accepted.length,
        rejected: rejected.length,
        thresholdExceeded
      },
      'validated batch'
    );

    return { accepted, rejected, report, thresholdExceeded };
  }

  private checksRun(table: TableDefinition): CheckKind[] {
    const { rules } = this.options;
    const kinds: CheckKind[] = [];
    if (rules.completeness) {
      kinds.push('completeness');
    }
    if (rules.validity) {
      kinds.push('validity');
    }
    if (rules.referential && table.references.length > 0) {
      kinds.push('referential');
    }
    if (rules.business && table.businessRules.length > 0) {
      kinds.push('business');
    }
    return kinds;
  }

  private async resolveReferences(
    table: TableDefinition,
    payloads: Array<Record<string, unknown>>
  ): Promise<Map<string, Set<string>>> {
    const wanted = new Map<string, Set<string>>();
    for (const reference of table.references) {
      const keys = wanted.get(reference.table) ?? new Set<string>();
      for (const payload of payloads) {
        const key = referenceKey(payload[reference.field]);
        if (key !== null) {
          keys.add(key);
        }
      }
      wanted.set(reference.table, keys);
    }

    const known = new Map<string, Set<string>>();
    for (const [referenced, keys] of wanted) {
      known.set(referenced, keys.size > 0 ? await this.options.resolver.existingKeys(referenced, [...keys]) : new Set());
    }
    return known;
  }
}
