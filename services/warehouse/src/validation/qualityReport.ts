import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CheckKind, QualityCheckSummary, QualityReport, RejectedRecord } from '../model/types';

const CHECK_ORDER: readonly CheckKind[] = ['completeness', 'validity', 'referential', 'business'];

export interface QualityReportInput {
  batchId: string;
  table: string;
  generatedAt: string;
  totalRecords: number;
  rejected: readonly RejectedRecord[];
  /** Check kinds that ran; a kind that produced failures is reported even when it is not listed. */
  checksRun: readonly CheckKind[];
  sampleSize: number;
}

export interface QualityReportFile {
  generatedAt: string;
  totalChecks: number;
  passedChecks: number;
  failedChecks: number;
  batches: QualityReport[];
}

export function buildQualityReport(input: QualityReportInput): QualityReport {
  const failures = new Map<CheckKind, QualityCheckSummary['sampleFailures']>();
  const failedCounts = new Map<CheckKind, number>();

  for (const { record, reasons } of input.rejected) {
    const seen = new Set<CheckKind>();
    for (const reason of reasons) {
      if (!seen.has(reason.check)) {
        seen.add(reason.check);
        failedCounts.set(reason.check, (failedCounts.get(reason.check) ?? 0) + 1);
      }
      const samples = failures.get(reason.check) ?? [];
      if (samples.length < input.sampleSize) {
        samples.push({ naturalKey: record.naturalKey, field: reason.field, message: reason.message });
      }
      failures.set(reason.check, samples);
    }
  }

  const checks: QualityCheckSummary[] = CHECK_ORDER.filter(
    (kind) => input.checksRun.includes(kind) || failedCounts.has(kind)
  ).map((kind) => {
    const failedCount = failedCounts.get(kind) ?? 0;
    return {
      table: input.table,
      checkKind: kind,
      passedCount: input.totalRecords - failedCount,
      failedCount,
      sampleFailures: failures.get(kind) ?? []
    };
  });

  return {
    batchId: input.batchId,
    table: input.table,
    generatedAt: input.generatedAt,
    totalRecords: input.totalRecords,
    acceptedCount: input.totalRecords - input.rejected.length,
    rejectedCount: input.rejected.length,
    checks
  };
}

export function summarizeQualityReports(reports: readonly QualityReport[], generatedAt: string): QualityReportFile {
  const checks = reports.flatMap((report) => report.checks);
  const failedChecks = checks.filter((check) => check.failedCount > 0).length;
  return {
    generatedAt,
    totalChecks: checks.length,
    passedChecks: checks.length - failedChecks,
    failedChecks,
    batches: [...reports]
  };
}

export async function writeQualityReport(
  filePath: string,
  reports: readonly QualityReport[],
  generatedAt: string = new Date().toISOString()
): Promise<QualityReportFile> {
  const summary = summarizeQualityReports(reports, generatedAt);
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
  return summary;
}
