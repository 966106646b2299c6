import { compareDates } from '../domain/dates';
import { ClaimSnapshot, InsuranceCoverage } from '../domain/types';

export interface SnapshotFilter {
  claimId?: number;
  claimProcedureId?: number;
}

/**
 * "What did we know on date X": the latest snapshot per claim procedure
 * recorded at or before `asOf`.
 */
export function snapshotsAsOf(
  history: readonly ClaimSnapshot[],
  asOf: Date,
  filter: SnapshotFilter = {}
): ClaimSnapshot[] {
  const latest = new Map<number, ClaimSnapshot>();
  for (const row of history) {
    if (row.entryTimestamp.getTime() > asOf.getTime()) continue;
    if (filter.claimId !== undefined && row.claimId !== filter.claimId) continue;
    if (filter.claimProcedureId !== undefined && row.claimProcedureId !== filter.claimProcedureId) continue;

    const current = latest.get(row.claimProcedureId);
    const order = current ? compareDates(row.entryTimestamp, current.entryTimestamp) : 1;
    if (order > 0 || (order === 0 && current !== undefined && row.claimSnapshotId > current.claimSnapshotId)) {
      latest.set(row.claimProcedureId, row);
    }
  }
  return [...latest.values()].sort((a, b) => a.claimProcedureId - b.claimProcedureId);
}

/** Half-open containment: effectiveDate <= date < terminationDate. */
export const isCoverageEffectiveOn = (coverage: InsuranceCoverage, date: Date): boolean =>
  coverage.effectiveDate.getTime() <= date.getTime() &&
  (coverage.terminationDate === null || date.getTime() < coverage.terminationDate.getTime());

export function coverageAsOf(
  coverages: readonly InsuranceCoverage[],
  patientId: number,
  date: Date
): InsuranceCoverage[] {
  return coverages
    .filter((coverage) => coverage.patientId === patientId && isCoverageEffectiveOn(coverage, date))
    .sort(
      (a, b) =>
        (a.ordinal ?? Number.MAX_SAFE_INTEGER) - (b.ordinal ?? Number.MAX_SAFE_INTEGER) ||
        a.insurancePlanId - b.insurancePlanId
    );
}
