import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { compareDates } from '../domain/dates';
import { RULES } from '../domain/rules';
import { Carrier, CoverageSource, InsuranceCoverage, Subscriber, UNRESOLVED_REFERENCE_ID } from '../domain/types';
import { formatEntityKey, StageResult, ViolationCollector } from '../domain/violations';

export interface CoverageReferences {
  /** null when no carrier feed was supplied; any non-null id is then taken as resolved. */
  carriers: readonly Carrier[] | null;
  subscribers: readonly Subscriber[] | null;
}

export class CoverageLookup {
  private readonly byPlan = new Map<number, InsuranceCoverage>();
  private readonly byPatient = new Map<number, InsuranceCoverage[]>();

  constructor(readonly coverages: readonly InsuranceCoverage[]) {
    for (const coverage of coverages) {
      this.byPlan.set(coverage.insurancePlanId, coverage);
      const forPatient = this.byPatient.get(coverage.patientId) ?? [];
      forPatient.push(coverage);
      this.byPatient.set(coverage.patientId, forPatient);
    }
  }

  /** Coverage for the (patient, plan) pair; a plan held by another patient does not match. */
  resolve(patientId: number | null, planId: number | null): InsuranceCoverage | null {
    if (patientId === null || planId === null) return null;
    const coverage = this.byPlan.get(planId);
    return coverage !== undefined && coverage.patientId === patientId ? coverage : null;
  }

  forPatient(patientId: number): readonly InsuranceCoverage[] {
    return this.byPatient.get(patientId) ?? [];
  }

  hasActiveCoverage(patientId: number | null): boolean {
    if (patientId === null) return false;
    return this.forPatient(patientId).some((coverage) => coverage.isActive);
  }
}

const latest = (records: readonly CoverageSource[]): CoverageSource => {
  // later input rows win ties
  return records.reduce((winner, candidate) =>
    compareDates(candidate.updatedAt, winner.updatedAt) >= 0 ? candidate : winner
  );
};

@Injectable()
export class CoverageResolver {
  private readonly logger: Logger;

  constructor(@Inject(RECONCILIATION_CONFIG) private readonly config: ReconciliationConfig) {
    this.logger = createReconciliationLogger(config, 'coverage-resolver');
  }

  buildCoverage(sources: readonly CoverageSource[], references: CoverageReferences): StageResult<CoverageLookup> {
    const collector = new ViolationCollector();
    const carriers = references.carriers ? new Map(references.carriers.map((c) => [c.carrierId, c] as const)) : null;
    const subscribers = references.subscribers ? new Set(references.subscribers.map((s) => s.subscriberId)) : null;

    const byPlan = new Map<number, CoverageSource[]>();
    for (const source of sources) {
      const group = byPlan.get(source.planId) ?? [];
      group.push(source);
      byPlan.set(source.planId, group);
    }

    const coverages: InsuranceCoverage[] = [];
    for (const [planId, records] of byPlan) {
      const patients = [...new Set(records.map((record) => record.patientId))];
      if (patients.length > 1) {
        collector.raise(
          RULES.coveragePlanPatientConflict,
          formatEntityKey({ insurance_plan_id: planId }),
          `Plan delivered for ${patients.length} patients (${patients.join(', ')}); the latest record's patient is kept`
        );
      }
      coverages.push(this.resolveRecords(planId, records, carriers, subscribers));
    }
    coverages.sort((a, b) => a.insurancePlanId - b.insurancePlanId);

    this.logger.info('Resolved insurance coverage', {
      sourceRecords: sources.length,
      coverages: coverages.length,
      incomplete: coverages.filter((coverage) => coverage.isIncompleteRecord).length,
      active: coverages.filter((coverage) => coverage.isActive).length,
    });

    return { output: new CoverageLookup(coverages), violations: collector.violations };
  }

  private resolveRecords(
    planId: number,
    records: readonly CoverageSource[],
    carriers: ReadonlyMap<number, Carrier> | null,
    subscribers: ReadonlySet<number> | null
  ): InsuranceCoverage {
    const base = latest(records);

    const carrier = this.resolveCarrier(base, carriers);
    const subscriberResolved =
      carrier !== null && base.subscriberId !== null && (subscribers === null || subscribers.has(base.subscriberId));
    const isIncompleteRecord = carrier === null || !subscriberResolved;

    const verificationDate = records
      .map((record) => record.verificationDate)
      .reduce<Date | null>((found, date) => (compareDates(date, found) > 0 ? date : found), null);

    const effectiveDate = this.effectiveDate(records);

    if (isIncompleteRecord) {
      this.logger.debug('Coverage references unresolved', {
        planId,
        carrierId: base.carrierId,
        subscriberId: base.subscriberId,
      });
    }

    return {
      insurancePlanId: planId,
      patientId: base.patientId,
      carrierId: carrier?.carrierId ?? UNRESOLVED_REFERENCE_ID,
      carrierName: carrier ? carrier.carrierName ?? base.carrierName : null,
      subscriberId: subscriberResolved && base.subscriberId !== null ? base.subscriberId : UNRESOLVED_REFERENCE_ID,
      planType: base.planType,
      groupNumber: base.groupNumber,
      groupName: base.groupName,
      verificationDate,
      benefitDetails: base.benefitDetails,
      isActive: !base.isPending && verificationDate !== null,
      effectiveDate,
      terminationDate: base.isPending ? base.updatedAt ?? effectiveDate : null,
      isIncompleteRecord,
      ordinal: base.ordinal,
    };
  }

  private resolveCarrier(base: CoverageSource, carriers: ReadonlyMap<number, Carrier> | null): Carrier | null {
    if (base.carrierId === null) return null;
    if (carriers === null) return { carrierId: base.carrierId, carrierName: base.carrierName };
    return carriers.get(base.carrierId) ?? null;
  }

  /** Earliest creation timestamp (falling back to update time) across the records, else the epoch floor. */
  private effectiveDate(records: readonly CoverageSource[]): Date {
    const known = records
      .map((record) => record.createdAt ?? record.updatedAt)
      .filter((date): date is Date => date !== null)
      .sort((a, b) => a.getTime() - b.getTime());
    return known[0] ?? this.config.coverageEpochFloor;
  }
}
