import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { Deduplicator } from '../dedup/deduplicator';
import { lowestClaimIdPolicy } from '../dedup/tie-break.policies';
import { compareDates, isSameUtcDay, MS_PER_DAY, startOfUtcDay } from '../domain/dates';
import { MissingKeyComponentError } from '../domain/errors';
import { isSentinelAmount, subtractAmounts } from '../domain/money';
import { RULES } from '../domain/rules';
import {
  Claim,
  ClaimDetail,
  ClaimPaymentDetail,
  ClaimSnapshot,
  ClaimTrackingEntry,
  SourceClaimSnapshot,
} from '../domain/types';
import { formatEntityKey, StageResult, ViolationCollector } from '../domain/violations';
import { claimSnapshotKey } from '../keys/key-generator';

export interface SnapshotTrackingInput {
  snapshots: readonly SourceClaimSnapshot[];
  claimDetails: readonly ClaimDetail[];
  claimPaymentDetails: readonly ClaimPaymentDetail[];
  trackingEntries: readonly ClaimTrackingEntry[];
  claims: ReadonlyMap<number, Claim>;
  /** Rows emitted by earlier runs. They are carried forward untouched. */
  priorHistory: readonly ClaimSnapshot[];
  runTimestamp: Date;
}

export interface SnapshotHistory {
  history: ClaimSnapshot[];
  appended: ClaimSnapshot[];
}

interface SnapshotCandidate {
  claimSnapshotId: string;
  claimId: number;
  snapshot: SourceClaimSnapshot;
  detail: ClaimDetail;
}

interface PaymentObservation {
  amount: number | null;
  date: Date;
}

const snapshotEntityKey = (snapshot: SourceClaimSnapshot): string =>
  formatEntityKey({
    claim_procedure_id: snapshot.claimProcedureId,
    snapshot_trigger: snapshot.snapshotTrigger,
    entry_timestamp: snapshot.entryTimestamp,
  });

/** Estimate-vs-actual difference; absent when either side is unknown or the sentinel. */
export const variance = (actual: number | null, estimate: number): number | null =>
  actual === null || isSentinelAmount(actual) || isSentinelAmount(estimate) ? null : subtractAmounts(actual, estimate);

/**
 * Whole calendar days from snapshot to payment. A payment dated before the
 * snapshot day counts as 0 and is reported as an anomaly.
 */
export function daysToPayment(
  entryTimestamp: Date,
  paymentDate: Date | null
): { days: number | null; paymentBeforeSnapshot: boolean } {
  if (paymentDate === null) {
    return { days: null, paymentBeforeSnapshot: false };
  }
  const elapsed = Math.round((startOfUtcDay(paymentDate) - startOfUtcDay(entryTimestamp)) / MS_PER_DAY);
  return elapsed < 0 ? { days: 0, paymentBeforeSnapshot: true } : { days: elapsed, paymentBeforeSnapshot: false };
}

const byHistoryOrder = (a: ClaimSnapshot, b: ClaimSnapshot): number =>
  compareDates(a.entryTimestamp, b.entryTimestamp) ||
  a.claimProcedureId - b.claimProcedureId ||
  (a.claimSnapshotId < b.claimSnapshotId ? -1 : a.claimSnapshotId > b.claimSnapshotId ? 1 : 0);

@Injectable()
export class SnapshotTracker {
  private readonly logger: Logger;

  constructor(
    @Inject(RECONCILIATION_CONFIG) config: ReconciliationConfig,
    private readonly deduplicator: Deduplicator
  ) {
    this.logger = createReconciliationLogger(config, 'snapshot-tracker');
  }

  track(input: SnapshotTrackingInput): StageResult<SnapshotHistory> {
    const collector = new ViolationCollector();

    const candidates = this.joinSnapshots(input.snapshots, input.claimDetails, collector);
    const collapsed = this.deduplicator.collapse(
      candidates,
      (candidate) => candidate.claimSnapshotId,
      lowestClaimIdPolicy<SnapshotCandidate>(),
      collector
    );
    for (const group of collapsed.duplicateGroups) {
      collector.raise(
        RULES.snapshotKeyCollision,
        snapshotEntityKey(group.retained.snapshot),
        `Snapshot id ${group.key} derived for ${group.discarded.length + 1} source rows; kept claim ${group.retained.claimId}, ` +
          `discarded claim(s) ${group.discarded.map((candidate) => candidate.claimId).join(', ')}`
      );
    }

    const trackingByClaim = this.groupTracking(input.trackingEntries, input.claims, collector);
    const latestPayments = this.latestPayments(input.claimPaymentDetails);

    const priorIds = new Set(input.priorHistory.map((row) => row.claimSnapshotId));
    const appended = collapsed.retained
      .filter((candidate) => !priorIds.has(candidate.claimSnapshotId))
      .map((candidate) => this.toSnapshot(candidate, trackingByClaim, latestPayments, input.runTimestamp))
      .sort(byHistoryOrder);

    this.logger.info('Tracked claim snapshots', {
      sourceSnapshots: input.snapshots.length,
      joined: candidates.length,
      collisions: collapsed.duplicateGroups.length,
      priorHistory: input.priorHistory.length,
      appended: appended.length,
    });

    return {
      output: { history: [...input.priorHistory, ...appended], appended },
      violations: collector.violations,
    };
  }

  private joinSnapshots(
    snapshots: readonly SourceClaimSnapshot[],
    claimDetails: readonly ClaimDetail[],
    collector: ViolationCollector
  ): SnapshotCandidate[] {
    const detailsByClaimProcedure = new Map<number, ClaimDetail[]>();
    for (const detail of claimDetails) {
      const group = detailsByClaimProcedure.get(detail.claimProcedureId) ?? [];
      group.push(detail);
      detailsByClaimProcedure.set(detail.claimProcedureId, group);
    }

    const candidates: SnapshotCandidate[] = [];
    for (const snapshot of snapshots) {
      const details = detailsByClaimProcedure.get(snapshot.claimProcedureId) ?? [];
      if (details.length === 0) {
        collector.raise(
          RULES.snapshotProcedureMissing,
          snapshotEntityKey(snapshot),
          `No claim procedure ${snapshot.claimProcedureId} in the ledger; snapshot not recorded`
        );
        continue;
      }

      let claimSnapshotId: string;
      try {
        claimSnapshotId = claimSnapshotKey(snapshot);
      } catch (error) {
        if (error instanceof MissingKeyComponentError) {
          collector.raise(RULES.missingKeyComponent, snapshotEntityKey(snapshot), error.message);
          continue;
        }
        throw error;
      }

      for (const detail of details) {
        candidates.push({ claimSnapshotId, claimId: detail.claimId, snapshot, detail });
      }
    }
    return candidates;
  }

  private groupTracking(
    entries: readonly ClaimTrackingEntry[],
    claims: ReadonlyMap<number, Claim>,
    collector: ViolationCollector
  ): Map<number, ClaimTrackingEntry[]> {
    const byClaim = new Map<number, ClaimTrackingEntry[]>();
    for (const entry of entries) {
      if (!claims.has(entry.claimId)) {
        collector.raise(
          RULES.trackingClaimMissing,
          formatEntityKey({ claim_tracking_id: entry.claimTrackingId, claim_id: entry.claimId }),
          `Tracking entry references unknown claim ${entry.claimId}`
        );
      }
      const group = byClaim.get(entry.claimId) ?? [];
      group.push(entry);
      byClaim.set(entry.claimId, group);
    }
    return byClaim;
  }

  /** Latest-dated payment per (claim, procedure); later payment ids win ties. */
  private latestPayments(rows: readonly ClaimPaymentDetail[]): Map<string, PaymentObservation> {
    const latest = new Map<string, { observation: PaymentObservation; paymentId: number }>();
    for (const row of rows) {
      if (row.checkDate === null || row.claimPaymentId === null) continue;
      const key = `${row.claimId}:${row.procedureId}`;
      const current = latest.get(key);
      const order = current ? compareDates(row.checkDate, current.observation.date) : 1;
      if (order > 0 || (order === 0 && current !== undefined && row.claimPaymentId > current.paymentId)) {
        latest.set(key, { observation: { amount: row.paidAmount, date: row.checkDate }, paymentId: row.claimPaymentId });
      }
    }
    return new Map([...latest].map(([key, value]) => [key, value.observation] as const));
  }

  private toSnapshot(
    candidate: SnapshotCandidate,
    trackingByClaim: ReadonlyMap<number, ClaimTrackingEntry[]>,
    latestPayments: ReadonlyMap<string, PaymentObservation>,
    runTimestamp: Date
  ): ClaimSnapshot {
    const { snapshot, detail } = candidate;
    const tracking = this.sameDayTracking(trackingByClaim.get(detail.claimId) ?? [], snapshot.entryTimestamp);
    const payment = latestPayments.get(`${detail.claimId}:${detail.procedureId}`) ?? null;
    const timing = daysToPayment(snapshot.entryTimestamp, payment?.date ?? null);

    return {
      claimSnapshotId: candidate.claimSnapshotId,
      claimProcedureId: snapshot.claimProcedureId,
      claimId: detail.claimId,
      procedureId: detail.procedureId,
      patientId: detail.patientId,
      planId: detail.planId,
      snapshotTrigger: snapshot.snapshotTrigger,
      snapshotClaimType: snapshot.claimType,
      estimatedWriteOff: snapshot.estimatedWriteOff,
      insurancePaymentEstimate: snapshot.insurancePaymentEstimate,
      feeAmount: snapshot.feeAmount,
      entryTimestamp: snapshot.entryTimestamp,
      claimTrackingId: tracking?.claimTrackingId ?? null,
      trackingType: tracking?.trackingType ?? null,
      trackingNote: tracking?.note ?? null,
      procedureCode: detail.procedureCode,
      claimType: detail.claimType ?? snapshot.claimType,
      claimStatus: detail.claimStatus,
      actualPaymentAmount: detail.paidAmount,
      actualWriteOff: detail.writeOffAmount,
      actualAllowedAmount: detail.allowedAmount,
      claimProcedureStatus: detail.claimProcedureStatus,
      mostRecentPayment: payment?.amount ?? null,
      mostRecentPaymentDate: payment?.date ?? null,
      paymentVariance: variance(detail.paidAmount, snapshot.insurancePaymentEstimate),
      writeOffVariance: variance(detail.writeOffAmount, snapshot.estimatedWriteOff),
      daysToPayment: timing.days,
      paymentBeforeSnapshot: timing.paymentBeforeSnapshot,
      recordedAt: runTimestamp,
    };
  }

  /** Latest entry on the snapshot's calendar day; higher tracking ids win ties. */
  private sameDayTracking(entries: readonly ClaimTrackingEntry[], at: Date): ClaimTrackingEntry | null {
    return entries
      .filter((entry) => isSameUtcDay(entry.entryTimestamp, at))
      .reduce<ClaimTrackingEntry | null>((best, entry) => {
        if (best === null) return entry;
        const order = compareDates(entry.entryTimestamp, best.entryTimestamp);
        return order > 0 || (order === 0 && entry.claimTrackingId > best.claimTrackingId) ? entry : best;
      }, null);
  }
}
