import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { isWithinRange, startOfUtcDay, toIsoDate } from '../domain/dates';
import { compareAmounts, formatAmount, isSentinelAmount, sumAmounts } from '../domain/money';
import { RuleDefinition, RULES } from '../domain/rules';
import {
  ClaimDetail,
  ClaimPaymentDetail,
  ClaimSnapshot,
  InsuranceCoverage,
  isHeldStatus,
  requiresInsurancePlan,
  UNRESOLVED_REFERENCE_ID,
} from '../domain/types';
import { formatEntityKey, Violation, ViolationCollector } from '../domain/violations';

export interface ValidationInput {
  claimDetails: readonly ClaimDetail[];
  claimPaymentDetails: readonly ClaimPaymentDetail[];
  snapshotHistory: readonly ClaimSnapshot[];
  coverages: readonly InsuranceCoverage[];
}

type AmountFields = Record<string, number | null>;

const detailKey = (row: ClaimDetail): string =>
  formatEntityKey({ claim_id: row.claimId, procedure_id: row.procedureId, claim_procedure_id: row.claimProcedureId });

const paymentDetailKey = (row: ClaimPaymentDetail): string =>
  formatEntityKey({
    claim_id: row.claimId,
    procedure_id: row.procedureId,
    claim_procedure_id: row.claimProcedureId,
    claim_payment_id: row.claimPaymentId,
  });

const snapshotKey = (row: ClaimSnapshot): string => formatEntityKey({ claim_snapshot_id: row.claimSnapshotId });

@Injectable()
export class InvariantValidator {
  private readonly logger: Logger;

  constructor(@Inject(RECONCILIATION_CONFIG) private readonly config: ReconciliationConfig) {
    this.logger = createReconciliationLogger(config, 'invariant-validator');
  }

  validate(input: ValidationInput): Violation[] {
    const collector = new ViolationCollector();

    this.checkUniqueness(input, collector);
    for (const row of input.claimDetails) {
      this.checkClaimDetail(row, collector);
    }
    this.checkPrimaryClaimCoverage(input.claimDetails, collector);
    for (const row of input.claimPaymentDetails) {
      this.checkPaymentDetail(row, collector);
    }
    for (const coverage of input.coverages) {
      this.checkCoverage(coverage, collector);
    }
    for (const row of input.snapshotHistory) {
      this.checkSnapshot(row, collector);
    }

    this.logger.info('Validated reconciliation outputs', {
      claimDetails: input.claimDetails.length,
      claimPaymentDetails: input.claimPaymentDetails.length,
      snapshots: input.snapshotHistory.length,
      coverages: input.coverages.length,
      violations: collector.size,
    });

    return collector.violations;
  }

  private checkUniqueness(input: ValidationInput, collector: ViolationCollector): void {
    const reportDuplicates = (ids: readonly string[], rule: RuleDefinition, name: string): void => {
      const seen = new Map<string, number>();
      for (const id of ids) {
        seen.set(id, (seen.get(id) ?? 0) + 1);
      }
      for (const [id, count] of seen) {
        if (count > 1) {
          collector.raise(rule, formatEntityKey({ [name]: id }), `${name} ${id} appears ${count} times`);
        }
      }
    };

    reportDuplicates(
      input.claimDetails.map((row) => row.claimDetailId),
      RULES.duplicateClaimDetailId,
      'claim_detail_id'
    );
    reportDuplicates(
      input.claimPaymentDetails.map((row) => row.claimPaymentDetailId),
      RULES.duplicateClaimPaymentDetailId,
      'claim_payment_detail_id'
    );
    reportDuplicates(
      input.snapshotHistory.map((row) => row.claimSnapshotId),
      RULES.duplicateClaimSnapshotId,
      'claim_snapshot_id'
    );
  }

  private checkClaimDetail(row: ClaimDetail, collector: ViolationCollector): void {
    const key = detailKey(row);
    const amounts: AmountFields = {
      billed_amount: row.billedAmount,
      allowed_amount: row.allowedAmount,
      paid_amount: row.paidAmount,
      write_off_amount: row.writeOffAmount,
      patient_responsibility: row.patientResponsibility,
    };

    const sentinels = Object.entries(amounts)
      .filter(([, value]) => isSentinelAmount(value))
      .map(([name]) => name);
    if (sentinels.length > 0) {
      collector.raise(RULES.sentinelAmount, key, `Amount not yet determined: ${sentinels.join(', ')}`);
    }

    this.checkAmountRanges(amounts, key, collector);

    const splits = [row.paidAmount, row.writeOffAmount, row.patientResponsibility];
    if (![row.billedAmount, ...splits].some(isSentinelAmount)) {
      const accounted = sumAmounts(splits.map((value) => value ?? 0));
      if (compareAmounts(row.billedAmount, accounted) < 0) {
        collector.raise(
          RULES.inconsistentFinancialTotals,
          key,
          `Billed ${formatAmount(row.billedAmount)} is less than paid + write-off + patient responsibility ${formatAmount(accounted)}`
        );
      }
    }

    const allowed = row.allowedAmount;
    if (allowed !== null && !isSentinelAmount(allowed)) {
      if (row.billedAmount > 0 && compareAmounts(allowed, row.billedAmount * this.config.decimalErrorFactor) > 0) {
        collector.raise(
          RULES.decimalPointError,
          key,
          `Allowed ${formatAmount(allowed)} exceeds ${this.config.decimalErrorFactor}x billed ${formatAmount(row.billedAmount)}`
        );
      }
      if (compareAmounts(row.billedAmount, 0) === 0 && compareAmounts(allowed, 0) !== 0) {
        collector.raise(RULES.zeroBilledWithNonzeroAllowed, key, `Nothing billed but ${formatAmount(allowed)} allowed`);
      }
    }

    if (row.isRadiology === true && row.noBillInsurance === true) {
      collector.raise(
        RULES.radiologyNoBillConflict,
        key,
        `Radiology procedure ${row.procedureCode ?? 'unknown'} is flagged do-not-bill-insurance`
      );
    }

    this.checkDate(row.claimDate, 'claim_date', key, collector);
  }

  /** One violation per claim: a verified, non-held Primary claim must carry an insurance plan. */
  private checkPrimaryClaimCoverage(rows: readonly ClaimDetail[], collector: ViolationCollector): void {
    const flagged = new Set<number>();
    for (const row of rows) {
      if (flagged.has(row.claimId)) continue;
      if (row.claimType === null || row.claimStatus === null) continue;
      if (!requiresInsurancePlan(row.claimType) || isHeldStatus(row.claimStatus) || !row.claimVerified) continue;
      if (row.insurancePlanId !== null) continue;

      flagged.add(row.claimId);
      collector.raise(
        RULES.primaryClaimMissingInsurancePlan,
        formatEntityKey({ claim_id: row.claimId }),
        `Verified ${row.claimStatus} Primary claim has no resolvable insurance plan (plan_id=${row.planId ?? 'null'})`
      );
    }
  }

  private checkPaymentDetail(row: ClaimPaymentDetail, collector: ViolationCollector): void {
    // rows without a joined payment are valid unpaid state
    if (row.isPartial === null) return;
    const key = paymentDetailKey(row);

    if (row.checkAmount === null) {
      collector.raise(RULES.missingCheckAmount, key, 'Payment has no check amount');
    }
    if (row.checkDate === null) {
      collector.raise(RULES.missingCheckDate, key, 'Payment has no check date');
    }
    if (row.paymentType === null) {
      collector.raise(RULES.missingPaymentType, key, 'Payment has no payment type');
    }

    this.checkAmountRanges({ check_amount: row.checkAmount }, key, collector);
    this.checkDate(row.checkDate, 'check_date', key, collector);
  }

  private checkCoverage(coverage: InsuranceCoverage, collector: ViolationCollector): void {
    const key = formatEntityKey({ insurance_plan_id: coverage.insurancePlanId });

    if (coverage.isActive && coverage.terminationDate !== null) {
      collector.raise(
        RULES.coverageTerminatedButActive,
        key,
        `Coverage is active but terminated on ${toIsoDate(coverage.terminationDate)}`
      );
    }
    if (coverage.isActive && coverage.verificationDate === null) {
      collector.raise(RULES.coverageActiveWithoutVerification, key, 'Coverage is active without a verification date');
    }

    const hasSentinel =
      coverage.carrierId === UNRESOLVED_REFERENCE_ID || coverage.subscriberId === UNRESOLVED_REFERENCE_ID;
    if (coverage.isIncompleteRecord !== hasSentinel) {
      collector.raise(
        RULES.coverageInconsistentIncompleteFlag,
        key,
        `is_incomplete_record=${coverage.isIncompleteRecord} but carrier_id=${coverage.carrierId}, subscriber_id=${coverage.subscriberId}`
      );
    }
  }

  private checkSnapshot(row: ClaimSnapshot, collector: ViolationCollector): void {
    const key = snapshotKey(row);
    const estimates: AmountFields = {
      estimated_write_off: row.estimatedWriteOff,
      insurance_payment_estimate: row.insurancePaymentEstimate,
      fee_amount: row.feeAmount,
    };

    const sentinels = Object.entries(estimates)
      .filter(([, value]) => isSentinelAmount(value))
      .map(([name]) => name);
    if (sentinels.length > 0) {
      collector.raise(RULES.sentinelAmount, key, `Amount not yet determined: ${sentinels.join(', ')}`);
    }
    this.checkAmountRanges(estimates, key, collector);
    this.checkDate(row.entryTimestamp, 'entry_timestamp', key, collector);

    if (row.paymentBeforeSnapshot) {
      collector.raise(
        RULES.paymentBeforeSnapshot,
        key,
        `Most recent payment ${row.mostRecentPaymentDate ? toIsoDate(row.mostRecentPaymentDate) : 'unknown'} precedes snapshot ${toIsoDate(row.entryTimestamp)}`
      );
    }
    if (row.daysToPayment !== null && row.daysToPayment > this.config.maxDaysToPayment) {
      collector.raise(
        RULES.daysToPaymentOutOfRange,
        key,
        `${row.daysToPayment} days to payment exceeds ${this.config.maxDaysToPayment}`
      );
    }
  }

  /** Paid and check amounts may be negative (reversals); everything else is 0..limit. */
  private checkAmountRanges(amounts: AmountFields, key: string, collector: ViolationCollector): void {
    const limit = this.config.amountLimit;
    for (const [name, value] of Object.entries(amounts)) {
      if (value === null || isSentinelAmount(value)) continue;
      const floor = name === 'paid_amount' || name === 'check_amount' ? -limit : 0;
      if (compareAmounts(value, floor) < 0 || compareAmounts(value, limit) > 0) {
        collector.raise(
          RULES.amountOutOfRange,
          key,
          `${name} ${formatAmount(value)} outside ${formatAmount(floor)}..${formatAmount(limit)}`
        );
      }
    }
  }

  private checkDate(date: Date | null, name: string, key: string, collector: ViolationCollector): void {
    if (date === null || isWithinRange(new Date(startOfUtcDay(date)), this.config.validDateRange)) return;
    collector.raise(
      RULES.dateOutOfRange,
      key,
      `${name} ${toIsoDate(date)} outside ${toIsoDate(this.config.validDateRange.min)}..${toIsoDate(this.config.validDateRange.max)}`
    );
  }
}
