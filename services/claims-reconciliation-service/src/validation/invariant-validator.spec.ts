import {
  buildBatch,
  buildClaim,
  buildClaimProcedure,
  buildCoverageSource,
  RUN_TIMESTAMP,
  testConfig,
  utc,
} from '../../test/fixtures';
import { CoverageResolver } from '../coverage/coverage-resolver';
import { Deduplicator } from '../dedup/deduplicator';
import { ClaimDetail, ClaimPaymentDetail, ClaimSnapshot, InsuranceCoverage } from '../domain/types';
import { ClaimLedgerBuilder } from '../ledger/claim-ledger.builder';
import { NormalizedBatch } from '../normalizer/entity-normalizer';
import { SnapshotTracker } from '../snapshots/snapshot-tracker';
import { InvariantValidator, ValidationInput } from './invariant-validator';

describe('InvariantValidator', () => {
  const deduplicator = new Deduplicator();
  const resolver = new CoverageResolver(testConfig);
  const builder = new ClaimLedgerBuilder(testConfig, deduplicator);
  const tracker = new SnapshotTracker(testConfig, deduplicator);
  const validator = new InvariantValidator(testConfig);

  const outputsFor = (batch: NormalizedBatch): ValidationInput => {
    const coverage = resolver.buildCoverage(batch.coverage, batch).output;
    const ledgers = builder.build(batch, coverage, RUN_TIMESTAMP).output;
    const snapshots = tracker.track({
      snapshots: batch.claimSnapshots,
      claimDetails: ledgers.claimDetails,
      claimPaymentDetails: ledgers.claimPaymentDetails,
      trackingEntries: batch.trackingEntries,
      claims: ledgers.claims,
      priorHistory: [],
      runTimestamp: RUN_TIMESTAMP,
    }).output;
    return {
      claimDetails: ledgers.claimDetails,
      claimPaymentDetails: ledgers.claimPaymentDetails,
      snapshotHistory: snapshots.history,
      coverages: coverage.coverages,
    };
  };

  const clean = outputsFor(buildBatch());
  const detail = (overrides: Partial<ClaimDetail>): ClaimDetail => ({ ...clean.claimDetails[0], ...overrides });
  const paymentDetail = (overrides: Partial<ClaimPaymentDetail>): ClaimPaymentDetail => ({
    ...clean.claimPaymentDetails[0],
    ...overrides,
  });
  const snapshot = (overrides: Partial<ClaimSnapshot>): ClaimSnapshot => ({ ...clean.snapshotHistory[0], ...overrides });
  const coverage = (overrides: Partial<InsuranceCoverage>): InsuranceCoverage => ({ ...clean.coverages[0], ...overrides });
  const only = (input: Partial<ValidationInput>): ValidationInput => ({
    claimDetails: [],
    claimPaymentDetails: [],
    snapshotHistory: [],
    coverages: [],
    ...input,
  });
  const ruleIds = (input: ValidationInput): string[] => validator.validate(input).map((violation) => violation.ruleId);

  it('accepts clean outputs', () => {
    expect(validator.validate(clean)).toEqual([]);
  });

  describe('primary claim coverage', () => {
    it('raises exactly one error for a verified, non-held Primary claim without a plan', () => {
      const outputs = outputsFor(buildBatch({ claims: [buildClaim({ planId: null, isVerified: true })] }));

      expect(outputs.claimDetails).toHaveLength(1);
      expect(validator.validate(outputs)).toEqual([
        {
          ruleId: 'primary_claim_missing_insurance_plan',
          category: 'ReferentialIntegrityError',
          severity: 'error',
          entityKey: 'claim_id=100',
          message: 'Verified Received Primary claim has no resolvable insurance plan (plan_id=null)',
        },
      ]);
    });

    it('raises when the claim plan is covered only for another patient', () => {
      const outputs = outputsFor(
        buildBatch({
          claims: [buildClaim({ patientId: 20, isVerified: true })],
          coverage: [buildCoverageSource({ patientId: 10, planId: 500 })],
        })
      );

      expect(validator.validate(outputs)).toEqual([
        {
          ruleId: 'primary_claim_missing_insurance_plan',
          category: 'ReferentialIntegrityError',
          severity: 'error',
          entityKey: 'claim_id=100',
          message: 'Verified Received Primary claim has no resolvable insurance plan (plan_id=500)',
        },
      ]);
    });

    it('raises once per claim however many procedures it has', () => {
      const outputs = outputsFor(
        buildBatch({
          claims: [buildClaim({ planId: null, isVerified: true })],
          claimProcedures: [buildClaimProcedure(), buildClaimProcedure({ claimProcedureId: 5001 })],
        })
      );

      expect(outputs.claimDetails).toHaveLength(2);
      expect(ruleIds(outputs)).toEqual(['primary_claim_missing_insurance_plan']);
    });

    it('exempts held, unverified and non-primary claims', () => {
      expect(ruleIds(only({ claimDetails: [detail({ insurancePlanId: null, claimStatus: 'Waiting' })] }))).toEqual([]);
      expect(ruleIds(only({ claimDetails: [detail({ insurancePlanId: null, claimVerified: false })] }))).toEqual([]);
      expect(ruleIds(only({ claimDetails: [detail({ insurancePlanId: null, claimType: 'Secondary' })] }))).toEqual([]);
    });
  });

  describe('claim detail amounts', () => {
    it('flags billed amounts that do not cover the splits', () => {
      const violations = validator.validate(
        only({ claimDetails: [detail({ billedAmount: 100, paidAmount: 80, writeOffAmount: 30, patientResponsibility: 0 })] })
      );

      expect(violations).toEqual([
        {
          ruleId: 'inconsistent_financial_totals',
          category: 'FinancialReconciliationError',
          severity: 'error',
          entityKey: 'claim_id=100|procedure_id=1000|claim_procedure_id=5000',
          message: 'Billed 100.00 is less than paid + write-off + patient responsibility 110.00',
        },
      ]);
    });

    it('skips the totals check when a split is the sentinel', () => {
      const violations = validator.validate(
        only({ claimDetails: [detail({ billedAmount: 100, paidAmount: -1, writeOffAmount: 300 })] })
      );

      expect(violations.map((violation) => [violation.ruleId, violation.message])).toEqual([
        ['sentinel_amount', 'Amount not yet determined: paid_amount'],
      ]);
    });

    it('flags suspected decimal placement and zero-billed allowances', () => {
      const splitsCleared = { paidAmount: null, writeOffAmount: null, patientResponsibility: null };

      expect(ruleIds(only({ claimDetails: [detail({ ...splitsCleared, billedAmount: 10, allowedAmount: 150 })] }))).toEqual([
        'decimal_point_error',
      ]);
      expect(ruleIds(only({ claimDetails: [detail({ ...splitsCleared, billedAmount: 0, allowedAmount: 5 })] }))).toEqual([
        'zero_billed_with_nonzero_allowed',
      ]);
    });

    it('bounds amounts, letting paid amounts go negative', () => {
      const violations = validator.validate(
        only({ claimDetails: [detail({ billedAmount: 20000, paidAmount: -50, writeOffAmount: -5 })] })
      );

      expect(violations.map((violation) => violation.message)).toEqual([
        'billed_amount 20000.00 outside 0.00..10000.00',
        'write_off_amount -5.00 outside 0.00..10000.00',
      ]);
    });

    it('flags implausible dates and radiology billed as no-bill', () => {
      const violations = validator.validate(
        only({
          claimDetails: [
            detail({ claimDate: utc('2019-12-31T00:00:00'), isRadiology: true, noBillInsurance: true, procedureCode: 'D0210' }),
          ],
        })
      );

      expect(violations.map((violation) => violation.message)).toEqual([
        'Radiology procedure D0210 is flagged do-not-bill-insurance',
        'claim_date 2019-12-31 outside 2020-01-01..2030-12-31',
      ]);
    });

    it('keeps the last valid day in range', () => {
      expect(ruleIds(only({ claimDetails: [detail({ claimDate: utc('2030-12-31T18:00:00') })] }))).toEqual([]);
    });
  });

  it('requires check fields on joined payments only', () => {
    expect(
      ruleIds(only({ claimPaymentDetails: [paymentDetail({ checkAmount: null, checkDate: null, paymentType: null })] }))
    ).toEqual(['missing_check_amount', 'missing_check_date', 'missing_payment_type']);
    expect(
      ruleIds(
        only({
          claimPaymentDetails: [
            paymentDetail({ claimPaymentId: null, checkAmount: null, checkDate: null, paymentType: null, isPartial: null }),
          ],
        })
      )
    ).toEqual([]);
  });

  it('checks coverage flag consistency', () => {
    expect(ruleIds(only({ coverages: [coverage({ terminationDate: utc('2024-02-01T00:00:00') })] }))).toEqual([
      'coverage_terminated_but_active',
    ]);
    expect(ruleIds(only({ coverages: [coverage({ verificationDate: null })] }))).toEqual([
      'coverage_active_without_verification',
    ]);
    expect(ruleIds(only({ coverages: [coverage({ carrierId: -1 })] }))).toEqual(['coverage_inconsistent_incomplete_flag']);
    expect(ruleIds(only({ coverages: [coverage({ carrierId: -1, subscriberId: -1, isIncompleteRecord: true })] }))).toEqual(
      []
    );
  });

  it('checks snapshot timing', () => {
    const violations = validator.validate(
      only({
        snapshotHistory: [
          snapshot({ daysToPayment: 400 }),
          snapshot({
            claimSnapshotId: 'second',
            daysToPayment: 0,
            paymentBeforeSnapshot: true,
            mostRecentPaymentDate: utc('2024-03-08T00:00:00'),
          }),
        ],
      })
    );

    expect(violations.map((violation) => [violation.ruleId, violation.message])).toEqual([
      ['days_to_payment_out_of_range', '400 days to payment exceeds 365'],
      ['payment_before_snapshot', 'Most recent payment 2024-03-08 precedes snapshot 2024-03-10'],
    ]);
  });

  it('reports duplicate identifiers', () => {
    const violations = validator.validate(
      only({ claimDetails: [clean.claimDetails[0], clean.claimDetails[0]], snapshotHistory: [snapshot({}), snapshot({})] })
    );

    expect(violations.filter((violation) => violation.category === 'DeduplicationError').map((v) => v.ruleId)).toEqual([
      'duplicate_claim_detail_id',
      'duplicate_claim_snapshot_id',
    ]);
    expect(violations[0].message).toBe(`claim_detail_id ${clean.claimDetails[0].claimDetailId} appears 2 times`);
  });
});
