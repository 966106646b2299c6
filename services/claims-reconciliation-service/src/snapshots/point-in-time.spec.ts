import { RUN_TIMESTAMP, utc } from '../../test/fixtures';
import { ClaimSnapshot, InsuranceCoverage } from '../domain/types';
import { coverageAsOf, isCoverageEffectiveOn, snapshotsAsOf } from './point-in-time';

const snapshotRow = (overrides: Partial<ClaimSnapshot>): ClaimSnapshot => ({
  claimSnapshotId: 'snap-a',
  claimProcedureId: 5000,
  claimId: 100,
  procedureId: 1000,
  patientId: 10,
  planId: 500,
  snapshotTrigger: 'Initial',
  snapshotClaimType: null,
  estimatedWriteOff: 40,
  insurancePaymentEstimate: 120,
  feeAmount: 200,
  entryTimestamp: utc('2024-03-10T00:00:00'),
  claimTrackingId: null,
  trackingType: null,
  trackingNote: null,
  procedureCode: 'D1110',
  claimType: 'Primary',
  claimStatus: 'Received',
  actualPaymentAmount: 100,
  actualWriteOff: 50,
  actualAllowedAmount: 150,
  claimProcedureStatus: 'Received',
  mostRecentPayment: null,
  mostRecentPaymentDate: null,
  paymentVariance: -20,
  writeOffVariance: 10,
  daysToPayment: null,
  paymentBeforeSnapshot: false,
  recordedAt: RUN_TIMESTAMP,
  ...overrides,
});

const coverageRow = (overrides: Partial<InsuranceCoverage>): InsuranceCoverage => ({
  insurancePlanId: 500,
  patientId: 10,
  carrierId: 70,
  carrierName: 'Placeholder Dental Mutual',
  subscriberId: 80,
  planType: 'PPO',
  groupNumber: 'GRP-1',
  groupName: 'Test Group',
  verificationDate: utc('2024-01-05T00:00:00'),
  benefitDetails: null,
  isActive: true,
  effectiveDate: utc('2023-06-01T00:00:00'),
  terminationDate: null,
  isIncompleteRecord: false,
  ordinal: 1,
  ...overrides,
});

describe('snapshotsAsOf', () => {
  const history = [
    snapshotRow({ claimSnapshotId: 'snap-a' }),
    snapshotRow({ claimSnapshotId: 'snap-b', snapshotTrigger: 'Payment', entryTimestamp: utc('2024-03-15T00:00:00') }),
    snapshotRow({ claimSnapshotId: 'snap-c', claimProcedureId: 4000, claimId: 90, entryTimestamp: utc('2024-03-01T00:00:00') }),
  ];

  it('returns the latest row per claim procedure at or before the date', () => {
    expect(snapshotsAsOf(history, utc('2024-03-12T00:00:00')).map((row) => row.claimSnapshotId)).toEqual([
      'snap-c',
      'snap-a',
    ]);
    expect(snapshotsAsOf(history, utc('2024-03-15T00:00:00')).map((row) => row.claimSnapshotId)).toEqual([
      'snap-c',
      'snap-b',
    ]);
  });

  it('knows nothing before the first snapshot', () => {
    expect(snapshotsAsOf(history, utc('2024-02-28T00:00:00'))).toEqual([]);
  });

  it('narrows to one claim or claim procedure', () => {
    expect(snapshotsAsOf(history, RUN_TIMESTAMP, { claimId: 90 }).map((row) => row.claimSnapshotId)).toEqual(['snap-c']);
    expect(
      snapshotsAsOf(history, RUN_TIMESTAMP, { claimProcedureId: 5000 }).map((row) => row.claimSnapshotId)
    ).toEqual(['snap-b']);
  });

  it('breaks same-timestamp ties toward the higher snapshot id', () => {
    const tied = [snapshotRow({ claimSnapshotId: 'snap-z' }), snapshotRow({ claimSnapshotId: 'snap-y' })];

    expect(snapshotsAsOf(tied, RUN_TIMESTAMP).map((row) => row.claimSnapshotId)).toEqual(['snap-z']);
  });
});

describe('coverage effective dating', () => {
  const terminated = coverageRow({ isActive: false, terminationDate: utc('2024-01-01T00:00:00') });

  it('includes the effective date and excludes the termination date', () => {
    expect(isCoverageEffectiveOn(terminated, utc('2023-06-01T00:00:00'))).toBe(true);
    expect(isCoverageEffectiveOn(terminated, utc('2023-12-31T23:59:59'))).toBe(true);
    expect(isCoverageEffectiveOn(terminated, utc('2024-01-01T00:00:00'))).toBe(false);
    expect(isCoverageEffectiveOn(terminated, utc('2023-05-31T00:00:00'))).toBe(false);
  });

  it('treats a missing termination date as open-ended', () => {
    expect(isCoverageEffectiveOn(coverageRow({}), utc('2030-01-01T00:00:00'))).toBe(true);
  });

  it('lists the patient coverage in force on a date by ordinal', () => {
    const coverages = [
      coverageRow({ insurancePlanId: 502, ordinal: 2 }),
      coverageRow({ insurancePlanId: 501, ordinal: null }),
      coverageRow({ insurancePlanId: 500, ordinal: 1 }),
      coverageRow({ insurancePlanId: 600, patientId: 11 }),
      { ...terminated, insurancePlanId: 499 },
    ];

    expect(coverageAsOf(coverages, 10, utc('2024-02-01T00:00:00')).map((c) => c.insurancePlanId)).toEqual([
      500, 502, 501,
    ]);
    expect(coverageAsOf(coverages, 10, utc('2023-07-01T00:00:00')).map((c) => c.insurancePlanId)).toEqual([
      499, 500, 502, 501,
    ]);
  });
});
