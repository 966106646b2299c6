import { loadReconciliationConfig } from '../src/config/reconciliation.config';
import {
  Claim,
  ClaimPayment,
  ClaimProcedure,
  ClaimTrackingEntry,
  CoverageSource,
  ProcedureMetadata,
  SourceClaimSnapshot,
} from '../src/domain/types';
import { NormalizedBatch } from '../src/normalizer/entity-normalizer';
import { RawReconciliationInput } from '../src/normalizer/raw-records';

export const testConfig = loadReconciliationConfig({ LOG_LEVEL: 'silent', NODE_ENV: 'test' });

export const RUN_TIMESTAMP = new Date('2024-04-01T06:00:00.000Z');

export const utc = (value: string): Date => new Date(value.endsWith('Z') ? value : `${value}Z`);

export const buildClaim = (overrides: Partial<Claim> = {}): Claim => ({
  claimId: 100,
  patientId: 10,
  planId: 500,
  status: 'Received',
  type: 'Primary',
  claimDate: utc('2024-02-01T00:00:00'),
  lastTrackingDate: utc('2024-02-15T00:00:00'),
  isVerified: null,
  ...overrides,
});

export const buildClaimProcedure = (overrides: Partial<ClaimProcedure> = {}): ClaimProcedure => ({
  claimId: 100,
  procedureId: 1000,
  claimProcedureId: 5000,
  claimPaymentId: 900,
  billedAmount: 200,
  allowedAmount: 150,
  paidAmount: 100,
  writeOffAmount: 50,
  patientResponsibility: 30,
  procedureStatus: 'Received',
  patientId: null,
  planId: null,
  procedureDate: null,
  ...overrides,
});

export const buildClaimPayment = (overrides: Partial<ClaimPayment> = {}): ClaimPayment => ({
  claimPaymentId: 900,
  checkAmount: 100,
  checkDate: utc('2024-03-15T00:00:00'),
  paymentType: 'Check',
  isPartial: false,
  createdAt: utc('2024-03-15T08:00:00'),
  ...overrides,
});

export const buildCoverageSource = (overrides: Partial<CoverageSource> = {}): CoverageSource => ({
  patientId: 10,
  planId: 500,
  carrierId: 70,
  subscriberId: 80,
  carrierName: 'Placeholder Dental Mutual',
  planType: 'PPO',
  groupNumber: 'GRP-1',
  groupName: 'Test Group',
  verificationDate: utc('2024-01-05T00:00:00'),
  isPending: false,
  createdAt: utc('2023-06-01T00:00:00'),
  updatedAt: utc('2024-01-05T00:00:00'),
  benefitDetails: null,
  ordinal: 1,
  ...overrides,
});

export const buildTrackingEntry = (overrides: Partial<ClaimTrackingEntry> = {}): ClaimTrackingEntry => ({
  claimTrackingId: 7000,
  claimId: 100,
  trackingType: 'StatusChange',
  entryTimestamp: utc('2024-03-10T09:30:00'),
  note: 'Sent to carrier',
  ...overrides,
});

export const buildSourceSnapshot = (overrides: Partial<SourceClaimSnapshot> = {}): SourceClaimSnapshot => ({
  claimProcedureId: 5000,
  snapshotTrigger: 'Initial',
  estimatedWriteOff: 40,
  insurancePaymentEstimate: 120,
  feeAmount: 200,
  entryTimestamp: utc('2024-03-10T00:00:00'),
  claimType: null,
  sourceSnapshotId: null,
  ...overrides,
});

export const buildProcedureMetadata = (overrides: Partial<ProcedureMetadata> = {}): ProcedureMetadata => ({
  procedureId: 1000,
  procedureCode: 'D1110',
  description: 'Prophylaxis - adult',
  providerId: 3,
  isRadiology: false,
  noBillInsurance: false,
  procedureDate: utc('2024-02-01T00:00:00'),
  ...overrides,
});

/** One clean Primary claim with a single paid procedure, in source shape. */
export const buildRawInput = (overrides: Partial<RawReconciliationInput> = {}): RawReconciliationInput => ({
  claims: [
    {
      claim_id: 100,
      patient_id: 10,
      plan_id: 500,
      status: 'R',
      type: 'P',
      claim_date: '2024-02-01',
      last_tracking_date: '2024-02-15 00:00:00',
    },
  ],
  claim_procedures: [
    {
      claim_id: 100,
      procedure_id: 1000,
      claim_procedure_id: 5000,
      claim_payment_id: 900,
      billed_amount: '200.00',
      allowed_amount: '150.00',
      paid_amount: '100.00',
      write_off_amount: '50.00',
      patient_responsibility: '30.00',
      procedure_status: 'Received',
    },
  ],
  claim_payments: [
    {
      claim_payment_id: 900,
      check_amount: '100.00',
      check_date: '2024-03-15',
      payment_type: 'Check',
      is_partial: 0,
    },
  ],
  coverage: [
    {
      patient_id: 10,
      plan_id: 500,
      carrier_id: 70,
      subscriber_id: 80,
      plan_type: 'PPO',
      group_number: 'GRP-1',
      group_name: 'Test Group',
      verification_date: '2024-01-05',
      created_at: '2023-06-01 00:00:00',
      updated_at: '2024-01-05 00:00:00',
    },
  ],
  tracking_entries: [
    {
      claim_tracking_id: 7000,
      claim_id: 100,
      tracking_type: 'StatusHistory',
      entry_timestamp: '2024-03-10 09:30:00',
      note: ' Sent to carrier ',
    },
  ],
  claim_snapshots: [
    {
      claim_procedure_id: 5000,
      snapshot_trigger: 'initial',
      estimated_write_off: '40.00',
      insurance_payment_estimate: '120.00',
      fee_amount: '200.00',
      entry_timestamp: '2024-03-10 00:00:00',
    },
  ],
  ...overrides,
});

export const buildBatch = (overrides: Partial<NormalizedBatch> = {}): NormalizedBatch => ({
  claims: [buildClaim()],
  claimProcedures: [buildClaimProcedure()],
  claimPayments: [buildClaimPayment()],
  coverage: [buildCoverageSource()],
  trackingEntries: [buildTrackingEntry()],
  claimSnapshots: [buildSourceSnapshot()],
  procedures: [buildProcedureMetadata()],
  carriers: null,
  subscribers: null,
  eobAttachments: [],
  ...overrides,
});
