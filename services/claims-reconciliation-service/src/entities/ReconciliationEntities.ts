import { Entity, PrimaryColumn, Column, Index, ValueTransformer } from 'typeorm';
import {
  ClaimDetail,
  ClaimPaymentDetail,
  ClaimSnapshot,
  ClaimStatus,
  ClaimType,
  SnapshotTrigger,
  TrackingType,
} from '../domain/types';
import { Severity, Violation, ViolationCategory } from '../domain/violations';

// pg hands numeric columns back as strings
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : Number(value)),
};

const money = { type: 'numeric', precision: 12, scale: 2, transformer: numericTransformer } as const;

@Entity('claim_details')
@Index(['claimId', 'procedureId', 'claimProcedureId'])
@Index(['patientId'])
export class ClaimDetailRecord implements ClaimDetail {
  @PrimaryColumn({ name: 'claim_detail_id', type: 'uuid' })
  claimDetailId!: string;

  @Column({ name: 'claim_id', type: 'integer' })
  claimId!: number;

  @Column({ name: 'procedure_id', type: 'integer' })
  procedureId!: number;

  @Column({ name: 'claim_procedure_id', type: 'integer' })
  claimProcedureId!: number;

  @Column({ name: 'claim_payment_id', type: 'integer', nullable: true })
  claimPaymentId!: number | null;

  @Column({ name: 'patient_id', type: 'integer', nullable: true })
  patientId!: number | null;

  @Column({ name: 'plan_id', type: 'integer', nullable: true })
  planId!: number | null;

  @Column({ name: 'insurance_plan_id', type: 'integer', nullable: true })
  insurancePlanId!: number | null;

  @Column({ name: 'carrier_id', type: 'integer', nullable: true })
  carrierId!: number | null;

  @Column({ name: 'subscriber_id', type: 'integer', nullable: true })
  subscriberId!: number | null;

  @Column({ name: 'provider_id', type: 'integer', nullable: true })
  providerId!: number | null;

  @Column({ name: 'claim_status', type: 'text', nullable: true })
  claimStatus!: ClaimStatus | null;

  @Column({ name: 'claim_type', type: 'text', nullable: true })
  claimType!: ClaimType | null;

  @Column({ name: 'claim_date', type: 'timestamptz', nullable: true })
  claimDate!: Date | null;

  @Column({ name: 'claim_verified', type: 'boolean' })
  claimVerified!: boolean;

  @Column({ name: 'claim_procedure_status', type: 'text' })
  claimProcedureStatus!: string;

  @Column({ name: 'procedure_code', type: 'text', nullable: true })
  procedureCode!: string | null;

  @Column({ name: 'code_prefix', type: 'text', nullable: true })
  codePrefix!: string | null;

  @Column({ name: 'procedure_description', type: 'text', nullable: true })
  procedureDescription!: string | null;

  @Column({ name: 'is_radiology', type: 'boolean', nullable: true })
  isRadiology!: boolean | null;

  @Column({ name: 'no_bill_insurance', type: 'boolean', nullable: true })
  noBillInsurance!: boolean | null;

  @Column({ name: 'billed_amount', ...money })
  billedAmount!: number;

  @Column({ name: 'allowed_amount', nullable: true, ...money })
  allowedAmount!: number | null;

  @Column({ name: 'paid_amount', nullable: true, ...money })
  paidAmount!: number | null;

  @Column({ name: 'write_off_amount', nullable: true, ...money })
  writeOffAmount!: number | null;

  @Column({ name: 'patient_responsibility', nullable: true, ...money })
  patientResponsibility!: number | null;

  @Column({ name: 'plan_type', type: 'text', nullable: true })
  planType!: string | null;

  @Column({ name: 'group_number', type: 'text', nullable: true })
  groupNumber!: string | null;

  @Column({ name: 'group_name', type: 'text', nullable: true })
  groupName!: string | null;

  @Column({ name: 'verification_date', type: 'timestamptz', nullable: true })
  verificationDate!: Date | null;

  @Column({ name: 'benefit_details', type: 'jsonb', nullable: true })
  benefitDetails!: unknown;

  @Column({ name: 'verification_status', type: 'boolean', nullable: true })
  verificationStatus!: boolean | null;

  @Column({ name: 'effective_date', type: 'timestamptz', nullable: true })
  effectiveDate!: Date | null;

  @Column({ name: 'termination_date', type: 'timestamptz', nullable: true })
  terminationDate!: Date | null;

  @Column({ name: 'is_incomplete_coverage', type: 'boolean', nullable: true })
  isIncompleteCoverage!: boolean | null;

  @Column({ name: 'created_at', type: 'timestamptz', nullable: true })
  createdAt!: Date | null;

  @Column({ name: 'updated_at', type: 'timestamptz', nullable: true })
  updatedAt!: Date | null;

  @Column({ name: 'transformed_at', type: 'timestamptz' })
  transformedAt!: Date;
}

@Entity('claim_payment_details')
@Index(['claimId', 'procedureId', 'claimProcedureId'])
@Index(['claimPaymentId'])
export class ClaimPaymentDetailRecord implements ClaimPaymentDetail {
  @PrimaryColumn({ name: 'claim_payment_detail_id', type: 'uuid' })
  claimPaymentDetailId!: string;

  @Column({ name: 'claim_id', type: 'integer' })
  claimId!: number;

  @Column({ name: 'procedure_id', type: 'integer' })
  procedureId!: number;

  @Column({ name: 'claim_procedure_id', type: 'integer' })
  claimProcedureId!: number;

  @Column({ name: 'claim_payment_id', type: 'integer', nullable: true })
  claimPaymentId!: number | null;

  @Column({ name: 'patient_id', type: 'integer', nullable: true })
  patientId!: number | null;

  @Column({ name: 'billed_amount', ...money })
  billedAmount!: number;

  @Column({ name: 'allowed_amount', nullable: true, ...money })
  allowedAmount!: number | null;

  @Column({ name: 'paid_amount', nullable: true, ...money })
  paidAmount!: number | null;

  @Column({ name: 'write_off_amount', nullable: true, ...money })
  writeOffAmount!: number | null;

  @Column({ name: 'patient_responsibility', nullable: true, ...money })
  patientResponsibility!: number | null;

  @Column({ name: 'check_amount', nullable: true, ...money })
  checkAmount!: number | null;

  @Column({ name: 'check_date', type: 'timestamptz', nullable: true })
  checkDate!: Date | null;

  @Column({ name: 'payment_type', type: 'text', nullable: true })
  paymentType!: string | null;

  @Column({ name: 'is_partial', type: 'boolean', nullable: true })
  isPartial!: boolean | null;

  @Column({ name: 'eob_attachment_count', type: 'integer', default: 0 })
  eobAttachmentCount!: number;

  @Column({ name: 'eob_attachment_ids', type: 'jsonb', default: () => "'[]'" })
  eobAttachmentIds!: number[];

  @Column({ name: 'eob_attachment_file_names', type: 'jsonb', default: () => "'[]'" })
  eobAttachmentFileNames!: string[];

  @Column({ name: 'transformed_at', type: 'timestamptz' })
  transformedAt!: Date;
}

@Entity('claim_snapshots')
@Index(['claimProcedureId', 'entryTimestamp'])
@Index(['claimId'])
export class ClaimSnapshotRecord implements ClaimSnapshot {
  @PrimaryColumn({ name: 'claim_snapshot_id', type: 'uuid' })
  claimSnapshotId!: string;

  @Column({ name: 'claim_procedure_id', type: 'integer' })
  claimProcedureId!: number;

  @Column({ name: 'claim_id', type: 'integer' })
  claimId!: number;

  @Column({ name: 'procedure_id', type: 'integer' })
  procedureId!: number;

  @Column({ name: 'patient_id', type: 'integer', nullable: true })
  patientId!: number | null;

  @Column({ name: 'plan_id', type: 'integer', nullable: true })
  planId!: number | null;

  @Column({ name: 'snapshot_trigger', type: 'text' })
  snapshotTrigger!: SnapshotTrigger;

  @Column({ name: 'snapshot_claim_type', type: 'text', nullable: true })
  snapshotClaimType!: ClaimType | null;

  @Column({ name: 'estimated_write_off', ...money })
  estimatedWriteOff!: number;

  @Column({ name: 'insurance_payment_estimate', ...money })
  insurancePaymentEstimate!: number;

  @Column({ name: 'fee_amount', ...money })
  feeAmount!: number;

  @Column({ name: 'entry_timestamp', type: 'timestamptz' })
  entryTimestamp!: Date;

  @Column({ name: 'claim_tracking_id', type: 'integer', nullable: true })
  claimTrackingId!: number | null;

  @Column({ name: 'tracking_type', type: 'text', nullable: true })
  trackingType!: TrackingType | null;

  @Column({ name: 'tracking_note', type: 'text', nullable: true })
  trackingNote!: string | null;

  @Column({ name: 'procedure_code', type: 'text', nullable: true })
  procedureCode!: string | null;

  @Column({ name: 'claim_type', type: 'text', nullable: true })
  claimType!: ClaimType | null;

  @Column({ name: 'claim_status', type: 'text', nullable: true })
  claimStatus!: ClaimStatus | null;

  @Column({ name: 'actual_payment_amount', nullable: true, ...money })
  actualPaymentAmount!: number | null;

  @Column({ name: 'actual_write_off', nullable: true, ...money })
  actualWriteOff!: number | null;

  @Column({ name: 'actual_allowed_amount', nullable: true, ...money })
  actualAllowedAmount!: number | null;

  @Column({ name: 'claim_procedure_status', type: 'text', nullable: true })
  claimProcedureStatus!: string | null;

  @Column({ name: 'most_recent_payment', nullable: true, ...money })
  mostRecentPayment!: number | null;

  @Column({ name: 'most_recent_payment_date', type: 'timestamptz', nullable: true })
  mostRecentPaymentDate!: Date | null;

  @Column({ name: 'payment_variance', nullable: true, ...money })
  paymentVariance!: number | null;

  @Column({ name: 'write_off_variance', nullable: true, ...money })
  writeOffVariance!: number | null;

  @Column({ name: 'days_to_payment', type: 'integer', nullable: true })
  daysToPayment!: number | null;

  @Column({ name: 'payment_before_snapshot', type: 'boolean', default: false })
  paymentBeforeSnapshot!: boolean;

  @Column({ name: 'recorded_at', type: 'timestamptz' })
  recordedAt!: Date;
}

@Entity('reconciliation_runs')
export class ReconciliationRun {
  @PrimaryColumn({ name: 'run_id', type: 'uuid' })
  runId!: string;

  @Column({ name: 'run_timestamp', type: 'timestamptz' })
  runTimestamp!: Date;

  @Column({ name: 'claim_details', type: 'integer' })
  claimDetails!: number;

  @Column({ name: 'claim_payment_details', type: 'integer' })
  claimPaymentDetails!: number;

  @Column({ name: 'snapshots_appended', type: 'integer' })
  snapshotsAppended!: number;

  @Column({ name: 'snapshot_history', type: 'integer' })
  snapshotHistory!: number;

  @Column({ name: 'errors', type: 'integer' })
  errors!: number;

  @Column({ name: 'warnings', type: 'integer' })
  warnings!: number;
}

@Entity('reconciliation_violations')
@Index(['runId', 'severity'])
export class ReconciliationViolationRecord implements Violation {
  @PrimaryColumn({ name: 'run_id', type: 'uuid' })
  runId!: string;

  @PrimaryColumn({ name: 'sequence', type: 'integer' })
  sequence!: number;

  @Column({ name: 'rule_id', type: 'text' })
  ruleId!: string;

  @Column({ name: 'category', type: 'text' })
  category!: ViolationCategory;

  @Column({ name: 'severity', type: 'text' })
  severity!: Severity;

  @Column({ name: 'entity_key', type: 'text' })
  entityKey!: string;

  @Column({ name: 'message', type: 'text' })
  message!: string;
}

export const RECONCILIATION_ENTITIES = [
  ClaimDetailRecord,
  ClaimPaymentDetailRecord,
  ClaimSnapshotRecord,
  ReconciliationRun,
  ReconciliationViolationRecord,
];
