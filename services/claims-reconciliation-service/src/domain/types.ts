export const CLAIM_STATUSES = ['Received', 'Sent', 'Hold', 'Waiting', 'Unsent'] as const;
export type ClaimStatus = (typeof CLAIM_STATUSES)[number];

export const CLAIM_TYPES = ['Primary', 'Secondary', 'PreAuth', 'Capitation', 'Other'] as const;
export type ClaimType = (typeof CLAIM_TYPES)[number];

export const TRACKING_TYPES = ['StatusChange', 'UserNote', 'ProcedureReceived'] as const;
export type TrackingType = (typeof TRACKING_TYPES)[number];

export const SNAPSHOT_TRIGGERS = ['Initial', 'Resubmit', 'Payment', 'Adjustment', 'Denial', 'Appeal'] as const;
export type SnapshotTrigger = (typeof SNAPSHOT_TRIGGERS)[number];

/** Carrier or subscriber id used when the reference could not be resolved. */
export const UNRESOLVED_REFERENCE_ID = -1;

export interface Claim {
  claimId: number;
  patientId: number;
  planId: number | null;
  status: ClaimStatus;
  type: ClaimType;
  claimDate: Date | null;
  lastTrackingDate: Date | null;
  isVerified: boolean | null;
}

export interface ClaimProcedure {
  claimId: number;
  procedureId: number;
  claimProcedureId: number;
  claimPaymentId: number | null;
  billedAmount: number;
  allowedAmount: number | null;
  paidAmount: number | null;
  writeOffAmount: number | null;
  patientResponsibility: number | null;
  procedureStatus: string;
  patientId: number | null;
  planId: number | null;
  procedureDate: Date | null;
}

export interface ClaimPayment {
  claimPaymentId: number;
  checkAmount: number | null;
  checkDate: Date | null;
  paymentType: string | null;
  isPartial: boolean;
  createdAt: Date | null;
}

/** One coverage record as delivered by the source, before resolution. */
export interface CoverageSource {
  patientId: number;
  planId: number;
  carrierId: number | null;
  subscriberId: number | null;
  carrierName: string | null;
  planType: string | null;
  groupNumber: string | null;
  groupName: string | null;
  verificationDate: Date | null;
  isPending: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
  benefitDetails: unknown;
  ordinal: number | null;
}

/**
 * Resolved coverage. Effective dating is the half-open interval
 * [effectiveDate, terminationDate); a null terminationDate is open-ended.
 */
export interface InsuranceCoverage {
  insurancePlanId: number;
  patientId: number;
  carrierId: number;
  carrierName: string | null;
  subscriberId: number;
  planType: string | null;
  groupNumber: string | null;
  groupName: string | null;
  verificationDate: Date | null;
  benefitDetails: unknown;
  isActive: boolean;
  effectiveDate: Date;
  terminationDate: Date | null;
  isIncompleteRecord: boolean;
  ordinal: number | null;
}

export interface ClaimTrackingEntry {
  claimTrackingId: number;
  claimId: number;
  trackingType: TrackingType;
  entryTimestamp: Date;
  note: string | null;
}

export interface SourceClaimSnapshot {
  claimProcedureId: number;
  snapshotTrigger: SnapshotTrigger;
  estimatedWriteOff: number;
  insurancePaymentEstimate: number;
  feeAmount: number;
  entryTimestamp: Date;
  claimType: ClaimType | null;
  sourceSnapshotId: number | null;
}

export interface ProcedureMetadata {
  procedureId: number;
  procedureCode: string;
  description: string | null;
  providerId: number | null;
  isRadiology: boolean | null;
  noBillInsurance: boolean | null;
  procedureDate: Date | null;
}

export interface Carrier {
  carrierId: number;
  carrierName: string | null;
}

export interface Subscriber {
  subscriberId: number;
}

export interface EobAttachment {
  eobAttachmentId: number;
  claimPaymentId: number;
  fileName: string;
  createdAt: Date | null;
}

export interface ClaimDetail {
  claimDetailId: string;
  claimId: number;
  procedureId: number;
  claimProcedureId: number;
  claimPaymentId: number | null;
  patientId: number | null;
  planId: number | null;
  insurancePlanId: number | null;
  carrierId: number | null;
  subscriberId: number | null;
  providerId: number | null;
  claimStatus: ClaimStatus | null;
  claimType: ClaimType | null;
  claimDate: Date | null;
  claimVerified: boolean;
  claimProcedureStatus: string;
  procedureCode: string | null;
  codePrefix: string | null;
  procedureDescription: string | null;
  isRadiology: boolean | null;
  noBillInsurance: boolean | null;
  billedAmount: number;
  allowedAmount: number | null;
  paidAmount: number | null;
  writeOffAmount: number | null;
  patientResponsibility: number | null;
  planType: string | null;
  groupNumber: string | null;
  groupName: string | null;
  verificationDate: Date | null;
  benefitDetails: unknown;
  verificationStatus: boolean | null;
  effectiveDate: Date | null;
  terminationDate: Date | null;
  isIncompleteCoverage: boolean | null;
  createdAt: Date | null;
  updatedAt: Date | null;
  transformedAt: Date;
}

export interface ClaimPaymentDetail {
  claimPaymentDetailId: string;
  claimId: number;
  procedureId: number;
  claimProcedureId: number;
  claimPaymentId: number | null;
  patientId: number | null;
  billedAmount: number;
  allowedAmount: number | null;
  paidAmount: number | null;
  writeOffAmount: number | null;
  patientResponsibility: number | null;
  checkAmount: number | null;
  checkDate: Date | null;
  paymentType: string | null;
  isPartial: boolean | null;
  eobAttachmentCount: number;
  eobAttachmentIds: number[];
  eobAttachmentFileNames: string[];
  transformedAt: Date;
}

/** Claim state as believed at entryTimestamp. Never modified once recorded. */
export interface ClaimSnapshot {
  claimSnapshotId: string;
  claimProcedureId: number;
  claimId: number;
  procedureId: number;
  patientId: number | null;
  planId: number | null;
  snapshotTrigger: SnapshotTrigger;
  snapshotClaimType: ClaimType | null;
  estimatedWriteOff: number;
  insurancePaymentEstimate: number;
  feeAmount: number;
  entryTimestamp: Date;
  claimTrackingId: number | null;
  trackingType: TrackingType | null;
  trackingNote: string | null;
  procedureCode: string | null;
  claimType: ClaimType | null;
  claimStatus: ClaimStatus | null;
  actualPaymentAmount: number | null;
  actualWriteOff: number | null;
  actualAllowedAmount: number | null;
  claimProcedureStatus: string | null;
  mostRecentPayment: number | null;
  mostRecentPaymentDate: Date | null;
  paymentVariance: number | null;
  writeOffVariance: number | null;
  daysToPayment: number | null;
  paymentBeforeSnapshot: boolean;
  recordedAt: Date;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}

export function isHeldStatus(status: ClaimStatus): boolean {
  switch (status) {
    case 'Hold':
    case 'Waiting':
      return true;
    case 'Received':
    case 'Sent':
    case 'Unsent':
      return false;
    default:
      return assertNever(status);
  }
}

/** Claim types that must carry an insurance plan once the patient is verified. */
export function requiresInsurancePlan(type: ClaimType): boolean {
  switch (type) {
    case 'Primary':
      return true;
    case 'Secondary':
    case 'PreAuth':
    case 'Capitation':
    case 'Other':
      return false;
    default:
      return assertNever(type);
  }
}
