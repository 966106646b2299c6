import type { Severity, ViolationCategory } from './violations';

export interface RuleDefinition {
  id: string;
  category: ViolationCategory;
  severity: Severity;
}

const rule = (id: string, category: ViolationCategory, severity: Severity): RuleDefinition => ({
  id,
  category,
  severity,
});

export const RULES = {
  // normalization
  malformedRecord: rule('malformed_record', 'NormalizationError', 'warn'),
  missingKeyComponent: rule('missing_key_component', 'MissingKeyComponent', 'error'),

  // deduplication and uniqueness
  emptyDedupGroup: rule('empty_dedup_group', 'DeduplicationError', 'error'),
  duplicateClaimDetailId: rule('duplicate_claim_detail_id', 'DeduplicationError', 'error'),
  duplicateClaimPaymentDetailId: rule('duplicate_claim_payment_detail_id', 'DeduplicationError', 'error'),
  duplicateClaimSnapshotId: rule('duplicate_claim_snapshot_id', 'DeduplicationError', 'error'),
  snapshotKeyCollision: rule('snapshot_key_collision', 'SnapshotKeyCollision', 'warn'),

  // referential integrity
  primaryClaimMissingInsurancePlan: rule('primary_claim_missing_insurance_plan', 'ReferentialIntegrityError', 'error'),
  procedureClaimMissing: rule('procedure_claim_missing', 'ReferentialIntegrityError', 'warn'),
  claimPaymentMissing: rule('claim_payment_missing', 'ReferentialIntegrityError', 'warn'),
  snapshotProcedureMissing: rule('snapshot_procedure_missing', 'ReferentialIntegrityError', 'warn'),
  trackingClaimMissing: rule('tracking_claim_missing', 'ReferentialIntegrityError', 'warn'),
  eobPaymentMissing: rule('eob_payment_missing', 'ReferentialIntegrityError', 'warn'),

  // financial reconciliation
  inconsistentFinancialTotals: rule('inconsistent_financial_totals', 'FinancialReconciliationError', 'error'),

  // data quality
  decimalPointError: rule('decimal_point_error', 'DataQualityWarning', 'warn'),
  zeroBilledWithNonzeroAllowed: rule('zero_billed_with_nonzero_allowed', 'DataQualityWarning', 'warn'),
  sentinelAmount: rule('sentinel_amount', 'DataQualityWarning', 'warn'),
  amountOutOfRange: rule('amount_out_of_range', 'DataQualityWarning', 'warn'),
  dateOutOfRange: rule('date_out_of_range', 'DataQualityWarning', 'warn'),
  missingCheckAmount: rule('missing_check_amount', 'DataQualityWarning', 'warn'),
  missingCheckDate: rule('missing_check_date', 'DataQualityWarning', 'warn'),
  missingPaymentType: rule('missing_payment_type', 'DataQualityWarning', 'warn'),
  radiologyNoBillConflict: rule('radiology_no_bill_conflict', 'DataQualityWarning', 'warn'),
  coverageTerminatedButActive: rule('coverage_terminated_but_active', 'DataQualityWarning', 'warn'),
  coverageActiveWithoutVerification: rule('coverage_active_without_verification', 'DataQualityWarning', 'warn'),
  coverageInconsistentIncompleteFlag: rule('coverage_inconsistent_incomplete_flag', 'DataQualityWarning', 'warn'),
  coveragePlanPatientConflict: rule('coverage_plan_patient_conflict', 'DataQualityWarning', 'warn'),
  daysToPaymentOutOfRange: rule('days_to_payment_out_of_range', 'DataQualityWarning', 'warn'),
  paymentBeforeSnapshot: rule('payment_before_snapshot', 'DataQualityWarning', 'warn'),
} as const;
