import { z } from 'zod';
import { parseSourceDate } from '../domain/dates';
import { roundAmount } from '../domain/money';
import {
  Carrier,
  Claim,
  ClaimPayment,
  ClaimProcedure,
  ClaimStatus,
  ClaimTrackingEntry,
  ClaimType,
  CoverageSource,
  EobAttachment,
  ProcedureMetadata,
  SnapshotTrigger,
  SourceClaimSnapshot,
  Subscriber,
  TrackingType,
} from '../domain/types';

const blankToNull = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? null : value;

const sourceId = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'expected an integer id')
    .transform(Number),
]);

/** Foreign reference; the source writes 0 for "none". */
const optionalId = z
  .preprocess(blankToNull, sourceId.nullish())
  .transform((value) => (value === undefined || value === null || value === 0 ? null : value));

const amount = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(\.\d+)?$/, 'expected a decimal amount')
      .transform(Number),
  ])
  .refine(Number.isFinite, 'expected a finite amount')
  .transform(roundAmount);

const optionalAmount = z.preprocess(blankToNull, amount.nullish()).transform((value) => value ?? null);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === undefined || value === null) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
  });

const requiredText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'must not be blank'));

const TRUE_FLAGS = new Set(['true', '1', 'y', 'yes', 't']);
const FALSE_FLAGS = new Set(['false', '0', 'n', 'no', 'f']);

const triStateFlag = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((value, ctx): boolean | null => {
    if (value === undefined || value === null) return null;
    if (typeof value === 'boolean') return value;
    const text = String(value).trim().toLowerCase();
    if (text === '' || text === '-1') return null;
    if (TRUE_FLAGS.has(text)) return true;
    if (FALSE_FLAGS.has(text)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognised flag '${String(value)}'` });
    return z.NEVER;
  });

const flagOrFalse = triStateFlag.transform((value) => value ?? false);

const sourceDate = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value, ctx): Date | null => {
    if (value === undefined || value === null) return null;
    const parsed = parseSourceDate(value);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.reason });
      return z.NEVER;
    }
    return parsed.value;
  });

const requiredDate = sourceDate.pipe(z.date({ invalid_type_error: 'expected a real date, got a placeholder' }));

const lookupKey = (value: string | number): string =>
  String(value)
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');

function sourceCode<T extends string>(label: string, table: ReadonlyMap<string, T>) {
  return z.union([z.string(), z.number()]).transform((value, ctx): T => {
    const match = table.get(lookupKey(value));
    if (match === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown ${label} '${String(value)}'` });
      return z.NEVER;
    }
    return match;
  });
}

const CLAIM_STATUS_CODES = new Map<string, ClaimStatus>([
  ['r', 'Received'],
  ['received', 'Received'],
  ['s', 'Sent'],
  ['sent', 'Sent'],
  ['h', 'Hold'],
  ['hold', 'Hold'],
  ['w', 'Waiting'],
  ['waiting', 'Waiting'],
  ['u', 'Unsent'],
  ['unsent', 'Unsent'],
]);

const CLAIM_TYPE_CODES = new Map<string, ClaimType>([
  ['p', 'Primary'],
  ['primary', 'Primary'],
  ['s', 'Secondary'],
  ['secondary', 'Secondary'],
  ['preauth', 'PreAuth'],
  ['cap', 'Capitation'],
  ['capitation', 'Capitation'],
  ['other', 'Other'],
]);

const TRACKING_TYPE_CODES = new Map<string, TrackingType>([
  ['statushistory', 'StatusChange'],
  ['statuschange', 'StatusChange'],
  ['claimuser', 'UserNote'],
  ['usernote', 'UserNote'],
  ['claimprocreceived', 'ProcedureReceived'],
  ['procedurereceived', 'ProcedureReceived'],
]);

const SNAPSHOT_TRIGGER_CODES = new Map<string, SnapshotTrigger>([
  ['initial', 'Initial'],
  ['resubmit', 'Resubmit'],
  ['payment', 'Payment'],
  ['adjustment', 'Adjustment'],
  ['denial', 'Denial'],
  ['appeal', 'Appeal'],
]);

const claimStatus = sourceCode('claim status', CLAIM_STATUS_CODES);
const claimType = sourceCode('claim type', CLAIM_TYPE_CODES);
const optionalClaimType = z.preprocess(blankToNull, claimType.nullish()).transform((value) => value ?? null);

export const claimRecord = z
  .object({
    claim_id: sourceId,
    patient_id: sourceId,
    plan_id: optionalId,
    status: claimStatus,
    type: claimType,
    claim_date: sourceDate,
    last_tracking_date: sourceDate,
    is_verified: triStateFlag,
  })
  .transform(
    (row): Claim => ({
      claimId: row.claim_id,
      patientId: row.patient_id,
      planId: row.plan_id,
      status: row.status,
      type: row.type,
      claimDate: row.claim_date,
      lastTrackingDate: row.last_tracking_date,
      isVerified: row.is_verified,
    })
  );

export const claimProcedureRecord = z
  .object({
    claim_id: sourceId,
    procedure_id: sourceId,
    claim_procedure_id: sourceId,
    claim_payment_id: optionalId,
    billed_amount: amount,
    allowed_amount: optionalAmount,
    paid_amount: optionalAmount,
    write_off_amount: optionalAmount,
    patient_responsibility: optionalAmount,
    procedure_status: requiredText,
    patient_id: optionalId,
    plan_id: optionalId,
    procedure_date: sourceDate,
  })
  .transform(
    (row): ClaimProcedure => ({
      claimId: row.claim_id,
      procedureId: row.procedure_id,
      claimProcedureId: row.claim_procedure_id,
      claimPaymentId: row.claim_payment_id,
      billedAmount: row.billed_amount,
      allowedAmount: row.allowed_amount,
      paidAmount: row.paid_amount,
      writeOffAmount: row.write_off_amount,
      patientResponsibility: row.patient_responsibility,
      procedureStatus: row.procedure_status,
      patientId: row.patient_id,
      planId: row.plan_id,
      procedureDate: row.procedure_date,
    })
  );

export const claimPaymentRecord = z
  .object({
    claim_payment_id: sourceId,
    check_amount: optionalAmount,
    check_date: sourceDate,
    payment_type: optionalText,
    is_partial: flagOrFalse,
    created_at: sourceDate,
  })
  .transform(
    (row): ClaimPayment => ({
      claimPaymentId: row.claim_payment_id,
      checkAmount: row.check_amount,
      checkDate: row.check_date,
      paymentType: row.payment_type,
      isPartial: row.is_partial,
      createdAt: row.created_at,
    })
  );

export const coverageRecord = z
  .object({
    patient_id: sourceId,
    plan_id: sourceId,
    carrier_id: optionalId,
    subscriber_id: optionalId,
    carrier_name: optionalText,
    plan_type: optionalText,
    group_number: optionalText,
    group_name: optionalText,
    verification_date: sourceDate,
    is_pending: flagOrFalse,
    created_at: sourceDate,
    updated_at: sourceDate,
    benefit_details: z.unknown(),
    ordinal: z.preprocess(blankToNull, sourceId.nullish()).transform((value) => value ?? null),
  })
  .transform(
    (row): CoverageSource => ({
      patientId: row.patient_id,
      planId: row.plan_id,
      carrierId: row.carrier_id,
      subscriberId: row.subscriber_id,
      carrierName: row.carrier_name,
      planType: row.plan_type,
      groupNumber: row.group_number,
      groupName: row.group_name,
      verificationDate: row.verification_date,
      isPending: row.is_pending,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      benefitDetails: row.benefit_details ?? null,
      ordinal: row.ordinal,
    })
  );

export const trackingEntryRecord = z
  .object({
    claim_tracking_id: sourceId,
    claim_id: sourceId,
    tracking_type: sourceCode('tracking type', TRACKING_TYPE_CODES),
    entry_timestamp: requiredDate,
    note: optionalText,
  })
  .transform(
    (row): ClaimTrackingEntry => ({
      claimTrackingId: row.claim_tracking_id,
      claimId: row.claim_id,
      trackingType: row.tracking_type,
      entryTimestamp: row.entry_timestamp,
      note: row.note,
    })
  );

export const claimSnapshotRecord = z
  .object({
    claim_procedure_id: sourceId,
    snapshot_trigger: sourceCode('snapshot trigger', SNAPSHOT_TRIGGER_CODES),
    estimated_write_off: amount,
    insurance_payment_estimate: amount,
    fee_amount: amount,
    entry_timestamp: requiredDate,
    claim_type: optionalClaimType,
    source_snapshot_id: optionalId,
  })
  .transform(
    (row): SourceClaimSnapshot => ({
      claimProcedureId: row.claim_procedure_id,
      snapshotTrigger: row.snapshot_trigger,
      estimatedWriteOff: row.estimated_write_off,
      insurancePaymentEstimate: row.insurance_payment_estimate,
      feeAmount: row.fee_amount,
      entryTimestamp: row.entry_timestamp,
      claimType: row.claim_type,
      sourceSnapshotId: row.source_snapshot_id,
    })
  );

export const procedureRecord = z
  .object({
    procedure_id: sourceId,
    procedure_code: requiredText,
    description: optionalText,
    provider_id: optionalId,
    is_radiology: triStateFlag,
    no_bill_insurance: triStateFlag,
    procedure_date: sourceDate,
  })
  .transform(
    (row): ProcedureMetadata => ({
      procedureId: row.procedure_id,
      procedureCode: row.procedure_code,
      description: row.description,
      providerId: row.provider_id,
      isRadiology: row.is_radiology,
      noBillInsurance: row.no_bill_insurance,
      procedureDate: row.procedure_date,
    })
  );

export const carrierRecord = z
  .object({ carrier_id: sourceId, carrier_name: optionalText })
  .transform((row): Carrier => ({ carrierId: row.carrier_id, carrierName: row.carrier_name }));

export const subscriberRecord = z
  .object({ subscriber_id: sourceId })
  .transform((row): Subscriber => ({ subscriberId: row.subscriber_id }));

export const eobAttachmentRecord = z
  .object({
    eob_attachment_id: sourceId,
    claim_payment_id: sourceId,
    file_name: requiredText,
    created_at: sourceDate,
  })
  .transform(
    (row): EobAttachment => ({
      eobAttachmentId: row.eob_attachment_id,
      claimPaymentId: row.claim_payment_id,
      fileName: row.file_name,
      createdAt: row.created_at,
    })
  );

/** Raw feeds as delivered by the extraction layer. Optional feeds enrich the ledgers. */
export interface RawReconciliationInput {
  claims: readonly unknown[];
  claim_procedures: readonly unknown[];
  claim_payments: readonly unknown[];
  coverage: readonly unknown[];
  tracking_entries: readonly unknown[];
  claim_snapshots: readonly unknown[];
  procedures?: readonly unknown[];
  carriers?: readonly unknown[];
  subscribers?: readonly unknown[];
  eob_attachments?: readonly unknown[];
}

export type FeedName = keyof RawReconciliationInput;

/** Fields whose absence makes a record unkeyable. */
export const KEY_FIELDS: Record<FeedName, readonly string[]> = {
  claims: ['claim_id'],
  claim_procedures: ['claim_id', 'procedure_id', 'claim_procedure_id'],
  claim_payments: ['claim_payment_id'],
  coverage: ['patient_id', 'plan_id'],
  tracking_entries: ['claim_tracking_id', 'claim_id'],
  claim_snapshots: ['claim_procedure_id', 'snapshot_trigger', 'entry_timestamp'],
  procedures: ['procedure_id'],
  carriers: ['carrier_id'],
  subscribers: ['subscriber_id'],
  eob_attachments: ['eob_attachment_id', 'claim_payment_id'],
};
