import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { CoverageLookup } from '../coverage/coverage-resolver';
import { Deduplicator } from '../dedup/deduplicator';
import {
  latestClaimRevisionPolicy,
  latestPaymentRecordPolicy,
  paymentAuthorityPolicy,
  PaymentCandidate,
} from '../dedup/tie-break.policies';
import { MissingKeyComponentError } from '../domain/errors';
import { RULES } from '../domain/rules';
import {
  Claim,
  ClaimDetail,
  ClaimPayment,
  ClaimPaymentDetail,
  ClaimProcedure,
  EobAttachment,
  ProcedureMetadata,
} from '../domain/types';
import { formatEntityKey, StageResult, ViolationCollector } from '../domain/violations';
import { claimDetailKey, claimPaymentDetailKey } from '../keys/key-generator';
import { NormalizedBatch } from '../normalizer/entity-normalizer';

export interface ClaimLedgers {
  claimDetails: ClaimDetail[];
  claimPaymentDetails: ClaimPaymentDetail[];
  /** Claims after revision dedup, keyed by claim id. */
  claims: ReadonlyMap<number, Claim>;
}

interface LedgerCandidate extends PaymentCandidate {
  procedure: ClaimProcedure;
  payment: ClaimPayment | null;
  claimDetailId: string;
  claimPaymentDetailId: string;
}

const procedureKey = (procedure: ClaimProcedure) =>
  formatEntityKey({
    claim_id: procedure.claimId,
    procedure_id: procedure.procedureId,
    claim_procedure_id: procedure.claimProcedureId,
    claim_payment_id: procedure.claimPaymentId,
  });

/** D-codes group by their first digit (D1 preventive, D2 restorative, ...). */
export const codePrefix = (procedureCode: string | null): string | null =>
  procedureCode !== null && /^d\d/i.test(procedureCode) ? procedureCode.slice(0, 2).toUpperCase() : null;

const byLedgerOrder = (
  a: { claimId: number; procedureId: number; claimProcedureId: number; claimPaymentId: number | null },
  b: { claimId: number; procedureId: number; claimProcedureId: number; claimPaymentId: number | null }
): number =>
  a.claimId - b.claimId ||
  a.procedureId - b.procedureId ||
  a.claimProcedureId - b.claimProcedureId ||
  (a.claimPaymentId ?? 0) - (b.claimPaymentId ?? 0);

@Injectable()
export class ClaimLedgerBuilder {
  private readonly logger: Logger;

  constructor(
    @Inject(RECONCILIATION_CONFIG) config: ReconciliationConfig,
    private readonly deduplicator: Deduplicator
  ) {
    this.logger = createReconciliationLogger(config, 'claim-ledger-builder');
  }

  build(batch: NormalizedBatch, coverage: CoverageLookup, runTimestamp: Date): StageResult<ClaimLedgers> {
    const collector = new ViolationCollector();

    const claims = this.deduplicator.collapse(
      batch.claims,
      (claim) => String(claim.claimId),
      latestClaimRevisionPolicy,
      collector
    );
    const payments = this.deduplicator.collapse(
      batch.claimPayments,
      (payment) => String(payment.claimPaymentId),
      latestPaymentRecordPolicy,
      collector
    );
    const claimsById = new Map(claims.retained.map((claim) => [claim.claimId, claim] as const));
    const paymentsById = new Map(payments.retained.map((payment) => [payment.claimPaymentId, payment] as const));
    const metadataById = new Map(batch.procedures.map((meta) => [meta.procedureId, meta] as const));
    const attachmentsByPayment = this.groupAttachments(batch.eobAttachments, paymentsById, collector);

    const candidates = this.buildCandidates(batch.claimProcedures, paymentsById, collector);

    const paymentRows = this.deduplicator.collapse(
      candidates,
      (candidate) => candidate.claimPaymentDetailId,
      paymentAuthorityPolicy<LedgerCandidate>(),
      collector
    );
    const detailRows = this.deduplicator.collapse(
      paymentRows.retained,
      (candidate) => candidate.claimDetailId,
      paymentAuthorityPolicy<LedgerCandidate>(),
      collector
    );

    for (const candidate of detailRows.retained) {
      if (!claimsById.has(candidate.procedure.claimId)) {
        collector.raise(
          RULES.procedureClaimMissing,
          procedureKey(candidate.procedure),
          `Claim ${candidate.procedure.claimId} not found; ledger row carries no claim context`
        );
      }
    }

    const claimDetails = detailRows.retained
      .map((candidate) => this.toClaimDetail(candidate, claimsById, metadataById, coverage, runTimestamp))
      .sort(byLedgerOrder);
    const claimPaymentDetails = paymentRows.retained
      .map((candidate) => this.toClaimPaymentDetail(candidate, claimsById, attachmentsByPayment, runTimestamp))
      .sort(byLedgerOrder);

    this.logger.info('Built claim ledgers', {
      claims: claims.retained.length,
      duplicateClaims: claims.duplicateGroups.length,
      payments: payments.retained.length,
      duplicatePayments: payments.duplicateGroups.length,
      procedureCandidates: candidates.length,
      duplicatePaymentDetails: paymentRows.duplicateGroups.length,
      claimDetails: claimDetails.length,
      claimPaymentDetails: claimPaymentDetails.length,
      violations: collector.size,
    });

    return {
      output: { claimDetails, claimPaymentDetails, claims: claimsById },
      violations: collector.violations,
    };
  }

  private buildCandidates(
    procedures: readonly ClaimProcedure[],
    paymentsById: ReadonlyMap<number, ClaimPayment>,
    collector: ViolationCollector
  ): LedgerCandidate[] {
    const candidates: LedgerCandidate[] = [];

    for (const procedure of procedures) {
      let claimDetailId: string;
      let claimPaymentDetailId: string;
      try {
        claimDetailId = claimDetailKey(procedure);
        claimPaymentDetailId = claimPaymentDetailKey(procedure);
      } catch (error) {
        if (error instanceof MissingKeyComponentError) {
          collector.raise(RULES.missingKeyComponent, procedureKey(procedure), error.message);
          continue;
        }
        throw error;
      }

      const payment = procedure.claimPaymentId === null ? null : paymentsById.get(procedure.claimPaymentId) ?? null;
      if (procedure.claimPaymentId !== null && payment === null) {
        collector.raise(
          RULES.claimPaymentMissing,
          procedureKey(procedure),
          `Claim payment ${procedure.claimPaymentId} not found; payment fields left empty`
        );
      }

      candidates.push({
        procedure,
        payment,
        paidAmount: procedure.paidAmount,
        checkDate: payment?.checkDate ?? null,
        claimDetailId,
        claimPaymentDetailId,
      });
    }

    return candidates;
  }

  private groupAttachments(
    attachments: readonly EobAttachment[],
    paymentsById: ReadonlyMap<number, ClaimPayment>,
    collector: ViolationCollector
  ): Map<number, EobAttachment[]> {
    const byPayment = new Map<number, EobAttachment[]>();
    for (const attachment of attachments) {
      if (!paymentsById.has(attachment.claimPaymentId)) {
        collector.raise(
          RULES.eobPaymentMissing,
          formatEntityKey({ eob_attachment_id: attachment.eobAttachmentId, claim_payment_id: attachment.claimPaymentId }),
          `EOB attachment references unknown claim payment ${attachment.claimPaymentId}`
        );
        continue;
      }
      const group = byPayment.get(attachment.claimPaymentId) ?? [];
      group.push(attachment);
      byPayment.set(attachment.claimPaymentId, group);
    }
    for (const group of byPayment.values()) {
      group.sort((a, b) => a.eobAttachmentId - b.eobAttachmentId);
    }
    return byPayment;
  }

  private toClaimDetail(
    candidate: LedgerCandidate,
    claimsById: ReadonlyMap<number, Claim>,
    metadataById: ReadonlyMap<number, ProcedureMetadata>,
    coverageLookup: CoverageLookup,
    runTimestamp: Date
  ): ClaimDetail {
    const { procedure } = candidate;
    const claim = claimsById.get(procedure.claimId) ?? null;
    const meta = metadataById.get(procedure.procedureId) ?? null;
    const patientId = procedure.patientId ?? claim?.patientId ?? null;
    const planId = procedure.planId ?? claim?.planId ?? null;
    const coverage = coverageLookup.resolve(patientId, planId);
    const procedureCode = meta?.procedureCode ?? null;
    const claimDate = claim?.claimDate ?? procedure.procedureDate ?? meta?.procedureDate ?? null;

    return {
      claimDetailId: candidate.claimDetailId,
      claimId: procedure.claimId,
      procedureId: procedure.procedureId,
      claimProcedureId: procedure.claimProcedureId,
      claimPaymentId: procedure.claimPaymentId,
      patientId,
      planId,
      insurancePlanId: coverage?.insurancePlanId ?? null,
      carrierId: coverage?.carrierId ?? null,
      subscriberId: coverage?.subscriberId ?? null,
      providerId: meta?.providerId ?? null,
      claimStatus: claim?.status ?? null,
      claimType: claim?.type ?? null,
      claimDate,
      claimVerified: claim?.isVerified ?? coverageLookup.hasActiveCoverage(patientId),
      claimProcedureStatus: procedure.procedureStatus,
      procedureCode,
      codePrefix: codePrefix(procedureCode),
      procedureDescription: meta?.description ?? null,
      isRadiology: meta?.isRadiology ?? null,
      noBillInsurance: meta?.noBillInsurance ?? null,
      billedAmount: procedure.billedAmount,
      allowedAmount: procedure.allowedAmount,
      paidAmount: procedure.paidAmount,
      writeOffAmount: procedure.writeOffAmount,
      patientResponsibility: procedure.patientResponsibility,
      planType: coverage?.planType ?? null,
      groupNumber: coverage?.groupNumber ?? null,
      groupName: coverage?.groupName ?? null,
      verificationDate: coverage?.verificationDate ?? null,
      benefitDetails: coverage?.benefitDetails ?? null,
      verificationStatus: coverage?.isActive ?? null,
      effectiveDate: coverage?.effectiveDate ?? null,
      terminationDate: coverage?.terminationDate ?? null,
      isIncompleteCoverage: coverage?.isIncompleteRecord ?? null,
      createdAt: claimDate,
      updatedAt: claim?.lastTrackingDate ?? claimDate,
      transformedAt: runTimestamp,
    };
  }

  private toClaimPaymentDetail(
    candidate: LedgerCandidate,
    claimsById: ReadonlyMap<number, Claim>,
    attachmentsByPayment: ReadonlyMap<number, EobAttachment[]>,
    runTimestamp: Date
  ): ClaimPaymentDetail {
    const { procedure, payment } = candidate;
    const attachments = payment ? attachmentsByPayment.get(payment.claimPaymentId) ?? [] : [];

    return {
      claimPaymentDetailId: candidate.claimPaymentDetailId,
      claimId: procedure.claimId,
      procedureId: procedure.procedureId,
      claimProcedureId: procedure.claimProcedureId,
      claimPaymentId: procedure.claimPaymentId,
      patientId: procedure.patientId ?? claimsById.get(procedure.claimId)?.patientId ?? null,
      billedAmount: procedure.billedAmount,
      allowedAmount: procedure.allowedAmount,
      paidAmount: procedure.paidAmount,
      writeOffAmount: procedure.writeOffAmount,
      patientResponsibility: procedure.patientResponsibility,
      checkAmount: payment?.checkAmount ?? null,
      checkDate: payment?.checkDate ?? null,
      paymentType: payment?.paymentType ?? null,
      isPartial: payment?.isPartial ?? null,
      eobAttachmentCount: attachments.length,
      eobAttachmentIds: attachments.map((attachment) => attachment.eobAttachmentId),
      eobAttachmentFileNames: attachments.map((attachment) => attachment.fileName),
      transformedAt: runTimestamp,
    };
  }
}
