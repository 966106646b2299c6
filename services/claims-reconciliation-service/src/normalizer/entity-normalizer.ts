import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { Logger } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from '../config/reconciliation.config';
import { RULES } from '../domain/rules';
import {
  Carrier,
  Claim,
  ClaimPayment,
  ClaimProcedure,
  ClaimTrackingEntry,
  CoverageSource,
  EobAttachment,
  ProcedureMetadata,
  SourceClaimSnapshot,
  Subscriber,
} from '../domain/types';
import { EntityKeyValue, formatEntityKey, StageResult, ViolationCollector } from '../domain/violations';
import {
  carrierRecord,
  claimPaymentRecord,
  claimProcedureRecord,
  claimRecord,
  claimSnapshotRecord,
  coverageRecord,
  eobAttachmentRecord,
  FeedName,
  KEY_FIELDS,
  procedureRecord,
  RawReconciliationInput,
  subscriberRecord,
  trackingEntryRecord,
} from './raw-records';

export interface NormalizedBatch {
  claims: Claim[];
  claimProcedures: ClaimProcedure[];
  claimPayments: ClaimPayment[];
  coverage: CoverageSource[];
  trackingEntries: ClaimTrackingEntry[];
  claimSnapshots: SourceClaimSnapshot[];
  procedures: ProcedureMetadata[];
  /** null when the feed was not supplied; references are then taken on trust. */
  carriers: Carrier[] | null;
  subscribers: Subscriber[] | null;
  eobAttachments: EobAttachment[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isAbsent = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

const keyValue = (value: unknown): EntityKeyValue => {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  return JSON.stringify(value);
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');

@Injectable()
export class EntityNormalizer {
  private readonly logger: Logger;

  constructor(@Inject(RECONCILIATION_CONFIG) config: ReconciliationConfig) {
    this.logger = createReconciliationLogger(config, 'entity-normalizer');
  }

  normalize(input: RawReconciliationInput): StageResult<NormalizedBatch> {
    const collector = new ViolationCollector();

    const output: NormalizedBatch = {
      claims: this.normalizeFeed('claims', input.claims, claimRecord, collector),
      claimProcedures: this.normalizeFeed('claim_procedures', input.claim_procedures, claimProcedureRecord, collector),
      claimPayments: this.normalizeFeed('claim_payments', input.claim_payments, claimPaymentRecord, collector),
      coverage: this.normalizeFeed('coverage', input.coverage, coverageRecord, collector),
      trackingEntries: this.normalizeFeed('tracking_entries', input.tracking_entries, trackingEntryRecord, collector),
      claimSnapshots: this.normalizeFeed('claim_snapshots', input.claim_snapshots, claimSnapshotRecord, collector),
      procedures: this.normalizeFeed('procedures', input.procedures ?? [], procedureRecord, collector),
      carriers: input.carriers ? this.normalizeFeed('carriers', input.carriers, carrierRecord, collector) : null,
      subscribers: input.subscribers
        ? this.normalizeFeed('subscribers', input.subscribers, subscriberRecord, collector)
        : null,
      eobAttachments: this.normalizeFeed('eob_attachments', input.eob_attachments ?? [], eobAttachmentRecord, collector),
    };

    this.logger.info('Normalized source feeds', {
      claims: output.claims.length,
      claimProcedures: output.claimProcedures.length,
      claimPayments: output.claimPayments.length,
      coverage: output.coverage.length,
      trackingEntries: output.trackingEntries.length,
      claimSnapshots: output.claimSnapshots.length,
      rejected: collector.size,
    });

    return { output, violations: collector.violations };
  }

  private normalizeFeed<S extends z.ZodTypeAny>(
    feed: FeedName,
    rows: readonly unknown[],
    schema: S,
    collector: ViolationCollector
  ): z.output<S>[] {
    const keyFields = KEY_FIELDS[feed];
    const normalized: z.output<S>[] = [];

    rows.forEach((raw, index) => {
      if (!isRecord(raw)) {
        collector.raise(
          RULES.malformedRecord,
          formatEntityKey({ feed, index }),
          `${feed} record is not an object`
        );
        return;
      }

      const entityKey = formatEntityKey({
        feed,
        index,
        ...Object.fromEntries(keyFields.map((field) => [field, keyValue(raw[field])] as const)),
      });

      const missing = keyFields.filter((field) => isAbsent(raw[field]));
      if (missing.length > 0) {
        collector.raise(
          RULES.missingKeyComponent,
          entityKey,
          `${feed} record is missing key component(s): ${missing.join(', ')}`
        );
        return;
      }

      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const message = describeIssues(parsed.error);
        this.logger.debug('Dropped malformed record', { feed, index, message });
        collector.raise(RULES.malformedRecord, entityKey, `${feed} record rejected: ${message}`);
        return;
      }
      normalized.push(parsed.data);
    });

    return normalized;
  }
}
