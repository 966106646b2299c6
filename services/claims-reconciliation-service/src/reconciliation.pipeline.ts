import { Inject, Injectable } from '@nestjs/common';
import { createTracer, Logger, Tracer } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from './config/reconciliation.config';
import { CoverageResolver } from './coverage/coverage-resolver';
import { Deduplicator } from './dedup/deduplicator';
import { ClaimDetail, ClaimPaymentDetail, ClaimSnapshot, InsuranceCoverage } from './domain/types';
import { buildViolationReport, Violation, ViolationReport } from './domain/violations';
import { reconciliationRunKey } from './keys/key-generator';
import { ClaimLedgerBuilder } from './ledger/claim-ledger.builder';
import { EntityNormalizer } from './normalizer/entity-normalizer';
import { RawReconciliationInput } from './normalizer/raw-records';
import { SnapshotTracker } from './snapshots/snapshot-tracker';
import { InvariantValidator } from './validation/invariant-validator';

export const RECONCILIATION_TRACER = Symbol('RECONCILIATION_TRACER');

export interface RunOptions {
  /** Audit timestamp stamped on every derived row; makes runs reproducible. */
  runTimestamp: Date;
  priorSnapshotHistory?: readonly ClaimSnapshot[];
}

export interface RunSummary {
  runId: string;
  runTimestamp: Date;
  claimDetails: number;
  claimPaymentDetails: number;
  snapshotsAppended: number;
  snapshotHistory: number;
  errors: number;
  warnings: number;
}

export interface ReconciliationResult {
  runId: string;
  runTimestamp: Date;
  claimDetailLedger: ClaimDetail[];
  claimPaymentDetailLedger: ClaimPaymentDetail[];
  claimSnapshotHistory: ClaimSnapshot[];
  /** Snapshot rows first emitted by this run. */
  appendedSnapshots: ClaimSnapshot[];
  coverage: InsuranceCoverage[];
  violationReport: ViolationReport;
  summary: RunSummary;
}

@Injectable()
export class ReconciliationPipeline {
  private readonly logger: Logger;

  constructor(
    @Inject(RECONCILIATION_CONFIG) config: ReconciliationConfig,
    @Inject(RECONCILIATION_TRACER) private readonly tracer: Tracer,
    private readonly normalizer: EntityNormalizer,
    private readonly coverageResolver: CoverageResolver,
    private readonly ledgerBuilder: ClaimLedgerBuilder,
    private readonly snapshotTracker: SnapshotTracker,
    private readonly validator: InvariantValidator
  ) {
    this.logger = createReconciliationLogger(config, 'reconciliation-pipeline');
  }

  run(input: RawReconciliationInput, options: RunOptions): ReconciliationResult {
    const { runTimestamp } = options;
    const runId = reconciliationRunKey(runTimestamp);
    const stage = <T>(name: string, fn: () => T): T =>
      this.tracer.withSpan(`reconciliation.${name}`, fn, { 'reconciliation.run_id': runId });

    const violations: Violation[] = [];

    const normalized = stage('normalize', () => this.normalizer.normalize(input));
    violations.push(...normalized.violations);
    const batch = normalized.output;

    const coverage = stage('resolve_coverage', () =>
      this.coverageResolver.buildCoverage(batch.coverage, { carriers: batch.carriers, subscribers: batch.subscribers })
    );
    violations.push(...coverage.violations);

    const ledgers = stage('build_ledgers', () => this.ledgerBuilder.build(batch, coverage.output, runTimestamp));
    violations.push(...ledgers.violations);

    const snapshots = stage('track_snapshots', () =>
      this.snapshotTracker.track({
        snapshots: batch.claimSnapshots,
        claimDetails: ledgers.output.claimDetails,
        claimPaymentDetails: ledgers.output.claimPaymentDetails,
        trackingEntries: batch.trackingEntries,
        claims: ledgers.output.claims,
        priorHistory: options.priorSnapshotHistory ?? [],
        runTimestamp,
      })
    );
    violations.push(...snapshots.violations);

    violations.push(
      ...stage('validate', () =>
        this.validator.validate({
          claimDetails: ledgers.output.claimDetails,
          claimPaymentDetails: ledgers.output.claimPaymentDetails,
          snapshotHistory: snapshots.output.history,
          coverages: coverage.output.coverages,
        })
      )
    );

    const violationReport = buildViolationReport(violations);
    const summary: RunSummary = {
      runId,
      runTimestamp,
      claimDetails: ledgers.output.claimDetails.length,
      claimPaymentDetails: ledgers.output.claimPaymentDetails.length,
      snapshotsAppended: snapshots.output.appended.length,
      snapshotHistory: snapshots.output.history.length,
      errors: violationReport.counts.error,
      warnings: violationReport.counts.warn,
    };

    if (summary.errors > 0) {
      this.logger.warn('Reconciliation run completed with errors', { ...summary, runTimestamp: runTimestamp.toISOString() });
    } else {
      this.logger.info('Reconciliation run completed', { ...summary, runTimestamp: runTimestamp.toISOString() });
    }

    return {
      runId,
      runTimestamp,
      claimDetailLedger: ledgers.output.claimDetails,
      claimPaymentDetailLedger: ledgers.output.claimPaymentDetails,
      claimSnapshotHistory: snapshots.output.history,
      appendedSnapshots: snapshots.output.appended,
      coverage: [...coverage.output.coverages],
      violationReport,
      summary,
    };
  }
}

/** Wires the stages without Nest, for orchestrators that call the core directly. */
export function createReconciliationPipeline(
  config: ReconciliationConfig,
  tracer: Tracer = createTracer({ serviceName: config.serviceName, jaegerEndpoint: config.jaegerEndpoint })
): ReconciliationPipeline {
  const deduplicator = new Deduplicator();
  return new ReconciliationPipeline(
    config,
    tracer,
    new EntityNormalizer(config),
    new CoverageResolver(config),
    new ClaimLedgerBuilder(config, deduplicator),
    new SnapshotTracker(config, deduplicator),
    new InvariantValidator(config)
  );
}
