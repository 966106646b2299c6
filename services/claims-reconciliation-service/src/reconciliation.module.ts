import { Module } from '@nestjs/common';
import { createTracer } from '@claims-recon/shared';
import { loadReconciliationConfig, RECONCILIATION_CONFIG, ReconciliationConfig } from './config/reconciliation.config';
import { CoverageResolver } from './coverage/coverage-resolver';
import { Deduplicator } from './dedup/deduplicator';
import { ClaimLedgerBuilder } from './ledger/claim-ledger.builder';
import { EntityNormalizer } from './normalizer/entity-normalizer';
import { RECONCILIATION_TRACER, ReconciliationPipeline } from './reconciliation.pipeline';
import { ReconciliationService } from './reconciliation.service';
import { SnapshotTracker } from './snapshots/snapshot-tracker';
import { RECONCILIATION_STORE } from './store/reconciliation.store';
import { TypeOrmReconciliationStore } from './store/typeorm-reconciliation.store';
import { InvariantValidator } from './validation/invariant-validator';

@Module({
  providers: [
    { provide: RECONCILIATION_CONFIG, useFactory: () => loadReconciliationConfig() },
    {
      provide: RECONCILIATION_TRACER,
      useFactory: (config: ReconciliationConfig) =>
        createTracer({ serviceName: config.serviceName, jaegerEndpoint: config.jaegerEndpoint }),
      inject: [RECONCILIATION_CONFIG],
    },
    { provide: RECONCILIATION_STORE, useClass: TypeOrmReconciliationStore },
    Deduplicator,
    EntityNormalizer,
    CoverageResolver,
    ClaimLedgerBuilder,
    SnapshotTracker,
    InvariantValidator,
    ReconciliationPipeline,
    ReconciliationService,
  ],
  exports: [RECONCILIATION_CONFIG, ReconciliationPipeline, ReconciliationService],
})
export class ReconciliationModule {}
