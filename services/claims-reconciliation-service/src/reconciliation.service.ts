import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Logger, Tracer } from '@claims-recon/shared';
import { createReconciliationLogger, RECONCILIATION_CONFIG, ReconciliationConfig } from './config/reconciliation.config';
import { RawReconciliationInput } from './normalizer/raw-records';
import { RECONCILIATION_TRACER, ReconciliationPipeline, ReconciliationResult } from './reconciliation.pipeline';
import { RECONCILIATION_STORE, ReconciliationStore } from './store/reconciliation.store';

@Injectable()
export class ReconciliationService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger;

  constructor(
    @Inject(RECONCILIATION_CONFIG) config: ReconciliationConfig,
    @Inject(RECONCILIATION_TRACER) private readonly tracer: Tracer,
    @Inject(RECONCILIATION_STORE) private readonly store: ReconciliationStore,
    private readonly pipeline: ReconciliationPipeline
  ) {
    this.logger = createReconciliationLogger(config, 'reconciliation-service');
  }

  onModuleInit(): void {
    this.tracer.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.tracer.stop();
  }

  /**
   * Runs one reconciliation against the stored snapshot history and persists
   * the outcome. Pass `runTimestamp` to reproduce an earlier run exactly.
   */
  async reconcile(input: RawReconciliationInput, options: { runTimestamp?: Date } = {}): Promise<ReconciliationResult> {
    const runTimestamp = options.runTimestamp ?? new Date();

    try {
      const priorSnapshotHistory = await this.store.loadSnapshotHistory();
      const result = this.pipeline.run(input, { runTimestamp, priorSnapshotHistory });
      await this.store.replaceLedgers(result.claimDetailLedger, result.claimPaymentDetailLedger);
      await this.store.appendSnapshots(result.appendedSnapshots);
      await this.store.recordRun(result.summary, result.violationReport.violations);
      return result;
    } catch (error) {
      this.logger.error('Reconciliation run failed', error instanceof Error ? error : undefined, {
        runTimestamp: runTimestamp.toISOString(),
      });
      throw error;
    }
  }
}
