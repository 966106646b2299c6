import 'reflect-metadata';
import { createDataSource, DataSource } from '@claims-recon/shared';
import { loadReconciliationConfig, ReconciliationConfig } from './config/reconciliation.config';
import { RECONCILIATION_ENTITIES } from './entities/ReconciliationEntities';

export * from './config/reconciliation.config';
export * from './domain/types';
export * from './domain/violations';
export { RULES } from './domain/rules';
export { ReconciliationError, MissingKeyComponentError, ConfigurationError } from './domain/errors';
export * from './keys/key-generator';
export { RawReconciliationInput } from './normalizer/raw-records';
export * from './normalizer/entity-normalizer';
export * from './dedup/deduplicator';
export * from './dedup/tie-break.policies';
export * from './coverage/coverage-resolver';
export * from './ledger/claim-ledger.builder';
export * from './snapshots/snapshot-tracker';
export * from './snapshots/point-in-time';
export * from './validation/invariant-validator';
export * from './reconciliation.pipeline';
export * from './store/reconciliation.store';
export { TypeOrmReconciliationStore } from './store/typeorm-reconciliation.store';
export * from './entities/ReconciliationEntities';
export { ReconciliationService } from './reconciliation.service';
export { ReconciliationModule } from './reconciliation.module';
export { AppModule } from './app.module';

export const createReconciliationDataSource = (
  config: ReconciliationConfig = loadReconciliationConfig()
): DataSource => createDataSource({ ...config.database, entities: RECONCILIATION_ENTITIES });
