import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildDataSourceOptions } from '@claims-recon/shared';
import { loadReconciliationConfig } from './config/reconciliation.config';
import { RECONCILIATION_ENTITIES } from './entities/ReconciliationEntities';
import { ReconciliationModule } from './reconciliation.module';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: () => {
        const { database } = loadReconciliationConfig();
        return buildDataSourceOptions({ ...database, entities: RECONCILIATION_ENTITIES });
      },
    }),
    ReconciliationModule,
  ],
})
export class AppModule {}
