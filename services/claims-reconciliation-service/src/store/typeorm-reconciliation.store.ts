import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ClaimDetail, ClaimPaymentDetail, ClaimSnapshot } from '../domain/types';
import { Violation } from '../domain/violations';
import {
  ClaimDetailRecord,
  ClaimPaymentDetailRecord,
  ClaimSnapshotRecord,
  ReconciliationRun,
  ReconciliationViolationRecord,
} from '../entities/ReconciliationEntities';
import { RunSummary } from '../reconciliation.pipeline';
import { ReconciliationStore } from './reconciliation.store';

const CHUNK_SIZE = 500;

@Injectable()
export class TypeOrmReconciliationStore implements ReconciliationStore {
  constructor(private readonly dataSource: DataSource) {}

  async loadSnapshotHistory(): Promise<ClaimSnapshot[]> {
    return this.dataSource.getRepository(ClaimSnapshotRecord).find({
      order: { entryTimestamp: 'ASC', claimProcedureId: 'ASC', claimSnapshotId: 'ASC' },
    });
  }

  async replaceLedgers(details: readonly ClaimDetail[], paymentDetails: readonly ClaimPaymentDetail[]): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.createQueryBuilder().delete().from(ClaimPaymentDetailRecord).execute();
      await manager.createQueryBuilder().delete().from(ClaimDetailRecord).execute();
      await manager.save(ClaimDetailRecord, [...details], { chunk: CHUNK_SIZE });
      await manager.save(ClaimPaymentDetailRecord, [...paymentDetails], { chunk: CHUNK_SIZE });
    });
  }

  async appendSnapshots(rows: readonly ClaimSnapshot[]): Promise<void> {
    if (rows.length === 0) return;
    await this.dataSource
      .createQueryBuilder()
      .insert()
      .into(ClaimSnapshotRecord)
      .values([...rows])
      .orIgnore()
      .execute();
  }

  async recordRun(run: RunSummary, violations: readonly Violation[]): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.save(ReconciliationRun, { ...run });
      await manager.delete(ReconciliationViolationRecord, { runId: run.runId });
      const rows = violations.map((violation, sequence) => ({ ...violation, runId: run.runId, sequence }));
      if (rows.length > 0) {
        await manager.save(ReconciliationViolationRecord, rows, { chunk: CHUNK_SIZE });
      }
    });
  }
}
