import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import { buildRawInput, RUN_TIMESTAMP, testConfig } from '../test/fixtures';
import { InMemoryReconciliationStore } from '../test/in-memory-reconciliation.store';
import { RECONCILIATION_CONFIG } from './config/reconciliation.config';
import { createReconciliationPipeline, ReconciliationPipeline } from './reconciliation.pipeline';
import { ReconciliationModule } from './reconciliation.module';
import { ReconciliationService } from './reconciliation.service';
import { RECONCILIATION_STORE } from './store/reconciliation.store';

describe('ReconciliationService', () => {
  let moduleRef: TestingModule;
  let store: InMemoryReconciliationStore;
  let service: ReconciliationService;

  beforeEach(async () => {
    store = new InMemoryReconciliationStore();
    moduleRef = await Test.createTestingModule({ imports: [ReconciliationModule] })
      .overrideProvider(RECONCILIATION_CONFIG)
      .useValue(testConfig)
      .overrideProvider(RECONCILIATION_STORE)
      .useValue(store)
      .compile();
    await moduleRef.init();
    service = moduleRef.get(ReconciliationService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('wires the same pipeline the standalone factory builds', () => {
    const wired = moduleRef.get(ReconciliationPipeline).run(buildRawInput(), { runTimestamp: RUN_TIMESTAMP });
    const standalone = createReconciliationPipeline(testConfig).run(buildRawInput(), { runTimestamp: RUN_TIMESTAMP });

    expect(JSON.stringify(wired)).toBe(JSON.stringify(standalone));
  });

  it('persists ledgers, new snapshots and the run record', async () => {
    const result = await service.reconcile(buildRawInput(), { runTimestamp: RUN_TIMESTAMP });

    expect(store.claimDetails).toEqual(result.claimDetailLedger);
    expect(store.claimPaymentDetails).toEqual(result.claimPaymentDetailLedger);
    expect(store.snapshots).toEqual(result.appendedSnapshots);
    expect(store.runs).toEqual([{ run: result.summary, violations: [] }]);
  });

  it('carries stored history into the next run', async () => {
    const first = await service.reconcile(buildRawInput(), { runTimestamp: RUN_TIMESTAMP });
    const second = await service.reconcile(buildRawInput(), { runTimestamp: new Date('2024-04-02T06:00:00.000Z') });

    expect(second.appendedSnapshots).toEqual([]);
    expect(second.claimSnapshotHistory).toEqual(first.claimSnapshotHistory);
    expect(store.snapshots).toHaveLength(1);
    expect(store.snapshots[0].recordedAt).toEqual(RUN_TIMESTAMP);
    expect(store.runs.map((entry) => entry.run.runId)).toEqual([first.runId, second.runId]);
  });

  it('rethrows persistence failures without recording the run', async () => {
    store.failLedgerWrite = new Error('connection refused');

    await expect(service.reconcile(buildRawInput(), { runTimestamp: RUN_TIMESTAMP })).rejects.toThrow(
      'connection refused'
    );
    expect(store.snapshots).toEqual([]);
    expect(store.runs).toEqual([]);
  });
});
