import { ClaimDetail, ClaimPaymentDetail, ClaimSnapshot } from '../domain/types';
import { Violation } from '../domain/violations';
import { RunSummary } from '../reconciliation.pipeline';

export const RECONCILIATION_STORE = Symbol('RECONCILIATION_STORE');

export interface ReconciliationStore {
  /** Every snapshot row recorded by earlier runs, in history order. */
  loadSnapshotHistory(): Promise<ClaimSnapshot[]>;
  /** Swaps both ledgers for the given rows in one transaction. */
  replaceLedgers(details: readonly ClaimDetail[], paymentDetails: readonly ClaimPaymentDetail[]): Promise<void>;
  /** Inserts snapshot rows; ids already recorded are left as they are. */
  appendSnapshots(rows: readonly ClaimSnapshot[]): Promise<void>;
  recordRun(run: RunSummary, violations: readonly Violation[]): Promise<void>;
}
