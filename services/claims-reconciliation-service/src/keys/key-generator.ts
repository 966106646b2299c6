import { v5 as uuidv5 } from 'uuid';
import { MissingKeyComponentError } from '../domain/errors';

/** Fixed namespace so identifiers stay stable across runs and deployments. */
export const RECONCILIATION_KEY_NAMESPACE = '6f1c2a7e-3b54-4d8e-9a0f-5c7b2e9d4a13';

export type KeyComponent = number | string | boolean | Date | null | undefined;

export interface KeyOptions {
  /** Components allowed to be absent; they still occupy their position in the key. */
  optional?: readonly string[];
}

const ABSENT = '~';

function encodeComponent(entity: string, name: string, value: KeyComponent, optional: boolean): string {
  if (value === null || value === undefined) {
    if (!optional) {
      throw new MissingKeyComponentError(entity, name);
    }
    return ABSENT;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MissingKeyComponentError(entity, name);
    }
    return `t:${value.toISOString()}`;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MissingKeyComponentError(entity, name);
    }
    return `n:${value}`;
  }
  if (typeof value === 'boolean') {
    return `b:${value ? 1 : 0}`;
  }
  return `s:${value.length}:${value}`;
}

/**
 * Derives a name-based UUID (SHA-1) from an ordered, type-tagged rendering of
 * the components, e.g. `claim_detail|claim_id=n:7|procedure_id=n:12`.
 */
export function generateSurrogateKey(
  entity: string,
  components: ReadonlyArray<readonly [string, KeyComponent]>,
  options: KeyOptions = {}
): string {
  const optional = new Set(options.optional ?? []);
  const encoded = components.map(
    ([name, value]) => `${name}=${encodeComponent(entity, name, value, optional.has(name))}`
  );
  return uuidv5([entity, ...encoded].join('|'), RECONCILIATION_KEY_NAMESPACE);
}

export interface ClaimProcedureKey {
  claimId: number | null;
  procedureId: number | null;
  claimProcedureId: number | null;
}

export const claimDetailKey = (key: ClaimProcedureKey): string =>
  generateSurrogateKey('claim_detail', [
    ['claim_id', key.claimId],
    ['procedure_id', key.procedureId],
    ['claim_procedure_id', key.claimProcedureId],
  ]);

export const claimPaymentDetailKey = (key: ClaimProcedureKey & { claimPaymentId: number | null }): string =>
  generateSurrogateKey(
    'claim_payment_detail',
    [
      ['claim_id', key.claimId],
      ['procedure_id', key.procedureId],
      ['claim_procedure_id', key.claimProcedureId],
      ['claim_payment_id', key.claimPaymentId],
    ],
    { optional: ['claim_payment_id'] }
  );

export const claimSnapshotKey = (key: {
  claimProcedureId: number | null;
  snapshotTrigger: string | null;
  entryTimestamp: Date | null;
}): string =>
  generateSurrogateKey('claim_snapshot', [
    ['claim_procedure_id', key.claimProcedureId],
    ['snapshot_trigger', key.snapshotTrigger],
    ['entry_timestamp', key.entryTimestamp],
  ]);

export const reconciliationRunKey = (runTimestamp: Date): string =>
  generateSurrogateKey('reconciliation_run', [['run_timestamp', runTimestamp]]);
