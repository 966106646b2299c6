import { RuleDefinition } from './rules';

export const VIOLATION_CATEGORIES = [
  'NormalizationError',
  'MissingKeyComponent',
  'DeduplicationError',
  'ReferentialIntegrityError',
  'FinancialReconciliationError',
  'SnapshotKeyCollision',
  'DataQualityWarning',
] as const;
export type ViolationCategory = (typeof VIOLATION_CATEGORIES)[number];

export type Severity = 'error' | 'warn';

export interface Violation {
  ruleId: string;
  category: ViolationCategory;
  severity: Severity;
  entityKey: string;
  message: string;
}

export interface StageResult<T> {
  output: T;
  violations: Violation[];
}

export interface ViolationReport {
  violations: Violation[];
  errors: Violation[];
  warnings: Violation[];
  counts: {
    error: number;
    warn: number;
    byCategory: Record<ViolationCategory, number>;
  };
}

export type EntityKeyValue = string | number | boolean | Date | null | undefined;

export function formatEntityKey(parts: Record<string, EntityKeyValue>): string {
  return Object.entries(parts)
    .map(([name, value]) => {
      if (value === null || value === undefined) return `${name}=null`;
      if (value instanceof Date) return `${name}=${value.toISOString()}`;
      return `${name}=${String(value)}`;
    })
    .join('|');
}

export class ViolationCollector {
  private readonly items: Violation[] = [];

  raise(rule: RuleDefinition, entityKey: string, message: string): void {
    this.items.push({
      ruleId: rule.id,
      category: rule.category,
      severity: rule.severity,
      entityKey,
      message,
    });
  }

  get violations(): Violation[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}

const compareText = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

const severityRank = (severity: Severity): number => {
  switch (severity) {
    case 'error':
      return 0;
    case 'warn':
      return 1;
  }
};

export function buildViolationReport(violations: readonly Violation[]): ViolationReport {
  const ordered = [...violations].sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      compareText(a.ruleId, b.ruleId) ||
      compareText(a.entityKey, b.entityKey) ||
      compareText(a.message, b.message)
  );

  const byCategory: Record<ViolationCategory, number> = {
    NormalizationError: 0,
    MissingKeyComponent: 0,
    DeduplicationError: 0,
    ReferentialIntegrityError: 0,
    FinancialReconciliationError: 0,
    SnapshotKeyCollision: 0,
    DataQualityWarning: 0,
  };
  for (const violation of ordered) {
    byCategory[violation.category] += 1;
  }

  const errors = ordered.filter((v) => v.severity === 'error');
  const warnings = ordered.filter((v) => v.severity === 'warn');

  return {
    violations: ordered,
    errors,
    warnings,
    counts: { error: errors.length, warn: warnings.length, byCategory },
  };
}
