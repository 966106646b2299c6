import { Injectable } from '@nestjs/common';
import { RULES } from '../domain/rules';
import { ViolationCollector } from '../domain/violations';
import { Ranked, TieBreakPolicy } from './tie-break.policies';

export interface DuplicateGroup<T> {
  key: string;
  retained: T;
  discarded: T[];
}

export interface CollapseResult<T> {
  /** One record per key, in order of each key's first appearance. */
  retained: T[];
  duplicateGroups: DuplicateGroup<T>[];
}

@Injectable()
export class Deduplicator {
  collapse<T>(
    items: readonly T[],
    keyOf: (item: T) => string,
    policy: TieBreakPolicy<T>,
    collector: ViolationCollector
  ): CollapseResult<T> {
    const groups = new Map<string, Ranked<T>[]>();
    items.forEach((item, index) => {
      const key = keyOf(item);
      const group = groups.get(key);
      if (group) {
        group.push({ item, index });
      } else {
        groups.set(key, [{ item, index }]);
      }
    });

    const retained: T[] = [];
    const duplicateGroups: DuplicateGroup<T>[] = [];

    for (const [key, candidates] of groups) {
      const [winner, ...losers] = [...candidates].sort(policy.compare);
      if (winner === undefined) {
        collector.raise(RULES.emptyDedupGroup, key, `No record retained for key under policy ${policy.name}`);
        continue;
      }
      retained.push(winner.item);
      if (losers.length > 0) {
        duplicateGroups.push({ key, retained: winner.item, discarded: losers.map((loser) => loser.item) });
      }
    }

    return { retained, duplicateGroups };
  }
}
