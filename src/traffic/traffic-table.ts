import { TrafficRule } from '../types';

export const MIN_WEIGHT = 0;
export const MAX_WEIGHT = 100;

export function clampWeight(weight: number): number {
  return Math.max(MIN_WEIGHT, Math.min(MAX_WEIGHT, Math.round(weight)));
}

/**
 * Append-only routing rules. A rule's id is its 1-based insertion index;
 * duplicates are kept as separate rules.
 */
export class TrafficTable {
  private rules: TrafficRule[] = [];

  addRule(sourcePattern: string, target: string, weight: number, condition?: string): { ruleId: number; rule: TrafficRule } {
    const rule: TrafficRule = {
      sourcePattern,
      target,
      weight: clampWeight(weight),
      ...(condition !== undefined && { condition })
    };
    this.rules.push(rule);
    return { ruleId: this.rules.length, rule: { ...rule } };
  }

  getRule(ruleId: number): TrafficRule | undefined {
    const rule = this.rules[ruleId - 1];
    return rule ? { ...rule } : undefined;
  }

  getRules(): TrafficRule[] {
    return this.rules.map(r => ({ ...r }));
  }

  get size(): number {
    return this.rules.length;
  }

  clear(): void {
    this.rules = [];
  }
}
