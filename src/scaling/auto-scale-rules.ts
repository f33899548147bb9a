import { AutoScaleRule, ScalingAction, ScalingMetric } from '../types';

export const DEFAULT_COOLDOWN_SECONDS = 300;

export class AutoScaleRules {
  private rules: AutoScaleRule[] = [];

  /**
   * Records a rule. The cooldown is stored for the provider; nothing here enforces it.
   */
  addRule(
    metric: ScalingMetric,
    threshold: number,
    action: ScalingAction,
    cooldownSeconds: number = DEFAULT_COOLDOWN_SECONDS
  ): { ruleId: number; rule: AutoScaleRule } {
    const rule: AutoScaleRule = { metric, threshold, action, cooldownSeconds };
    this.rules.push(rule);
    return { ruleId: this.rules.length, rule: { ...rule } };
  }

  getRules(): AutoScaleRule[] {
    return this.rules.map(r => ({ ...r }));
  }

  get size(): number {
    return this.rules.length;
  }

  clear(): void {
    this.rules = [];
  }
}
