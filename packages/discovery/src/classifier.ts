import type { CategoryLabel, ClassificationRule, DiscoveryRules, ServiceUnit } from '@homelab/shared';
import { unitBaseName } from './units.js';

export type Classifier = (unit: Pick<ServiceUnit, 'name' | 'unitType'>) => CategoryLabel;

/**
 * Orders rules so a longer pattern is always tried before a shorter one;
 * equal lengths keep their declared order.
 */
export function orderRules(rules: readonly ClassificationRule[]): ClassificationRule[] {
  return rules
    .map((rule, index) => ({ rule, index }))
    .sort((a, b) => b.rule.pattern.length - a.rule.pattern.length || a.index - b.index)
    .map(({ rule }) => rule);
}

function matches(rule: ClassificationRule, baseName: string, unit: Pick<ServiceUnit, 'unitType'>) {
  if (rule.unitType !== undefined && rule.unitType !== unit.unitType) return false;
  return rule.match === 'prefix' ? baseName.startsWith(rule.pattern) : baseName.includes(rule.pattern);
}

/**
 * Builds a classifier over a fixed rule table. Name rules are checked first
 * (first match wins), then the unit type's default, then `other`.
 */
export function createClassifier(
  rules: Pick<DiscoveryRules, 'classification' | 'typeDefaults'>,
): Classifier {
  const ordered = orderRules(rules.classification);

  return (unit) => {
    const baseName = unitBaseName(unit.name);
    const rule = ordered.find((r) => matches(r, baseName, unit));
    return rule?.category ?? rules.typeDefaults[unit.unitType] ?? 'other';
  };
}
