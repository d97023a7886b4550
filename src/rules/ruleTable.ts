import { deploymentRules } from './deploymentRules';
import { eventRules } from './eventRules';
import { nodeRules } from './nodeRules';
import { podRules } from './podRules';
import { storageRules } from './storageRules';
import type { AnyRule } from './types';

export type RuleTable = ReadonlyMap<string, AnyRule>;

export function buildRuleTable(rules: readonly AnyRule[]): RuleTable {
  const table = new Map<string, AnyRule>();
  for (const rule of rules) {
    if (table.has(rule.category)) {
      throw new Error(`Duplicate rule for category "${rule.category}"`);
    }
    table.set(rule.category, rule);
  }
  return table;
}

export const defaultRules: readonly AnyRule[] = [
  ...podRules,
  ...nodeRules,
  ...storageRules,
  ...deploymentRules,
  ...eventRules
];

export const defaultRuleTable: RuleTable = buildRuleTable(defaultRules);
