import { getLogger } from '@fluidware-it/saddlebag';
import { RuleEvaluationSkip } from '../errors/inspectorErrors';
import { defaultRuleTable, type RuleTable } from '../rules/ruleTable';
import type { AnyRule, Rule, RuleContext } from '../rules/types';
import type { ClusterSnapshot, ResourceKind, StateOf } from '../types/k8s';
import type { Finding } from '../types/report';

const logger = getLogger();

function runRule<K extends ResourceKind>(
  rule: Rule<K>,
  states: readonly StateOf<K>[],
  context: RuleContext
): Finding[] {
  const findings: Finding[] = [];
  for (const state of states) {
    try {
      findings.push(...rule.evaluate(state, context));
    } catch (error) {
      if (!(error instanceof RuleEvaluationSkip)) throw error;
      logger.debug(`Rule ${rule.category} skipped ${rule.kind} ${state.name}: ${error.message}`);
    }
  }
  return findings;
}

function applyRule(rule: AnyRule, snapshot: ClusterSnapshot, context: RuleContext): Finding[] {
  switch (rule.kind) {
    case 'Pod':
      return runRule(rule, snapshot.pods, context);
    case 'Node':
      return runRule(rule, snapshot.nodes, context);
    case 'PVC':
      return runRule(rule, snapshot.pvcs, context);
    case 'Deployment':
      return runRule(rule, snapshot.deployments, context);
    case 'Event':
      return runRule(rule, snapshot.events, context);
  }
}

/**
 * Runs every rule in the table over the matching resources of the snapshot.
 * Pure apart from debug logging; the result is unordered and may contain
 * duplicates, see aggregateFindings.
 */
export function evaluateSnapshot(
  snapshot: ClusterSnapshot,
  context: RuleContext,
  rules: RuleTable = defaultRuleTable
): Finding[] {
  const findings: Finding[] = [];
  for (const rule of rules.values()) {
    findings.push(...applyRule(rule, snapshot, context));
  }
  return findings;
}
