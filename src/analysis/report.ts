import type { RuleTable } from '../rules/ruleTable';
import type { RuleContext } from '../rules/types';
import type { ClusterSnapshot } from '../types/k8s';
import type { Report } from '../types/report';
import { aggregateFindings } from './aggregator';
import { evaluateSnapshot } from './evaluator';

export function buildReport(snapshot: ClusterSnapshot, context: RuleContext, rules?: RuleTable): Report {
  const findings = aggregateFindings(evaluateSnapshot(snapshot, context, rules));
  return Object.freeze({
    generatedAt: snapshot.takenAt.toISOString(),
    scope: snapshot.scope,
    findings: Object.freeze(findings),
    notices: snapshot.failures
  });
}
