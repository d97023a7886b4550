import type { RuleThresholds } from '../config/config';
import type { ResourceKind, StateOf } from '../types/k8s';
import type { Finding, IssueSeverity } from '../types/report';

export interface RuleContext {
  now: Date;
  thresholds: RuleThresholds;
  // Command shown in suggestions, normally "kubectl"
  cliName: string;
}

export interface Rule<K extends ResourceKind = ResourceKind> {
  category: string;
  kind: K;
  severity: IssueSeverity;
  evaluate(state: StateOf<K>, context: RuleContext): Finding[];
}

// Lets the rule table hold rules of every kind while each keeps its narrowed state type
export type AnyRule = { [K in ResourceKind]: Rule<K> }[ResourceKind];
