import { RuleEvaluationSkip } from '../errors/inspectorErrors';
import type { ResourceState } from '../types/k8s';
import type { Finding, ResourceRef } from '../types/report';
import { getCategoryText, renderTemplate, type TemplateVars } from './suggestions';
import type { Rule, RuleContext } from './types';

export function requireField<T>(value: T | undefined | null, field: string): T {
  if (value === undefined || value === null) {
    throw new RuleEvaluationSkip(field);
  }
  return value;
}

export function refOf(state: ResourceState): ResourceRef {
  return {
    kind: state.kind,
    name: state.name,
    ...('namespace' in state && state.namespace && { namespace: state.namespace })
  };
}

export function minutesSince(since: Date, now: Date): number {
  return Math.floor((now.getTime() - since.getTime()) / 60_000);
}

export function createFinding(
  rule: Pick<Rule, 'category' | 'severity'>,
  state: ResourceState,
  context: RuleContext,
  vars: TemplateVars,
  relatedTo?: ResourceRef
): Finding {
  const text = getCategoryText(rule.category);
  const allVars: TemplateVars = {
    cli: context.cliName,
    name: state.name,
    namespace: 'namespace' in state ? state.namespace : undefined,
    detail: '',
    ...vars
  };
  return Object.freeze({
    resource: Object.freeze(refOf(state)),
    severity: rule.severity,
    category: rule.category,
    message: renderTemplate(text.message, allVars),
    suggestion: renderTemplate(text.suggestion, allVars),
    ...(relatedTo && { relatedTo: Object.freeze(relatedTo) })
  });
}
