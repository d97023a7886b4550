import type { DeploymentState } from '../types/k8s';
import { IssueSeverity } from '../types/report';
import { createFinding, minutesSince, requireField } from './ruleHelpers';
import type { Rule } from './types';

// An Available condition that is still True dates from before the shortfall,
// so a rollout is timed from the Progressing condition's last update instead
function shortfallStart(deployment: DeploymentState): Date | undefined {
  const available = deployment.conditions.find(c => c.type === 'Available');
  if (available?.status === 'False' && available.lastTransitionTime) return available.lastTransitionTime;
  const progressing = deployment.conditions.find(c => c.type === 'Progressing');
  return progressing?.lastUpdateTime ?? progressing?.lastTransitionTime ?? deployment.createdAt;
}

export const deploymentStuckRule: Rule<'Deployment'> = {
  category: 'DeploymentStuck',
  kind: 'Deployment',
  severity: IssueSeverity.WARNING,
  evaluate(deployment, context) {
    const desired = requireField(deployment.desiredReplicas, 'spec.replicas');
    const available = deployment.availableReplicas;
    if (available >= desired) return [];

    const since = requireField(shortfallStart(deployment), 'metadata.creationTimestamp');
    const minutes = minutesSince(since, context.now);
    if (minutes < context.thresholds.deploymentGraceMinutes) return [];
    return [createFinding(this, deployment, context, { available, desired, minutes })];
  }
};

export const deploymentNotProgressingRule: Rule<'Deployment'> = {
  category: 'DeploymentNotProgressing',
  kind: 'Deployment',
  severity: IssueSeverity.WARNING,
  evaluate(deployment, context) {
    const progressing = deployment.conditions.find(c => c.type === 'Progressing');
    if (progressing?.status !== 'False') return [];
    return [
      createFinding(this, deployment, context, {
        reason: progressing.reason ?? 'unknown reason',
        detail: progressing.message ?? ''
      })
    ];
  }
};

export const deploymentRules = [deploymentStuckRule, deploymentNotProgressingRule];
