import type { ContainerState, PodState } from '../types/k8s';
import { IssueSeverity } from '../types/report';
import { createFinding, minutesSince, requireField } from './ruleHelpers';
import type { Rule } from './types';

const IMAGE_PULL_REASONS = ['ImagePullBackOff', 'ErrImagePull', 'RegistryUnavailable', 'InvalidImageName'];
const CONTAINER_CONFIG_REASONS = ['CreateContainerConfigError', 'CreateContainerError'];

function firstWaiting(pod: PodState, reasons: string[]): ContainerState | undefined {
  return pod.containers.find(c => c.waitingReason !== undefined && reasons.includes(c.waitingReason));
}

function namesOf(containers: ContainerState[]): string {
  return containers.map(c => c.name).join(', ');
}

export const crashLoopBackOffRule: Rule<'Pod'> = {
  category: 'CrashLoopBackOff',
  kind: 'Pod',
  severity: IssueSeverity.CRITICAL,
  evaluate(pod, context) {
    const crashing = pod.containers.filter(c => c.waitingReason === 'CrashLoopBackOff');
    const first = crashing[0];
    if (!first) return [];
    return [
      createFinding(this, pod, context, {
        container: first.name,
        restarts: first.restartCount ?? pod.restartCount,
        detail: crashing.length > 1 ? `Also crashing: ${namesOf(crashing.slice(1))}.` : (first.waitingMessage ?? '')
      })
    ];
  }
};

export const imagePullBackOffRule: Rule<'Pod'> = {
  category: 'ImagePullBackOff',
  kind: 'Pod',
  severity: IssueSeverity.CRITICAL,
  evaluate(pod, context) {
    const container = firstWaiting(pod, IMAGE_PULL_REASONS);
    if (!container) return [];
    return [
      createFinding(this, pod, context, {
        container: container.name,
        reason: container.waitingReason,
        detail: container.waitingMessage ?? ''
      })
    ];
  }
};

export const oomKilledRule: Rule<'Pod'> = {
  category: 'OOMKilled',
  kind: 'Pod',
  severity: IssueSeverity.CRITICAL,
  evaluate(pod, context) {
    const container = pod.containers.find(
      c => c.terminatedReason === 'OOMKilled' || c.lastTerminatedReason === 'OOMKilled'
    );
    if (!container) return [];
    const exitCode =
      container.terminatedReason === 'OOMKilled' ? container.terminatedExitCode : container.lastTerminatedExitCode;
    return [
      createFinding(this, pod, context, {
        container: container.name,
        exitCode: exitCode ?? 137
      })
    ];
  }
};

export const containerConfigErrorRule: Rule<'Pod'> = {
  category: 'CreateContainerConfigError',
  kind: 'Pod',
  severity: IssueSeverity.CRITICAL,
  evaluate(pod, context) {
    const container = firstWaiting(pod, CONTAINER_CONFIG_REASONS);
    if (!container) return [];
    return [
      createFinding(this, pod, context, {
        container: container.name,
        reason: container.waitingReason,
        detail: container.waitingMessage ?? ''
      })
    ];
  }
};

export const highRestartCountRule: Rule<'Pod'> = {
  category: 'HighRestartCount',
  kind: 'Pod',
  severity: IssueSeverity.WARNING,
  evaluate(pod, context) {
    const threshold = context.thresholds.restartCount;
    if (pod.restartCount < threshold) return [];
    return [createFinding(this, pod, context, { restarts: pod.restartCount, threshold })];
  }
};

export const podPendingRule: Rule<'Pod'> = {
  category: 'PodPending',
  kind: 'Pod',
  severity: IssueSeverity.WARNING,
  evaluate(pod, context) {
    if (pod.phase !== 'Pending') return [];
    const createdAt = requireField(pod.createdAt, 'metadata.creationTimestamp');
    const minutes = minutesSince(createdAt, context.now);
    if (minutes < context.thresholds.podPendingGraceMinutes) return [];
    const scheduled = pod.conditions.find(c => c.type === 'PodScheduled' && c.status !== 'True');
    return [createFinding(this, pod, context, { minutes, detail: scheduled?.message ?? '' })];
  }
};

export const podRules = [
  crashLoopBackOffRule,
  imagePullBackOffRule,
  oomKilledRule,
  containerConfigErrorRule,
  highRestartCountRule,
  podPendingRule
];
