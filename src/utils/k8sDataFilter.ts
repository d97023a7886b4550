import type {
  CoreV1Event,
  V1ContainerStatus,
  V1Deployment,
  V1Node,
  V1PersistentVolumeClaim,
  V1Pod
} from '@kubernetes/client-node';
import type {
  Condition,
  ContainerState,
  DeploymentState,
  EventState,
  NodeState,
  PodState,
  PvcState
} from '../types/k8s';

// Every raw condition type (pod, node, deployment) has this shape
interface RawCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
  lastTransitionTime?: Date;
  lastUpdateTime?: Date;
}

function toDate(value: Date | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function mapCondition(c: RawCondition): Condition {
  return {
    type: c.type,
    status: c.status,
    ...(c.reason && { reason: c.reason }),
    ...(c.message && { message: c.message }),
    ...(c.lastTransitionTime && { lastTransitionTime: toDate(c.lastTransitionTime) }),
    ...(c.lastUpdateTime && { lastUpdateTime: toDate(c.lastUpdateTime) })
  };
}

function mapConditions(conditions: RawCondition[] | undefined): Condition[] {
  return (conditions || []).map(mapCondition);
}

function mapContainerStatus(cs: V1ContainerStatus): ContainerState {
  const waiting = cs.state?.waiting;
  const terminated = cs.state?.terminated;
  const lastTerminated = cs.lastState?.terminated;
  return {
    name: cs.name,
    ready: cs.ready,
    restartCount: cs.restartCount,
    ...(waiting?.reason && { waitingReason: waiting.reason }),
    ...(waiting?.message && { waitingMessage: waiting.message }),
    ...(terminated?.reason && { terminatedReason: terminated.reason }),
    ...(terminated && { terminatedExitCode: terminated.exitCode }),
    ...(lastTerminated?.reason && { lastTerminatedReason: lastTerminated.reason }),
    ...(lastTerminated && { lastTerminatedExitCode: lastTerminated.exitCode })
  };
}

function calculateRestarts(containerStatuses: V1ContainerStatus[]): number {
  return containerStatuses.reduce((sum, cs) => sum + (cs.restartCount || 0), 0);
}

// Records without a name cannot be referenced by a finding and are dropped
export function filterPodData(pod: V1Pod): PodState | null {
  const name = pod.metadata?.name;
  if (!name) return null;

  const statuses = [...(pod.status?.initContainerStatuses || []), ...(pod.status?.containerStatuses || [])];
  return {
    kind: 'Pod',
    name,
    namespace: pod.metadata?.namespace || 'default',
    phase: pod.status?.phase,
    createdAt: toDate(pod.metadata?.creationTimestamp),
    restartCount: calculateRestarts(statuses),
    containers: statuses.map(mapContainerStatus),
    conditions: mapConditions(pod.status?.conditions)
  };
}

export function filterNodeData(node: V1Node): NodeState | null {
  const name = node.metadata?.name;
  if (!name) return null;

  return {
    kind: 'Node',
    name,
    schedulable: !node.spec?.unschedulable,
    conditions: mapConditions(node.status?.conditions)
  };
}

export function filterPvcData(pvc: V1PersistentVolumeClaim): PvcState | null {
  const name = pvc.metadata?.name;
  if (!name) return null;

  return {
    kind: 'PVC',
    name,
    namespace: pvc.metadata?.namespace || 'default',
    phase: pvc.status?.phase,
    createdAt: toDate(pvc.metadata?.creationTimestamp),
    ...(pvc.spec?.storageClassName && { storageClass: pvc.spec.storageClassName })
  };
}

export function filterDeploymentData(deployment: V1Deployment): DeploymentState | null {
  const name = deployment.metadata?.name;
  if (!name) return null;

  return {
    kind: 'Deployment',
    name,
    namespace: deployment.metadata?.namespace || 'default',
    desiredReplicas: deployment.spec?.replicas,
    availableReplicas: deployment.status?.availableReplicas || 0,
    createdAt: toDate(deployment.metadata?.creationTimestamp),
    conditions: mapConditions(deployment.status?.conditions)
  };
}

export function filterEventData(event: CoreV1Event): EventState | null {
  const name = event.metadata?.name;
  if (!name) return null;

  // Newer events only fill eventTime or series.lastObservedTime
  const lastSeen = toDate(
    event.lastTimestamp || event.series?.lastObservedTime || event.eventTime || event.firstTimestamp
  );

  return {
    kind: 'Event',
    name,
    namespace: event.metadata?.namespace,
    type: event.type,
    reason: event.reason,
    message: event.message,
    count: event.count,
    involvedObject: {
      kind: event.involvedObject?.kind,
      name: event.involvedObject?.name,
      ...(event.involvedObject?.namespace && { namespace: event.involvedObject.namespace })
    },
    lastSeen
  };
}
