import type { CoreV1Event, V1Deployment, V1Node, V1PersistentVolumeClaim, V1Pod } from '@kubernetes/client-node';
import type { ClusterReader } from '../../src/cluster/clusterReader';
import type { KubectlResult, KubectlRunner } from '../../src/manifest/kubectl';
import type { RuleContext } from '../../src/rules/types';
import type {
  ClusterSnapshot,
  DeploymentState,
  EventState,
  NodeState,
  PodState,
  PvcState
} from '../../src/types/k8s';

export const NOW = new Date('2024-05-01T12:00:00Z');

export function minutesAgo(minutes: number): Date {
  return new Date(NOW.getTime() - minutes * 60_000);
}

export function makeContext(overrides: Partial<RuleContext['thresholds']> = {}): RuleContext {
  return {
    now: NOW,
    cliName: 'kubectl',
    thresholds: {
      restartCount: 5,
      podPendingGraceMinutes: 5,
      pvcGraceMinutes: 5,
      deploymentGraceMinutes: 10,
      eventWindowMinutes: 60,
      ...overrides
    }
  };
}

export function makePod(overrides: Partial<PodState> = {}): PodState {
  return {
    kind: 'Pod',
    name: 'web-1',
    namespace: 'default',
    phase: 'Running',
    createdAt: minutesAgo(30),
    restartCount: 0,
    containers: [{ name: 'main', ready: true, restartCount: 0 }],
    conditions: [],
    ...overrides
  };
}

export function makeNode(overrides: Partial<NodeState> = {}): NodeState {
  return {
    kind: 'Node',
    name: 'node-1',
    schedulable: true,
    conditions: [{ type: 'Ready', status: 'True' }],
    ...overrides
  };
}

export function makePvc(overrides: Partial<PvcState> = {}): PvcState {
  return {
    kind: 'PVC',
    name: 'data-0',
    namespace: 'default',
    phase: 'Bound',
    createdAt: minutesAgo(30),
    ...overrides
  };
}

export function makeDeployment(overrides: Partial<DeploymentState> = {}): DeploymentState {
  return {
    kind: 'Deployment',
    name: 'api',
    namespace: 'default',
    desiredReplicas: 3,
    availableReplicas: 3,
    createdAt: minutesAgo(60),
    conditions: [],
    ...overrides
  };
}

export function makeEvent(overrides: Partial<EventState> = {}): EventState {
  return {
    kind: 'Event',
    name: 'web-1.17c5a',
    namespace: 'default',
    type: 'Warning',
    reason: 'BackOff',
    message: 'Back-off restarting failed container',
    count: 3,
    involvedObject: { kind: 'Pod', name: 'web-1', namespace: 'default' },
    lastSeen: minutesAgo(2),
    ...overrides
  };
}

export function makeSnapshot(overrides: Partial<ClusterSnapshot> = {}): ClusterSnapshot {
  return {
    takenAt: NOW,
    scope: {},
    pods: [],
    nodes: [],
    pvcs: [],
    deployments: [],
    events: [],
    failures: [],
    ...overrides
  };
}

export interface FakeClusterData {
  pods?: V1Pod[] | Error;
  nodes?: V1Node[] | Error;
  pvcs?: V1PersistentVolumeClaim[] | Error;
  deployments?: V1Deployment[] | Error;
  events?: CoreV1Event[] | Error;
}

function respond<T>(value: T[] | Error | undefined): Promise<T[]> {
  if (value instanceof Error) return Promise.reject(value);
  return Promise.resolve(value ?? []);
}

// In-process stand-in for the API server; records the scopes it was asked for
export function fakeReader(data: FakeClusterData): ClusterReader & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    listPods: scope => {
      calls.push(`pods:${scope.namespace ?? '*'}`);
      return respond(data.pods);
    },
    listNodes: () => {
      calls.push('nodes');
      return respond(data.nodes);
    },
    listPersistentVolumeClaims: scope => {
      calls.push(`pvcs:${scope.namespace ?? '*'}`);
      return respond(data.pvcs);
    },
    listDeployments: scope => {
      calls.push(`deployments:${scope.namespace ?? '*'}`);
      return respond(data.deployments);
    },
    listEvents: scope => {
      calls.push(`events:${scope.namespace ?? '*'}`);
      return respond(data.events);
    }
  };
}

export interface FakeRunner extends KubectlRunner {
  runs: string[][];
}

// Stands in for kubectl; `respond` decides the result of each invocation
export function fakeRunner(
  available: boolean,
  respondTo: (args: readonly string[]) => KubectlResult = () => ({ exitCode: 0, output: '', timedOut: false })
): FakeRunner {
  const runs: string[][] = [];
  return {
    runs,
    isAvailable: () => Promise.resolve(available),
    run: (args: readonly string[]) => {
      runs.push([...args]);
      return Promise.resolve(respondTo(args));
    }
  };
}

// An error shaped like the client's ApiException
export function apiError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

export function networkError(code: string): Error {
  return Object.assign(new Error(`request failed, reason: connect ${code} 10.0.0.1:6443`), { code });
}
