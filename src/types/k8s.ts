// Compact resource states the rules evaluate. Built from the raw API objects
// by utils/k8sDataFilter; never hold references to those objects.

export type ResourceKind = 'Pod' | 'Node' | 'PVC' | 'Deployment' | 'Event';

export interface Condition {
  type: string;
  status: string;
  reason?: string | undefined;
  message?: string | undefined;
  lastTransitionTime?: Date | undefined;
  // Deployment conditions only
  lastUpdateTime?: Date | undefined;
}

export interface ContainerState {
  name: string;
  ready?: boolean | undefined;
  restartCount?: number | undefined;
  waitingReason?: string | undefined;
  waitingMessage?: string | undefined;
  terminatedReason?: string | undefined;
  terminatedExitCode?: number | undefined;
  lastTerminatedReason?: string | undefined;
  lastTerminatedExitCode?: number | undefined;
}

export interface PodState {
  kind: 'Pod';
  name: string;
  namespace: string;
  phase?: string | undefined;
  createdAt?: Date | undefined;
  restartCount: number;
  containers: ContainerState[];
  conditions: Condition[];
}

export interface NodeState {
  kind: 'Node';
  name: string;
  schedulable: boolean;
  conditions: Condition[];
}

export interface PvcState {
  kind: 'PVC';
  name: string;
  namespace: string;
  phase?: string | undefined;
  createdAt?: Date | undefined;
  storageClass?: string | undefined;
}

export interface DeploymentState {
  kind: 'Deployment';
  name: string;
  namespace: string;
  desiredReplicas?: number | undefined;
  availableReplicas: number;
  createdAt?: Date | undefined;
  conditions: Condition[];
}

export interface InvolvedObject {
  kind?: string | undefined;
  name?: string | undefined;
  namespace?: string | undefined;
}

export interface EventState {
  kind: 'Event';
  name: string;
  namespace?: string | undefined;
  type?: string | undefined;
  reason?: string | undefined;
  message?: string | undefined;
  count?: number | undefined;
  involvedObject: InvolvedObject;
  lastSeen?: Date | undefined;
}

export type ResourceState = PodState | NodeState | PvcState | DeploymentState | EventState;

// Picks the state variant for a kind, e.g. StateOf<'Pod'> is PodState
export type StateOf<K extends ResourceKind> = Extract<ResourceState, { kind: K }>;

export interface ScanScope {
  // Undefined means all namespaces
  namespace?: string | undefined;
}

export interface DataNotice {
  kind: ResourceKind;
  error: 'PartialDataError';
  reason: string;
}

export interface ClusterSnapshot {
  readonly takenAt: Date;
  readonly scope: ScanScope;
  readonly pods: readonly PodState[];
  readonly nodes: readonly NodeState[];
  readonly pvcs: readonly PvcState[];
  readonly deployments: readonly DeploymentState[];
  readonly events: readonly EventState[];
  readonly failures: readonly DataNotice[];
}
