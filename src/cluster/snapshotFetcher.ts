import { getLogger } from '@fluidware-it/saddlebag';
import {
  AuthError,
  ConnectivityError,
  FetchTimeoutError,
  PartialDataError,
  errorMessage
} from '../errors/inspectorErrors';
import type { ClusterSnapshot, DataNotice, ResourceKind, ScanScope } from '../types/k8s';
import {
  filterDeploymentData,
  filterEventData,
  filterNodeData,
  filterPodData,
  filterPvcData
} from '../utils/k8sDataFilter';
import type { ClusterReader } from './clusterReader';

const logger = getLogger();

const CONNECTIVITY_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'ECONNRESET', 'EAI_AGAIN'];

export interface FetchOptions {
  timeoutMs: number;
  now?: Date;
}

type Listing<T> = { ok: true; items: T[] } | { ok: false; error: unknown };

function errorCode(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) return error.code;
  return undefined;
}

export async function withTimeout<T>(label: string, timeoutMs: number, run: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new FetchTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([run(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function settle<T>(label: string, timeoutMs: number, run: () => Promise<T[]>): Promise<Listing<T>> {
  try {
    return { ok: true, items: await withTimeout(label, timeoutMs, run) };
  } catch (error: unknown) {
    return { ok: false, error };
  }
}

/**
 * Maps a failed listing onto the error taxonomy. Auth and connectivity
 * failures are returned as-is so the caller can abort; anything else becomes
 * a PartialDataError for that kind.
 */
export function classifyFailure(kind: ResourceKind, error: unknown): AuthError | ConnectivityError | PartialDataError {
  if (error instanceof FetchTimeoutError) {
    return new PartialDataError(kind, error.message, { cause: error });
  }

  const code = errorCode(error);
  if (code === 401) {
    return new AuthError(`Credentials rejected while listing ${kind} resources`, { cause: error });
  }

  const causeCode = error instanceof Error ? errorCode(error.cause) : undefined;
  const networkCode = [code, causeCode].find(c => typeof c === 'string' && CONNECTIVITY_CODES.includes(c));
  if (typeof networkCode === 'string') {
    return new ConnectivityError(`Cannot reach the Kubernetes API (${networkCode})`, { cause: error });
  }

  const status = typeof code === 'number' ? `HTTP ${code}: ` : '';
  const firstLine = errorMessage(error).split('\n')[0] ?? '';
  return new PartialDataError(kind, `${status}${firstLine}`, { cause: error });
}

function keep<T>(value: T | null): value is T {
  return value !== null;
}

/**
 * Reads pods, nodes, PVCs, deployments and events in parallel. Each listing
 * is bounded by options.timeoutMs. A failing listing leaves its kind empty and
 * adds a notice, unless the failure means the whole snapshot is unreliable.
 */
export async function fetchSnapshot(
  reader: ClusterReader,
  scope: ScanScope,
  options: FetchOptions
): Promise<ClusterSnapshot> {
  const { timeoutMs } = options;
  const [pods, nodes, pvcs, deployments, events] = await Promise.all([
    settle('pods', timeoutMs, () => reader.listPods(scope)),
    settle('nodes', timeoutMs, () => reader.listNodes()),
    settle('persistentvolumeclaims', timeoutMs, () => reader.listPersistentVolumeClaims(scope)),
    settle('deployments', timeoutMs, () => reader.listDeployments(scope)),
    settle('events', timeoutMs, () => reader.listEvents(scope))
  ]);

  const listings: [ResourceKind, Listing<unknown>][] = [
    ['Pod', pods],
    ['Node', nodes],
    ['PVC', pvcs],
    ['Deployment', deployments],
    ['Event', events]
  ];

  const failures: DataNotice[] = [];
  for (const [kind, listing] of listings) {
    if (listing.ok) continue;
    const failure = classifyFailure(kind, listing.error);
    if (!(failure instanceof PartialDataError)) {
      logger.error(failure.message);
      throw failure;
    }
    logger.warn(`Partial API failure (${kind}): ${failure.message}`);
    failures.push({ kind, error: 'PartialDataError', reason: failure.message });
  }

  if (failures.length === listings.length) {
    throw new ConnectivityError(
      `Cluster unreachable, every listing failed: ${failures.map(f => `${f.kind}: ${f.reason}`).join('; ')}`
    );
  }

  return Object.freeze({
    takenAt: options.now ?? new Date(),
    scope: { ...scope },
    pods: pods.ok ? pods.items.map(filterPodData).filter(keep) : [],
    nodes: nodes.ok ? nodes.items.map(filterNodeData).filter(keep) : [],
    pvcs: pvcs.ok ? pvcs.items.map(filterPvcData).filter(keep) : [],
    deployments: deployments.ok ? deployments.items.map(filterDeploymentData).filter(keep) : [],
    events: events.ok ? events.items.map(filterEventData).filter(keep) : [],
    failures
  });
}
