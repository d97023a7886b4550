import type {
  CoreV1Event,
  V1Deployment,
  V1Node,
  V1PersistentVolumeClaim,
  V1Pod
} from '@kubernetes/client-node';
import type { ScanScope } from '../types/k8s';
import type { KubeClients } from './k8sClient';

/**
 * Read-only view of the cluster. The snapshot fetcher only ever talks to the
 * API through this interface, so the scan path has no way to write.
 */
export interface ClusterReader {
  listPods(scope: ScanScope): Promise<V1Pod[]>;
  listNodes(): Promise<V1Node[]>;
  listPersistentVolumeClaims(scope: ScanScope): Promise<V1PersistentVolumeClaim[]>;
  listDeployments(scope: ScanScope): Promise<V1Deployment[]>;
  listEvents(scope: ScanScope): Promise<CoreV1Event[]>;
}

export function createClusterReader({ coreApi, appsApi }: KubeClients): ClusterReader {
  return {
    async listPods({ namespace }) {
      const res = namespace
        ? await coreApi.listNamespacedPod({ namespace })
        : await coreApi.listPodForAllNamespaces();
      return res.items;
    },
    async listNodes() {
      const res = await coreApi.listNode();
      return res.items;
    },
    async listPersistentVolumeClaims({ namespace }) {
      const res = namespace
        ? await coreApi.listNamespacedPersistentVolumeClaim({ namespace })
        : await coreApi.listPersistentVolumeClaimForAllNamespaces();
      return res.items;
    },
    async listDeployments({ namespace }) {
      const res = namespace
        ? await appsApi.listNamespacedDeployment({ namespace })
        : await appsApi.listDeploymentForAllNamespaces();
      return res.items;
    },
    async listEvents({ namespace }) {
      const res = namespace
        ? await coreApi.listNamespacedEvent({ namespace })
        : await coreApi.listEventForAllNamespaces();
      return res.items;
    }
  };
}
