import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';

export interface KubeClients {
  kubeConfig: k8s.KubeConfig;
  coreApi: k8s.CoreV1Api;
  appsApi: k8s.AppsV1Api;
}

// Loads kubeconfig (or the in-cluster service account) once per invocation.
export function createKubeClients(context?: string): KubeClients {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new Error(`Kubernetes configuration error: ${message}`);
  }

  if (context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(context)) {
      throw new Error(`Context "${context}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(context);
  }
  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);

  return {
    kubeConfig: kc,
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    appsApi: kc.makeApiClient(k8s.AppsV1Api)
  };
}
