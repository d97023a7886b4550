import { z } from 'zod';

export interface RuleThresholds {
  restartCount: number;
  podPendingGraceMinutes: number;
  pvcGraceMinutes: number;
  deploymentGraceMinutes: number;
  eventWindowMinutes: number;
}

export interface AppConfig {
  defaultNamespace?: string | undefined;
  thresholds: RuleThresholds;
  fetchTimeoutMs: number;
  kubectlPath: string;
  kubectlTimeoutMs: number;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegative = (fallback: number) => z.coerce.number().nonnegative().default(fallback);

const envSchema = z.object({
  K8S_INSPECTOR_NAMESPACE: z.string().optional(),
  K8S_INSPECTOR_RESTART_THRESHOLD: positiveInt(5),
  K8S_INSPECTOR_PENDING_GRACE_MINUTES: nonNegative(5),
  K8S_INSPECTOR_PVC_GRACE_MINUTES: nonNegative(5),
  K8S_INSPECTOR_DEPLOYMENT_GRACE_MINUTES: nonNegative(10),
  K8S_INSPECTOR_EVENT_WINDOW_MINUTES: positiveInt(60),
  K8S_INSPECTOR_FETCH_TIMEOUT_MS: positiveInt(15_000),
  K8S_INSPECTOR_KUBECTL: z.string().min(1).default('kubectl'),
  K8S_INSPECTOR_KUBECTL_TIMEOUT_MS: positiveInt(60_000)
});

// Empty strings count as unset so a blank line in .env keeps the default
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const vars = parsed.data;

  return {
    defaultNamespace: vars.K8S_INSPECTOR_NAMESPACE,
    thresholds: {
      restartCount: vars.K8S_INSPECTOR_RESTART_THRESHOLD,
      podPendingGraceMinutes: vars.K8S_INSPECTOR_PENDING_GRACE_MINUTES,
      pvcGraceMinutes: vars.K8S_INSPECTOR_PVC_GRACE_MINUTES,
      deploymentGraceMinutes: vars.K8S_INSPECTOR_DEPLOYMENT_GRACE_MINUTES,
      eventWindowMinutes: vars.K8S_INSPECTOR_EVENT_WINDOW_MINUTES
    },
    fetchTimeoutMs: vars.K8S_INSPECTOR_FETCH_TIMEOUT_MS,
    kubectlPath: vars.K8S_INSPECTOR_KUBECTL,
    kubectlTimeoutMs: vars.K8S_INSPECTOR_KUBECTL_TIMEOUT_MS
  };
}
