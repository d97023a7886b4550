import { getLogger } from '@fluidware-it/saddlebag';
import { ApplyError } from '../errors/inspectorErrors';
import { type KubectlRunner, namespaceArgs } from './kubectl';
import type { ValidationResult } from './manifestValidator';

const logger = getLogger();

export interface ApplyOptions {
  runner: KubectlRunner;
  namespace?: string | undefined;
  timeoutMs: number;
}

// Only a server-side dry-run is trusted before applying
export function assertApplicable(validation: ValidationResult): void {
  if (validation.status === 'valid' && validation.method === 'dry-run') return;
  const why =
    validation.status === 'unknown'
      ? validation.reason
      : validation.status === 'invalid'
        ? `dry-run reported: ${validation.reasons.join('; ')}`
        : 'only shallow checks were possible';
  throw new ApplyError(`Refusing to apply: ${why}`, '');
}

/**
 * The one mutating call. Runs a single `kubectl apply`; a failure is reported
 * through ApplyError and never retried.
 */
export async function applyManifest(manifestPath: string, options: ApplyOptions): Promise<string> {
  const result = await options.runner.run(
    ['apply', '-f', manifestPath, ...namespaceArgs(options.namespace)],
    options.timeoutMs
  );
  const output = result.output.trim();

  if (result.timedOut) {
    throw new ApplyError(`kubectl apply timed out after ${options.timeoutMs}ms`, output);
  }
  if (result.exitCode !== 0) {
    throw new ApplyError(`kubectl apply failed with exit code ${result.exitCode ?? 'unknown'}`, output);
  }
  logger.info(`Applied ${manifestPath}`);
  return output;
}
