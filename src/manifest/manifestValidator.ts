import { readFile } from 'node:fs/promises';
import { getLogger } from '@fluidware-it/saddlebag';
import { ValidationUnavailableError, errorMessage } from '../errors/inspectorErrors';
import { type KubectlRunner, namespaceArgs } from './kubectl';
import { checkManifestShape } from './shallowCheck';

const logger = getLogger();

export type ValidationMethod = 'dry-run' | 'shallow';

export type ValidationResult =
  | { status: 'valid'; method: ValidationMethod; output: string }
  | { status: 'invalid'; method: ValidationMethod; reasons: string[] }
  | { status: 'unknown'; reason: string };

export interface ValidateOptions {
  runner: KubectlRunner;
  namespace?: string | undefined;
  timeoutMs: number;
  // Use the offline shape check when kubectl is missing
  allowFallback: boolean;
}

function outputLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export async function dryRunManifest(
  manifestPath: string,
  runner: KubectlRunner,
  namespace: string | undefined,
  timeoutMs: number
): Promise<ValidationResult> {
  const args = ['apply', '--dry-run=server', '-f', manifestPath, ...namespaceArgs(namespace)];
  const result = await runner.run(args, timeoutMs);

  if (result.timedOut) {
    return { status: 'unknown', reason: `kubectl dry-run timed out after ${timeoutMs}ms` };
  }
  if (result.exitCode === undefined) {
    return { status: 'unknown', reason: `kubectl dry-run could not be executed: ${result.output.trim()}` };
  }
  if (result.exitCode === 0) {
    return { status: 'valid', method: 'dry-run', output: result.output.trim() };
  }
  const reasons = outputLines(result.output);
  return {
    status: 'invalid',
    method: 'dry-run',
    reasons: reasons.length > 0 ? reasons : [`kubectl exited with code ${result.exitCode}`]
  };
}

/**
 * Validates a manifest file. Prefers a server-side dry-run apply; without
 * kubectl it falls back to checkManifestShape, which only looks for the
 * top-level keys and will accept manifests the API server would reject.
 */
export async function validateManifest(manifestPath: string, options: ValidateOptions): Promise<ValidationResult> {
  logger.info(`Validating manifest: ${manifestPath}`);

  const available = await options.runner.isAvailable();
  if (!available && !options.allowFallback) {
    const unavailable = new ValidationUnavailableError('kubectl is not available for a server-side dry-run');
    logger.warn(unavailable.message);
    return { status: 'unknown', reason: unavailable.message };
  }

  const method: ValidationMethod = available ? 'dry-run' : 'shallow';
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf8');
  } catch (error: unknown) {
    logger.warn(`Cannot read manifest ${manifestPath}: ${errorMessage(error)}`);
    return { status: 'invalid', method, reasons: [`Cannot read manifest: ${errorMessage(error)}`] };
  }

  if (available) {
    return dryRunManifest(manifestPath, options.runner, options.namespace, options.timeoutMs);
  }

  logger.warn('kubectl not found; performing shallow YAML checks only');
  const shape = checkManifestShape(text);
  return shape.ok
    ? { status: 'valid', method: 'shallow', output: 'Basic YAML checks passed.' }
    : { status: 'invalid', method: 'shallow', reasons: shape.problems };
}
