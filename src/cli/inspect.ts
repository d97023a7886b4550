import { getLogger } from '@fluidware-it/saddlebag';
import { buildReport } from '../analysis/report';
import type { ClusterReader } from '../cluster/clusterReader';
import { fetchSnapshot } from '../cluster/snapshotFetcher';
import type { AppConfig } from '../config/config';
import { ApplyError, AuthError, ConnectivityError, errorMessage } from '../errors/inspectorErrors';
import { applyManifest, assertApplicable } from '../manifest/manifestApplier';
import type { KubectlRunner } from '../manifest/kubectl';
import { validateManifest } from '../manifest/manifestValidator';
import type { Report } from '../types/report';
import { formatJson, formatReport, formatValidation, type JsonOutput } from '../utils/reportFormatter';
import type { CliArgs } from './parser';

const logger = getLogger();

export const EXIT_OK = 0;
export const EXIT_API_ERROR = 1;
export const EXIT_APPLY_ERROR = 2;

export interface InspectDeps {
  config: AppConfig;
  // Created lazily so --no-scan runs never need a kubeconfig
  createReader: () => ClusterReader;
  runner: KubectlRunner;
  print: (text: string) => void;
  now?: () => Date;
}

async function scan(args: CliArgs, deps: InspectDeps): Promise<Report> {
  const namespace = args.namespace ?? deps.config.defaultNamespace;
  const now = deps.now ? deps.now() : new Date();
  logger.info(`Scanning ${namespace ? `namespace ${namespace}` : 'all namespaces'}...`);

  const snapshot = await fetchSnapshot(deps.createReader(), { namespace }, { timeoutMs: deps.config.fetchTimeoutMs, now });
  const report = buildReport(snapshot, {
    now,
    cliName: deps.config.kubectlPath,
    thresholds: {
      ...deps.config.thresholds,
      ...(args.restartThreshold !== undefined && { restartCount: args.restartThreshold })
    }
  });
  logger.info(`Scan complete. Found ${report.findings.length} issue(s).`);
  return report;
}

/**
 * One invocation: optional scan, optional manifest validation, optional
 * apply. Returns the process exit code. Nothing here writes to the cluster
 * unless args.apply is set.
 */
export async function runInspection(args: CliArgs, deps: InspectDeps): Promise<number> {
  const json: JsonOutput = {};
  const emit = (text: string) => {
    if (args.output === 'text') deps.print(text);
  };
  const flushJson = () => {
    if (args.output === 'json') deps.print(formatJson(json));
  };

  if (args.apply && !args.manifest) {
    logger.error('--apply requires --manifest');
    return EXIT_API_ERROR;
  }

  if (args.scan) {
    try {
      json.report = await scan(args, deps);
      emit(formatReport(json.report));
    } catch (error: unknown) {
      if (error instanceof AuthError || error instanceof ConnectivityError) {
        logger.error(`Scan aborted: ${error.message}`);
        emit(`Scan aborted (${error.code}): ${error.message}`);
        json.error = { code: error.code, message: error.message };
        flushJson();
        return EXIT_API_ERROR;
      }
      throw error;
    }
  }

  if (!args.manifest) {
    flushJson();
    return EXIT_OK;
  }

  const namespace = args.namespace ?? deps.config.defaultNamespace;
  const validation = await validateManifest(args.manifest, {
    runner: deps.runner,
    namespace,
    timeoutMs: deps.config.kubectlTimeoutMs,
    allowFallback: args.fallback
  });
  json.validation = { manifest: args.manifest, ...validation };
  emit(formatValidation(args.manifest, validation));

  if (!args.apply) {
    flushJson();
    return EXIT_OK;
  }

  try {
    assertApplicable(validation);
    const output = await applyManifest(args.manifest, {
      runner: deps.runner,
      namespace,
      timeoutMs: deps.config.kubectlTimeoutMs
    });
    json.apply = { ok: true, output };
    emit(`## Apply\n\n**Result:** applied\n\n${output}`);
    flushJson();
    return EXIT_OK;
  } catch (error: unknown) {
    if (!(error instanceof ApplyError)) throw error;
    logger.error(error.message);
    json.apply = { ok: false, output: error.output || error.message };
    emit(`## Apply\n\n**Result:** failed (${error.message})${error.output ? `\n\n${error.output}` : ''}`);
    flushJson();
    return EXIT_APPLY_ERROR;
  }
}

/**
 * Settles a run and ends the process with its exit code. A listing abandoned
 * after its timeout can still hold a socket open, so the process exits
 * instead of waiting for the event loop to drain.
 */
export async function exitWith(run: () => Promise<number>, exit: (code: number) => void): Promise<void> {
  let code: number;
  try {
    code = await run();
  } catch (error: unknown) {
    logger.error(errorMessage(error));
    code = EXIT_API_ERROR;
  }
  exit(code);
}
