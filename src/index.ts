import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { exitWith, runInspection } from './cli/inspect';
import { USAGE, parseArgs } from './cli/parser';
import { createClusterReader } from './cluster/clusterReader';
import { createKubeClients } from './cluster/k8sClient';
import { getConfig } from './config/config';
import { createKubectlRunner } from './manifest/kubectl';

dotenv.config();

const logger = getLogger();

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = getConfig();
  logger.info('Starting k8s-inspector');

  return runInspection(args, {
    config,
    createReader: () => createClusterReader(createKubeClients(args.context)),
    runner: createKubectlRunner(config.kubectlPath, args.context),
    print: text => console.log(text)
  });
}

await exitWith(main, code => process.exit(code));
