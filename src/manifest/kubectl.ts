import { execa } from 'execa';
import { getLogger } from '@fluidware-it/saddlebag';

const logger = getLogger();

export interface KubectlResult {
  // Undefined when the process could not be started or was killed
  exitCode?: number | undefined;
  output: string;
  timedOut: boolean;
}

export interface KubectlRunner {
  isAvailable(): Promise<boolean>;
  run(args: readonly string[], timeoutMs: number): Promise<KubectlResult>;
}

export function createKubectlRunner(kubectlPath: string, context?: string): KubectlRunner {
  let available: boolean | undefined;
  const contextArgs = context ? ['--context', context] : [];

  return {
    async isAvailable() {
      if (available === undefined) {
        const probe = await execa(kubectlPath, ['version', '--client'], { timeout: 10_000, reject: false });
        available = !probe.failed;
        if (!available) {
          logger.info(`${kubectlPath} not usable on this host (${probe.stderr || 'not found'})`);
        }
      }
      return available;
    },

    async run(args, timeoutMs) {
      const fullArgs = [...contextArgs, ...args];
      logger.info(`Running: ${kubectlPath} ${fullArgs.join(' ')}`);
      const result = await execa(kubectlPath, fullArgs, { timeout: timeoutMs, reject: false });
      return {
        exitCode: result.exitCode,
        output: result.stdout + (result.stderr || ''),
        timedOut: result.timedOut
      };
    }
  };
}

export function namespaceArgs(namespace: string | undefined): string[] {
  return namespace ? ['-n', namespace] : [];
}
