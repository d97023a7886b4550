export type OutputFormat = 'text' | 'json';

export interface CliArgs {
  namespace?: string | undefined;
  context?: string | undefined;
  manifest?: string | undefined;
  apply: boolean;
  scan: boolean;
  fallback: boolean;
  output: OutputFormat;
  restartThreshold?: number | undefined;
  help: boolean;
}

export const USAGE = `Usage: k8s-inspector [namespace] [options]

Scan a Kubernetes cluster for common issues and suggest fixes.

Options:
  -n, --namespace <ns>        Limit checks to a namespace (default: all namespaces)
  -c, --context <name>        Kube context to use
  -f, --manifest <path>       Validate a manifest with a server-side dry-run
      --apply                 Apply the manifest after a passing dry-run
      --no-scan               Skip the cluster scan
      --no-fallback           Do not fall back to shallow YAML checks without kubectl
  -o, --output <text|json>    Output format (default: text)
      --restart-threshold <n> Restart count that triggers a warning
  -h, --help                  Show this help`;

// Flags that take a value, with their short aliases
const VALUE_FLAGS: Record<string, keyof CliArgs> = {
  '--namespace': 'namespace',
  '-n': 'namespace',
  '--context': 'context',
  '-c': 'context',
  '--manifest': 'manifest',
  '-f': 'manifest',
  '--output': 'output',
  '-o': 'output',
  '--restart-threshold': 'restartThreshold'
};

function assignValue(result: CliArgs, key: keyof CliArgs, flag: string, value: string | undefined): void {
  if (value === undefined || value === '') {
    throw new Error(`Missing value for ${flag}`);
  }

  if (key === 'output') {
    if (value !== 'text' && value !== 'json') {
      throw new Error(`Unsupported output format "${value}" (expected text or json)`);
    }
    result.output = value;
    return;
  }

  if (key === 'restartThreshold') {
    const threshold = Number(value);
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new Error(`--restart-threshold must be a positive integer, got "${value}"`);
    }
    result.restartThreshold = threshold;
    return;
  }

  if (key === 'namespace' || key === 'context' || key === 'manifest') {
    result[key] = value;
  }
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    namespace: undefined,
    context: undefined,
    manifest: undefined,
    apply: false,
    scan: true,
    fallback: true,
    output: 'text',
    restartThreshold: undefined,
    help: false
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';

    // Handle --flag=value
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    if (eq > 0) {
      const flag = arg.slice(0, eq);
      const key = VALUE_FLAGS[flag];
      if (!key) throw new Error(`Unknown option ${flag}`);
      assignValue(result, key, flag, arg.slice(eq + 1));
      i++;
      continue;
    }

    const key = VALUE_FLAGS[arg];
    if (key) {
      assignValue(result, key, arg, args[i + 1]);
      i += 2;
      continue;
    }

    switch (arg) {
      case '--apply':
        result.apply = true;
        break;
      case '--no-scan':
        result.scan = false;
        break;
      case '--no-fallback':
        result.fallback = false;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option ${arg}`);
        positionalArgs.push(arg);
    }
    i++;
  }

  // First positional argument is the namespace
  if (positionalArgs.length > 0 && result.namespace === undefined) {
    result.namespace = positionalArgs[0];
  }

  return result;
}
