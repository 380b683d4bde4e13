import { CONFIG } from '../lib/config';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface ProbeCommand {
  command: 'probe';
  file: string;
  concurrency: number;
  limit?: number; // probe only the first N hosts
  outDir: string;
  metricsFile?: string;
  pacingMs: number;
  timeoutMs: number;
}

export interface MapCommand {
  command: 'map';
  suffixes: string[];
  outDir: string;
  enumerate: boolean;
  metricsFile?: string;
}

export type CliCommand = ProbeCommand | MapCommand | { command: 'help' };

export const USAGE = `
Usage:
  host-recon probe <domains.csv> [options]
  host-recon map --suffix <suffix> [--suffix <suffix> ...] [options]

Probe options:
  --concurrency <n>     Concurrent hosts (default ${CONFIG.CONCURRENCY.DEFAULT})
  --limit <n>           Probe only the first n domains
  --pacing-ms <ms>      Pause after every path attempt (default ${CONFIG.PROBE.PACING_MS})
  --timeout-ms <ms>     Per-request timeout (default ${CONFIG.PROBE.TIMEOUT_MS})

Map options:
  --suffix <suffix>     DNS suffix to search in certificate transparency logs
  --no-enum             Skip DNS subdomain enumeration

Common options:
  --out <dir>           Output directory (default ${CONFIG.OUTPUT_DIR})
  --metrics <file>      Write Prometheus metrics of the run to a file
  -h, --help            Show this help
`;

function intOption(flag: string, value: string | undefined, min: number): number {
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new CliUsageError(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
}

function stringOption(flag: string, value: string | undefined): string {
  if (!value || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { command: 'help' };
  }

  const [command, ...rest] = argv;
  const positionals: string[] = [];
  const suffixes: string[] = [];
  let outDir = CONFIG.OUTPUT_DIR;
  let metricsFile: string | undefined;
  let concurrency = CONFIG.CONCURRENCY.DEFAULT;
  let limit: number | undefined;
  let pacingMs = CONFIG.PROBE.PACING_MS;
  let timeoutMs = CONFIG.PROBE.TIMEOUT_MS;
  let enumerate = true;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = rest[i + 1];
    switch (arg) {
      case '--out':
        outDir = stringOption(arg, next);
        i++;
        break;
      case '--metrics':
        metricsFile = stringOption(arg, next);
        i++;
        break;
      case '--concurrency':
        concurrency = intOption(arg, next, 1);
        i++;
        break;
      case '--limit':
        limit = intOption(arg, next, 1);
        i++;
        break;
      case '--pacing-ms':
        pacingMs = intOption(arg, next, 0);
        i++;
        break;
      case '--timeout-ms':
        timeoutMs = intOption(arg, next, 1);
        i++;
        break;
      case '--suffix':
        suffixes.push(stringOption(arg, next));
        i++;
        break;
      case '--no-enum':
        enumerate = false;
        break;
      default:
        if (arg.startsWith('--')) throw new CliUsageError(`Unknown option: ${arg}`);
        positionals.push(arg);
    }
  }

  if (command === 'probe') {
    if (positionals.length !== 1) {
      throw new CliUsageError('probe expects exactly one CSV file');
    }
    return { command, file: positionals[0], concurrency, limit, outDir, metricsFile, pacingMs, timeoutMs };
  }
  if (command === 'map') {
    if (!suffixes.length) throw new CliUsageError('map expects at least one --suffix');
    if (positionals.length) throw new CliUsageError(`Unexpected argument: ${positionals[0]}`);
    return { command, suffixes, outDir, enumerate, metricsFile };
  }
  throw new CliUsageError(`Unknown command: ${command}`);
}
