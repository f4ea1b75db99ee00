/**
 * Fleet supervisor configuration.
 *
 * Fleet shape comes from the command line; provider access and timing
 * policy come from environment variables.
 */

import { parseArgs } from 'node:util';
import { StartupError } from './errors.js';
import type { TypePolicy } from './types.js';

export interface Config {
  /** Provider credential (C3_API_KEY) */
  apiKey: string;
  apiUrl: string;
  /** Origin header the provider expects on API calls */
  origin: string;
  /** Workload types are `${workloadPrefix}:fast` / `${workloadPrefix}:large` */
  workloadPrefix: string;

  /** Fleet shape */
  nodes: number;
  keepRunning: boolean;
  typePolicy: TypePolicy;
  noRm: boolean;
  runtimeSeconds: number;

  /** Health monitoring */
  pollIntervalSeconds: number;
  bootDelaySeconds: number;
  healthCheckTimeoutSeconds: number;
  maxStrikes: number;

  launchSpacingSeconds: number;
  requestTimeoutSeconds: number;

  /** Notification webhook (Discord) */
  webhookUrl?: string;

  /** Event log database */
  postgresUrl?: string;
}

export const USAGE = `Usage: fleet-supervisor [options]

Options:
  --nodes <n>           Number of nodes to keep running (default: 1)
  --keep-running        Launch a replacement whenever a node dies
  --poll <seconds>      Health check interval (default: 30, or WORKLOAD_POLL)
  --type <policy>       fast, large or alternate (default: alternate)
  --runtime <seconds>   Requested workload lifetime (default: 3600)
  --no-rm               Leave nodes running when the supervisor exits
  --help                Show this message

Environment:
  C3_API_KEY            Provider API key (required)
  WORKLOAD_POLL         Default health check interval in seconds
`;

const TYPE_POLICIES: TypePolicy[] = ['fast', 'large', 'alternate'];

export function wantsHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const { values } = parseFlags(argv);

  const apiKey = env.C3_API_KEY?.trim();
  if (!apiKey) {
    throw new StartupError('C3_API_KEY is not set. Export it or add it to your environment file: C3_API_KEY=your_key_here');
  }

  const nodes = positiveInt('--nodes', values.nodes, 1);

  const typePolicy = TYPE_POLICIES.find(p => p === values.type);
  if (!typePolicy) {
    throw new StartupError(`--type must be one of ${TYPE_POLICIES.join(', ')} (got "${values.type}")`);
  }

  // WORKLOAD_POLL only matters when --poll is absent
  const pollIntervalSeconds = values.poll !== undefined
    ? positiveInt('--poll', values.poll, 30)
    : positiveInt('WORKLOAD_POLL', env.WORKLOAD_POLL, 30);

  return {
    apiKey,
    apiUrl: (env.C3_API_URL ?? 'https://api.comput3.ai/api/v0').replace(/\/+$/, ''),
    origin: env.C3_ORIGIN ?? 'https://launch.comput3.ai',
    workloadPrefix: env.WORKLOAD_PREFIX ?? 'ollama_webui',

    nodes,
    keepRunning: values['keep-running'] ?? false,
    typePolicy,
    noRm: values['no-rm'] ?? false,
    runtimeSeconds: positiveInt('--runtime', values.runtime, 3600),

    pollIntervalSeconds,
    bootDelaySeconds: nonNegative('BOOT_DELAY_SECONDS', env.BOOT_DELAY_SECONDS, 5),
    healthCheckTimeoutSeconds: positiveInt('HEALTH_CHECK_TIMEOUT_SECONDS', env.HEALTH_CHECK_TIMEOUT_SECONDS, 5),
    maxStrikes: positiveInt('HEALTH_CHECK_STRIKES', env.HEALTH_CHECK_STRIKES, 3),

    launchSpacingSeconds: nonNegative('LAUNCH_SPACING_SECONDS', env.LAUNCH_SPACING_SECONDS, 2),
    requestTimeoutSeconds: positiveInt('REQUEST_TIMEOUT_SECONDS', env.REQUEST_TIMEOUT_SECONDS, 30),

    webhookUrl: env.WEBHOOK_URL || undefined,
    postgresUrl: env.POSTGRES_URL || undefined,
  };
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        nodes: { type: 'string' },
        'keep-running': { type: 'boolean', default: false },
        poll: { type: 'string' },
        type: { type: 'string', default: 'alternate' },
        runtime: { type: 'string' },
        'no-rm': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new StartupError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

function positiveInt(name: string, val: string | undefined, fallback: number): number {
  const n = int(name, val, fallback);
  if (n < 1) throw new StartupError(`${name} must be at least 1 (got ${n})`);
  return n;
}

function nonNegative(name: string, val: string | undefined, fallback: number): number {
  const n = int(name, val, fallback);
  if (n < 0) throw new StartupError(`${name} must not be negative (got ${n})`);
  return n;
}

function int(name: string, val: string | undefined, fallback: number): number {
  if (val === undefined || val.trim() === '') return fallback;
  if (!/^-?\d+$/.test(val.trim())) {
    throw new StartupError(`${name} must be a whole number (got "${val}")`);
  }
  return parseInt(val, 10);
}
