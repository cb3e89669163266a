import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { SamplingPolicy } from '@resource-monitor/types';
import { ValidationError } from '../lib/errors.js';
import { normalizeAddress } from '../lib/tron-address.js';
import type { MonitorConfig } from './monitor.js';

export interface CliOptions {
  /** Base58 form of the monitored address */
  address: string;
  node: string;
  intervalMs: number;
  policy: SamplingPolicy;
  compareFile: string | null;
  simulation: { txCost: number; targetTx: number } | null;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

export type CliDefaults = Pick<MonitorConfig, 'node' | 'defaults' | 'limits'>;

const optionsConfig = {
  address: { type: 'string', short: 'a' },
  node: { type: 'string', short: 'n' },
  duration: { type: 'string', short: 'd' },
  interval: { type: 'string', short: 'i' },
  'until-full': { type: 'boolean', default: false },
  'max-duration': { type: 'string' },
  compare: { type: 'string' },
  simulate: { type: 'boolean', default: false },
  'tx-cost': { type: 'string' },
  'target-tx': { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false }
} as const;

function integerOption(name: string, min: number, fallback: number) {
  return z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(min, `${name} must be at least ${min}`)
    .default(fallback);
}

function buildSchema(defaults: CliDefaults) {
  return z.object({
    address: z.string({ required_error: 'address is required' }).trim().min(1, 'address is required'),
    node: z.string().url('node must be a URL').default(defaults.node),
    duration: integerOption('duration', 1, defaults.defaults.durationSeconds),
    interval: integerOption('interval', defaults.limits.minIntervalMs, defaults.defaults.intervalMs),
    'until-full': z.boolean(),
    'max-duration': integerOption('max-duration', 1, defaults.defaults.maxDurationSeconds),
    compare: z.string().min(1).optional(),
    simulate: z.boolean(),
    'tx-cost': integerOption('tx-cost', 1, defaults.defaults.txCost),
    'target-tx': integerOption('target-tx', 1, defaults.defaults.targetTx)
  });
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: optionsConfig, strict: true, allowPositionals: false }).values;
  } catch (error) {
    // node:util reports unknown options and missing values as TypeErrors
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse and validate command-line arguments.
 *
 * @param argv - Arguments after the executable and script path
 * @throws ValidationError on unknown options, malformed values or an invalid address
 */
export function parseCliArgs(argv: readonly string[], defaults: CliDefaults): CliCommand {
  const values = readArgs(argv);

  if (values.help) {
    return { kind: 'help' };
  }

  const parsed = buildSchema(defaults).safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid options', parsed.error.flatten().fieldErrors);
  }

  const input = parsed.data;
  const { base58 } = normalizeAddress(input.address);

  const policy: SamplingPolicy = input['until-full']
    ? { kind: 'until-recovered', maxDurationSeconds: input['max-duration'] }
    : { kind: 'fixed-duration', durationSeconds: input.duration };

  return {
    kind: 'run',
    options: {
      address: base58,
      node: input.node,
      intervalMs: input.interval,
      policy,
      compareFile: input.compare ?? null,
      simulation: input.simulate ? { txCost: input['tx-cost'], targetTx: input['target-tx'] } : null
    }
  };
}

export function formatUsage(program: string, defaults: CliDefaults): string {
  const d = defaults.defaults;
  return [
    `Usage: ${program} -a <address> [options]`,
    '',
    'Samples the Energy and Bandwidth of a TRON account and reports regeneration and consumption rates.',
    '',
    'Options:',
    '  -a, --address <addr>     TRON address to monitor (base58 T... or hex 41...)',
    `  -n, --node <url>         Full node URL (default: ${defaults.node})`,
    `  -d, --duration <sec>     Monitoring duration in seconds (default: ${d.durationSeconds})`,
    `  -i, --interval <ms>      Sampling interval in milliseconds, min ${defaults.limits.minIntervalMs} (default: ${d.intervalMs})`,
    '      --until-full         Sample until Energy and Bandwidth are fully recovered',
    `      --max-duration <sec> Upper bound for --until-full (default: ${d.maxDurationSeconds})`,
    '      --compare <file>     Compare with a previously saved report',
    '      --simulate           Run a 24-hour transaction simulation after monitoring',
    `      --tx-cost <energy>   Energy cost per transaction (default: ${d.txCost})`,
    `      --target-tx <count>  Target transactions per day (default: ${d.targetTx})`,
    '  -h, --help               Show this help',
    '',
    'Examples:',
    `  ${program} -a <address> -d 60`,
    `  ${program} -a <address> --duration 3600 --interval 3000`,
    `  ${program} -a <address> --until-full --max-duration 86400`,
    `  ${program} -a <address> --simulate --tx-cost 65000 --target-tx 800`,
    ''
  ].join('\n');
}
