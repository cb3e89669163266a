/// <reference types="vitest" />

import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../lib/errors.js';
import { formatUsage, parseCliArgs, type CliDefaults } from '../cli-options.js';

const defaults: CliDefaults = {
  node: 'https://node.invalid',
  defaults: {
    durationSeconds: 20,
    intervalMs: 1000,
    maxDurationSeconds: 86_400,
    txCost: 65_000,
    targetTx: 800
  },
  limits: {
    minIntervalMs: 100
  }
};

const BASE58 = 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t';

describe('parseCliArgs', () => {
  it('returns help without requiring an address', () => {
    expect(parseCliArgs(['-h'], defaults)).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help', '--duration', 'x'], defaults)).toEqual({ kind: 'help' });
  });

  it('fills in the configured defaults', () => {
    expect(parseCliArgs(['-a', BASE58], defaults)).toEqual({
      kind: 'run',
      options: {
        address: BASE58,
        node: 'https://node.invalid',
        intervalMs: 1000,
        policy: { kind: 'fixed-duration', durationSeconds: 20 },
        compareFile: null,
        simulation: null
      }
    });
  });

  it('normalizes a hex address to base58', () => {
    const command = parseCliArgs(['--address', '41A614F803B6FD780986A42C78EC9C7F77E6DED13C'], defaults);

    expect(command.kind === 'run' && command.options.address).toBe(BASE58);
  });

  it('reads the long and short forms of every option', () => {
    const command = parseCliArgs(
      [
        '--address', BASE58,
        '-n', 'https://other.invalid',
        '-i', '500',
        '--until-full',
        '--max-duration', '600',
        '--compare', 'previous.json',
        '--simulate',
        '--tx-cost', '131000',
        '--target-tx', '100'
      ],
      defaults
    );

    expect(command).toEqual({
      kind: 'run',
      options: {
        address: BASE58,
        node: 'https://other.invalid',
        intervalMs: 500,
        policy: { kind: 'until-recovered', maxDurationSeconds: 600 },
        compareFile: 'previous.json',
        simulation: { txCost: 131_000, targetTx: 100 }
      }
    });
  });

  it('uses the duration for fixed-duration sessions', () => {
    const command = parseCliArgs(['-a', BASE58, '-d', '60'], defaults);

    expect(command.kind === 'run' && command.options.policy).toEqual({ kind: 'fixed-duration', durationSeconds: 60 });
  });

  it('rejects missing and malformed values', () => {
    expect(() => parseCliArgs([], defaults)).toThrow('address is required');
    expect(() => parseCliArgs(['-a', BASE58, '-i', '99'], defaults)).toThrow('interval must be at least 100');
    expect(() => parseCliArgs(['-a', BASE58, '-d', 'abc'], defaults)).toThrow('duration must be a number');
    expect(() => parseCliArgs(['-a', BASE58, '-d', '1.5'], defaults)).toThrow('duration must be an integer');
    expect(() => parseCliArgs(['-a', BASE58, '-d', '0'], defaults)).toThrow('duration must be at least 1');
    expect(() => parseCliArgs(['-a', BASE58, '-n', 'not-a-url'], defaults)).toThrow('node must be a URL');
    expect(() => parseCliArgs(['-a', BASE58, '--tx-cost', '0'], defaults)).toThrow('tx-cost must be at least 1');
  });

  it('rejects unknown options and invalid addresses as validation errors', () => {
    expect(() => parseCliArgs(['-a', BASE58, '--bogus'], defaults)).toThrow(ValidationError);
    expect(() => parseCliArgs(['-a', BASE58, 'extra'], defaults)).toThrow(ValidationError);
    expect(() => parseCliArgs(['-a', 'not-an-address'], defaults)).toThrow(ValidationError);
  });
});

describe('formatUsage', () => {
  it('lists the options with their defaults', () => {
    const usage = formatUsage('tron-resource-monitor', defaults);

    expect(usage.split('\n')[0]).toBe('Usage: tron-resource-monitor -a <address> [options]');
    expect(usage).toContain('  -n, --node <url>         Full node URL (default: https://node.invalid)');
    expect(usage).toContain('      --target-tx <count>  Target transactions per day (default: 800)');
  });
});
