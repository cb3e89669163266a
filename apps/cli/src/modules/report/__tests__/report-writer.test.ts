/// <reference types="vitest" />

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ReportError } from '../../../lib/errors.js';
import { reading, series, SESSION_START } from '../../../__tests__/helpers/snapshots.js';
import { analyzeSnapshots } from '../../monitor/analysis.js';
import { buildReport } from '../report-mapper.js';
import { generateReportFilename, ReportWriter, shortenAddress } from '../report-writer.js';

const ADDRESS = 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t';

function sampleReport() {
  const snapshots = series([reading({ energyUsed: 500_000 }), reading({ energyUsed: 499_000 })]);
  return buildReport({
    address: ADDRESS,
    node: 'https://node.invalid',
    startTime: SESSION_START,
    endTime: new Date(SESSION_START.getTime() + 1000),
    intervalMs: 1000,
    snapshots,
    analysis: analyzeSnapshots(snapshots)
  });
}

describe('generateReportFilename', () => {
  it('uses the shortened address and the UTC start time', () => {
    expect(generateReportFilename(ADDRESS, new Date('2025-03-04T05:06:07.890Z'))).toBe(
      'tron_monitor_TR7N...Lj6t_20250304_050607.json'
    );
  });

  it('keeps addresses of up to eight characters whole', () => {
    expect(shortenAddress('TABCDEFG')).toBe('TABCDEFG');
    expect(shortenAddress('TABCDEFGH')).toBe('TABC...EFGH');
  });
});

describe('ReportWriter', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'resource-monitor-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the report as indented snake_case JSON', async () => {
    const writer = new ReportWriter(directory);

    const filename = await writer.write(sampleReport());

    expect(filename).toBe(path.join(directory, 'tron_monitor_TR7N...Lj6t_20250101_000000.json'));
    const contents = await readFile(filename, 'utf8');
    expect(contents.startsWith('{\n  "metadata": {\n    "address": "TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t",')).toBe(true);
    expect(contents.endsWith('}\n')).toBe(true);

    const parsed: unknown = JSON.parse(contents);
    expect(parsed).toMatchObject({
      metadata: { samples_count: 2, duration_seconds: 1, start_time: '2025-01-01T00:00:00.000Z' },
      analysis: { energy_regen_rate_per_second: 1000, tick_analysis: { recovery_ticks: 1 } }
    });
  });

  it('creates a missing report directory', async () => {
    const nested = path.join(directory, 'reports', 'daily');
    const writer = new ReportWriter(nested);

    const filename = await writer.write(sampleReport());

    expect(path.dirname(filename)).toBe(nested);
  });

  it('raises a ReportError when the directory cannot be created', async () => {
    const blocker = path.join(directory, 'not-a-directory');
    await writeFile(blocker, 'occupied');
    const writer = new ReportWriter(path.join(blocker, 'reports'));

    await expect(writer.write(sampleReport())).rejects.toBeInstanceOf(ReportError);
  });
});
