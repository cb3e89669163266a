/// <reference types="vitest" />

import { describe, expect, it } from 'vitest';
import { reading, series, SESSION_START } from '../../../__tests__/helpers/snapshots.js';
import { analyzeSnapshots, createEmptyAnalysis } from '../../monitor/analysis.js';
import { buildReport, toReportDocument, toSnapshotDocument } from '../report-mapper.js';

const END_TIME = new Date(SESSION_START.getTime() + 2500);

describe('buildReport', () => {
  it('records the measured duration in whole seconds', () => {
    const snapshots = series([reading({ energyUsed: 10 }), reading({ energyUsed: 5 }), reading({ energyUsed: 0 })]);
    const analysis = { ...analyzeSnapshots(snapshots), actualDurationSeconds: 2.7 };

    const report = buildReport({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      startTime: SESSION_START,
      endTime: END_TIME,
      intervalMs: 1000,
      snapshots,
      analysis
    });

    expect(report.metadata).toEqual({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      startTime: SESSION_START,
      endTime: END_TIME,
      durationSeconds: 2,
      samplesCount: 3,
      intervalMs: 1000
    });
    expect(report.snapshots).toBe(snapshots);
  });

  it('never records less than one second', () => {
    const snapshots = series([reading()]);

    const report = buildReport({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      startTime: SESSION_START,
      endTime: SESSION_START,
      intervalMs: 250,
      snapshots,
      analysis: createEmptyAnalysis()
    });

    expect(report.metadata.durationSeconds).toBe(1);
  });
});

describe('toReportDocument', () => {
  it('renames snapshot fields to snake_case and serializes the timestamp', () => {
    const [, second] = series([reading({ energyUsed: 200, freeNetUsed: 50 }), reading({ energyUsed: 100, freeNetUsed: 40 })]);

    expect(toSnapshotDocument(second)).toEqual({
      timestamp: '2025-01-01T00:00:01.000Z',
      elapsed_ms: 1000,
      energy_limit: 1_000_000,
      energy_used: 100,
      net_limit: 0,
      net_used: 0,
      free_net_limit: 600,
      free_net_used: 40,
      energy_available: 999_900,
      bandwidth_available: 560,
      delta_energy: 100,
      delta_bandwidth: 10
    });
  });

  it('maps metadata and every analysis section', () => {
    const snapshots = series([reading({ energyUsed: 500_000 }), reading({ energyUsed: 499_000 }), reading({ energyUsed: 499_500 })]);
    const analysis = analyzeSnapshots(snapshots);
    const report = buildReport({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      startTime: SESSION_START,
      endTime: END_TIME,
      intervalMs: 1000,
      snapshots,
      analysis
    });

    const document = toReportDocument(report);

    expect(document.metadata).toEqual({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      start_time: '2025-01-01T00:00:00.000Z',
      end_time: '2025-01-01T00:00:02.500Z',
      duration_seconds: 2,
      samples_count: 3,
      interval_ms: 1000
    });
    expect(document.snapshots).toHaveLength(3);
    expect(document.analysis.actual_duration_seconds).toBe(2);
    expect(document.analysis.energy_regen_rate_per_second).toBe(500);
    expect(document.analysis.energy_consume_rate_per_second).toBe(250);
    expect(document.analysis.tx_per_day_65k_energy).toBe(analysis.txPerDay65k);
    expect(document.analysis.tick_analysis.recovery_ticks).toBe(1);
    expect(document.analysis.tick_analysis.tick_energy_deltas).toEqual([1000, -500]);
    expect(document.analysis.used_based_analysis.energy_used_at_start).toBe(500_000);
    expect(document.analysis.formula_validation).toEqual({
      theoretical_model: 'E_limit / 86400',
      measured_model: 'E_used / T_recovery',
      best_fit: 'limit_based',
      confidence: 0
    });
    expect(document.analysis.practical_estimates.immediate_capacity_65k).toBe(7);
    expect(document.analysis.practical_estimates.energy_needed_for_800_tx_131k).toBe(104_800_000);
  });

  it('keeps a missing best fit as null', () => {
    const report = buildReport({
      address: 'TTestAddressPlaceholder0000000000',
      node: 'https://node.invalid',
      startTime: SESSION_START,
      endTime: SESSION_START,
      intervalMs: 1000,
      snapshots: [],
      analysis: createEmptyAnalysis()
    });

    expect(toReportDocument(report).analysis.formula_validation.best_fit).toBeNull();
  });
});
