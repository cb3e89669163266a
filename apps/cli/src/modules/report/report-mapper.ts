import type {
  IMonitorReport,
  IReportMetadata,
  IResourceAnalysis,
  IResourceSnapshot
} from '@resource-monitor/types';
import type {
  IAnalysisDocument,
  IMonitorReportDocument,
  ISnapshotDocument
} from './report-document.js';

export interface BuildReportInput {
  address: string;
  node: string;
  startTime: Date;
  endTime: Date;
  intervalMs: number;
  snapshots: readonly IResourceSnapshot[];
  analysis: IResourceAnalysis;
}

/**
 * Assemble the report for a finished session.
 *
 * The recorded duration is the measured one, truncated to whole seconds and
 * never below 1, so a session cut short still produces a usable file.
 */
export function buildReport(input: BuildReportInput): IMonitorReport {
  const metadata: IReportMetadata = {
    address: input.address,
    node: input.node,
    startTime: input.startTime,
    endTime: input.endTime,
    durationSeconds: Math.max(1, Math.trunc(input.analysis.actualDurationSeconds)),
    samplesCount: input.snapshots.length,
    intervalMs: input.intervalMs
  };

  return {
    metadata,
    snapshots: input.snapshots,
    analysis: input.analysis
  };
}

export function toSnapshotDocument(snapshot: IResourceSnapshot): ISnapshotDocument {
  return {
    timestamp: snapshot.timestamp.toISOString(),
    elapsed_ms: snapshot.elapsedMs,
    energy_limit: snapshot.energyLimit,
    energy_used: snapshot.energyUsed,
    net_limit: snapshot.netLimit,
    net_used: snapshot.netUsed,
    free_net_limit: snapshot.freeNetLimit,
    free_net_used: snapshot.freeNetUsed,
    energy_available: snapshot.energyAvailable,
    bandwidth_available: snapshot.bandwidthAvailable,
    delta_energy: snapshot.deltaEnergy,
    delta_bandwidth: snapshot.deltaBandwidth
  };
}

export function toAnalysisDocument(analysis: IResourceAnalysis): IAnalysisDocument {
  const tick = analysis.tickAnalysis;
  const used = analysis.usedBasedAnalysis;
  const formula = analysis.formulaValidation;
  const estimates = analysis.practicalEstimates;

  return {
    actual_duration_seconds: analysis.actualDurationSeconds,

    energy_start: analysis.energyStart,
    energy_end: analysis.energyEnd,
    energy_total_delta: analysis.energyTotalDelta,
    energy_regenerated: analysis.energyRegenerated,
    energy_consumed: analysis.energyConsumed,
    energy_regen_rate_per_second: analysis.energyRegenRatePerSecond,
    energy_regen_rate_per_day: analysis.energyRegenRatePerDay,
    energy_consume_rate_per_second: analysis.energyConsumeRatePerSecond,
    energy_consume_rate_per_day: analysis.energyConsumeRatePerDay,
    energy_net_rate_per_second: analysis.energyNetRatePerSecond,
    energy_net_rate_per_day: analysis.energyNetRatePerDay,

    bandwidth_start: analysis.bandwidthStart,
    bandwidth_end: analysis.bandwidthEnd,
    bandwidth_total_delta: analysis.bandwidthTotalDelta,
    bandwidth_regenerated: analysis.bandwidthRegenerated,
    bandwidth_consumed: analysis.bandwidthConsumed,
    bandwidth_regen_rate_per_second: analysis.bandwidthRegenRatePerSecond,
    bandwidth_regen_rate_per_day: analysis.bandwidthRegenRatePerDay,
    bandwidth_consume_rate_per_second: analysis.bandwidthConsumeRatePerSecond,
    bandwidth_consume_rate_per_day: analysis.bandwidthConsumeRatePerDay,
    bandwidth_net_rate_per_second: analysis.bandwidthNetRatePerSecond,
    bandwidth_net_rate_per_day: analysis.bandwidthNetRatePerDay,

    theoretical_energy_rate_per_day: analysis.theoreticalEnergyRatePerDay,
    theoretical_bandwidth_rate_per_day: analysis.theoreticalBandwidthRatePerDay,
    energy_rate_matches_theory: analysis.energyRateMatchesTheory,
    bandwidth_rate_matches_theory: analysis.bandwidthRateMatchesTheory,

    tx_per_day_65k_energy: analysis.txPerDay65k,
    tx_per_day_131k_energy: analysis.txPerDay131k,

    tick_analysis: {
      recovery_ticks: tick.recoveryTicks,
      avg_recovery_interval_sec: tick.avgRecoveryIntervalSeconds,
      energy_per_tick: tick.energyPerTick,
      bandwidth_per_tick: tick.bandwidthPerTick,
      recovery_ticks_per_hour: tick.recoveryTicksPerHour,
      recovery_ticks_per_day: tick.recoveryTicksPerDay,
      consumption_events: tick.consumptionEvents,
      total_energy_consumed: tick.totalEnergyConsumed,
      total_bandwidth_consumed: tick.totalBandwidthConsumed,
      avg_energy_per_consumption: tick.avgEnergyPerConsumption,
      avg_bandwidth_per_consumption: tick.avgBandwidthPerConsumption,
      tick_timestamps_ms: [...tick.tickTimestampsMs],
      tick_energy_deltas: [...tick.tickEnergyDeltas],
      tick_bandwidth_deltas: [...tick.tickBandwidthDeltas]
    },
    used_based_analysis: {
      energy_used_ratio: used.energyUsedRatio,
      bandwidth_used_ratio: used.bandwidthUsedRatio,
      energy_used_at_start: used.energyUsedAtStart,
      bandwidth_used_at_start: used.bandwidthUsedAtStart,
      estimated_full_recovery_seconds: used.estimatedFullRecoverySeconds,
      estimated_full_recovery_hours: used.estimatedFullRecoveryHours,
      energy_recovery_matches_used_model: used.energyRecoveryMatchesUsedModel,
      measured_recovery_rate_per_sec: used.measuredRecoveryRatePerSecond,
      used_based_recovery_rate_per_sec: used.usedBasedRecoveryRatePerSecond
    },
    formula_validation: {
      theoretical_model: formula.theoreticalModel,
      measured_model: formula.measuredModel,
      best_fit: formula.bestFit,
      confidence: formula.confidence
    },
    practical_estimates: {
      tx_per_day_65k_with_buffer: estimates.txPerDay65kWithBuffer,
      tx_per_day_65k_sustained: estimates.txPerDay65kSustained,
      tx_per_day_131k_with_buffer: estimates.txPerDay131kWithBuffer,
      tx_per_day_131k_sustained: estimates.txPerDay131kSustained,
      energy_needed_for_800_tx_65k: estimates.energyNeededFor800Tx65k,
      energy_needed_for_800_tx_131k: estimates.energyNeededFor800Tx131k,
      immediate_capacity_65k: estimates.immediateCapacity65k,
      immediate_capacity_131k: estimates.immediateCapacity131k
    }
  };
}

export function toReportDocument(report: IMonitorReport): IMonitorReportDocument {
  const { metadata } = report;

  return {
    metadata: {
      address: metadata.address,
      node: metadata.node,
      start_time: metadata.startTime.toISOString(),
      end_time: metadata.endTime.toISOString(),
      duration_seconds: metadata.durationSeconds,
      samples_count: metadata.samplesCount,
      interval_ms: metadata.intervalMs
    },
    snapshots: report.snapshots.map(toSnapshotDocument),
    analysis: toAnalysisDocument(report.analysis)
  };
}
