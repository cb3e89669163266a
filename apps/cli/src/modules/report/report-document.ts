import type { RegenerationModel } from '@resource-monitor/types';

/**
 * On-disk shape of a monitoring report.
 *
 * Field names are snake_case and timestamps are ISO-8601 strings; the domain
 * types stay camelCase and map onto these through `toReportDocument`.
 */

export interface ISnapshotDocument {
  timestamp: string;
  elapsed_ms: number;
  energy_limit: number;
  energy_used: number;
  net_limit: number;
  net_used: number;
  free_net_limit: number;
  free_net_used: number;
  energy_available: number;
  bandwidth_available: number;
  delta_energy: number;
  delta_bandwidth: number;
}

export interface IReportMetadataDocument {
  address: string;
  node: string;
  start_time: string;
  end_time: string;
  duration_seconds: number;
  samples_count: number;
  interval_ms: number;
}

export interface ITickAnalysisDocument {
  recovery_ticks: number;
  avg_recovery_interval_sec: number;
  energy_per_tick: number;
  bandwidth_per_tick: number;
  recovery_ticks_per_hour: number;
  recovery_ticks_per_day: number;
  consumption_events: number;
  total_energy_consumed: number;
  total_bandwidth_consumed: number;
  avg_energy_per_consumption: number;
  avg_bandwidth_per_consumption: number;
  tick_timestamps_ms: number[];
  tick_energy_deltas: number[];
  tick_bandwidth_deltas: number[];
}

export interface IUsedBasedAnalysisDocument {
  energy_used_ratio: number;
  bandwidth_used_ratio: number;
  energy_used_at_start: number;
  bandwidth_used_at_start: number;
  estimated_full_recovery_seconds: number;
  estimated_full_recovery_hours: number;
  energy_recovery_matches_used_model: boolean;
  measured_recovery_rate_per_sec: number;
  used_based_recovery_rate_per_sec: number;
}

export interface IFormulaValidationDocument {
  theoretical_model: string;
  measured_model: string;
  best_fit: RegenerationModel | null;
  confidence: number;
}

export interface IPracticalEstimatesDocument {
  tx_per_day_65k_with_buffer: number;
  tx_per_day_65k_sustained: number;
  tx_per_day_131k_with_buffer: number;
  tx_per_day_131k_sustained: number;
  energy_needed_for_800_tx_65k: number;
  energy_needed_for_800_tx_131k: number;
  immediate_capacity_65k: number;
  immediate_capacity_131k: number;
}

export interface IAnalysisDocument {
  actual_duration_seconds: number;

  energy_start: number;
  energy_end: number;
  energy_total_delta: number;
  energy_regenerated: number;
  energy_consumed: number;
  energy_regen_rate_per_second: number;
  energy_regen_rate_per_day: number;
  energy_consume_rate_per_second: number;
  energy_consume_rate_per_day: number;
  energy_net_rate_per_second: number;
  energy_net_rate_per_day: number;

  bandwidth_start: number;
  bandwidth_end: number;
  bandwidth_total_delta: number;
  bandwidth_regenerated: number;
  bandwidth_consumed: number;
  bandwidth_regen_rate_per_second: number;
  bandwidth_regen_rate_per_day: number;
  bandwidth_consume_rate_per_second: number;
  bandwidth_consume_rate_per_day: number;
  bandwidth_net_rate_per_second: number;
  bandwidth_net_rate_per_day: number;

  theoretical_energy_rate_per_day: number;
  theoretical_bandwidth_rate_per_day: number;
  energy_rate_matches_theory: boolean;
  bandwidth_rate_matches_theory: boolean;

  tx_per_day_65k_energy: number;
  tx_per_day_131k_energy: number;

  tick_analysis: ITickAnalysisDocument;
  used_based_analysis: IUsedBasedAnalysisDocument;
  formula_validation: IFormulaValidationDocument;
  practical_estimates: IPracticalEstimatesDocument;
}

export interface IMonitorReportDocument {
  metadata: IReportMetadataDocument;
  snapshots: ISnapshotDocument[];
  analysis: IAnalysisDocument;
}
