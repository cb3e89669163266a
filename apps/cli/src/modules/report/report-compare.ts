import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { IResourceAnalysis } from '@resource-monitor/types';
import { ReportError } from '../../lib/errors.js';

/** Only the fields the comparison reads; everything else in the file is ignored */
export const PreviousReportSchema = z.object({
  analysis: z.object({
    energy_regen_rate_per_second: z.number(),
    energy_consume_rate_per_second: z.number(),
    bandwidth_regen_rate_per_second: z.number(),
    tx_per_day_65k_energy: z.number()
  })
});

export type PreviousReport = z.infer<typeof PreviousReportSchema>;

export interface IMetricComparison {
  previous: number;
  current: number;
  /** current - previous */
  delta: number;
}

export interface IReportComparison {
  source: string;
  energyRegenRatePerSecond: IMetricComparison;
  energyConsumeRatePerSecond: IMetricComparison;
  bandwidthRegenRatePerSecond: IMetricComparison;
  txPerDay65k: IMetricComparison;
}

function compareMetric(previous: number, current: number): IMetricComparison {
  return { previous, current, delta: current - previous };
}

export function compareAnalyses(source: string, previous: PreviousReport, current: IResourceAnalysis): IReportComparison {
  const prev = previous.analysis;

  return {
    source,
    energyRegenRatePerSecond: compareMetric(prev.energy_regen_rate_per_second, current.energyRegenRatePerSecond),
    energyConsumeRatePerSecond: compareMetric(prev.energy_consume_rate_per_second, current.energyConsumeRatePerSecond),
    bandwidthRegenRatePerSecond: compareMetric(prev.bandwidth_regen_rate_per_second, current.bandwidthRegenRatePerSecond),
    txPerDay65k: compareMetric(prev.tx_per_day_65k_energy, current.txPerDay65k)
  };
}

/**
 * Load a report written by an earlier session and compare its headline rates
 * with the current analysis.
 *
 * @throws ReportError when the file cannot be read, is not JSON, or lacks the compared fields
 */
export async function compareWithPrevious(filename: string, current: IResourceAnalysis): Promise<IReportComparison> {
  let raw: string;
  try {
    raw = await readFile(filename, 'utf8');
  } catch (error) {
    throw new ReportError(`Failed to read ${filename}: ${error instanceof Error ? error.message : String(error)}`, {
      filename
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ReportError(`Failed to parse ${filename}: ${error instanceof Error ? error.message : String(error)}`, {
      filename
    });
  }

  const parsed = PreviousReportSchema.safeParse(json);
  if (!parsed.success) {
    throw new ReportError(`${filename} is not a monitor report`, {
      filename,
      issues: parsed.error.flatten().fieldErrors
    });
  }

  return compareAnalyses(filename, parsed.data, current);
}
