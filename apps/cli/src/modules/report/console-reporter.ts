import type {
  IResourceAnalysis,
  ISampleSink,
  ISimulationResult,
  SampleObservation,
  SamplingPolicy
} from '@resource-monitor/types';
import { totalBandwidthLimit } from '../monitor/snapshot-builder.js';
import type { IReportComparison } from './report-compare.js';
import {
  formatDelta,
  formatElapsed,
  formatNumber,
  formatPercent,
  formatRate,
  formatSigned,
  formatUtcTimestamp,
  yesNo
} from './format.js';

/** Anything that accepts text, such as `process.stdout` */
export interface ITextOutput {
  write(chunk: string): unknown;
}

export interface SessionHeader {
  address: string;
  node: string;
  policy: SamplingPolicy;
  intervalMs: number;
  startTime: Date;
}

const SECTION_RULE = '='.repeat(100);
const BLOCK_RULE = '━'.repeat(60);
/** Simulation hours shown before and after the elided middle of the day */
const SHOWN_LEADING_HOURS = 6;
const SHOWN_TRAILING_FROM_HOUR = 22;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Human-readable session output: header, one line per sampling attempt, then
 * the summary and the optional simulation and comparison blocks.
 *
 * Doubles as the sampler's sink so the per-sample lines appear live.
 */
export class ConsoleReporter implements ISampleSink {
  constructor(private readonly out: ITextOutput) {}

  private line(text = ''): void {
    this.out.write(`${text}\n`);
  }

  printHeader(header: SessionHeader): void {
    this.line('TRON Resource Monitor');
    this.line(`Address: ${header.address}`);
    this.line(`Node: ${header.node}`);
    if (header.policy.kind === 'fixed-duration') {
      this.line(`Duration: ${header.policy.durationSeconds} seconds (interval: ${header.intervalMs}ms)`);
    } else {
      this.line(
        `Mode: until fully recovered, max ${header.policy.maxDurationSeconds} seconds (interval: ${header.intervalMs}ms)`
      );
    }
    this.line(`Started: ${formatUtcTimestamp(header.startTime)}`);
    this.line(SECTION_RULE);
    this.line();
  }

  onSample(observation: SampleObservation, index: number): void {
    if (observation.status === 'missed') {
      this.line(`${formatElapsed(observation.elapsedMs)} missed sample: ${errorMessage(observation.error)}`);
      return;
    }

    const snapshot = observation.snapshot;
    const base =
      `${formatElapsed(snapshot.elapsedMs)} ` +
      `Energy: ${formatNumber(snapshot.energyAvailable)} / ${formatNumber(snapshot.energyLimit)} ` +
      `(avail: ${formatNumber(snapshot.energyAvailable)}) | ` +
      `BW: ${formatNumber(snapshot.bandwidthAvailable)} / ${formatNumber(totalBandwidthLimit(snapshot))} ` +
      `(avail: ${formatNumber(snapshot.bandwidthAvailable)})`;

    if (index === 0) {
      this.line(base);
      return;
    }
    this.line(`${base} | ΔE: ${formatDelta(snapshot.deltaEnergy)} | ΔBW: ${formatDelta(snapshot.deltaBandwidth)}`);
  }

  /**
   * @param filename - Where the report was saved, or null when saving failed
   */
  printSummary(analysis: IResourceAnalysis, filename: string | null): void {
    this.line();
    this.line(SECTION_RULE);
    this.line(`SUMMARY (${analysis.actualDurationSeconds.toFixed(1)} seconds):`);

    this.line();
    this.line('  Energy Rates:');
    this.printRates(
      analysis.energyRegenRatePerSecond,
      analysis.energyRegenRatePerDay,
      analysis.energyConsumeRatePerSecond,
      analysis.energyConsumeRatePerDay,
      analysis.energyNetRatePerSecond,
      analysis.energyNetRatePerDay
    );

    this.line();
    this.line('  Bandwidth Rates:');
    this.printRates(
      analysis.bandwidthRegenRatePerSecond,
      analysis.bandwidthRegenRatePerDay,
      analysis.bandwidthConsumeRatePerSecond,
      analysis.bandwidthConsumeRatePerDay,
      analysis.bandwidthNetRatePerSecond,
      analysis.bandwidthNetRatePerDay
    );

    this.line();
    this.line('  Resource Totals:');
    this.line(
      `    Energy:    regenerated ${formatNumber(analysis.energyRegenerated)}, ` +
        `consumed ${formatNumber(analysis.energyConsumed)}, net ${formatDelta(analysis.energyTotalDelta)}`
    );
    this.line(
      `    Bandwidth: regenerated ${formatNumber(analysis.bandwidthRegenerated)}, ` +
        `consumed ${formatNumber(analysis.bandwidthConsumed)}, net ${formatDelta(analysis.bandwidthTotalDelta)}`
    );

    const tick = analysis.tickAnalysis;
    if (tick.recoveryTicks > 0 || tick.consumptionEvents > 0) {
      this.line();
      this.line('  Block Tick Analysis:');
      this.line(
        `    Recovery ticks: ${tick.recoveryTicks} (avg interval: ${tick.avgRecoveryIntervalSeconds.toFixed(1)} sec, ` +
          `~${tick.recoveryTicksPerDay.toFixed(0)}/day)`
      );
      this.line(
        `    Avg energy/tick: ${formatNumber(tick.energyPerTick)}, bandwidth/tick: ${tick.bandwidthPerTick.toFixed(1)}`
      );
      if (tick.consumptionEvents > 0) {
        this.line(
          `    Consumption events: ${tick.consumptionEvents} (total: ${formatNumber(tick.totalEnergyConsumed)} energy, ` +
            `${formatNumber(tick.totalBandwidthConsumed)} bandwidth)`
        );
        this.line(
          `    Avg per consumption: ${formatNumber(tick.avgEnergyPerConsumption)} energy, ` +
            `${tick.avgBandwidthPerConsumption.toFixed(0)} bandwidth`
        );
      }
    }

    const used = analysis.usedBasedAnalysis;
    if (used.energyUsedAtStart > 0) {
      this.line();
      this.line('  Recovery Analysis:');
      this.line(
        `    Energy used ratio: ${formatPercent(used.energyUsedRatio)} ` +
          `(${formatNumber(used.energyUsedAtStart)} / ${formatNumber(analysis.energyStart + used.energyUsedAtStart)})`
      );
      this.line(`    Bandwidth used ratio: ${formatPercent(used.bandwidthUsedRatio)}`);
      if (used.estimatedFullRecoveryHours > 0) {
        this.line(`    Estimated full recovery: ${used.estimatedFullRecoveryHours.toFixed(1)} hours`);
      }
      this.line(
        `    Measured regen: ${used.measuredRecoveryRatePerSecond.toFixed(1)}/sec, ` +
          `Theoretical (used-based): ${used.usedBasedRecoveryRatePerSecond.toFixed(1)}/sec`
      );
      this.line(`    Matches used-based model: ${yesNo(used.energyRecoveryMatchesUsedModel)}`);
    }

    const formula = analysis.formulaValidation;
    if (formula.bestFit) {
      this.line();
      this.line('  Formula Validation:');
      this.line(`    Best fit model: ${formula.bestFit} (confidence: ${formatPercent(formula.confidence)})`);
    }

    this.line();
    this.line('  Theoretical vs Measured (Regen Rate):');
    this.line(
      `    Energy:    theoretical ${formatNumber(analysis.theoreticalEnergyRatePerDay)}/day, ` +
        `measured ${formatNumber(analysis.energyRegenRatePerDay)}/day, match: ${yesNo(analysis.energyRateMatchesTheory)}`
    );
    this.line(
      `    Bandwidth: theoretical ${formatNumber(analysis.theoreticalBandwidthRatePerDay)}/day, ` +
        `measured ${formatNumber(analysis.bandwidthRegenRatePerDay)}/day, match: ${yesNo(analysis.bandwidthRateMatchesTheory)}`
    );

    const estimates = analysis.practicalEstimates;
    this.line();
    this.line('  Transaction Capacity (based on regen rate):');
    this.line('    Immediate (from buffer):');
    this.line(`      At 65k Energy/tx:  ${estimates.immediateCapacity65k} tx`);
    this.line(`      At 131k Energy/tx: ${estimates.immediateCapacity131k} tx`);
    this.line('    Sustained (regen only):');
    this.line(`      At 65k Energy/tx:  ${estimates.txPerDay65kSustained.toFixed(0)} tx/day`);
    this.line(`      At 131k Energy/tx: ${estimates.txPerDay131kSustained.toFixed(0)} tx/day`);
    this.line('    With buffer (immediate + regen):');
    this.line(`      At 65k Energy/tx:  ${estimates.txPerDay65kWithBuffer.toFixed(0)} tx/day`);
    this.line(`      At 131k Energy/tx: ${estimates.txPerDay131kWithBuffer.toFixed(0)} tx/day`);

    if (filename) {
      this.line();
      this.line(`Report saved to: ${filename}`);
    }
  }

  private printRates(
    regenPerSecond: number,
    regenPerDay: number,
    consumePerSecond: number,
    consumePerDay: number,
    netPerSecond: number,
    netPerDay: number
  ): void {
    this.line(`    Regeneration: ${formatRate(regenPerSecond)} /sec  (${formatNumber(regenPerDay)} /day)`);
    this.line(`    Consumption:  ${formatRate(consumePerSecond)} /sec  (${formatNumber(consumePerDay)} /day)`);
    this.line(`    Net:          ${formatRate(netPerSecond)} /sec  (${formatDelta(netPerDay)} /day)`);
  }

  printSimulation(simulation: ISimulationResult): void {
    this.line();
    this.line(BLOCK_RULE);
    this.line(
      `Transaction Simulation (target: ${simulation.targetTx} tx @ ${formatNumber(simulation.txCost)} energy each)`
    );
    this.line(BLOCK_RULE);

    this.line(`Current available: ${formatNumber(simulation.currentAvailable)} energy`);
    this.line(`Immediate capacity: ${simulation.immediateCapacity} tx`);
    this.line();
    this.line(
      `Recovery rate: ${simulation.recoveryRatePerSecond.toFixed(1)} energy/sec = ` +
        `1 tx every ${simulation.secondsPerTx.toFixed(1)} sec`
    );
    this.line();

    this.line('Projection for next 24 hours:');
    simulation.hourlyProjection.forEach((transactions, hour) => {
      if (hour < SHOWN_LEADING_HOURS || hour >= SHOWN_TRAILING_FROM_HOUR) {
        this.line(`  Hour ${String(hour).padStart(2)}: ${String(transactions).padStart(4)} tx`);
      } else if (hour === SHOWN_LEADING_HOURS) {
        this.line('  ...');
      }
    });
    this.line();

    this.line(`Total 24h: ${simulation.total24hCapacity} tx`);
    this.line();

    if (simulation.canReachTarget) {
      this.line(`✓ Can reach target of ${simulation.targetTx} tx/day`);
      return;
    }
    this.line(`✗ Cannot reach ${simulation.targetTx} tx/day with current resources`);
    this.line();
    this.line(
      `Required energy_limit for ${simulation.targetTx} tx/day: ${formatNumber(simulation.requiredEnergyLimit)}`
    );
  }

  printComparison(comparison: IReportComparison): void {
    const { energyRegenRatePerSecond: regen, energyConsumeRatePerSecond: consume } = comparison;
    const { bandwidthRegenRatePerSecond: bandwidth, txPerDay65k: txPerDay } = comparison;

    this.line();
    this.line(BLOCK_RULE);
    this.line(`Comparison with: ${comparison.source}`);
    this.line(BLOCK_RULE);
    this.line(
      `Energy Regen Rate:    ${regen.previous.toFixed(1)} -> ${regen.current.toFixed(1)} /sec ` +
        `(delta: ${formatSigned(regen.delta, 1)})`
    );
    this.line(
      `Energy Consume Rate:  ${consume.previous.toFixed(1)} -> ${consume.current.toFixed(1)} /sec ` +
        `(delta: ${formatSigned(consume.delta, 1)})`
    );
    this.line(
      `Bandwidth Regen Rate: ${bandwidth.previous.toFixed(1)} -> ${bandwidth.current.toFixed(1)} /sec ` +
        `(delta: ${formatSigned(bandwidth.delta, 1)})`
    );
    this.line(
      `Tx/day (65k):         ${txPerDay.previous.toFixed(0)} -> ${txPerDay.current.toFixed(0)} ` +
        `(delta: ${formatSigned(txPerDay.delta, 0)})`
    );
  }

  printInterrupted(): void {
    this.line();
    this.line();
    this.line('Monitoring interrupted by user.');
  }
}
