import type { IResourceSnapshot, ITickAnalysis } from '@resource-monitor/types';
import { MS_PER_DAY, MS_PER_HOUR } from './constants.js';

export function createEmptyTickAnalysis(): ITickAnalysis {
    return {
        recoveryTicks: 0,
        avgRecoveryIntervalSeconds: 0,
        energyPerTick: 0,
        bandwidthPerTick: 0,
        recoveryTicksPerHour: 0,
        recoveryTicksPerDay: 0,
        consumptionEvents: 0,
        totalEnergyConsumed: 0,
        totalBandwidthConsumed: 0,
        avgEnergyPerConsumption: 0,
        avgBandwidthPerConsumption: 0,
        tickTimestampsMs: [],
        tickEnergyDeltas: [],
        tickBandwidthDeltas: []
    };
}

/**
 * Separate recovery ticks from consumption events.
 *
 * Classification keys off the Energy delta: a positive Energy delta is a
 * recovery tick and credits both resources, since TRON regenerates them on the
 * same block cadence. Bandwidth consumption is totalled on its own sign but not
 * counted as separate events.
 *
 * The average tick interval spans first to last tick, so it stays 0 until at
 * least two ticks were observed.
 */
export function analyzeTicks(snapshots: readonly IResourceSnapshot[]): ITickAnalysis {
    if (snapshots.length < 2) {
        return createEmptyTickAnalysis();
    }

    const tickTimestampsMs: number[] = [];
    const tickEnergyDeltas: number[] = [];
    const tickBandwidthDeltas: number[] = [];
    const recoveryTimestampsMs: number[] = [];

    let recoveryTicks = 0;
    let regeneratedEnergy = 0;
    let regeneratedBandwidth = 0;
    let consumptionEvents = 0;
    let totalEnergyConsumed = 0;
    let totalBandwidthConsumed = 0;

    for (const snapshot of snapshots.slice(1)) {
        tickTimestampsMs.push(snapshot.elapsedMs);
        tickEnergyDeltas.push(snapshot.deltaEnergy);
        tickBandwidthDeltas.push(snapshot.deltaBandwidth);

        if (snapshot.deltaEnergy > 0) {
            recoveryTicks += 1;
            regeneratedEnergy += snapshot.deltaEnergy;
            regeneratedBandwidth += snapshot.deltaBandwidth;
            recoveryTimestampsMs.push(snapshot.elapsedMs);
        }

        if (snapshot.deltaEnergy < 0) {
            consumptionEvents += 1;
            totalEnergyConsumed += -snapshot.deltaEnergy;
        }
        if (snapshot.deltaBandwidth < 0) {
            totalBandwidthConsumed += -snapshot.deltaBandwidth;
        }
    }

    let avgRecoveryIntervalSeconds = 0;
    let recoveryTicksPerHour = 0;
    let recoveryTicksPerDay = 0;

    if (recoveryTimestampsMs.length > 1) {
        const firstTickMs = recoveryTimestampsMs[0];
        const lastTickMs = recoveryTimestampsMs[recoveryTimestampsMs.length - 1];
        const avgIntervalMs = (lastTickMs - firstTickMs) / (recoveryTimestampsMs.length - 1);
        avgRecoveryIntervalSeconds = avgIntervalMs / 1000;

        if (avgIntervalMs > 0) {
            recoveryTicksPerHour = MS_PER_HOUR / avgIntervalMs;
            recoveryTicksPerDay = MS_PER_DAY / avgIntervalMs;
        }
    }

    return {
        recoveryTicks,
        avgRecoveryIntervalSeconds,
        energyPerTick: recoveryTicks > 0 ? regeneratedEnergy / recoveryTicks : 0,
        bandwidthPerTick: recoveryTicks > 0 ? regeneratedBandwidth / recoveryTicks : 0,
        recoveryTicksPerHour,
        recoveryTicksPerDay,
        consumptionEvents,
        totalEnergyConsumed,
        totalBandwidthConsumed,
        avgEnergyPerConsumption: consumptionEvents > 0 ? totalEnergyConsumed / consumptionEvents : 0,
        avgBandwidthPerConsumption: consumptionEvents > 0 ? totalBandwidthConsumed / consumptionEvents : 0,
        tickTimestampsMs,
        tickEnergyDeltas,
        tickBandwidthDeltas
    };
}
