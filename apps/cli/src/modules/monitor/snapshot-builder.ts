import type { IResourceReading, IResourceSnapshot } from '@resource-monitor/types';

export function totalBandwidthLimit(reading: IResourceReading): number {
    return reading.netLimit + reading.freeNetLimit;
}

export function totalBandwidthUsed(reading: IResourceReading): number {
    return reading.netUsed + reading.freeNetUsed;
}

/**
 * Turn a raw reading into a frozen snapshot, diffing availability against
 * the previous successful snapshot when there is one.
 */
export function buildSnapshot(
    reading: IResourceReading,
    timestamp: Date,
    elapsedMs: number,
    previous: IResourceSnapshot | null
): IResourceSnapshot {
    const energyAvailable = reading.energyLimit - reading.energyUsed;
    const bandwidthAvailable = totalBandwidthLimit(reading) - totalBandwidthUsed(reading);

    return Object.freeze({
        timestamp,
        elapsedMs,
        energyLimit: reading.energyLimit,
        energyUsed: reading.energyUsed,
        netLimit: reading.netLimit,
        netUsed: reading.netUsed,
        freeNetLimit: reading.freeNetLimit,
        freeNetUsed: reading.freeNetUsed,
        energyAvailable,
        bandwidthAvailable,
        deltaEnergy: previous ? energyAvailable - previous.energyAvailable : 0,
        deltaBandwidth: previous ? bandwidthAvailable - previous.bandwidthAvailable : 0
    });
}

/**
 * True once both raw *used* counters are back at zero.
 *
 * Looks at usage rather than availability, so an account with no staked
 * resources satisfies it on the first reading.
 */
export function isFullyRecovered(snapshot: IResourceSnapshot): boolean {
    return snapshot.energyUsed === 0 && totalBandwidthUsed(snapshot) === 0;
}
