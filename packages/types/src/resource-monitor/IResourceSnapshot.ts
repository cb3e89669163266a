import type { IResourceReading } from './IResourceReading.js';

/**
 * One timestamped, delta-annotated observation of both resources.
 *
 * Deltas are measured against the nearest previous snapshot that was fetched
 * successfully. The first snapshot of a session carries zero deltas.
 */
export interface IResourceSnapshot extends IResourceReading {
    /** Wall-clock time at which the reading was taken */
    readonly timestamp: Date;
    /** Milliseconds since the sampling session started */
    readonly elapsedMs: number;
    /** energyLimit - energyUsed */
    readonly energyAvailable: number;
    /** (netLimit + freeNetLimit) - (netUsed + freeNetUsed) */
    readonly bandwidthAvailable: number;
    readonly deltaEnergy: number;
    readonly deltaBandwidth: number;
}
