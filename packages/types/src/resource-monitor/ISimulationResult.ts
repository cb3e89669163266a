/**
 * 24-hour transaction projection for an arbitrary per-transaction cost.
 */
export interface ISimulationResult {
    readonly targetTx: number;
    readonly txCost: number;
    readonly currentAvailable: number;
    readonly immediateCapacity: number;
    readonly recoveryRatePerSecond: number;
    /** Seconds of regeneration needed to fund one transaction; 0 without regeneration */
    readonly secondsPerTx: number;
    readonly total24hCapacity: number;
    readonly canReachTarget: boolean;
    /** targetTx * txCost when the target is out of reach, otherwise 0 */
    readonly requiredEnergyLimit: number;
    /** Transactions affordable in each of the next 24 hours */
    readonly hourlyProjection: readonly number[];
}
