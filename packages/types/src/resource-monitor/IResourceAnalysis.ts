/**
 * Recovery tick and consumption event statistics.
 *
 * TRON regenerates resources on block boundaries, so a sampled interval with
 * a positive Energy delta is counted as one recovery tick.
 */
export interface ITickAnalysis {
    readonly recoveryTicks: number;
    /** Average spacing between recovery ticks; 0 with fewer than two ticks */
    readonly avgRecoveryIntervalSeconds: number;
    readonly energyPerTick: number;
    /** Bandwidth accumulated on Energy recovery ticks, divided by tick count */
    readonly bandwidthPerTick: number;
    readonly recoveryTicksPerHour: number;
    readonly recoveryTicksPerDay: number;

    /** Intervals with a negative Energy delta */
    readonly consumptionEvents: number;
    readonly totalEnergyConsumed: number;
    /** Sum of negative Bandwidth deltas, whatever the Energy delta did */
    readonly totalBandwidthConsumed: number;
    readonly avgEnergyPerConsumption: number;
    readonly avgBandwidthPerConsumption: number;

    /** Elapsed time of every snapshot after the first */
    readonly tickTimestampsMs: readonly number[];
    readonly tickEnergyDeltas: readonly number[];
    readonly tickBandwidthDeltas: readonly number[];
}

/**
 * Recovery model that assumes the amount already used at session start fully
 * regenerates within 24 hours.
 */
export interface IUsedBasedAnalysis {
    readonly energyUsedRatio: number;
    readonly bandwidthUsedRatio: number;
    readonly energyUsedAtStart: number;
    readonly bandwidthUsedAtStart: number;
    readonly estimatedFullRecoverySeconds: number;
    readonly estimatedFullRecoveryHours: number;
    /** Measured regen rate within 15% of energyUsed / 86400 */
    readonly energyRecoveryMatchesUsedModel: boolean;
    readonly measuredRecoveryRatePerSecond: number;
    readonly usedBasedRecoveryRatePerSecond: number;
}

export type RegenerationModel = 'limit_based' | 'used_based';

/** Which theoretical model explains the measured regeneration rate better */
export interface IFormulaValidation {
    readonly theoreticalModel: string;
    readonly measuredModel: string;
    /** null when any of the compared rates is not positive */
    readonly bestFit: RegenerationModel | null;
    /** 1 - relative error of the winning model, floored at 0 */
    readonly confidence: number;
}

/** Transaction capacity at the two reference costs (65k and 131k Energy) */
export interface IPracticalEstimates {
    readonly txPerDay65kWithBuffer: number;
    readonly txPerDay65kSustained: number;
    readonly txPerDay131kWithBuffer: number;
    readonly txPerDay131kSustained: number;
    readonly energyNeededFor800Tx65k: number;
    readonly energyNeededFor800Tx131k: number;
    readonly immediateCapacity65k: number;
    readonly immediateCapacity131k: number;
}

/**
 * Aggregate statistics over a finished snapshot series.
 *
 * Regenerated and consumed totals are accumulated independently per resource,
 * so `regenerated - consumed` equals the end-to-end change in availability.
 * Every field is zero for an empty series or a zero-length session.
 */
export interface IResourceAnalysis {
    readonly actualDurationSeconds: number;

    readonly energyStart: number;
    readonly energyEnd: number;
    readonly energyTotalDelta: number;
    readonly energyRegenerated: number;
    readonly energyConsumed: number;
    readonly energyRegenRatePerSecond: number;
    readonly energyRegenRatePerDay: number;
    readonly energyConsumeRatePerSecond: number;
    readonly energyConsumeRatePerDay: number;
    /** Regen minus consumption; negative for an actively spending account */
    readonly energyNetRatePerSecond: number;
    readonly energyNetRatePerDay: number;

    readonly bandwidthStart: number;
    readonly bandwidthEnd: number;
    readonly bandwidthTotalDelta: number;
    readonly bandwidthRegenerated: number;
    readonly bandwidthConsumed: number;
    readonly bandwidthRegenRatePerSecond: number;
    readonly bandwidthRegenRatePerDay: number;
    readonly bandwidthConsumeRatePerSecond: number;
    readonly bandwidthConsumeRatePerDay: number;
    readonly bandwidthNetRatePerSecond: number;
    readonly bandwidthNetRatePerDay: number;

    /** Stated limit at the first snapshot: the whole limit regenerates once per day */
    readonly theoreticalEnergyRatePerDay: number;
    readonly theoreticalBandwidthRatePerDay: number;
    readonly energyRateMatchesTheory: boolean;
    readonly bandwidthRateMatchesTheory: boolean;

    readonly txPerDay65k: number;
    readonly txPerDay131k: number;

    readonly tickAnalysis: ITickAnalysis;
    readonly usedBasedAnalysis: IUsedBasedAnalysis;
    readonly formulaValidation: IFormulaValidation;
    readonly practicalEstimates: IPracticalEstimates;
}
