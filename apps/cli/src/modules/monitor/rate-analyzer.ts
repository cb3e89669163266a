import type {
    IFormulaValidation,
    IResourceAnalysis,
    IResourceSnapshot,
    IUsedBasedAnalysis
} from '@resource-monitor/types';
import {
    LIMIT_MODEL_FORMULA,
    LIMIT_MODEL_TOLERANCE,
    SECONDS_PER_DAY,
    SECONDS_PER_HOUR,
    TX_COST_FIRST_TIME,
    TX_COST_STANDARD,
    USED_MODEL_FORMULA,
    USED_MODEL_TOLERANCE
} from './constants.js';
import { totalBandwidthLimit, totalBandwidthUsed } from './snapshot-builder.js';

/** Analysis fields computed directly from the deltas, without the sub-aggregates */
export type RateAnalysis = Omit<
    IResourceAnalysis,
    'tickAnalysis' | 'usedBasedAnalysis' | 'formulaValidation' | 'practicalEstimates'
>;

interface ResourceRates {
    regenerated: number;
    consumed: number;
    regenPerSecond: number;
    consumePerSecond: number;
    netPerSecond: number;
}

/**
 * True when `measured` lies within `tolerance` relative error of `theoretical`.
 * Undefined comparisons (either side not positive) never match.
 */
export function matchesWithin(measured: number, theoretical: number, tolerance: number): boolean {
    if (measured <= 0 || theoretical <= 0) {
        return false;
    }
    return Math.abs(measured / theoretical - 1) < tolerance;
}

function relativeError(measured: number, theoretical: number): number {
    return Math.abs(measured - theoretical) / theoretical;
}

/**
 * Split one resource's deltas into regenerated and consumed totals and turn
 * them into per-second rates. The first snapshot's delta is skipped: it has
 * no predecessor.
 */
function computeRates(
    snapshots: readonly IResourceSnapshot[],
    delta: (snapshot: IResourceSnapshot) => number,
    durationSeconds: number
): ResourceRates {
    let regenerated = 0;
    let consumed = 0;

    for (const snapshot of snapshots.slice(1)) {
        const value = delta(snapshot);
        if (value > 0) {
            regenerated += value;
        } else if (value < 0) {
            consumed += -value;
        }
    }

    if (durationSeconds <= 0) {
        return { regenerated, consumed, regenPerSecond: 0, consumePerSecond: 0, netPerSecond: 0 };
    }

    const regenPerSecond = regenerated / durationSeconds;
    const consumePerSecond = consumed / durationSeconds;
    return {
        regenerated,
        consumed,
        regenPerSecond,
        consumePerSecond,
        netPerSecond: regenPerSecond - consumePerSecond
    };
}

export function createEmptyRateAnalysis(): RateAnalysis {
    return {
        actualDurationSeconds: 0,
        energyStart: 0,
        energyEnd: 0,
        energyTotalDelta: 0,
        energyRegenerated: 0,
        energyConsumed: 0,
        energyRegenRatePerSecond: 0,
        energyRegenRatePerDay: 0,
        energyConsumeRatePerSecond: 0,
        energyConsumeRatePerDay: 0,
        energyNetRatePerSecond: 0,
        energyNetRatePerDay: 0,
        bandwidthStart: 0,
        bandwidthEnd: 0,
        bandwidthTotalDelta: 0,
        bandwidthRegenerated: 0,
        bandwidthConsumed: 0,
        bandwidthRegenRatePerSecond: 0,
        bandwidthRegenRatePerDay: 0,
        bandwidthConsumeRatePerSecond: 0,
        bandwidthConsumeRatePerDay: 0,
        bandwidthNetRatePerSecond: 0,
        bandwidthNetRatePerDay: 0,
        theoreticalEnergyRatePerDay: 0,
        theoreticalBandwidthRatePerDay: 0,
        energyRateMatchesTheory: false,
        bandwidthRateMatchesTheory: false,
        txPerDay65k: 0,
        txPerDay131k: 0
    };
}

/**
 * Measure regeneration, consumption and net rates for both resources and
 * compare the regeneration rate with the limit-based daily model.
 *
 * The duration comes from the first and last elapsed times, so missed samples
 * never shorten it. A zero-length series keeps every rate at 0.
 */
export function analyzeRates(snapshots: readonly IResourceSnapshot[]): RateAnalysis {
    if (snapshots.length === 0) {
        return createEmptyRateAnalysis();
    }

    const first = snapshots[0];
    const last = snapshots[snapshots.length - 1];
    const actualDurationSeconds = (last.elapsedMs - first.elapsedMs) / 1000;

    const energy = computeRates(snapshots, snapshot => snapshot.deltaEnergy, actualDurationSeconds);
    const bandwidth = computeRates(snapshots, snapshot => snapshot.deltaBandwidth, actualDurationSeconds);

    const energyRegenRatePerDay = energy.regenPerSecond * SECONDS_PER_DAY;
    const bandwidthRegenRatePerDay = bandwidth.regenPerSecond * SECONDS_PER_DAY;
    const theoreticalEnergyRatePerDay = first.energyLimit;
    const theoreticalBandwidthRatePerDay = totalBandwidthLimit(first);

    return {
        actualDurationSeconds,

        energyStart: first.energyAvailable,
        energyEnd: last.energyAvailable,
        energyTotalDelta: last.energyAvailable - first.energyAvailable,
        energyRegenerated: energy.regenerated,
        energyConsumed: energy.consumed,
        energyRegenRatePerSecond: energy.regenPerSecond,
        energyRegenRatePerDay,
        energyConsumeRatePerSecond: energy.consumePerSecond,
        energyConsumeRatePerDay: energy.consumePerSecond * SECONDS_PER_DAY,
        energyNetRatePerSecond: energy.netPerSecond,
        energyNetRatePerDay: energy.netPerSecond * SECONDS_PER_DAY,

        bandwidthStart: first.bandwidthAvailable,
        bandwidthEnd: last.bandwidthAvailable,
        bandwidthTotalDelta: last.bandwidthAvailable - first.bandwidthAvailable,
        bandwidthRegenerated: bandwidth.regenerated,
        bandwidthConsumed: bandwidth.consumed,
        bandwidthRegenRatePerSecond: bandwidth.regenPerSecond,
        bandwidthRegenRatePerDay,
        bandwidthConsumeRatePerSecond: bandwidth.consumePerSecond,
        bandwidthConsumeRatePerDay: bandwidth.consumePerSecond * SECONDS_PER_DAY,
        bandwidthNetRatePerSecond: bandwidth.netPerSecond,
        bandwidthNetRatePerDay: bandwidth.netPerSecond * SECONDS_PER_DAY,

        theoreticalEnergyRatePerDay,
        theoreticalBandwidthRatePerDay,
        // Regeneration, not net: consumption says nothing about the model
        energyRateMatchesTheory: matchesWithin(energyRegenRatePerDay, theoreticalEnergyRatePerDay, LIMIT_MODEL_TOLERANCE),
        bandwidthRateMatchesTheory: matchesWithin(
            bandwidthRegenRatePerDay,
            theoreticalBandwidthRatePerDay,
            LIMIT_MODEL_TOLERANCE
        ),

        txPerDay65k: energyRegenRatePerDay > 0 ? energyRegenRatePerDay / TX_COST_STANDARD : 0,
        txPerDay131k: energyRegenRatePerDay > 0 ? energyRegenRatePerDay / TX_COST_FIRST_TIME : 0
    };
}

export function createEmptyUsedBasedAnalysis(): IUsedBasedAnalysis {
    return {
        energyUsedRatio: 0,
        bandwidthUsedRatio: 0,
        energyUsedAtStart: 0,
        bandwidthUsedAtStart: 0,
        estimatedFullRecoverySeconds: 0,
        estimatedFullRecoveryHours: 0,
        energyRecoveryMatchesUsedModel: false,
        measuredRecoveryRatePerSecond: 0,
        usedBasedRecoveryRatePerSecond: 0
    };
}

/**
 * Alternative model: whatever was already used at the first snapshot
 * regenerates in full over 24 hours, giving `energyUsed / 86400` per second.
 *
 * @param first - First snapshot of the session
 * @param measuredRatePerSecond - Measured Energy regeneration rate
 */
export function analyzeUsedBased(first: IResourceSnapshot, measuredRatePerSecond: number): IUsedBasedAnalysis {
    const energyUsedAtStart = first.energyUsed;
    const bandwidthUsedAtStart = totalBandwidthUsed(first);
    const bandwidthLimit = totalBandwidthLimit(first);

    let usedBasedRecoveryRatePerSecond = 0;
    let estimatedFullRecoverySeconds = 0;
    let energyRecoveryMatchesUsedModel = false;

    if (energyUsedAtStart > 0) {
        usedBasedRecoveryRatePerSecond = energyUsedAtStart / SECONDS_PER_DAY;
        if (measuredRatePerSecond > 0) {
            estimatedFullRecoverySeconds = energyUsedAtStart / measuredRatePerSecond;
        }
        energyRecoveryMatchesUsedModel = matchesWithin(
            measuredRatePerSecond,
            usedBasedRecoveryRatePerSecond,
            USED_MODEL_TOLERANCE
        );
    }

    return {
        energyUsedRatio: first.energyLimit > 0 ? energyUsedAtStart / first.energyLimit : 0,
        bandwidthUsedRatio: bandwidthLimit > 0 ? bandwidthUsedAtStart / bandwidthLimit : 0,
        energyUsedAtStart,
        bandwidthUsedAtStart,
        estimatedFullRecoverySeconds,
        estimatedFullRecoveryHours: estimatedFullRecoverySeconds / SECONDS_PER_HOUR,
        energyRecoveryMatchesUsedModel,
        measuredRecoveryRatePerSecond: measuredRatePerSecond,
        usedBasedRecoveryRatePerSecond
    };
}

/**
 * Pick whichever theoretical model (limit-based or used-based) sits closer to
 * the measured Energy regeneration rate. A tie goes to the limit-based model.
 */
export function validateFormulas(first: IResourceSnapshot, measuredRatePerSecond: number): IFormulaValidation {
    const limitBasedRate = first.energyLimit / SECONDS_PER_DAY;
    const usedBasedRate = first.energyUsed / SECONDS_PER_DAY;

    const validation: IFormulaValidation = {
        theoreticalModel: LIMIT_MODEL_FORMULA,
        measuredModel: USED_MODEL_FORMULA,
        bestFit: null,
        confidence: 0
    };

    if (measuredRatePerSecond <= 0 || limitBasedRate <= 0 || usedBasedRate <= 0) {
        return validation;
    }

    const limitError = relativeError(measuredRatePerSecond, limitBasedRate);
    const usedError = relativeError(measuredRatePerSecond, usedBasedRate);
    const usedWins = usedError < limitError;

    return {
        ...validation,
        bestFit: usedWins ? 'used_based' : 'limit_based',
        confidence: Math.max(0, 1 - (usedWins ? usedError : limitError))
    };
}
