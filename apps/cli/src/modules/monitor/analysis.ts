import type { IResourceAnalysis, IResourceSnapshot } from '@resource-monitor/types';
import { estimateCapacity } from './capacity-projector.js';
import {
    analyzeRates,
    analyzeUsedBased,
    createEmptyRateAnalysis,
    createEmptyUsedBasedAnalysis,
    validateFormulas
} from './rate-analyzer.js';
import { analyzeTicks, createEmptyTickAnalysis } from './tick-analyzer.js';
import { LIMIT_MODEL_FORMULA, USED_MODEL_FORMULA } from './constants.js';

export function createEmptyAnalysis(): IResourceAnalysis {
    return {
        ...createEmptyRateAnalysis(),
        tickAnalysis: createEmptyTickAnalysis(),
        usedBasedAnalysis: createEmptyUsedBasedAnalysis(),
        formulaValidation: {
            theoreticalModel: LIMIT_MODEL_FORMULA,
            measuredModel: USED_MODEL_FORMULA,
            bestFit: null,
            confidence: 0
        },
        practicalEstimates: {
            txPerDay65kWithBuffer: 0,
            txPerDay65kSustained: 0,
            txPerDay131kWithBuffer: 0,
            txPerDay131kSustained: 0,
            energyNeededFor800Tx65k: 0,
            energyNeededFor800Tx131k: 0,
            immediateCapacity65k: 0,
            immediateCapacity131k: 0
        }
    };
}

/**
 * Build the full analysis of a finished (or interrupted) sampling session.
 *
 * Pure: the same series always yields the same analysis, and an empty series
 * yields the zero-valued analysis instead of an error.
 */
export function analyzeSnapshots(snapshots: readonly IResourceSnapshot[]): IResourceAnalysis {
    if (snapshots.length === 0) {
        return createEmptyAnalysis();
    }

    const first = snapshots[0];
    const rates = analyzeRates(snapshots);

    return {
        ...rates,
        tickAnalysis: analyzeTicks(snapshots),
        usedBasedAnalysis: analyzeUsedBased(first, rates.energyRegenRatePerSecond),
        formulaValidation: validateFormulas(first, rates.energyRegenRatePerSecond),
        practicalEstimates: estimateCapacity(first, rates)
    };
}
