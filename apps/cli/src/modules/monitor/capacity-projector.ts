import type { IPracticalEstimates, IResourceSnapshot, ISimulationResult } from '@resource-monitor/types';
import { ValidationError } from '../../lib/errors.js';
import { HOURS_PER_DAY, REFERENCE_DAILY_TX, TX_COST_FIRST_TIME, TX_COST_STANDARD } from './constants.js';
import type { RateAnalysis } from './rate-analyzer.js';

/** Rate fields the projector reads from an analysis */
export type RegenerationRates = Pick<RateAnalysis, 'energyRegenRatePerSecond' | 'energyRegenRatePerDay'>;

/**
 * Transaction capacity at the two reference costs.
 *
 * - Immediate: what the current buffer pays for, truncated to whole transactions.
 * - Sustained: one day of measured regeneration.
 * - With buffer: current buffer plus one day of regeneration.
 */
export function estimateCapacity(first: IResourceSnapshot, rates: RegenerationRates): IPracticalEstimates {
    const available = first.energyAvailable;
    const regenPerDay = rates.energyRegenRatePerDay;
    const hasRegen = regenPerDay > 0;

    return {
        energyNeededFor800Tx65k: REFERENCE_DAILY_TX * TX_COST_STANDARD,
        energyNeededFor800Tx131k: REFERENCE_DAILY_TX * TX_COST_FIRST_TIME,
        immediateCapacity65k: available > 0 ? Math.trunc(available / TX_COST_STANDARD) : 0,
        immediateCapacity131k: available > 0 ? Math.trunc(available / TX_COST_FIRST_TIME) : 0,
        txPerDay65kSustained: hasRegen ? regenPerDay / TX_COST_STANDARD : 0,
        txPerDay131kSustained: hasRegen ? regenPerDay / TX_COST_FIRST_TIME : 0,
        txPerDay65kWithBuffer: hasRegen ? (available + regenPerDay) / TX_COST_STANDARD : 0,
        txPerDay131kWithBuffer: hasRegen ? (available + regenPerDay) / TX_COST_FIRST_TIME : 0
    };
}

/**
 * Project how many transactions of `txCost` Energy the account can send over
 * the next 24 hours.
 *
 * Each simulated hour spends everything it can afford, then regains 1/24 of
 * the measured daily regeneration, capped at the stated Energy limit. The
 * required limit for a missed target assumes the whole limit regenerates once
 * a day.
 *
 * @param snapshot - Starting point, usually the last snapshot of the session
 * @param rates - Measured Energy regeneration rates
 * @param txCost - Energy per transaction, a positive integer
 * @param targetTx - Daily transaction target, a non-negative integer
 * @throws ValidationError when txCost or targetTx is out of range
 */
export function simulateTransactions(
    snapshot: IResourceSnapshot,
    rates: RegenerationRates,
    txCost: number,
    targetTx: number
): ISimulationResult {
    if (!Number.isInteger(txCost) || txCost <= 0) {
        throw new ValidationError('Transaction cost must be a positive integer', { txCost });
    }
    if (!Number.isInteger(targetTx) || targetTx < 0) {
        throw new ValidationError('Target transaction count must be a non-negative integer', { targetTx });
    }

    const available = snapshot.energyAvailable;
    const immediateCapacity = Math.trunc(available / txCost);
    const regenPerSecond = rates.energyRegenRatePerSecond;
    const energyPerHour = Math.trunc(rates.energyRegenRatePerDay / HOURS_PER_DAY);

    const hourlyProjection: number[] = [];
    let currentEnergy = available;
    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
        const txThisHour = Math.trunc(currentEnergy / txCost);
        hourlyProjection.push(txThisHour);

        currentEnergy = Math.min(currentEnergy - txThisHour * txCost + energyPerHour, snapshot.energyLimit);
    }

    const total24hCapacity = immediateCapacity + Math.trunc(Math.trunc(rates.energyRegenRatePerDay) / txCost);
    const canReachTarget = total24hCapacity >= targetTx;

    return {
        targetTx,
        txCost,
        currentAvailable: available,
        immediateCapacity,
        recoveryRatePerSecond: regenPerSecond,
        secondsPerTx: regenPerSecond > 0 ? txCost / regenPerSecond : 0,
        total24hCapacity,
        canReachTarget,
        requiredEnergyLimit: canReachTarget ? 0 : targetTx * txCost,
        hourlyProjection
    };
}
