import type {
    ILogger,
    IResourceFetcher,
    IResourceSnapshot,
    ISampleSink,
    ISamplingResult,
    SamplingPolicy,
    SamplingStopReason
} from '@resource-monitor/types';
import { settleUnlessAborted, waitFor } from '../../lib/abort.js';
import { SamplingCancelledError, ValidationError } from '../../lib/errors.js';
import { buildSnapshot, isFullyRecovered } from './snapshot-builder.js';

export const MIN_INTERVAL_MS = 100;

export interface ResourceSamplerOptions {
    /** Base58 address of the account to sample */
    address: string;
    /** Spacing between sampling attempts; at least 100 ms */
    intervalMs: number;
}

export interface SamplingRunOptions {
    policy: SamplingPolicy;
    /** Aborting ends the run with the snapshots collected so far */
    signal?: AbortSignal;
    /** Notified after every attempt, successful or not */
    sink?: ISampleSink;
}

export type SamplerResult = ISamplingResult<SamplingCancelledError>;

/**
 * Number of sampling attempts a policy allows at the given interval.
 *
 * A fixed-duration run covers both ends of the window, hence the `+ 1`. The
 * until-recovered cap counts attempts, not seconds, so it stretches with the
 * interval.
 */
export function countAttempts(policy: SamplingPolicy, intervalMs: number): number {
    if (policy.kind === 'fixed-duration') {
        return Math.floor((policy.durationSeconds * 1000) / intervalMs) + 1;
    }
    return policy.maxDurationSeconds + 1;
}

/**
 * Stop predicate evaluated after each appended snapshot.
 *
 * @returns The stop reason, or null to keep sampling
 */
function evaluateStop(policy: SamplingPolicy, snapshot: IResourceSnapshot): SamplingStopReason | null {
    if (policy.kind === 'until-recovered' && isFullyRecovered(snapshot)) {
        return 'recovered';
    }
    return null;
}

function assertPolicy(policy: SamplingPolicy): void {
    const value = policy.kind === 'fixed-duration' ? policy.durationSeconds : policy.maxDurationSeconds;
    if (!Number.isInteger(value) || value < 0) {
        throw new ValidationError(`Sampling ${policy.kind} duration must be a non-negative integer`, { policy });
    }
}

/**
 * Polls one account's resources at a fixed interval and builds the
 * delta-annotated snapshot series.
 *
 * The loop suspends at two points per attempt, the fetch and the wait for the
 * next scheduled attempt, and both race the abort signal. A failed fetch is
 * recorded as a missed sample: nothing is appended and the delta baseline
 * stays on the last successful snapshot.
 *
 * The snapshot array is owned by the run until it returns; callers receive a
 * frozen copy.
 */
export class ResourceSampler {
    private readonly address: string;
    private readonly intervalMs: number;
    private readonly logger: ILogger;

    constructor(
        private readonly fetcher: IResourceFetcher,
        options: ResourceSamplerOptions,
        logger: ILogger
    ) {
        if (!Number.isInteger(options.intervalMs) || options.intervalMs < MIN_INTERVAL_MS) {
            throw new ValidationError(`Sampling interval must be an integer of at least ${MIN_INTERVAL_MS}ms`, {
                intervalMs: options.intervalMs
            });
        }

        this.address = options.address;
        this.intervalMs = options.intervalMs;
        this.logger = logger.child({ module: 'sampler', address: options.address });
    }

    /**
     * Run one sampling session under the given stop policy.
     *
     * Resolves rather than rejects on cancellation: the result then carries
     * reason `cancelled` and a `SamplingCancelledError`, alongside every
     * snapshot appended before the abort was observed.
     */
    async run({ policy, signal, sink }: SamplingRunOptions): Promise<SamplerResult> {
        assertPolicy(policy);

        const startedAt = new Date();
        const startMs = startedAt.getTime();
        const attempts = countAttempts(policy, this.intervalMs);
        const snapshots: IResourceSnapshot[] = [];
        let previous: IResourceSnapshot | null = null;
        let missedSamples = 0;

        const finish = (reason: SamplingStopReason): SamplerResult => {
            const result: SamplerResult = {
                snapshots: Object.freeze([...snapshots]),
                reason,
                error: reason === 'cancelled'
                    ? new SamplingCancelledError('Sampling cancelled', { collected: snapshots.length })
                    : null,
                startedAt,
                endedAt: new Date()
            };

            this.logger.debug(
                { reason, snapshots: snapshots.length, missedSamples },
                'Sampling finished'
            );
            return result;
        };

        this.logger.debug(
            { policy: policy.kind, intervalMs: this.intervalMs, attempts },
            'Sampling started'
        );

        for (let index = 0; index < attempts; index++) {
            if (signal?.aborted) {
                return finish('cancelled');
            }

            const outcome = await settleUnlessAborted(this.fetcher.fetch(this.address, signal), signal);
            if (outcome.status === 'aborted' || signal?.aborted) {
                return finish('cancelled');
            }

            const timestamp = new Date();
            const elapsedMs = timestamp.getTime() - startMs;

            if (outcome.status === 'rejected') {
                missedSamples += 1;
                this.logger.warn(
                    { index, elapsedMs, missedSamples, error: outcome.reason },
                    'Resource fetch failed - skipping sample'
                );
                sink?.onSample({ status: 'missed', timestamp, elapsedMs, error: outcome.reason }, index);
            } else {
                const snapshot = buildSnapshot(outcome.value, timestamp, elapsedMs, previous);
                snapshots.push(snapshot);
                previous = snapshot;
                sink?.onSample({ status: 'ok', snapshot }, index);

                const stopReason = evaluateStop(policy, snapshot);
                if (stopReason) {
                    return finish(stopReason);
                }
            }

            if (index < attempts - 1) {
                const nextAttemptAt = startMs + (index + 1) * this.intervalMs;
                await waitFor(Math.max(0, nextAttemptAt - Date.now()), signal);
                if (signal?.aborted) {
                    return finish('cancelled');
                }
            }
        }

        return finish('completed');
    }
}
