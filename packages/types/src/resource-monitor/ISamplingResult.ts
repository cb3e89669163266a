import type { IResourceSnapshot } from './IResourceSnapshot.js';

/**
 * Stopping policy for a sampling session.
 *
 * - `fixed-duration` takes `floor(duration / interval) + 1` samples.
 * - `until-recovered` samples up to `maxDurationSeconds + 1` times and stops as
 *   soon as a snapshot reports zero used Energy and zero used Bandwidth.
 */
export type SamplingPolicy =
    | { readonly kind: 'fixed-duration'; readonly durationSeconds: number }
    | { readonly kind: 'until-recovered'; readonly maxDurationSeconds: number };

/** Why a sampling session ended */
export type SamplingStopReason = 'completed' | 'recovered' | 'cancelled';

/**
 * Snapshot series produced by one sampling session.
 *
 * A cancelled session still returns every snapshot appended before the
 * cancellation was observed; `error` then holds the cancellation.
 */
export interface ISamplingResult<TError extends Error = Error> {
    readonly snapshots: readonly IResourceSnapshot[];
    readonly reason: SamplingStopReason;
    readonly error: TError | null;
    readonly startedAt: Date;
    readonly endedAt: Date;
}
