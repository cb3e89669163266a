import type { IResourceSnapshot } from './IResourceSnapshot.js';

/**
 * Outcome of a single sampling attempt.
 *
 * A missed sample only carries timing information; it never enters the
 * snapshot series.
 */
export type SampleObservation =
    | {
          readonly status: 'ok';
          readonly snapshot: IResourceSnapshot;
      }
    | {
          readonly status: 'missed';
          readonly timestamp: Date;
          readonly elapsedMs: number;
          readonly error: unknown;
      };

/**
 * Receives every sampling attempt as it happens, in order.
 *
 * Called synchronously from inside the sampling loop, so implementations must
 * not block. Used for live progress output.
 */
export interface ISampleSink {
    onSample(observation: SampleObservation, index: number): void;
}
