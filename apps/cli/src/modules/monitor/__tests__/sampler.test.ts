/// <reference types="vitest" />

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { IResourceFetcher, IResourceReading, SampleObservation } from '@resource-monitor/types';
import { FetchError, SamplingCancelledError, ValidationError } from '../../../lib/errors.js';
import { MockLogger } from '../../../__tests__/helpers/mock-logger.js';
import { reading, SESSION_START } from '../../../__tests__/helpers/snapshots.js';
import { countAttempts, ResourceSampler } from '../sampler.js';

const ADDRESS = 'TTestAddressPlaceholder0000000000';

/**
 * Fetcher that replays a scripted sequence: a reading resolves, an Error
 * rejects. The last entry repeats once the script runs out.
 */
function scriptedFetcher(script: Array<IResourceReading | Error>) {
    let call = 0;
    const fetch = vi.fn(async (_address: string, _signal?: AbortSignal): Promise<IResourceReading> => {
        const step = script[Math.min(call, script.length - 1)];
        call += 1;
        if (step instanceof Error) {
            throw step;
        }
        return step;
    });
    const fetcher: IResourceFetcher = { fetch };
    return { fetcher, fetch };
}

function recordingSink() {
    const observations: Array<{ observation: SampleObservation; index: number }> = [];
    return {
        observations,
        onSample: vi.fn((observation: SampleObservation, index: number) => {
            observations.push({ observation, index });
        })
    };
}

describe('countAttempts', () => {
    it('covers both ends of a fixed window', () => {
        expect(countAttempts({ kind: 'fixed-duration', durationSeconds: 20 }, 1000)).toBe(21);
        expect(countAttempts({ kind: 'fixed-duration', durationSeconds: 1 }, 300)).toBe(4);
    });

    it('caps until-recovered sessions by attempt count', () => {
        expect(countAttempts({ kind: 'until-recovered', maxDurationSeconds: 86_400 }, 1000)).toBe(86_401);
        expect(countAttempts({ kind: 'until-recovered', maxDurationSeconds: 5 }, 100)).toBe(6);
    });
});

describe('ResourceSampler', () => {
    let logger: MockLogger;

    beforeEach(() => {
        vi.useFakeTimers({ now: SESSION_START });
        logger = new MockLogger();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('rejects intervals below 100ms or fractional intervals', () => {
        const { fetcher } = scriptedFetcher([reading()]);

        expect(() => new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 99 }, logger)).toThrow(ValidationError);
        expect(() => new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100.5 }, logger)).toThrow(
            ValidationError
        );
        expect(() => new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger)).not.toThrow();
    });

    it('rejects a negative duration', async () => {
        const { fetcher, fetch } = scriptedFetcher([reading()]);
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger);

        await expect(sampler.run({ policy: { kind: 'fixed-duration', durationSeconds: -1 } })).rejects.toBeInstanceOf(
            ValidationError
        );
        expect(fetch).not.toHaveBeenCalled();
    });

    it('takes floor(duration / interval) + 1 samples paced by the interval', async () => {
        const { fetcher, fetch } = scriptedFetcher([
            reading({ energyUsed: 500_000, freeNetUsed: 100 }),
            reading({ energyUsed: 499_000, freeNetUsed: 100 }),
            reading({ energyUsed: 499_000, freeNetUsed: 100 }),
            reading({ energyUsed: 500_500, freeNetUsed: 100 }),
            reading({ energyUsed: 498_000, freeNetUsed: 100 })
        ]);
        const sink = recordingSink();
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 250 }, logger);

        const running = sampler.run({ policy: { kind: 'fixed-duration', durationSeconds: 1 }, sink });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('completed');
        expect(result.error).toBeNull();
        expect(fetch).toHaveBeenCalledTimes(5);
        expect(fetch).toHaveBeenCalledWith(ADDRESS, undefined);
        expect(result.snapshots.map(snapshot => snapshot.elapsedMs)).toEqual([0, 250, 500, 750, 1000]);
        expect(result.snapshots.map(snapshot => snapshot.energyAvailable)).toEqual([
            500_000, 501_000, 501_000, 499_500, 502_000
        ]);
        expect(result.snapshots.map(snapshot => snapshot.deltaEnergy)).toEqual([0, 1000, 0, -1500, 2500]);
        expect(result.snapshots.map(snapshot => snapshot.deltaBandwidth)).toEqual([0, 0, 0, 0, 0]);
        expect(result.snapshots[0].bandwidthAvailable).toBe(500);
        expect(result.startedAt).toEqual(SESSION_START);
        expect(result.endedAt).toEqual(new Date(SESSION_START.getTime() + 1000));
        expect(sink.observations.map(entry => entry.index)).toEqual([0, 1, 2, 3, 4]);
        expect(Object.isFrozen(result.snapshots)).toBe(true);
    });

    it('skips a failed fetch and diffs the next snapshot against the last successful one', async () => {
        const { fetcher } = scriptedFetcher([
            reading({ energyUsed: 500_000 }),
            new FetchError('HTTP 503: Service Unavailable'),
            reading({ energyUsed: 498_000 })
        ]);
        const sink = recordingSink();
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 1000 }, logger);

        const running = sampler.run({ policy: { kind: 'fixed-duration', durationSeconds: 2 }, sink });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('completed');
        expect(result.snapshots).toHaveLength(2);
        expect(result.snapshots.map(snapshot => snapshot.elapsedMs)).toEqual([0, 2000]);
        expect(result.snapshots[1].deltaEnergy).toBe(2000);

        const missed = sink.observations[1];
        expect(missed.index).toBe(1);
        expect(missed.observation.status).toBe('missed');
        if (missed.observation.status === 'missed') {
            expect(missed.observation.elapsedMs).toBe(1000);
            expect(missed.observation.error).toBeInstanceOf(FetchError);
        }
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('stops as soon as both used counters reach zero', async () => {
        const { fetcher, fetch } = scriptedFetcher([
            reading({ energyUsed: 300, freeNetUsed: 20 }),
            reading({ energyUsed: 200, freeNetUsed: 10 }),
            reading({ energyUsed: 0, freeNetUsed: 0 }),
            reading({ energyUsed: 0, freeNetUsed: 0 })
        ]);
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger);

        const running = sampler.run({ policy: { kind: 'until-recovered', maxDurationSeconds: 10 } });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('recovered');
        expect(result.snapshots).toHaveLength(3);
        expect(fetch).toHaveBeenCalledTimes(3);
        expect(result.snapshots[2].deltaEnergy).toBe(200);
    });

    it('stops after a single sample when the account has nothing used', async () => {
        const { fetcher, fetch } = scriptedFetcher([reading({ energyLimit: 0, freeNetLimit: 0 })]);
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger);

        const running = sampler.run({ policy: { kind: 'until-recovered', maxDurationSeconds: 10 } });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('recovered');
        expect(result.snapshots).toHaveLength(1);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('completes an until-recovered run that never recovers after max + 1 attempts', async () => {
        const { fetcher, fetch } = scriptedFetcher([reading({ energyUsed: 10 })]);
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger);

        const running = sampler.run({ policy: { kind: 'until-recovered', maxDurationSeconds: 2 } });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('completed');
        expect(result.snapshots).toHaveLength(3);
        expect(fetch).toHaveBeenCalledTimes(3);
    });

    it('returns the collected snapshots when cancelled between attempts', async () => {
        const { fetcher, fetch } = scriptedFetcher([reading({ energyUsed: 10 })]);
        const controller = new AbortController();
        const sink = {
            onSample: vi.fn((_observation: SampleObservation, index: number) => {
                if (index === 1) {
                    controller.abort();
                }
            })
        };
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 1000 }, logger);

        const running = sampler.run({
            policy: { kind: 'fixed-duration', durationSeconds: 60 },
            signal: controller.signal,
            sink
        });
        await vi.runAllTimersAsync();
        const result = await running;

        expect(result.reason).toBe('cancelled');
        expect(result.error).toBeInstanceOf(SamplingCancelledError);
        expect(result.error?.code).toBe('CANCELLED');
        expect(result.snapshots).toHaveLength(2);
        expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('abandons an in-flight fetch when cancelled', async () => {
        let call = 0;
        const fetch = vi.fn((_address: string, _signal?: AbortSignal): Promise<IResourceReading> => {
            call += 1;
            return call === 1 ? Promise.resolve(reading({ energyUsed: 10 })) : new Promise<IResourceReading>(() => {});
        });
        const controller = new AbortController();
        const sampler = new ResourceSampler({ fetch }, { address: ADDRESS, intervalMs: 100 }, logger);

        const running = sampler.run({
            policy: { kind: 'fixed-duration', durationSeconds: 5 },
            signal: controller.signal
        });
        await vi.advanceTimersByTimeAsync(150);
        expect(fetch).toHaveBeenCalledTimes(2);

        controller.abort();
        const result = await running;

        expect(result.reason).toBe('cancelled');
        expect(result.snapshots).toHaveLength(1);
        expect(fetch).toHaveBeenLastCalledWith(ADDRESS, controller.signal);
    });

    it('does not fetch at all when the signal is already aborted', async () => {
        const { fetcher, fetch } = scriptedFetcher([reading()]);
        const controller = new AbortController();
        controller.abort();
        const sampler = new ResourceSampler(fetcher, { address: ADDRESS, intervalMs: 100 }, logger);

        const result = await sampler.run({
            policy: { kind: 'fixed-duration', durationSeconds: 5 },
            signal: controller.signal
        });

        expect(result.reason).toBe('cancelled');
        expect(result.snapshots).toHaveLength(0);
        expect(fetch).not.toHaveBeenCalled();
    });
});
