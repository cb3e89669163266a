export { ResourceSampler, countAttempts, MIN_INTERVAL_MS } from './sampler.js';
export type { ResourceSamplerOptions, SamplingRunOptions, SamplerResult } from './sampler.js';
export { buildSnapshot, isFullyRecovered, totalBandwidthLimit, totalBandwidthUsed } from './snapshot-builder.js';
export { analyzeTicks } from './tick-analyzer.js';
export { analyzeRates, analyzeUsedBased, validateFormulas, matchesWithin } from './rate-analyzer.js';
export type { RateAnalysis } from './rate-analyzer.js';
export { estimateCapacity, simulateTransactions } from './capacity-projector.js';
export { analyzeSnapshots, createEmptyAnalysis } from './analysis.js';
export { runMonitorSession } from './monitor-session.js';
export type { MonitorSessionOptions, MonitorSessionDependencies, MonitorSessionOutcome } from './monitor-session.js';
