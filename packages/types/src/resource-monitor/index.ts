export type { IResourceReading } from './IResourceReading.js';
export type { IResourceSnapshot } from './IResourceSnapshot.js';
export type { IResourceFetcher } from './IResourceFetcher.js';
export type { ISampleSink, SampleObservation } from './ISampleSink.js';
export type { ISamplingResult, SamplingPolicy, SamplingStopReason } from './ISamplingResult.js';
export type {
    IResourceAnalysis,
    ITickAnalysis,
    IUsedBasedAnalysis,
    IFormulaValidation,
    IPracticalEstimates,
    RegenerationModel
} from './IResourceAnalysis.js';
export type { ISimulationResult } from './ISimulationResult.js';
