import type { IResourceAnalysis } from '../resource-monitor/IResourceAnalysis.js';
import type { IResourceSnapshot } from '../resource-monitor/IResourceSnapshot.js';

/** Describes the sampling session a report was produced from */
export interface IReportMetadata {
    readonly address: string;
    readonly node: string;
    readonly startTime: Date;
    readonly endTime: Date;
    /** Whole seconds actually covered by the snapshots, never below 1 */
    readonly durationSeconds: number;
    readonly samplesCount: number;
    readonly intervalMs: number;
}

/**
 * Complete record of a sampling session, exported as a single JSON file.
 */
export interface IMonitorReport {
    readonly metadata: IReportMetadata;
    readonly snapshots: readonly IResourceSnapshot[];
    readonly analysis: IResourceAnalysis;
}
