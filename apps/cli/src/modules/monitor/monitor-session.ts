import type {
    ILogger,
    IMonitorReport,
    IResourceAnalysis,
    IResourceFetcher,
    IResourceSnapshot,
    ISimulationResult,
    SamplingPolicy,
    SamplingStopReason
} from '@resource-monitor/types';
import type { ConsoleReporter } from '../report/console-reporter.js';
import { compareWithPrevious, type IReportComparison } from '../report/report-compare.js';
import { buildReport } from '../report/report-mapper.js';
import { analyzeSnapshots } from './analysis.js';
import { simulateTransactions } from './capacity-projector.js';
import { ResourceSampler } from './sampler.js';

/** Conventional exit status of a process stopped by SIGINT */
export const EXIT_CODE_INTERRUPTED = 130;

export interface MonitorSessionOptions {
    address: string;
    node: string;
    intervalMs: number;
    policy: SamplingPolicy;
    /** Run the 24-hour projection on the last snapshot */
    simulation?: { txCost: number; targetTx: number } | null;
    /** Previous report to compare the headline rates with */
    compareFile?: string | null;
}

export interface MonitorSessionDependencies {
    fetcher: IResourceFetcher;
    logger: ILogger;
    reporter: ConsoleReporter;
    reportWriter: { write(report: IMonitorReport): Promise<string> };
    /** Aborted on SIGINT/SIGTERM */
    signal?: AbortSignal;
}

export interface MonitorSessionOutcome {
    reason: SamplingStopReason;
    snapshots: readonly IResourceSnapshot[];
    /** null when no snapshot was collected */
    analysis: IResourceAnalysis | null;
    reportPath: string | null;
    simulation: ISimulationResult | null;
    comparison: IReportComparison | null;
    exitCode: number;
}

/**
 * Run one monitoring session end to end: sample, analyze, save the report and
 * print the summary, then the optional simulation and comparison.
 *
 * An interrupted session still analyzes and saves whatever it collected. A
 * failed save or comparison is logged as a warning; neither changes the exit
 * code.
 */
export async function runMonitorSession(
    options: MonitorSessionOptions,
    { fetcher, logger, reporter, reportWriter, signal }: MonitorSessionDependencies
): Promise<MonitorSessionOutcome> {
    const log = logger.child({ module: 'monitor-session' });
    const sampler = new ResourceSampler(fetcher, { address: options.address, intervalMs: options.intervalMs }, logger);

    const startTime = new Date();
    reporter.printHeader({
        address: options.address,
        node: options.node,
        policy: options.policy,
        intervalMs: options.intervalMs,
        startTime
    });

    const result = await sampler.run({ policy: options.policy, signal, sink: reporter });
    const endTime = new Date();

    if (result.reason === 'cancelled') {
        reporter.printInterrupted();
    }

    const outcome: MonitorSessionOutcome = {
        reason: result.reason,
        snapshots: result.snapshots,
        analysis: null,
        reportPath: null,
        simulation: null,
        comparison: null,
        exitCode: result.reason === 'cancelled' ? EXIT_CODE_INTERRUPTED : 0
    };

    if (result.snapshots.length === 0) {
        log.warn({ reason: result.reason }, 'No snapshots collected - nothing to analyze');
        return outcome;
    }

    const analysis = analyzeSnapshots(result.snapshots);
    outcome.analysis = analysis;

    const report = buildReport({
        address: options.address,
        node: options.node,
        startTime,
        endTime,
        intervalMs: options.intervalMs,
        snapshots: result.snapshots,
        analysis
    });

    try {
        outcome.reportPath = await reportWriter.write(report);
    } catch (error) {
        log.warn({ error }, 'Failed to save report');
    }

    reporter.printSummary(analysis, outcome.reportPath);

    if (options.simulation) {
        const last = result.snapshots[result.snapshots.length - 1];
        outcome.simulation = simulateTransactions(
            last,
            analysis,
            options.simulation.txCost,
            options.simulation.targetTx
        );
        reporter.printSimulation(outcome.simulation);
    }

    if (options.compareFile) {
        try {
            outcome.comparison = await compareWithPrevious(options.compareFile, analysis);
            reporter.printComparison(outcome.comparison);
        } catch (error) {
            log.warn({ error, file: options.compareFile }, 'Failed to compare with previous report');
        }
    }

    log.info(
        { reason: result.reason, snapshots: result.snapshots.length, reportPath: outcome.reportPath },
        'Monitoring session finished'
    );
    return outcome;
}
