export { ConsoleReporter } from './console-reporter.js';
export type { ITextOutput, SessionHeader } from './console-reporter.js';
export { buildReport, toReportDocument, toAnalysisDocument, toSnapshotDocument } from './report-mapper.js';
export type { BuildReportInput } from './report-mapper.js';
export { ReportWriter, generateReportFilename, shortenAddress } from './report-writer.js';
export { compareWithPrevious, compareAnalyses, PreviousReportSchema } from './report-compare.js';
export type { IReportComparison, IMetricComparison, PreviousReport } from './report-compare.js';
export type { IMonitorReportDocument } from './report-document.js';
export { formatNumber, formatDelta, formatRate } from './format.js';
