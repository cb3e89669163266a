export type { IMonitorReport, IReportMetadata } from './IMonitorReport.js';
