import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { IMonitorReport } from '@resource-monitor/types';
import { ReportError } from '../../lib/errors.js';
import { toReportDocument } from './report-mapper.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Shorten an address to its first and last four characters */
export function shortenAddress(address: string): string {
  return address.length > 8 ? `${address.slice(0, 4)}...${address.slice(-4)}` : address;
}

/**
 * Report file name, e.g. `tron_monitor_TXYZ...abcd_20250101_120000.json`.
 * The timestamp is the session start in UTC.
 */
export function generateReportFilename(address: string, startTime: Date): string {
  const date = `${startTime.getUTCFullYear()}${pad(startTime.getUTCMonth() + 1)}${pad(startTime.getUTCDate())}`;
  const time = `${pad(startTime.getUTCHours())}${pad(startTime.getUTCMinutes())}${pad(startTime.getUTCSeconds())}`;
  return `tron_monitor_${shortenAddress(address)}_${date}_${time}.json`;
}

/**
 * Writes reports as pretty-printed JSON into a single directory.
 */
export class ReportWriter {
  constructor(private readonly directory: string) {}

  /**
   * @returns Path of the written file
   * @throws ReportError when the directory or file cannot be written
   */
  async write(report: IMonitorReport): Promise<string> {
    const filename = path.join(
      this.directory,
      generateReportFilename(report.metadata.address, report.metadata.startTime)
    );
    const contents = `${JSON.stringify(toReportDocument(report), null, 2)}\n`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(filename, contents, 'utf8');
    } catch (error) {
      throw new ReportError(`Failed to write report ${filename}: ${error instanceof Error ? error.message : String(error)}`, {
        filename
      });
    }

    return filename;
  }
}
