#!/usr/bin/env node
import { formatUsage, parseCliArgs, type CliCommand } from './config/cli-options.js';
import { monitorConfig } from './config/monitor.js';
import { ValidationError } from './lib/errors.js';
import { createHttpClient } from './lib/http-client.js';
import { createLogger, PinoLogger } from './lib/logger.js';
import { TronGridClient } from './modules/blockchain/tron-grid.client.js';
import { runMonitorSession } from './modules/monitor/index.js';
import { ConsoleReporter, ReportWriter } from './modules/report/index.js';

const PROGRAM = 'tron-resource-monitor';
const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2), monitorConfig);
  } catch (error) {
    if (error instanceof ValidationError) {
      process.stderr.write(`Error: ${error.message}\n\n${formatUsage(PROGRAM, monitorConfig)}`);
      return 1;
    }
    throw error;
  }

  if (command.kind === 'help') {
    process.stdout.write(formatUsage(PROGRAM, monitorConfig));
    return 0;
  }

  const { options } = command;
  const logger = new PinoLogger(createLogger());

  const http = createHttpClient(monitorConfig.request);
  const fetcher = new TronGridClient(http, logger, { nodeUrl: options.node, retry: monitorConfig.retry });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.debug({ signal }, 'Shutdown signal received');
    controller.abort();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    const outcome = await runMonitorSession(
      {
        address: options.address,
        node: fetcher.getNodeUrl(),
        intervalMs: options.intervalMs,
        policy: options.policy,
        simulation: options.simulation,
        compareFile: options.compareFile
      },
      {
        fetcher,
        logger,
        reporter: new ConsoleReporter(process.stdout),
        reportWriter: new ReportWriter(monitorConfig.reportDir),
        signal: controller.signal
      }
    );
    return outcome.exitCode;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    console.error('Monitoring failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
