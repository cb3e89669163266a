import { env } from './env.js';

export const monitorConfig = {
  node: env.TRON_NODE_URL,
  reportDir: env.REPORT_DIR,
  defaults: {
    durationSeconds: 20,
    intervalMs: 1000,
    maxDurationSeconds: 86_400,
    txCost: 65_000,
    targetTx: 800
  },
  limits: {
    minIntervalMs: 100
  },
  request: {
    timeoutMs: env.MONITOR_REQUEST_TIMEOUT_MS,
    apiKey: env.TRONGRID_API_KEY
  },
  retry: {
    retries: env.MONITOR_FETCH_RETRIES,
    delayMs: env.MONITOR_FETCH_RETRY_DELAY_MS,
    factor: env.MONITOR_FETCH_RETRY_FACTOR
  }
};

export type MonitorConfig = typeof monitorConfig;
