import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  // Optional second log destination, in addition to pretty output on stderr
  LOG_FILE: z.string().min(1).optional(),
  TRON_NODE_URL: z.string().url().default('https://api.trongrid.io'),
  TRONGRID_API_KEY: z.string().optional(),
  REPORT_DIR: z.string().min(1).default('.'),
  MONITOR_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MONITOR_FETCH_RETRIES: z.coerce.number().int().nonnegative().default(2),
  MONITOR_FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
  MONITOR_FETCH_RETRY_FACTOR: z.coerce.number().positive().default(2)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
