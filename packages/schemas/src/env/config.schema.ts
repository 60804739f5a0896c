import { z } from 'zod';

const positiveIntFromEnv = z
  .string()
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().int().positive());

/**
 * Environment configuration schema
 * Validated once by the entry point; components receive the parsed values.
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  // Klines endpoint
  BINANCE_BASE_URL: z.string().url('Invalid BINANCE_BASE_URL').default('https://data-api.binance.vision'),
  BINANCE_CONNECT_TIMEOUT_MS: positiveIntFromEnv.default('3000'),
  BINANCE_READ_TIMEOUT_MS: positiveIntFromEnv.default('10000'),

  // Logging
  LOG_DIR: z.string().min(1).default('logs'),
  LOG_FILE_ENABLED: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
