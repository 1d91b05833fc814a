import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from './errors';

// Load environment variables from the package root
dotenv.config({ path: path.join(__dirname, '../../.env.local') });
dotenv.config({ path: path.join(__dirname, '../../.env') });

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),

  // Logging Configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).default('info'),
  PINGWATCH_LOG_FILE: z.string().min(1).default('logs/pingwatch.log'),
  PINGWATCH_DIGEST_DIR: z.string().min(1).default('logs'),
  PINGWATCH_TRACE: booleanFlag.default('false'),

  // Probe Configuration
  PINGWATCH_TARGET: z.string().min(1).optional(),
  PINGWATCH_PING_BIN: z.string().min(1).default('ping'),
  PINGWATCH_INTERVAL_MS: positiveInt('60000'),
  PINGWATCH_TIMEOUT_MS: positiveInt('30000'),
  PINGWATCH_PROBE_COUNT: positiveInt('1'),

  // Health Signal Configuration
  PINGWATCH_OUTAGE_THRESHOLD: positiveInt('3'),
  PINGWATCH_ANOMALY_THRESHOLD: positiveInt('3'),
  PINGWATCH_BASELINE_WINDOW: positiveInt('10'),
  PINGWATCH_CUTOFF_MULTIPLIER: z.string().default('3').transform(Number).pipe(z.number().positive()),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | undefined;

export const getConfig = (): Config => {
  if (!config) {
    const result = ConfigSchema.safeParse(process.env);

    if (!result.success) {
      console.error('pingwatch configuration validation failed:', result.error.format());
      throw new ConfigurationError(
        'Invalid pingwatch configuration',
        result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    config = result.data;
  }

  return config;
};

// Drops the cached configuration so the next getConfig() re-reads process.env
export const resetConfig = (): void => {
  config = undefined;
};

export const isDevelopment = () => getConfig().NODE_ENV === 'development';
export const isProduction = () => getConfig().NODE_ENV === 'production';
export const isTest = () => getConfig().NODE_ENV === 'test';
