import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_PROBE_INTERVAL_MS = 60_000;

export const MonitorSettingsSchema = z.object({
  probeIntervalMs: z.number().int().positive().default(DEFAULT_PROBE_INTERVAL_MS),
  // consecutive misses that open an outage
  outageThreshold: z.number().int().positive().default(3),
  // consecutive high-latency replies that open an anomaly period
  anomalyThreshold: z.number().int().positive().default(3),
  baselineWindowSize: z.number().int().positive().default(10),
  cutoffMultiplier: z.number().positive().finite().default(3),
  // no outage is reported until the host has answered at least once
  requireInitialSuccess: z.boolean().default(true),
});

export type MonitorSettings = z.infer<typeof MonitorSettingsSchema>;
export type MonitorSettingsInput = z.input<typeof MonitorSettingsSchema>;

export const resolveSettings = (input: MonitorSettingsInput = {}): MonitorSettings => {
  const result = MonitorSettingsSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigurationError(
      'Invalid monitor settings',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
};

export type TraceFn = (message: string, details?: Record<string, unknown>) => void;

export const noopTrace: TraceFn = () => undefined;
