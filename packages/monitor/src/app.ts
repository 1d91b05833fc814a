import { parseArgs } from 'util';
import { MonitorSettingsInput } from './core';
import { DigestWriter } from './services/digest-writer';
import { EventLogSink } from './services/event-log';
import { PingMonitor } from './services/ping-monitor';
import { IcmpProber, Prober } from './services/prober';
import { Config } from './utils/config';
import { EventLoggers } from './utils/logger';

export const USAGE = 'Usage: pingwatch -i <IP ADDRESS or HOSTNAME> [-t]';

export interface CliOptions {
  host?: string;
  trace?: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string', short: 'i' },
      trace: { type: 'boolean', short: 't' }
    },
    strict: true
  });

  return { host: values.host, trace: values.trace };
}

export function toMonitorSettings(config: Config): MonitorSettingsInput {
  return {
    probeIntervalMs: config.PINGWATCH_INTERVAL_MS,
    outageThreshold: config.PINGWATCH_OUTAGE_THRESHOLD,
    anomalyThreshold: config.PINGWATCH_ANOMALY_THRESHOLD,
    baselineWindowSize: config.PINGWATCH_BASELINE_WINDOW,
    cutoffMultiplier: config.PINGWATCH_CUTOFF_MULTIPLIER
  };
}

export interface MonitorDependencies {
  loggers: EventLoggers;
  prober?: Prober;
  now?: () => Date;
}

/**
 * Builds a monitor for `target` from validated configuration. Invalid
 * settings surface here as a ConfigurationError, before anything is started.
 */
export function createMonitor(config: Config, target: string, deps: MonitorDependencies): PingMonitor {
  const prober = deps.prober ?? new IcmpProber({
    binary: config.PINGWATCH_PING_BIN,
    timeoutMs: config.PINGWATCH_TIMEOUT_MS,
    count: config.PINGWATCH_PROBE_COUNT
  });

  return new PingMonitor({
    target,
    settings: toMonitorSettings(config),
    prober,
    eventLog: new EventLogSink(deps.loggers, target),
    digestWriter: new DigestWriter(config.PINGWATCH_DIGEST_DIR),
    now: deps.now
  });
}
