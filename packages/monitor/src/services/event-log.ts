import { promises as fs } from 'fs';
import path from 'path';
import { format } from 'date-fns';
import {
  FailureKind,
  LifecycleEvent,
  LifecycleEventType,
  ProbeOutcome
} from '@pingwatch/shared';
import { EventLoggers, logger } from '../utils/logger';
import { SinkError } from '../utils/errors';

export const formatClock = (time: Date): string => format(time, 'HH:mm:ss');

export const formatMinutes = (durationMs: number): string => (durationMs / 60_000).toFixed(2);

export function describeEvent(event: LifecycleEvent): string {
  switch (event.type) {
    case LifecycleEventType.OUTAGE_STARTED:
      return `Lost contact since ${formatClock(event.time)}`;
    case LifecycleEventType.OUTAGE_ENDED:
      return `Connection restored at ${formatClock(event.time)}. Total outage duration ${formatMinutes(event.durationMs)} minutes`;
    case LifecycleEventType.ANOMALY_PERIOD_STARTED:
      return `Period of high latency started at ${formatClock(event.time)}`;
    case LifecycleEventType.ANOMALY_PERIOD_ENDED:
      return `Period of high latency finished at ${formatClock(event.time)}. Duration ${formatMinutes(event.durationMs)} minutes`;
  }
}

export function describeProbe(target: string, outcome: ProbeOutcome): string {
  if (outcome.success) {
    const { reply } = outcome;
    if (!reply) {
      return `Reply from ${target}: time=${outcome.latencyMs}ms`;
    }

    const fields = [
      reply.bytes !== undefined ? `bytes=${reply.bytes}` : undefined,
      reply.sequence !== undefined ? `icmp_seq=${reply.sequence}` : undefined,
      reply.ttl !== undefined ? `ttl=${reply.ttl}` : undefined,
      `time=${outcome.latencyMs}ms`
    ].filter((field): field is string => field !== undefined);
    return `Reply from ${reply.from}: ${fields.join(' ')}`;
  }

  switch (outcome.failureKind) {
    case FailureKind.TIMEOUT:
      return 'Timeout - missed reply';
    case FailureKind.UNRESOLVABLE:
      return `Unable to resolve ${target}`;
    case FailureKind.OTHER:
      return `Probe failed: ${outcome.message ?? 'unknown error'}`;
  }
}

/**
 * Renders probe results and lifecycle events as tagged event log lines.
 * Replies go under PING; misses, outages and latency periods under OUTAGE.
 */
export class EventLogSink {
  constructor(
    private readonly loggers: EventLoggers,
    private readonly target: string
  ) {}

  recordProbe(outcome: ProbeOutcome): void {
    const category = outcome.success ? 'PING' : 'OUTAGE';
    this.write(category, describeProbe(this.target, outcome));
  }

  recordEvent(event: LifecycleEvent): void {
    this.write('OUTAGE', describeEvent(event));
  }

  recordTrace(message: string, details?: Record<string, unknown>): void {
    this.write('TRACE', message, details);
  }

  recordError(message: string, error?: unknown): void {
    const reason = error instanceof Error ? `: ${error.message}` : '';
    this.write('ERROR', `${message}${reason}`);
  }

  private write(category: keyof EventLoggers, message: string, details?: Record<string, unknown>): void {
    try {
      this.loggers[category].log(message, details);
    } catch (error) {
      logger.error('Event log sink failed', { category, error });
    }
  }
}

/**
 * Makes sure the event log file can be opened for appending. Called once at
 * startup; a failure here should end the process before any probing.
 */
export async function assertLogFileWritable(logFile: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(logFile), { recursive: true });
    await fs.appendFile(logFile, '');
  } catch (error) {
    throw new SinkError(`Cannot open event log ${logFile}`, 'event-log', error);
  }
}
