import { EventEmitter } from 'events';
import { DigestSummary, ProbeOutcome } from '@pingwatch/shared';
import { MonitorContext, MonitorSettingsInput, MonitorSnapshot } from '../core';
import { logger } from '../utils/logger';
import { DigestWriter } from './digest-writer';
import { EventLogSink } from './event-log';
import { ProbeQueue } from './probe-queue';
import { Prober } from './prober';
import { DigestScheduler, ProbeScheduler } from './scheduler';

export interface PingMonitorOptions {
  target: string;
  settings?: MonitorSettingsInput;
  prober: Prober;
  eventLog: EventLogSink;
  digestWriter: DigestWriter;
  baseline?: readonly number[];
  now?: () => Date;
}

/**
 * Runs one monitored target: probes on a fixed interval, funnels every
 * outcome through a single queue into the monitor context, logs what the
 * context reports and writes a digest at each local midnight.
 *
 * Emits `probe` for every outcome, `event` for every lifecycle event and
 * `digest` for every digest produced.
 */
export class PingMonitor extends EventEmitter {
  private readonly context: MonitorContext;
  private readonly queue: ProbeQueue<ProbeOutcome>;
  private readonly probeScheduler: ProbeScheduler;
  private readonly digestScheduler: DigestScheduler;
  private readonly now: () => Date;

  constructor(private readonly options: PingMonitorOptions) {
    super();
    this.now = options.now ?? (() => new Date());

    this.context = new MonitorContext({
      target: options.target,
      settings: options.settings,
      baseline: options.baseline,
      periodStart: this.now(),
      trace: (message, details) => options.eventLog.recordTrace(message, details)
    });

    this.queue = new ProbeQueue(outcome => this.handleOutcome(outcome));
    this.probeScheduler = new ProbeScheduler(this.context.settings.probeIntervalMs, () => {
      this.runProbe().catch(error => logger.error('Probe run failed', { error }));
    });
    this.digestScheduler = new DigestScheduler(now => this.fireDigest(now), this.now);

    logger.info('Ping monitor initialized', {
      target: options.target,
      settings: this.context.settings
    });
  }

  start(): void {
    this.probeScheduler.start();
    this.digestScheduler.start();
    logger.info('Ping monitor started', { target: this.options.target });
  }

  /**
   * Stops scheduling new probes and digests. Probes already in flight still
   * deliver their outcomes.
   */
  stop(): void {
    this.probeScheduler.stop();
    this.digestScheduler.stop();
    logger.info('Ping monitor stopped', {
      target: this.options.target,
      inFlight: this.queue.pending
    });
  }

  async runProbe(): Promise<void> {
    this.options.eventLog.recordTrace('Running probe', { target: this.options.target });
    await this.queue.submit(() => this.options.prober.probe(this.options.target));
  }

  async fireDigest(now: Date = this.now()): Promise<DigestSummary> {
    const summary = this.context.fireDigest(now);

    try {
      const filePath = await this.options.digestWriter.write(summary);
      logger.info('Digest written', { filePath, outages: summary.outageCount, anomalies: summary.anomalyCount });
    } catch (error) {
      this.options.eventLog.recordError('Digest could not be written', error);
      logger.error('Digest write failed', { error });
    }

    this.emit('digest', summary);
    return summary;
  }

  snapshot(): MonitorSnapshot {
    return this.context.snapshot();
  }

  get running(): boolean {
    return this.probeScheduler.running;
  }

  private handleOutcome(outcome: ProbeOutcome): void {
    this.options.eventLog.recordProbe(outcome);
    const events = this.context.processProbe(outcome);

    this.emit('probe', outcome);
    for (const event of events) {
      this.options.eventLog.recordEvent(event);
      this.emit('event', event);
    }
  }
}
