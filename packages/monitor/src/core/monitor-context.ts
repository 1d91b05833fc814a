import { DigestSummary, LifecycleEvent, ProbeOutcome } from '@pingwatch/shared';
import { LatencyAnomalyDetector, AnomalyPeriodState } from './anomaly-detector';
import { DigestAggregator } from './digest-aggregator';
import { LatencyBaseline } from './latency-baseline';
import { OutageState, OutageTracker } from './outage-tracker';
import {
  MonitorSettings,
  MonitorSettingsInput,
  TraceFn,
  noopTrace,
  resolveSettings
} from './settings';

export interface MonitorContextOptions {
  target: string;
  settings?: MonitorSettingsInput;
  // normal latencies from an earlier run; implies the host has replied before
  baseline?: readonly number[];
  periodStart?: Date;
  trace?: TraceFn;
}

export interface MonitorSnapshot {
  target: string;
  reachable: boolean;
  outage: Readonly<OutageState>;
  anomaly: Readonly<AnomalyPeriodState>;
  baseline: number[];
  baselineMeanMs?: number;
  cutoffMs?: number;
  pendingDigestEvents: number;
}

/**
 * All health-signal state for one monitored target. Probe outcomes must be
 * fed one at a time; the context itself never blocks and never throws once
 * constructed.
 */
export class MonitorContext {
  readonly target: string;
  readonly settings: MonitorSettings;

  private readonly baseline: LatencyBaseline;
  private readonly outageTracker: OutageTracker;
  private readonly anomalyDetector: LatencyAnomalyDetector;
  private readonly digest: DigestAggregator;

  constructor(options: MonitorContextOptions) {
    const trace = options.trace ?? noopTrace;

    this.target = options.target;
    this.settings = resolveSettings(options.settings);
    this.baseline = new LatencyBaseline(this.settings.baselineWindowSize);
    this.outageTracker = new OutageTracker(this.settings, trace);
    this.anomalyDetector = new LatencyAnomalyDetector(this.baseline, this.settings, trace);
    this.digest = new DigestAggregator(options.periodStart);

    if (options.baseline && options.baseline.length > 0) {
      this.baseline.seed(options.baseline);
      this.outageTracker.markReachable();
    }
  }

  /**
   * Classifies one probe outcome. Outage events come first, then latency
   * events; completed conditions are also recorded for the next digest.
   */
  processProbe(outcome: ProbeOutcome): LifecycleEvent[] {
    const events = this.outageTracker.evaluate(outcome);

    if (outcome.success) {
      events.push(...this.anomalyDetector.evaluate(outcome.timestamp, outcome.latencyMs));
    }

    for (const event of events) {
      this.digest.onCompletedEvent(event);
    }

    return events;
  }

  fireDigest(now: Date): DigestSummary {
    return this.digest.fire(now);
  }

  snapshot(): MonitorSnapshot {
    return {
      target: this.target,
      reachable: this.outageTracker.reachable,
      outage: this.outageTracker.getState(),
      anomaly: this.anomalyDetector.getState(),
      baseline: this.baseline.samples(),
      baselineMeanMs: this.baseline.mean(),
      cutoffMs: this.anomalyDetector.cutoff(),
      pendingDigestEvents: this.digest.pendingCount
    };
  }
}
