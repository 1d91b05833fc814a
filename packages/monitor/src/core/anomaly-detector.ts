import { LifecycleEvent, LifecycleEventType } from '@pingwatch/shared';
import { LatencyBaseline } from './latency-baseline';
import { MonitorSettings, TraceFn, noopTrace } from './settings';

export interface AnomalyPeriodState {
  active: boolean;
  consecutiveAnomalous: number;
  runStart?: Date;
  lastAnomalousTime?: Date;
  previousWasAnomalous: boolean;
  // first normal reply after the latest anomalous one
  recoveryStart?: Date;
}

type AnomalyDetectorSettings = Pick<MonitorSettings, 'probeIntervalMs' | 'anomalyThreshold' | 'cutoffMultiplier'>;

const idleState = (): AnomalyPeriodState => ({
  active: false,
  consecutiveAnomalous: 0,
  previousWasAnomalous: false
});

/**
 * Classifies each reply's round-trip time against the baseline. A reply is
 * anomalous when it exceeds `mean x cutoffMultiplier`; anomalous latencies
 * never enter the baseline.
 *
 * A period opens once the run of anomalous replies reaches the threshold and
 * closes on the second consecutive normal reply. One normal reply inside a run
 * is tolerated and does not break it.
 */
export class LatencyAnomalyDetector {
  private state: AnomalyPeriodState = idleState();

  constructor(
    private readonly baseline: LatencyBaseline,
    private readonly settings: AnomalyDetectorSettings,
    private readonly trace: TraceFn = noopTrace
  ) {}

  /**
   * Current cutoff in milliseconds, or `undefined` while the baseline is empty.
   */
  cutoff(): number | undefined {
    const mean = this.baseline.mean();
    return mean === undefined ? undefined : mean * this.settings.cutoffMultiplier;
  }

  evaluate(timestamp: Date, latencyMs: number): LifecycleEvent[] {
    const cutoff = this.cutoff();
    this.trace('Evaluating latency', {
      latencyMs,
      meanMs: this.baseline.mean(),
      cutoffMs: cutoff
    });

    if (cutoff !== undefined && cutoff > 0 && latencyMs > cutoff) {
      return this.onAnomalous(timestamp, latencyMs);
    }
    return this.onNormal(timestamp, latencyMs);
  }

  getState(): Readonly<AnomalyPeriodState> {
    return { ...this.state };
  }

  private onAnomalous(timestamp: Date, latencyMs: number): LifecycleEvent[] {
    if (this.state.consecutiveAnomalous === 0) {
      this.state.runStart = timestamp;
    }
    this.state.consecutiveAnomalous++;
    this.state.lastAnomalousTime = timestamp;
    this.state.previousWasAnomalous = true;
    this.state.recoveryStart = undefined;
    this.trace('High latency', {
      latencyMs,
      consecutiveAnomalous: this.state.consecutiveAnomalous
    });

    if (this.state.active || this.state.consecutiveAnomalous < this.settings.anomalyThreshold) {
      return [];
    }

    const time = this.state.runStart ?? timestamp;
    this.state.active = true;
    this.trace('High latency period started', { runStart: time.toISOString() });

    return [{ type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time }];
  }

  private onNormal(timestamp: Date, latencyMs: number): LifecycleEvent[] {
    this.baseline.admit(latencyMs);

    if (this.state.previousWasAnomalous) {
      this.state.previousWasAnomalous = false;
      this.state.recoveryStart = timestamp;
      this.trace('Normal latency after a high one, waiting for a second', { latencyMs });
      return [];
    }

    if (this.state.consecutiveAnomalous === 0) {
      return [];
    }

    const events: LifecycleEvent[] = [];
    if (this.state.active) {
      const durationMs = this.state.consecutiveAnomalous * this.settings.probeIntervalMs;
      events.push({
        type: LifecycleEventType.ANOMALY_PERIOD_ENDED,
        time: this.state.recoveryStart ?? timestamp,
        durationMs
      });
      this.trace('High latency period ended', { durationMs });
    } else {
      this.trace('Short high latency run absorbed', {
        consecutiveAnomalous: this.state.consecutiveAnomalous
      });
    }

    this.state = idleState();
    return events;
  }
}
