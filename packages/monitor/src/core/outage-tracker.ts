import { LifecycleEvent, LifecycleEventType, ProbeOutcome } from '@pingwatch/shared';
import { MonitorSettings, TraceFn, noopTrace } from './settings';

export interface OutageState {
  active: boolean;
  consecutiveMisses: number;
  startTime?: Date;
  durationMs: number;
}

type OutageTrackerSettings = Pick<MonitorSettings, 'probeIntervalMs' | 'outageThreshold' | 'requireInitialSuccess'>;

const inactiveState = (): OutageState => ({
  active: false,
  consecutiveMisses: 0,
  durationMs: 0
});

/**
 * Counts consecutive missed probes and reports an outage once the run
 * reaches the threshold. Timeouts, unresolvable hosts and other failures all
 * count as a miss. Durations are `misses x probe interval`.
 */
export class OutageTracker {
  private state: OutageState = inactiveState();
  private runStart?: Date;
  private hasSucceeded: boolean;

  constructor(
    private readonly settings: OutageTrackerSettings,
    private readonly trace: TraceFn = noopTrace
  ) {
    this.hasSucceeded = !settings.requireInitialSuccess;
  }

  evaluate(outcome: ProbeOutcome): LifecycleEvent[] {
    return outcome.success ? this.onReply(outcome.timestamp) : this.onMiss(outcome.timestamp);
  }

  /**
   * Records that the host has answered before, e.g. when a monitor resumes
   * with a previously captured baseline.
   */
  markReachable(): void {
    this.hasSucceeded = true;
  }

  getState(): Readonly<OutageState> {
    return { ...this.state };
  }

  get reachable(): boolean {
    return this.hasSucceeded;
  }

  private onMiss(timestamp: Date): LifecycleEvent[] {
    if (this.state.consecutiveMisses === 0) {
      this.runStart = timestamp;
    }
    this.state.consecutiveMisses++;
    this.trace('Missed probe', { consecutiveMisses: this.state.consecutiveMisses });

    if (this.state.active) {
      this.state.durationMs = this.runDuration();
      this.trace('Outage continuing', { durationMs: this.state.durationMs });
      return [];
    }

    if (!this.hasSucceeded) {
      this.trace('Host has never replied, outage not reported');
      return [];
    }

    if (this.state.consecutiveMisses < this.settings.outageThreshold) {
      return [];
    }

    const startTime = this.runStart ?? timestamp;
    this.state.active = true;
    this.state.startTime = startTime;
    this.state.durationMs = this.runDuration();
    this.trace('Outage started', { startTime: startTime.toISOString() });

    return [{ type: LifecycleEventType.OUTAGE_STARTED, time: startTime }];
  }

  private onReply(timestamp: Date): LifecycleEvent[] {
    this.hasSucceeded = true;
    this.runStart = undefined;

    if (!this.state.active) {
      if (this.state.consecutiveMisses > 0) {
        this.trace('Reply received, resetting missed probes', {
          consecutiveMisses: this.state.consecutiveMisses
        });
      }
      this.state.consecutiveMisses = 0;
      return [];
    }

    const durationMs = this.runDuration();
    this.state = inactiveState();
    this.trace('Outage ended', { durationMs });

    return [{ type: LifecycleEventType.OUTAGE_ENDED, time: timestamp, durationMs }];
  }

  private runDuration(): number {
    return this.state.consecutiveMisses * this.settings.probeIntervalMs;
  }
}
