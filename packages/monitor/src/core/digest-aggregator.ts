import { format } from 'date-fns';
import {
  DigestEntry,
  DigestSummary,
  LifecycleEvent,
  LifecycleEventType
} from '@pingwatch/shared';

/**
 * Collects completed outages and anomaly periods between two digests.
 * Accumulation lives in memory only; a restart before `fire` loses it.
 */
export class DigestAggregator {
  private outages: DigestEntry[] = [];
  private anomalies: DigestEntry[] = [];

  constructor(private periodStart: Date = new Date()) {}

  onCompletedEvent(event: LifecycleEvent): void {
    switch (event.type) {
      case LifecycleEventType.OUTAGE_ENDED:
        this.outages.push({ endedAt: event.time, durationMs: event.durationMs });
        break;
      case LifecycleEventType.ANOMALY_PERIOD_ENDED:
        this.anomalies.push({ endedAt: event.time, durationMs: event.durationMs });
        break;
      default:
        break;
    }
  }

  fire(now: Date): DigestSummary {
    const summary: DigestSummary = {
      date: format(this.periodStart, 'yyyy-MM-dd'),
      periodStart: this.periodStart,
      periodEnd: now,
      outageCount: this.outages.length,
      outageDetails: this.outages,
      anomalyCount: this.anomalies.length,
      anomalyDetails: this.anomalies
    };

    this.outages = [];
    this.anomalies = [];
    this.periodStart = now;

    return summary;
  }

  get pendingCount(): number {
    return this.outages.length + this.anomalies.length;
  }

  get currentPeriodStart(): Date {
    return this.periodStart;
  }
}
