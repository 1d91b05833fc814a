import { describe, it, expect, beforeEach } from '@jest/globals';
import { LifecycleEvent, LifecycleEventType } from '@pingwatch/shared';
import { LatencyAnomalyDetector } from '../../src/core/anomaly-detector';
import { LatencyBaseline } from '../../src/core/latency-baseline';
import { resolveSettings } from '../../src/core/settings';

const INTERVAL = 60_000;
const start = new Date(2026, 9, 17, 12, 0, 0);
const tick = (n: number) => new Date(start.getTime() + n * INTERVAL);

describe('LatencyAnomalyDetector', () => {
  let baseline: LatencyBaseline;
  let detector: LatencyAnomalyDetector;

  const feed = (latencies: number[], from = 1): LifecycleEvent[] =>
    latencies.flatMap((latency, index) => detector.evaluate(tick(from + index), latency));

  beforeEach(() => {
    baseline = new LatencyBaseline(10);
    baseline.seed(Array(10).fill(30));
    detector = new LatencyAnomalyDetector(baseline, resolveSettings({ probeIntervalMs: INTERVAL }));
  });

  it('derives the cutoff from the baseline mean', () => {
    expect(detector.cutoff()).toBe(90);
  });

  it('treats every latency as normal while the baseline is empty', () => {
    const empty = new LatencyBaseline(10);
    const fresh = new LatencyAnomalyDetector(empty, resolveSettings({ probeIntervalMs: INTERVAL }));

    expect(fresh.cutoff()).toBeUndefined();
    expect(fresh.evaluate(tick(1), 5000)).toEqual([]);
    expect(fresh.getState().consecutiveAnomalous).toBe(0);
    expect(empty.samples()).toEqual([5000]);
  });

  it('treats a latency equal to the cutoff as normal', () => {
    expect(feed([90, 90, 90])).toEqual([]);
    expect(detector.getState().consecutiveAnomalous).toBe(0);
  });

  it('absorbs a single high latency surrounded by normal ones', () => {
    const events = feed([30, 500, 30, 30, 30]);

    expect(events).toEqual([]);
    expect(detector.getState()).toEqual({
      active: false,
      consecutiveAnomalous: 0,
      previousWasAnomalous: false
    });
    expect(baseline.samples()).not.toContain(500);
  });

  it('reports one period for three high latencies followed by two normal ones', () => {
    const events = feed([200, 210, 220, 30, 31]);

    expect(events).toEqual([
      { type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: tick(1) },
      { type: LifecycleEventType.ANOMALY_PERIOD_ENDED, time: tick(4), durationMs: 3 * INTERVAL }
    ]);
    expect(baseline.samples()).toEqual([30, 30, 30, 30, 30, 30, 30, 30, 30, 31]);
  });

  it('starts the period on the probe that crosses the threshold', () => {
    expect(feed([200, 200])).toEqual([]);
    expect(detector.evaluate(tick(3), 200)).toEqual([
      { type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: tick(1) }
    ]);
    expect(detector.getState().active).toBe(true);
  });

  it('does not close a period on a single normal latency', () => {
    feed([200, 200, 200]);

    expect(detector.evaluate(tick(4), 30)).toEqual([]);
    expect(detector.getState().active).toBe(true);
    expect(detector.getState().recoveryStart).toEqual(tick(4));
  });

  it('keeps the run going when a high latency follows a single normal one', () => {
    const events = feed([200, 200, 200, 30, 200, 30, 30]);

    expect(events).toEqual([
      { type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: tick(1) },
      { type: LifecycleEventType.ANOMALY_PERIOD_ENDED, time: tick(6), durationMs: 4 * INTERVAL }
    ]);
  });

  it('joins short runs separated by a single normal latency', () => {
    const events = feed([200, 30, 200, 30, 200]);

    expect(events).toEqual([
      { type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: tick(1) }
    ]);
  });

  it('forgets a short run after two normal latencies', () => {
    const events = feed([200, 200, 30, 30, 200, 200]);

    expect(events).toEqual([]);
    expect(detector.getState().consecutiveAnomalous).toBe(2);
    expect(detector.getState().runStart).toEqual(tick(5));
  });

  it('never admits high latencies into the baseline', () => {
    feed([200, 300, 400, 500]);

    expect(baseline.samples()).toEqual(Array(10).fill(30));
    expect(detector.cutoff()).toBe(90);
  });

  it('uses the configured multiplier', () => {
    const loose = new LatencyAnomalyDetector(
      baseline,
      resolveSettings({ probeIntervalMs: INTERVAL, cutoffMultiplier: 10 })
    );

    expect(loose.cutoff()).toBe(300);
    expect(loose.evaluate(tick(1), 250)).toEqual([]);
    expect(loose.getState().consecutiveAnomalous).toBe(0);
  });
});
