import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { FailureKind, LifecycleEventType, probeFailed, probeSucceeded } from '@pingwatch/shared';
import {
  EventLogSink,
  assertLogFileWritable,
  describeEvent,
  describeProbe
} from '../../src/services/event-log';
import { SinkError } from '../../src/utils/errors';
import { EventCategory, EventLoggers } from '../../src/utils/logger';

function recordingLoggers() {
  const lines: Array<[EventCategory, string]> = [];
  const forCategory = (category: EventCategory) => ({
    log: (message: string) => {
      lines.push([category, message]);
    }
  });
  const loggers: EventLoggers = {
    PING: forCategory('PING'),
    OUTAGE: forCategory('OUTAGE'),
    ERROR: forCategory('ERROR'),
    TRACE: forCategory('TRACE')
  };
  return { lines, loggers };
}

const at = (hours: number, minutes: number) => new Date(2026, 9, 17, hours, minutes, 0);

describe('describeEvent', () => {
  it('renders every lifecycle event', () => {
    expect(describeEvent({ type: LifecycleEventType.OUTAGE_STARTED, time: at(10, 1) }))
      .toBe('Lost contact since 10:01:00');
    expect(describeEvent({ type: LifecycleEventType.OUTAGE_ENDED, time: at(10, 4), durationMs: 180_000 }))
      .toBe('Connection restored at 10:04:00. Total outage duration 3.00 minutes');
    expect(describeEvent({ type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: at(15, 0) }))
      .toBe('Period of high latency started at 15:00:00');
    expect(describeEvent({ type: LifecycleEventType.ANOMALY_PERIOD_ENDED, time: at(15, 5), durationMs: 90_000 }))
      .toBe('Period of high latency finished at 15:05:00. Duration 1.50 minutes');
  });
});

describe('describeProbe', () => {
  it('renders replies and each kind of failure', () => {
    expect(describeProbe('example.test', probeSucceeded(at(10, 0), 31.4)))
      .toBe('Reply from example.test: time=31.4ms');
    expect(describeProbe('example.test', probeSucceeded(at(10, 0), 31.4, { from: '192.0.2.10', bytes: 64, sequence: 7, ttl: 57 })))
      .toBe('Reply from 192.0.2.10: bytes=64 icmp_seq=7 ttl=57 time=31.4ms');
    expect(describeProbe('example.test', probeSucceeded(at(10, 0), 12, { from: '2001:db8::1' })))
      .toBe('Reply from 2001:db8::1: time=12ms');
    expect(describeProbe('example.test', probeFailed(at(10, 0), FailureKind.TIMEOUT)))
      .toBe('Timeout - missed reply');
    expect(describeProbe('example.test', probeFailed(at(10, 0), FailureKind.UNRESOLVABLE)))
      .toBe('Unable to resolve example.test');
    expect(describeProbe('example.test', probeFailed(at(10, 0), FailureKind.OTHER, 'EPERM')))
      .toBe('Probe failed: EPERM');
    expect(describeProbe('example.test', probeFailed(at(10, 0), FailureKind.OTHER)))
      .toBe('Probe failed: unknown error');
  });
});

describe('EventLogSink', () => {
  it('tags replies as PING and misses as OUTAGE', () => {
    const { lines, loggers } = recordingLoggers();
    const sink = new EventLogSink(loggers, 'example.test');

    sink.recordProbe(probeSucceeded(at(10, 0), 28));
    sink.recordProbe(probeFailed(at(10, 1), FailureKind.TIMEOUT));

    expect(lines).toEqual([
      ['PING', 'Reply from example.test: time=28ms'],
      ['OUTAGE', 'Timeout - missed reply']
    ]);
  });

  it('writes lifecycle events under OUTAGE', () => {
    const { lines, loggers } = recordingLoggers();
    const sink = new EventLogSink(loggers, 'example.test');

    sink.recordEvent({ type: LifecycleEventType.ANOMALY_PERIOD_STARTED, time: at(15, 0) });

    expect(lines).toEqual([['OUTAGE', 'Period of high latency started at 15:00:00']]);
  });

  it('writes traces and errors under their own tags', () => {
    const { lines, loggers } = recordingLoggers();
    const sink = new EventLogSink(loggers, 'example.test');

    sink.recordTrace('Evaluating latency', { latencyMs: 30 });
    sink.recordError('Digest could not be written', new Error('disk full'));

    expect(lines).toEqual([
      ['TRACE', 'Evaluating latency'],
      ['ERROR', 'Digest could not be written: disk full']
    ]);
  });

  it('does not throw when a logger fails', () => {
    const { loggers } = recordingLoggers();
    const sink = new EventLogSink(
      {
        ...loggers,
        PING: {
          log: () => {
            throw new Error('stream closed');
          }
        }
      },
      'example.test'
    );

    expect(() => sink.recordProbe(probeSucceeded(at(10, 0), 28))).not.toThrow();
  });
});

describe('assertLogFileWritable', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'pingwatch-log-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('creates the log file and its directory', async () => {
    const logFile = path.join(directory, 'nested', 'pingwatch.log');

    await assertLogFileWritable(logFile);

    expect((await fs.stat(logFile)).isFile()).toBe(true);
  });

  it('fails when the log directory cannot be created', async () => {
    const blocker = path.join(directory, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    await expect(assertLogFileWritable(path.join(blocker, 'pingwatch.log'))).rejects.toBeInstanceOf(SinkError);
  });
});
