import { addDays, startOfDay } from 'date-fns';
import { logger } from '../utils/logger';

export function nextMidnightAfter(now: Date): Date {
  return startOfDay(addDays(now, 1));
}

export function msUntilNextMidnight(now: Date): number {
  return nextMidnightAfter(now).getTime() - now.getTime();
}

/**
 * Fires `tick` once per interval. Ticks are fire-and-forget: the scheduler
 * never waits for the work a tick starts.
 */
export class ProbeScheduler {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly intervalMs: number,
    private readonly tick: () => void,
    private readonly options: { immediate?: boolean } = {}
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.runTick(), this.intervalMs);
    logger.debug('Probe scheduler started', { intervalMs: this.intervalMs });

    if (this.options.immediate ?? true) {
      this.runTick();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      logger.debug('Probe scheduler stopped');
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  private runTick(): void {
    try {
      this.tick();
    } catch (error) {
      logger.error('Probe tick failed', { error });
    }
  }
}

/**
 * Fires `onMidnight` at every local midnight, passing the midnight it fired
 * for. Each target is the day after the previous one, so a timer that wakes a
 * little early against the wall clock cannot fire twice for the same day.
 */
export class DigestScheduler {
  private timer?: NodeJS.Timeout;
  private active = false;

  constructor(
    private readonly onMidnight: (midnight: Date) => Promise<unknown>,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.scheduleNext(nextMidnightAfter(this.now()));
  }

  stop(): void {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  get running(): boolean {
    return this.active;
  }

  private scheduleNext(midnight: Date): void {
    const delayMs = Math.max(0, midnight.getTime() - this.now().getTime());
    logger.debug('Next digest scheduled', { midnight, delayMs });

    this.timer = setTimeout(() => {
      void this.onMidnight(midnight)
        .catch(error => logger.error('Digest run failed', { error }))
        .finally(() => {
          if (this.active) {
            this.scheduleNext(this.following(midnight));
          }
        });
    }, delayMs);
  }

  private following(midnight: Date): Date {
    const next = addDays(midnight, 1);
    const now = this.now();
    // the clock jumped past the next midnight; skip to the one after now
    return next.getTime() > now.getTime() ? next : nextMidnightAfter(now);
  }
}
