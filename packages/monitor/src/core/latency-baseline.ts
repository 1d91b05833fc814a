import { ConfigurationError } from '../utils/errors';

/**
 * Rolling window of recent normal round-trip times (milliseconds), oldest
 * evicted first. Only latencies already classified as normal belong here.
 */
export class LatencyBaseline {
  private readonly window: number[] = [];

  constructor(private readonly capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError('Invalid baseline window', [`capacity: ${capacity}`]);
    }
  }

  admit(latencyMs: number): void {
    this.window.push(latencyMs);
    if (this.window.length > this.capacity) {
      this.window.splice(0, this.window.length - this.capacity);
    }
  }

  seed(samples: readonly number[]): void {
    for (const sample of samples) {
      this.admit(sample);
    }
  }

  /**
   * Arithmetic mean of the window, or `undefined` while it is empty. An
   * undefined mean means there is no cutoff yet.
   */
  mean(): number | undefined {
    if (this.window.length === 0) {
      return undefined;
    }
    return this.window.reduce((total, value) => total + value, 0) / this.window.length;
  }

  get size(): number {
    return this.window.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  samples(): number[] {
    return [...this.window];
  }
}
