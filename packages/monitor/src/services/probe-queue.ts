import { logger } from '../utils/logger';

export type QueueConsumer<T> = (item: T) => void;

/**
 * Single-consumer channel for probe outcomes. Probes may finish in any order;
 * each one takes a ticket when it is sent and its outcome is handed to the
 * consumer only after every earlier ticket has been delivered or abandoned,
 * so the consumer sees outcomes one at a time, in send order.
 */
export class ProbeQueue<T> {
  private nextTicket = 0;
  private nextDelivery = 0;
  private readonly ready = new Map<number, { item: T } | { abandoned: true }>();
  private delivered = 0;

  constructor(private readonly consumer: QueueConsumer<T>) {}

  /**
   * Runs `task` and queues its result under a ticket taken now. A task that
   * rejects gives up its ticket and does not hold back later outcomes.
   */
  async submit(task: () => Promise<T>): Promise<void> {
    const ticket = this.nextTicket++;

    try {
      const item = await task();
      this.ready.set(ticket, { item });
    } catch (error) {
      logger.error('Probe task failed, dropping its outcome', { ticket, error });
      this.ready.set(ticket, { abandoned: true });
    }

    this.drain();
  }

  get pending(): number {
    return this.nextTicket - this.nextDelivery;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  private drain(): void {
    let entry = this.ready.get(this.nextDelivery);

    while (entry) {
      this.ready.delete(this.nextDelivery);
      this.nextDelivery++;

      if ('item' in entry) {
        try {
          this.consumer(entry.item);
          this.delivered++;
        } catch (error) {
          logger.error('Probe outcome consumer failed', { error });
        }
      }

      entry = this.ready.get(this.nextDelivery);
    }
  }
}
