import { z } from 'zod';

export enum LifecycleEventType {
  OUTAGE_STARTED = 'OutageStarted',
  OUTAGE_ENDED = 'OutageEnded',
  ANOMALY_PERIOD_STARTED = 'AnomalyPeriodStarted',
  ANOMALY_PERIOD_ENDED = 'AnomalyPeriodEnded'
}

export const OutageStartedSchema = z.object({
  type: z.literal(LifecycleEventType.OUTAGE_STARTED),
  time: z.date()
});

export const OutageEndedSchema = z.object({
  type: z.literal(LifecycleEventType.OUTAGE_ENDED),
  time: z.date(),
  durationMs: z.number().nonnegative()
});

export const AnomalyPeriodStartedSchema = z.object({
  type: z.literal(LifecycleEventType.ANOMALY_PERIOD_STARTED),
  time: z.date()
});

export const AnomalyPeriodEndedSchema = z.object({
  type: z.literal(LifecycleEventType.ANOMALY_PERIOD_ENDED),
  time: z.date(),
  durationMs: z.number().nonnegative()
});

export const LifecycleEventSchema = z.discriminatedUnion('type', [
  OutageStartedSchema,
  OutageEndedSchema,
  AnomalyPeriodStartedSchema,
  AnomalyPeriodEndedSchema
]);

export type OutageStarted = z.infer<typeof OutageStartedSchema>;
export type OutageEnded = z.infer<typeof OutageEndedSchema>;
export type AnomalyPeriodStarted = z.infer<typeof AnomalyPeriodStartedSchema>;
export type AnomalyPeriodEnded = z.infer<typeof AnomalyPeriodEndedSchema>;
export type LifecycleEvent = z.infer<typeof LifecycleEventSchema>;

// Events that close a condition and carry its duration
export type CompletedEvent = OutageEnded | AnomalyPeriodEnded;

export const isCompletedEvent = (event: LifecycleEvent): event is CompletedEvent =>
  event.type === LifecycleEventType.OUTAGE_ENDED ||
  event.type === LifecycleEventType.ANOMALY_PERIOD_ENDED;
