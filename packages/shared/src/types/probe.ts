import { z } from 'zod';

export enum FailureKind {
  TIMEOUT = 'timeout',
  UNRESOLVABLE = 'unresolvable',
  OTHER = 'other'
}

// What the reply line of `ping` says about the packet that came back
export const ReplyDetailsSchema = z.object({
  from: z.string().min(1),
  bytes: z.number().int().nonnegative().optional(),
  sequence: z.number().int().nonnegative().optional(),
  ttl: z.number().int().nonnegative().optional()
});

export const SuccessfulProbeSchema = z.object({
  success: z.literal(true),
  timestamp: z.date(),
  latencyMs: z.number().nonnegative(),
  reply: ReplyDetailsSchema.optional()
});

export const FailedProbeSchema = z.object({
  success: z.literal(false),
  timestamp: z.date(),
  failureKind: z.nativeEnum(FailureKind),
  message: z.string().optional()
});

export const ProbeOutcomeSchema = z.discriminatedUnion('success', [
  SuccessfulProbeSchema,
  FailedProbeSchema
]);

export type ReplyDetails = z.infer<typeof ReplyDetailsSchema>;
export type SuccessfulProbe = z.infer<typeof SuccessfulProbeSchema>;
export type FailedProbe = z.infer<typeof FailedProbeSchema>;

/**
 * Result of one probe attempt. `latencyMs` exists only on success and
 * `failureKind` only on failure; `timestamp` is when the probe was sent.
 */
export type ProbeOutcome = z.infer<typeof ProbeOutcomeSchema>;

export const probeSucceeded = (
  timestamp: Date,
  latencyMs: number,
  reply?: ReplyDetails
): SuccessfulProbe => ({
  success: true,
  timestamp,
  latencyMs,
  ...(reply !== undefined ? { reply } : {})
});

export const probeFailed = (
  timestamp: Date,
  failureKind: FailureKind,
  message?: string
): FailedProbe => ({
  success: false,
  timestamp,
  failureKind,
  ...(message !== undefined ? { message } : {})
});
