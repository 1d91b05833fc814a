import { z } from 'zod';

export const DigestEntrySchema = z.object({
  endedAt: z.date(),
  durationMs: z.number().nonnegative()
});

export const DigestSummarySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  periodStart: z.date(),
  periodEnd: z.date(),
  outageCount: z.number().int().nonnegative(),
  outageDetails: z.array(DigestEntrySchema),
  anomalyCount: z.number().int().nonnegative(),
  anomalyDetails: z.array(DigestEntrySchema)
});

export type DigestEntry = z.infer<typeof DigestEntrySchema>;
export type DigestSummary = z.infer<typeof DigestSummarySchema>;
