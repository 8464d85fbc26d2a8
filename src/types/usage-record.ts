import { z } from 'zod';

/**
 * Persisted usage counters. Timestamps are ISO-8601 strings on disk.
 * Unknown fields are kept so newer writers don't lose data.
 */
export const UsageCountersSchema = z
  .object({
    count: z.number().int().nonnegative().default(0),
    lastUsed: z.string().datetime({ offset: true }).optional(),
    firstUsed: z.string().datetime({ offset: true }).optional(),
    totalTokens: z.number().int().nonnegative().optional(),
    avgResponseTimeMs: z.number().nonnegative().optional(),
    responseSamples: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export const UsageRecordSchema = z
  .object({
    starred: z.boolean().default(false),
    queuedForDeletion: z.boolean().default(false),
    usage: UsageCountersSchema.default({ count: 0 }),
  })
  .passthrough();

export type UsageCounters = z.output<typeof UsageCountersSchema>;
export type UsageRecord = z.output<typeof UsageRecordSchema>;

/** Whole persisted document, keyed by model name */
export const UsageDocumentSchema = z.record(z.unknown());

export interface UsageEvent {
  at: Date;
  tokens?: number;
  responseTimeMs?: number;
}

export function emptyUsageRecord(): UsageRecord {
  return {
    starred: false,
    queuedForDeletion: false,
    usage: { count: 0 },
  };
}
