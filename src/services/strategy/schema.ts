import { z } from 'zod';

export const customPredicateSchema = z
  .object({
    source: z.enum(['missing', 'cutoff_unmet']).default('missing'),
    /** Only items released/added at least this many days ago. */
    minAgeDays: z.number().min(0).optional(),
    /** Only items released/added at most this many days ago. */
    maxAgeDays: z.number().min(0).optional(),
    /** Quality threshold: items whose current file is below this vertical resolution (e.g. 1080). */
    maxResolution: z.number().int().positive().optional(),
    monitoredOnly: z.boolean().default(true),
  })
  .refine(
    (p) => p.minAgeDays === undefined || p.maxAgeDays === undefined || p.minAgeDays <= p.maxAgeDays,
    { message: 'minAgeDays must not exceed maxAgeDays' },
  );

export const strategySpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('missing') }),
  z.object({ kind: z.literal('cutoff_unmet') }),
  z.object({ kind: z.literal('recent'), withinDays: z.number().positive().default(30) }),
  z.object({ kind: z.literal('custom'), predicate: customPredicateSchema }),
]);

export type CustomPredicate = z.infer<typeof customPredicateSchema>;
export type StrategySpec = z.infer<typeof strategySpecSchema>;
export type StrategyKind = StrategySpec['kind'];

export const STRATEGY_KINDS: readonly StrategyKind[] = ['missing', 'cutoff_unmet', 'recent', 'custom'];
