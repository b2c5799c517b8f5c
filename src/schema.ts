import { z } from 'zod';
import { OUTCOMES, type Outcome } from './types.js';

const OutcomeSchema = z.custom<Outcome>(
  (v) => typeof v === 'string' && OUTCOMES.some((o) => o === v),
  { message: 'unknown outcome' },
);

const DetailBlockSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('list'), items: z.array(z.string()) }),
  z.object({ kind: z.literal('code'), text: z.string() }),
]);

export const CountersSchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  warning: z.number().int().nonnegative(),
  info: z.number().int().nonnegative(),
  accessDenied: z.number().int().nonnegative(),
});

const CheckItemSchema = z.object({
  title: z.string(),
  outcome: OutcomeSchema,
  details: z.union([z.string(), z.array(DetailBlockSchema)]),
  recommendation: z.string().optional(),
  recommendationExpected: z.boolean().default(true),
});

const SectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  displayState: z.enum(['expanded', 'collapsed', 'none']),
  items: z.array(CheckItemSchema),
  counters: CountersSchema,
  closed: z.boolean(),
});

/** Shape of a persisted `<name>.json` report. */
export const ReportSchema = z.object({
  metadata: z.object({
    title: z.string(),
    accountId: z.string(),
    scope: z.string(),
    timestamp: z.string(),
    actor: z.string(),
  }),
  sections: z.array(SectionSchema),
  counters: CountersSchema,
  percentage: z.number().min(0).max(100),
  finalizedAt: z.string(),
});

export type StoredReport = z.infer<typeof ReportSchema>;
