import type { z } from 'zod';
import type { Evaluation, RichText } from '../types.js';
import { EvidenceIncompleteError } from './errors.js';

export interface Evidence<T = undefined> {
  evaluation: Evaluation;
  details: RichText;
  /** Overrides the check's default recommendation */
  recommendation?: string;
  /** Normalized facts later checks in the same section can build on */
  facts?: T;
}

/** Turns a provider payload into a normalized fact, or throws EvidenceIncompleteError. */
export type Extractor<T = undefined> = (payload: unknown) => Evidence<T>;

/**
 * Validate a payload against the shape an extractor relies on.
 * Example:
 *   const { Trails } = parsePayload(TrailsSchema, payload, 'describe-trails');
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  source: string,
): z.infer<S> {
  if (payload === undefined || payload === null || payload === '') {
    throw new EvidenceIncompleteError(`${source} returned no data`);
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new EvidenceIncompleteError(`${source} returned an unexpected shape (${issues})`);
  }
  return parsed.data;
}

/** Shorthand for a conclusive yes/no. */
export function conclude(ok: boolean, passDetails: RichText, failDetails: RichText): Evidence {
  return ok
    ? { evaluation: 'compliant', details: passDetails }
    : { evaluation: 'non-compliant', details: failDetails };
}
