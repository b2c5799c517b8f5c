import { z } from 'zod';
import { errorText } from '../engine/errors.js';
import { logger } from '../logger.js';
import type { Probe } from '../types.js';

export const UNKNOWN_IDENTITY = 'Unknown (check CLI configuration)';

const CallerIdentitySchema = z.object({
  Account: z.string().min(1),
  Arn: z.string().min(1),
});

export type Identity = { accountId: string; actor: string };

/** Account and caller ARN for the report header. Never throws. */
export async function resolveIdentity(probe: Probe): Promise<Identity> {
  try {
    const result = await probe({ service: 'sts', command: 'get-caller-identity' });
    const parsed = CallerIdentitySchema.safeParse(result.payload);
    if (result.ok && parsed.success) {
      return { accountId: parsed.data.Account, actor: parsed.data.Arn };
    }
    logger.warn('Could not resolve caller identity', { error: result.error });
  } catch (err) {
    logger.warn('Could not resolve caller identity', { error: errorText(err) });
  }
  return { accountId: UNKNOWN_IDENTITY, actor: UNKNOWN_IDENTITY };
}

export function hasAccount(payload: unknown): boolean {
  return CallerIdentitySchema.safeParse(payload).success;
}
