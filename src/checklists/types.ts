import type { AssessmentRun } from '../engine/run.js';
import type { Capability } from '../types.js';

export type Scope = {
  region: string;
  /** In-scope VPC ids, or every VPC in the region */
  vpcs: string[] | 'all';
};

export interface Checklist {
  /** Stable machine-readable id, used in report file names */
  id: string;
  title: string;
  /** What the permission gate probes before any check runs */
  capabilities: readonly Capability[];
  run(run: AssessmentRun, scope: Scope): Promise<void>;
}

export function describeScope(scope: Scope): string {
  const vpcs = scope.vpcs === 'all' ? 'all VPCs' : scope.vpcs.join(', ') || 'none';
  return `${scope.region} (${vpcs})`;
}

/** Parse operator input: blank, 'all' or a list without ids means every VPC. */
export function parseVpcList(input: string | undefined): Scope['vpcs'] {
  const text = (input ?? '').trim();
  if (!text || text.toLowerCase() === 'all') return 'all';
  const ids = Array.from(
    new Set(
      text
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean),
    ),
  );
  return ids.length > 0 ? ids : 'all';
}
