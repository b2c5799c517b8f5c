import type { Evaluation, FindingBasis, Outcome, ProbeResult } from '../types.js';

export interface ClassifierInput {
  /** Absent for controls that have no automatable evidence */
  probe?: ProbeResult;
  /** Attestation-only control; always a warning */
  manual?: boolean;
  /** Successful evidence is reported as info rather than pass */
  informational?: boolean;
  /** Result of evidence extraction over the probe payload */
  evaluation?: Evaluation;
}

export const OUTCOME_BY_BASIS: Record<FindingBasis, Outcome> = {
  'authorization-denied': 'access-denied',
  'manual-verification-required': 'warning',
  'target-compliant': 'pass',
  informational: 'info',
  'target-non-compliant': 'fail',
  'evidence-incomplete': 'warning',
};

/**
 * Decide the basis of a finding. Rules apply in priority order:
 *  1. authorization failure on the probe
 *  2. manual/attestation control
 *  3. probe ok + compliant (info when informational)
 *  4. probe ok + non-compliant
 *  5. probe ok + incomplete evidence
 *  6. anything else: incomplete, never a pass
 */
export function basisOf(input: ClassifierInput): FindingBasis {
  const { probe, manual, informational, evaluation } = input;

  if (probe && !probe.ok && probe.errorCategory === 'authorization') return 'authorization-denied';
  if (manual) return 'manual-verification-required';

  if (probe?.ok) {
    switch (evaluation) {
      case 'compliant':
        return informational ? 'informational' : 'target-compliant';
      case 'non-compliant':
        return 'target-non-compliant';
      default:
        return 'evidence-incomplete';
    }
  }

  return 'evidence-incomplete';
}

export function classify(input: ClassifierInput): Outcome {
  return OUTCOME_BY_BASIS[basisOf(input)];
}

/**
 * A classified result. Only the classifier can construct one, so counters
 * cannot be moved by anything that skipped classification.
 */
export class Verdict {
  private constructor(
    readonly outcome: Outcome,
    readonly basis: FindingBasis,
  ) {}

  static of(input: ClassifierInput): Verdict {
    const basis = basisOf(input);
    return new Verdict(OUTCOME_BY_BASIS[basis], basis);
  }

  /** True for outcomes that say something negative about the target or the run. */
  get needsRecommendation(): boolean {
    return this.outcome !== 'pass' && this.outcome !== 'info';
  }
}
