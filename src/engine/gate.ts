import type { Capability, Counters } from '../types.js';
import { logger } from '../logger.js';
import { availability } from '../utils/scoring.js';
import { emptyCounters, tally } from './aggregator.js';
import { Verdict } from './classifier.js';
import type { Evidence } from './evidence.js';
import { deniedRecommendation, describeProbe, type AssessmentRun } from './run.js';

export type GateState = 'probing' | 'evaluating' | 'continue' | 'aborted';

/** Ask the operator a yes/no question. */
export type Confirm = (question: string) => Promise<boolean>;

export interface GateOptions {
  /** Minimum availability percentage that continues without asking */
  threshold: number;
  confirm: Confirm;
  sectionId?: string;
  sectionTitle?: string;
}

export interface GateResult {
  state: Extract<GateState, 'continue' | 'aborted'>;
  availablePercentage: number;
  /** Tally of the capability probes only */
  counters: Counters;
  /** Whether the operator was asked to confirm */
  prompted: boolean;
}

export const GATE_SECTION_ID = 'permissions';

function capabilityEvidence(capability: Capability, payload: unknown): Evidence {
  const evaluation = capability.evaluate ? capability.evaluate(payload) : 'compliant';
  const call = describeProbe(capability);
  switch (evaluation) {
    case 'compliant':
      return { evaluation, details: `Successfully verified access to ${call}.` };
    case 'non-compliant':
      return {
        evaluation,
        details: `${call} responded, but the response does not confirm the access the assessment needs.`,
      };
    default:
      return { evaluation, details: `${call} responded with data that could not be interpreted.` };
  }
}

/**
 * Pre-flight check of the capabilities a checklist needs.
 *
 * probing -> evaluating -> continue | aborted
 *
 * Every capability is probed once and recorded in the gate's own section.
 * Access-denied probes leave the availability denominator (see availability()).
 * Below the threshold the operator decides whether the run goes on.
 */
export class PermissionGate {
  private current: GateState = 'probing';

  constructor(
    private readonly run: AssessmentRun,
    private readonly capabilities: readonly Capability[],
    private readonly options: GateOptions,
  ) {}

  get state(): GateState {
    return this.current;
  }

  async execute(): Promise<GateResult> {
    if (this.current !== 'probing') {
      throw new Error(`Permission gate already ran (state: ${this.current})`);
    }

    const sectionId = this.options.sectionId ?? GATE_SECTION_ID;
    const counters = emptyCounters();

    const title = this.options.sectionTitle ?? 'Permission Assessment';
    this.run.openSection(sectionId, title, 'expanded');

    for (const capability of this.capabilities) {
      const result = await this.run.check(sectionId, {
        title: `API Access: ${capability.description} (${describeProbe(capability)})`,
        probe: capability,
        extract: (payload) => capabilityEvidence(capability, payload),
        recommendation: deniedRecommendation(capability),
      });
      tally(counters, result.verdict.outcome);
    }

    this.moveTo('evaluating');
    const pct = availability(counters);
    logger.info(
      `Permission check complete: ${counters.passed}/${counters.total} available (${pct}%)`,
      { accessDenied: counters.accessDenied },
    );

    let prompted = false;
    let decision: GateResult['state'];
    if (pct < this.options.threshold) {
      this.run.note(sectionId, Verdict.of({ probe: { ok: true }, evaluation: 'incomplete' }), {
        title: 'Permission Assessment',
        details: [
          {
            kind: 'text',
            text: `Insufficient permissions detected. Only ${pct}% of required permissions are available.`,
          },
          {
            kind: 'text',
            text: 'Without these permissions the assessment will be incomplete and may not reflect the actual compliance status.',
          },
        ],
        recommendation:
          'Request additional permissions or continue with limited assessment capabilities.',
      });
      prompted = true;
      const proceed = await this.options.confirm(
        `Only ${pct}% of required permissions are available. Continue with limited assessment?`,
      );
      decision = proceed ? 'continue' : 'aborted';
      if (!proceed) {
        this.run.note(
          sectionId,
          Verdict.of({ probe: { ok: true }, evaluation: 'compliant', informational: true }),
          {
            title: 'Assessment Aborted',
            details: 'The operator chose to abort the assessment due to insufficient permissions.',
          },
        );
      }
    } else {
      this.run.note(sectionId, Verdict.of({ probe: { ok: true }, evaluation: 'compliant' }), {
        title: 'Permission Assessment',
        details: `Sufficient permissions detected. ${pct}% of required permissions are available.`,
      });
      decision = 'continue';
    }

    this.run.closeSection(sectionId);
    this.moveTo(decision);

    return {
      state: decision,
      availablePercentage: pct,
      counters,
      prompted,
    };
  }

  private moveTo(next: GateState): void {
    logger.transition(this.current, next);
    this.current = next;
  }
}
