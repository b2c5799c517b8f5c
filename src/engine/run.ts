import type {
  CheckItem,
  Counters,
  DetailBlock,
  DisplayState,
  FinalizedReport,
  Probe,
  ProbeResult,
  ProbeSpec,
  ReportMetadata,
  RichText,
} from '../types.js';
import { logger } from '../logger.js';
import { Aggregator } from './aggregator.js';
import { Verdict, type ClassifierInput } from './classifier.js';
import { errorText } from './errors.js';
import type { Evidence, Extractor } from './evidence.js';
import { createCheckItem, ReportBuilder } from './report.js';

export const MANUAL_FOLLOW_UP =
  'The check could not reach a conclusion automatically. Verify this control manually.';

export const MANUAL_GUIDANCE =
  'This check requires manual verification and cannot be automated. Review the evidence and validate compliance manually.';

export interface CheckSpec<T = undefined> {
  title: string;
  probe: ProbeSpec;
  extract: Extractor<T>;
  /** Default remediation for fail/warning outcomes */
  recommendation?: string;
  /** Report successful evidence as info instead of pass */
  informational?: boolean;
  /** Discovery steps set this to false: the item is shown but left out of every tally */
  counted?: boolean;
}

export interface CheckResult<T = undefined> {
  verdict: Verdict;
  item: CheckItem;
  /** Present only when extraction succeeded */
  facts?: T;
}

export interface RecordInput {
  title: string;
  details: RichText;
  recommendation?: string;
  recommendationExpected?: boolean;
}

export function describeProbe(spec: ProbeSpec): string {
  return `${spec.service} ${spec.command}`;
}

export function deniedDetails(spec: ProbeSpec, error?: string): RichText {
  const blocks: DetailBlock[] = [
    {
      kind: 'text',
      text: `Access denied. The assessment identity is not permitted to call ${describeProbe(spec)}.`,
    },
  ];
  if (error) blocks.push({ kind: 'code', text: error });
  return blocks;
}

export function deniedRecommendation(spec: ProbeSpec): string {
  return `Grant the assessment identity read access to ${spec.service}:${spec.command}.`;
}

/**
 * One assessment run: the report tree plus the run's counters. Checks execute
 * one at a time in call order; a check that fails to execute is recorded as a
 * warning and the run carries on.
 */
export class AssessmentRun {
  readonly report: ReportBuilder;
  private readonly counters = new Aggregator();

  constructor(
    metadata: ReportMetadata,
    private readonly probe: Probe,
    clock?: () => Date,
  ) {
    this.report = new ReportBuilder(metadata, clock);
  }

  openSection(id: string, title: string, displayState: DisplayState = 'collapsed'): void {
    logger.info(`Section: ${title}`);
    this.report.openSection(id, title, displayState);
  }

  closeSection(id: string): void {
    this.report.closeSection(id);
  }

  /** Append a classified item and count it. */
  record(sectionId: string, verdict: Verdict, input: RecordInput): CheckItem {
    const item = createCheckItem({ ...input, outcome: verdict.outcome });
    this.report.appendItem(sectionId, item, verdict);
    this.counters.record(verdict);
    logger.info(`[${verdict.outcome.toUpperCase()}] ${input.title}`);
    return item;
  }

  /** Append an item that summarizes other items; not counted. */
  note(sectionId: string, verdict: Verdict, input: RecordInput): CheckItem {
    const item = createCheckItem({ ...input, outcome: verdict.outcome });
    this.report.appendItem(sectionId, item);
    logger.debug(`[${verdict.outcome.toUpperCase()}] ${input.title} (not counted)`);
    return item;
  }

  manual(sectionId: string, title: string, details: RichText, guidance?: string): CheckItem {
    return this.record(sectionId, Verdict.of({ manual: true }), {
      title,
      details,
      recommendation: guidance || MANUAL_GUIDANCE,
    });
  }

  async check<T>(sectionId: string, spec: CheckSpec<T>): Promise<CheckResult<T>> {
    let probe: ProbeResult;
    try {
      logger.probe(spec.probe.service, spec.probe.command, { args: spec.probe.args });
      probe = await this.probe(spec.probe);
    } catch (err) {
      logger.warn(`Probe failed to execute: ${describeProbe(spec.probe)}`, { error: errorText(err) });
      return this.inconclusive(
        sectionId,
        spec,
        {},
        `The probe could not be executed: ${errorText(err)}`,
      );
    }

    if (!probe.ok) {
      const verdict = Verdict.of({ probe });
      if (verdict.outcome === 'access-denied') {
        const item = this.emit(sectionId, spec, verdict, {
          title: spec.title,
          details: deniedDetails(spec.probe, probe.error),
          recommendation: deniedRecommendation(spec.probe),
        });
        return { verdict, item };
      }
      const reason =
        probe.errorCategory === 'empty'
          ? `${describeProbe(spec.probe)} returned no data.`
          : `${describeProbe(spec.probe)} failed: ${probe.error ?? 'unknown error'}`;
      return this.inconclusive(sectionId, spec, { probe }, reason);
    }

    let evidence: Evidence<T>;
    try {
      evidence = spec.extract(probe.payload);
    } catch (err) {
      return this.inconclusive(
        sectionId,
        spec,
        { probe, evaluation: 'incomplete' },
        `Evidence could not be evaluated: ${errorText(err)}`,
      );
    }

    const verdict = Verdict.of({
      probe,
      evaluation: evidence.evaluation,
      informational: spec.informational,
    });
    const item = this.emit(sectionId, spec, verdict, {
      title: spec.title,
      details: evidence.details,
      recommendation:
        evidence.evaluation === 'incomplete'
          ? (evidence.recommendation ?? spec.recommendation ?? MANUAL_FOLLOW_UP)
          : (evidence.recommendation ?? spec.recommendation),
    });
    return { verdict, item, facts: evidence.facts };
  }

  resetCounters(): void {
    logger.debug('Counters reset', { before: this.counters.snapshot() });
    this.counters.reset();
  }

  snapshot(): Counters {
    return this.counters.snapshot();
  }

  finalize(): FinalizedReport {
    return this.report.finalize(this.counters.snapshot());
  }

  private emit<T>(sectionId: string, spec: CheckSpec<T>, verdict: Verdict, input: RecordInput): CheckItem {
    return spec.counted === false
      ? this.note(sectionId, verdict, input)
      : this.record(sectionId, verdict, input);
  }

  private inconclusive<T>(
    sectionId: string,
    spec: CheckSpec<T>,
    input: ClassifierInput,
    error: string,
  ): CheckResult<T> {
    const verdict = Verdict.of(input);
    const item = this.emit(sectionId, spec, verdict, {
      title: spec.title,
      details: [
        { kind: 'text', text: 'The check did not produce conclusive evidence.' },
        { kind: 'code', text: error },
      ],
      recommendation: MANUAL_FOLLOW_UP,
    });
    return { verdict, item };
  }
}
