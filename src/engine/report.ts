import type {
  CheckItem,
  Counters,
  DisplayState,
  FinalizedReport,
  Outcome,
  ReportMetadata,
  RichText,
  Section,
} from '../types.js';
import { percentage } from '../utils/scoring.js';
import { emptyCounters, tally } from './aggregator.js';
import type { Verdict } from './classifier.js';
import {
  DuplicateSectionError,
  MissingRecommendationError,
  ReportSealedError,
  SectionClosedError,
  UnknownSectionError,
  VerdictMismatchError,
} from './errors.js';

export interface CheckItemInput {
  title: string;
  outcome: Outcome;
  details: RichText;
  recommendation?: string;
  /** Defaults to true: fail/warning items must say what to do next */
  recommendationExpected?: boolean;
}

export function createCheckItem(input: CheckItemInput): CheckItem {
  const keepsRecommendation = input.outcome !== 'pass' && input.outcome !== 'info';
  const recommendation = keepsRecommendation ? input.recommendation?.trim() || undefined : undefined;
  return Object.freeze({
    title: input.title,
    outcome: input.outcome,
    details: input.details,
    ...(recommendation ? { recommendation } : {}),
    recommendationExpected: input.recommendationExpected ?? true,
  });
}

type MutableSection = {
  id: string;
  title: string;
  displayState: DisplayState;
  items: CheckItem[];
  counters: Counters;
  closed: boolean;
};

function lacksRecommendation(item: CheckItem): boolean {
  return (
    (item.outcome === 'fail' || item.outcome === 'warning') &&
    item.recommendationExpected &&
    !item.recommendation
  );
}

function freezeSection(s: MutableSection): Section {
  return Object.freeze({
    id: s.id,
    title: s.title,
    displayState: s.displayState,
    items: Object.freeze([...s.items]),
    counters: Object.freeze({ ...s.counters }),
    closed: s.closed,
  });
}

/**
 * Ordered report tree: sections in the order they were opened, items in the
 * order they were appended. Sealed by finalize().
 */
export class ReportBuilder {
  private readonly sections: MutableSection[] = [];
  private readonly byId = new Map<string, MutableSection>();
  private finalized?: FinalizedReport;

  constructor(
    readonly metadata: ReportMetadata,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get sealed(): boolean {
    return this.finalized !== undefined;
  }

  openSection(id: string, title: string, initialDisplayState: DisplayState = 'collapsed'): void {
    if (this.finalized) throw new ReportSealedError(`open section "${id}"`);
    if (this.byId.has(id)) throw new DuplicateSectionError(id);

    const section: MutableSection = {
      id,
      title,
      displayState: initialDisplayState,
      items: [],
      counters: emptyCounters(),
      closed: false,
    };
    this.sections.push(section);
    this.byId.set(id, section);
  }

  /**
   * Append an item to an open section. When a verdict is passed the item is
   * also tallied in the section's counters; summary items are appended without one.
   */
  appendItem(sectionId: string, item: CheckItem, verdict?: Verdict): void {
    if (this.finalized) throw new ReportSealedError(`append to section "${sectionId}"`);
    const section = this.byId.get(sectionId);
    if (!section) throw new UnknownSectionError(sectionId);
    if (section.closed) throw new SectionClosedError(sectionId);
    if (verdict && verdict.outcome !== item.outcome) {
      throw new VerdictMismatchError(item.title, item.outcome, verdict.outcome);
    }

    section.items.push(item);
    if (verdict) tally(section.counters, verdict.outcome);
  }

  closeSection(sectionId: string): void {
    const section = this.byId.get(sectionId);
    if (!section) throw new UnknownSectionError(sectionId);
    section.closed = true;
  }

  /** Sections that have been opened and not yet closed, in opening order. */
  openSectionIds(): string[] {
    return this.sections.filter((s) => !s.closed).map((s) => s.id);
  }

  view(): Section[] {
    return this.sections.map(freezeSection);
  }

  /**
   * Seal the report with the final counters. Closes any section still open.
   * A second call returns the first result unchanged.
   */
  finalize(counters: Counters): FinalizedReport {
    if (this.finalized) return this.finalized;

    const missing = this.sections.flatMap((s) => s.items.filter(lacksRecommendation));
    if (missing.length) throw new MissingRecommendationError(missing.map((i) => i.title));

    for (const s of this.sections) s.closed = true;

    const snapshot = Object.freeze({ ...counters });
    this.finalized = Object.freeze({
      metadata: Object.freeze({ ...this.metadata }),
      sections: this.sections.map(freezeSection),
      counters: snapshot,
      percentage: percentage(snapshot),
      finalizedAt: this.clock().toISOString(),
    });
    return this.finalized;
  }
}
