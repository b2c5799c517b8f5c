import type { Outcome } from '../types.js';

export type PostureErrorCode =
  | 'SECTION_CLOSED'
  | 'UNKNOWN_SECTION'
  | 'DUPLICATE_SECTION'
  | 'REPORT_SEALED'
  | 'MISSING_RECOMMENDATION'
  | 'VERDICT_MISMATCH'
  | 'EVIDENCE_INCOMPLETE'
  | 'CONFIG';

export class PostureError extends Error {
  readonly code: PostureErrorCode;

  constructor(code: PostureErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SectionClosedError extends PostureError {
  constructor(readonly sectionId: string) {
    super('SECTION_CLOSED', `Section "${sectionId}" is closed; no further items can be appended`);
  }
}

export class UnknownSectionError extends PostureError {
  constructor(readonly sectionId: string) {
    super('UNKNOWN_SECTION', `No section with id "${sectionId}"`);
  }
}

export class DuplicateSectionError extends PostureError {
  constructor(readonly sectionId: string) {
    super('DUPLICATE_SECTION', `Section "${sectionId}" already exists`);
  }
}

export class ReportSealedError extends PostureError {
  constructor(operation: string) {
    super('REPORT_SEALED', `Report is finalized; cannot ${operation}`);
  }
}

export class MissingRecommendationError extends PostureError {
  constructor(readonly titles: string[]) {
    super(
      'MISSING_RECOMMENDATION',
      `Items without a recommendation: ${titles.map((t) => `"${t}"`).join(', ')}`,
    );
  }
}

export class VerdictMismatchError extends PostureError {
  constructor(
    readonly title: string,
    readonly itemOutcome: Outcome,
    readonly verdictOutcome: Outcome,
  ) {
    super('VERDICT_MISMATCH', `Item "${title}" is ${itemOutcome} but its verdict is ${verdictOutcome}`);
  }
}

/** Thrown by evidence extractors when a payload cannot support a yes/no answer. */
export class EvidenceIncompleteError extends PostureError {
  constructor(message: string) {
    super('EVIDENCE_INCOMPLETE', message);
  }
}

export class ConfigError extends PostureError {
  constructor(readonly problems: string[]) {
    super('CONFIG', `Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
