export type Outcome = 'pass' | 'fail' | 'warning' | 'info' | 'access-denied';

export const OUTCOMES: readonly Outcome[] = ['pass', 'fail', 'warning', 'info', 'access-denied'];

/** Why a verdict came out the way it did. */
export type FindingBasis =
  | 'authorization-denied'
  | 'manual-verification-required'
  | 'target-compliant'
  | 'informational'
  | 'target-non-compliant'
  | 'evidence-incomplete';

export type ErrorCategory = 'authorization' | 'other' | 'empty';

export interface ProbeResult {
  /** True when the provider call returned without error */
  ok: boolean;
  /** Set on failure: authorization denial, empty/absent data, or anything else */
  errorCategory?: ErrorCategory;
  /** Parsed provider response, opaque to the engine */
  payload?: unknown;
  /** Raw error text from the provider, kept for the report */
  error?: string;
}

export interface ProbeSpec {
  service: string;
  command: string;
  args?: string[];
}

export type Probe = (spec: ProbeSpec) => Promise<ProbeResult>;

export type Evaluation = 'compliant' | 'non-compliant' | 'incomplete';

export type DetailBlock =
  | { kind: 'text'; text: string }
  | { kind: 'list'; items: string[] }
  | { kind: 'code'; text: string };

/** Finding body. Plain strings are a single paragraph. */
export type RichText = string | DetailBlock[];

export interface CheckItem {
  /** Human-friendly title for the check */
  readonly title: string;
  readonly outcome: Outcome;
  readonly details: RichText;
  /** Only present when the outcome is not pass/info */
  readonly recommendation?: string;
  /** Whether the check's contract requires a recommendation on fail/warning */
  readonly recommendationExpected: boolean;
}

export type DisplayState = 'expanded' | 'collapsed' | 'none';

export interface Counters {
  total: number;
  passed: number;
  failed: number;
  warning: number;
  info: number;
  accessDenied: number;
}

export interface Section {
  /** Stable machine-readable id (e.g. 'permissions', 'network') */
  readonly id: string;
  readonly title: string;
  readonly displayState: DisplayState;
  readonly items: readonly CheckItem[];
  /** Tally of the verdicts recorded against this section */
  readonly counters: Counters;
  readonly closed: boolean;
}

export interface ReportMetadata {
  title: string;
  /** Target-system account identifier */
  accountId: string;
  /** Target-scope identifier (region, VPC set) */
  scope: string;
  /** ISO timestamp when the assessment started */
  timestamp: string;
  /** Identity the run was performed as */
  actor: string;
}

export interface FinalizedReport {
  metadata: ReportMetadata;
  sections: Section[];
  counters: Counters;
  /** Compliance percentage [0..100] derived from counters */
  percentage: number;
  /** ISO timestamp when the report was sealed */
  finalizedAt: string;
}

export interface Capability extends ProbeSpec {
  /** Human-friendly description shown in the gate section */
  description: string;
  /** Optional check on the returned payload; defaults to compliant */
  evaluate?: (payload: unknown) => Evaluation;
}
