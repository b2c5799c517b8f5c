import type { Counters, Outcome } from '../types.js';
import type { Verdict } from './classifier.js';

export function emptyCounters(): Counters {
  return { total: 0, passed: 0, failed: 0, warning: 0, info: 0, accessDenied: 0 };
}

const FIELD: Record<Outcome, Exclude<keyof Counters, 'total'>> = {
  pass: 'passed',
  fail: 'failed',
  warning: 'warning',
  info: 'info',
  'access-denied': 'accessDenied',
};

export function tally(counters: Counters, outcome: Outcome): void {
  counters.total++;
  counters[FIELD[outcome]]++;
}

/** Running totals for one run. Never resets itself. */
export class Aggregator {
  private counters: Counters = emptyCounters();

  record(verdict: Verdict): void {
    tally(this.counters, verdict.outcome);
  }

  reset(): void {
    this.counters = emptyCounters();
  }

  snapshot(): Counters {
    return { ...this.counters };
  }
}
