import type { Counters } from '../types.js';

export type Band = 'red' | 'amber' | 'green';

export const BAND_COLORS: Record<Band, string> = {
  red: '#f44336',
  amber: '#ff9800',
  green: '#4CAF50',
};

function ratio(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  const pct = Math.floor((numerator * 100) / denominator);
  return Math.max(0, Math.min(100, pct));
}

/**
 * Compliance percentage used everywhere a compliance figure is displayed.
 * - Score = floor(passed * 100 / (total - warning - accessDenied)).
 * - Warnings (manual or inconclusive) and access-denied checks are excluded
 *   from the denominator; info items stay in it.
 * - Empty denominator => 0.
 */
export function percentage(counters: Counters): number {
  return ratio(counters.passed, counters.total - counters.warning - counters.accessDenied);
}

/**
 * Share of probed capabilities that are usable, for the permission gate.
 * Only access-denied probes leave the denominator.
 */
export function availability(counters: Counters): number {
  return ratio(counters.passed, counters.total - counters.accessDenied);
}

export function band(pct: number): Band {
  if (pct < 70) return 'red';
  if (pct < 90) return 'amber';
  return 'green';
}

export type ComplianceStatus = 'Compliant' | 'Partially Compliant' | 'Non-Compliant';

export function statusLabel(pct: number): ComplianceStatus {
  switch (band(pct)) {
    case 'green':
      return 'Compliant';
    case 'amber':
      return 'Partially Compliant';
    default:
      return 'Non-Compliant';
  }
}
