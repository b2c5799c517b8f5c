import type { Outcome, RichText } from '../types.js';

export const OUTCOME_LABEL: Record<Outcome, string> = {
  pass: 'PASS',
  fail: 'FAIL',
  warning: 'WARNING',
  info: 'INFO',
  'access-denied': 'ACCESS DENIED',
};

export const OUTCOME_GLYPH: Record<Outcome, string> = {
  pass: '✓',
  fail: '✗',
  warning: '!',
  info: 'i',
  'access-denied': '⊘',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => {
    switch (c) {
      case '&':
        return '&amp;';
      case '<':
        return '&lt;';
      case '>':
        return '&gt;';
      case '"':
        return '&quot;';
      default:
        return '&#039;';
    }
  });
}

/** Flatten a finding body into plain lines. */
export function richToLines(rich: RichText): string[] {
  if (typeof rich === 'string') return [rich];
  const lines: string[] = [];
  for (const block of rich) {
    if (block.kind === 'list') lines.push(...block.items.map((i) => `- ${i}`));
    else lines.push(block.text);
  }
  return lines;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** UTC stamp like 20250301_140502, safe for file names. */
export function fileStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function reportBaseName(checklistId: string, date: Date): string {
  return `posture_${checklistId}_${fileStamp(date)}`;
}
