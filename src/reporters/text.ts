import { promises as fs } from 'fs';
import path from 'path';
import type { Counters, FinalizedReport } from '../types.js';
import { OUTCOME_LABEL } from './shared.js';

export function totalsLine(counters: Counters): string {
  return (
    `Total: ${counters.total}  Passed: ${counters.passed}  Failed: ${counters.failed}  ` +
    `Warnings: ${counters.warning}  Info: ${counters.info}  Access denied: ${counters.accessDenied}`
  );
}

/** Newline-delimited summary: header, totals, then one `OUTCOME title` line per item. */
export function renderText(report: FinalizedReport): string {
  const { metadata } = report;
  const lines = [
    metadata.title,
    `Account: ${metadata.accountId}`,
    `Scope: ${metadata.scope}`,
    `Assessment Date: ${metadata.timestamp}`,
    `Assessed By: ${metadata.actor}`,
    '',
    totalsLine(report.counters),
    `Compliance: ${report.percentage}%`,
  ];

  for (const section of report.sections) {
    lines.push('', `== ${section.title} ==`);
    for (const item of section.items) {
      lines.push(`${OUTCOME_LABEL[item.outcome]} ${item.title}`);
    }
  }

  return lines.join('\n') + '\n';
}

export async function writeText(report: FinalizedReport, outDir: string, baseName: string) {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, `${baseName}.txt`);
  await fs.writeFile(file, renderText(report), 'utf8');
  return file;
}
