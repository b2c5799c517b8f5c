import { promises as fs } from 'fs';
import { emptyCounters } from './engine/aggregator.js';
import { errorText } from './engine/errors.js';
import { logger } from './logger.js';
import { ReportSchema, type StoredReport } from './schema.js';
import type { Counters } from './types.js';
import { findFiles, rel } from './utils/files.js';
import { percentage, statusLabel, type ComplianceStatus } from './utils/scoring.js';

export const FAILED_ITEMS_PER_REPORT = 3;

export interface ReportDigest {
  /** Path relative to the summarized directory */
  file: string;
  title: string;
  accountId: string;
  scope: string;
  timestamp: string;
  counters: Counters;
  percentage: number;
  status: ComplianceStatus;
  /** Titles of the first failed items, in report order */
  failedItems: string[];
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ExecutiveSummary {
  generatedAt: string;
  reports: ReportDigest[];
  skipped: SkippedFile[];
  counters: Counters;
  percentage: number;
  status: ComplianceStatus;
}

export function digest(file: string, report: StoredReport): ReportDigest {
  const failed = report.sections
    .flatMap((s) => s.items)
    .filter((i) => i.outcome === 'fail')
    .map((i) => i.title);
  const pct = percentage(report.counters);
  return {
    file,
    title: report.metadata.title,
    accountId: report.metadata.accountId,
    scope: report.metadata.scope,
    timestamp: report.metadata.timestamp,
    counters: { ...report.counters },
    percentage: pct,
    status: statusLabel(pct),
    failedItems: failed.slice(0, FAILED_ITEMS_PER_REPORT),
  };
}

export function consolidate(
  reports: ReportDigest[],
  skipped: SkippedFile[],
  generatedAt: string,
): ExecutiveSummary {
  const counters = emptyCounters();
  for (const r of reports) {
    counters.total += r.counters.total;
    counters.passed += r.counters.passed;
    counters.failed += r.counters.failed;
    counters.warning += r.counters.warning;
    counters.info += r.counters.info;
    counters.accessDenied += r.counters.accessDenied;
  }
  const pct = percentage(counters);
  return { generatedAt, reports, skipped, counters, percentage: pct, status: statusLabel(pct) };
}

async function readReport(file: string): Promise<StoredReport> {
  const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
  const parsed = ReportSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
    throw new Error(`not a posture report (${where})`);
  }
  return parsed.data;
}

/**
 * Consolidate every JSON report under `dir`. Files that are not reports are
 * listed in `skipped` rather than failing the summary.
 */
export async function summarize(
  dir: string,
  clock: () => Date = () => new Date(),
): Promise<ExecutiveSummary> {
  const files = await findFiles(dir, ['**/*.json']);
  logger.info(`Summarizing ${files.length} JSON file(s) under ${dir}`);

  const reports: ReportDigest[] = [];
  const skipped: SkippedFile[] = [];
  for (const file of files) {
    const name = rel(dir, file);
    try {
      reports.push(digest(name, await readReport(file)));
    } catch (err) {
      logger.warn(`Skipping ${name}`, { reason: errorText(err) });
      skipped.push({ file: name, reason: errorText(err) });
    }
  }

  return consolidate(reports, skipped, clock().toISOString());
}
