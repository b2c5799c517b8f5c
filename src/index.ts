import { describeScope, resolveIdentity, type Checklist, type Scope } from './checklists/index.js';
import { PermissionGate, type Confirm, type GateResult } from './engine/gate.js';
import { AssessmentRun } from './engine/run.js';
import { logger } from './logger.js';
import { reportBaseName, writeReportFiles, type ReportFiles } from './reporters/index.js';
import type { FinalizedReport, Probe, ReportMetadata } from './types.js';

export type AssessOptions = {
  scope: Scope;
  probe: Probe;
  confirm: Confirm;
  /** Gate threshold in percent */
  threshold: number;
  /** Where report files go; omit to skip writing them */
  outputDir?: string;
  clock?: () => Date;
};

export type AssessmentOutcome = {
  report: FinalizedReport;
  gate: GateResult;
  files?: ReportFiles;
  /** 1 when the operator aborted at the gate */
  exitCode: 0 | 1;
};

/** Programmatic API */
export async function runAssessment(
  checklist: Checklist,
  options: AssessOptions,
): Promise<AssessmentOutcome> {
  const clock = options.clock ?? (() => new Date());
  const started = clock();

  const identity = await resolveIdentity(options.probe);
  const metadata: ReportMetadata = {
    title: `Posture Assessment: ${checklist.title}`,
    accountId: identity.accountId,
    scope: describeScope(options.scope),
    timestamp: started.toISOString(),
    actor: identity.actor,
  };
  logger.info(`Assessing ${metadata.scope} as ${metadata.actor}`);

  const run = new AssessmentRun(metadata, options.probe, clock);
  const gate = await new PermissionGate(run, checklist.capabilities, {
    threshold: options.threshold,
    confirm: options.confirm,
  }).execute();

  if (gate.state === 'continue') {
    // The gate's probes must not count towards compliance
    run.resetCounters();
    await checklist.run(run, options.scope);
  } else {
    logger.warn('Assessment aborted at the permission gate');
  }

  const report = run.finalize();
  logger.info(`Compliance: ${report.percentage}%`, { counters: report.counters });

  let files: ReportFiles | undefined;
  if (options.outputDir) {
    files = await writeReportFiles(report, options.outputDir, reportBaseName(checklist.id, started));
    logger.info(`Report written to ${files.html}`);
  }

  return { report, gate, files, exitCode: gate.state === 'aborted' ? 1 : 0 };
}

export {
  CHECKLISTS,
  baselineChecklist,
  insecureServicesChecklist,
  describeScope,
  parseVpcList,
} from './checklists/index.js';
export type { Checklist, Scope } from './checklists/index.js';
export { AssessmentRun, MANUAL_GUIDANCE, MANUAL_FOLLOW_UP } from './engine/run.js';
export type { CheckSpec, CheckResult } from './engine/run.js';
export { PermissionGate } from './engine/gate.js';
export type { Confirm, GateResult } from './engine/gate.js';
export { ReportBuilder } from './engine/report.js';
export { Verdict, classify, basisOf } from './engine/classifier.js';
export { Aggregator } from './engine/aggregator.js';
export { conclude, parsePayload } from './engine/evidence.js';
export type { Evidence, Extractor } from './engine/evidence.js';
export * from './engine/errors.js';
export { createAwsCliProbe } from './probes/awsCli.js';
export { renderHtml, renderText, renderJson } from './reporters/index.js';
export { summarize } from './summary.js';
export type { ExecutiveSummary } from './summary.js';
export { percentage, availability, statusLabel } from './utils/scoring.js';
export * from './types.js';
