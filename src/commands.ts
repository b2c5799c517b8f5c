import type { Writable } from 'stream';
import { CHECKLISTS, parseVpcList, type Checklist } from './checklists/index.js';
import { validateConfig, type AppConfig } from './config.js';
import { ConfigError } from './engine/errors.js';
import { runAssessment } from './index.js';
import { createAwsCliProbe } from './probes/awsCli.js';
import type { Prompter } from './prompt.js';
import { writeSummary, renderSummaryText } from './reporters/summary.js';
import { renderText } from './reporters/text.js';
import { summarize } from './summary.js';
import type { Probe } from './types.js';

export type AssessArgs = {
  checklist: string;
  region?: string;
  vpcs?: string;
  out?: string;
  /** Answer the gate prompt with yes */
  yes: boolean;
  threshold?: number;
};

export type SummarizeArgs = {
  dir?: string;
  out?: string;
};

export interface CommandDeps {
  config: AppConfig;
  /** Created on first use, closed when the command ends */
  prompter: () => Prompter;
  probe?: (region: string) => Probe;
  stdout?: Writable;
}

export async function assessCommand(args: AssessArgs, deps: CommandDeps): Promise<number> {
  const checklist: Checklist | undefined = CHECKLISTS[args.checklist];
  if (!checklist) {
    throw new ConfigError([
      `Unknown checklist "${args.checklist}" (available: ${Object.keys(CHECKLISTS).join(', ')})`,
    ]);
  }

  const session: { prompter?: Prompter } = {};
  const prompts = () => (session.prompter ??= deps.prompter());

  try {
    const region =
      args.region ?? (await prompts().ask('Enter AWS region to test', deps.config.defaultRegion));
    const vpcs =
      args.vpcs ??
      (await prompts().ask("Enter CDE VPC IDs (comma-separated or 'all' for all VPCs)", 'all'));

    const config: AppConfig = {
      ...deps.config,
      defaultRegion: region,
      gateThreshold: args.threshold ?? deps.config.gateThreshold,
      outputDir: args.out ?? deps.config.outputDir,
    };
    validateConfig(config);

    const probe =
      deps.probe?.(region) ??
      createAwsCliProbe({ bin: config.awsCli, region, timeoutMs: config.probeTimeoutMs });

    const outcome = await runAssessment(checklist, {
      scope: { region, vpcs: parseVpcList(vpcs) },
      probe,
      threshold: config.gateThreshold,
      confirm: args.yes ? async () => true : (question) => prompts().confirm(question),
      outputDir: config.outputDir,
    });

    (deps.stdout ?? process.stdout).write(renderText(outcome.report));
    return outcome.exitCode;
  } finally {
    session.prompter?.close();
  }
}

export async function summarizeCommand(args: SummarizeArgs, deps: CommandDeps): Promise<number> {
  const dir = args.dir ?? deps.config.outputDir;
  const summary = await summarize(dir);
  await writeSummary(summary, args.out ?? dir);
  (deps.stdout ?? process.stdout).write(renderSummaryText(summary));
  return 0;
}
