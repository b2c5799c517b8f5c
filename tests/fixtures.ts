import { Verdict, type ClassifierInput } from '../src/engine/classifier.js';
import { AssessmentRun } from '../src/engine/run.js';
import type {
  Capability,
  DisplayState,
  FinalizedReport,
  Outcome,
  Probe,
  ProbeResult,
  ProbeSpec,
  ReportMetadata,
  RichText,
} from '../src/types.js';

export const FIXED_NOW = new Date('2025-03-01T14:05:02.000Z');
export const fixedClock = () => FIXED_NOW;

export const METADATA: ReportMetadata = {
  title: 'Posture Assessment: Test',
  accountId: '111122223333',
  scope: 'us-east-1 (all VPCs)',
  timestamp: FIXED_NOW.toISOString(),
  actor: 'arn:aws:iam::111122223333:user/tester',
};

export const ok = (payload: unknown = {}): ProbeResult => ({ ok: true, payload });

export const denied = (command = 'DescribeVpcs'): ProbeResult => ({
  ok: false,
  errorCategory: 'authorization',
  error: `An error occurred (AccessDenied) when calling the ${command} operation`,
});

export const failed = (error: string): ProbeResult => ({ ok: false, errorCategory: 'other', error });

export const key = (spec: ProbeSpec) => `${spec.service} ${spec.command}`;

type Response = ProbeResult | Error | ((spec: ProbeSpec) => ProbeResult);

/**
 * In-process probe keyed by "service command". Unknown calls are denied.
 * Every call is recorded in `calls`.
 */
export function fakeProbe(responses: Record<string, Response>, fallback: ProbeResult = denied()) {
  const calls: ProbeSpec[] = [];
  const probe: Probe = async (spec) => {
    calls.push(spec);
    const response = responses[key(spec)];
    if (response === undefined) return fallback;
    if (response instanceof Error) throw response;
    return typeof response === 'function' ? response(spec) : response;
  };
  return Object.assign(probe, { calls });
}

/** n capabilities named svc cmd-0 .. cmd-(n-1) */
export function capabilities(n: number): Capability[] {
  return Array.from({ length: n }, (_, i) => ({
    service: 'svc',
    command: `cmd-${i}`,
    description: `Capability ${i}`,
  }));
}

export const INPUT_FOR: Record<Outcome, ClassifierInput> = {
  pass: { probe: { ok: true }, evaluation: 'compliant' },
  fail: { probe: { ok: true }, evaluation: 'non-compliant' },
  warning: { manual: true },
  info: { probe: { ok: true }, evaluation: 'compliant', informational: true },
  'access-denied': { probe: { ok: false, errorCategory: 'authorization' } },
};

export const verdictFor = (outcome: Outcome) => Verdict.of(INPUT_FOR[outcome]);

/** Responses for an account that meets the whole baseline. */
export const HEALTHY: Record<string, ProbeResult> = {
  'sts get-caller-identity': ok({
    UserId: 'AIDATEST',
    Account: '111122223333',
    Arn: 'arn:aws:iam::111122223333:user/tester',
  }),
  'ec2 describe-vpcs': ok({ Vpcs: [{ VpcId: 'vpc-1' }, { VpcId: 'vpc-2' }] }),
  'ec2 describe-subnets': ok({ Subnets: [] }),
  'ec2 describe-network-acls': ok({ NetworkAcls: [] }),
  'ec2 describe-security-groups': ok({
    SecurityGroups: [
      { GroupId: 'sg-1', GroupName: 'default', VpcId: 'vpc-1', IpPermissions: [] },
      {
        GroupId: 'sg-2',
        GroupName: 'web',
        IpPermissions: [{ IpProtocol: 'tcp', FromPort: 443, ToPort: 443, IpRanges: [{ CidrIp: '0.0.0.0/0' }] }],
      },
    ],
  }),
  'ec2 describe-flow-logs': ok({ FlowLogs: [{ FlowLogId: 'fl-1', FlowLogStatus: 'ACTIVE' }] }),
  'cloudtrail describe-trails': ok({
    trailList: [{ Name: 'org', IsMultiRegionTrail: true, LogFileValidationEnabled: true }],
  }),
  'guardduty list-detectors': ok({ DetectorIds: ['det-1'] }),
  'iam get-account-password-policy': ok({
    PasswordPolicy: {
      MinimumPasswordLength: 14,
      RequireLowercaseCharacters: true,
      RequireNumbers: true,
      MaxPasswordAge: 90,
      PasswordReusePrevention: 24,
    },
  }),
  'iam get-account-summary': ok({ SummaryMap: { AccountMFAEnabled: 1 } }),
  'logs describe-log-groups': ok({ logGroups: [{ logGroupName: '/audit', retentionInDays: 400 }] }),
  'cloudwatch describe-alarms': ok({ MetricAlarms: [] }),
};

export type ItemSpec = { title: string; outcome: Outcome; details?: RichText; recommendation?: string };
export type SectionSpec = { id: string; title: string; display?: DisplayState; items: ItemSpec[] };

/** A finalized report recorded through a run, so counters match the items. */
export function buildReport(sections: SectionSpec[], metadata: ReportMetadata = METADATA): FinalizedReport {
  const run = new AssessmentRun(metadata, fakeProbe({}), fixedClock);
  for (const section of sections) {
    run.openSection(section.id, section.title, section.display);
    for (const item of section.items) {
      run.record(section.id, verdictFor(item.outcome), {
        title: item.title,
        details: item.details ?? '',
        recommendation: item.recommendation,
      });
    }
  }
  return run.finalize();
}
