import { z } from 'zod';
import { conclude, parsePayload, type Extractor } from '../engine/evidence.js';
import type { AssessmentRun } from '../engine/run.js';
import type { Capability } from '../types.js';
import { hasAccount } from './identity.js';
import { exposedPorts, groupLabel, parseSecurityGroups, securityGroupsProbe } from './securityGroups.js';
import type { Checklist, Scope } from './types.js';

export const ADMIN_PORTS = [22, 3389] as const;
export const MIN_LOG_RETENTION_DAYS = 365;
export const MIN_PASSWORD_LENGTH = 12;
export const MAX_PASSWORD_AGE_DAYS = 90;

export const BASELINE_CAPABILITIES: readonly Capability[] = [
  {
    service: 'sts',
    command: 'get-caller-identity',
    description: 'Caller identity',
    evaluate: (payload) => (hasAccount(payload) ? 'compliant' : 'non-compliant'),
  },
  { service: 'ec2', command: 'describe-vpcs', args: ['--max-items', '1'], description: 'VPC inventory' },
  { service: 'ec2', command: 'describe-subnets', args: ['--max-items', '1'], description: 'Subnet inventory' },
  {
    service: 'ec2',
    command: 'describe-security-groups',
    args: ['--max-items', '1'],
    description: 'Security group rules',
  },
  { service: 'ec2', command: 'describe-network-acls', args: ['--max-items', '1'], description: 'Network ACLs' },
  { service: 'ec2', command: 'describe-flow-logs', args: ['--max-items', '1'], description: 'VPC flow logs' },
  { service: 'cloudtrail', command: 'describe-trails', description: 'Audit trails' },
  { service: 'guardduty', command: 'list-detectors', args: ['--max-items', '1'], description: 'Threat detection' },
  { service: 'iam', command: 'get-account-password-policy', description: 'Password policy' },
  { service: 'iam', command: 'get-account-summary', description: 'Account summary' },
  { service: 'logs', command: 'describe-log-groups', args: ['--max-items', '1'], description: 'Log groups' },
  { service: 'cloudwatch', command: 'describe-alarms', args: ['--max-items', '1'], description: 'Alarms' },
];

// ---------------------------------------------------------------------------
// Payload shapes (only the fields the checks read)
// ---------------------------------------------------------------------------

const VpcsSchema = z.object({
  Vpcs: z.array(
    z.object({
      VpcId: z.string(),
      CidrBlock: z.string().optional(),
      IsDefault: z.boolean().optional(),
    }),
  ),
});

const FlowLogsSchema = z.object({
  FlowLogs: z.array(
    z.object({
      FlowLogId: z.string(),
      ResourceId: z.string().optional(),
      FlowLogStatus: z.string().optional(),
      TrafficType: z.string().optional(),
    }),
  ),
});

const TrailsSchema = z.object({
  trailList: z.array(
    z.object({
      Name: z.string(),
      HomeRegion: z.string().optional(),
      IsMultiRegionTrail: z.boolean().optional(),
      LogFileValidationEnabled: z.boolean().optional(),
    }),
  ),
});

const DetectorsSchema = z.object({ DetectorIds: z.array(z.string()) });

const LogGroupsSchema = z.object({
  logGroups: z.array(
    z.object({
      logGroupName: z.string(),
      retentionInDays: z.number().optional(),
    }),
  ),
});

const PasswordPolicySchema = z.object({
  PasswordPolicy: z.object({
    MinimumPasswordLength: z.number().optional(),
    RequireUppercaseCharacters: z.boolean().optional(),
    RequireLowercaseCharacters: z.boolean().optional(),
    RequireNumbers: z.boolean().optional(),
    RequireSymbols: z.boolean().optional(),
    MaxPasswordAge: z.number().optional(),
    PasswordReusePrevention: z.number().optional(),
  }),
});

const AccountSummarySchema = z.object({ SummaryMap: z.record(z.number()) });

export type PasswordPolicy = z.infer<typeof PasswordPolicySchema>['PasswordPolicy'];

// ---------------------------------------------------------------------------
// Extractors
// ---------------------------------------------------------------------------

/** Discovered VPCs, narrowed to the operator's scope. Facts are the in-scope ids. */
export function extractVpcs(scope: Scope): Extractor<string[]> {
  return (payload) => {
    const { Vpcs } = parsePayload(VpcsSchema, payload, 'ec2 describe-vpcs');
    const found = Vpcs.map((v) => v.VpcId);

    if (found.length === 0) {
      return {
        evaluation: 'incomplete',
        details: `No VPCs were found in ${scope.region}.`,
        recommendation: 'Confirm the region that hosts the cardholder data environment.',
        facts: [],
      };
    }

    if (scope.vpcs === 'all') {
      return {
        evaluation: 'compliant',
        details: [
          { kind: 'text', text: `All ${found.length} VPCs will be assessed:` },
          {
            kind: 'list',
            items: Vpcs.map((v) => (v.CidrBlock ? `${v.VpcId} (${v.CidrBlock})` : v.VpcId)),
          },
          {
            kind: 'text',
            text: 'Identify which of these VPCs belong to the cardholder data environment for a narrower assessment.',
          },
        ],
        facts: found,
      };
    }

    const inScope = scope.vpcs.filter((id) => found.includes(id));
    const missing = scope.vpcs.filter((id) => !found.includes(id));
    if (missing.length > 0) {
      return {
        evaluation: 'incomplete',
        details: [
          { kind: 'text', text: 'Some requested VPCs do not exist in this region:' },
          { kind: 'list', items: missing },
        ],
        recommendation: 'Check the VPC ids given for the cardholder data environment.',
        facts: inScope,
      };
    }

    return {
      evaluation: 'compliant',
      details: [
        { kind: 'text', text: `Assessment will be performed on ${inScope.length} specified VPCs:` },
        { kind: 'list', items: inScope },
      ],
      facts: inScope,
    };
  };
}

export function extractFlowLogs(vpcId: string): Extractor {
  return (payload) => {
    const { FlowLogs } = parsePayload(FlowLogsSchema, payload, 'ec2 describe-flow-logs');
    const active = FlowLogs.filter((f) => f.FlowLogStatus === 'ACTIVE');
    return conclude(
      active.length > 0,
      `${vpcId} has ${active.length} active flow log(s).`,
      `${vpcId} has no active flow logs.`,
    );
  };
}

export const extractAdminExposure: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  if (groups.length === 0) {
    return { evaluation: 'incomplete', details: 'No security groups were returned for the assessed VPCs.' };
  }
  const findings: string[] = [];
  for (const group of groups) {
    const ports = new Set<number>();
    for (const permission of group.IpPermissions) {
      for (const port of exposedPorts(permission, ADMIN_PORTS)) ports.add(port);
    }
    if (ports.size > 0) {
      const list = [...ports].sort((a, b) => a - b).join(', ');
      findings.push(`${groupLabel(group)}: port ${list} open to the internet`);
    }
  }

  if (findings.length === 0) {
    return {
      evaluation: 'compliant',
      details: `None of the ${groups.length} security groups expose administrative ports to the internet.`,
    };
  }
  return {
    evaluation: 'non-compliant',
    details: [
      { kind: 'text', text: 'Security groups allow administrative access from any address:' },
      { kind: 'list', items: findings },
    ],
  };
};

export const extractDefaultGroups: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  const defaults = groups.filter((g) => g.GroupName === 'default');
  if (defaults.length === 0) {
    return { evaluation: 'incomplete', details: 'No default security groups were returned.' };
  }
  const permissive = defaults.filter((g) => g.IpPermissions.length > 0);
  return conclude(
    permissive.length === 0,
    `All ${defaults.length} default security groups deny inbound traffic.`,
    [
      { kind: 'text', text: 'Default security groups with inbound rules:' },
      { kind: 'list', items: permissive.map((g) => `${g.GroupId}${g.VpcId ? ` in ${g.VpcId}` : ''}`) },
    ],
  );
};

export const extractTrails: Extractor = (payload) => {
  const { trailList } = parsePayload(TrailsSchema, payload, 'cloudtrail describe-trails');
  if (trailList.length === 0) {
    return {
      evaluation: 'non-compliant',
      details: 'No CloudTrail trails are configured.',
      recommendation: 'Create a multi-region trail with log file validation enabled.',
    };
  }

  const multiRegion = trailList.filter((t) => t.IsMultiRegionTrail === true);
  if (multiRegion.length === 0) {
    return {
      evaluation: 'non-compliant',
      details: [
        { kind: 'text', text: 'No trail covers every region:' },
        { kind: 'list', items: trailList.map((t) => t.Name) },
      ],
      recommendation: 'Convert an existing trail to multi-region or create a new multi-region trail.',
    };
  }

  const validated = multiRegion.filter((t) => t.LogFileValidationEnabled === true);
  if (validated.length === 0) {
    return {
      evaluation: 'non-compliant',
      details: [
        { kind: 'text', text: 'Multi-region trails without log file validation:' },
        { kind: 'list', items: multiRegion.map((t) => t.Name) },
      ],
      recommendation: 'Enable log file validation so tampering with audit logs can be detected.',
    };
  }

  return {
    evaluation: 'compliant',
    details: [
      { kind: 'text', text: 'Multi-region trails with log file validation:' },
      { kind: 'list', items: validated.map((t) => t.Name) },
    ],
  };
};

export const extractDetectors: Extractor = (payload) => {
  const { DetectorIds } = parsePayload(DetectorsSchema, payload, 'guardduty list-detectors');
  return conclude(
    DetectorIds.length > 0,
    `GuardDuty is enabled (${DetectorIds.length} detector(s)).`,
    'GuardDuty is not enabled in this region.',
  );
};

export const extractLogRetention: Extractor = (payload) => {
  const { logGroups } = parsePayload(LogGroupsSchema, payload, 'logs describe-log-groups');
  if (logGroups.length === 0) {
    return { evaluation: 'incomplete', details: 'No CloudWatch log groups were found.' };
  }
  // No retentionInDays means logs never expire
  const short = logGroups.filter(
    (g) => g.retentionInDays !== undefined && g.retentionInDays < MIN_LOG_RETENTION_DAYS,
  );
  return conclude(
    short.length === 0,
    `All ${logGroups.length} log groups retain events for at least ${MIN_LOG_RETENTION_DAYS} days.`,
    [
      { kind: 'text', text: `Log groups retained for less than ${MIN_LOG_RETENTION_DAYS} days:` },
      { kind: 'list', items: short.map((g) => `${g.logGroupName} (${g.retentionInDays ?? 0} days)`) },
    ],
  );
};

export function passwordPolicyGaps(policy: PasswordPolicy): string[] {
  const gaps: string[] = [];
  const length = policy.MinimumPasswordLength ?? 0;
  if (length < MIN_PASSWORD_LENGTH) {
    gaps.push(`Minimum length is ${length}; at least ${MIN_PASSWORD_LENGTH} is required`);
  }
  if (!policy.RequireNumbers) gaps.push('Numeric characters are not required');
  if (!policy.RequireUppercaseCharacters && !policy.RequireLowercaseCharacters) {
    gaps.push('Alphabetic characters are not required');
  }
  if (policy.MaxPasswordAge === undefined || policy.MaxPasswordAge > MAX_PASSWORD_AGE_DAYS) {
    gaps.push(`Passwords do not expire within ${MAX_PASSWORD_AGE_DAYS} days`);
  }
  if ((policy.PasswordReusePrevention ?? 0) < 4) {
    gaps.push('Reuse of the last 4 passwords is not prevented');
  }
  return gaps;
}

export const extractPasswordPolicy: Extractor = (payload) => {
  const { PasswordPolicy } = parsePayload(PasswordPolicySchema, payload, 'iam get-account-password-policy');
  const gaps = passwordPolicyGaps(PasswordPolicy);
  return conclude(gaps.length === 0, 'The account password policy meets the baseline.', [
    { kind: 'text', text: 'The account password policy falls short of the baseline:' },
    { kind: 'list', items: gaps },
  ]);
};

export const extractRootMfa: Extractor = (payload) => {
  const { SummaryMap } = parsePayload(AccountSummarySchema, payload, 'iam get-account-summary');
  const flag = SummaryMap['AccountMFAEnabled'];
  if (flag === undefined) {
    return { evaluation: 'incomplete', details: 'The account summary does not report root MFA status.' };
  }
  return conclude(flag === 1, 'MFA is enabled for the root user.', 'MFA is not enabled for the root user.');
};

// ---------------------------------------------------------------------------
// Checklist
// ---------------------------------------------------------------------------

export type DiscoveredScope = {
  /** VPC ids for security group filters; empty means the whole region */
  filter: string[];
  /** VPCs that per-VPC checks run against */
  vpcs: string[];
};

/** Records the in-scope VPCs as an uncounted item at the top of the section. */
export async function discoverVpcs(
  run: AssessmentRun,
  sectionId: string,
  scope: Scope,
): Promise<DiscoveredScope> {
  const discovery = await run.check(sectionId, {
    title: 'CDE VPC Identification',
    probe: { service: 'ec2', command: 'describe-vpcs' },
    extract: extractVpcs(scope),
    informational: true,
    counted: false,
    recommendation: 'Check the assessment identity can describe VPCs in this region.',
  });
  // Named VPCs keep the security group filter whatever discovery found
  const filter = scope.vpcs === 'all' ? [] : scope.vpcs;
  return { filter, vpcs: discovery.facts ?? filter };
}

async function assessNetwork(run: AssessmentRun, scope: Scope): Promise<void> {
  run.openSection('network', 'Network Security Controls');

  const { filter, vpcs } = await discoverVpcs(run, 'network', scope);

  for (const vpcId of vpcs) {
    await run.check('network', {
      title: `VPC Flow Logs: ${vpcId}`,
      probe: {
        service: 'ec2',
        command: 'describe-flow-logs',
        args: ['--filter', `Name=resource-id,Values=${vpcId}`],
      },
      extract: extractFlowLogs(vpcId),
      recommendation: `Enable VPC flow logs for ${vpcId} and deliver them to a protected destination.`,
    });
  }

  await run.check('network', {
    title: 'Administrative Ports Exposed to the Internet',
    probe: securityGroupsProbe(filter),
    extract: extractAdminExposure,
    recommendation: `Restrict inbound ${ADMIN_PORTS.join('/')} to known management networks or use a bastion.`,
  });

  await run.check('network', {
    title: 'Default Security Groups Restrict All Traffic',
    probe: securityGroupsProbe(filter, ['Name=group-name,Values=default']),
    extract: extractDefaultGroups,
    recommendation: 'Remove all inbound rules from default security groups.',
  });

  run.closeSection('network');
}

async function assessLogging(run: AssessmentRun): Promise<void> {
  run.openSection('logging', 'Logging and Monitoring');

  await run.check('logging', {
    title: 'Multi-Region Audit Trail',
    probe: { service: 'cloudtrail', command: 'describe-trails' },
    extract: extractTrails,
  });
  await run.check('logging', {
    title: 'Threat Detection',
    probe: { service: 'guardduty', command: 'list-detectors' },
    extract: extractDetectors,
    recommendation: 'Enable GuardDuty in every region that hosts in-scope resources.',
  });
  await run.check('logging', {
    title: 'Audit Log Retention',
    probe: { service: 'logs', command: 'describe-log-groups' },
    extract: extractLogRetention,
    recommendation: `Set log group retention to at least ${MIN_LOG_RETENTION_DAYS} days.`,
  });

  run.closeSection('logging');
}

async function assessAccess(run: AssessmentRun): Promise<void> {
  run.openSection('access', 'Identity and Access');

  await run.check('access', {
    title: 'Account Password Policy',
    probe: { service: 'iam', command: 'get-account-password-policy' },
    extract: extractPasswordPolicy,
    recommendation: 'Update the account password policy to meet the baseline requirements.',
  });
  await run.check('access', {
    title: 'Root User MFA',
    probe: { service: 'iam', command: 'get-account-summary' },
    extract: extractRootMfa,
    recommendation: 'Enable hardware or virtual MFA for the root user.',
  });

  run.closeSection('access');
}

function assessDocumentation(run: AssessmentRun): void {
  run.openSection('documentation', 'Policies and Procedures');

  run.manual(
    'documentation',
    'Network Diagram',
    'A current network diagram must show every connection into and out of the cardholder data environment.',
    'Obtain the latest network diagram and confirm it matches the discovered VPCs.',
  );
  run.manual(
    'documentation',
    'Security Group Review Cadence',
    'Network security control rulesets must be reviewed at least every six months.',
  );
  run.manual(
    'documentation',
    'Log Review Process',
    'Audit logs of in-scope components must be reviewed at least daily.',
    'Confirm a documented log review process exists and is followed.',
  );

  run.closeSection('documentation');
}

export const baselineChecklist: Checklist = {
  id: 'baseline',
  title: 'Network and Logging Baseline',
  capabilities: BASELINE_CAPABILITIES,
  async run(run, scope) {
    await assessNetwork(run, scope);
    await assessLogging(run);
    await assessAccess(run);
    assessDocumentation(run);
  },
};
