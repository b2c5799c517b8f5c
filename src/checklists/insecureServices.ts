import { conclude, type Extractor } from '../engine/evidence.js';
import type { AssessmentRun } from '../engine/run.js';
import type { Capability, DetailBlock } from '../types.js';
import { BASELINE_CAPABILITIES, discoverVpcs } from './baseline.js';
import {
  describeRule,
  groupLabel,
  openToInternet,
  parseSecurityGroups,
  portsInRule,
  ruleSources,
  securityGroupsProbe,
  type SecurityGroup,
} from './securityGroups.js';
import type { Checklist, Scope } from './types.js';

export interface ServicePort {
  port: number;
  name: string;
  /** Cleartext services fail outright; the others warn until their controls are confirmed */
  cleartext: boolean;
  guidance: string;
}

export const RISKY_SERVICES: readonly ServicePort[] = [
  { port: 21, name: 'FTP', cleartext: true, guidance: 'Replace FTP with SFTP or FTPS' },
  { port: 23, name: 'Telnet', cleartext: true, guidance: 'Replace Telnet with SSH' },
  { port: 25, name: 'SMTP', cleartext: false, guidance: 'Ensure TLS is in use' },
  { port: 1433, name: 'SQL Server', cleartext: false, guidance: 'Ensure encryption is in use' },
  { port: 3306, name: 'MySQL/MariaDB', cleartext: false, guidance: 'Ensure encryption is in use' },
  { port: 6379, name: 'Redis', cleartext: false, guidance: 'Ensure authentication and encryption are in use' },
  { port: 11211, name: 'Memcached', cleartext: false, guidance: 'Ensure proper security controls are in place' },
  { port: 27017, name: 'MongoDB', cleartext: false, guidance: 'Ensure authentication and encryption are in use' },
];

const CLEARTEXT = RISKY_SERVICES.filter((s) => s.cleartext);
const NEEDS_CONTROLS = RISKY_SERVICES.filter((s) => !s.cleartext);

export const INSECURE_SERVICES_CAPABILITIES: readonly Capability[] = BASELINE_CAPABILITIES.filter((c) =>
  ['get-caller-identity', 'describe-vpcs', 'describe-security-groups'].includes(c.command),
);

const NO_GROUPS = 'No security groups were returned for the assessed VPCs.';

/** One line per group and service the group admits, with the sources it admits it from. */
export function serviceFindings(groups: SecurityGroup[], services: readonly ServicePort[]): string[] {
  const findings: string[] = [];
  for (const group of groups) {
    for (const service of services) {
      const rules = group.IpPermissions.filter((p) => portsInRule(p, [service.port]).length > 0);
      if (rules.length === 0) continue;
      const sources = [...new Set(rules.flatMap(ruleSources))];
      findings.push(
        `${groupLabel(group)}: ${service.name} (port ${service.port}) from ${sources.join(', ') || 'unlisted sources'}`,
      );
    }
  }
  return findings;
}

export const extractCleartextServices: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  if (groups.length === 0) return { evaluation: 'incomplete', details: NO_GROUPS };
  const findings = serviceFindings(groups, CLEARTEXT);
  return conclude(
    findings.length === 0,
    `None of the ${groups.length} security groups allow ${CLEARTEXT.map((s) => s.name).join(' or ')}.`,
    [
      { kind: 'text', text: 'Security groups allow cleartext services:' },
      { kind: 'list', items: findings },
    ],
  );
};

export const extractServiceControls: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  if (groups.length === 0) return { evaluation: 'incomplete', details: NO_GROUPS };

  const blocks = NEEDS_CONTROLS.flatMap((service): DetailBlock[] => {
    const findings = serviceFindings(groups, [service]);
    if (findings.length === 0) return [];
    return [
      { kind: 'text', text: `${service.name}: ${service.guidance}.` },
      { kind: 'list', items: findings },
    ];
  });
  if (blocks.length === 0) {
    return {
      evaluation: 'compliant',
      details: `None of the ${groups.length} security groups allow ${NEEDS_CONTROLS.map((s) => s.name).join(', ')}.`,
    };
  }
  return { evaluation: 'incomplete', details: blocks };
};

function admits(group: SecurityGroup, port: number): boolean {
  return group.IpPermissions.some((p) => portsInRule(p, [port]).length > 0);
}

export const extractHttpWithoutHttps: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  if (groups.length === 0) return { evaluation: 'incomplete', details: NO_GROUPS };
  const plain = groups.filter((g) => admits(g, 80) && !admits(g, 443));
  if (plain.length === 0) {
    return { evaluation: 'compliant', details: 'Every security group that allows HTTP also allows HTTPS.' };
  }
  return {
    evaluation: 'incomplete',
    details: [
      { kind: 'text', text: 'Security groups allow HTTP (port 80) without HTTPS (port 443):' },
      { kind: 'list', items: plain.map(groupLabel) },
    ],
  };
};

export const extractUnrestrictedSources: Extractor = (payload) => {
  const groups = parseSecurityGroups(payload);
  if (groups.length === 0) return { evaluation: 'incomplete', details: NO_GROUPS };
  const findings = groups.flatMap((group) =>
    group.IpPermissions.filter(openToInternet).map((p) => `${groupLabel(group)}: ${describeRule(p)}`),
  );
  return conclude(
    findings.length === 0,
    `None of the ${groups.length} security groups accept traffic from any address.`,
    [
      { kind: 'text', text: 'Rules accepting traffic from any address (0.0.0.0/0 or ::/0):' },
      { kind: 'list', items: findings },
    ],
  );
};

async function assessServices(run: AssessmentRun, scope: Scope): Promise<void> {
  run.openSection('services', 'Insecure Services and Protocols', 'expanded');

  const { filter } = await discoverVpcs(run, 'services', scope);
  const probe = securityGroupsProbe(filter);

  await run.check('services', {
    title: 'Cleartext Services',
    probe,
    extract: extractCleartextServices,
    recommendation: CLEARTEXT.map((s) => `${s.guidance}.`).join(' '),
  });
  await run.check('services', {
    title: 'Database, Cache and Mail Ports',
    probe,
    extract: extractServiceControls,
    recommendation:
      'Confirm each listed service enforces encryption and authentication, and limit its sources to the systems that need it.',
  });
  await run.check('services', {
    title: 'HTTP Without HTTPS',
    probe,
    extract: extractHttpWithoutHttps,
    recommendation: 'Ensure HTTP requests are redirected to HTTPS, or stop accepting port 80.',
  });
  await run.check('services', {
    title: 'Unrestricted Inbound Sources',
    probe,
    extract: extractUnrestrictedSources,
    recommendation: 'Restrict inbound sources to known networks and publish public endpoints through a load balancer.',
  });

  run.manual(
    'services',
    'Business Justification for Allowed Services',
    'Each service and port allowed into the cardholder data environment needs a documented business justification.',
  );

  run.closeSection('services');
}

export const insecureServicesChecklist: Checklist = {
  id: 'insecure-services',
  title: 'Insecure Services Exposure',
  capabilities: INSECURE_SERVICES_CAPABILITIES,
  run: assessServices,
};
