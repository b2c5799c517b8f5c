import { describe, expect, it } from 'vitest';
import {
  extractCleartextServices,
  extractHttpWithoutHttps,
  extractServiceControls,
  extractUnrestrictedSources,
  insecureServicesChecklist,
  RISKY_SERVICES,
  serviceFindings,
} from '../src/checklists/insecureServices.js';
import { runAssessment } from '../src/index.js';
import { fakeProbe, fixedClock, HEALTHY } from './fixtures.js';

const groups = {
  SecurityGroups: [
    {
      GroupId: 'sg-1',
      GroupName: 'legacy',
      IpPermissions: [
        { IpProtocol: 'tcp', FromPort: 21, ToPort: 23, IpRanges: [{ CidrIp: '10.0.0.0/8' }] },
        { IpProtocol: 'tcp', FromPort: 23, ToPort: 23, UserIdGroupPairs: [{ GroupId: 'sg-9' }] },
      ],
    },
    {
      GroupId: 'sg-2',
      GroupName: 'db',
      IpPermissions: [
        { IpProtocol: 'tcp', FromPort: 3306, ToPort: 3306, IpRanges: [{ CidrIp: '10.0.1.0/24' }] },
        { IpProtocol: 'tcp', FromPort: 80, ToPort: 80, IpRanges: [{ CidrIp: '0.0.0.0/0' }] },
      ],
    },
  ],
};

const quiet = { SecurityGroups: [{ GroupId: 'sg-3', GroupName: 'app', IpPermissions: [] }] };

describe('serviceFindings', () => {
  it('names each service a group admits with its sources', () => {
    const allTraffic = {
      GroupId: 'sg-4',
      GroupName: 'open',
      IpPermissions: [{ IpProtocol: '-1', UserIdGroupPairs: [{ GroupId: 'sg-4' }] }],
    };
    expect(serviceFindings([allTraffic], RISKY_SERVICES.slice(0, 2))).toEqual([
      'sg-4 (open): FTP (port 21) from sg-4',
      'sg-4 (open): Telnet (port 23) from sg-4',
    ]);
  });
});

describe('extractCleartextServices', () => {
  it('fails on FTP and Telnet from any source', () => {
    expect(extractCleartextServices(groups)).toEqual({
      evaluation: 'non-compliant',
      details: [
        { kind: 'text', text: 'Security groups allow cleartext services:' },
        {
          kind: 'list',
          items: ['sg-1 (legacy): FTP (port 21) from 10.0.0.0/8', 'sg-1 (legacy): Telnet (port 23) from 10.0.0.0/8, sg-9'],
        },
      ],
    });
  });

  it('passes when neither is allowed', () => {
    expect(extractCleartextServices(quiet)).toEqual({
      evaluation: 'compliant',
      details: 'None of the 1 security groups allow FTP or Telnet.',
    });
  });
});

describe('extractServiceControls', () => {
  it('asks for confirmation of controls on database ports', () => {
    expect(extractServiceControls(groups)).toEqual({
      evaluation: 'incomplete',
      details: [
        { kind: 'text', text: 'MySQL/MariaDB: Ensure encryption is in use.' },
        { kind: 'list', items: ['sg-2 (db): MySQL/MariaDB (port 3306) from 10.0.1.0/24'] },
      ],
    });
  });

  it('passes when none of the services are allowed', () => {
    expect(extractServiceControls(quiet).evaluation).toBe('compliant');
  });
});

describe('extractHttpWithoutHttps', () => {
  it('lists groups that allow port 80 but not 443', () => {
    expect(extractHttpWithoutHttps(groups)).toEqual({
      evaluation: 'incomplete',
      details: [
        { kind: 'text', text: 'Security groups allow HTTP (port 80) without HTTPS (port 443):' },
        { kind: 'list', items: ['sg-2 (db)'] },
      ],
    });
  });
});

describe('extractUnrestrictedSources', () => {
  it('lists every rule open to any address', () => {
    expect(extractUnrestrictedSources(groups)).toEqual({
      evaluation: 'non-compliant',
      details: [
        { kind: 'text', text: 'Rules accepting traffic from any address (0.0.0.0/0 or ::/0):' },
        { kind: 'list', items: ['sg-2 (db): tcp 80'] },
      ],
    });
  });

  it('is incomplete without security groups', () => {
    for (const extract of [
      extractCleartextServices,
      extractServiceControls,
      extractHttpWithoutHttps,
      extractUnrestrictedSources,
    ]) {
      expect(extract({ SecurityGroups: [] }).evaluation).toBe('incomplete');
    }
  });
});

describe('insecureServicesChecklist', () => {
  it('gates on three capabilities and runs the services section', async () => {
    const probe = fakeProbe(HEALTHY);
    const outcome = await runAssessment(insecureServicesChecklist, {
      scope: { region: 'us-east-1', vpcs: 'all' },
      probe,
      confirm: async () => true,
      threshold: 70,
      clock: fixedClock,
    });

    expect(outcome.gate.availablePercentage).toBe(100);
    expect(outcome.report.metadata.title).toBe('Posture Assessment: Insecure Services Exposure');
    expect(outcome.report.sections.map((s) => s.id)).toEqual(['permissions', 'services']);
    expect(outcome.report.sections[1]?.items.map((i) => `${i.outcome} ${i.title}`)).toEqual([
      'info CDE VPC Identification',
      'pass Cleartext Services',
      'pass Database, Cache and Mail Ports',
      'pass HTTP Without HTTPS',
      'fail Unrestricted Inbound Sources',
      'warning Business Justification for Allowed Services',
    ]);
    expect(outcome.report.counters).toEqual({
      total: 5,
      passed: 3,
      failed: 1,
      warning: 1,
      info: 0,
      accessDenied: 0,
    });
    expect(outcome.report.percentage).toBe(75);
    expect(probe.calls.filter((c) => c.command === 'describe-security-groups')).toHaveLength(5);
  });
});
