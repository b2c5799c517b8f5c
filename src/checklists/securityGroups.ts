import { z } from 'zod';
import { parsePayload } from '../engine/evidence.js';
import type { ProbeSpec } from '../types.js';

const PermissionSchema = z.object({
  IpProtocol: z.string(),
  FromPort: z.number().optional(),
  ToPort: z.number().optional(),
  IpRanges: z.array(z.object({ CidrIp: z.string() })).optional(),
  Ipv6Ranges: z.array(z.object({ CidrIpv6: z.string() })).optional(),
  UserIdGroupPairs: z.array(z.object({ GroupId: z.string().optional() })).optional(),
});

const SecurityGroupsSchema = z.object({
  SecurityGroups: z.array(
    z.object({
      GroupId: z.string(),
      GroupName: z.string(),
      VpcId: z.string().optional(),
      IpPermissions: z.array(PermissionSchema).default([]),
    }),
  ),
});

export type IpPermission = z.infer<typeof PermissionSchema>;
export type SecurityGroup = z.infer<typeof SecurityGroupsSchema>['SecurityGroups'][number];

export function parseSecurityGroups(payload: unknown): SecurityGroup[] {
  return parsePayload(SecurityGroupsSchema, payload, 'ec2 describe-security-groups').SecurityGroups;
}

/** describe-security-groups narrowed to the given VPCs (none means the whole region). */
export function securityGroupsProbe(vpcs: readonly string[], filters: string[] = []): ProbeSpec {
  const all = vpcs.length > 0 ? [`Name=vpc-id,Values=${vpcs.join(',')}`, ...filters] : filters;
  return {
    service: 'ec2',
    command: 'describe-security-groups',
    args: all.length > 0 ? ['--filters', ...all] : [],
  };
}

export function openToInternet(permission: IpPermission): boolean {
  return (
    (permission.IpRanges ?? []).some((r) => r.CidrIp === '0.0.0.0/0') ||
    (permission.Ipv6Ranges ?? []).some((r) => r.CidrIpv6 === '::/0')
  );
}

/** Which of the given ports a rule admits, from any source. */
export function portsInRule(permission: IpPermission, ports: readonly number[]): number[] {
  if (permission.IpProtocol === '-1') return [...ports];
  if (!['tcp', 'udp', '6', '17'].includes(permission.IpProtocol)) return [];
  const from = permission.FromPort ?? 0;
  const to = permission.ToPort ?? 65535;
  return ports.filter((p) => p >= from && p <= to);
}

/** Which of the given ports a rule exposes to any address. */
export function exposedPorts(permission: IpPermission, ports: readonly number[]): number[] {
  return openToInternet(permission) ? portsInRule(permission, ports) : [];
}

/** CIDR blocks and referenced groups a rule admits traffic from. */
export function ruleSources(permission: IpPermission): string[] {
  return [
    ...(permission.IpRanges ?? []).map((r) => r.CidrIp),
    ...(permission.Ipv6Ranges ?? []).map((r) => r.CidrIpv6),
    ...(permission.UserIdGroupPairs ?? []).flatMap((p) => (p.GroupId ? [p.GroupId] : [])),
  ];
}

/** e.g. "tcp 22", "tcp 8000-8080", "all traffic" */
export function describeRule(permission: IpPermission): string {
  if (permission.IpProtocol === '-1') return 'all traffic';
  const { FromPort: from, ToPort: to } = permission;
  if (from === undefined || from === -1) return permission.IpProtocol;
  return from === to || to === undefined
    ? `${permission.IpProtocol} ${from}`
    : `${permission.IpProtocol} ${from}-${to}`;
}

export const groupLabel = (group: SecurityGroup) => `${group.GroupId} (${group.GroupName})`;
