// src/probes/awsCli.ts
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ErrorCategory, Probe, ProbeResult, ProbeSpec } from '../types.js';
import { logger } from '../logger.js';

export type ExecResult = { stdout: string; stderr: string };
export type Exec = (
  file: string,
  args: string[],
  options: { timeout: number; maxBuffer: number },
) => Promise<ExecResult>;

export type AwsCliOptions = {
  /** CLI binary, e.g. 'aws' */
  bin: string;
  region: string;
  timeoutMs: number;
  /** Process runner; defaults to child_process.execFile */
  exec?: Exec;
};

/** Provider error strings that mean the identity lacks permission. */
export const AUTHORIZATION_MARKERS = [
  'AccessDenied',
  'UnauthorizedOperation',
  'AuthorizationError',
  'UnauthorizedAccess',
  'not authorized',
];

const execFileAsync = promisify(execFile);

const defaultExec: Exec = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    ...options,
    encoding: 'utf8' as const,
  });
  return { stdout, stderr };
};

export function categorizeError(text: string): ErrorCategory {
  return AUTHORIZATION_MARKERS.some((m) => text.includes(m)) ? 'authorization' : 'other';
}

/** Empty output is 'empty'; non-JSON output is passed through as a string payload. */
export function parseOutput(stdout: string): ProbeResult {
  const text = stdout.trim();
  if (!text) return { ok: false, errorCategory: 'empty' };
  try {
    return { ok: true, payload: JSON.parse(text) };
  } catch {
    return { ok: true, payload: text };
  }
}

function failureText(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    if ('killed' in err && err.killed === true) return 'Command timed out';
    if ('stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
      return err.stderr.trim();
    }
  }
  return err instanceof Error ? err.message : String(err);
}

export function buildArgs(spec: ProbeSpec, region: string): string[] {
  return [spec.service, spec.command, ...(spec.args ?? []), '--region', region, '--output', 'json'];
}

/**
 * Probe backed by the AWS command line. Non-zero exits become structured
 * failures; the returned promise only rejects if the runner itself misbehaves.
 */
export function createAwsCliProbe(options: AwsCliOptions): Probe {
  const exec = options.exec ?? defaultExec;

  return async (spec) => {
    const args = buildArgs(spec, options.region);
    try {
      const { stdout } = await exec(options.bin, args, {
        timeout: options.timeoutMs,
        maxBuffer: 32 * 1024 * 1024,
      });
      return parseOutput(stdout);
    } catch (err) {
      const error = failureText(err);
      const errorCategory = categorizeError(error);
      logger.debug(`Probe error (${errorCategory}): ${spec.service} ${spec.command}`, { error });
      return { ok: false, errorCategory, error };
    }
  };
}
