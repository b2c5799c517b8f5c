import dotenv from 'dotenv';
import { ConfigError } from './engine/errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

// Load environment variables
dotenv.config();

export interface AppConfig {
  outputDir: string;
  /** Minimum capability availability (percent) before the operator is asked to confirm */
  gateThreshold: number;
  defaultRegion: string;
  awsCli: string;
  probeTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  outputDir: './reports',
  gateThreshold: 70,
  defaultRegion: 'us-east-1',
  awsCli: 'aws',
  probeTimeoutMs: 30_000,
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function envStr(env: Env, key: string, fallback: string): string {
  const val = env[key];
  return val === undefined || val.trim() === '' ? fallback : val.trim();
}

function envInt(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  const parsed = Number(val);
  return Number.isInteger(parsed) ? parsed : fallback;
}

/**
 * Reads configuration from the environment. Missing or non-numeric values
 * fall back to the defaults; out-of-range values are caught by validateConfig.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const level = env.POSTURE_LOG_LEVEL;
  return {
    outputDir: envStr(env, 'POSTURE_OUTPUT_DIR', DEFAULT_CONFIG.outputDir),
    gateThreshold: envInt(env, 'POSTURE_GATE_THRESHOLD', DEFAULT_CONFIG.gateThreshold),
    defaultRegion: envStr(env, 'POSTURE_DEFAULT_REGION', DEFAULT_CONFIG.defaultRegion),
    awsCli: envStr(env, 'POSTURE_AWS_CLI', DEFAULT_CONFIG.awsCli),
    probeTimeoutMs: envInt(env, 'POSTURE_PROBE_TIMEOUT_MS', DEFAULT_CONFIG.probeTimeoutMs),
    logLevel: isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Validate config invariants at startup.
 * Throws rather than running an assessment with a meaningless threshold.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  // NaN slips past the range comparisons
  if (!Number.isFinite(config.gateThreshold) || config.gateThreshold < 0 || config.gateThreshold > 100) {
    errors.push(`gateThreshold must be within 0..100 (got ${config.gateThreshold})`);
  }
  if (!Number.isFinite(config.probeTimeoutMs) || config.probeTimeoutMs <= 0) {
    errors.push(`probeTimeoutMs must be positive (got ${config.probeTimeoutMs})`);
  }
  if (!/^[a-z]{2}(-gov)?-[a-z]+-\d$/.test(config.defaultRegion)) {
    errors.push(`defaultRegion "${config.defaultRegion}" is not a region name`);
  }

  if (errors.length) throw new ConfigError(errors);
}
