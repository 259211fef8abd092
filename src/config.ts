import 'dotenv/config';
import path from 'path';
import {
  DEFAULT_SCAN_TIMESTAMP_FORMATS,
  GROUP_KEY_POLICIES,
} from './inventory/types';
import type { InventoryOptions } from './inventory/types';

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Env helpers
// ---------------------------------------------------------------------------

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing required environment variable: ${name}`);
  return value;
}

function optionalEnv(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = optionalEnv(env, name);
  if (raw === null) return fallback;
  const found = allowed.find((candidate) => candidate === raw);
  if (!found) {
    throw new Error(`Invalid ${name} '${raw}': expected one of ${allowed.join(', ')}`);
  }
  return found;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = optionalEnv(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} '${raw}': expected a positive integer`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Shared settings
// ---------------------------------------------------------------------------

export const DEFAULT_DATABASE_PATH = path.join(__dirname, '..', 'inventory-reconciler.db');

export function loadInventoryOptions(env: Env = process.env): InventoryOptions {
  const formats = optionalEnv(env, 'SCAN_TIMESTAMP_FORMATS');
  return {
    timestampFormats: formats
      ? formats.split(',').map((f) => f.trim()).filter((f) => f !== '')
      : DEFAULT_SCAN_TIMESTAMP_FORMATS,
    groupKeyPolicy: oneOf(env, 'GROUP_KEY_POLICY', GROUP_KEY_POLICIES, 'exact'),
  };
}

// ---------------------------------------------------------------------------
// HTTP service
// ---------------------------------------------------------------------------

export interface ServerConfig {
  port: number;
  logLevel: string;
  apiKey: string;
  databasePath: string;
  bodyLimit: number;
  ssl: { certPath: string; keyPath: string } | null;
  inventory: InventoryOptions;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const certPath = optionalEnv(env, 'SSL_CERT_PATH');
  const keyPath = optionalEnv(env, 'SSL_KEY_PATH');
  if ((certPath === null) !== (keyPath === null)) {
    throw new Error('SSL_CERT_PATH and SSL_KEY_PATH must be set together');
  }

  return {
    port: positiveInt(env, 'PORT', 3000),
    logLevel: optionalEnv(env, 'LOG_LEVEL') ?? 'info',
    apiKey: requireEnv(env, 'API_KEY'),
    databasePath: optionalEnv(env, 'DATABASE_PATH') ?? DEFAULT_DATABASE_PATH,
    bodyLimit: positiveInt(env, 'BODY_LIMIT_BYTES', 10 * 1024 * 1024),
    ssl: certPath && keyPath ? { certPath, keyPath } : null,
    inventory: loadInventoryOptions(env),
  };
}

// ---------------------------------------------------------------------------
// Batch job
// ---------------------------------------------------------------------------

export type JobMode = 'latest' | 'reconcile' | 'full';

export const JOB_MODES: readonly JobMode[] = ['latest', 'reconcile', 'full'];

/** Scan report → latest-per-workstation table. */
export interface LatestJobConfig {
  mode: 'latest';
  scanReportPath: string;
  latestOutputPath: string;
}

/** Existing reference table + roster → matched / unmatched tables. */
export interface ReconcileJobConfig {
  mode: 'reconcile';
  referencePath: string;
  rosterPath: string;
  matchedOutputPath: string;
  unmatchedOutputPath: string;
}

/** Scan report → latest table → reconciled against the roster. */
export interface FullJobConfig {
  mode: 'full';
  scanReportPath: string;
  rosterPath: string;
  latestOutputPath: string | null;
  matchedOutputPath: string;
  unmatchedOutputPath: string;
}

export type JobConfig = LatestJobConfig | ReconcileJobConfig | FullJobConfig;

export interface BatchConfig {
  logLevel: string;
  databasePath: string;
  job: JobConfig;
  inventory: InventoryOptions;
}

export function loadJobConfig(env: Env = process.env): JobConfig {
  const mode = oneOf(env, 'INVENTORY_MODE', JOB_MODES, 'full');

  switch (mode) {
    case 'latest':
      return {
        mode,
        scanReportPath: requireEnv(env, 'SCAN_REPORT_PATH'),
        latestOutputPath: requireEnv(env, 'LATEST_OUTPUT_PATH'),
      };
    case 'reconcile':
      return {
        mode,
        referencePath: requireEnv(env, 'REFERENCE_PATH'),
        rosterPath: requireEnv(env, 'ROSTER_PATH'),
        matchedOutputPath: requireEnv(env, 'MATCHED_OUTPUT_PATH'),
        unmatchedOutputPath: requireEnv(env, 'UNMATCHED_OUTPUT_PATH'),
      };
    case 'full':
      return {
        mode,
        scanReportPath: requireEnv(env, 'SCAN_REPORT_PATH'),
        rosterPath: requireEnv(env, 'ROSTER_PATH'),
        latestOutputPath: optionalEnv(env, 'LATEST_OUTPUT_PATH'),
        matchedOutputPath: requireEnv(env, 'MATCHED_OUTPUT_PATH'),
        unmatchedOutputPath: requireEnv(env, 'UNMATCHED_OUTPUT_PATH'),
      };
  }
}

export function loadBatchConfig(env: Env = process.env): BatchConfig {
  return {
    logLevel: optionalEnv(env, 'LOG_LEVEL') ?? 'info',
    databasePath: optionalEnv(env, 'DATABASE_PATH') ?? DEFAULT_DATABASE_PATH,
    job: loadJobConfig(env),
    inventory: loadInventoryOptions(env),
  };
}
