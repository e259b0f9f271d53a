/**
 * Runtime configuration with dotenv support
 *
 * Settings come from, in increasing precedence:
 * - built-in defaults (./constants.ts)
 * - environment variables (process.env, or .env / .env.local files)
 * - explicit overrides, typically CLI flags
 *
 * Recognised variables:
 *   MAGDECL_ENDPOINT        calculator URL
 *   MAGDECL_API_KEY         sent as the `key` query parameter
 *   MAGDECL_MODEL           sent as the `model` query parameter
 *   MAGDECL_TIMEOUT_MS      per-request deadline
 *   MAGDECL_MAX_ATTEMPTS    attempts per request (1 = no retry)
 *   MAGDECL_FAILURE_POLICY  continue | fail-fast
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ConfigError } from '../errors/index.js';
import {
  CALCULATOR_DEFAULTS,
  HTTP_DEFAULTS,
  PIPELINE_DEFAULTS,
  type FailurePolicy,
} from './constants.js';

export interface LoadEnvOptions {
  /** Path to .env file (default: .env then .env.local in cwd) */
  envFile?: string;
  /** Base directory for resolving relative paths */
  baseDir?: string;
}

export interface LoadEnvResult {
  /** Whether any .env files were loaded */
  loaded: boolean;
  /** Paths of loaded .env files */
  files: string[];
  /** Number of variables loaded */
  count: number;
}

export interface DeclinationConfig {
  endpoint: string;
  apiKey?: string;
  model?: string;
  timeoutMs: number;
  maxAttempts: number;
  failurePolicy: FailurePolicy;
}

export type Environment = Record<string, string | undefined>;

/**
 * Load environment variables from .env files
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
  const baseDir = options.baseDir || process.cwd();
  const files: string[] = [];
  let totalCount = 0;

  const envFilePaths: string[] = [];

  if (options.envFile) {
    const path = resolve(baseDir, options.envFile);
    if (!existsSync(path)) {
      throw new ConfigError('--env', `Env file not found: ${path}`);
    }
    envFilePaths.push(path);
  } else {
    for (const file of ['.env', '.env.local']) {
      const path = resolve(baseDir, file);
      if (existsSync(path)) {
        envFilePaths.push(path);
      }
    }
  }

  // Later files override earlier ones
  for (const envPath of envFilePaths) {
    const result = dotenvConfig({ path: envPath, override: true });
    if (!result.error && result.parsed) {
      files.push(envPath);
      totalCount += Object.keys(result.parsed).length;
    }
  }

  return {
    loaded: files.length > 0,
    files,
    count: totalCount,
  };
}

/**
 * Parse a count or duration setting. Values are capped at the largest
 * delay setTimeout honours, since the timeout feeds AbortSignal.timeout.
 */
export function parsePositiveInt(setting: string, value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new ConfigError(setting, `${setting} must be a positive integer, got '${value}'`);
  }
  const parsed = Number(value);
  if (parsed > HTTP_DEFAULTS.MAX_TIMER_MS) {
    throw new ConfigError(
      setting,
      `${setting} must be at most ${HTTP_DEFAULTS.MAX_TIMER_MS}, got '${value}'`
    );
  }
  return parsed;
}

export function parseFailurePolicy(setting: string, value: string): FailurePolicy {
  if (value === 'continue' || value === 'fail-fast') {
    return value;
  }
  throw new ConfigError(setting, `${setting} must be 'continue' or 'fail-fast', got '${value}'`);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Resolve the effective configuration from an environment and overrides
 */
export function resolveConfig(
  env: Environment = process.env,
  overrides: Partial<DeclinationConfig> = {}
): DeclinationConfig {
  const timeout = nonEmpty(env.MAGDECL_TIMEOUT_MS);
  const attempts = nonEmpty(env.MAGDECL_MAX_ATTEMPTS);
  const policy = nonEmpty(env.MAGDECL_FAILURE_POLICY);

  const endpoint = overrides.endpoint ?? nonEmpty(env.MAGDECL_ENDPOINT) ?? CALCULATOR_DEFAULTS.ENDPOINT;
  try {
    new URL(endpoint);
  } catch {
    throw new ConfigError('MAGDECL_ENDPOINT', `Invalid endpoint URL: '${endpoint}'`);
  }

  return {
    endpoint,
    apiKey: overrides.apiKey ?? nonEmpty(env.MAGDECL_API_KEY),
    model: overrides.model ?? nonEmpty(env.MAGDECL_MODEL),
    timeoutMs:
      overrides.timeoutMs ??
      (timeout ? parsePositiveInt('MAGDECL_TIMEOUT_MS', timeout) : HTTP_DEFAULTS.TIMEOUT_MS),
    maxAttempts:
      overrides.maxAttempts ??
      (attempts ? parsePositiveInt('MAGDECL_MAX_ATTEMPTS', attempts) : HTTP_DEFAULTS.MAX_ATTEMPTS),
    failurePolicy:
      overrides.failurePolicy ??
      (policy ? parseFailurePolicy('MAGDECL_FAILURE_POLICY', policy) : PIPELINE_DEFAULTS.FAILURE_POLICY),
  };
}
