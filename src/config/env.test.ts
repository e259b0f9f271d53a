import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { loadEnv, resolveConfig, parseFailurePolicy } from './env.js';
import { ConfigError } from '../errors/index.js';

describe('resolveConfig', () => {
  it('falls back to defaults with an empty environment', () => {
    expect(resolveConfig({})).toEqual({
      endpoint: 'https://www.ngdc.noaa.gov/geomag-web/calculators/calculateDeclination',
      apiKey: undefined,
      model: undefined,
      timeoutMs: 30000,
      maxAttempts: 1,
      failurePolicy: 'continue',
    });
  });

  it('reads MAGDECL_* variables', () => {
    const config = resolveConfig({
      MAGDECL_ENDPOINT: 'https://calc.example.com/decl',
      MAGDECL_API_KEY: 'test-key',
      MAGDECL_MODEL: 'IGRF',
      MAGDECL_TIMEOUT_MS: '5000',
      MAGDECL_MAX_ATTEMPTS: '3',
      MAGDECL_FAILURE_POLICY: 'fail-fast',
    });

    expect(config).toEqual({
      endpoint: 'https://calc.example.com/decl',
      apiKey: 'test-key',
      model: 'IGRF',
      timeoutMs: 5000,
      maxAttempts: 3,
      failurePolicy: 'fail-fast',
    });
  });

  it('treats blank variables as unset', () => {
    const config = resolveConfig({ MAGDECL_API_KEY: '  ', MAGDECL_TIMEOUT_MS: '' });

    expect(config.apiKey).toBeUndefined();
    expect(config.timeoutMs).toBe(30000);
  });

  it('lets overrides win over the environment', () => {
    const config = resolveConfig(
      { MAGDECL_TIMEOUT_MS: '5000', MAGDECL_FAILURE_POLICY: 'fail-fast' },
      { timeoutMs: 100, failurePolicy: 'continue' }
    );

    expect(config.timeoutMs).toBe(100);
    expect(config.failurePolicy).toBe('continue');
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => resolveConfig({ MAGDECL_TIMEOUT_MS: 'soon' })).toThrow(
      "MAGDECL_TIMEOUT_MS must be a positive integer, got 'soon'"
    );
  });

  it('rejects a timeout beyond the timer limit', () => {
    expect(() => resolveConfig({ MAGDECL_TIMEOUT_MS: '2147483648' })).toThrow(
      "MAGDECL_TIMEOUT_MS must be at most 2147483647, got '2147483648'"
    );
    expect(resolveConfig({ MAGDECL_TIMEOUT_MS: '2147483647' }).timeoutMs).toBe(2147483647);
  });

  it('rejects zero attempts', () => {
    expect(() => resolveConfig({ MAGDECL_MAX_ATTEMPTS: '0' })).toThrow(ConfigError);
  });

  it('rejects an invalid endpoint', () => {
    expect(() => resolveConfig({ MAGDECL_ENDPOINT: 'not a url' })).toThrow(
      "Invalid endpoint URL: 'not a url'"
    );
  });
});

describe('parseFailurePolicy', () => {
  it('accepts the two policies', () => {
    expect(parseFailurePolicy('--policy', 'continue')).toBe('continue');
    expect(parseFailurePolicy('--policy', 'fail-fast')).toBe('fail-fast');
  });

  it('rejects anything else', () => {
    expect(() => parseFailurePolicy('MAGDECL_FAILURE_POLICY', 'retry')).toThrow(
      "MAGDECL_FAILURE_POLICY must be 'continue' or 'fail-fast', got 'retry'"
    );
  });
});

describe('loadEnv', () => {
  const TEST_DIR = '.magdecl-test-env';
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    process.env = originalEnv;
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it('loads nothing when no .env files exist', () => {
    expect(loadEnv({ baseDir: TEST_DIR })).toEqual({ loaded: false, files: [], count: 0 });
  });

  it('loads .env then .env.local with later files overriding', () => {
    writeFileSync(join(TEST_DIR, '.env'), 'MAGDECL_MODEL=WMM\nMAGDECL_TIMEOUT_MS=1000\n');
    writeFileSync(join(TEST_DIR, '.env.local'), 'MAGDECL_MODEL=IGRF\n');

    const result = loadEnv({ baseDir: TEST_DIR });

    expect(result.loaded).toBe(true);
    expect(result.files).toHaveLength(2);
    expect(result.count).toBe(3);
    expect(process.env.MAGDECL_MODEL).toBe('IGRF');
    expect(process.env.MAGDECL_TIMEOUT_MS).toBe('1000');
  });

  it('loads an explicit env file', () => {
    writeFileSync(join(TEST_DIR, 'production.env'), 'MAGDECL_API_KEY=test-key\n');

    const result = loadEnv({ baseDir: TEST_DIR, envFile: 'production.env' });

    expect(result.count).toBe(1);
    expect(process.env.MAGDECL_API_KEY).toBe('test-key');
  });

  it('throws ConfigError for a missing explicit env file', () => {
    expect(() => loadEnv({ baseDir: TEST_DIR, envFile: 'missing.env' })).toThrow(ConfigError);
  });
});
