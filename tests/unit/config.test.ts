import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigError, loadConfig } from '@/core/config';
import { DEFAULT_POLICY } from '@/valuation/policy';

let tempDir: string;

function writeConfig(file: string, content: unknown) {
  const configDir = join(tempDir, 'config');
  mkdirSync(configDir, { recursive: true });
  writeFileSync(
    join(configDir, file),
    typeof content === 'string' ? content : JSON.stringify(content)
  );
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'dcf-config-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('falls back to defaults when no config files exist', () => {
    const config = loadConfig(tempDir);

    expect(config.cacheTtl).toEqual({ overview_ttl_hours: 24, statements_ttl_hours: 24 });
    expect(config.policy).toEqual(DEFAULT_POLICY);
    expect(config.projectRoot).toBe(tempDir);
  });

  it('reads cache TTLs and ignores invalid entries', () => {
    writeConfig('cache_ttl.json', { overview_ttl_hours: 6, statements_ttl_hours: -1 });

    expect(loadConfig(tempDir).cacheTtl).toEqual({
      overview_ttl_hours: 6,
      statements_ttl_hours: 24,
    });
  });

  it('merges policy overrides over the defaults', () => {
    writeConfig('valuation_policy.json', { riskFreeRate: 0.045, projectionYears: 7 });

    const { policy } = loadConfig(tempDir);

    expect(policy.riskFreeRate).toBe(0.045);
    expect(policy.projectionYears).toBe(7);
    expect(policy.marketRiskPremium).toBe(DEFAULT_POLICY.marketRiskPremium);
  });

  it('rejects unknown policy keys', () => {
    writeConfig('valuation_policy.json', { riskFreeRat: 0.05 });

    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });

  it('rejects a WACC floor above the ceiling', () => {
    writeConfig('valuation_policy.json', { waccFloor: 0.2, waccCeiling: 0.1 });

    expect(() => loadConfig(tempDir)).toThrow('waccFloor 0.2 exceeds waccCeiling 0.1');
  });

  it('reports unreadable JSON with the file path', () => {
    writeConfig('cache_ttl.json', '{ not json');

    try {
      loadConfig(tempDir);
      expect.fail('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.file).toBe(join(tempDir, 'config', 'cache_ttl.json'));
      }
    }
  });

  it('loads the shipped project configuration', () => {
    const config = loadConfig();

    expect(config.policy).toEqual(DEFAULT_POLICY);
    expect(config.cacheTtl.overview_ttl_hours).toBeGreaterThan(0);
  });
});
