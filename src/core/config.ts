/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { resolvePolicy, type ValuationPolicy } from '@/valuation/policy';
import { validatePolicy } from '@/validation/ajv_instance';

export interface CacheTtlConfig {
  overview_ttl_hours: number;
  statements_ttl_hours: number;
}

export interface AppConfig {
  cacheTtl: CacheTtlConfig;
  policy: ValuationPolicy;
  projectRoot: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly errors: string[] = []
  ) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_CACHE_TTL: CacheTtlConfig = {
  overview_ttl_hours: 24,
  statements_ttl_hours: 24,
};

let cachedConfig: AppConfig | null = null;

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read ${path}`, path, [reason]);
  }
}

function normalizeCacheTtl(raw: unknown): CacheTtlConfig {
  const parsed = new Map<string, unknown>(
    raw && typeof raw === 'object' ? Object.entries(raw) : []
  );
  const hours = (key: keyof CacheTtlConfig): number => {
    const value = parsed.get(key);
    return typeof value === 'number' && Number.isFinite(value) && value >= 0
      ? value
      : DEFAULT_CACHE_TTL[key];
  };

  return {
    overview_ttl_hours: hours('overview_ttl_hours'),
    statements_ttl_hours: hours('statements_ttl_hours'),
  };
}

function loadPolicy(path: string): ValuationPolicy {
  if (!existsSync(path)) return resolvePolicy();

  const result = validatePolicy(readJson(path));
  if (!result.valid) {
    throw new ConfigError('Invalid valuation policy', path, result.errors);
  }

  const policy = resolvePolicy(result.data);
  if (policy.waccFloor > policy.waccCeiling) {
    throw new ConfigError('Invalid valuation policy', path, [
      `waccFloor ${policy.waccFloor} exceeds waccCeiling ${policy.waccCeiling}`,
    ]);
  }
  return policy;
}

export function loadConfig(projectRoot: string = process.cwd()): AppConfig {
  const configPath = join(projectRoot, 'config');

  const cacheTtlPath = join(configPath, 'cache_ttl.json');
  const cacheTtl = existsSync(cacheTtlPath)
    ? normalizeCacheTtl(readJson(cacheTtlPath))
    : { ...DEFAULT_CACHE_TTL };

  return {
    cacheTtl,
    policy: loadPolicy(join(configPath, 'valuation_policy.json')),
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
