import 'dotenv/config';

import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import {
  type AnalysisConfig,
  analysisConfigSchema,
  listIssues,
  validateConfigValue,
} from './schema-validator.js';

const log = createLogger('config');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split('.');
  const leaf = parts.pop();
  if (leaf === undefined) return;

  let node = target;
  for (const part of parts) {
    const next = node[part];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[part] = created;
      node = created;
    }
  }
  node[leaf] = value;
}

export class ConfigManager {
  private overrides = new Map<string, unknown>();

  get(key: string): unknown {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride;

    if (this.overrides.has(key)) {
      return this.overrides.get(key);
    }

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) {
      return JSON.parse(def.value);
    }

    throw new ConfigurationError(`Config key not found: ${key}`);
  }

  set(key: string, value: unknown): void {
    const { valid, error } = validateConfigValue(key, value);
    if (!valid) {
      throw new ConfigurationError(`Invalid value for ${key}`, error ? [error] : []);
    }
    this.overrides.set(key, value);
    log.info({ key, value }, 'Config updated');
  }

  reset(key?: string): void {
    if (key) {
      this.overrides.delete(key);
    } else {
      this.overrides.clear();
    }
  }

  getByCategory(category: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      if (def.category === category) {
        result[def.key] = this.get(def.key);
      }
    }
    return result;
  }

  /**
   * Resolve every known key and assemble the nested, validated configuration.
   */
  load(): AnalysisConfig {
    const raw: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      setPath(raw, def.key, this.get(def.key));
    }

    const result = analysisConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError('Invalid configuration', listIssues(result.error));
    }
    return result.data;
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "backtest.feeRate" → "BACKTEST_FEE_RATE"
   *      "indicators.amplitude.maPeriod" → "INDICATORS_AMPLITUDE_MA_PERIOD"
   */
  private configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   */
  private getEnvOverride(key: string): unknown {
    const envValue = process.env[this.configKeyToEnvVar(key)];
    if (envValue === undefined) return undefined;

    try {
      return JSON.parse(envValue);
    } catch {
      return envValue;
    }
  }
}

export const configManager = new ConfigManager();
