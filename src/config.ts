/**
 * Configuration accessor with dot-path key support, plus YAML loading.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export const DEFAULT_CONFIG: Readonly<Record<string, unknown>> = Object.freeze({
  harness: {
    batteries_dir: null,
    batteries: ['tame', 'empty', 'wild'],
    repetitions: {},
    timing: false,
  },
  fuzz: {
    iterations: 0,
    max_length: 60,
    alphabet: 'abc*?',
    seed: 1,
  },
  logging: {
    level: 'warn',
    format: 'text',
  },
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    if (isPlainObject(value)) {
      out[key] = deepMerge(isPlainObject(current) ? current : {}, value);
    } else {
      out[key] = Array.isArray(value) ? [...value] : value;
    }
  }
  return out;
}

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isPlainObject(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key, defaultValue);
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigError(`Config key '${key}' must be a number, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key, defaultValue);
    if (typeof value !== 'string') {
      throw new ConfigError(`Config key '${key}' must be a string, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key, defaultValue);
    if (typeof value !== 'boolean') {
      throw new ConfigError(`Config key '${key}' must be a boolean, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  getStringList(key: string, defaultValue: string[]): string[] {
    const value = this.get(key, defaultValue);
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      throw new ConfigError(`Config key '${key}' must be a list of strings, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  /** Returns a new Config with `overrides` deep-merged over this one. */
  with(overrides: Record<string, unknown>): Config {
    return new Config(deepMerge(this._data, overrides));
  }
}

/**
 * Load a YAML config file over DEFAULT_CONFIG. Without a path, the defaults
 * alone are returned.
 */
export function loadConfig(path?: string | null): Config {
  const defaults = new Config(deepMerge({}, DEFAULT_CONFIG));
  if (path == null) return defaults;

  const filePath = resolve(path);
  if (!existsSync(filePath)) {
    throw new ConfigNotFoundError(filePath);
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in config '${filePath}': ${e}`, {
      cause: e instanceof Error ? e : undefined,
    });
  }

  if (data === null || data === undefined) return defaults;
  if (!isPlainObject(data)) {
    throw new ConfigError(`Config file '${filePath}' must contain a mapping at the top level`);
  }
  return defaults.with(data);
}
