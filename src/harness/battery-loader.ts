/**
 * BatteryLoader: reads YAML case batteries and validates them with TypeBox.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Value, type ValueError } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import type { Config } from '../config.js';
import { BatteryNotFoundError, BatteryParseError, BatteryValidationError } from '../errors.js';
import { BatteryFileSchema, type Battery, type BatteryFile, type MatchCase } from './types.js';

/** Batteries shipped with the package; resolves the same from src/ and dist/. */
export const SHIPPED_BATTERIES_DIR = fileURLToPath(new URL('../../batteries', import.meta.url));

const BATTERY_SUFFIX = '.battery.yaml';

export class BatteryLoader {
  private _dir: string;
  private _cache: Map<string, Battery> = new Map();

  constructor(config: Config, dir?: string | null) {
    const configured = config.get('harness.batteries_dir', null);
    if (dir != null) {
      this._dir = resolve(dir);
    } else if (typeof configured === 'string') {
      this._dir = resolve(configured);
    } else {
      this._dir = SHIPPED_BATTERIES_DIR;
    }
  }

  get dir(): string {
    return this._dir;
  }

  /** Names of every battery file in the directory, sorted. */
  list(): string[] {
    if (!existsSync(this._dir)) return [];
    return readdirSync(this._dir)
      .filter((f) => f.endsWith(BATTERY_SUFFIX))
      .map((f) => f.slice(0, -BATTERY_SUFFIX.length))
      .sort();
  }

  load(name: string): Battery {
    const cached = this._cache.get(name);
    if (cached) return cached;

    const filePath = join(this._dir, name + BATTERY_SUFFIX);
    if (!existsSync(filePath)) {
      throw new BatteryNotFoundError(name, filePath);
    }

    let data: unknown;
    try {
      data = yaml.load(readFileSync(filePath, 'utf-8'));
    } catch (e) {
      throw new BatteryParseError(filePath, `YAML parse error: ${e}`, {
        cause: e instanceof Error ? e : undefined,
      });
    }

    if (data === null || data === undefined) {
      throw new BatteryParseError(filePath, 'File is empty');
    }

    if (!Value.Check(BatteryFileSchema, data)) {
      const errors = [...Value.Errors(BatteryFileSchema, data)].map(errorToDetail);
      throw new BatteryValidationError(filePath, errors);
    }

    const battery = normalizeBattery(data);
    this._cache.set(name, battery);
    return battery;
  }

  loadAll(names: readonly string[]): Battery[] {
    return names.map((name) => this.load(name));
  }
}

export function normalizeBattery(file: BatteryFile): Battery {
  const cases: MatchCase[] = file.cases.map((entry) => {
    if (Array.isArray(entry)) {
      const [subject, pattern, expected] = entry;
      return { subject, pattern, expected, note: null };
    }
    return {
      subject: entry.subject,
      pattern: entry.pattern,
      expected: entry.expected,
      note: entry.note ?? null,
    };
  });

  return {
    name: file.name,
    title: file.title,
    repetitions: file.repetitions ?? 1,
    elements: file.elements ?? 'units',
    cases,
  };
}

function errorToDetail(error: ValueError): Record<string, unknown> {
  return {
    path: error.path || '/',
    message: error.message,
    actual: error.value,
  };
}
