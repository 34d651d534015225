/**
 * Harness: loads the configured batteries, runs them in order, then the
 * optional fuzz cross-check.
 */

import type { Config } from '../config.js';
import { RunContext } from '../context.js';
import { ConfigError } from '../errors.js';
import { ContextLogger, type LoggerOptions } from '../observability/context-logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { BatteryLoader } from './battery-loader.js';
import { crossCheck } from './fuzz.js';
import { runBattery } from './runner.js';
import type { BatteryResult, FuzzReport, HarnessReport } from './types.js';

export interface HarnessOptions {
  context?: RunContext;
  logOptions?: LoggerOptions;
  metrics?: MetricsCollector;
  loader?: BatteryLoader;
  /** Called as each battery finishes, before the next one loads. */
  onBattery?: (result: BatteryResult) => void;
}

/**
 * `harness.repetitions` keyed by battery name. Names are read whole, not as
 * dot-paths, so a battery named `v1.2` finds its own entry.
 */
function repetitionOverrides(config: Config): Map<string, number> {
  const raw = config.get('harness.repetitions', {});
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Config key 'harness.repetitions' must be a mapping, got ${JSON.stringify(raw)}`);
  }
  const out = new Map<string, number>();
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== 'number') {
      throw new ConfigError(
        `Config key 'harness.repetitions' entry '${name}' must be a number, got ${JSON.stringify(value)}`,
      );
    }
    out.set(name, value);
  }
  return out;
}

export function runHarness(config: Config, options: HarnessOptions = {}): HarnessReport {
  const context = options.context ?? RunContext.create();
  const loader = options.loader ?? new BatteryLoader(config);
  const logger = ContextLogger.fromContext(context, 'wildmatch.harness', options.logOptions);

  const names = config.getStringList('harness.batteries', ['tame', 'empty', 'wild']);
  logger.debug('Harness run started', { batteries: names.join(','), dir: loader.dir });

  const overrides = repetitionOverrides(config);
  const batteries: BatteryResult[] = [];
  for (const name of names) {
    const battery = loader.load(name);
    const repetitions = overrides.get(name) ?? battery.repetitions;

    const result = runBattery(battery, {
      repetitions,
      metrics: options.metrics,
      logger: ContextLogger.fromContext(context.child(name), 'wildmatch.runner', options.logOptions),
    });
    batteries.push(result);
    options.onBattery?.(result);
  }

  let fuzz: FuzzReport | null = null;
  const iterations = config.getNumber('fuzz.iterations', 0);
  if (iterations > 0) {
    fuzz = crossCheck({
      iterations,
      maxLength: config.getNumber('fuzz.max_length', 60),
      alphabet: config.getString('fuzz.alphabet', 'abc*?'),
      seed: config.getNumber('fuzz.seed', 1),
      logger,
    });
  }

  return { runId: context.runId, batteries, fuzz };
}
