/**
 * Runs a case battery through one or more matcher realizations.
 */

import { InvalidOptionError } from '../errors.js';
import { REALIZATIONS, REALIZATION_NAMES } from '../matcher/index.js';
import type { CharSequence, Realization } from '../matcher/types.js';
import type { ContextLogger } from '../observability/context-logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import type { Battery, BatteryResult, CaseFailure, ElementMode } from './types.js';

export interface RunOptions {
  realizations?: readonly Realization[];
  /** Overrides the battery's own repetition count. */
  repetitions?: number;
  metrics?: MetricsCollector;
  logger?: ContextLogger;
}

interface PreparedCase {
  subject: string;
  pattern: string;
  subjectSeq: CharSequence;
  patternSeq: CharSequence;
  expected: boolean;
  note: string | null;
}

function toSequence(text: string, mode: ElementMode): CharSequence {
  return mode === 'codepoints' ? Array.from(text) : text;
}

export function validateRepetitions(value: number, option: string = 'repetitions'): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidOptionError(option, `expected an integer >= 1, got ${value}`);
  }
  return value;
}

export function runBattery(battery: Battery, options: RunOptions = {}): BatteryResult {
  const realizations = options.realizations ?? REALIZATION_NAMES;
  const repetitions = validateRepetitions(options.repetitions ?? battery.repetitions);

  // Sequences are split up front so the timed loop only calls the matcher.
  const prepared: PreparedCase[] = battery.cases.map((c) => ({
    subject: c.subject,
    pattern: c.pattern,
    subjectSeq: toSequence(c.subject, battery.elements),
    patternSeq: toSequence(c.pattern, battery.elements),
    expected: c.expected,
    note: c.note,
  }));

  const failures: CaseFailure[] = [];
  const durations: Partial<Record<Realization, number>> = {};

  for (const realization of realizations) {
    const match = REALIZATIONS[realization];
    let realizationFailures = 0;

    const start = performance.now();
    for (const c of prepared) {
      const actual = match(c.patternSeq, c.subjectSeq);
      if (actual !== c.expected) {
        realizationFailures++;
        failures.push({
          subject: c.subject,
          pattern: c.pattern,
          expected: c.expected,
          actual,
          realization,
          note: c.note,
        });
      }
    }
    // The matcher is pure, so later passes only add to the timing.
    for (let rep = 1; rep < repetitions; rep++) {
      for (const c of prepared) {
        match(c.patternSeq, c.subjectSeq);
      }
    }
    const elapsedMs = performance.now() - start;
    durations[realization] = elapsedMs;

    options.metrics?.incrementCalls(realization, prepared.length * repetitions);
    options.metrics?.observeDuration(battery.name, realization, elapsedMs / 1000);
    if (realizationFailures > 0) {
      options.metrics?.incrementFailures(battery.name, realization, realizationFailures);
    }
    options.logger?.debug('Battery pass finished', {
      battery: battery.name,
      realization,
      cases: prepared.length,
      repetitions,
      failures: realizationFailures,
      duration_ms: elapsedMs,
    });
  }

  for (const f of failures) {
    options.logger?.warn('Case failed', {
      battery: battery.name,
      realization: f.realization,
      subject: f.subject,
      pattern: f.pattern,
      expected: f.expected,
      note: f.note,
    });
  }

  return {
    name: battery.name,
    title: battery.title,
    passed: failures.length === 0,
    cases: prepared.length,
    repetitions,
    failures,
    durations,
  };
}
