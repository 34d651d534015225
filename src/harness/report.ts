/**
 * Plain-text summaries printed by the CLI.
 */

import { REALIZATION_NAMES } from '../matcher/index.js';
import type { Realization } from '../matcher/types.js';
import type { BatteryResult, FuzzReport } from './types.js';

export const REALIZATION_DESCRIPTIONS: Readonly<Record<Realization, string>> = Object.freeze({
  cursor: 'forward-cursor realization',
  indexed: 'integer-offset realization',
});

export function formatBatteryResult(result: BatteryResult): string {
  return `${result.passed ? 'Passed' : 'Failed'} ${result.title} tests`;
}

/** One line per realization with its cumulative time across `results`, in seconds. */
export function formatTimings(results: readonly BatteryResult[]): string[] {
  const lines: string[] = [];
  for (const realization of REALIZATION_NAMES) {
    let totalMs = 0;
    let seen = false;
    for (const r of results) {
      const ms = r.durations[realization];
      if (ms !== undefined) {
        totalMs += ms;
        seen = true;
      }
    }
    if (seen) {
      const seconds = (totalMs / 1000).toFixed(3);
      lines.push(`${realization} - ${REALIZATION_DESCRIPTIONS[realization]}: ${seconds} seconds`);
    }
  }
  return lines;
}

export function formatFuzzReport(report: FuzzReport): string {
  if (report.divergences.length === 0) {
    return `Passed fuzz cross-check (${report.iterations} cases, seed ${report.seed})`;
  }
  return `Failed fuzz cross-check: ${report.divergences.length} divergences (seed ${report.seed})`;
}
