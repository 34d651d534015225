/**
 * wildmatch CLI
 *
 * Commands:
 *   run [flags]                 Run the case batteries (default)
 *   match <pattern> <subject>   Print whether one pair matches
 *   help                        Show usage
 *
 * Pass/fail is reported on stdout only; test failures still exit 0.
 */

import { loadConfig } from './config.js';
import { RunContext } from './context.js';
import { InvalidOptionError, WildmatchError } from './errors.js';
import { formatBatteryResult, formatFuzzReport, formatTimings } from './harness/report.js';
import { runHarness } from './harness/harness.js';
import { REALIZATIONS, isRealization } from './matcher/index.js';
import {
  ContextLogger,
  isLogLevel,
  type LogFormat,
  type LoggerOptions,
  type WritableOutput,
} from './observability/context-logger.js';
import { MetricsCollector } from './observability/metrics.js';

export interface CliIO {
  /** One line of report output (stdout). */
  out(line: string): void;
  /** Log sink (stderr). */
  err: WritableOutput;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: { write: (s) => console.error(s.replace(/\n$/, '')) },
};

export const USAGE = `Usage:
  wildmatch [run] [--config path] [--batteries a,b] [--reps N] [--fuzz N]
                  [--seed N] [--timing] [--metrics] [--log-level lvl] [--log-format json|text]
  wildmatch match <pattern> <subject> [--realization cursor|indexed]
  wildmatch help`;

export interface ParsedArgs {
  command: string;
  flags: Record<string, string>;
  positional: string[];
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  let start = 0;
  let command = 'run';
  if (args.length > 0 && !args[0].startsWith('--')) {
    command = args[0];
    start = 1;
  }

  const flags: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = start; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      flags[key] = next !== undefined && !next.startsWith('--') ? args[++i] : 'true';
    } else {
      positional.push(arg);
    }
  }
  return { command, flags, positional };
}

function parseCount(flag: string, value: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new InvalidOptionError(`--${flag}`, `expected an integer >= ${min}, got '${value}'`);
  }
  return n;
}

function parseLogFormat(value: string): LogFormat {
  if (value === 'json' || value === 'text') return value;
  throw new InvalidOptionError('logging.format', `expected 'json' or 'text', got '${value}'`);
}

/** Translate run flags into config overrides. */
export function flagsToOverrides(flags: Record<string, string>, batteryNames: readonly string[]): Record<string, unknown> {
  const harness: Record<string, unknown> = {};
  const fuzz: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  let names = batteryNames;
  if (flags['batteries'] !== undefined) {
    names = flags['batteries'].split(',').map((s) => s.trim()).filter((s) => s.length > 0);
    harness['batteries'] = names;
  }
  if (flags['reps'] !== undefined) {
    const reps = parseCount('reps', flags['reps'], 1);
    harness['repetitions'] = Object.fromEntries(names.map((name) => [name, reps]));
  }
  if (flags['timing'] !== undefined) harness['timing'] = flags['timing'] !== 'false';
  if (flags['fuzz'] !== undefined) fuzz['iterations'] = parseCount('fuzz', flags['fuzz'], 0);
  if (flags['seed'] !== undefined) fuzz['seed'] = parseCount('seed', flags['seed'], 0);
  if (flags['log-level'] !== undefined) logging['level'] = flags['log-level'];
  if (flags['log-format'] !== undefined) logging['format'] = flags['log-format'];

  return { harness, fuzz, logging };
}

function cmdMatch(parsed: ParsedArgs, io: CliIO): number {
  if (parsed.positional.length !== 2) {
    throw new InvalidOptionError('match', 'expected exactly <pattern> <subject>');
  }
  const realization = parsed.flags['realization'] ?? 'cursor';
  if (!isRealization(realization)) {
    throw new InvalidOptionError('--realization', `unknown realization '${realization}'`);
  }
  const [pattern, subject] = parsed.positional;
  io.out(String(REALIZATIONS[realization](pattern, subject)));
  return 0;
}

/**
 * Log options taken from the flags alone, for errors raised before the
 * configuration is loaded. Invalid values are left to the config check.
 */
export function flagLogOptions(flags: Record<string, string>, output: WritableOutput): LoggerOptions {
  const level = flags['log-level'];
  const format = flags['log-format'];
  return {
    level: level !== undefined && isLogLevel(level) ? level : 'warn',
    format: format === 'json' ? 'json' : 'text',
    output,
  };
}

interface RunSession {
  /** Options for the logger that reports a failed invocation. */
  logOptions: LoggerOptions;
}

function cmdRun(parsed: ParsedArgs, io: CliIO, context: RunContext, session: RunSession): number {
  const base = loadConfig(parsed.flags['config'] ?? null);
  const config = base.with(flagsToOverrides(parsed.flags, base.getStringList('harness.batteries', [])));

  const level = config.getString('logging.level', 'warn');
  if (!isLogLevel(level)) {
    throw new InvalidOptionError('logging.level', `unknown log level '${level}'`);
  }
  const logOptions: LoggerOptions = {
    level,
    format: parseLogFormat(config.getString('logging.format', 'text')),
    output: io.err,
  };
  session.logOptions = logOptions;
  const metrics = new MetricsCollector();

  const report = runHarness(config, {
    context,
    logOptions,
    metrics,
    onBattery: (result) => io.out(formatBatteryResult(result)),
  });

  if (config.getBoolean('harness.timing', false)) {
    for (const line of formatTimings(report.batteries)) io.out(line);
  }
  if (report.fuzz) {
    io.out(formatFuzzReport(report.fuzz));
  }
  if (parsed.flags['metrics'] !== undefined) {
    io.out(metrics.exportPrometheus().trimEnd());
  }
  return 0;
}

/** Runs one CLI invocation and returns the process exit code. */
export function main(args: readonly string[], io: CliIO = defaultIO): number {
  const parsed = parseArgs(args);
  const context = RunContext.create();
  const session: RunSession = { logOptions: flagLogOptions(parsed.flags, io.err) };

  try {
    switch (parsed.command) {
      case 'run':
        return cmdRun(parsed, io, context, session);
      case 'match':
        return cmdMatch(parsed, io);
      case 'help':
        io.out(USAGE);
        return 0;
      default:
        io.out(`Unknown command: ${parsed.command}`);
        io.out(USAGE);
        return 1;
    }
  } catch (err) {
    if (err instanceof WildmatchError) {
      ContextLogger.fromContext(context, 'wildmatch.cli', session.logOptions).error(err.message, { code: err.code });
      return 1;
    }
    throw err;
  }
}
