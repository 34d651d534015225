/**
 * Structured logging for harness runs.
 */

import type { RunContext } from '../context.js';

const LEVELS = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
} as const;

export type LogLevel = keyof typeof LEVELS;
export type LogFormat = 'json' | 'text';

const REDACTED = '***REDACTED***';
const SECRET_PREFIX = '_secret_';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export function isLogLevel(level: string): level is LogLevel {
  return Object.hasOwn(LEVELS, level);
}

type Extra = Record<string, unknown>;

function redact(extra: Extra): Extra {
  const copy: Extra = {};
  for (const [k, v] of Object.entries(extra)) {
    copy[k] = k.startsWith(SECRET_PREFIX) ? REDACTED : v;
  }
  return copy;
}

// stdout carries the pass/fail report, so log lines go to stderr
const stderrOutput: WritableOutput = { write: (s) => console.error(s.replace(/\n$/, '')) };

export class ContextLogger {
  private _name: string;
  private _format: LogFormat;
  private _threshold: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _runId: string | null = null;
  private _battery: string | null = null;

  constructor(options?: LoggerOptions & { name?: string }) {
    this._name = options?.name ?? 'wildmatch';
    this._format = options?.format ?? 'json';
    this._threshold = LEVELS[options?.level ?? 'info'];
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? stderrOutput;
  }

  /** Logger whose entries carry the run id and battery of `context`. */
  static fromContext(context: RunContext, name: string, options?: LoggerOptions): ContextLogger {
    const logger = new ContextLogger({ ...options, name });
    logger._runId = context.runId;
    logger._battery = context.battery;
    return logger;
  }

  private _emit(level: LogLevel, message: string, extra?: Extra): void {
    if (LEVELS[level] < this._threshold) return;

    const fields = extra === undefined ? null : this._redactSensitive ? redact(extra) : extra;
    const now = new Date();
    const line = this._format === 'json'
      ? this._json(now, level, message, fields)
      : this._text(now, level, message, fields);
    this._output.write(line + '\n');
  }

  private _json(now: Date, level: LogLevel, message: string, extra: Extra | null): string {
    return JSON.stringify({
      timestamp: now.toISOString(),
      level,
      message,
      run_id: this._runId,
      battery: this._battery,
      logger: this._name,
      extra,
    });
  }

  private _text(now: Date, level: LogLevel, message: string, extra: Extra | null): string {
    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const context = `[run=${this._runId ?? 'none'}] [battery=${this._battery ?? 'none'}]`;
    const pairs = extra ? Object.entries(extra).map(([k, v]) => ` ${k}=${String(v)}`).join('') : '';
    return `${ts} [${level.toUpperCase()}] ${context} ${message}${pairs}`;
  }

  trace(message: string, extra?: Extra): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Extra): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Extra): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Extra): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Extra): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Extra): void {
    this._emit('fatal', message, extra);
  }
}
