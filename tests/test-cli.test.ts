import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { USAGE, flagLogOptions, flagsToOverrides, main, parseArgs, type CliIO } from '../src/cli.js';
import { InvalidOptionError } from '../src/errors.js';
import { createBufferOutput, makeTempDir, writeFile } from './helpers.js';

function createIO(): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const { output, lines } = createBufferOutput();
  return { io: { out: (line) => out.push(line), err: output }, out, err: lines };
}

describe('parseArgs', () => {
  it('defaults to the run command', () => {
    expect(parseArgs([])).toEqual({ command: 'run', flags: {}, positional: [] });
    expect(parseArgs(['--reps', '5'])).toEqual({ command: 'run', flags: { reps: '5' }, positional: [] });
  });

  it('treats a flag followed by another flag as boolean', () => {
    expect(parseArgs(['run', '--timing', '--fuzz', '10']).flags).toEqual({ timing: 'true', fuzz: '10' });
  });

  it('collects positional arguments around flags', () => {
    expect(parseArgs(['match', 'a*', '--realization', 'indexed', 'abc'])).toEqual({
      command: 'match',
      flags: { realization: 'indexed' },
      positional: ['a*', 'abc'],
    });
  });
});

describe('flagsToOverrides', () => {
  it('applies --reps to the selected batteries', () => {
    expect(flagsToOverrides({ batteries: 'tame, wild', reps: '3' }, ['empty'])).toEqual({
      harness: { batteries: ['tame', 'wild'], repetitions: { tame: 3, wild: 3 } },
      fuzz: {},
      logging: {},
    });
  });

  it('applies --reps to the configured batteries without --batteries', () => {
    expect(flagsToOverrides({ reps: '2' }, ['empty']).harness).toEqual({ repetitions: { empty: 2 } });
  });

  it('maps fuzz, timing and logging flags', () => {
    expect(
      flagsToOverrides({ fuzz: '0', seed: '7', timing: 'true', 'log-level': 'debug', 'log-format': 'json' }, []),
    ).toEqual({
      harness: { timing: true },
      fuzz: { iterations: 0, seed: 7 },
      logging: { level: 'debug', format: 'json' },
    });
  });

  it('rejects counts that are not integers in range', () => {
    expect(() => flagsToOverrides({ reps: '0' }, [])).toThrow(InvalidOptionError);
    expect(() => flagsToOverrides({ fuzz: 'many' }, [])).toThrow("Invalid value for '--fuzz'");
  });
});

describe('flagLogOptions', () => {
  it('takes valid logging flags and falls back otherwise', () => {
    const { output } = createBufferOutput();
    expect(flagLogOptions({ 'log-level': 'debug', 'log-format': 'json' }, output)).toEqual({
      level: 'debug',
      format: 'json',
      output,
    });
    expect(flagLogOptions({ 'log-level': 'loud', 'log-format': 'xml' }, output)).toEqual({
      level: 'warn',
      format: 'text',
      output,
    });
  });
});

describe('main', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir('cli'));
  });

  afterEach(() => {
    cleanup();
  });

  it('prints whether one pair matches', () => {
    const { io, out } = createIO();
    expect(main(['match', '*a', 'ba'], io)).toBe(0);
    expect(main(['match', '*a', 'ab', '--realization', 'indexed'], io)).toBe(0);
    expect(out).toEqual(['true', 'false']);
  });

  it('rejects match without exactly two arguments', () => {
    const { io, out, err } = createIO();
    expect(main(['match', '*a'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain('[ERROR]');
    expect(err[0]).toContain('code=INVALID_OPTION');
  });

  it('rejects an unknown realization', () => {
    const { io } = createIO();
    expect(main(['match', 'a', 'a', '--realization', 'regex'], io)).toBe(1);
  });

  it('runs the default batteries', () => {
    const { io, out, err } = createIO();
    expect(main([], io)).toBe(0);
    expect(out).toEqual(['Passed tame string tests', 'Passed empty string tests', 'Passed wildcard tests']);
    expect(err).toEqual([]);
  });

  it('prints timing and fuzz lines after the battery lines', () => {
    const { io, out } = createIO();
    expect(main(['run', '--batteries', 'wild', '--timing', '--fuzz', '20'], io)).toBe(0);
    expect(out).toHaveLength(4);
    expect(out[0]).toBe('Passed wildcard tests');
    expect(out[1]).toMatch(/^cursor - forward-cursor realization: \d+\.\d{3} seconds$/);
    expect(out[2]).toMatch(/^indexed - integer-offset realization: \d+\.\d{3} seconds$/);
    expect(out[3]).toBe('Passed fuzz cross-check (20 cases, seed 1)');
  });

  it('prints the Prometheus export with --metrics', () => {
    const { io, out } = createIO();
    expect(main(['--batteries', 'empty', '--metrics'], io)).toBe(0);
    expect(out).toHaveLength(2);
    expect(out[1].split('\n')[0]).toBe('# HELP wildmatch_match_calls_total Total matcher invocations');
    expect(out[1]).toContain('# TYPE wildmatch_battery_duration_seconds histogram');
  });

  it('reads batteries and settings from a config file', () => {
    const path = writeFile(dir, 'wildmatch.yaml', 'harness:\n  batteries: [empty]\nfuzz:\n  iterations: 5\n  seed: 11\n');
    const { io, out } = createIO();
    expect(main(['--config', path], io)).toBe(0);
    expect(out).toEqual(['Passed empty string tests', 'Passed fuzz cross-check (5 cases, seed 11)']);
  });

  it('exits 1 and logs when the config file is missing', () => {
    const { io, out, err } = createIO();
    expect(main(['--config', `${dir}/missing.yaml`], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain('Configuration file not found');
    expect(err[0]).toContain('code=CONFIG_NOT_FOUND');
  });

  it('logs errors in JSON when --log-format json is given', () => {
    const { io, err } = createIO();
    expect(main(['--config', `${dir}/missing.yaml`, '--log-format', 'json'], io)).toBe(1);
    expect(err).toHaveLength(1);
    const entry = JSON.parse(err[0]);
    expect(entry.level).toBe('error');
    expect(entry.logger).toBe('wildmatch.cli');
    expect(entry.extra).toEqual({ code: 'CONFIG_NOT_FOUND' });
  });

  it('logs errors with the format set in the config file', () => {
    const path = writeFile(dir, 'json.yaml', 'harness:\n  batteries: [nope]\nlogging:\n  format: json\n');
    const { io, err } = createIO();
    expect(main(['--config', path], io)).toBe(1);
    expect(err).toHaveLength(1);
    expect(JSON.parse(err[0]).extra).toEqual({ code: 'BATTERY_NOT_FOUND' });
  });

  it('exits 1 for an unknown battery', () => {
    const { io, err } = createIO();
    expect(main(['--batteries', 'nope'], io)).toBe(1);
    expect(err[0]).toContain('code=BATTERY_NOT_FOUND');
  });

  it('exits 1 for bad logging options', () => {
    expect(main(['--log-level', 'loud'], createIO().io)).toBe(1);
    expect(main(['--log-format', 'xml'], createIO().io)).toBe(1);
  });

  it('prints usage for help', () => {
    const { io, out } = createIO();
    expect(main(['help'], io)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('exits 1 for an unknown command', () => {
    const { io, out } = createIO();
    expect(main(['frob'], io)).toBe(1);
    expect(out).toEqual(['Unknown command: frob', USAGE]);
  });
});
