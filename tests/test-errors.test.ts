import { describe, it, expect } from 'vitest';
import {
  WildmatchError,
  ConfigNotFoundError,
  ConfigError,
  BatteryNotFoundError,
  BatteryParseError,
  BatteryValidationError,
  InvalidOptionError,
  ErrorCodes,
} from '../src/errors.js';

describe('WildmatchError', () => {
  it('creates with code and message', () => {
    const err = new WildmatchError('TEST_CODE', 'test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.message).toBe('test message');
    expect(err.name).toBe('WildmatchError');
    expect(err.details).toEqual({});
    expect(err.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('toString includes code and message', () => {
    expect(new WildmatchError('ERR', 'something failed').toString()).toBe('[ERR] something failed');
  });

  it('toJSON omits empty optional fields', () => {
    const json = new WildmatchError('ERR', 'msg').toJSON();
    expect(Object.keys(json)).toEqual(['code', 'message', 'timestamp']);
  });

  it('toJSON includes details and cause', () => {
    const err = new WildmatchError('ERR', 'msg', { a: 1 }, { cause: new Error('root') });
    expect(err.toJSON()).toEqual({
      code: 'ERR',
      message: 'msg',
      details: { a: 1 },
      cause: 'Error: root',
      timestamp: err.timestamp,
    });
    expect(err.cause?.message).toBe('root');
  });
});

describe('subclasses', () => {
  it('ConfigNotFoundError', () => {
    const err = new ConfigNotFoundError('/tmp/x.yaml');
    expect(err).toBeInstanceOf(WildmatchError);
    expect(err.name).toBe('ConfigNotFoundError');
    expect(err.code).toBe(ErrorCodes.CONFIG_NOT_FOUND);
    expect(err.message).toBe('Configuration file not found: /tmp/x.yaml');
    expect(err.details).toEqual({ configPath: '/tmp/x.yaml' });
  });

  it('ConfigError carries its cause', () => {
    const cause = new Error('bad');
    const err = new ConfigError('broken', { cause });
    expect(err.code).toBe(ErrorCodes.CONFIG_INVALID);
    expect(err.cause).toBe(cause);
    expect(Object.keys(err.toJSON())).toEqual(['code', 'message', 'cause', 'timestamp']);
  });

  it('BatteryNotFoundError', () => {
    const err = new BatteryNotFoundError('tame', '/b/tame.battery.yaml');
    expect(err.code).toBe(ErrorCodes.BATTERY_NOT_FOUND);
    expect(err.message).toBe("Case battery 'tame' not found at /b/tame.battery.yaml");
    expect(err.details).toEqual({ batteryName: 'tame', filePath: '/b/tame.battery.yaml' });
  });

  it('BatteryParseError', () => {
    const err = new BatteryParseError('/b/x.battery.yaml', 'empty file');
    expect(err.code).toBe(ErrorCodes.BATTERY_PARSE_ERROR);
    expect(err.message).toBe("Invalid case battery file '/b/x.battery.yaml': empty file");
  });

  it('BatteryValidationError defaults to an empty error list', () => {
    const err = new BatteryValidationError('/b/x.battery.yaml');
    expect(err.code).toBe(ErrorCodes.BATTERY_VALIDATION_ERROR);
    expect(err.details).toEqual({ filePath: '/b/x.battery.yaml', errors: [] });
  });

  it('InvalidOptionError', () => {
    const err = new InvalidOptionError('--reps', 'expected an integer >= 1');
    expect(err.code).toBe(ErrorCodes.INVALID_OPTION);
    expect(err.message).toBe("Invalid value for '--reps': expected an integer >= 1");
    expect(err.toString()).toBe("[INVALID_OPTION] Invalid value for '--reps': expected an integer >= 1");
  });
});

describe('ErrorCodes', () => {
  it('is frozen', () => {
    expect(Object.isFrozen(ErrorCodes)).toBe(true);
  });

  it('maps each code to itself', () => {
    for (const [key, value] of Object.entries(ErrorCodes)) {
      expect(value).toBe(key);
    }
  });
});
