/**
 * Error hierarchy for the wildmatch harness and configuration layers.
 *
 * The matcher itself is total and never throws; everything here belongs to
 * loading configuration and case batteries, or to rejecting bad options.
 */

export interface ErrorOptions {
  cause?: Error;
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  BATTERY_NOT_FOUND: 'BATTERY_NOT_FOUND',
  BATTERY_PARSE_ERROR: 'BATTERY_PARSE_ERROR',
  BATTERY_VALIDATION_ERROR: 'BATTERY_VALIDATION_ERROR',
  INVALID_OPTION: 'INVALID_OPTION',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class WildmatchError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'WildmatchError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = { code: this.code, message: this.message };
    if (Object.keys(this.details).length > 0) obj.details = this.details;
    if (this.cause !== undefined) obj.cause = String(this.cause);
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class ConfigNotFoundError extends WildmatchError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_NOT_FOUND, `Configuration file not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends WildmatchError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_INVALID, message, {}, options);
    this.name = 'ConfigError';
  }
}

export class BatteryNotFoundError extends WildmatchError {
  constructor(batteryName: string, filePath: string, options?: ErrorOptions) {
    super(
      ErrorCodes.BATTERY_NOT_FOUND,
      `Case battery '${batteryName}' not found at ${filePath}`,
      { batteryName, filePath },
      options,
    );
    this.name = 'BatteryNotFoundError';
  }
}

export class BatteryParseError extends WildmatchError {
  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(
      ErrorCodes.BATTERY_PARSE_ERROR,
      `Invalid case battery file '${filePath}': ${reason}`,
      { filePath, reason },
      options,
    );
    this.name = 'BatteryParseError';
  }
}

/** A battery file that parsed as YAML but does not fit the battery schema. */
export class BatteryValidationError extends WildmatchError {
  constructor(filePath: string, errors?: Array<Record<string, unknown>>, options?: ErrorOptions) {
    super(
      ErrorCodes.BATTERY_VALIDATION_ERROR,
      `Case battery '${filePath}' does not match the battery schema`,
      { filePath, errors: errors ?? [] },
      options,
    );
    this.name = 'BatteryValidationError';
  }
}

export class InvalidOptionError extends WildmatchError {
  constructor(option: string, reason: string, options?: ErrorOptions) {
    super(ErrorCodes.INVALID_OPTION, `Invalid value for '${option}': ${reason}`, { option, reason }, options);
    this.name = 'InvalidOptionError';
  }
}
