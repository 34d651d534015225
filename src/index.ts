/**
 * wildmatch - anchored `*` / `?` wildcard matching.
 */

// Matcher
export {
  matches,
  matchWithCursors,
  matchWithIndices,
  SequenceCursor,
  REALIZATIONS,
  REALIZATION_NAMES,
  isRealization,
  MATCH_ANY,
  MATCH_ONE,
} from './matcher/index.js';
export type { CharSequence, Realization, WildcardMatchFn } from './matcher/index.js';

// Config
export { Config, DEFAULT_CONFIG, loadConfig } from './config.js';

// Context
export { RunContext } from './context.js';

// Errors
export {
  WildmatchError,
  ConfigNotFoundError,
  ConfigError,
  BatteryNotFoundError,
  BatteryParseError,
  BatteryValidationError,
  InvalidOptionError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Harness
export {
  BatteryLoader,
  SHIPPED_BATTERIES_DIR,
  runBattery,
  runHarness,
  crossCheck,
  formatBatteryResult,
  formatTimings,
  formatFuzzReport,
} from './harness/index.js';
export type {
  Battery,
  BatteryResult,
  CaseFailure,
  Divergence,
  FuzzOptions,
  FuzzReport,
  HarnessOptions,
  HarnessReport,
  MatchCase,
  RunOptions,
} from './harness/index.js';

// Observability
export { ContextLogger, MetricsCollector } from './observability/index.js';
export type { LogFormat, LogLevel, LoggerOptions, MetricsSnapshot, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
