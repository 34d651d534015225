export { BatteryLoader, SHIPPED_BATTERIES_DIR, normalizeBattery } from './battery-loader.js';
export { runBattery, validateRepetitions } from './runner.js';
export type { RunOptions } from './runner.js';
export { crossCheck, createRandom, randomString, subjectFromPattern } from './fuzz.js';
export type { FuzzOptions, Random } from './fuzz.js';
export { runHarness } from './harness.js';
export type { HarnessOptions } from './harness.js';
export { formatBatteryResult, formatTimings, formatFuzzReport, REALIZATION_DESCRIPTIONS } from './report.js';
export { BatteryFileSchema, CaseTupleSchema, CaseObjectSchema, ElementModeSchema } from './types.js';
export type {
  Battery,
  BatteryFile,
  BatteryResult,
  CaseFailure,
  Divergence,
  ElementMode,
  FuzzReport,
  HarnessReport,
  MatchCase,
} from './types.js';
