export { MetricsCollector, METRIC_CALLS, METRIC_FAILURES, METRIC_DURATION } from './metrics.js';
export type { MetricsSnapshot } from './metrics.js';
export { ContextLogger, isLogLevel } from './context-logger.js';
export type { LogFormat, LogLevel, LoggerOptions, WritableOutput } from './context-logger.js';
