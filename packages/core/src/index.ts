/**
 * @logweave/core — logweave dispatch engine
 *
 * Public API exports for library mode.
 */

// Dispatch engine
export { Logger, voidLogger, SINK_ERROR_TAG } from './logger.js';
export type { LoggerOptions, SinkTarget, FlushTarget } from './logger.js';

// Backend registry
export { BackendRegistry } from './registry.js';

// Buffering engine
export { BufferedSink } from './buffer.js';
export type { BufferedSinkOptions } from './buffer.js';

// Async delivery wrapper
export { AsyncSink, asAsync, OVERFLOW_POLICIES } from './async-sink.js';
export type { AsyncOptions, OverflowPolicy } from './async-sink.js';

// Console sink and fallback
export { toConsole, formatConsoleLine } from './console.js';
export type { ConsoleOptions, WritableLike } from './console.js';

// Internal diagnostics
export { warn, WARNING_TYPE } from './diagnostics.js';
export type { WarningCode } from './diagnostics.js';

// Metrics
export { DispatchMetrics } from './metrics.js';
export type { DispatchMetricsOptions } from './metrics.js';

// Shutdown hooks
export { registerShutdownFlush } from './lifecycle.js';
export type { ShutdownOptions } from './lifecycle.js';

// Config loading
export {
	loadLoggerConfig,
	parseLoggerConfig,
	buildLoggerFromConfig,
	loggerConfigSchema,
} from './schema.js';
export type { BuildOptions } from './schema.js';
