/**
 * logweave — structured event logging with composable sinks.
 *
 * Batteries-included entry point: re-exports the SDK and the dispatch
 * engine together with every built-in formatter, backend and sink, and
 * wires them into a ready-made registry.
 */

// Event model, levels, contracts and errors
export * from '@logweave/sdk';

// Dispatch engine and infrastructure
export {
	Logger,
	voidLogger,
	SINK_ERROR_TAG,
	BackendRegistry,
	BufferedSink,
	AsyncSink,
	OVERFLOW_POLICIES,
	toConsole,
	formatConsoleLine,
	warn,
	WARNING_TYPE,
	DispatchMetrics,
	registerShutdownFlush,
	loadLoggerConfig,
	parseLoggerConfig,
	buildLoggerFromConfig,
	loggerConfigSchema,
} from '@logweave/core';
export type {
	LoggerOptions,
	SinkTarget,
	FlushTarget,
	BufferedSinkOptions,
	AsyncOptions,
	OverflowPolicy,
	ConsoleOptions,
	WritableLike,
	WarningCode,
	DispatchMetricsOptions,
	ShutdownOptions,
	BuildOptions,
} from '@logweave/core';

// Formatters
export { toText, renderTemplate, DEFAULT_TEMPLATE } from '@logweave/formatter-text';
export { toJson, toJsonRecord, type JsonOptions } from '@logweave/formatter-json';
export { toCsv, escapeCsvValue, type CsvOptions } from '@logweave/formatter-csv';
export { toFeather, encodeRows, decodeRows } from '@logweave/formatter-feather';
export {
	toParquet,
	encodeParquet,
	decodeParquet,
	type ParquetCompression,
	type ParquetOptions,
} from '@logweave/formatter-parquet';
export { toTeams, buildCard, type TeamsOptions } from '@logweave/formatter-teams';

// Handlers
export { onLocal, parseSize, type LocalOptions } from '@logweave/backend-local';
export { onS3, type S3Options, type S3Uploader } from '@logweave/backend-s3';
export { onAzure, type AzureOptions, type AppendBlobWriter } from '@logweave/backend-azure';
export { onWebhook, type WebhookOptions, type FetchLike } from '@logweave/backend-webhook';

// Standalone sinks
export { toSyslog, type SyslogOptions, type SyslogTransport } from '@logweave/sink-syslog';
export { toOtel, type OtelOptions, type OtelProvider } from '@logweave/sink-otel';

// Built-in catalogs
export {
	asAsync,
	consoleRegistration,
	createDefaultRegistry,
	createLogger,
	defaultFormatters,
	defaultSinks,
	loggerFromConfig,
	loggerFromYaml,
} from './defaults.js';
