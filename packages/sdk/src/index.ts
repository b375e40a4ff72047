/**
 * @logweave/sdk — logweave Plugin Development Kit
 *
 * This package provides the event model, levels, formatter and sink
 * contracts, middleware helpers and test harnesses for building logweave
 * plugins (formatters, backends, sinks).
 */

// Core types
export type {
	EventFields,
	LogEvent,
	LevelBound,
	EventLevel,
	LevelLike,
	Middleware,
	Sink,
	ScalarValue,
	TabularRow,
	FormatterConfig,
	LineFormatter,
	TableFormatter,
	Formatter,
	BackendBuilder,
	BackendRegistration,
	FormatterRegistration,
	SinkRegistration,
} from './types.js';

export { RESERVED_FIELDS } from './types.js';

// Errors
export {
	LogweaveError,
	ConfigError,
	SchemaError,
	BackendNotFoundError,
	SinkError,
	QueueFullError,
	errorMessage,
} from './errors.js';

// Event helpers
export {
	createEvent,
	updateEvent,
	withEventTags,
	withFields,
	mergeTags,
	isLogEvent,
} from './event.js';
export type { CreateEventOptions } from './event.js';

// Levels
export {
	MIN_LEVEL,
	MAX_LEVEL,
	LOWEST,
	TRACE,
	DEBUG,
	NOTE,
	MESSAGE,
	WARNING,
	ERROR,
	CRITICAL,
	HIGHEST,
	BUILTIN_LEVELS,
	defineLevel,
	withLevelTags,
	levelNumberOf,
	levelByName,
	levelNameFor,
	passesLimits,
	validateLimits,
} from './levels.js';

// Formatter contract
export {
	defineLineFormatter,
	defineTableFormatter,
	isFormatter,
	isTableFormatter,
	attachBackend,
	withFormatterLimits,
	describeCall,
	customFields,
	isScalar,
	toTabularRow,
} from './formatter.js';
export type { LineFormatterSpec, TableFormatterSpec } from './formatter.js';

// Sink helpers
export { defineSink, isSink, withSinkLimits, withSinkMiddleware } from './sink.js';

// Middleware
export { applyMiddleware, addFields, redactFields, sampleEvents } from './middleware.js';
export type { RedactOptions, SampleOptions } from './middleware.js';

// Option readers
export {
	readString,
	readOptionalString,
	readNumber,
	readPositiveInt,
	readBoolean,
	readStringRecord,
	readStringArray,
	readEnum,
	isRecord,
} from './options.js';
export type { OptionRecord } from './options.js';

// Test harness
export { MockSink, toIdentity, toVoid, createTestEvent } from './testing.js';
export type { IdentitySink } from './testing.js';
