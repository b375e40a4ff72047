/**
 * Core type definitions for logweave.
 *
 * These types are the foundation of the system — every formatter, backend,
 * sink and the dispatch engine depend on them.
 */

// ─── Events ───────────────────────────────────────────────────────────────────

/** Caller-supplied named fields attached to an event */
export type EventFields = Readonly<Record<string, unknown>>;

/** One structured log record. Frozen once constructed. */
export interface LogEvent {
	/** Human-readable message */
	readonly message: string;
	/** Creation time */
	readonly time: Date;
	/** Level name (e.g. "WARNING") */
	readonly levelName: string;
	/** Level number on the 0–100 scale */
	readonly levelNumber: number;
	/** Event tags, most specific first; duplicates allowed, order significant */
	readonly tags: readonly string[];
	/** Tags inherited from the level constructor, merged into `tags` at dispatch */
	readonly levelTags: readonly string[];
	/** Open map of caller-supplied fields */
	readonly fields: EventFields;
}

/** Field names owned by the event itself; formatters never emit fields under these names */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set([
	'time',
	'level',
	'levelName',
	'levelNumber',
	'message',
	'tags',
]);

// ─── Levels ───────────────────────────────────────────────────────────────────

/** A named point on the 0–100 scale usable as a filter limit */
export interface LevelBound {
	readonly levelName: string;
	readonly levelNumber: number;
}

/** A level that can also construct events */
export interface EventLevel extends LevelBound {
	(message?: string, fields?: EventFields): LogEvent;
	/** Tags every event built by this level carries */
	readonly tags: readonly string[];
	/** Built-in levels cannot be re-tagged */
	readonly builtin: boolean;
}

/** Anything that names a level number */
export type LevelLike = number | LevelBound;

// ─── Middleware ───────────────────────────────────────────────────────────────

/** Event transform. Returning `null` drops the event. */
export type Middleware = (event: LogEvent) => LogEvent | null;

// ─── Sinks ────────────────────────────────────────────────────────────────────

/**
 * Sink — the terminal stage that delivers one event to a destination.
 *
 * `write` may be sync or async; the dispatch engine awaits it inside an
 * error boundary either way. Buffered sinks also expose `flush` and
 * `bufferedCount`.
 */
export interface Sink {
	readonly kind: 'sink';
	/** Human-readable reconstruction of how the sink was built */
	readonly label: string;
	write(event: LogEvent): void | Promise<void>;
	/** Write out everything accumulated so far */
	flush?(): Promise<void>;
	/** Events accumulated and not yet written */
	bufferedCount?(): number;
	/** Release connections and stop workers */
	close?(): Promise<void>;
}

// ─── Formatters ───────────────────────────────────────────────────────────────

/** Scalar values that become tabular columns */
export type ScalarValue = string | number | boolean | null;

/** One row of a columnar batch */
export interface TabularRow {
	time: Date;
	level: string;
	levelNumber: number;
	message: string;
	tags: readonly string[];
	/** Scalar caller-supplied fields; non-scalars are dropped */
	fields: Record<string, ScalarValue>;
}

/** Declarative configuration blob carried by every formatter */
export interface FormatterConfig {
	/** Format identifier ("text", "json", "csv", "feather", ...) */
	readonly formatKind: string;
	/** True for batch-oriented (columnar) formatters */
	readonly requiresBuffering: boolean;
	/** Set by exactly one handler call */
	readonly backendName?: string;
	/** Transport/storage configuration supplied by the handler */
	readonly backendConfig: Readonly<Record<string, unknown>>;
	/** Per-sink lower limit (inclusive) */
	readonly lowerLimit?: number;
	/** Per-sink upper limit (inclusive) */
	readonly upperLimit?: number;
	/** Format-specific options (template, separator, ...) */
	readonly options: Readonly<Record<string, unknown>>;
}

interface FormatterBase {
	readonly kind: 'formatter';
	/** Human-readable reconstruction of the formatter/handler composition */
	readonly label: string;
	readonly config: FormatterConfig;
}

/** Formatter producing one text line per event */
export interface LineFormatter extends FormatterBase {
	format(event: LogEvent): string;
	/** Optional preamble written once per sink lifetime before the first line */
	header?(event: LogEvent): string;
}

/** Formatter producing tabular rows written in batches */
export interface TableFormatter extends FormatterBase {
	format(event: LogEvent): TabularRow;
	/** Encode rows, merging into an existing encoded file when given */
	encode(rows: readonly TabularRow[], existing?: Uint8Array): Uint8Array;
	/** File extension for stored batches (without dot) */
	readonly extension: string;
}

export type Formatter = LineFormatter | TableFormatter;

// ─── Backends ─────────────────────────────────────────────────────────────────

/** Builder invoked once at logger-build time; captures per-sink state */
export type BackendBuilder = (formatter: Formatter, config: FormatterConfig) => Sink;

/** Backend registration — what a backend package exports */
export interface BackendRegistration {
	/** Backend name stored in `FormatterConfig.backendName` */
	name: string;
	build: BackendBuilder;
	/** JSON Schema for `backendConfig` validation */
	configSchema?: Record<string, unknown>;
}

/** Formatter registration — what a formatter package exports for config files */
export interface FormatterRegistration {
	/** Format name used in config files */
	name: string;
	create(options: Record<string, unknown>): Formatter;
	/** JSON Schema for the formatter options */
	optionsSchema?: Record<string, unknown>;
}

/** Standalone sink registration (sinks not built from formatters) */
export interface SinkRegistration {
	name: string;
	create(options: Record<string, unknown>): Sink;
	optionsSchema?: Record<string, unknown>;
}
