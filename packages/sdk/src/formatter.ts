/**
 * Formatter contract and the shared handler step.
 *
 * A formatter is a pure event → representation function plus a declarative
 * config blob. Handlers (onLocal, onS3, ...) never touch the transform; they
 * only enrich the blob with a backend name and backend config, which the
 * backend registry later resolves into a concrete sink.
 */

import { ConfigError } from './errors.js';
import { levelNumberOf, validateLimits } from './levels.js';
import type {
	Formatter,
	FormatterConfig,
	LevelLike,
	LineFormatter,
	LogEvent,
	ScalarValue,
	TableFormatter,
	TabularRow,
} from './types.js';
import { RESERVED_FIELDS } from './types.js';

function assertUnary(fn: unknown, what: string): void {
	if (typeof fn !== 'function') {
		throw new ConfigError(`${what} must be a function, got ${typeof fn}`);
	}
	if (fn.length !== 1) {
		throw new ConfigError(`${what} must take exactly one argument (the event), got ${fn.length}`);
	}
}

function baseConfig(
	formatKind: string,
	requiresBuffering: boolean,
	options: Record<string, unknown>,
): FormatterConfig {
	return Object.freeze({
		formatKind,
		requiresBuffering,
		backendConfig: Object.freeze({}),
		options: Object.freeze({ ...options }),
	});
}

export interface LineFormatterSpec {
	formatKind: string;
	label: string;
	format: (event: LogEvent) => string;
	header?: (event: LogEvent) => string;
	options?: Record<string, unknown>;
}

/** Create a line-oriented formatter (text, JSON, CSV, ...) */
export function defineLineFormatter(spec: LineFormatterSpec): LineFormatter {
	assertUnary(spec.format, 'Formatter function');
	return Object.freeze({
		kind: 'formatter' as const,
		label: spec.label,
		config: baseConfig(spec.formatKind, false, spec.options ?? {}),
		format: spec.format,
		...(spec.header ? { header: spec.header } : {}),
	});
}

export interface TableFormatterSpec {
	formatKind: string;
	label: string;
	extension: string;
	format: (event: LogEvent) => TabularRow;
	encode: (rows: readonly TabularRow[], existing?: Uint8Array) => Uint8Array;
	options?: Record<string, unknown>;
}

/** Create a batch-oriented formatter; backends must buffer its rows */
export function defineTableFormatter(spec: TableFormatterSpec): TableFormatter {
	assertUnary(spec.format, 'Formatter function');
	return Object.freeze({
		kind: 'formatter' as const,
		label: spec.label,
		extension: spec.extension,
		config: baseConfig(spec.formatKind, true, spec.options ?? {}),
		format: spec.format,
		encode: spec.encode,
	});
}

export function isFormatter(value: unknown): value is Formatter {
	return (
		typeof value === 'object' &&
		value !== null &&
		'kind' in value &&
		value.kind === 'formatter' &&
		'format' in value &&
		typeof value.format === 'function'
	);
}

export function isTableFormatter(formatter: Formatter): formatter is TableFormatter {
	return formatter.config.requiresBuffering;
}

/** Render handler parameters for labels: `onLocal(path="app.log")` */
export function describeCall(name: string, params: Record<string, unknown>): string {
	const args = Object.entries(params)
		.filter(([, value]) => value !== undefined && typeof value !== 'object')
		.map(([key, value]) => `${key}=${JSON.stringify(value)}`)
		.join(', ');
	return `${name}(${args})`;
}

/**
 * The shared handler step: returns a new formatter whose config carries the
 * backend selection. A formatter accepts exactly one handler; a second call
 * is a construction-time error rather than a silent overwrite.
 */
export function attachBackend<F extends Formatter>(
	formatter: F,
	backendName: string,
	backendConfig: Record<string, unknown>,
	handlerLabel: string,
): F {
	if (!isFormatter(formatter)) {
		throw new ConfigError(
			`Handler ${handlerLabel} needs a formatter created by toText(), toJson(), toCsv(), ...\n` +
				`  Got: ${formatter === null ? 'null' : typeof formatter}\n` +
				"  Example: onLocal(toText(), { path: 'app.log' })",
		);
	}
	if (formatter.config.backendName !== undefined) {
		throw new ConfigError(
			`Formatter ${formatter.label} already targets backend "${formatter.config.backendName}"\n` +
				`  Cannot apply ${handlerLabel} as well\n` +
				'  Solution: create a second formatter for the second destination',
		);
	}
	return Object.freeze<F>({
		...formatter,
		label: `${formatter.label}.${handlerLabel}`,
		config: Object.freeze({
			...formatter.config,
			backendName,
			backendConfig: Object.freeze({ ...backendConfig }),
		}),
	});
}

/** Attach per-sink limits to a formatter's config blob */
export function withFormatterLimits<F extends Formatter>(
	formatter: F,
	lower: LevelLike = 0,
	upper: LevelLike = 100,
): F {
	const lowerLimit = levelNumberOf(lower);
	const upperLimit = levelNumberOf(upper);
	validateLimits(lowerLimit, upperLimit);
	return Object.freeze<F>({
		...formatter,
		config: Object.freeze({ ...formatter.config, lowerLimit, upperLimit }),
	});
}

// ─── Shared rendering helpers ────────────────────────────────────────────────

/** Caller fields an output format may emit, in insertion order; reserved names are skipped */
export function customFields(event: LogEvent): Array<[string, unknown]> {
	return Object.entries(event.fields).filter(([name]) => !RESERVED_FIELDS.has(name));
}

export function isScalar(value: unknown): value is ScalarValue {
	return (
		value === null ||
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean'
	);
}

/** The columnar view of an event; non-scalar fields are dropped */
export function toTabularRow(event: LogEvent): TabularRow {
	const fields: Record<string, ScalarValue> = {};
	for (const [name, value] of customFields(event)) {
		if (isScalar(value)) fields[name] = value;
	}
	return {
		time: event.time,
		level: event.levelName,
		levelNumber: event.levelNumber,
		message: event.message,
		tags: [...event.tags],
		fields,
	};
}
