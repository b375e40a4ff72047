/**
 * CSV formatter.
 *
 * Columns: `time, level, levelNumber, message, tags` (pipe-delimited), then
 * the event's fields sorted by name. Values containing the separator, the
 * quote character or a line break are quoted, with embedded quotes doubled.
 * Non-scalar field values become `naString`.
 *
 * The header row is exposed through `header()`; backends write it once per
 * sink lifetime, before the first row.
 */

import {
	ConfigError,
	customFields,
	defineLineFormatter,
	describeCall,
	type LineFormatter,
	type LogEvent,
} from '@logweave/sdk';

export interface CsvOptions {
	/** Column separator (default ",") */
	separator?: string;
	/** Quote character (default '"') */
	quote?: string;
	/** Expose a header row (default true) */
	headers?: boolean;
	/** Placeholder for missing or non-scalar values (default "NA") */
	naString?: string;
}

export const FIXED_COLUMNS = ['time', 'level', 'levelNumber', 'message', 'tags'] as const;

interface CsvDialect {
	separator: string;
	quote: string;
	naString: string;
}

export function escapeCsvValue(value: string, dialect: CsvDialect): string {
	const needsQuoting =
		value.includes(dialect.separator) ||
		value.includes(dialect.quote) ||
		value.includes('\n') ||
		value.includes('\r');
	if (!needsQuoting) return value;
	return `${dialect.quote}${value.split(dialect.quote).join(dialect.quote + dialect.quote)}${dialect.quote}`;
}

function renderField(value: unknown, dialect: CsvDialect): string {
	if (typeof value === 'string') return escapeCsvValue(value, dialect);
	if (typeof value === 'number' || typeof value === 'boolean') {
		return escapeCsvValue(String(value), dialect);
	}
	if (value instanceof Date) return escapeCsvValue(value.toISOString(), dialect);
	return dialect.naString;
}

function sortedFields(event: LogEvent): Array<[string, unknown]> {
	return customFields(event).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function assertNonEmpty(name: string, value: string): void {
	if (typeof value !== 'string' || value.length === 0) {
		throw new ConfigError(`CSV option "${name}" must be a non-empty string`);
	}
}

export function toCsv(options: CsvOptions = {}): LineFormatter {
	const separator = options.separator ?? ',';
	const quote = options.quote ?? '"';
	const headers = options.headers ?? true;
	const naString = options.naString ?? 'NA';
	assertNonEmpty('separator', separator);
	assertNonEmpty('quote', quote);
	if (separator === quote) {
		throw new ConfigError('CSV separator and quote must differ');
	}
	const dialect: CsvDialect = { separator, quote, naString };

	const format = (event: LogEvent): string => {
		const values = [
			escapeCsvValue(event.time.toISOString(), dialect),
			escapeCsvValue(event.levelName, dialect),
			String(event.levelNumber),
			escapeCsvValue(event.message, dialect),
			escapeCsvValue(event.tags.join('|'), dialect),
			...sortedFields(event).map(([, value]) => renderField(value, dialect)),
		];
		return values.join(separator);
	};

	const header = (event: LogEvent): string =>
		[...FIXED_COLUMNS, ...sortedFields(event).map(([name]) => name)]
			.map((name) => escapeCsvValue(name, dialect))
			.join(separator);

	return defineLineFormatter({
		formatKind: 'csv',
		label: describeCall('toCsv', {
			separator: separator === ',' ? undefined : separator,
			quote: quote === '"' ? undefined : quote,
			headers: headers ? undefined : headers,
			naString: naString === 'NA' ? undefined : naString,
		}),
		format,
		...(headers ? { header } : {}),
		options: { separator, quote, headers, naString },
	});
}
