/**
 * Feather (Arrow IPC file) formatter.
 *
 * Rows are buffered by the backend and encoded in batches. Columns:
 * `time` (ISO string), `level`, `levelNumber` (Int32), `message`, `tags`
 * (List<Utf8>), then one column per scalar field name, sorted. A field
 * column is Float64 when every value is a number, Bool when every value is
 * a boolean, and Utf8 otherwise; rows without the field hold null.
 */

import {
	Bool,
	Field,
	Float64,
	Int32,
	List,
	Table,
	tableFromIPC,
	tableToIPC,
	Utf8,
	Vector,
	vectorFromArray,
} from 'apache-arrow';
import {
	defineTableFormatter,
	type ScalarValue,
	type TableFormatter,
	type TabularRow,
	toTabularRow,
} from '@logweave/sdk';

const FIXED_COLUMNS = new Set(['time', 'level', 'levelNumber', 'message', 'tags']);

// ─── Encoding ────────────────────────────────────────────────────────────────

function fieldVector(values: ScalarValue[]): Vector {
	const present = values.filter((v) => v !== null);
	if (present.length > 0 && present.every((v) => typeof v === 'number')) {
		return vectorFromArray(values, new Float64());
	}
	if (present.length > 0 && present.every((v) => typeof v === 'boolean')) {
		return vectorFromArray(values, new Bool());
	}
	return vectorFromArray(
		values.map((v) => (v === null ? null : String(v))),
		new Utf8(),
	);
}

/** Build the Arrow table for a batch of rows */
export function rowsToTable(rows: readonly TabularRow[]): Table {
	const fieldNames = [...new Set(rows.flatMap((row) => Object.keys(row.fields)))]
		.filter((name) => !FIXED_COLUMNS.has(name))
		.sort();

	const columns: Record<string, Vector> = {
		time: vectorFromArray(
			rows.map((row) => row.time.toISOString()),
			new Utf8(),
		),
		level: vectorFromArray(
			rows.map((row) => row.level),
			new Utf8(),
		),
		levelNumber: vectorFromArray(
			rows.map((row) => row.levelNumber),
			new Int32(),
		),
		message: vectorFromArray(
			rows.map((row) => row.message),
			new Utf8(),
		),
		tags: vectorFromArray(
			rows.map((row) => [...row.tags]),
			new List(new Field('item', new Utf8(), true)),
		),
	};
	for (const name of fieldNames) {
		columns[name] = fieldVector(rows.map((row) => row.fields[name] ?? null));
	}

	return new Table(columns);
}

export function encodeRows(rows: readonly TabularRow[]): Uint8Array {
	return tableToIPC(rowsToTable(rows), 'file');
}

// ─── Decoding ────────────────────────────────────────────────────────────────

function toScalar(value: unknown): ScalarValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'bigint') return Number(value);
	return String(value);
}

function toStringList(value: unknown): string[] {
	if (value instanceof Vector) return [...value].map((item) => String(item));
	if (Array.isArray(value)) return value.map((item) => String(item));
	return [];
}

/** Read rows back out of an Arrow table built by rowsToTable */
export function tableToRows(table: Table): TabularRow[] {
	const fieldNames = table.schema.fields
		.map((field) => field.name)
		.filter((name) => !FIXED_COLUMNS.has(name));

	const cell = (column: string, index: number): unknown => table.getChild(column)?.get(index);

	const rows: TabularRow[] = [];
	for (let i = 0; i < table.numRows; i++) {
		const fields: Record<string, ScalarValue> = {};
		for (const name of fieldNames) {
			const value = toScalar(cell(name, i));
			if (value !== null) fields[name] = value;
		}
		rows.push({
			time: new Date(String(cell('time', i))),
			level: String(cell('level', i) ?? ''),
			levelNumber: Number(cell('levelNumber', i) ?? 0),
			message: String(cell('message', i) ?? ''),
			tags: toStringList(cell('tags', i)),
			fields,
		});
	}
	return rows;
}

/** Read rows back out of an encoded batch, e.g. to merge into an existing file */
export function decodeRows(bytes: Uint8Array): TabularRow[] {
	return tableToRows(tableFromIPC(bytes));
}

// ─── Formatter ───────────────────────────────────────────────────────────────

/**
 * ```ts
 * onLocal(toFeather(), { path: 'events.arrow', flushThreshold: 1000 })
 * ```
 */
export function toFeather(): TableFormatter {
	return defineTableFormatter({
		formatKind: 'feather',
		label: 'toFeather()',
		extension: 'arrow',
		format: (event) => toTabularRow(event),
		encode: (rows, existing) => encodeRows(existing ? [...decodeRows(existing), ...rows] : rows),
	});
}
