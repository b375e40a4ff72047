import { tableFromIPC } from 'apache-arrow';
import { createTestEvent, isTableFormatter } from '@logweave/sdk';
import { describe, expect, it } from 'vitest';
import { decodeRows, toFeather } from '../feather-formatter.js';
import { register } from '../index.js';

const first = createTestEvent({ message: 'first', tags: ['etl'], fields: { rows: 10, table: 'users' } });
const second = createTestEvent({
	message: 'second',
	levelName: 'WARNING',
	levelNumber: 60,
	fields: { rows: 3, slow: true, meta: { ignored: true } },
});

describe('toFeather', () => {
	it('is a buffered table formatter', () => {
		const fmt = toFeather();
		expect(isTableFormatter(fmt)).toBe(true);
		expect(fmt.extension).toBe('arrow');
		expect(fmt.label).toBe('toFeather()');
	});

	it('turns events into rows with scalar fields only', () => {
		const row = toFeather().format(second);
		expect(row.level).toBe('WARNING');
		expect(row.fields).toEqual({ rows: 3, slow: true });
	});

	it('encodes an Arrow IPC file with typed columns', () => {
		const fmt = toFeather();
		const bytes = fmt.encode([fmt.format(first), fmt.format(second)]);
		const table = tableFromIPC(bytes);

		expect(table.numRows).toBe(2);
		expect(table.schema.fields.map((f) => f.name)).toEqual([
			'time',
			'level',
			'levelNumber',
			'message',
			'tags',
			'rows',
			'slow',
			'table',
		]);
		expect(table.schema.fields.map((f) => String(f.type))).toEqual([
			'Utf8',
			'Utf8',
			'Int32',
			'Utf8',
			'List<Utf8>',
			'Float64',
			'Bool',
			'Utf8',
		]);
	});

	it('reads rows back', () => {
		const fmt = toFeather();
		const rows = decodeRows(fmt.encode([fmt.format(first), fmt.format(second)]));

		expect(rows).toEqual([
			{
				time: new Date('2024-01-15T10:30:00.000Z'),
				level: 'NOTE',
				levelNumber: 30,
				message: 'first',
				tags: ['etl'],
				fields: { rows: 10, table: 'users' },
			},
			{
				time: new Date('2024-01-15T10:30:00.000Z'),
				level: 'WARNING',
				levelNumber: 60,
				message: 'second',
				tags: [],
				fields: { rows: 3, slow: true },
			},
		]);
	});

	it('merges new rows after the existing ones', () => {
		const fmt = toFeather();
		const existing = fmt.encode([fmt.format(first)]);
		const merged = decodeRows(fmt.encode([fmt.format(second)], existing));

		expect(merged.map((row) => row.message)).toEqual(['first', 'second']);
		expect(merged[0].fields).toEqual({ rows: 10, table: 'users' });
	});
});

describe('register', () => {
	it('creates feather formatters', () => {
		expect(register().create({}).label).toBe('toFeather()');
	});
});
