import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors.js';
import {
	attachBackend,
	customFields,
	defineLineFormatter,
	defineTableFormatter,
	describeCall,
	isFormatter,
	isScalar,
	isTableFormatter,
	toTabularRow,
	withFormatterLimits,
} from '../formatter.js';
import { ERROR, WARNING } from '../levels.js';
import { createTestEvent } from '../testing.js';
import type { TabularRow } from '../types.js';

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function makeLine() {
	return defineLineFormatter({
		formatKind: 'text',
		label: 'toText()',
		format: (event) => event.message,
	});
}

function makeTable() {
	return defineTableFormatter({
		formatKind: 'feather',
		label: 'toFeather()',
		extension: 'arrow',
		format: (event): TabularRow => ({
			time: event.time,
			level: event.levelName,
			levelNumber: event.levelNumber,
			message: event.message,
			tags: event.tags,
			fields: {},
		}),
		encode: (rows) => new Uint8Array(rows.length),
	});
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('defineLineFormatter', () => {
	it('creates an unconfigured line formatter', () => {
		const fmt = makeLine();
		expect(fmt.kind).toBe('formatter');
		expect(fmt.config.formatKind).toBe('text');
		expect(fmt.config.requiresBuffering).toBe(false);
		expect(fmt.config.backendName).toBeUndefined();
		expect(fmt.format(createTestEvent({ message: 'hi' }))).toBe('hi');
	});

	it('rejects format functions that do not take one argument', () => {
		expect(() =>
			defineLineFormatter({ formatKind: 'text', label: 'bad', format: () => 'x' }),
		).toThrow('Formatter function must take exactly one argument (the event), got 0');
	});
});

describe('defineTableFormatter', () => {
	it('marks the formatter as requiring buffering', () => {
		const fmt = makeTable();
		expect(fmt.config.requiresBuffering).toBe(true);
		expect(isTableFormatter(fmt)).toBe(true);
		expect(isTableFormatter(makeLine())).toBe(false);
	});
});

describe('isFormatter', () => {
	it('recognizes formatters only', () => {
		expect(isFormatter(makeLine())).toBe(true);
		expect(isFormatter({ kind: 'sink' })).toBe(false);
		expect(isFormatter(undefined)).toBe(false);
	});
});

describe('attachBackend', () => {
	it('returns a new formatter carrying the backend selection', () => {
		const fmt = makeLine();
		const handled = attachBackend(fmt, 'local', { path: 'app.log' }, 'onLocal(path="app.log")');
		expect(handled.config.backendName).toBe('local');
		expect(handled.config.backendConfig).toEqual({ path: 'app.log' });
		expect(handled.label).toBe('toText().onLocal(path="app.log")');
		expect(fmt.config.backendName).toBeUndefined();
	});

	it('keeps the transform untouched', () => {
		const handled = attachBackend(makeLine(), 'local', {}, 'onLocal()');
		expect(handled.format(createTestEvent({ message: 'same' }))).toBe('same');
	});

	it('rejects a second handler', () => {
		const handled = attachBackend(makeLine(), 'local', {}, 'onLocal()');
		expect(() => attachBackend(handled, 's3', {}, 'onS3()')).toThrow(ConfigError);
		expect(() => attachBackend(handled, 's3', {}, 'onS3()')).toThrow(
			'Formatter toText().onLocal() already targets backend "local"',
		);
	});
});

describe('withFormatterLimits', () => {
	it('stores per-sink limits in the config', () => {
		const fmt = withFormatterLimits(makeLine(), WARNING, ERROR);
		expect(fmt.config.lowerLimit).toBe(60);
		expect(fmt.config.upperLimit).toBe(80);
	});

	it('validates the range', () => {
		expect(() => withFormatterLimits(makeLine(), ERROR, WARNING)).toThrow(ConfigError);
	});
});

describe('describeCall', () => {
	it('renders scalar parameters only', () => {
		expect(describeCall('onS3', { bucket: 'logs', flushThreshold: 10, client: {} })).toBe(
			'onS3(bucket="logs", flushThreshold=10)',
		);
	});
});

describe('customFields', () => {
	it('skips reserved names', () => {
		const event = createTestEvent({ fields: { user: 'ada', message: 'shadow', level: 3 } });
		expect(customFields(event)).toEqual([['user', 'ada']]);
	});
});

describe('toTabularRow', () => {
	it('keeps scalar fields only', () => {
		const event = createTestEvent({
			message: 'row',
			tags: ['db'],
			fields: { rows: 12, ok: true, missing: null, nested: { a: 1 }, list: [1] },
		});
		expect(toTabularRow(event)).toEqual({
			time: new Date('2024-01-15T10:30:00.000Z'),
			level: 'NOTE',
			levelNumber: 30,
			message: 'row',
			tags: ['db'],
			fields: { rows: 12, ok: true, missing: null },
		});
	});

	it('recognizes scalars', () => {
		expect(isScalar('a')).toBe(true);
		expect(isScalar(null)).toBe(true);
		expect(isScalar(undefined)).toBe(false);
		expect(isScalar(new Date())).toBe(false);
	});
});
