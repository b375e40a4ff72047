import {
	attachBackend,
	ConfigError,
	DEBUG,
	defineLevel,
	defineLineFormatter,
	CRITICAL,
	ERROR,
	isTableFormatter,
	type LogEvent,
	MockSink,
	NOTE,
	WARNING,
	withEventTags,
	withFields,
	withLevelTags,
} from '@logweave/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { BufferedSink } from '../buffer.js';
import { Logger, SINK_ERROR_TAG, voidLogger } from '../logger.js';
import { BackendRegistry } from '../registry.js';

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function makeLogger(fallback = new MockSink('fallback')): Logger {
	return Logger.create({ fallback });
}

function makeBuffered(label = 'buffered'): BufferedSink<string> {
	return new BufferedSink<string>({
		label,
		flushThreshold: 10,
		accumulate: (event) => event.message,
		write: async () => {},
	});
}

afterEach(() => {
	vi.restoreAllMocks();
});

// ─── Dispatch ─────────────────────────────────────────────────────────────────

describe('Logger.log', () => {
	it('discards events when there are no sinks', async () => {
		const event = NOTE('nobody listens');
		expect(await makeLogger().log(event)).toBe(event);
		expect(await voidLogger.log(event)).toBe(event);
	});

	it('delivers to every sink in registration order', async () => {
		const order: string[] = [];
		const a = new MockSink('a');
		const b = new MockSink('b');
		vi.spyOn(a, 'write').mockImplementation(async () => {
			order.push('a');
		});
		vi.spyOn(b, 'write').mockImplementation(async () => {
			order.push('b');
		});

		await makeLogger().withSinks([a, b]).log(NOTE('x'));
		expect(order).toEqual(['a', 'b']);
	});

	it('filters inclusively on both limits', async () => {
		const sink = new MockSink();
		const logger = makeLogger().withSinks([sink]).withLimits(NOTE, ERROR);

		await logger.log(DEBUG('below'));
		await logger.log(NOTE('lower edge'));
		await logger.log(ERROR('upper edge'));
		await logger.log(CRITICAL('above'));

		expect(sink.messages).toEqual(['lower edge', 'upper edge']);
	});

	it('returns the untouched event when the filter rejects it', async () => {
		const event = DEBUG('quiet');
		const logger = makeLogger().withTags(['app']).withLimits(WARNING);
		expect(await logger.log(event)).toBe(event);
	});

	it('merges tags as event, then level, then logger tags', async () => {
		const sink = new MockSink();
		const AUDIT = withLevelTags(defineLevel('AUDIT', 70), ['level']);
		const logger = makeLogger().withSinks([sink]).withTags(['logger']);

		const result = await logger.log(withEventTags(AUDIT('x'), ['event']));

		expect(sink.events[0].tags).toEqual(['event', 'level', 'logger']);
		expect(result?.tags).toEqual(['event', 'level', 'logger']);
	});

	it('keeps duplicate tags', async () => {
		const sink = new MockSink();
		await makeLogger()
			.withSinks([sink])
			.withTags(['a'])
			.log(withEventTags(NOTE('x'), ['a']));
		expect(sink.events[0].tags).toEqual(['a', 'a']);
	});

	it('chains into a second logger without repeating tags', async () => {
		const sink = new MockSink();
		const inner = makeLogger().withSinks([sink]).withTags(['inner']);
		const outer = makeLogger().withTags(['outer']);

		const first = await outer.log(NOTE('x'));
		expect(first).not.toBeNull();
		if (first) await inner.log(first);

		expect(sink.events[0].tags).toEqual(['outer', 'inner']);
	});
});

describe('Logger middleware', () => {
	it('runs middleware before the filter, in order', async () => {
		const sink = new MockSink();
		const promote = (event: LogEvent) => (event.message === 'promote' ? ERROR(event.message) : event);
		const logger = makeLogger()
			.withSinks([sink])
			.withLimits(WARNING)
			.withMiddleware(promote, (event) => withFields(event, { seen: true }));

		await logger.log(NOTE('promote'));
		await logger.log(NOTE('stay low'));

		expect(sink.messages).toEqual(['promote']);
		expect(sink.events[0].fields).toEqual({ seen: true });
	});

	it('stops dispatch when middleware drops the event', async () => {
		const sink = new MockSink();
		const logger = makeLogger()
			.withSinks([sink])
			.withMiddleware(() => null);

		expect(await logger.log(NOTE('gone'))).toBeNull();
		expect(sink.events).toHaveLength(0);
	});

	it('propagates middleware exceptions to the caller', async () => {
		const logger = makeLogger().withMiddleware(() => {
			throw new Error('middleware bug');
		});
		await expect(logger.log(NOTE('x'))).rejects.toThrow('middleware bug');
	});
});

// ─── Fault isolation ──────────────────────────────────────────────────────────

describe('Logger fault isolation', () => {
	it('keeps delivering to siblings and reports the failure once', async () => {
		const fallback = new MockSink('fallback');
		const first = new MockSink('first');
		const broken = new MockSink('broken');
		const last = new MockSink('last');
		broken.setError('boom');

		await Logger.create({ fallback }).withSinks([first, broken, last]).log(NOTE('x'));

		expect(first.messages).toEqual(['x']);
		expect(last.messages).toEqual(['x']);
		expect(fallback.events).toHaveLength(1);

		const report = fallback.events[0];
		expect(report.levelName).toBe('ERROR');
		expect(report.levelNumber).toBe(80);
		expect(report.message).toBe('Sink #2 failed: boom\nSink: broken');
		expect(report.tags).toEqual([SINK_ERROR_TAG]);
		expect(report.fields).toEqual({ sinkIndex: 2, sinkName: 'sink_2', sinkLabel: 'broken' });
	});

	it('resolves normally when a sink fails', async () => {
		const broken = new MockSink('broken');
		broken.setError('boom');
		const event = NOTE('x');
		expect(await makeLogger().withSinks([broken]).log(event)).toBe(event);
	});

	it('reports failures on stderr by default', async () => {
		const stderrWrite = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const broken = new MockSink('broken');
		broken.setError('boom');

		await Logger.create().withSinks([broken]).log(NOTE('x'));

		expect(stderrWrite).toHaveBeenCalledTimes(1);
		expect(stderrWrite).toHaveBeenCalledWith(
			expect.stringMatching(/\[ERROR\] Sink #1 failed: boom\nSink: broken/),
		);
	});

	it('falls back to a process warning when the fallback fails too', async () => {
		const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
		const fallback = new MockSink('fallback');
		fallback.setError('fallback down');
		const broken = new MockSink('broken');
		broken.setError('boom');

		await Logger.create({ fallback }).withSinks([broken]).log(NOTE('x'));

		expect(emitWarning).toHaveBeenCalledTimes(1);
		expect(emitWarning).toHaveBeenCalledWith(
			'Sink #1 (sink_1) failed with "boom" and the console fallback failed too: fallback down',
			{ type: 'LogweaveWarning', code: 'LOGWEAVE_FALLBACK_FAILED' },
		);
	});
});

// ─── Configuration ────────────────────────────────────────────────────────────

describe('Logger configuration', () => {
	it('never mutates the parent logger', () => {
		const parent = makeLogger().withTags(['parent']);
		const child = parent
			.withSinks([new MockSink()])
			.withTags(['child'])
			.withLimits(WARNING, ERROR);

		expect(parent.sinkNames).toEqual([]);
		expect(parent.tags).toEqual(['parent']);
		expect(parent.lowerLimit).toBe(0);
		expect(parent.upperLimit).toBe(100);
		expect(child.tags).toEqual(['parent', 'child']);
	});

	it('names unnamed sinks by position', () => {
		const logger = makeLogger()
			.withSinks([new MockSink(), new MockSink()])
			.withSinks([new MockSink()]);
		expect(logger.sinkNames).toEqual(['sink_1', 'sink_2', 'sink_3']);
	});

	it('uses record keys as names and suffixes collisions', () => {
		const logger = makeLogger()
			.withSinks({ file: new MockSink() })
			.withSinks({ file: new MockSink() })
			.withSinks({ file: new MockSink() });
		expect(logger.sinkNames).toEqual(['file', 'file_2', 'file_3']);
	});

	it('suffixes auto names that collide with explicit ones', () => {
		const logger = makeLogger()
			.withSinks({ sink_2: new MockSink() })
			.withSinks([new MockSink()]);
		expect(logger.sinkNames).toEqual(['sink_2', 'sink_2_2']);
	});

	it('replaces sinks with append: false', () => {
		const logger = makeLogger()
			.withSinks({ a: new MockSink('a'), b: new MockSink('b') })
			.withSinks([new MockSink('c')], { append: false });
		expect(logger.sinkNames).toEqual(['sink_1']);
		expect(logger.sinkLabels).toEqual(['c']);
	});

	it('replaces tags with append: false', () => {
		const logger = makeLogger().withTags(['a']).withTags(['b'], { append: false });
		expect(logger.tags).toEqual(['b']);
	});

	it('keeps an omitted limit', () => {
		const logger = makeLogger().withLimits(NOTE).withLimits(undefined, ERROR);
		expect(logger.lowerLimit).toBe(30);
		expect(logger.upperLimit).toBe(80);
	});

	it('validates limits', () => {
		expect(() => makeLogger().withLimits(ERROR, WARNING)).toThrow(
			'Lower limit (80) must be <= upper limit (60)',
		);
		expect(() => makeLogger().withLimits(100)).toThrow(ConfigError);
		expect(() => makeLogger().withLimits(0, 0)).toThrow(ConfigError);
	});

	it('needs a registry to accept formatters', () => {
		const formatter = attachBackend(
			defineLineFormatter({ formatKind: 'text', label: 'toText()', format: (e) => e.message }),
			'memory',
			{},
			'onMemory()',
		);
		expect(() => makeLogger().withSinks([formatter])).toThrow(
			'Sink #1 is a formatter (toText().onMemory()) but this logger has no backend registry',
		);
	});

	it('resolves formatters through the registry when sinks are added', async () => {
		const lines: string[] = [];
		const registry = new BackendRegistry().register({
			name: 'memory',
			build: (formatter) => ({
				kind: 'sink',
				label: formatter.label,
				write(event) {
					if (isTableFormatter(formatter)) return;
					lines.push(formatter.format(event));
				},
			}),
		});
		const formatter = attachBackend(
			defineLineFormatter({
				formatKind: 'text',
				label: 'toText()',
				format: (e) => `${e.levelName}: ${e.message}`,
			}),
			'memory',
			{},
			'onMemory()',
		);

		const logger = Logger.create({ registry, fallback: new MockSink() }).withSinks([formatter]);
		await logger.log(WARNING('careful'));

		expect(logger.sinkLabels).toEqual(['toText().onMemory()']);
		expect(lines).toEqual(['WARNING: careful']);
	});
});

// ─── Buffers ──────────────────────────────────────────────────────────────────

describe('Logger buffers', () => {
	it('flushes all sinks, one by name, by position, or a list', async () => {
		const a = new MockSink('a');
		const b = new MockSink('b');
		const logger = makeLogger().withSinks({ a, b });

		await logger.flush();
		await logger.flush('a');
		await logger.flush(2);
		await logger.flush(['a', 2]);

		expect(a.flushCount).toBe(3);
		expect(b.flushCount).toBe(3);
	});

	it('rejects unknown flush targets', async () => {
		const logger = makeLogger().withSinks([new MockSink()]);
		await expect(logger.flush('nope')).rejects.toThrow('Unknown sink "nope"\n  Available sinks: sink_1');
		await expect(logger.flush(5)).rejects.toThrow(
			'Sink position 5 is out of range; logger has 1 sink(s)',
		);
	});

	it('turns flush failures into warnings', async () => {
		const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
		const sink = new MockSink();
		vi.spyOn(sink, 'flush').mockRejectedValue(new Error('network down'));

		await makeLogger().withSinks({ remote: sink }).flush();

		expect(emitWarning).toHaveBeenCalledWith('Flush failed for sink "remote": network down', {
			type: 'LogweaveWarning',
			code: 'LOGWEAVE_FLUSH_FAILED',
		});
	});

	it('reports buffered counts, null for unbuffered sinks', async () => {
		const buffered = makeBuffered();
		const logger = makeLogger().withSinks({ plain: new MockSink(), buffered });

		await logger.log(NOTE('one'));
		await logger.log(NOTE('two'));

		expect(logger.bufferStatus()).toEqual({ plain: null, buffered: 2 });
	});

	it('looks up sinks by name or position', () => {
		const a = new MockSink('a');
		const logger = makeLogger().withSinks({ a });
		expect(logger.getSink('a')).toBe(a);
		expect(logger.getSink(1)).toBe(a);
		expect(() => logger.getSink('b')).toThrow(ConfigError);
	});

	it('closes every sink', async () => {
		const a = new MockSink('a');
		const b = new MockSink('b');
		await makeLogger().withSinks([a, b]).close();
		expect(a.closed).toBe(true);
		expect(b.closed).toBe(true);
	});
});

// ─── Inspection ───────────────────────────────────────────────────────────────

describe('Logger.describe', () => {
	it('summarizes an empty logger', () => {
		expect(makeLogger().describe()).toBe(
			'<logger>\nLevel limits: 0 (LOWEST) to 100 (HIGHEST)\nSinks: (none)',
		);
	});

	it('lists limits, tags, middleware and sinks', () => {
		const logger = makeLogger()
			.withLimits(NOTE, ERROR)
			.withTags(['app'])
			.withMiddleware((event) => event)
			.withSinks({ console: new MockSink('mock') });

		expect(logger.describe()).toBe(
			[
				'<logger>',
				'Level limits: 30 (NOTE) to 80 (ERROR)',
				'Tags: app',
				'Middleware: 1',
				'Sinks:',
				'  [1] console: mock',
			].join('\n'),
		);
	});
});
