import {
	attachBackend,
	BackendNotFoundError,
	type BackendRegistration,
	ConfigError,
	DEBUG,
	defineLineFormatter,
	ERROR,
	type LineFormatter,
	MockSink,
	NOTE,
	SchemaError,
	WARNING,
	withFormatterLimits,
} from '@logweave/sdk';
import { describe, expect, it, vi } from 'vitest';
import { BackendRegistry } from '../registry.js';

function makeFormatter(): LineFormatter {
	return defineLineFormatter({
		formatKind: 'text',
		label: 'toText()',
		format: (event) => event.message,
	});
}

function memoryBackend(sink = new MockSink('memory')): BackendRegistration {
	return {
		name: 'memory',
		build: () => sink,
		configSchema: {
			type: 'object',
			properties: { capacity: { type: 'integer', minimum: 1 } },
			additionalProperties: false,
		},
	};
}

describe('BackendRegistry', () => {
	it('registers backends and lists them sorted', () => {
		const registry = new BackendRegistry()
			.register({ name: 'webhook', build: () => new MockSink() })
			.register({ name: 'local', build: () => new MockSink() });

		expect(registry.names()).toEqual(['local', 'webhook']);
		expect(registry.size).toBe(2);
		expect(registry.has('local')).toBe(true);
		expect(registry.has('s3')).toBe(false);
	});

	it('throws ConfigError on duplicate names', () => {
		const registry = new BackendRegistry().register(memoryBackend());
		expect(() => registry.register(memoryBackend())).toThrow(
			'Backend "memory" is already registered',
		);
	});

	it('unregisters a backend', () => {
		const registration = memoryBackend();
		const registry = new BackendRegistry().register(registration);

		expect(registry.unregister('memory')).toBe(registration);
		expect(registry.has('memory')).toBe(false);
		expect(registry.unregister('memory')).toBeUndefined();
	});
});

describe('BackendRegistry.resolve', () => {
	it('builds the sink exactly once', () => {
		const sink = new MockSink('memory');
		const build = vi.fn(() => sink);
		const registry = new BackendRegistry().register({ name: 'memory', build });
		const formatter = attachBackend(makeFormatter(), 'memory', { capacity: 3 }, 'onMemory(capacity=3)');

		expect(registry.resolve(formatter)).toBe(sink);
		expect(build).toHaveBeenCalledTimes(1);
		expect(build).toHaveBeenCalledWith(formatter, formatter.config);
	});

	it('rejects formatters without a backend', () => {
		const registry = new BackendRegistry().register(memoryBackend());
		expect(() => registry.resolve(makeFormatter())).toThrow(ConfigError);
		expect(() => registry.resolve(makeFormatter())).toThrow('Formatter toText() has no backend');
	});

	it('reports unknown backends with the available names', () => {
		const registry = new BackendRegistry().register(memoryBackend());
		const formatter = attachBackend(makeFormatter(), 'kafka', {}, 'onKafka()');

		expect(() => registry.resolve(formatter)).toThrow(BackendNotFoundError);
		try {
			registry.resolve(formatter);
		} catch (err) {
			expect(err).toBeInstanceOf(BackendNotFoundError);
			if (err instanceof BackendNotFoundError) {
				expect(err.backendName).toBe('kafka');
				expect(err.available).toEqual(['memory']);
			}
		}
	});

	it('validates the backend config against the schema', () => {
		const registry = new BackendRegistry().register(memoryBackend());
		const formatter = attachBackend(makeFormatter(), 'memory', { capacity: 0 }, 'onMemory()');

		try {
			registry.resolve(formatter);
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(SchemaError);
			if (err instanceof SchemaError) {
				expect(err.message).toBe('Invalid configuration for backend "memory"');
				expect(err.validationErrors).toEqual(['/capacity: must be >= 1']);
			}
		}
	});

	it('applies the formatter limits to the built sink', async () => {
		const inner = new MockSink('memory');
		const registry = new BackendRegistry().register(memoryBackend(inner));
		const formatter = withFormatterLimits(
			attachBackend(makeFormatter(), 'memory', {}, 'onMemory()'),
			NOTE,
			WARNING,
		);

		const sink = registry.resolve(formatter);
		await sink.write(DEBUG('too low'));
		await sink.write(NOTE('kept'));
		await sink.write(ERROR('too high'));

		expect(sink.label).toBe('memory[30..60]');
		expect(inner.messages).toEqual(['kept']);
	});
});
