import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	ConfigError,
	defineLineFormatter,
	type FormatterRegistration,
	isTableFormatter,
	MockSink,
	NOTE,
	SchemaError,
	type SinkRegistration,
	WARNING,
} from '@logweave/sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackendRegistry } from '../registry.js';
import { buildLoggerFromConfig, loadLoggerConfig, parseLoggerConfig } from '../schema.js';

// ─── Test Helpers ─────────────────────────────────────────────────────────────

const plainFormat: FormatterRegistration = {
	name: 'plain',
	optionsSchema: {
		type: 'object',
		properties: { upper: { type: 'boolean' } },
		additionalProperties: false,
	},
	create: () =>
		defineLineFormatter({
			formatKind: 'text',
			label: 'toPlain()',
			format: (event) => `${event.levelName} ${event.message}`,
		}),
};

function setup() {
	const lines: string[] = [];
	const echo = new MockSink('echo');
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
		configSchema: {
			type: 'object',
			properties: { capacity: { type: 'integer' } },
		},
	});
	const sinks: SinkRegistration[] = [{ name: 'echo', create: () => echo }];
	const options = { registry, formatters: [plainFormat], sinks, fallback: new MockSink('fallback') };
	return { lines, echo, options };
}

afterEach(() => {
	vi.unstubAllEnvs();
});

// ─── Parsing ──────────────────────────────────────────────────────────────────

describe('parseLoggerConfig', () => {
	it('parses a valid definition', () => {
		const config = parseLoggerConfig(
			['tags: [billing]', 'sinks:', '  console:', '    sink: echo', '    lower: WARNING'].join('\n'),
		);
		expect(config).toEqual({ tags: ['billing'], sinks: { console: { sink: 'echo', lower: 'WARNING' } } });
	});

	it('treats an empty document as an empty config', () => {
		expect(parseLoggerConfig('')).toEqual({});
	});

	it('substitutes environment variables', () => {
		vi.stubEnv('LOGWEAVE_TEST_DIR', '/var/log/app');
		const config = parseLoggerConfig(
			[
				'sinks:',
				'  file:',
				'    format: plain',
				'    backend: memory',
				'    backendConfig: { path: "${LOGWEAVE_TEST_DIR}/app.log" }',
			].join('\n'),
		);
		expect(config.sinks).toEqual({
			file: { format: 'plain', backend: 'memory', backendConfig: { path: '/var/log/app/app.log' } },
		});
	});

	it('fails on unset environment variables', () => {
		expect(() => parseLoggerConfig('tags: ["${LOGWEAVE_UNSET_VARIABLE}"]')).toThrow(
			'Environment variable "LOGWEAVE_UNSET_VARIABLE" is not set',
		);
	});

	it('reports schema violations with their paths', () => {
		try {
			parseLoggerConfig('colour: true', 'logger.yaml');
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(SchemaError);
			if (err instanceof SchemaError) {
				expect(err.message).toBe('Invalid logger configuration: logger.yaml');
				expect(err.validationErrors).toEqual(['/: must NOT have additional properties']);
			}
		}
	});

	it('rejects a sink that is neither a sink nor a format with a backend', () => {
		expect(() => parseLoggerConfig('sinks:\n  broken:\n    format: plain')).toThrow(SchemaError);
	});

	it('wraps YAML syntax errors', () => {
		expect(() => parseLoggerConfig('sinks: [unclosed', 'bad.yaml')).toThrow(
			'Failed to parse YAML: bad.yaml',
		);
	});
});

describe('loadLoggerConfig', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'logweave-schema-'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('reads and validates a file', async () => {
		const file = join(dir, 'logger.yaml');
		await writeFile(file, 'limits: { lower: NOTE }\n');
		expect(await loadLoggerConfig(file)).toEqual({ limits: { lower: 'NOTE' } });
	});

	it('fails with ConfigError on a missing file', async () => {
		const file = join(dir, 'missing.yaml');
		await expect(loadLoggerConfig(file)).rejects.toThrow(`Failed to load YAML file: ${file}`);
	});
});

// ─── Building ─────────────────────────────────────────────────────────────────

describe('buildLoggerFromConfig', () => {
	it('builds limits, tags and both kinds of sinks', async () => {
		const { lines, echo, options } = setup();
		const config = parseLoggerConfig(
			[
				'limits: { lower: NOTE, upper: 100 }',
				'tags: [billing]',
				'sinks:',
				'  audit:',
				'    format: plain',
				'    backend: memory',
				'    backendConfig: { capacity: 2 }',
				'    lower: WARNING',
				'  echo:',
				'    sink: echo',
			].join('\n'),
		);

		const logger = buildLoggerFromConfig(config, options);

		expect(logger.lowerLimit).toBe(30);
		expect(logger.upperLimit).toBe(100);
		expect(logger.tags).toEqual(['billing']);
		expect(logger.sinkNames).toEqual(['audit', 'echo']);
		expect(logger.sinkLabels).toEqual(['toPlain().memory(capacity=2)[60..100]', 'echo']);

		await logger.log(NOTE('n'));
		await logger.log(WARNING('w'));

		expect(lines).toEqual(['WARNING w']);
		expect(echo.messages).toEqual(['n', 'w']);
		expect(echo.events[0].tags).toEqual(['billing']);
	});

	it('wraps sinks with an async section', async () => {
		const { echo, options } = setup();
		const config = parseLoggerConfig(
			'sinks:\n  echo:\n    sink: echo\n    async: { workers: 2, overflow: drop-oldest }',
		);

		const logger = buildLoggerFromConfig(config, options);
		expect(logger.sinkLabels).toEqual([
			'asAsync(echo, workers=2, maxQueueSize=10000, overflow=drop-oldest)',
		]);

		await logger.log(NOTE('queued'));
		await logger.flush();
		expect(echo.messages).toEqual(['queued']);
	});

	it('fails on unknown formats with the available names', () => {
		const { options } = setup();
		const config = parseLoggerConfig('sinks:\n  x:\n    format: xml\n    backend: memory');
		expect(() => buildLoggerFromConfig(config, options)).toThrow(
			'Unknown format "xml"\n  Available: plain',
		);
	});

	it('fails on unknown level names', () => {
		const { options } = setup();
		const config = parseLoggerConfig('limits: { lower: LOUD }');
		expect(() => buildLoggerFromConfig(config, options)).toThrow(ConfigError);
		expect(() => buildLoggerFromConfig(config, options)).toThrow('Unknown level "LOUD" for "lower"');
	});

	it('fails on backend config the backend schema rejects', () => {
		const { options } = setup();
		const config = parseLoggerConfig(
			'sinks:\n  x:\n    format: plain\n    backend: memory\n    backendConfig: { capacity: lots }',
		);
		expect(() => buildLoggerFromConfig(config, options)).toThrow(
			'Invalid configuration for backend "memory"',
		);
	});

	it('validates catalog options against the registration schema', () => {
		const { options } = setup();
		const config = parseLoggerConfig(
			'sinks:\n  x:\n    format: plain\n    backend: memory\n    options: { colour: red }',
		);
		try {
			buildLoggerFromConfig(config, options);
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(SchemaError);
			if (err instanceof SchemaError) {
				expect(err.message).toBe('Invalid options for format "plain"');
				expect(err.validationErrors).toEqual(['/: must NOT have additional properties']);
			}
		}
	});
});
