/**
 * YAML config loading + JSON Schema validation.
 *
 * Loads a logger definition file, resolves ${} env vars, validates it
 * against the schema and builds a Logger through the backend registry and
 * the formatter and sink catalogs.
 *
 * ```yaml
 * limits: { lower: NOTE, upper: HIGHEST }
 * tags: [billing]
 * sinks:
 *   console:
 *     sink: console
 *     lower: WARNING
 *   audit:
 *     format: json
 *     backend: local
 *     backendConfig: { path: logs/audit.jsonl, maxSize: 10MB }
 *     async: { workers: 1 }
 * ```
 */

import { readFile } from 'node:fs/promises';
import type { ErrorObject } from 'ajv';
import { Ajv } from 'ajv';
import yaml from 'js-yaml';
import {
	attachBackend,
	ConfigError,
	describeCall,
	type FormatterRegistration,
	isRecord,
	type LevelLike,
	levelByName,
	readEnum,
	readPositiveInt,
	readStringArray,
	SchemaError,
	type Sink,
	type SinkRegistration,
	withFormatterLimits,
	withSinkLimits,
} from '@logweave/sdk';
import { asAsync, OVERFLOW_POLICIES } from './async-sink.js';
import { Logger, type LoggerOptions } from './logger.js';
import type { BackendRegistry } from './registry.js';

// ─── JSON Schema for logger config ──────────────────────────────────────────

const levelRef = { type: ['string', 'integer'] };

const sinkSchema = {
	type: 'object',
	properties: {
		format: { type: 'string' },
		sink: { type: 'string' },
		options: { type: 'object' },
		backend: { type: 'string' },
		backendConfig: { type: 'object' },
		lower: levelRef,
		upper: levelRef,
		async: {
			type: 'object',
			properties: {
				flushThreshold: { type: 'integer', minimum: 1 },
				maxQueueSize: { type: 'integer', minimum: 1 },
				workers: { type: 'integer', minimum: 1 },
				overflow: { enum: [...OVERFLOW_POLICIES] },
			},
			additionalProperties: false,
		},
	},
	oneOf: [{ required: ['format', 'backend'] }, { required: ['sink'] }],
	additionalProperties: false,
};

export const loggerConfigSchema = {
	type: 'object',
	properties: {
		limits: {
			type: 'object',
			properties: { lower: levelRef, upper: levelRef },
			additionalProperties: false,
		},
		tags: { type: 'array', items: { type: 'string' } },
		sinks: { type: 'object', additionalProperties: sinkSchema },
	},
	additionalProperties: false,
};

// ─── Env var substitution ─────────────────────────────────────────────────────

function substituteEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = process.env[varName];
			if (envVal === undefined) {
				throw new ConfigError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map(substituteEnvVars);
	}
	if (isRecord(value)) {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v);
		}
		return result;
	}
	return value;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Parse and validate YAML text into a plain config record */
export function parseLoggerConfig(content: string, source = '<inline>'): Record<string, unknown> {
	let raw: unknown;
	try {
		raw = substituteEnvVars(yaml.load(content) ?? {});
	} catch (err) {
		if (err instanceof ConfigError) throw err;
		throw new ConfigError(`Failed to parse YAML: ${source}`, { cause: err });
	}

	const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
	const validate = ajv.compile(loggerConfigSchema);
	if (!validate(raw) || !isRecord(raw)) {
		const errors = (validate.errors ?? []).map(
			(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
		);
		throw new SchemaError(`Invalid logger configuration: ${source}`, errors);
	}
	return raw;
}

/** Load and validate a logger definition from a YAML file */
export async function loadLoggerConfig(filePath: string): Promise<Record<string, unknown>> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf-8');
	} catch (err) {
		throw new ConfigError(`Failed to load YAML file: ${filePath}`, { cause: err });
	}
	return parseLoggerConfig(content, filePath);
}

// ─── Building ────────────────────────────────────────────────────────────────

export interface BuildOptions extends LoggerOptions {
	registry: BackendRegistry;
	/** Formatter catalog, by config name */
	formatters?: readonly FormatterRegistration[];
	/** Standalone sink catalog, by config name */
	sinks?: readonly SinkRegistration[];
}

function readLevel(section: Record<string, unknown>, key: string): LevelLike | undefined {
	const value = section[key];
	if (value === undefined) return undefined;
	if (typeof value === 'number') return value;
	if (typeof value === 'string') {
		const level = levelByName(value);
		if (!level) {
			throw new ConfigError(
				`Unknown level "${value}" for "${key}"\n` +
					'  Use a number in [0, 100] or one of LOWEST, TRACE, DEBUG, NOTE, MESSAGE, WARNING, ERROR, CRITICAL, HIGHEST',
			);
		}
		return level;
	}
	throw new ConfigError(`Option "${key}" must be a level name or number`);
}

function catalogLookup<T extends { name: string }>(
	catalog: readonly T[],
	name: string,
	kind: string,
): T {
	const entry = catalog.find((c) => c.name === name);
	if (!entry) {
		const available = catalog.map((c) => c.name).sort();
		throw new ConfigError(
			`Unknown ${kind} "${name}"\n  Available: ${available.length > 0 ? available.join(', ') : '(none)'}`,
		);
	}
	return entry;
}

const optionsAjv = new Ajv({ allErrors: true, allowUnionTypes: true });

/** Check catalog options against the registration's own schema, when it has one */
function validateOptions(
	registration: FormatterRegistration | SinkRegistration,
	kind: string,
	sinkOptions: Record<string, unknown>,
): void {
	if (!registration.optionsSchema) return;
	const validate = optionsAjv.compile(registration.optionsSchema);
	if (!validate(sinkOptions)) {
		const errors = (validate.errors ?? []).map(
			(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
		);
		throw new SchemaError(`Invalid options for ${kind} "${registration.name}"`, errors);
	}
}

function buildSink(name: string, section: Record<string, unknown>, options: BuildOptions): Sink {
	const sinkOptions = isRecord(section.options) ? section.options : {};
	const lower = readLevel(section, 'lower') ?? 0;
	const upper = readLevel(section, 'upper') ?? 100;

	let sink: Sink;
	if (typeof section.sink === 'string') {
		const registration = catalogLookup(options.sinks ?? [], section.sink, 'sink');
		validateOptions(registration, 'sink', sinkOptions);
		sink = withSinkLimits(registration.create(sinkOptions), lower, upper);
	} else if (typeof section.format === 'string' && typeof section.backend === 'string') {
		const registration = catalogLookup(options.formatters ?? [], section.format, 'format');
		validateOptions(registration, 'format', sinkOptions);
		const backendConfig = isRecord(section.backendConfig) ? section.backendConfig : {};
		const formatter = attachBackend(
			registration.create(sinkOptions),
			section.backend,
			backendConfig,
			describeCall(section.backend, backendConfig),
		);
		sink = options.registry.resolve(withFormatterLimits(formatter, lower, upper));
	} else {
		throw new ConfigError(`Sink "${name}" needs either "sink" or both "format" and "backend"`);
	}

	if (isRecord(section.async)) {
		const asyncSection = section.async;
		sink = asAsync(sink, {
			flushThreshold: readPositiveInt(asyncSection, 'flushThreshold', 100),
			maxQueueSize: readPositiveInt(asyncSection, 'maxQueueSize', 10_000),
			workers: readPositiveInt(asyncSection, 'workers', 1),
			overflow: readEnum(asyncSection, 'overflow', OVERFLOW_POLICIES, 'block'),
			metrics: options.metrics,
		});
	}
	return sink;
}

/**
 * Turn a validated config record into a Logger. Every sink is resolved
 * here, so unknown formats or backends fail before the first event.
 */
export function buildLoggerFromConfig(
	config: Record<string, unknown>,
	options: BuildOptions,
): Logger {
	let logger = Logger.create(options);

	if (isRecord(config.limits)) {
		logger = logger.withLimits(readLevel(config.limits, 'lower'), readLevel(config.limits, 'upper'));
	}

	const tags = readStringArray(config, 'tags');
	if (tags.length > 0) {
		logger = logger.withTags(tags);
	}

	if (isRecord(config.sinks)) {
		const sinks: Record<string, Sink> = {};
		for (const [name, section] of Object.entries(config.sinks)) {
			if (!isRecord(section)) {
				throw new ConfigError(`Sink "${name}" must be an object`);
			}
			sinks[name] = buildSink(name, section, options);
		}
		logger = logger.withSinks(sinks);
	}

	return logger;
}
