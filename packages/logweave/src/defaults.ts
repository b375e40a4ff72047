/**
 * Built-in catalogs: every backend, formatter and standalone sink shipped
 * with logweave, ready for code and for YAML logger files.
 */

import {
	type AsyncOptions,
	type AsyncSink,
	asAsync as wrapAsync,
	BackendRegistry,
	type BuildOptions,
	buildLoggerFromConfig,
	loadLoggerConfig,
	Logger,
	type LoggerOptions,
	parseLoggerConfig,
	toConsole,
} from '@logweave/core';
import { register as azureBackend } from '@logweave/backend-azure';
import { register as localBackend } from '@logweave/backend-local';
import { register as s3Backend } from '@logweave/backend-s3';
import { register as webhookBackend } from '@logweave/backend-webhook';
import { register as csvFormat } from '@logweave/formatter-csv';
import { register as featherFormat } from '@logweave/formatter-feather';
import { register as jsonFormat } from '@logweave/formatter-json';
import { register as parquetFormat } from '@logweave/formatter-parquet';
import { register as teamsFormat } from '@logweave/formatter-teams';
import { register as textFormat } from '@logweave/formatter-text';
import {
	type FormatterRegistration,
	isFormatter,
	type Formatter,
	type Sink,
	type SinkRegistration,
} from '@logweave/sdk';
import { register as otelSink } from '@logweave/sink-otel';
import { register as syslogSink } from '@logweave/sink-syslog';

/** `sink: console` in logger files */
export function consoleRegistration(): SinkRegistration {
	return {
		name: 'console',
		create: (options) =>
			toConsole(typeof options.color === 'boolean' ? { color: options.color } : {}),
		optionsSchema: {
			type: 'object',
			properties: {
				color: { type: 'boolean', description: 'Force color on or off (default: detect)' },
			},
			additionalProperties: false,
		},
	};
}

/** A registry with the local, s3, azure and webhook backends */
export function createDefaultRegistry(): BackendRegistry {
	return new BackendRegistry()
		.register(localBackend())
		.register(s3Backend())
		.register(azureBackend())
		.register(webhookBackend());
}

export function defaultFormatters(): FormatterRegistration[] {
	return [textFormat(), jsonFormat(), csvFormat(), featherFormat(), parquetFormat(), teamsFormat()];
}

export function defaultSinks(): SinkRegistration[] {
	return [consoleRegistration(), syslogSink(), otelSink()];
}

/**
 * An empty logger wired to the built-in registry.
 *
 * ```ts
 * const log = createLogger()
 *   .withSinks([toConsole(), onLocal(toJson(), { path: 'logs/app.jsonl' })])
 *   .withLimits(NOTE);
 * await log.log(WARNING('disk almost full'));
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	return Logger.create({ registry: createDefaultRegistry(), ...options });
}

function withDefaults(options: Partial<BuildOptions>): BuildOptions {
	return {
		...options,
		registry: options.registry ?? createDefaultRegistry(),
		// caller entries shadow built-ins of the same name
		formatters: [...(options.formatters ?? []), ...defaultFormatters()],
		sinks: [...(options.sinks ?? []), ...defaultSinks()],
	};
}

/** Build a logger from a YAML file using the built-in catalogs */
export async function loggerFromConfig(
	filePath: string,
	options: Partial<BuildOptions> = {},
): Promise<Logger> {
	return buildLoggerFromConfig(await loadLoggerConfig(filePath), withDefaults(options));
}

/** Build a logger from YAML text using the built-in catalogs */
export function loggerFromYaml(content: string, options: Partial<BuildOptions> = {}): Logger {
	return buildLoggerFromConfig(parseLoggerConfig(content), withDefaults(options));
}

/**
 * Wrap a sink, or a formatter with a handler, in an async delivery queue.
 *
 * ```ts
 * asAsync(onWebhook(toJson(), { url }), { workers: 2, overflow: 'drop-oldest' })
 * ```
 */
export function asAsync(
	target: Sink | Formatter,
	options: AsyncOptions = {},
	registry: BackendRegistry = createDefaultRegistry(),
): AsyncSink {
	return wrapAsync(isFormatter(target) ? registry.resolve(target) : target, options);
}
