/**
 * OpenTelemetry sink — exports events as OTel log records over OTLP/HTTP.
 *
 * Level numbers map onto OTel severity numbers; tags and caller fields
 * become record attributes.
 */

import { type AnyValue, type AnyValueMap, type LogRecord, SeverityNumber } from '@opentelemetry/api-logs';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { BatchLogRecordProcessor, LoggerProvider } from '@opentelemetry/sdk-logs';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import {
	customFields,
	isScalar,
	type LevelLike,
	type LogEvent,
	levelNumberOf,
	passesLimits,
	type Sink,
	validateLimits,
} from '@logweave/sdk';

/** Instrumentation scope reported with every record */
export const SCOPE_NAME = 'logweave';
export const SCOPE_VERSION = '0.1.0';

/** Level band → OTel severity number (follows the OTel severity ranges) */
export function severityFor(levelNumber: number): SeverityNumber {
	if (levelNumber >= 90) return SeverityNumber.FATAL;
	if (levelNumber >= 80) return SeverityNumber.ERROR;
	if (levelNumber >= 60) return SeverityNumber.WARN;
	if (levelNumber >= 40) return SeverityNumber.INFO;
	if (levelNumber >= 20) return SeverityNumber.DEBUG;
	return SeverityNumber.TRACE;
}

function toAttributeValue(value: unknown): AnyValue {
	if (isScalar(value)) return value;
	if (value instanceof Date) return value.toISOString();
	return JSON.stringify(value) ?? String(value);
}

/** Map a LogEvent onto an OTel LogRecord */
export function toLogRecord(event: LogEvent): LogRecord {
	const attributes: AnyValueMap = { 'logweave.level_number': event.levelNumber };
	if (event.tags.length > 0) attributes['logweave.tags'] = [...event.tags];
	for (const [name, value] of customFields(event)) {
		attributes[name] = toAttributeValue(value);
	}
	return {
		timestamp: event.time,
		severityNumber: severityFor(event.levelNumber),
		severityText: event.levelName,
		body: event.message,
		attributes,
	};
}

export interface OtelLogEmitter {
	emit(record: LogRecord): void;
}

/** The part of LoggerProvider this sink uses */
export interface OtelProvider {
	getLogger(name: string, version?: string): OtelLogEmitter;
	forceFlush(): Promise<void>;
	shutdown(): Promise<void>;
}

export interface OtelBatchOptions {
	maxQueueSize?: number;
	scheduledDelayMillis?: number;
	maxExportBatchSize?: number;
}

export interface OtelOptions {
	/** OTLP/HTTP logs endpoint (default http://localhost:4318/v1/logs) */
	endpoint?: string;
	headers?: Record<string, string>;
	/** Default logweave */
	serviceName?: string;
	serviceVersion?: string;
	resourceAttributes?: Record<string, string>;
	batch?: OtelBatchOptions;
	/** Pre-configured provider; endpoint, resource and batch settings are then ignored */
	provider?: OtelProvider;
	lower?: LevelLike;
	upper?: LevelLike;
}

function createProvider(options: OtelOptions): LoggerProvider {
	const resource = resourceFromAttributes({
		[ATTR_SERVICE_NAME]: options.serviceName ?? 'logweave',
		...(options.serviceVersion ? { [ATTR_SERVICE_VERSION]: options.serviceVersion } : {}),
		...(options.resourceAttributes ?? {}),
	});

	const exporter = new OTLPLogExporter({
		url: options.endpoint ?? 'http://localhost:4318/v1/logs',
		headers: options.headers,
	});

	const batch = options.batch ?? {};
	const processor = new BatchLogRecordProcessor(exporter, {
		maxQueueSize: batch.maxQueueSize ?? 2048,
		scheduledDelayMillis: batch.scheduledDelayMillis ?? 5000,
		maxExportBatchSize: batch.maxExportBatchSize ?? 512,
	});

	return new LoggerProvider({ resource, processors: [processor] });
}

/**
 * ```ts
 * toOtel({ endpoint: 'https://otel.internal/v1/logs', serviceName: 'billing', lower: NOTE })
 * ```
 */
export function toOtel(options: OtelOptions = {}): Sink {
	const lower = levelNumberOf(options.lower ?? 0);
	const upper = levelNumberOf(options.upper ?? 100);
	validateLimits(lower, upper);

	const ownsProvider = options.provider === undefined;
	const provider: OtelProvider = options.provider ?? createProvider(options);
	const otelLogger = provider.getLogger(SCOPE_NAME, SCOPE_VERSION);
	let closed = false;

	const target = ownsProvider
		? `endpoint="${options.endpoint ?? 'http://localhost:4318/v1/logs'}"`
		: 'provider=custom';
	const range = lower === 0 && upper === 100 ? '' : `, lower=${lower}, upper=${upper}`;

	return Object.freeze({
		kind: 'sink' as const,
		label: `toOtel(${target}${range})`,
		async write(event: LogEvent) {
			if (!passesLimits(event.levelNumber, lower, upper)) return;
			if (closed) throw new Error('OpenTelemetry sink is closed');
			otelLogger.emit(toLogRecord(event));
		},
		async flush() {
			if (closed) return;
			await provider.forceFlush();
		},
		async close() {
			if (closed) return;
			closed = true;
			if (ownsProvider) {
				await provider.shutdown();
			} else {
				await provider.forceFlush();
			}
		},
	});
}
