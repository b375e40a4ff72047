/**
 * @logweave/sink-otel — registration entry point.
 */

import { isRecord, readOptionalString, readStringRecord, type SinkRegistration } from '@logweave/sdk';
import { type OtelBatchOptions, toOtel } from './otel-sink.js';

function readBatch(options: Record<string, unknown>): OtelBatchOptions {
	const batch = options.batch;
	if (!isRecord(batch)) return {};
	const pick = (key: string): number | undefined => {
		const value = batch[key];
		return typeof value === 'number' ? value : undefined;
	};
	return {
		maxQueueSize: pick('maxQueueSize'),
		scheduledDelayMillis: pick('scheduledDelayMillis'),
		maxExportBatchSize: pick('maxExportBatchSize'),
	};
}

export function register(): SinkRegistration {
	return {
		name: 'otel',
		create: (options) =>
			toOtel({
				endpoint: readOptionalString(options, 'endpoint'),
				headers: readStringRecord(options, 'headers'),
				serviceName: readOptionalString(options, 'serviceName'),
				serviceVersion: readOptionalString(options, 'serviceVersion'),
				resourceAttributes: readStringRecord(options, 'resourceAttributes'),
				batch: readBatch(options),
			}),
		optionsSchema: {
			type: 'object',
			properties: {
				endpoint: {
					type: 'string',
					description: 'OTLP HTTP endpoint for log export.',
					default: 'http://localhost:4318/v1/logs',
				},
				headers: {
					type: 'object',
					description: 'Custom headers for OTLP requests (e.g., authorization).',
					additionalProperties: { type: 'string' },
				},
				serviceName: {
					type: 'string',
					description: 'OTel service name resource attribute.',
					default: 'logweave',
				},
				serviceVersion: {
					type: 'string',
					description: 'OTel service version resource attribute.',
				},
				resourceAttributes: {
					type: 'object',
					description: 'Additional OTel resource attributes.',
					additionalProperties: { type: 'string' },
				},
				batch: {
					type: 'object',
					description: 'Batch processor configuration.',
					properties: {
						maxQueueSize: {
							type: 'integer',
							minimum: 1,
							description: 'Maximum queue size before dropping.',
							default: 2048,
						},
						scheduledDelayMillis: {
							type: 'integer',
							minimum: 0,
							description: 'Delay between batch exports in milliseconds.',
							default: 5000,
						},
						maxExportBatchSize: {
							type: 'integer',
							minimum: 1,
							description: 'Maximum number of records per export batch.',
							default: 512,
						},
					},
					additionalProperties: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export type { OtelBatchOptions, OtelLogEmitter, OtelOptions, OtelProvider } from './otel-sink.js';
export { SCOPE_NAME, SCOPE_VERSION, severityFor, toLogRecord, toOtel } from './otel-sink.js';
