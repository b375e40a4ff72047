/**
 * @logweave/backend-s3 — registration entry point.
 */

import type { BackendRegistration } from '@logweave/sdk';
import { buildS3Sink } from './s3-backend.js';

export function register(): BackendRegistration {
	return {
		name: 's3',
		build: (formatter, config) => buildS3Sink(formatter, config),
		configSchema: {
			type: 'object',
			properties: {
				bucket: { type: 'string', minLength: 1 },
				keyPrefix: { type: 'string', minLength: 1, description: 'Object key prefix' },
				region: { type: 'string', default: 'us-east-1' },
				flushThreshold: {
					type: 'integer',
					minimum: 1,
					description: 'Events buffered per object',
					default: 100,
				},
				client: { type: 'object', description: 'Pre-configured S3 client' },
			},
			required: ['bucket', 'keyPrefix'],
			additionalProperties: false,
		},
	};
}

export { buildS3Sink, keyTimestamp, onS3, type S3Options, type S3SinkOptions, type S3Uploader } from './s3-backend.js';
