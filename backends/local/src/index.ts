/**
 * @logweave/backend-local — registration entry point.
 */

import type { BackendRegistration } from '@logweave/sdk';
import { buildLocalSink } from './local-backend.js';

export function register(): BackendRegistration {
	return {
		name: 'local',
		build: buildLocalSink,
		configSchema: {
			type: 'object',
			properties: {
				path: { type: 'string', minLength: 1, description: 'Log file path' },
				append: {
					type: 'boolean',
					description: 'Keep existing content; false truncates on the first write',
					default: true,
				},
				maxSize: {
					type: ['integer', 'string'],
					description: 'Rotate when the file reaches this size (e.g., 1048576 or "10MB")',
				},
				maxFiles: { type: 'integer', minimum: 1, description: 'Rotated files kept', default: 5 },
				flushThreshold: {
					type: 'integer',
					minimum: 1,
					description: 'Rows buffered before a table formatter writes',
					default: 1000,
				},
			},
			required: ['path'],
			additionalProperties: false,
		},
	};
}

export { buildLocalSink, LocalLineSink, type LocalOptions, onLocal } from './local-backend.js';
export { needsRotation, parseSize, rotateFile } from './rotation.js';
