/**
 * @logweave/backend-azure — registration entry point.
 */

import type { BackendRegistration } from '@logweave/sdk';
import { buildAzureSink } from './azure-backend.js';

export function register(): BackendRegistration {
	return {
		name: 'azure',
		build: buildAzureSink,
		configSchema: {
			type: 'object',
			properties: {
				container: { type: 'string', minLength: 1 },
				blob: { type: 'string', minLength: 1, description: 'Blob name within the container' },
				connectionString: { type: 'string', minLength: 1 },
				endpoint: { type: 'string', pattern: '^https?://', description: 'Storage account URL' },
				flushThreshold: {
					type: 'integer',
					minimum: 1,
					description: 'Events buffered per append',
					default: 100,
				},
				client: { type: 'object', description: 'Pre-configured append blob client' },
			},
			required: ['container', 'blob'],
			additionalProperties: false,
		},
	};
}

export {
	type AppendBlobWriter,
	type AzureOptions,
	buildAzureSink,
	MAX_APPEND_BLOCK_BYTES,
	onAzure,
	splitBlocks,
} from './azure-backend.js';
