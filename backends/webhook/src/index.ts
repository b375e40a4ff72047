/**
 * @logweave/backend-webhook — registration entry point.
 */

import type { BackendRegistration } from '@logweave/sdk';
import { buildWebhookSink } from './webhook-backend.js';

export function register(): BackendRegistration {
	return {
		name: 'webhook',
		build: (formatter, config) => buildWebhookSink(formatter, config),
		configSchema: {
			type: 'object',
			properties: {
				url: { type: 'string', pattern: '^[Hh][Tt][Tt][Pp][Ss]?://' },
				method: { type: 'string', enum: ['POST', 'PUT', 'PATCH'], default: 'POST' },
				headers: { type: 'object', additionalProperties: { type: 'string' } },
				contentType: { type: 'string', minLength: 1 },
				timeoutSeconds: { type: 'number', exclusiveMinimum: 0, default: 30 },
				maxTries: { type: 'integer', minimum: 1, default: 3 },
				fetch: { description: 'fetch replacement' },
			},
			required: ['url'],
			additionalProperties: false,
		},
	};
}

export {
	backoffDelay,
	buildWebhookSink,
	type FetchLike,
	inferContentType,
	onWebhook,
	WEBHOOK_METHODS,
	type WebhookMethod,
	type WebhookOptions,
	type WebhookSinkOptions,
} from './webhook-backend.js';
