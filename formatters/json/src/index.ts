/**
 * @logweave/formatter-json — registration entry point.
 */

import { type FormatterRegistration, readBoolean } from '@logweave/sdk';
import { toJson } from './json-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'json',
		create: (options) => toJson({ pretty: readBoolean(options, 'pretty', false) }),
		optionsSchema: {
			type: 'object',
			properties: {
				pretty: { type: 'boolean', description: 'Indent output', default: false },
			},
			additionalProperties: false,
		},
	};
}

export { type JsonOptions, toJson, toJsonRecord } from './json-formatter.js';
