/**
 * @logweave/formatter-text — registration entry point.
 */

import { type FormatterRegistration, readString } from '@logweave/sdk';
import { DEFAULT_TEMPLATE, toText } from './text-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'text',
		create: (options) => toText(readString(options, 'template', DEFAULT_TEMPLATE)),
		optionsSchema: {
			type: 'object',
			properties: {
				template: {
					type: 'string',
					description: `Line template (default: "${DEFAULT_TEMPLATE}")`,
				},
			},
			additionalProperties: false,
		},
	};
}

export { DEFAULT_TEMPLATE, renderTemplate, toText } from './text-formatter.js';
