/**
 * @logweave/formatter-csv — registration entry point.
 */

import { type FormatterRegistration, readBoolean, readString } from '@logweave/sdk';
import { toCsv } from './csv-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'csv',
		create: (options) =>
			toCsv({
				separator: readString(options, 'separator', ','),
				quote: readString(options, 'quote', '"'),
				headers: readBoolean(options, 'headers', true),
				naString: readString(options, 'naString', 'NA'),
			}),
		optionsSchema: {
			type: 'object',
			properties: {
				separator: { type: 'string', minLength: 1, default: ',' },
				quote: { type: 'string', minLength: 1, default: '"' },
				headers: { type: 'boolean', description: 'Write a header row once', default: true },
				naString: { type: 'string', description: 'Placeholder for missing values', default: 'NA' },
			},
			additionalProperties: false,
		},
	};
}

export { type CsvOptions, escapeCsvValue, FIXED_COLUMNS, toCsv } from './csv-formatter.js';
