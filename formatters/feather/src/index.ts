/**
 * @logweave/formatter-feather — registration entry point.
 */

import type { FormatterRegistration } from '@logweave/sdk';
import { toFeather } from './feather-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'feather',
		create: () => toFeather(),
		optionsSchema: { type: 'object', additionalProperties: false },
	};
}

export { decodeRows, encodeRows, rowsToTable, tableToRows, toFeather } from './feather-formatter.js';
