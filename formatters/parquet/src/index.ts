/**
 * @logweave/formatter-parquet — registration entry point.
 */

import { type FormatterRegistration, readEnum } from '@logweave/sdk';
import { PARQUET_COMPRESSIONS, toParquet } from './parquet-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'parquet',
		create: (options) =>
			toParquet({ compression: readEnum(options, 'compression', PARQUET_COMPRESSIONS, 'snappy') }),
		optionsSchema: {
			type: 'object',
			properties: {
				compression: { type: 'string', enum: [...PARQUET_COMPRESSIONS], default: 'snappy' },
			},
			additionalProperties: false,
		},
	};
}

export {
	decodeParquet,
	encodeParquet,
	PARQUET_COMPRESSIONS,
	type ParquetCompression,
	type ParquetOptions,
	toParquet,
} from './parquet-formatter.js';
