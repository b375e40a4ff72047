/**
 * Parquet formatter.
 *
 * Same columns as the feather formatter; the Arrow table is handed to the
 * Parquet writer as an IPC stream and read back the same way on merge.
 */

import { tableToIPC } from 'apache-arrow';
import { Compression, readParquet, Table, writeParquet, WriterPropertiesBuilder } from 'parquet-wasm';
import { decodeRows, rowsToTable } from '@logweave/formatter-feather';
import {
	ConfigError,
	defineTableFormatter,
	describeCall,
	type TableFormatter,
	type TabularRow,
	toTabularRow,
} from '@logweave/sdk';

export const PARQUET_COMPRESSIONS = ['snappy', 'gzip', 'zstd', 'lz4', 'none'] as const;

export type ParquetCompression = (typeof PARQUET_COMPRESSIONS)[number];

export interface ParquetOptions {
	/** Column compression codec (default "snappy") */
	compression?: ParquetCompression;
}

const CODECS: Record<ParquetCompression, Compression> = {
	snappy: Compression.SNAPPY,
	gzip: Compression.GZIP,
	zstd: Compression.ZSTD,
	lz4: Compression.LZ4_RAW,
	none: Compression.UNCOMPRESSED,
};

export function encodeParquet(rows: readonly TabularRow[], compression: ParquetCompression): Uint8Array {
	const table = Table.fromIPCStream(tableToIPC(rowsToTable(rows), 'stream'));
	const properties = new WriterPropertiesBuilder().setCompression(CODECS[compression]).build();
	return writeParquet(table, properties);
}

/** Read rows back out of a Parquet file written by encodeParquet */
export function decodeParquet(bytes: Uint8Array): TabularRow[] {
	return decodeRows(readParquet(bytes).intoIPCStream());
}

/**
 * ```ts
 * onS3(toParquet({ compression: 'zstd' }), { bucket: 'logs', keyPrefix: 'events' })
 * ```
 */
export function toParquet(options: ParquetOptions = {}): TableFormatter {
	const compression = options.compression ?? 'snappy';
	if (!PARQUET_COMPRESSIONS.includes(compression)) {
		throw new ConfigError(
			`toParquet() compression must be one of ${PARQUET_COMPRESSIONS.join(', ')}\n  Got: ${String(compression)}`,
		);
	}
	return defineTableFormatter({
		formatKind: 'parquet',
		label: describeCall('toParquet', { compression }),
		extension: 'parquet',
		options: { compression },
		format: (event) => toTabularRow(event),
		encode: (rows, existing) =>
			encodeParquet(existing ? [...decodeParquet(existing), ...rows] : rows, compression),
	});
}
