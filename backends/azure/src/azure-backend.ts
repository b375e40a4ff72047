/**
 * Azure Blob Storage backend.
 *
 * Buffers formatted lines and appends each flush to one append blob. The
 * blob is created on the first flush if it does not exist yet. A flush
 * larger than the service block limit is split over several blocks.
 */

import { AnonymousCredential, AppendBlobClient } from '@azure/storage-blob';
import { BufferedSink } from '@logweave/core';
import {
	attachBackend,
	ConfigError,
	describeCall,
	type Formatter,
	type FormatterConfig,
	isTableFormatter,
	readOptionalString,
	readPositiveInt,
	readString,
	type Sink,
} from '@logweave/sdk';

/** Largest block accepted by a single Append Block call */
export const MAX_APPEND_BLOCK_BYTES = 4 * 1024 * 1024;

/** The part of AppendBlobClient this backend uses */
export interface AppendBlobWriter {
	createIfNotExists(options?: {
		blobHTTPHeaders?: { blobContentType?: string };
	}): Promise<unknown>;
	appendBlock(body: Buffer, contentLength: number): Promise<unknown>;
}

export interface AzureOptions {
	container: string;
	blob: string;
	/** Storage account connection string */
	connectionString?: string;
	/** Account URL, e.g. https://account.blob.core.windows.net (may carry a SAS query) */
	endpoint?: string;
	/** Events buffered per append (default 100) */
	flushThreshold?: number;
	/** Pre-configured blob client; takes precedence over connection settings */
	client?: AppendBlobWriter;
}

/**
 * ```ts
 * onAzure(toJson(), {
 *   container: 'logs',
 *   blob: 'app.jsonl',
 *   connectionString: process.env.AZURE_STORAGE_CONNECTION_STRING,
 * })
 * ```
 */
export function onAzure<F extends Formatter>(formatter: F, options: AzureOptions): F {
	if (isTableFormatter(formatter)) {
		throw new ConfigError(
			`onAzure() appends text blocks and cannot take ${formatter.label}\n` +
				'  Solution: use a line formatter such as toJson() or toCsv()',
		);
	}
	const config: Record<string, unknown> = { ...options };
	// credentials stay out of the label
	const { container, blob, flushThreshold } = options;
	return attachBackend(
		formatter,
		'azure',
		config,
		describeCall('onAzure', { container, blob, flushThreshold }),
	);
}

// ─── Builder ──────────────────────────────────────────────────────────────────

function isWriter(value: unknown): value is AppendBlobWriter {
	return (
		typeof value === 'object' &&
		value !== null &&
		'appendBlock' in value &&
		typeof value.appendBlock === 'function' &&
		'createIfNotExists' in value &&
		typeof value.createIfNotExists === 'function'
	);
}

function contentTypeFor(formatKind: string): string {
	switch (formatKind) {
		case 'json':
			return 'application/x-ndjson';
		case 'csv':
			return 'text/csv; charset=utf-8';
		default:
			return 'text/plain; charset=utf-8';
	}
}

function blobUrl(endpoint: string, container: string, blob: string): string {
	const url = new URL(endpoint);
	const base = url.pathname.replace(/\/+$/, '');
	const blobPath = blob.split('/').map(encodeURIComponent).join('/');
	url.pathname = `${base}/${encodeURIComponent(container)}/${blobPath}`;
	return url.toString();
}

function createWriter(config: FormatterConfig, container: string, blob: string): AppendBlobWriter {
	const bc = config.backendConfig;
	if (bc.client !== undefined) {
		if (!isWriter(bc.client)) {
			throw new ConfigError(
				'Azure option "client" must have createIfNotExists() and appendBlock() methods',
			);
		}
		return bc.client;
	}
	const connectionString = readOptionalString(bc, 'connectionString');
	if (connectionString !== undefined) {
		return new AppendBlobClient(connectionString, container, blob);
	}
	const endpoint = readOptionalString(bc, 'endpoint');
	if (endpoint !== undefined) {
		return new AppendBlobClient(blobUrl(endpoint, container, blob), new AnonymousCredential());
	}
	throw new ConfigError(
		'onAzure() needs "connectionString", "endpoint" or "client"\n' +
			"  Example: onAzure(toJson(), { container: 'logs', blob: 'app.jsonl', connectionString })",
	);
}

/** Split a payload into Append Block sized chunks */
export function splitBlocks(payload: Buffer, maxBytes = MAX_APPEND_BLOCK_BYTES): Buffer[] {
	const blocks: Buffer[] = [];
	for (let offset = 0; offset < payload.length; offset += maxBytes) {
		blocks.push(payload.subarray(offset, offset + maxBytes));
	}
	return blocks;
}

export function buildAzureSink(formatter: Formatter, config: FormatterConfig): Sink {
	if (isTableFormatter(formatter)) {
		throw new ConfigError(`The azure backend cannot write table formatter ${formatter.label}`);
	}
	const lines = formatter;
	const bc = config.backendConfig;
	const container = readString(bc, 'container');
	const blob = readString(bc, 'blob');
	const flushThreshold = readPositiveInt(bc, 'flushThreshold', 100);
	const writer = createWriter(config, container, blob);
	const blobContentType = contentTypeFor(config.formatKind);

	let created = false;
	let headerDone = false;
	return new BufferedSink<string>({
		label: lines.label,
		flushThreshold,
		accumulate: (event) => {
			const line = lines.format(event);
			if (headerDone || !lines.header) return line;
			headerDone = true;
			return `${lines.header(event)}\n${line}`;
		},
		write: async (batch) => {
			if (!created) {
				await writer.createIfNotExists({ blobHTTPHeaders: { blobContentType } });
				created = true;
			}
			for (const block of splitBlocks(Buffer.from(`${batch.join('\n')}\n`, 'utf8'))) {
				await writer.appendBlock(block, block.length);
			}
		},
	});
}
